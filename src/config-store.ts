import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { randomBytes } from 'crypto';
import { StoredConfigSchema, type StoredConfig } from './schemas.js';
import { PlankaError, PlankaErrorType, errnoCode } from './errors.js';
import { logger } from './logging/index.js';

export type { StoredConfig } from './schemas.js';

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'planka');
const CONFIG_FILE_NAME = 'config.json';
const FILE_MODE = 0o600;

function ioError(action: string, file: string, error: unknown): PlankaError {
  const code = errnoCode(error);
  return new PlankaError(
    PlankaErrorType.IO_ERROR,
    `Could not ${action} ${file}${code ? ` (${code})` : ''}`,
    { cause: error, hint: code === 'EACCES' ? 'Check the permissions of the config directory' : undefined }
  );
}

// Leftover temp files are removed best-effort
function removeQuietly(file: string): void {
  try {
    fs.rmSync(file, { force: true });
  } catch (error) {
    logger.debug('Temp file cleanup failed', { path: file, code: errnoCode(error) }, 'config-store');
  }
}

/**
 * Persists the server URL and access token for the current user.
 *
 * Every setter reloads the file, merges one field and rewrites the whole
 * mapping; concurrent invocations are last-writer-wins.
 */
export class ConfigStore {
  readonly dir: string;
  readonly path: string;

  constructor(dir: string = DEFAULT_CONFIG_DIR) {
    this.dir = dir;
    this.path = path.join(dir, CONFIG_FILE_NAME);
  }

  load(): StoredConfig {
    let raw: string;
    try {
      raw = fs.readFileSync(this.path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return {};
      throw ioError('read', this.path, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PlankaError(PlankaErrorType.CONFIG_CORRUPT, `Config file ${this.path} is not valid JSON`, {
        cause: error,
        hint: 'Fix the file by hand or run `planka logout` to remove it',
      });
    }

    const result = StoredConfigSchema.safeParse(parsed);
    if (!result.success) {
      throw new PlankaError(PlankaErrorType.CONFIG_CORRUPT, `Config file ${this.path} has an unexpected shape`, {
        details: result.error.flatten().fieldErrors,
        hint: 'Fix the file by hand or run `planka logout` to remove it',
      });
    }
    return result.data;
  }

  save(config: StoredConfig): void {
    // Temp file lives beside the target so the rename stays on one filesystem
    const tmpPath = path.join(this.dir, `.${CONFIG_FILE_NAME}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);
    try {
      fs.mkdirSync(this.dir, { recursive: true });
      fs.writeFileSync(tmpPath, JSON.stringify(config, null, 2) + '\n', { mode: FILE_MODE });
      fs.renameSync(tmpPath, this.path);
      fs.chmodSync(this.path, FILE_MODE);
    } catch (error) {
      removeQuietly(tmpPath);
      throw ioError('write', this.path, error);
    }
    logger.debug('Config saved', { path: this.path, keys: Object.keys(config) }, 'config-store');
  }

  getUrl(): string | undefined {
    return this.load().url;
  }

  getToken(): string | undefined {
    return this.load().token;
  }

  setUrl(url: string): void {
    this.save({ ...this.load(), url });
  }

  setToken(token: string): void {
    this.save({ ...this.load(), token });
  }

  clear(): void {
    try {
      fs.rmSync(this.path, { force: true });
    } catch (error) {
      throw ioError('remove', this.path, error);
    }
  }
}
