#!/usr/bin/env node

import { loadEnvConfig } from './config.js';
import { ConfigStore } from './config-store.js';
import { createProgram } from './cli.js';
import { terminalPrompter } from './prompt.js';
import { printError } from './output.js';
import { logger } from './logging/index.js';
import { isPlankaError } from './errors.js';

async function main() {
  const env = loadEnvConfig();
  const store = new ConfigStore(env.PLANKA_CONFIG_DIR);
  const program = createProgram({ store, env, prompter: terminalPrompter });
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error('Command failed', isPlankaError(error) ? error.toJSON() : { message: String(error) }, 'cli');
  printError(error);
  process.exitCode = 1;
});
