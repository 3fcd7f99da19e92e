import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { z, ZodTypeAny } from 'zod';
import type { ConfigStore } from '../config-store.js';
import type { EnvConfig } from '../config.js';
import { PlankaClient, type PlankaClientOptions } from '../planka-client.js';
import { PlankaError, PlankaErrorType } from '../errors.js';
import type { Prompter } from '../prompt.js';
import { isJsonMode } from '../output.js';

export interface CommandContext {
  store: ConfigStore;
  env: EnvConfig;
  prompter: Prompter;
  clientOptions?: PlankaClientOptions;
}

export interface Session {
  url: string;
  token?: string;
}

// Environment wins over the stored config and is never written back
export function resolveSession(ctx: CommandContext): Session {
  const url = ctx.env.PLANKA_URL ?? ctx.store.getUrl();
  if (!url) {
    throw new PlankaError(PlankaErrorType.CONFIG_INVALID, 'No Planka URL configured', {
      hint: 'Run `planka login` first or set PLANKA_URL',
    });
  }
  const token = ctx.env.PLANKA_TOKEN ?? ctx.store.getToken();
  return { url, token };
}

export function createClient(ctx: CommandContext, url: string, token?: string): PlankaClient {
  return new PlankaClient(url, token, {
    timeoutMs: ctx.env.PLANKA_REQUEST_TIMEOUT_MS,
    ...ctx.clientOptions,
  });
}

export async function withClient<T>(ctx: CommandContext, fn: (client: PlankaClient) => Promise<T>): Promise<T> {
  const { url, token } = resolveSession(ctx);
  const client = createClient(ctx, url, token);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

// Returns false (and says so) when the user declines; --yes skips the prompt
export async function confirmAction(ctx: CommandContext, yes: boolean | undefined, message: string): Promise<boolean> {
  if (yes) return true;
  const confirmed = await ctx.prompter.confirm(message);
  if (!confirmed && !isJsonMode()) {
    console.log(chalk.dim('Aborted'));
  }
  return confirmed;
}

export function parseWith<S extends ZodTypeAny>(schema: S) {
  return (value: string): z.output<S> => {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new InvalidArgumentError(result.error.errors.map((e) => e.message).join(', '));
    }
    return result.data;
  };
}
