import chalk from 'chalk';
import { isPlankaError } from './errors.js';

let jsonMode = false;
export function setJsonMode(v: boolean) { jsonMode = v; }
export function isJsonMode() { return jsonMode; }

export function out(data: unknown) {
  console.log(JSON.stringify(data, null, 2));
}

export function success(message: string) {
  if (!jsonMode) console.log(chalk.green(message));
}

export function warn(message: string) {
  console.error(chalk.yellow(message));
}

export function formatError(error: unknown): string {
  if (isPlankaError(error)) {
    const lines = [`Error [${error.type}]: ${error.message}`];
    if (error.hint) lines.push(`Hint: ${error.hint}`);
    return lines.join('\n');
  }
  if (error instanceof Error) return `Error: ${error.message}`;
  return `Error: ${String(error)}`;
}

export function printError(error: unknown) {
  if (jsonMode && isPlankaError(error)) {
    console.error(JSON.stringify({ error: error.toJSON() }, null, 2));
    return;
  }
  console.error(chalk.red(formatError(error)));
}
