import { Command } from 'commander';
import { setJsonMode } from './output.js';
import { logger, LogLevel } from './logging/index.js';
import type { CommandContext } from './commands/context.js';
import { registerAuthCommands } from './commands/auth.js';
import { registerProjectCommands } from './commands/projects.js';
import { registerBoardCommands } from './commands/boards.js';
import { registerListCommands } from './commands/lists.js';
import { registerCardCommands } from './commands/cards.js';
import { registerCommentCommands } from './commands/comments.js';
import { registerLabelCommands } from './commands/labels.js';
import { registerTaskCommands } from './commands/tasks.js';
import { registerUserCommands } from './commands/users.js';
import { registerNotificationCommands } from './commands/notifications.js';

export const VERSION = '1.0.0';

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name('planka')
    .description('Planka CLI - Manage your Planka boards from the command line')
    .version(VERSION)
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Log HTTP requests to stderr')
    .showHelpAfterError()
    .hook('preAction', (cmd) => {
      const opts = cmd.opts<{ json?: boolean; verbose?: boolean }>();
      setJsonMode(opts.json === true);
      if (opts.verbose) {
        logger.updateConfig({ level: LogLevel.DEBUG, requestsEnabled: true });
      }
    });

  registerAuthCommands(program, ctx);
  registerProjectCommands(program, ctx);
  registerBoardCommands(program, ctx);
  registerListCommands(program, ctx);
  registerCardCommands(program, ctx);
  registerCommentCommands(program, ctx);
  registerLabelCommands(program, ctx);
  registerTaskCommands(program, ctx);
  registerUserCommands(program, ctx);
  registerNotificationCommands(program, ctx);

  return program;
}
