import { Command } from 'commander';
import chalk from 'chalk';
import { isJsonMode, out, success } from '../output.js';
import { CommandContext, confirmAction, withClient } from './context.js';
import type { ConfirmOptions } from './options.js';

export function registerCommentCommands(program: Command, ctx: CommandContext) {
  program.command('comments <cardId>')
    .description('List comments on a card')
    .action(async (cardId: string) => {
      const comments = await withClient(ctx, (client) => client.getComments(cardId));
      if (isJsonMode()) return out(comments);
      if (!comments.length) {
        console.log(chalk.dim('No comments'));
        return;
      }
      comments.forEach((c) => console.log(`${chalk.cyan(c.id)}: ${c.text}`));
    });

  program.command('comment-add <cardId> <text>')
    .description('Add a comment to a card')
    .action(async (cardId: string, text: string) => {
      const comment = await withClient(ctx, (client) => client.createComment(cardId, text));
      if (isJsonMode()) return out(comment);
      console.log(`${chalk.green('Added comment')} (ID: ${comment.id})`);
    });

  program.command('comment-update <commentId> <text>')
    .description('Edit a comment')
    .action(async (commentId: string, text: string) => {
      const comment = await withClient(ctx, (client) => client.updateComment(commentId, text));
      if (isJsonMode()) return out(comment);
      console.log(`${chalk.green('Updated comment')} (ID: ${comment.id})`);
    });

  program.command('comment-delete <commentId>')
    .description('Delete a comment')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (commentId: string, opts: ConfirmOptions) => {
      if (!await confirmAction(ctx, opts.yes, 'Are you sure you want to delete this comment?')) return;
      const comment = await withClient(ctx, (client) => client.deleteComment(commentId));
      if (isJsonMode()) return out(comment);
      success('Comment deleted');
    });
}
