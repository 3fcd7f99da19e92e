import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_POSITION } from '../schemas.js';
import { isJsonMode, out, success } from '../output.js';
import { CommandContext, confirmAction, withClient } from './context.js';
import { parsePosition, type ConfirmOptions } from './options.js';

export const DEFAULT_LABEL_COLOR = 'berry-red';

export function registerLabelCommands(program: Command, ctx: CommandContext) {
  program.command('label-create <boardId> <name>')
    .description('Create a label on a board')
    .option('-c, --color <color>', 'Label color', DEFAULT_LABEL_COLOR)
    .option('-p, --position <position>', 'Position', parsePosition, DEFAULT_POSITION)
    .action(async (boardId: string, name: string, opts: { color: string; position: number }) => {
      const label = await withClient(ctx, (client) =>
        client.createLabel(boardId, { name, color: opts.color, position: opts.position })
      );
      if (isJsonMode()) return out(label);
      console.log(`${chalk.green('Created label:')} ${label.name} (ID: ${label.id})`);
    });

  program.command('label-update <labelId>')
    .description('Update a label')
    .option('-n, --name <name>', 'New label name')
    .option('-c, --color <color>', 'New label color')
    .option('-p, --position <position>', 'New position', parsePosition)
    .action(async (labelId: string, opts: { name?: string; color?: string; position?: number }) => {
      if (opts.name === undefined && opts.color === undefined && opts.position === undefined) {
        console.log(chalk.yellow('No updates provided'));
        return;
      }
      const label = await withClient(ctx, (client) =>
        client.updateLabel(labelId, { name: opts.name, color: opts.color, position: opts.position })
      );
      if (isJsonMode()) return out(label);
      console.log(`${chalk.green('Updated label:')} ${label.name}`);
    });

  program.command('label-delete <labelId>')
    .description('Delete a label')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (labelId: string, opts: ConfirmOptions) => {
      if (!await confirmAction(ctx, opts.yes, 'Are you sure you want to delete this label?')) return;
      const label = await withClient(ctx, (client) => client.deleteLabel(labelId));
      if (isJsonMode()) return out(label);
      success('Label deleted');
    });

  program.command('label-add <cardId> <labelId>')
    .description('Add a label to a card')
    .action(async (cardId: string, labelId: string) => {
      const cardLabel = await withClient(ctx, (client) => client.addLabelToCard(cardId, labelId));
      if (isJsonMode()) return out(cardLabel);
      success('Label added to card');
    });

  program.command('label-remove <cardId> <labelId>')
    .description('Remove a label from a card')
    .action(async (cardId: string, labelId: string) => {
      const cardLabel = await withClient(ctx, (client) => client.removeLabelFromCard(cardId, labelId));
      if (isJsonMode()) return out(cardLabel);
      success('Label removed from card');
    });
}
