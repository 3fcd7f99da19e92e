import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_POSITION } from '../schemas.js';
import { isJsonMode, out, success } from '../output.js';
import { renderTable, sortByPosition } from '../utils.js';
import { CommandContext, confirmAction, withClient } from './context.js';
import { parsePosition, type ConfirmOptions } from './options.js';

export function registerListCommands(program: Command, ctx: CommandContext) {
  program.command('list-create <boardId> <name>')
    .description('Create a new list in a board')
    .option('-p, --position <position>', 'Position in board', parsePosition, DEFAULT_POSITION)
    .action(async (boardId: string, name: string, opts: { position: number }) => {
      const list = await withClient(ctx, (client) => client.createList(boardId, name, opts.position));
      if (isJsonMode()) return out(list);
      console.log(`${chalk.green('Created list:')} ${list.name} (ID: ${list.id})`);
    });

  program.command('list-update <listId>')
    .description('Update a list')
    .option('-n, --name <name>', 'New list name')
    .option('-p, --position <position>', 'New position', parsePosition)
    .action(async (listId: string, opts: { name?: string; position?: number }) => {
      if (opts.name === undefined && opts.position === undefined) {
        console.log(chalk.yellow('No updates provided'));
        return;
      }
      const list = await withClient(ctx, (client) =>
        client.updateList(listId, { name: opts.name, position: opts.position })
      );
      if (isJsonMode()) return out(list);
      console.log(`${chalk.green('Updated list:')} ${list.name}`);
    });

  program.command('list-delete <listId>')
    .description('Delete a list')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (listId: string, opts: ConfirmOptions) => {
      if (!await confirmAction(ctx, opts.yes, 'Are you sure you want to delete this list?')) return;
      const list = await withClient(ctx, (client) => client.deleteList(listId));
      if (isJsonMode()) return out(list);
      success('List deleted');
    });

  program.command('list-sort <listId>')
    .description('Sort the cards of a list on the server')
    .option('-f, --field <field>', 'Field to sort by (name, dueDate, createdAt)', 'name')
    .action(async (listId: string, opts: { field: string }) => {
      const list = await withClient(ctx, (client) => client.sortList(listId, opts.field));
      if (isJsonMode()) return out(list);
      console.log(`${chalk.green('Sorted list:')} ${list.name} by ${opts.field}`);
    });

  program.command('cards <listId>')
    .description('List the cards of a list')
    .action(async (listId: string) => {
      const cards = await withClient(ctx, (client) => client.getCards(listId));
      if (isJsonMode()) return out(cards);
      if (!cards.length) {
        console.log(chalk.dim('No cards'));
        return;
      }
      console.log(renderTable('Cards', [
        { header: 'ID', style: chalk.cyan },
        { header: 'Name', style: chalk.green },
        { header: 'Due', style: chalk.dim },
      ], sortByPosition(cards).map((c) => [c.id, c.name, c.dueDate])));
    });
}
