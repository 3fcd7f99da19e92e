import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_POSITION, type BoardRole } from '../schemas.js';
import type { PlankaAction } from '../planka-client.js';
import { isJsonMode, out, success } from '../output.js';
import { groupBoard, renderTable } from '../utils.js';
import { CommandContext, confirmAction, withClient } from './context.js';
import { parseLimit, parsePosition, parseRole, type ConfirmOptions } from './options.js';

export function renderActions(title: string, actions: PlankaAction[]): string {
  return renderTable(title, [
    { header: 'Type', style: chalk.cyan },
    { header: 'User', style: chalk.green },
    { header: 'Data', style: chalk.dim, maxWidth: 50 },
  ], actions.map((a) => [a.type, a.userId, a.data ?? {}]));
}

export function registerBoardCommands(program: Command, ctx: CommandContext) {
  program.command('board <boardId>')
    .description('Show board details with lists and cards')
    .action(async (boardId: string) => {
      const envelope = await withClient(ctx, (client) => client.getBoard(boardId));
      if (isJsonMode()) return out(envelope);

      const columns = groupBoard(envelope);
      if (!columns.length) {
        console.log(chalk.dim('No lists on this board'));
        return;
      }
      for (const { list, cards } of columns) {
        console.log(renderTable(`${list.name || 'Unnamed'} (${cards.length} cards)`, [
          { header: 'ID', style: chalk.dim },
          { header: 'Name', style: chalk.green },
        ], cards.map((c) => [c.id, c.name])));
        console.log();
      }
    });

  program.command('board-create <projectId> <name>')
    .description('Create a new board in a project')
    .option('-p, --position <position>', 'Position in project', parsePosition, DEFAULT_POSITION)
    .action(async (projectId: string, name: string, opts: { position: number }) => {
      const board = await withClient(ctx, (client) => client.createBoard(projectId, name, opts.position));
      if (isJsonMode()) return out(board);
      console.log(`${chalk.green('Created board:')} ${board.name} (ID: ${board.id})`);
    });

  program.command('board-update <boardId>')
    .description('Update a board')
    .option('-n, --name <name>', 'New board name')
    .option('-p, --position <position>', 'New position', parsePosition)
    .action(async (boardId: string, opts: { name?: string; position?: number }) => {
      if (opts.name === undefined && opts.position === undefined) {
        console.log(chalk.yellow('No updates provided'));
        return;
      }
      const board = await withClient(ctx, (client) =>
        client.updateBoard(boardId, { name: opts.name, position: opts.position })
      );
      if (isJsonMode()) return out(board);
      console.log(`${chalk.green('Updated board:')} ${board.name}`);
    });

  program.command('board-delete <boardId>')
    .description('Delete a board')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (boardId: string, opts: ConfirmOptions) => {
      if (!await confirmAction(ctx, opts.yes, 'Are you sure you want to delete this board?')) return;
      const board = await withClient(ctx, (client) => client.deleteBoard(boardId));
      if (isJsonMode()) return out(board);
      success('Board deleted');
    });

  program.command('board-member-add <boardId> <userId>')
    .description('Add a user to a board')
    .option('-r, --role <role>', 'Membership role (editor or viewer)', parseRole, 'editor')
    .action(async (boardId: string, userId: string, opts: { role: BoardRole }) => {
      const membership = await withClient(ctx, (client) => client.addMemberToBoard(boardId, userId, opts.role));
      if (isJsonMode()) return out(membership);
      console.log(`${chalk.green('Added board member')} (membership ID: ${membership.id}, role: ${membership.role})`);
    });

  program.command('board-member-remove <membershipId>')
    .description('Remove a board membership')
    .action(async (membershipId: string) => {
      const membership = await withClient(ctx, (client) => client.removeBoardMembership(membershipId));
      if (isJsonMode()) return out(membership);
      success('Board member removed');
    });

  program.command('activity <boardId>')
    .description('Show board activity')
    .option('-l, --limit <limit>', 'Number of actions to show', parseLimit, 20)
    .action(async (boardId: string, opts: { limit: number }) => {
      const actions = await withClient(ctx, (client) => client.getBoardActions(boardId));
      const shown = actions.slice(0, opts.limit);
      if (isJsonMode()) return out(shown);
      console.log(renderActions('Board Activity', shown));
    });
}
