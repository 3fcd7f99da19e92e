import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_POSITION } from '../schemas.js';
import { isJsonMode, out, success } from '../output.js';
import { renderTable, sortByPosition } from '../utils.js';
import { CommandContext, confirmAction, withClient } from './context.js';
import { parsePosition, type ConfirmOptions } from './options.js';

export function registerTaskCommands(program: Command, ctx: CommandContext) {
  program.command('tasklist <taskListId>')
    .description('Show a task list and its tasks')
    .action(async (taskListId: string) => {
      const envelope = await withClient(ctx, (client) => client.getTaskList(taskListId));
      if (isJsonMode()) return out(envelope);
      const tasks = sortByPosition(envelope.included?.tasks ?? []);
      console.log(renderTable(envelope.item.name, [
        { header: 'ID', style: chalk.dim },
        { header: 'Done' },
        { header: 'Name', style: chalk.green },
      ], tasks.map((t) => [t.id, t.isCompleted ? '[x]' : '[ ]', t.name])));
    });

  program.command('tasklist-create <cardId> <name>')
    .description('Create a task list on a card')
    .option('-p, --position <position>', 'Position', parsePosition, DEFAULT_POSITION)
    .action(async (cardId: string, name: string, opts: { position: number }) => {
      const taskList = await withClient(ctx, (client) => client.createTaskList(cardId, name, opts.position));
      if (isJsonMode()) return out(taskList);
      console.log(`${chalk.green('Created task list:')} ${taskList.name} (ID: ${taskList.id})`);
    });

  program.command('tasklist-update <taskListId>')
    .description('Update a task list')
    .option('-n, --name <name>', 'New name')
    .option('-p, --position <position>', 'New position', parsePosition)
    .action(async (taskListId: string, opts: { name?: string; position?: number }) => {
      if (opts.name === undefined && opts.position === undefined) {
        console.log(chalk.yellow('No updates provided'));
        return;
      }
      const taskList = await withClient(ctx, (client) =>
        client.updateTaskList(taskListId, { name: opts.name, position: opts.position })
      );
      if (isJsonMode()) return out(taskList);
      console.log(`${chalk.green('Updated task list:')} ${taskList.name}`);
    });

  program.command('tasklist-delete <taskListId>')
    .description('Delete a task list')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (taskListId: string, opts: ConfirmOptions) => {
      if (!await confirmAction(ctx, opts.yes, 'Are you sure you want to delete this task list?')) return;
      const taskList = await withClient(ctx, (client) => client.deleteTaskList(taskListId));
      if (isJsonMode()) return out(taskList);
      success('Task list deleted');
    });

  program.command('task-create <taskListId> <name>')
    .description('Create a task in a task list')
    .option('-p, --position <position>', 'Position', parsePosition, DEFAULT_POSITION)
    .action(async (taskListId: string, name: string, opts: { position: number }) => {
      const task = await withClient(ctx, (client) => client.createTask(taskListId, name, opts.position));
      if (isJsonMode()) return out(task);
      console.log(`${chalk.green('Created task:')} ${task.name} (ID: ${task.id})`);
    });

  program.command('task-update <taskId>')
    .description('Update a task')
    .option('-n, --name <name>', 'New name')
    .option('-p, --position <position>', 'New position', parsePosition)
    .action(async (taskId: string, opts: { name?: string; position?: number }) => {
      if (opts.name === undefined && opts.position === undefined) {
        console.log(chalk.yellow('No updates provided'));
        return;
      }
      const task = await withClient(ctx, (client) =>
        client.updateTask(taskId, { name: opts.name, position: opts.position })
      );
      if (isJsonMode()) return out(task);
      console.log(`${chalk.green('Updated task:')} ${task.name}`);
    });

  program.command('task-complete <taskId>')
    .description('Mark a task as complete')
    .option('--undo', 'Mark as incomplete')
    .action(async (taskId: string, opts: { undo?: boolean }) => {
      const isCompleted = !opts.undo;
      const task = await withClient(ctx, (client) => client.updateTask(taskId, { isCompleted }));
      if (isJsonMode()) return out(task);
      console.log(`${chalk.green(`Marked task as ${isCompleted ? 'complete' : 'incomplete'}:`)} ${task.name}`);
    });

  program.command('task-delete <taskId>')
    .description('Delete a task')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (taskId: string, opts: ConfirmOptions) => {
      if (!await confirmAction(ctx, opts.yes, 'Are you sure you want to delete this task?')) return;
      const task = await withClient(ctx, (client) => client.deleteTask(taskId));
      if (isJsonMode()) return out(task);
      success('Task deleted');
    });
}
