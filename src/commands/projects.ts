import { Command } from 'commander';
import chalk from 'chalk';
import { isJsonMode, out, success } from '../output.js';
import { renderTable, sortByPosition } from '../utils.js';
import { CommandContext, confirmAction, withClient } from './context.js';
import type { ConfirmOptions } from './options.js';

export function registerProjectCommands(program: Command, ctx: CommandContext) {
  program.command('projects')
    .description('List all projects')
    .action(async () => {
      const projects = await withClient(ctx, (client) => client.getProjects());
      if (isJsonMode()) return out(projects);
      console.log(renderTable('Projects', [
        { header: 'ID', style: chalk.cyan },
        { header: 'Name', style: chalk.green },
      ], projects.map((p) => [p.id, p.name])));
    });

  program.command('project <projectId>')
    .description('Show a project and its boards')
    .action(async (projectId: string) => {
      const envelope = await withClient(ctx, (client) => client.getProject(projectId));
      if (isJsonMode()) return out(envelope);
      const boards = sortByPosition(envelope.included?.boards ?? []);
      console.log(renderTable(`Project: ${envelope.item.name}`, [
        { header: 'Board ID', style: chalk.cyan },
        { header: 'Name', style: chalk.green },
      ], boards.map((b) => [b.id, b.name])));
    });

  program.command('project-create <name>')
    .description('Create a new project')
    .action(async (name: string) => {
      const project = await withClient(ctx, (client) => client.createProject(name));
      if (isJsonMode()) return out(project);
      console.log(`${chalk.green('Created project:')} ${project.name} (ID: ${project.id})`);
    });

  program.command('project-update <projectId>')
    .description('Rename a project')
    .option('-n, --name <name>', 'New project name')
    .action(async (projectId: string, opts: { name?: string }) => {
      if (opts.name === undefined) {
        console.log(chalk.yellow('No updates provided'));
        return;
      }
      const name = opts.name;
      const project = await withClient(ctx, (client) => client.updateProject(projectId, { name }));
      if (isJsonMode()) return out(project);
      console.log(`${chalk.green('Updated project:')} ${project.name}`);
    });

  program.command('project-delete <projectId>')
    .description('Delete a project')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (projectId: string, opts: ConfirmOptions) => {
      if (!await confirmAction(ctx, opts.yes, 'Are you sure you want to delete this project?')) return;
      const project = await withClient(ctx, (client) => client.deleteProject(projectId));
      if (isJsonMode()) return out(project);
      success('Project deleted');
    });
}
