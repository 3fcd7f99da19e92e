import { Command } from 'commander';
import chalk from 'chalk';
import { isJsonMode, out } from '../output.js';
import { renderTable } from '../utils.js';
import { CommandContext, withClient } from './context.js';

export function registerUserCommands(program: Command, ctx: CommandContext) {
  program.command('users')
    .description('List all users')
    .action(async () => {
      const users = await withClient(ctx, (client) => client.getUsers());
      if (isJsonMode()) return out(users);
      console.log(renderTable('Users', [
        { header: 'ID', style: chalk.cyan },
        { header: 'Name', style: chalk.green },
        { header: 'Username', style: chalk.dim },
        { header: 'Email', style: chalk.dim },
      ], users.map((u) => [u.id, u.name, u.username, u.email])));
    });

  program.command('user <userId>')
    .description('Show a user')
    .action(async (userId: string) => {
      const user = await withClient(ctx, (client) => client.getUser(userId));
      if (isJsonMode()) return out(user);
      console.log(chalk.bold.cyan(`User: ${user.name}`));
      console.log(`ID: ${user.id}`);
      if (user.username) console.log(`Username: ${user.username}`);
      if (user.email) console.log(`Email: ${user.email}`);
      if (user.isAdmin) console.log('Admin: yes');
    });
}
