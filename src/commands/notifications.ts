import { Command } from 'commander';
import chalk from 'chalk';
import { isJsonMode, out, success } from '../output.js';
import { renderTable } from '../utils.js';
import { CommandContext, withClient } from './context.js';

export function registerNotificationCommands(program: Command, ctx: CommandContext) {
  program.command('notifications')
    .description('List notifications')
    .action(async () => {
      const notifications = await withClient(ctx, (client) => client.getNotifications());
      if (isJsonMode()) return out(notifications);
      if (!notifications.length) {
        console.log(chalk.dim('No notifications'));
        return;
      }
      console.log(renderTable('Notifications', [
        { header: 'ID', style: chalk.cyan },
        { header: 'Type', style: chalk.green },
        { header: 'Read', style: chalk.dim },
      ], notifications.map((n) => [n.id, n.type, n.isRead ? 'Yes' : 'No'])));
    });

  program.command('notification-read <notificationId>')
    .description('Mark one notification as read')
    .option('--undo', 'Mark as unread')
    .action(async (notificationId: string, opts: { undo?: boolean }) => {
      const notification = await withClient(ctx, (client) =>
        client.updateNotification(notificationId, { isRead: !opts.undo })
      );
      if (isJsonMode()) return out(notification);
      success(`Notification marked as ${notification.isRead ? 'read' : 'unread'}`);
    });

  program.command('notifications-read-all')
    .description('Mark all notifications as read')
    .action(async () => {
      const notifications = await withClient(ctx, (client) => client.readAllNotifications());
      if (isJsonMode()) return out(notifications);
      success('All notifications marked as read');
    });
}
