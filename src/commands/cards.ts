import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_POSITION } from '../schemas.js';
import type { UpdateCardParams } from '../planka-client.js';
import { isJsonMode, out, success } from '../output.js';
import { CommandContext, confirmAction, withClient } from './context.js';
import { parseDueDate, parseLimit, parsePosition, type ConfirmOptions } from './options.js';
import { renderActions } from './boards.js';

interface CardUpdateOptions {
  name?: string;
  description?: string;
  clearDescription?: boolean;
  listId?: string;
  position?: number;
  dueDate?: string;
  clearDueDate?: boolean;
}

export function cardUpdateParams(opts: CardUpdateOptions): UpdateCardParams {
  return {
    name: opts.name,
    description: opts.clearDescription ? null : opts.description,
    listId: opts.listId,
    position: opts.position,
    dueDate: opts.clearDueDate ? null : opts.dueDate,
  };
}

export function registerCardCommands(program: Command, ctx: CommandContext) {
  program.command('card <cardId>')
    .description('Show card details')
    .action(async (cardId: string) => {
      const card = await withClient(ctx, (client) => client.getCard(cardId));
      if (isJsonMode()) return out(card);
      console.log(chalk.bold.cyan(`Card: ${card.name}`));
      console.log(`ID: ${card.id}`);
      console.log(`List ID: ${card.listId}`);
      if (card.dueDate) console.log(`Due: ${card.dueDate}`);
      if (card.description) {
        console.log(`\n${chalk.bold('Description:')}`);
        console.log(card.description);
      }
    });

  program.command('card-create <listId> <name>')
    .description('Create a new card in a list')
    .option('-p, --position <position>', 'Position in list', parsePosition, DEFAULT_POSITION)
    .option('-d, --description <description>', 'Card description')
    .option('--due-date <date>', 'Due date (ISO format)', parseDueDate)
    .action(async (listId: string, name: string, opts: { position: number; description?: string; dueDate?: string }) => {
      const card = await withClient(ctx, (client) => client.createCard(listId, {
        name,
        position: opts.position,
        description: opts.description,
        dueDate: opts.dueDate,
      }));
      if (isJsonMode()) return out(card);
      console.log(`${chalk.green('Created card:')} ${card.name} (ID: ${card.id})`);
    });

  program.command('card-update <cardId>')
    .description('Update a card')
    .option('-n, --name <name>', 'New card name')
    .option('-d, --description <description>', 'New card description')
    .option('--clear-description', 'Remove the description')
    .option('-l, --list-id <listId>', 'Move to list ID')
    .option('-p, --position <position>', 'New position', parsePosition)
    .option('--due-date <date>', 'Due date (ISO format)', parseDueDate)
    .option('--clear-due-date', 'Remove the due date')
    .action(async (cardId: string, opts: CardUpdateOptions) => {
      const params = cardUpdateParams(opts);
      if (Object.values(params).every((value) => value === undefined)) {
        console.log(chalk.yellow('No updates provided'));
        return;
      }
      const card = await withClient(ctx, (client) => client.updateCard(cardId, params));
      if (isJsonMode()) return out(card);
      console.log(`${chalk.green('Updated card:')} ${card.name}`);
    });

  program.command('card-move <cardId> <listId>')
    .description('Move a card to a different list')
    .option('-p, --position <position>', 'Position in new list', parsePosition, DEFAULT_POSITION)
    .action(async (cardId: string, listId: string, opts: { position: number }) => {
      const card = await withClient(ctx, (client) => client.moveCard(cardId, listId, opts.position));
      if (isJsonMode()) return out(card);
      console.log(`${chalk.green('Moved card:')} ${card.name}`);
    });

  program.command('card-delete <cardId>')
    .description('Delete a card')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (cardId: string, opts: ConfirmOptions) => {
      if (!await confirmAction(ctx, opts.yes, 'Are you sure you want to delete this card?')) return;
      const card = await withClient(ctx, (client) => client.deleteCard(cardId));
      if (isJsonMode()) return out(card);
      success('Card deleted');
    });

  program.command('card-duplicate <cardId>')
    .description('Duplicate a card')
    .option('-p, --position <position>', 'Position for duplicate', parsePosition, DEFAULT_POSITION)
    .action(async (cardId: string, opts: { position: number }) => {
      const card = await withClient(ctx, (client) => client.duplicateCard(cardId, opts.position));
      if (isJsonMode()) return out(card);
      console.log(`${chalk.green('Duplicated card:')} ${card.name} (ID: ${card.id})`);
    });

  program.command('card-activity <cardId>')
    .description('Show card activity')
    .option('-l, --limit <limit>', 'Number of actions to show', parseLimit, 20)
    .action(async (cardId: string, opts: { limit: number }) => {
      const actions = (await withClient(ctx, (client) => client.getCardActions(cardId))).slice(0, opts.limit);
      if (isJsonMode()) return out(actions);
      console.log(renderActions('Card Activity', actions));
    });

  program.command('card-member-add <cardId> <userId>')
    .description('Add a user to a card')
    .action(async (cardId: string, userId: string) => {
      const membership = await withClient(ctx, (client) => client.addMemberToCard(cardId, userId));
      if (isJsonMode()) return out(membership);
      success('Member added to card');
    });

  program.command('card-member-remove <cardId> <userId>')
    .description('Remove a user from a card')
    .action(async (cardId: string, userId: string) => {
      const membership = await withClient(ctx, (client) => client.removeMemberFromCard(cardId, userId));
      if (isJsonMode()) return out(membership);
      success('Member removed from card');
    });

  program.command('attachment-add <cardId> <file>')
    .description('Upload a file as a card attachment')
    .action(async (cardId: string, file: string) => {
      const attachment = await withClient(ctx, (client) => client.createAttachment(cardId, file));
      if (isJsonMode()) return out(attachment);
      console.log(`${chalk.green('Uploaded attachment:')} ${attachment.name} (ID: ${attachment.id})`);
    });

  program.command('attachment-rename <attachmentId> <name>')
    .description('Rename an attachment')
    .action(async (attachmentId: string, name: string) => {
      const attachment = await withClient(ctx, (client) => client.updateAttachment(attachmentId, { name }));
      if (isJsonMode()) return out(attachment);
      console.log(`${chalk.green('Renamed attachment:')} ${attachment.name}`);
    });

  program.command('attachment-delete <attachmentId>')
    .description('Delete an attachment')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (attachmentId: string, opts: ConfirmOptions) => {
      if (!await confirmAction(ctx, opts.yes, 'Are you sure you want to delete this attachment?')) return;
      const attachment = await withClient(ctx, (client) => client.deleteAttachment(attachmentId));
      if (isJsonMode()) return out(attachment);
      success('Attachment deleted');
    });
}
