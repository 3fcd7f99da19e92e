import { Command } from 'commander';
import chalk from 'chalk';
import { ServerUrlSchema, type StoredConfig } from '../schemas.js';
import { isPlankaError, PlankaErrorType } from '../errors.js';
import { isJsonMode, out, success, warn } from '../output.js';
import { CommandContext, createClient, parseWith, withClient } from './context.js';

const parseUrl = parseWith(ServerUrlSchema);

// A corrupt config must not block logout, which is how it gets removed
function loadForLogout(ctx: CommandContext): StoredConfig {
  try {
    return ctx.store.load();
  } catch (error) {
    if (!isPlankaError(error) || error.type !== PlankaErrorType.CONFIG_CORRUPT) throw error;
    warn(`Ignoring unreadable config: ${error.message}`);
    return {};
  }
}

export function registerAuthCommands(program: Command, ctx: CommandContext) {
  program.command('login')
    .description('Log in and save credentials')
    .option('-s, --url <url>', 'Planka server URL', parseUrl)
    .option('-u, --username <username>', 'Email or username')
    .option('-p, --password <password>', 'Password')
    .action(async (opts: { url?: string; username?: string; password?: string }) => {
      let url = opts.url;
      if (!url) {
        const current = ctx.store.getUrl();
        const answer = await ctx.prompter.text(
          current ? 'Planka URL' : 'Planka URL (e.g. https://planka.example.com)',
          current
        );
        url = answer === undefined ? undefined : parseUrl(answer);
      }
      if (!url) throw new Error('A Planka URL is required');
      ctx.store.setUrl(url);

      const username = opts.username ?? await ctx.prompter.text('Username/Email');
      if (!username) throw new Error('A username or email is required');
      const password = opts.password ?? await ctx.prompter.password('Password');
      if (!password) throw new Error('A password is required');

      const client = createClient(ctx, url);
      let token: string;
      try {
        token = await client.login(username, password);
      } finally {
        client.close();
      }
      ctx.store.setToken(token);

      if (isJsonMode()) return out({ success: true, url, configPath: ctx.store.path });
      success('Login successful!');
      console.log(`Config saved to ${ctx.store.path}`);
    });

  program.command('logout')
    .description('Revoke the access token and clear saved credentials')
    .option('--local', 'Only clear local credentials, skip the server call')
    .action(async (opts: { local?: boolean }) => {
      const stored = loadForLogout(ctx);
      const token = ctx.env.PLANKA_TOKEN ?? stored.token;
      const url = ctx.env.PLANKA_URL ?? stored.url;

      try {
        if (!opts.local && url && token) {
          await withClient(ctx, (client) => client.logout());
        }
      } catch (error) {
        if (!isPlankaError(error)) throw error;
        warn(`Could not revoke the token on the server: ${error.message}`);
      } finally {
        ctx.store.clear();
      }

      if (isJsonMode()) return out({ success: true });
      success('Logged out - credentials cleared');
    });

  program.command('config-show')
    .description('Show current configuration')
    .action(() => {
      const { url, token } = ctx.store.load();
      if (isJsonMode()) {
        return out({ path: ctx.store.path, url: url ?? null, token: token ? `${token.slice(0, 20)}...` : null });
      }
      console.log(`${chalk.bold('Config file:')} ${ctx.store.path}`);
      console.log(`${chalk.bold('URL:')} ${url ?? chalk.dim('not set')}`);
      console.log(`${chalk.bold('Token:')} ${token ? `${token.slice(0, 20)}...` : chalk.dim('not set')}`);
    });

  program.command('config-set-url')
    .description('Set the Planka server URL')
    .argument('<url>', 'Planka server URL', parseUrl)
    .action((url: string) => {
      ctx.store.setUrl(url);
      if (isJsonMode()) return out({ success: true, url });
      console.log(`${chalk.green('URL set to:')} ${url}`);
    });

  program.command('server-config')
    .description('Show the server configuration')
    .action(async () => {
      const config = await withClient(ctx, (client) => client.getServerConfig());
      out(config);
    });
}
