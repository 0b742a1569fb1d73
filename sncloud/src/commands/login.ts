import type { Logger } from 'pino';

import type { CloudClient } from '../cloudClient.js';
import { AuthenticationFailedError, RemoteError, TransportError } from '../errors.js';
import type { Prompter } from '../prompt.js';
import type { TokenStore } from '../tokenStore.js';

export type AuthContext = {
  client: CloudClient;
  tokenStore: TokenStore;
  prompter: Prompter;
  logger: Logger;
  print: (line: string) => void;
  email?: string;
  password?: string;
};

async function promptLogin(ctx: AuthContext): Promise<void> {
  const email = ctx.email ?? (await ctx.prompter.ask('Email'));
  const password = ctx.password ?? (await ctx.prompter.askHidden('Password'));
  const token = await ctx.client.login(email, password);
  await ctx.tokenStore.save(token);
}

export async function loginCommand(ctx: AuthContext): Promise<number> {
  try {
    await promptLogin(ctx);
  } catch (error) {
    if (error instanceof AuthenticationFailedError) {
      ctx.print(`Login failed: ${error.message}`);
      if (error.message.toLowerCase().includes('verification')) {
        ctx.print('Tip: the service wants a verification code for this login; log in once through the web client.');
      }
      return 1;
    }
    throw error;
  }
  ctx.print('Login successful');
  return 0;
}

function isRejectedToken(error: unknown): boolean {
  if (error instanceof TransportError) {
    return error.status === 401 || error.status === 403;
  }
  return error instanceof RemoteError;
}

/**
 * Installs the stored token when the service still accepts it, otherwise logs in.
 * Failures that say nothing about the token are rethrown and the token is kept.
 */
export async function ensureAuthenticated(ctx: AuthContext): Promise<void> {
  const token = await ctx.tokenStore.load();
  if (token) {
    ctx.client.useToken(token);
    try {
      await ctx.client.ls();
      return;
    } catch (error) {
      if (!isRejectedToken(error)) {
        throw error;
      }
      ctx.logger.warn({ err: error }, 'stored token rejected');
      ctx.client.useToken(undefined);
      await ctx.tokenStore.clear();
    }
  }

  ctx.print('Authentication required. Please login.');
  await promptLogin(ctx);
}
