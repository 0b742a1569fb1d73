import chalk from 'chalk';
import parseArgs, { type ParsedArgs } from 'minimist';
import type { Logger } from 'pino';

import type { CloudClient } from './cloudClient.js';
import { getCommand } from './commands/get.js';
import { ensureAuthenticated, loginCommand, type AuthContext } from './commands/login.js';
import { lsCommand } from './commands/ls.js';
import { mkdirCommand } from './commands/mkdir.js';
import { putCommand } from './commands/put.js';
import { rmCommand } from './commands/rm.js';
import type { ServiceConfig } from './config.js';
import { InvalidArgumentError } from './errors.js';
import type { Prompter } from './prompt.js';
import type { TokenStore } from './tokenStore.js';

export type CliDeps = {
  config: ServiceConfig;
  logger: Logger;
  createClient: () => CloudClient;
  tokenStore: TokenStore;
  prompter: Prompter;
  print: (line: string) => void;
  version: () => Promise<string>;
};

const USAGE = [
  'Usage: sncloud <command> [options]',
  '       sncloud --version',
  '',
  'Commands:',
  '  login                                   log in and store the access token',
  '  ls [path]                               list a directory (default: root)',
  '  get <path> [-o DIR] [--pdf|--png] [--pages 1,2]',
  '                                          download a file or convert a note',
  '  mkdir <name> [-p parent]                create a folder',
  '  put <local-file> [-p parent]            upload a file',
  '  rm <path...>                            delete items sharing one directory',
];

function stringOption(args: ParsedArgs, name: string): string | undefined {
  const value: unknown = args[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`--${name} expects a single value`);
  }
  return value;
}

function booleanOption(args: ParsedArgs, name: string): boolean {
  return args[name] === true;
}

function usageError(deps: CliDeps, usage: string): number {
  deps.print(chalk.red(`Usage: sncloud ${usage}`));
  return 1;
}

export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const args = parseArgs(argv, {
    string: ['_', 'output', 'parent', 'pages'],
    boolean: ['pdf', 'png', 'version'],
    alias: { o: 'output', p: 'parent' },
  });
  const [command, ...operands] = args._;

  try {
    if (booleanOption(args, 'version')) {
      deps.print(`sncloud ${await deps.version()}`);
      return 0;
    }

    switch (command) {
      case 'login': {
        const client = deps.createClient();
        return await loginCommand(authContext(deps, client));
      }
      case 'ls': {
        const client = await authenticatedClient(deps);
        await lsCommand(client, operands[0], deps.print);
        return 0;
      }
      case 'get': {
        const [filePath] = operands;
        if (filePath === undefined) {
          return usageError(deps, 'get <path> [-o DIR] [--pdf|--png] [--pages 1,2]');
        }
        const options = {
          output: stringOption(args, 'output'),
          pdf: booleanOption(args, 'pdf'),
          png: booleanOption(args, 'png'),
          pages: stringOption(args, 'pages'),
        };
        const client = await authenticatedClient(deps);
        await getCommand(client, filePath, options, deps.print);
        return 0;
      }
      case 'mkdir': {
        const [folderName] = operands;
        if (folderName === undefined) {
          return usageError(deps, 'mkdir <name> [-p parent]');
        }
        const parent = stringOption(args, 'parent');
        const client = await authenticatedClient(deps);
        await mkdirCommand(client, folderName, parent, deps.print);
        return 0;
      }
      case 'put': {
        const [localFile] = operands;
        if (localFile === undefined) {
          return usageError(deps, 'put <local-file> [-p parent]');
        }
        const parent = stringOption(args, 'parent');
        const client = await authenticatedClient(deps);
        await putCommand(client, localFile, parent, deps.print);
        return 0;
      }
      case 'rm': {
        if (operands.length === 0) {
          return usageError(deps, 'rm <path...>');
        }
        const client = await authenticatedClient(deps);
        await rmCommand(client, operands, deps.print);
        return 0;
      }
      default:
        deps.print(chalk.red(`Unknown command: ${command || 'No command specified'}`));
        for (const line of USAGE) {
          deps.print(line);
        }
        return 1;
    }
  } catch (error) {
    deps.logger.debug({ err: error }, 'command failed');
    deps.print(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    return 1;
  }
}

function authContext(deps: CliDeps, client: CloudClient): AuthContext {
  return {
    client,
    tokenStore: deps.tokenStore,
    prompter: deps.prompter,
    logger: deps.logger,
    print: deps.print,
    email: deps.config.email,
    password: deps.config.password,
  };
}

async function authenticatedClient(deps: CliDeps): Promise<CloudClient> {
  const client = deps.createClient();
  await ensureAuthenticated(authContext(deps, client));
  return client;
}
