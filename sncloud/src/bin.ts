#!/usr/bin/env node
import process from 'process';

import { runCli } from './cli.js';
import { createCloudClient } from './clientFactory.js';
import { resolveConfig } from './config.js';
import { createLogger } from './logger.js';
import { TerminalPrompter } from './prompt.js';
import { TokenStore } from './tokenStore.js';
import { readPackageVersion } from './version.js';

const config = resolveConfig();
const logger = createLogger(config.logLevel);

runCli(process.argv.slice(2), {
  config,
  logger,
  createClient: () => createCloudClient(config, logger),
  tokenStore: new TokenStore(config.configDir),
  prompter: new TerminalPrompter(),
  print: (line) => console.log(line),
  version: readPackageVersion,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'sncloud crashed');
    process.exitCode = 1;
  });
