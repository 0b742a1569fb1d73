import type { Logger } from 'pino';

import { CloudClient } from './cloudClient.js';
import type { ServiceConfig } from './config.js';
import { HttpTransport } from './httpTransport.js';
import { Session } from './session.js';

export function createCloudClient(config: ServiceConfig, logger: Logger): CloudClient {
  const session = new Session();
  const transport = new HttpTransport(
    {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
    },
    session,
    logger,
  );
  return new CloudClient(transport, session, { countryCode: config.countryCode, logger });
}
