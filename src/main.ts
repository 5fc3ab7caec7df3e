#!/usr/bin/env node

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createRuntime } from './runtime.js';
import { buildServer } from './server.js';
import { errorMessage } from './errors.js';

async function main() {
  const { config, path } = loadConfig();

  const logger = createLogger({ level: config.logging.level, pretty: config.logging.pretty });
  logger.info({ config: path ?? 'defaults' }, 'querygate starting...');

  const runtime = await createRuntime(config, logger);
  const app = await buildServer({ config, runtime, logger: logger.child({ module: 'http' }) });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    app
      .close()
      .then(() => runtime.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const verification = await runtime.audit.verify();
  if (!verification.valid) {
    logger.warn({ errors: verification.errors.slice(0, 5) }, 'Audit log chain verification failed');
  }

  await app.listen({ port: config.server.port, host: config.server.host });
  logger.info(`querygate listening on ${config.server.host}:${config.server.port}`);
}

main().catch((err: unknown) => {
  console.error(`querygate failed to start: ${errorMessage(err)}`);
  process.exit(1);
});
