import 'dotenv/config';

import env from './util/env';
import logger from './util/logger';
import { buildServer } from './api/server';

export async function main() {
  const app = buildServer();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, closing server...`);
    app.close().then(
      () => logger.info('Server closed'),
      (err: unknown) => logger.error({ err }, 'Failed to close server cleanly')
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const address = await app.listen({ port: env.PORT, host: env.HOST });
  logger.info(`Scraper service listening on ${address}`);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.fatal({ err }, 'Failed to start server');
    process.exitCode = 1;
  });
}
