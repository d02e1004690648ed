import 'dotenv/config';
import { logger } from './logger';
import { buildServer } from './server';
import { assertRuntimeEnv, shouldRunRuntimePreflight } from './runtimePreflight';

async function main() {
  if (shouldRunRuntimePreflight(process.env)) {
    assertRuntimeEnv(process.env, {
      allowNonProd: process.env.ALLOW_NON_PROD === '1',
      allowMemoryInProduction: process.env.ALLOW_MEMORY_IN_PRODUCTION === '1'
    });
  }

  const app = buildServer();
  const port = Number(process.env.PORT ?? 3000);
  await app.listen({ port, host: '0.0.0.0' });
  logger.info({ port }, 'server listening');

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, 'start-up failed');
  process.exit(1);
});
