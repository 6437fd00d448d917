import 'dotenv/config';

import { ConfigError, parseConfig } from '@lib/config';
import { errorMessage } from '@lib/errors';
import { logger, setLogLevel } from '@lib/logger';
import { createPool, PostgresSink } from '@sinks/postgres';
import { PrometheusSink } from '@sinks/prometheus';
import { createNotificationSink } from '@sinks/telegram';
import { createApp } from './app';
import { Monitor } from './monitor';

async function main(): Promise<void> {
  const config = parseConfig(process.env);
  setLogLevel(config.logLevel);

  const pool = createPool(config.databaseUrl);
  const persistence = new PostgresSink(pool);
  await persistence.ensureSchema();

  const monitor = new Monitor(config, {
    persistence,
    metrics: new PrometheusSink(),
    notifier: createNotificationSink(config.telegram),
  });
  logger.info(
    {
      sensors: config.sensors,
      intervalMs: config.pollIntervalMs,
      notifications: undefined !== config.telegram,
    },
    'Monitor configured',
  );

  const app = createApp(monitor);
  const server = app.listen(config.port, () => {
    logger.info('Server is running on port %s', config.port);
  });
  monitor.start();

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    await monitor.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await pool.end();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((e) => {
          logger.error({ err: errorMessage(e) }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }
}

main().catch((e) => {
  if (e instanceof ConfigError) {
    logger.fatal({ issues: e.issues }, 'Invalid configuration');
  } else {
    logger.fatal({ err: errorMessage(e) }, 'Start-up failed');
  }
  process.exit(1);
});
