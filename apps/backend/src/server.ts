import { buildApp } from './app.js';
import { config } from './config/index.js';
import { bootstrapSchema } from './db/bootstrap.js';
import { createDatabase, createPool } from './db/index.js';

async function main(): Promise<void> {
  const pool = createPool();
  const db = createDatabase(pool);
  const app = await buildApp({ db });

  // Create tables before accepting traffic
  try {
    await bootstrapSchema(db);
    app.log.info({ service: 'Server' }, 'Database schema ready');
  } catch (err) {
    app.log.error({ service: 'Server', err }, 'Database bootstrap failed');
    await pool.end();
    process.exit(1);
  }

  const shutdown = (signal: NodeJS.Signals): void => {
    app.log.info({ service: 'Server', signal }, 'Shutting down');
    app
      .close()
      .then(() => pool.end())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ service: 'Server', err }, 'Shutdown failed');
          process.exit(1);
        },
      );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { service: 'Server', port: config.port, host: config.host, env: config.nodeEnv },
      'Sharebox backend started',
    );
  } catch (err) {
    app.log.error({ service: 'Server', err }, 'Failed to start server');
    await pool.end();
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Fatal startup error', err);
  process.exit(1);
});
