import { createApp } from './app';
import { APP_CONFIG, ensureEnvReady } from './config';
import { DEMO_DATASET } from './data/demoDataset';
import { assertDatasetIntegrity } from './data/integrity';
import { loadDatabaseModule } from './db';

ensureEnvReady();

try {
  assertDatasetIntegrity(DEMO_DATASET);
} catch (err) {
  console.error('[server]', err);
  process.exit(1);
}

const database = loadDatabaseModule(APP_CONFIG.databaseUri);
const app = createApp({ database });

const server = app.listen(APP_CONFIG.port, APP_CONFIG.host, () => {
  console.log(`Gamification Demo API running on port ${APP_CONFIG.port}`);
});

const shutdown = (signal: NodeJS.Signals) => {
  console.log(`[server] ${signal} received, shutting down`);
  server.close(() => {
    Promise.resolve(database?.close?.())
      .catch((err: unknown) => console.error('[server] Failed to close database', err))
      .finally(() => process.exit(0));
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
