import { createApp } from './app.js';
import { getEnv } from './config/env.js';

const env = getEnv();
const app = await createApp();

let shuttingDown = false;

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  if (shuttingDown) return;
  shuttingDown = true;

  app.log.info({ signal }, 'shutting down');
  try {
    // Closes the Postgres pool and the Redis connection through onClose hooks.
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error({ err }, 'failed to shut down cleanly');
    process.exit(1);
  }
};

(['SIGINT', 'SIGTERM'] as const).forEach((signal) => {
  process.on(signal, () => {
    void shutdown(signal);
  });
});

try {
  await app.listen({ port: env.PORT, host: env.HOST });
} catch (err) {
  app.log.error({ err }, 'failed to start server');
  process.exit(1);
}
