import { createApp } from './app';
import { loadConfig } from './config';
import { createBuildSystem, warnOnCrossVolume } from './container';
import { applySchema, checkConnection } from './db/client';

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.apiToken) {
    throw new Error('API_TOKEN must be set to run the build service');
  }
  const apiToken = config.apiToken;
  await warnOnCrossVolume(config);

  const system = createBuildSystem(config);

  if (system.pool) {
    await checkConnection(system.pool);
    console.log('[db] Database connected');
    await applySchema(system.pool);
  } else {
    console.log('[db] DATABASE_URL not set; build history will not be persisted');
  }

  system.queue.start();

  const app = createApp({
    queue: system.queue,
    renderer: system.renderer,
    history: system.history,
    pool: system.pool,
    apiToken,
  });

  const server = app.listen(config.port, () => {
    console.log(`Build service listening on port ${config.port}`);
  });

  // Graceful shutdown
  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    console.log('Shutting down...');
    server.close();
    await system.queue.stop();
    if (system.pool) await system.pool.end();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
