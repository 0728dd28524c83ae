import { getConfig } from './config.js';
import { openDatabase } from './db/schema.js';
import { buildServer } from './server.js';
import { TaskManager } from './tasks/task-manager.js';

async function main() {
  const config = getConfig();

  console.log('=================================');
  console.log('  aria2 Task Manager');
  console.log('=================================');
  console.log(`Port: ${config.port}`);
  console.log(`Data path: ${config.dataPath}`);
  console.log(`Download path: ${config.downloadPath}`);
  console.log(`aria2c: ${config.enginePath}`);
  console.log(`Monitor interval: ${config.monitorIntervalMs}ms`);
  console.log('');

  // Initialize database
  const db = openDatabase(config.dataPath);

  const manager = new TaskManager({ db, config });
  await manager.rehydrate();
  manager.startMonitor();

  const fastify = await buildServer(manager);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`Received ${signal}, shutting down...`);

    try {
      await fastify.close();
      await manager.shutdown();
      db.close();
      process.exit(0);
    } catch (err) {
      console.error('Error during shutdown:', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  // Start server
  try {
    await fastify.listen({ port: config.port, host: config.host });
    console.log(`Server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    await manager.shutdown();
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
