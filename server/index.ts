import { createServer } from 'http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { openStorage } from './db.js';
import { log } from './log.js';

async function main() {
  const config = loadConfig();

  log(`Starting in ${config.env} mode`);

  const storage = openStorage({ databaseUrl: config.databaseUrl, poolMax: config.poolMax });
  await storage.ensureSchema();
  log('Database schema ready', 'db');

  const app = createApp(storage, config);
  const server = createServer(app);

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`);
    server.close((err) => {
      if (err) {
        console.error('Error closing HTTP server:', err);
      }
      storage
        .close()
        .then(() => {
          log('Database pool closed', 'db');
          process.exit(err ? 1 : 0);
        })
        .catch((closeError: unknown) => {
          console.error('Error closing database pool:', closeError);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(config.port, () => {
    log(`Server running at http://localhost:${config.port}`);
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
