import { loadConfig } from './utils/config';
import { createPool, endPool, initializeSchema } from './utils/io/mysql';
import { MysqlRepository } from './utils/io/mysqlRepository';
import { MagicLinkStore } from './utils/auth/magicLink';
import { createApp } from './app';
import { err, log } from './utils/log';

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.mysql);
  await initializeSchema(pool);

  const app = createApp({
    repository: MysqlRepository.fromPool(pool),
    config,
    magicLinks: new MagicLinkStore(config.magicLinkExpireMinutes),
  });

  const server = app.listen(config.port, () => {
    log(`Server is running on port ${config.port}`);
  });

  process.on('SIGTERM', () => {
    log('Shutting down');
    server.close(() => {
      endPool(pool).catch((error: unknown) => err('Failed to close the database pool', error));
    });
  });
}

main().catch((error: unknown) => {
  err('Failed to start the server', error);
  process.exit(1);
});
