import 'dotenv/config';
import { loadConfig } from './config';
import { createGatewayClient } from './client';
import { createLogger } from './logger';

const logger = createLogger('main');

async function main(): Promise<void> {
  logger.info('gateway client starting');
  const cfg = loadConfig();
  const client = createGatewayClient(cfg);
  const info = await client.getSessionInfo();
  logger.info({ baseUrl: cfg.baseUrl, status: info }, 'session live; keep-alive running');

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'shutting down');
    void client.logout().then(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
