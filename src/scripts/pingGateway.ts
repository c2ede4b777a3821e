import 'dotenv/config';
import { loadConfig } from '../config';
import { createGatewayClient } from '../client';
import { createLogger } from '../logger';

const logger = createLogger('pingGateway');

async function main(): Promise<void> {
  const cfg = loadConfig();
  const client = createGatewayClient(cfg);
  try {
    const info = await client.getSessionInfo();
    const accounts = await client.accounts.getAccounts();
    logger.info(
      { baseUrl: cfg.baseUrl, authenticated: info.authenticated, accounts: accounts.map((a) => a.id) },
      'gateway reachable',
    );
  } finally {
    await client.logout();
  }
}

main().catch((err) => {
  logger.error({ err }, 'gateway ping failed');
  process.exit(1);
});
