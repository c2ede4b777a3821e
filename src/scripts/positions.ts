import 'dotenv/config';
import { loadConfig } from '../config';
import { createGatewayClient } from '../client';
import { createLogger } from '../logger';

const logger = createLogger('positions');

async function main(): Promise<void> {
  const client = createGatewayClient(loadConfig());
  try {
    const account = await client.getPrimaryAccount();
    const rows = await client.portfolio.allPositions(account);
    if (!rows.length) {
      console.log(`No open positions in ${account}.`);
      return;
    }
    rows.sort((a, b) => Math.abs(b.mktValue ?? 0) - Math.abs(a.mktValue ?? 0));
    console.table(
      rows.map((p) => ({
        Contract: p.contractDesc,
        Qty: p.position,
        Price: p.mktPrice?.toFixed(2) ?? '',
        Value: p.mktValue?.toFixed(2) ?? '',
        UnrealizedPnL: p.unrealizedPnl?.toFixed(2) ?? '',
      })),
    );
  } finally {
    await client.logout();
  }
}

main().catch((err) => {
  logger.error({ err }, 'positions failed');
  process.exit(1);
});
