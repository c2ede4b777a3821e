import type { AxiosAdapter } from 'axios';
import type { GatewayConfig } from './config';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { GatewayError } from './gateway/errors';
import type { JsonObject } from './gateway/json';
import { Session } from './gateway/session';
import type { SessionOptions } from './gateway/session';
import { Transport } from './gateway/transport';
import type { TransportOptions } from './gateway/transport';
import { AccountsAdapter } from './adapters/accounts';
import { ContractsAdapter } from './adapters/contracts';
import type { AdapterContext } from './adapters/context';
import { MarketDataAdapter } from './adapters/marketData';
import { OrdersAdapter } from './adapters/orders';
import { PnlAdapter } from './adapters/pnl';
import { PortfolioAdapter } from './adapters/portfolio';
import { ScannerAdapter } from './adapters/scanner';

export interface ClientOverrides {
  logger?: Logger;
  adapter?: AxiosAdapter;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export function toTransportOptions(cfg: GatewayConfig): TransportOptions {
  return { baseUrl: cfg.baseUrl, timeoutMs: cfg.REQUEST_TIMEOUT_MS, retry: cfg.retry };
}

export function toSessionOptions(cfg: GatewayConfig): SessionOptions {
  return { checkIntervalMs: cfg.AUTH_CHECK_INTERVAL_MS, keepAliveIntervalMs: cfg.KEEP_ALIVE_INTERVAL_MS };
}

/**
 * Every adapter shares the client's single Session, so one gateway login
 * gets one status cache and one keep-alive loop.
 */
export class GatewayClient {
  readonly accounts: AccountsAdapter;
  readonly portfolio: PortfolioAdapter;
  readonly marketData: MarketDataAdapter;
  readonly orders: OrdersAdapter;
  readonly contracts: ContractsAdapter;
  readonly pnl: PnlAdapter;
  readonly scanner: ScannerAdapter;
  private primaryAccount: string | null = null;

  constructor(
    readonly session: Session,
    readonly transport: Transport,
    private readonly logger: Logger,
  ) {
    const ctx = (component: string): AdapterContext => ({
      session,
      transport,
      logger: logger.child({ component }),
    });
    this.accounts = new AccountsAdapter(ctx('accounts'));
    this.portfolio = new PortfolioAdapter(ctx('portfolio'));
    this.marketData = new MarketDataAdapter(ctx('marketData'));
    this.orders = new OrdersAdapter(ctx('orders'));
    this.contracts = new ContractsAdapter(ctx('contracts'));
    this.pnl = new PnlAdapter(ctx('pnl'));
    this.scanner = new ScannerAdapter(ctx('scanner'));
  }

  /** First account the gateway lists, cached after the first call. */
  async getPrimaryAccount(): Promise<string> {
    if (this.primaryAccount !== null) return this.primaryAccount;
    const accounts = await this.accounts.getAccounts();
    const first = accounts[0];
    if (!first) throw new GatewayError('No accounts found');
    this.primaryAccount = first.id;
    this.logger.info({ account: first.id }, 'primary account set');
    return first.id;
  }

  setPrimaryAccount(accountId: string): void {
    this.primaryAccount = accountId;
    this.logger.info({ account: accountId }, 'primary account set');
  }

  getSessionInfo(): Promise<JsonObject> {
    return this.session.getSessionInfo();
  }

  logout(): Promise<void> {
    return this.session.logout();
  }
}

export function createGatewayClient(cfg: GatewayConfig, overrides: ClientOverrides = {}): GatewayClient {
  const logger = overrides.logger ?? createLogger('gateway', cfg.LOG_LEVEL);
  const transport = new Transport({
    ...toTransportOptions(cfg),
    logger: logger.child({ component: 'transport' }),
    adapter: overrides.adapter,
    sleep: overrides.sleep,
  });
  const session = new Session(transport, {
    ...toSessionOptions(cfg),
    logger: logger.child({ component: 'session' }),
    now: overrides.now,
  });
  return new GatewayClient(session, transport, logger);
}
