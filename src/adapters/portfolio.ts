import type { JsonObject } from '../gateway/json';
import type { AdapterContext } from './context';
import { asRecords, isJsonObject, parseDecimal, parseInteger, parseString } from './parse';

export interface Position {
  acctId: string;
  conid: number;
  contractDesc: string;
  position: number;
  mktPrice: number | null;
  mktValue: number | null;
  currency: string;
  avgCost: number | null;
  avgPrice: number | null;
  realizedPnl: number | null;
  unrealizedPnl: number | null;
  assetClass: string | null;
  expiry: string | null;
  putOrCall: string | null;
  strike: number | null;
  multiplier: number | null;
}

export interface AccountSummary {
  accountcode: string;
  accounttype: string;
  netliquidation: number | null;
  buyingpower: number | null;
  availablefunds: number | null;
  excessliquidity: number | null;
  totalcashvalue: number | null;
  grosspositionvalue: number | null;
  initmarginreq: number | null;
  maintmarginreq: number | null;
  cushion: number | null;
}

export interface LedgerLine {
  currency: string;
  cashbalance: number | null;
  settledcash: number | null;
  netliquidationvalue: number | null;
  stockmarketvalue: number | null;
  unrealizedpnl: number | null;
  realizedpnl: number | null;
  exchangerate: number | null;
  dividends: number | null;
  interest: number | null;
}

const MAX_POSITION_PAGES = 100;

export function toPosition(row: JsonObject): Position | null {
  const conid = parseInteger(row.conid);
  const position = parseDecimal(row.position);
  if (conid === null || position === null) return null;
  return {
    acctId: parseString(row.acctId) ?? '',
    conid,
    contractDesc: parseString(row.contractDesc) ?? '',
    position,
    mktPrice: parseDecimal(row.mktPrice),
    mktValue: parseDecimal(row.mktValue),
    currency: parseString(row.currency) ?? 'USD',
    avgCost: parseDecimal(row.avgCost),
    avgPrice: parseDecimal(row.avgPrice),
    realizedPnl: parseDecimal(row.realizedPnl),
    unrealizedPnl: parseDecimal(row.unrealizedPnl),
    assetClass: parseString(row.assetClass),
    expiry: parseString(row.expiry),
    putOrCall: parseString(row.putOrCall),
    strike: parseDecimal(row.strike),
    multiplier: parseDecimal(row.multiplier),
  };
}

export function toAccountSummary(data: JsonObject): AccountSummary {
  return {
    accountcode: parseString(data.accountcode) ?? '',
    accounttype: parseString(data.accounttype) ?? '',
    netliquidation: parseDecimal(data.netliquidation),
    buyingpower: parseDecimal(data.buyingpower),
    availablefunds: parseDecimal(data.availablefunds),
    excessliquidity: parseDecimal(data.excessliquidity),
    totalcashvalue: parseDecimal(data.totalcashvalue),
    grosspositionvalue: parseDecimal(data.grosspositionvalue),
    initmarginreq: parseDecimal(data.initmarginreq),
    maintmarginreq: parseDecimal(data.maintmarginreq),
    cushion: parseDecimal(data.cushion),
  };
}

export function toLedgerLine(row: JsonObject, fallbackCurrency = ''): LedgerLine {
  return {
    currency: parseString(row.currency) ?? fallbackCurrency,
    cashbalance: parseDecimal(row.cashbalance),
    settledcash: parseDecimal(row.settledcash),
    netliquidationvalue: parseDecimal(row.netliquidationvalue),
    stockmarketvalue: parseDecimal(row.stockmarketvalue),
    unrealizedpnl: parseDecimal(row.unrealizedpnl),
    realizedpnl: parseDecimal(row.realizedpnl),
    exchangerate: parseDecimal(row.exchangerate),
    dividends: parseDecimal(row.dividends),
    interest: parseDecimal(row.interest),
  };
}

export class PortfolioAdapter {
  constructor(private readonly ctx: AdapterContext) {}

  async positions(account: string, page = 0): Promise<Position[]> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get(
      `/portfolio/${encodeURIComponent(account)}/positions/${page}`,
    );
    const positions: Position[] = [];
    for (const row of asRecords(data)) {
      const p = toPosition(row);
      if (p) positions.push(p);
      else this.ctx.logger.warn({ account, row }, 'skip position row without conid/position');
    }
    this.ctx.logger.debug({ account, page, count: positions.length }, 'positions page');
    return positions;
  }

  /** Walks pages from 0 until an empty one. */
  async allPositions(account: string): Promise<Position[]> {
    const all: Position[] = [];
    for (let page = 0; page < MAX_POSITION_PAGES; page++) {
      const batch = await this.positions(account, page);
      if (batch.length === 0) return all;
      all.push(...batch);
    }
    this.ctx.logger.warn({ account, pages: MAX_POSITION_PAGES }, 'stopped paging positions at page cap');
    return all;
  }

  async summary(account: string): Promise<AccountSummary> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get(`/portfolio/${encodeURIComponent(account)}/summary`);
    return toAccountSummary(isJsonObject(data) ? data : {});
  }

  async ledger(account: string): Promise<LedgerLine[]> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get(`/portfolio/${encodeURIComponent(account)}/ledger`);
    if (Array.isArray(data)) return asRecords(data).map((row) => toLedgerLine(row));
    if (!isJsonObject(data)) return [];
    const keyed = Object.values(data).some(isJsonObject);
    if (!keyed) return [toLedgerLine(data)];
    // { USD: {...}, EUR: {...}, BASE: {...} }
    return Object.entries(data)
      .filter((entry): entry is [string, JsonObject] => isJsonObject(entry[1]))
      .map(([currency, row]) => toLedgerLine(row, currency));
  }
}
