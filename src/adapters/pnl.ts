import { HttpStatusError } from '../gateway/errors';
import type { JsonObject, JsonValue } from '../gateway/json';
import type { AdapterContext } from './context';
import { asRecords, isJsonObject, parseDecimal, parseInteger, parseString, pick } from './parse';

/** One partition of intraday PnL, usually one per account model. */
export interface PnlRow {
  acctId: string;
  model: string | null;
  dailyPnl: number | null;
  netLiquidation: number | null;
  unrealizedPnl: number | null;
  excessLiquidity: number | null;
  marketValue: number | null;
}

export interface PositionPnl {
  acctId: string;
  conid: number;
  contractDesc: string;
  position: number;
  dailyPnl: number | null;
  unrealizedPnl: number | null;
  realizedPnl: number | null;
  value: number | null;
}

const PNL_FIELDS = ['dpl', 'upl', 'upnl', 'nl'];

function isPnlRecord(value: unknown): value is JsonObject {
  return isJsonObject(value) && PNL_FIELDS.some((f) => f in value);
}

export function toPnlRow(row: JsonObject, fallbackAcct = '', fallbackModel: string | null = null): PnlRow {
  return {
    acctId: parseString(row.acctId) ?? fallbackAcct,
    model: parseString(row.model) ?? fallbackModel,
    dailyPnl: parseDecimal(row.dpl),
    netLiquidation: parseDecimal(row.nl),
    unrealizedPnl: parseDecimal(pick(row, 'upnl', 'upl')),
    excessLiquidity: parseDecimal(row.el),
    marketValue: parseDecimal(row.mv),
  };
}

export function toPositionPnl(row: JsonObject, account: string): PositionPnl | null {
  const conid = parseInteger(row.conid);
  if (conid === null) return null;
  return {
    acctId: parseString(row.acctId) ?? account,
    conid,
    contractDesc: parseString(pick(row, 'contractDesc', 'desc')) ?? '',
    position: parseDecimal(row.position) ?? 0,
    dailyPnl: parseDecimal(pick(row, 'dailyPnL', 'dpl')),
    unrealizedPnl: parseDecimal(pick(row, 'unrealizedPnL', 'upl', 'unrealizedPnl')),
    realizedPnl: parseDecimal(pick(row, 'realizedPnL', 'rpl', 'realizedPnl')),
    value: parseDecimal(pick(row, 'mktValue', 'value', 'marketValue')),
  };
}

/**
 * Partitioned PnL arrives in several shapes: a list of rows, a single row,
 * or rows keyed by `acct.model` and possibly nested once more under `upnl`.
 */
export function toPnlRows(data: JsonValue): PnlRow[] {
  if (Array.isArray(data)) return asRecords(data).map((row) => toPnlRow(row));
  if (!isJsonObject(data)) return [];
  const nested = data.upnl;
  const keyed = isJsonObject(nested) && Object.values(nested).some(isJsonObject) ? nested : data;
  if (isPnlRecord(keyed)) return [toPnlRow(keyed)];
  return Object.entries(keyed)
    .filter((entry): entry is [string, JsonObject] => isPnlRecord(entry[1]))
    .map(([key, row]) => {
      const [acct, model] = key.split('.');
      return toPnlRow(row, acct, model ?? null);
    });
}

function hasPnl(p: PositionPnl): boolean {
  return p.position !== 0 || Boolean(p.dailyPnl) || Boolean(p.unrealizedPnl) || Boolean(p.value);
}

export class PnlAdapter {
  constructor(private readonly ctx: AdapterContext) {}

  async partitioned(): Promise<PnlRow[]> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get('/iserver/account/pnl/partitioned');
    const rows = toPnlRows(data);
    this.ctx.logger.debug({ count: rows.length }, 'partitioned pnl');
    return rows;
  }

  /** PnL per position; flat positions with no PnL and no value are dropped. */
  async byPosition(account: string): Promise<PositionPnl[]> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get(`/portfolio/${encodeURIComponent(account)}/positions/0`);
    const rows = isJsonObject(data) ? asRecords(data.positions ?? []) : asRecords(data);
    const result: PositionPnl[] = [];
    for (const row of rows) {
      const p = toPositionPnl(row, account);
      if (p && hasPnl(p)) result.push(p);
    }
    this.ctx.logger.info({ account, count: result.length }, 'position pnl loaded');
    return result;
  }

  /**
   * First non-empty answer from the summary, ledger and partitioned PnL
   * endpoints. Endpoints the gateway answers with a plain HTTP error are
   * skipped; every other failure propagates.
   */
  async accountSummary(account: string): Promise<JsonObject> {
    await this.ctx.session.ensureLive();
    const id = encodeURIComponent(account);
    const endpoints = [`/portfolio/${id}/summary`, `/portfolio/${id}/ledger`, '/iserver/account/pnl/partitioned'];
    for (const path of endpoints) {
      try {
        const data = await this.ctx.transport.get(path);
        if (isJsonObject(data) && Object.keys(data).length > 0) return data;
      } catch (err) {
        if (!(err instanceof HttpStatusError)) throw err;
        this.ctx.logger.debug({ account, path, status: err.status }, 'pnl summary endpoint unavailable');
      }
    }
    this.ctx.logger.warn({ account }, 'no pnl summary available');
    return {};
  }
}
