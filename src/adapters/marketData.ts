import { GatewayError } from '../gateway/errors';
import type { JsonObject } from '../gateway/json';
import type { QueryParams } from '../gateway/transport';
import type { AdapterContext } from './context';
import { asRecords, isJsonObject, parseDecimal, parseInteger, parseString, pick } from './parse';

export interface Snapshot {
  conid: number;
  symbol: string | null;
  lastPrice: number | null;
  bid: number | null;
  ask: number | null;
  bidSize: number | null;
  askSize: number | null;
  volume: number | null;
  change: number | null;
  changePercent: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
}

export interface Bar {
  time: number;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

export interface BookEntry {
  price: number | null;
  size: number | null;
  exchange: string | null;
}

export interface OrderBook {
  conid: number;
  bids: BookEntry[];
  asks: BookEntry[];
  timestamp: number | null;
}

export interface HistoryOptions {
  bar?: string;
  period?: string;
  outsideRth?: boolean;
}

/** Snapshot field codes requested when the caller passes none. */
export const SNAPSHOT_FIELDS = {
  last: '31',
  high: '70',
  low: '71',
  close: '77',
  change: '82',
  changePercent: '83',
  bid: '84',
  askSize: '85',
  ask: '86',
  volume: '87',
  bidSize: '88',
} as const;

export function toSnapshot(conid: number, row: JsonObject): Snapshot {
  const f = SNAPSHOT_FIELDS;
  return {
    conid,
    symbol: parseString(pick(row, '55', 'symbol')),
    lastPrice: parseDecimal(pick(row, f.last, 'last')),
    bid: parseDecimal(pick(row, f.bid, 'bid')),
    ask: parseDecimal(pick(row, f.ask, 'ask')),
    bidSize: parseDecimal(pick(row, f.bidSize, 'bidSize')),
    askSize: parseDecimal(pick(row, f.askSize, 'askSize')),
    volume: parseDecimal(pick(row, f.volume, 'volume')),
    change: parseDecimal(pick(row, f.change, 'change')),
    changePercent: parseDecimal(pick(row, f.changePercent, 'changePercent')),
    high: parseDecimal(pick(row, f.high, 'high')),
    low: parseDecimal(pick(row, f.low, 'low')),
    close: parseDecimal(pick(row, f.close, 'close')),
  };
}

export function toBar(row: JsonObject): Bar | null {
  const time = parseInteger(row.t);
  if (time === null) return null;
  return {
    time,
    open: parseDecimal(row.o),
    high: parseDecimal(row.h),
    low: parseDecimal(row.l),
    close: parseDecimal(row.c),
    volume: parseDecimal(row.v),
  };
}

function toBookEntry(row: JsonObject): BookEntry {
  return {
    price: parseDecimal(row.price),
    size: parseDecimal(row.size),
    exchange: parseString(row.exchange),
  };
}

export class MarketDataAdapter {
  constructor(private readonly ctx: AdapterContext) {}

  async snapshot(conid: number, fields: string[] = Object.values(SNAPSHOT_FIELDS)): Promise<Snapshot> {
    await this.ctx.session.ensureLive();
    const params: QueryParams = { conids: String(conid) };
    if (fields.length > 0) params.fields = fields.join(',');
    const data = await this.ctx.transport.get('/iserver/marketdata/snapshot', params);
    const [row] = asRecords(data);
    if (!row) throw new GatewayError(`No snapshot data returned for conid ${conid}`);
    const snapshot = toSnapshot(conid, row);
    this.ctx.logger.debug({ conid, last: snapshot.lastPrice }, 'snapshot');
    return snapshot;
  }

  async history(conid: number, options: HistoryOptions = {}): Promise<Bar[]> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get('/iserver/marketdata/history', {
      conid,
      bar: options.bar ?? '1d',
      period: options.period ?? '1m',
      outsideRth: String(options.outsideRth ?? true),
    });
    const rows = isJsonObject(data) ? asRecords(data.data ?? []) : [];
    const bars: Bar[] = [];
    for (const row of rows) {
      const bar = toBar(row);
      if (bar) bars.push(bar);
    }
    this.ctx.logger.debug({ conid, count: bars.length }, 'history');
    return bars;
  }

  async book(conid: number, exchange?: string): Promise<OrderBook> {
    await this.ctx.session.ensureLive();
    const params: QueryParams = { conid };
    if (exchange) params.exchange = exchange;
    const data = await this.ctx.transport.get('/iserver/marketdata/book', params);
    if (!isJsonObject(data)) return { conid, bids: [], asks: [], timestamp: null };
    return {
      conid,
      bids: asRecords(data.bids ?? []).map(toBookEntry),
      asks: asRecords(data.asks ?? []).map(toBookEntry),
      timestamp: parseInteger(data.timestamp),
    };
  }
}
