import { GatewayError } from '../gateway/errors';
import type { JsonObject } from '../gateway/json';
import type { AdapterContext } from './context';
import { asRecords, parseInteger, parseString } from './parse';

export interface Contract {
  conid: number;
  symbol: string;
  exchange: string;
  description: string | null;
}

const PREFERRED_EXCHANGES = new Set(['NASDAQ', 'SMART']);

function toContract(row: JsonObject, fallbackSymbol: string): Contract | null {
  const conid = parseInteger(row.conid);
  if (conid === null) return null;
  return {
    conid,
    symbol: parseString(row.symbol) ?? fallbackSymbol,
    exchange: parseString(row.exchange) ?? parseString(row.description) ?? 'UNKNOWN',
    description: parseString(row.companyName) ?? parseString(row.description),
  };
}

export class ContractsAdapter {
  constructor(private readonly ctx: AdapterContext) {}

  /** Best match for a symbol, preferring NASDAQ or SMART routing. */
  async searchContract(symbol: string, secType = 'STK'): Promise<Contract> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get('/iserver/secdef/search', { symbol, secType });
    const contracts = asRecords(data)
      .map((row) => toContract(row, symbol))
      .filter((c): c is Contract => c !== null);
    const best = contracts.find((c) => PREFERRED_EXCHANGES.has(c.exchange)) ?? contracts[0];
    if (!best) throw new GatewayError(`No contract found for symbol ${symbol}`);
    this.ctx.logger.debug({ symbol, conid: best.conid, exchange: best.exchange }, 'contract resolved');
    return best;
  }
}
