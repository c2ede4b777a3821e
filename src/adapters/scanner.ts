import { z } from 'zod';
import { GatewayError } from '../gateway/errors';
import type { JsonObject } from '../gateway/json';
import type { AdapterContext } from './context';
import { asRecords, isJsonObject, parseDecimal, parseInteger, parseString, pick } from './parse';

export const scanRequestSchema = z.object({
  instrument: z.string().min(1).default('STK'),
  location: z.string().min(1).default('STK.US.MAJOR'),
  type: z.string().min(1).default('TOP_PERC_GAIN'),
  filter: z.array(z.record(z.union([z.string(), z.number(), z.boolean()]))).default([]),
  size: z.number().int().positive().default(50),
});

export type ScanRequestInput = z.input<typeof scanRequestSchema>;
export type ScanRequest = z.output<typeof scanRequestSchema>;
export type ScanFilter = ScanRequest['filter'][number];

export interface ScanResult {
  conid: number;
  symbol: string;
  contractDesc: string;
  secType: string;
  exchange: string | null;
  currency: string | null;
  price: number | null;
  change: number | null;
  changePercent: number | null;
  volume: number | null;
  marketCap: number | null;
  pe: number | null;
  dividend: number | null;
}

/** Scan codes behind the preset scans. */
export const SCAN_PRESETS = {
  topGainers: 'TOP_PERC_GAIN',
  topLosers: 'TOP_PERC_LOSE',
  mostActive: 'MOST_ACTIVE',
  mostActiveUsd: 'MOST_ACTIVE_USD',
  hotByVolume: 'HOT_BY_VOLUME',
  topTradeCount: 'TOP_TRADE_COUNT',
  highOptVolumePutCallRatio: 'HIGH_OPT_VOLUME_PUT_CALL_RATIO',
} as const;

export type ScanPreset = keyof typeof SCAN_PRESETS;

export interface PresetScanOptions {
  size?: number;
  location?: string;
}

export function toScanResult(row: JsonObject): ScanResult | null {
  const conid = parseInteger(pick(row, 'con_id', 'conid'));
  if (conid === null) return null;
  return {
    conid,
    symbol: parseString(row.symbol) ?? '',
    contractDesc: parseString(pick(row, 'contract_description_1', 'contractDesc')) ?? '',
    secType: parseString(pick(row, 'sec_type', 'secType')) ?? '',
    exchange: parseString(pick(row, 'listing_exchange', 'exchange')),
    currency: parseString(row.currency),
    price: parseDecimal(row.price),
    change: parseDecimal(row.change),
    changePercent: parseDecimal(row.changePercent),
    volume: parseDecimal(row.volume),
    marketCap: parseDecimal(row.marketCap),
    pe: parseDecimal(row.pe),
    dividend: parseDecimal(row.dividend),
  };
}

export function parseScanRequest(input: ScanRequestInput): ScanRequest {
  const parsed = scanRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new GatewayError(
      `Invalid scan request: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
    );
  }
  return parsed.data;
}

export class ScannerAdapter {
  private params: JsonObject | null = null;

  constructor(private readonly ctx: AdapterContext) {}

  /** Scan types, locations and filters the gateway offers. Fetched once per adapter. */
  async getScannerParams(): Promise<JsonObject> {
    await this.ctx.session.ensureLive();
    if (this.params === null) {
      const data = await this.ctx.transport.get('/iserver/scanner/params');
      this.params = isJsonObject(data) ? data : {};
    }
    return this.params;
  }

  async runScan(input: ScanRequestInput = {}): Promise<ScanResult[]> {
    const request = parseScanRequest(input);
    await this.ctx.session.ensureLive();
    // the gateway rejects a scan without a filter array, even an empty one
    const data = await this.ctx.transport.post('/iserver/scanner/run', {
      instrument: request.instrument,
      location: request.location,
      type: request.type,
      size: request.size,
      filter: request.filter,
    });
    const rows = isJsonObject(data) ? asRecords(data.contracts ?? []) : asRecords(data);
    const results: ScanResult[] = [];
    for (const row of rows) {
      const result = toScanResult(row);
      if (result) results.push(result);
      else this.ctx.logger.warn({ type: request.type, row }, 'skip scan row without conid');
    }
    this.ctx.logger.info({ type: request.type, count: results.length }, 'scan complete');
    return results;
  }

  preset(name: ScanPreset, options: PresetScanOptions = {}): Promise<ScanResult[]> {
    return this.runScan({ type: SCAN_PRESETS[name], size: options.size, location: options.location });
  }

  topGainers(options?: PresetScanOptions): Promise<ScanResult[]> {
    return this.preset('topGainers', options);
  }

  topLosers(options?: PresetScanOptions): Promise<ScanResult[]> {
    return this.preset('topLosers', options);
  }

  mostActive(options?: PresetScanOptions): Promise<ScanResult[]> {
    return this.preset('mostActive', options);
  }

  hotByVolume(options?: PresetScanOptions): Promise<ScanResult[]> {
    return this.preset('hotByVolume', options);
  }

  customScan(type: string, filter: ScanFilter[] = [], options: PresetScanOptions = {}): Promise<ScanResult[]> {
    return this.runScan({ type, filter, size: options.size, location: options.location });
  }

  async availableScanCodes(): Promise<string[]> {
    const params = await this.getScannerParams();
    return asRecords(params.scan_type_list ?? [])
      .map((t) => parseString(t.code))
      .filter((code): code is string => code !== null);
  }

  async availableLocations(): Promise<string[]> {
    const params = await this.getScannerParams();
    const locations: string[] = [];
    for (const group of asRecords(params.location_tree ?? [])) {
      for (const location of asRecords(group.locations ?? [])) {
        const type = parseString(location.type);
        if (type !== null) locations.push(type);
      }
    }
    return locations;
  }
}
