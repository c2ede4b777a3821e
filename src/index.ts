export { loadConfig } from './config';
export type { GatewayConfig } from './config';
export { createLogger } from './logger';
export type { Logger } from './logger';
export { GatewayClient, createGatewayClient, toSessionOptions, toTransportOptions } from './client';
export type { ClientOverrides } from './client';
export * from './gateway/errors';
export type { JsonObject, JsonValue } from './gateway/json';
export { Session } from './gateway/session';
export type { AuthStatus, SessionOptions } from './gateway/session';
export { Transport, DEFAULT_RETRY_POLICY, DEFAULT_TIMEOUT_MS, backoffDelay, classifyResponse } from './gateway/transport';
export type { HttpMethod, Outcome, QueryParams, RequestOptions, RetryPolicy, TransportOptions } from './gateway/transport';
export { AccountsAdapter } from './adapters/accounts';
export type { Account } from './adapters/accounts';
export { PortfolioAdapter } from './adapters/portfolio';
export type { AccountSummary, LedgerLine, Position } from './adapters/portfolio';
export { MarketDataAdapter, SNAPSHOT_FIELDS } from './adapters/marketData';
export type { Bar, BookEntry, HistoryOptions, OrderBook, Snapshot } from './adapters/marketData';
export { OrdersAdapter, orderRequestSchema } from './adapters/orders';
export type {
  LiveOrder,
  OrderRequest,
  OrderRequestInput,
  OrderResult,
  OrderSide,
  OrderType,
  TimeInForce,
  WhatIfResult,
} from './adapters/orders';
export { ContractsAdapter } from './adapters/contracts';
export { PnlAdapter } from './adapters/pnl';
export type { PnlRow, PositionPnl } from './adapters/pnl';
export { ScannerAdapter, SCAN_PRESETS, scanRequestSchema } from './adapters/scanner';
export type { PresetScanOptions, ScanFilter, ScanPreset, ScanRequest, ScanRequestInput, ScanResult } from './adapters/scanner';
export type { Contract } from './adapters/contracts';
export { parseBoolean, parseDecimal, parseInteger, parseString } from './adapters/parse';
