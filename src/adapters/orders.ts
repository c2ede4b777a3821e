import { z } from 'zod';
import { GatewayError } from '../gateway/errors';
import type { JsonObject, JsonValue } from '../gateway/json';
import type { AdapterContext } from './context';
import { asRecords, isJsonObject, parseDecimal, parseInteger, parseString, pick } from './parse';

export const orderRequestSchema = z
  .object({
    conid: z.number().int().positive(),
    orderType: z.enum(['MKT', 'LMT', 'STP', 'STP_LMT']),
    side: z.enum(['BUY', 'SELL']),
    quantity: z.number().positive(),
    price: z.number().positive().optional(),
    auxPrice: z.number().positive().optional(),
    tif: z.enum(['DAY', 'GTC', 'IOC', 'FOK']).default('DAY'),
    outsideRTH: z.boolean().default(false),
    useAdaptive: z.boolean().default(true),
  })
  .superRefine((order, ctx) => {
    if ((order.orderType === 'LMT' || order.orderType === 'STP_LMT') && order.price === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['price'], message: `price is required for ${order.orderType}` });
    }
    if ((order.orderType === 'STP' || order.orderType === 'STP_LMT') && order.auxPrice === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['auxPrice'], message: `auxPrice is required for ${order.orderType}` });
    }
  });

export type OrderRequestInput = z.input<typeof orderRequestSchema>;
export type OrderRequest = z.output<typeof orderRequestSchema>;
export type OrderSide = OrderRequest['side'];
export type OrderType = OrderRequest['orderType'];
export type TimeInForce = OrderRequest['tif'];

export interface WhatIfResult {
  equity: number | null;
  initial: number | null;
  maintenance: number | null;
  warn: string | null;
  error: string | null;
}

export interface OrderResult {
  orderId: string | null;
  localOrderId: string | null;
  orderStatus: string | null;
  encryptMessage: string | null;
}

export interface LiveOrder {
  orderId: string;
  conid: number;
  symbol: string | null;
  side: string;
  orderType: string;
  quantity: number;
  price: number | null;
  auxPrice: number | null;
  status: string;
  filled: number | null;
  remaining: number | null;
  avgPrice: number | null;
  timeInForce: string | null;
  account: string | null;
}

export function parseOrderRequest(input: OrderRequestInput): OrderRequest {
  const parsed = orderRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new GatewayError(`Invalid order: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return parsed.data;
}

export function toOrderPayload(order: OrderRequest): JsonObject {
  const payload: JsonObject = {
    conid: order.conid,
    orderType: order.orderType,
    side: order.side,
    quantity: order.quantity,
    tif: order.tif,
    outsideRTH: order.outsideRTH,
    useAdaptive: order.useAdaptive,
  };
  if (order.price !== undefined) payload.price = order.price;
  if (order.auxPrice !== undefined) payload.auxPrice = order.auxPrice;
  return payload;
}

/** Single-order endpoints answer with either an object or a one-element list. */
function firstRecord(data: JsonValue): JsonObject | null {
  if (isJsonObject(data)) return data;
  return asRecords(data)[0] ?? null;
}

export function toWhatIfResult(data: JsonValue): WhatIfResult {
  const row = firstRecord(data) ?? {};
  return {
    equity: parseDecimal(pick(row, 'equity')),
    initial: parseDecimal(pick(row, 'initial')),
    maintenance: parseDecimal(pick(row, 'maintenance')),
    warn: parseString(pick(row, 'warn')),
    error: parseString(pick(row, 'error')),
  };
}

export function toOrderResult(data: JsonValue): OrderResult {
  const row = firstRecord(data) ?? {};
  return {
    orderId: parseString(pick(row, 'order_id')),
    localOrderId: parseString(pick(row, 'local_order_id')),
    orderStatus: parseString(pick(row, 'order_status')),
    encryptMessage: parseString(pick(row, 'encrypt_message')),
  };
}

export function toLiveOrder(row: JsonObject): LiveOrder {
  return {
    orderId: parseString(row.orderId) ?? '',
    conid: parseInteger(row.conid) ?? 0,
    symbol: parseString(pick(row, 'ticker', 'symbol')),
    side: parseString(row.side) ?? '',
    orderType: parseString(row.orderType) ?? '',
    quantity: parseDecimal(pick(row, 'totalSize', 'quantity')) ?? 0,
    price: parseDecimal(pick(row, 'price')),
    auxPrice: parseDecimal(pick(row, 'auxPrice')),
    status: parseString(row.status) ?? '',
    filled: parseDecimal(pick(row, 'filledQuantity', 'filled')),
    remaining: parseDecimal(pick(row, 'remainingQuantity', 'remaining')),
    avgPrice: parseDecimal(pick(row, 'avgPrice')),
    timeInForce: parseString(pick(row, 'timeInForce')),
    account: parseString(pick(row, 'acct', 'account')),
  };
}

export class OrdersAdapter {
  constructor(private readonly ctx: AdapterContext) {}

  async whatIf(account: string, input: OrderRequestInput): Promise<WhatIfResult> {
    const order = parseOrderRequest(input);
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.post(
      `/iserver/account/${encodeURIComponent(account)}/orders/whatif`,
      { orders: [toOrderPayload(order)] },
    );
    return toWhatIfResult(data);
  }

  /** Previews the order first unless `skipWhatIf`; a preview error aborts placement. */
  async placeOrder(
    account: string,
    input: OrderRequestInput,
    options: { skipWhatIf?: boolean } = {},
  ): Promise<OrderResult> {
    const order = parseOrderRequest(input);
    if (!options.skipWhatIf) {
      const preview = await this.whatIf(account, order);
      if (preview.error) throw new GatewayError(`What-if preview failed: ${preview.error}`);
      if (preview.warn) this.ctx.logger.warn({ account, conid: order.conid, warn: preview.warn }, 'what-if warning');
    }
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.post(`/iserver/account/${encodeURIComponent(account)}/orders`, {
      orders: [toOrderPayload(order)],
    });
    const result = toOrderResult(data);
    this.ctx.logger.info({ account, orderId: result.orderId, status: result.orderStatus }, 'order placed');
    return result;
  }

  async cancelOrder(account: string, orderId: string): Promise<JsonObject> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.delete(
      `/iserver/account/${encodeURIComponent(account)}/order/${encodeURIComponent(orderId)}`,
    );
    this.ctx.logger.info({ account, orderId }, 'order cancelled');
    return isJsonObject(data) ? data : {};
  }

  async liveOrders(): Promise<LiveOrder[]> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get('/iserver/account/orders');
    const rows = isJsonObject(data) ? asRecords(data.orders ?? []) : asRecords(data);
    return rows.map(toLiveOrder);
  }

  async orderStatus(orderId: string): Promise<JsonObject> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get(`/iserver/account/order/status/${encodeURIComponent(orderId)}`);
    return isJsonObject(data) ? data : {};
  }

  async modifyOrder(account: string, orderId: string, input: OrderRequestInput): Promise<OrderResult> {
    const order = parseOrderRequest(input);
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.post(
      `/iserver/account/${encodeURIComponent(account)}/order/${encodeURIComponent(orderId)}`,
      toOrderPayload(order),
    );
    this.ctx.logger.info({ account, orderId }, 'order modified');
    return toOrderResult(data);
  }
}
