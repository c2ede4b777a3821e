import https from 'https';
import { setTimeout as delay } from 'timers/promises';
import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { JsonValue } from './json';
import {
  AccessForbiddenError,
  GatewayError,
  AuthenticationRequiredError,
  HttpStatusError,
  InvalidResponseError,
  NetworkError,
  RetriesExhaustedError,
  ServerError,
} from './errors';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier: number;
}

const retryPolicySchema = z.object({
  maxRetries: z.number().int().min(0),
  baseDelayMs: z.number().min(0),
  backoffMultiplier: z.number().min(1),
});

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxRetries: 3,
  baseDelayMs: 1_000,
  backoffMultiplier: 2,
});

export const DEFAULT_TIMEOUT_MS = 30_000;

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean>;

export interface RequestOptions {
  params?: QueryParams;
  body?: JsonValue;
  /** Cancels the in-flight attempt and any backoff wait. The request then rejects with `signal.reason`. */
  signal?: AbortSignal;
}

export interface TransportOptions {
  baseUrl: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
  /** Replaces axios' network adapter; tests use it to answer requests in process. */
  adapter?: AxiosAdapter;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Result of a single attempt, before retry policy is applied. */
export type Outcome =
  | { kind: 'success'; data: JsonValue }
  | { kind: 'auth_required' }
  | { kind: 'forbidden' }
  | { kind: 'server_error'; status: number }
  | { kind: 'network_error'; cause: unknown }
  | { kind: 'http_error'; status: number; body: string }
  | { kind: 'invalid_json'; status: number; body: string; cause: unknown };

export function classifyResponse(status: number, body: string): Outcome {
  if (status === 401) return { kind: 'auth_required' };
  if (status === 403) return { kind: 'forbidden' };
  if (status >= 500) return { kind: 'server_error', status };
  if (status < 200 || status >= 300) return { kind: 'http_error', status, body };
  if (body.trim() === '') return { kind: 'success', data: {} };
  try {
    return { kind: 'success', data: JSON.parse(body) };
  } catch (err) {
    return { kind: 'invalid_json', status, body, cause: err };
  }
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt);
}

function bodyText(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

/**
 * One upstream endpoint, one axios instance. Retries 5xx and network
 * failures with exponential backoff; 401/403 and other statuses fail on the
 * first attempt.
 */
export class Transport {
  private readonly http: AxiosInstance;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: TransportOptions) {
    const policy = retryPolicySchema.safeParse({ ...DEFAULT_RETRY_POLICY, ...options.retry });
    if (!policy.success) {
      const issues = policy.error.issues.map((i) => `${i.path.join('.')} ${i.message}`);
      throw new GatewayError(`Invalid retry policy: ${issues.join('; ')}`);
    }
    this.policy = policy.data;
    this.logger = options.logger ?? createLogger('transport');
    this.sleep = options.sleep ?? sleep;
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      // The gateway listens on localhost with a self-signed certificate.
      // Verification is off for this agent only.
      httpsAgent: new https.Agent({ rejectUnauthorized: false }),
      adapter: options.adapter,
      // Status and body are classified here, not by axios.
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
    });
  }

  get retryPolicy(): Readonly<RetryPolicy> {
    return this.policy;
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<JsonValue> {
    const { signal } = options;
    try {
      return await this.withRetries(method, path, options);
    } catch (err) {
      // axios cancels with CanceledError and the backoff wait with AbortError;
      // callers see the signal's own reason either way
      if (signal?.aborted) throw signal.reason;
      throw err;
    }
  }

  private async withRetries(method: HttpMethod, path: string, options: RequestOptions): Promise<JsonValue> {
    const { maxRetries } = this.policy;
    const { signal } = options;
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (signal?.aborted) throw signal.reason;
      const outcome = await this.attempt(method, path, options);
      switch (outcome.kind) {
        case 'success':
          return outcome.data;
        case 'auth_required':
          throw new AuthenticationRequiredError();
        case 'forbidden':
          throw new AccessForbiddenError();
        case 'http_error':
          throw new HttpStatusError(outcome.status, outcome.body);
        case 'invalid_json':
          throw new InvalidResponseError(outcome.status, outcome.body, outcome.cause);
        case 'server_error':
        case 'network_error': {
          if (attempt >= maxRetries) {
            if (outcome.kind === 'server_error') throw new ServerError(outcome.status);
            throw new NetworkError(
              `${method} ${path} failed after ${maxRetries} retries: ${describe(outcome.cause)}`,
              outcome.cause,
            );
          }
          const delayMs = backoffDelay(this.policy, attempt);
          this.logger.warn(
            {
              method,
              path,
              attempt: attempt + 1,
              of: maxRetries + 1,
              delayMs,
              status: outcome.kind === 'server_error' ? outcome.status : undefined,
              err: outcome.kind === 'network_error' ? describe(outcome.cause) : undefined,
            },
            outcome.kind === 'server_error' ? 'server error, retrying' : 'request failed, retrying',
          );
          await this.sleep(delayMs, signal);
          break;
        }
      }
    }
    throw new RetriesExhaustedError(maxRetries);
  }

  get(path: string, params?: QueryParams): Promise<JsonValue> {
    return this.request('GET', path, { params });
  }

  post(path: string, body?: JsonValue, params?: QueryParams): Promise<JsonValue> {
    return this.request('POST', path, { body, params });
  }

  delete(path: string, params?: QueryParams): Promise<JsonValue> {
    return this.request('DELETE', path, { params });
  }

  private async attempt(method: HttpMethod, path: string, options: RequestOptions): Promise<Outcome> {
    try {
      const res = await this.http.request<unknown>({
        method,
        url: path,
        params: options.params,
        data: options.body,
        signal: options.signal,
      });
      return classifyResponse(res.status, bodyText(res.data));
    } catch (err) {
      if (axios.isCancel(err)) throw err;
      // with validateStatus accepting everything, an AxiosError without a
      // response means the request never completed (refused, reset, timeout)
      if (axios.isAxiosError(err) && err.response === undefined) {
        return { kind: 'network_error', cause: err };
      }
      throw err;
    }
  }
}

function describe(err: unknown): string {
  if (axios.isAxiosError(err)) return err.code ? `${err.code}: ${err.message}` : err.message;
  return err instanceof Error ? err.message : String(err);
}
