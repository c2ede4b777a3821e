import { z } from 'zod';
import type { RetryPolicy } from './gateway/transport';

const configSchema = z.object({
  GATEWAY_BASE_URL: z.string().url().default('https://localhost:5000/v1/api'),
  AUTH_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  KEEP_ALIVE_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().min(0).default(1_000),
  RETRY_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_LEVEL: z.string().default('info'),
});

export type GatewayConfig = Readonly<
  z.infer<typeof configSchema> & {
    baseUrl: string;
    retry: RetryPolicy;
  }
>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  return Object.freeze({
    ...cfg,
    // endpoint paths carry their own leading slash
    baseUrl: cfg.GATEWAY_BASE_URL.replace(/\/+$/, ''),
    retry: Object.freeze({
      maxRetries: cfg.MAX_RETRIES,
      baseDelayMs: cfg.RETRY_BASE_DELAY_MS,
      backoffMultiplier: cfg.RETRY_BACKOFF_MULTIPLIER,
    }),
  });
}
