import { setTimeout as delay } from 'timers/promises';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { AuthenticationRequiredError, GatewayError, ReauthenticationFailedError } from './errors';
import { isJsonObject } from './json';
import type { JsonObject, JsonValue } from './json';
import { Mutex } from './mutex';
import type { Transport } from './transport';

export const AUTH_STATUS_PATH = '/iserver/auth/status';
export const REAUTHENTICATE_PATH = '/iserver/reauthenticate';
export const TICKLE_PATH = '/tickle';
export const LOGOUT_PATH = '/logout';

export interface AuthStatus {
  authenticated: boolean;
  raw: JsonObject;
  checkedAt: number;
}

export interface SessionOptions {
  checkIntervalMs?: number;
  keepAliveIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

interface KeepAliveHandle {
  controller: AbortController;
  done: Promise<void>;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * Authentication state for one gateway. Construct once and share it with
 * every adapter: status checks are single-flight behind a lock, and at most
 * one keep-alive loop runs per instance.
 */
export class Session {
  private readonly lock = new Mutex();
  private readonly checkIntervalMs: number;
  private readonly keepAliveIntervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private cachedStatus: AuthStatus | null = null;
  private lastCheckedAt = 0;
  private keepAlive: KeepAliveHandle | null = null;

  constructor(
    private readonly transport: Transport,
    options: SessionOptions = {},
  ) {
    this.checkIntervalMs = options.checkIntervalMs ?? 300_000;
    this.keepAliveIntervalMs = options.keepAliveIntervalMs ?? 60_000;
    this.logger = options.logger ?? createLogger('session');
    this.now = options.now ?? Date.now;
  }

  /** A copy of the cached status; the cache itself is only ever replaced. */
  get status(): AuthStatus | null {
    const status = this.cachedStatus;
    return status === null ? null : { ...status, raw: structuredClone(status.raw) };
  }

  get isKeepAliveRunning(): boolean {
    return this.keepAlive !== null;
  }

  /**
   * Resolves once the gateway has confirmed an authenticated session within
   * the last check interval. Call before every domain request.
   */
  async ensureLive(): Promise<void> {
    await this.lock.runExclusive(async () => {
      // re-read under the lock: a caller that queued behind an in-flight
      // check sees its result here and issues nothing
      if (!this.isStale()) return;
      try {
        await this.checkAuthStatus();
      } catch (err) {
        this.cachedStatus = null;
        throw err;
      }
    });
  }

  async getSessionInfo(): Promise<JsonObject> {
    await this.ensureLive();
    return this.cachedStatus === null ? {} : structuredClone(this.cachedStatus.raw);
  }

  /** Stops the keep-alive loop, ends the upstream session and clears the cache. Never throws. */
  async logout(): Promise<void> {
    // taken after any in-flight check, so nothing restarts the loop behind us
    await this.lock.runExclusive(async () => {
      await this.stopKeepAlive();
      try {
        await this.transport.post(LOGOUT_PATH);
        this.logger.info('session logged out');
      } catch (err) {
        this.logger.warn({ err }, 'logout request failed');
      }
      this.cachedStatus = null;
    });
  }

  private isStale(): boolean {
    if (this.cachedStatus === null) return true;
    return this.now() - this.cachedStatus.checkedAt > this.checkIntervalMs;
  }

  private async checkAuthStatus(): Promise<AuthStatus> {
    const { payload, reauthenticated } = await this.fetchAuthStatus();
    const raw = isJsonObject(payload) ? payload : {};
    if (raw.authenticated !== true) {
      this.logger.warn({ status: raw }, 'session not authenticated');
      if (reauthenticated) throw new ReauthenticationFailedError(new AuthenticationRequiredError());
      throw new AuthenticationRequiredError(
        'Session not authenticated; log in through the gateway',
      );
    }

    const checkedAt = Math.max(this.now(), this.lastCheckedAt);
    this.lastCheckedAt = checkedAt;
    const status: AuthStatus = { authenticated: true, raw, checkedAt };
    this.cachedStatus = status;
    this.logger.debug({ status: raw }, 'auth status');
    this.startKeepAlive();
    return status;
  }

  /** One status request; on 401, one reauthentication and exactly one more request. */
  private async fetchAuthStatus(): Promise<{ payload: JsonValue; reauthenticated: boolean }> {
    try {
      return { payload: await this.transport.post(AUTH_STATUS_PATH), reauthenticated: false };
    } catch (err) {
      if (!(err instanceof AuthenticationRequiredError)) throw err;
    }
    this.logger.info('auth status rejected, attempting reauthentication');
    await this.reauthenticate();
    try {
      return { payload: await this.transport.post(AUTH_STATUS_PATH), reauthenticated: true };
    } catch (err) {
      if (err instanceof GatewayError) throw new ReauthenticationFailedError(err);
      throw err;
    }
  }

  private async reauthenticate(): Promise<void> {
    try {
      const result = await this.transport.post(REAUTHENTICATE_PATH);
      this.logger.info({ result }, 'reauthentication requested');
    } catch (err) {
      this.logger.error({ err }, 'reauthentication failed');
      throw new ReauthenticationFailedError(err);
    }
  }

  // only reached from checkAuthStatus, so the check and the start happen under the lock
  private startKeepAlive(): void {
    if (this.keepAlive !== null) return;
    const controller = new AbortController();
    const done = this.keepAliveLoop(controller.signal).catch((err: unknown) => {
      this.logger.error({ err }, 'keep-alive loop crashed');
    });
    this.keepAlive = { controller, done };
    this.logger.debug({ intervalMs: this.keepAliveIntervalMs }, 'keep-alive started');
  }

  private async stopKeepAlive(): Promise<void> {
    const handle = this.keepAlive;
    if (handle === null) return;
    this.keepAlive = null;
    handle.controller.abort();
    await handle.done;
  }

  private async keepAliveLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await delay(this.keepAliveIntervalMs, undefined, { signal });
      } catch (err) {
        if (isAbortError(err)) break;
        throw err;
      }
      await this.tickle(signal);
    }
    this.logger.info('keep-alive loop cancelled');
  }

  private async tickle(signal: AbortSignal): Promise<void> {
    try {
      await this.transport.request('POST', TICKLE_PATH, { signal });
      this.logger.debug('keep-alive tickle sent');
    } catch (err) {
      // cancelled by stopKeepAlive; the loop condition ends the loop
      if (signal.aborted) return;
      this.logger.warn({ err }, 'keep-alive tickle failed');
    }
  }
}
