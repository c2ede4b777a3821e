import { describe, it, expect, beforeEach } from 'vitest';
import {
  AccessForbiddenError,
  AuthenticationRequiredError,
  HttpStatusError,
  InvalidResponseError,
  NetworkError,
  ServerError,
} from '../src/gateway/errors';
import { Transport, backoffDelay, classifyResponse } from '../src/gateway/transport';
import type { RetryPolicy } from '../src/gateway/transport';
import { FakeGateway, networkError, ok, silentLogger, status } from './helpers/fakeGateway';

function makeTransport(gw: FakeGateway, retry: Partial<RetryPolicy>, delays?: number[]): Transport {
  return new Transport({
    baseUrl: 'https://gateway.test/v1/api',
    retry,
    logger: silentLogger,
    adapter: gw.adapter,
    sleep: delays
      ? async (ms) => {
          delays.push(ms);
        }
      : undefined,
  });
}

describe('classifyResponse', () => {
  it('maps auth statuses before anything else', () => {
    expect(classifyResponse(401, '{"authenticated":false}')).toEqual({ kind: 'auth_required' });
    expect(classifyResponse(403, '')).toEqual({ kind: 'forbidden' });
  });

  it('treats 5xx as a server error carrying the code', () => {
    expect(classifyResponse(503, 'busy')).toEqual({ kind: 'server_error', status: 503 });
  });

  it('keeps other non-2xx as a plain http error', () => {
    expect(classifyResponse(404, 'nope')).toEqual({ kind: 'http_error', status: 404, body: 'nope' });
    expect(classifyResponse(302, '')).toEqual({ kind: 'http_error', status: 302, body: '' });
  });

  it('returns an empty object for an empty 2xx body', () => {
    expect(classifyResponse(200, '')).toEqual({ kind: 'success', data: {} });
    expect(classifyResponse(204, '  \n')).toEqual({ kind: 'success', data: {} });
  });

  it('parses JSON bodies verbatim', () => {
    expect(classifyResponse(200, '[1,"two",null]')).toEqual({ kind: 'success', data: [1, 'two', null] });
  });

  it('flags malformed JSON on 2xx', () => {
    const outcome = classifyResponse(200, '{broken');
    expect(outcome.kind).toBe('invalid_json');
  });
});

describe('backoffDelay', () => {
  it('grows by the multiplier from attempt 0', () => {
    const policy = { maxRetries: 3, baseDelayMs: 1000, backoffMultiplier: 2 };
    expect([0, 1, 2].map((a) => backoffDelay(policy, a))).toEqual([1000, 2000, 4000]);
  });

  it('supports a non-default multiplier', () => {
    expect(backoffDelay({ maxRetries: 3, baseDelayMs: 500, backoffMultiplier: 3 }, 2)).toBe(4500);
  });
});

describe('Transport.request', () => {
  let gw: FakeGateway;

  beforeEach(() => {
    gw = new FakeGateway();
  });

  it('retries 5xx then succeeds, waiting base and 2x base', async () => {
    gw.on('GET', '/ping', status(500), status(500), ok({ ok: true }));
    const transport = makeTransport(gw, { maxRetries: 3, baseDelayMs: 20, backoffMultiplier: 2 });

    const started = Date.now();
    const result = await transport.get('/ping');
    const elapsed = Date.now() - started;

    expect(result).toEqual({ ok: true });
    expect(gw.countOf('GET', '/ping')).toBe(3);
    // 20ms + 40ms of backoff; allow a millisecond of timer slack per wait
    expect(elapsed).toBeGreaterThanOrEqual(58);
  });

  it('asks the sleeper for 1s then 2s with the default schedule', async () => {
    gw.on('GET', '/ping', status(500), status(500), ok({ ok: true }));
    const delays: number[] = [];
    const transport = makeTransport(gw, { maxRetries: 3, baseDelayMs: 1000, backoffMultiplier: 2 }, delays);

    await expect(transport.get('/ping')).resolves.toEqual({ ok: true });
    expect(delays).toEqual([1000, 2000]);
  });

  it('fails a 401 on the first attempt', async () => {
    gw.on('POST', '/iserver/auth/status', status(401));
    const transport = makeTransport(gw, { maxRetries: 3 }, []);

    await expect(transport.post('/iserver/auth/status')).rejects.toBeInstanceOf(AuthenticationRequiredError);
    expect(gw.countOf('POST', '/iserver/auth/status')).toBe(1);
  });

  it('fails a 403 on the first attempt', async () => {
    gw.on('GET', '/portfolio/accounts', status(403));
    const transport = makeTransport(gw, { maxRetries: 3 }, []);

    const err = await transport.get('/portfolio/accounts').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AccessForbiddenError);
    expect(err).toMatchObject({ status: 403 });
    expect(gw.countOf('GET', '/portfolio/accounts')).toBe(1);
  });

  it('gives up after maxRetries + 1 server errors with the last status', async () => {
    gw.on('GET', '/flaky', status(500), status(502), status(503), status(504), ok({ late: true }));
    const delays: number[] = [];
    const transport = makeTransport(gw, { maxRetries: 3, baseDelayMs: 1000, backoffMultiplier: 2 }, delays);

    const err = await transport.get('/flaky').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServerError);
    expect(err).toMatchObject({ status: 504, message: 'Server error: 504' });
    expect(gw.countOf('GET', '/flaky')).toBe(4);
    expect(delays).toEqual([1000, 2000, 4000]);
  });

  it('does not retry at all when maxRetries is 0', async () => {
    gw.on('GET', '/flaky', status(500));
    const transport = makeTransport(gw, { maxRetries: 0 }, []);

    await expect(transport.get('/flaky')).rejects.toBeInstanceOf(ServerError);
    expect(gw.countOf('GET', '/flaky')).toBe(1);
  });

  it('retries connection failures on the same schedule', async () => {
    gw.on('GET', '/tickle', networkError(), networkError('ETIMEDOUT'), ok({ session: 'abc' }));
    const delays: number[] = [];
    const transport = makeTransport(gw, { maxRetries: 3, baseDelayMs: 10, backoffMultiplier: 2 }, delays);

    await expect(transport.get('/tickle')).resolves.toEqual({ session: 'abc' });
    expect(delays).toEqual([10, 20]);
  });

  it('raises NetworkError once connection retries run out', async () => {
    gw.on('GET', '/tickle', networkError());
    const transport = makeTransport(gw, { maxRetries: 2 }, []);

    const err = await transport.get('/tickle').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toMatchObject({ message: 'GET /tickle failed after 2 retries: ECONNREFUSED: connect ECONNREFUSED' });
    expect(gw.countOf('GET', '/tickle')).toBe(3);
  });

  it('returns an empty object for an empty 2xx body', async () => {
    gw.on('POST', '/logout', ok());
    const transport = makeTransport(gw, {}, []);

    await expect(transport.post('/logout')).resolves.toEqual({});
  });

  it('does not retry malformed JSON', async () => {
    gw.on('GET', '/broken', { status: 200, raw: '{"ok":' });
    const transport = makeTransport(gw, { maxRetries: 3 }, []);

    const err = await transport.get('/broken').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidResponseError);
    expect(err).toMatchObject({ status: 200, body: '{"ok":' });
    expect(gw.countOf('GET', '/broken')).toBe(1);
  });

  it('fails other statuses without retrying', async () => {
    gw.on('DELETE', '/iserver/account/U1/order/9', status(404, { error: 'no such order' }));
    const transport = makeTransport(gw, { maxRetries: 3 }, []);

    const err = await transport.delete('/iserver/account/U1/order/9').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpStatusError);
    expect(err).toMatchObject({ status: 404, body: '{"error":"no such order"}' });
    expect(gw.countOf('DELETE', '/iserver/account/U1/order/9')).toBe(1);
  });

  it('fills unset retry settings from the defaults', () => {
    const transport = makeTransport(gw, { maxRetries: 5 });

    expect(transport.retryPolicy).toEqual({ maxRetries: 5, baseDelayMs: 1000, backoffMultiplier: 2 });
  });

  it('rejects a negative retry count up front', () => {
    expect(() => makeTransport(gw, { maxRetries: -1 })).toThrow('Invalid retry policy: maxRetries');
  });

  it('stops waiting out the backoff once the signal aborts', async () => {
    gw.on('GET', '/flaky', status(503));
    const transport = makeTransport(gw, { maxRetries: 3, baseDelayMs: 5_000 });
    const controller = new AbortController();

    const started = Date.now();
    const pending = transport.request('GET', '/flaky', { signal: controller.signal });
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
    expect(Date.now() - started).toBeLessThan(1_000);
    expect(gw.countOf('GET', '/flaky')).toBe(1);
  });

  it('sends nothing when the signal is already aborted', async () => {
    gw.on('GET', '/ping', ok({ ok: true }));
    const transport = makeTransport(gw, {}, []);
    const controller = new AbortController();
    controller.abort();

    await expect(transport.request('GET', '/ping', { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(gw.countOf('GET', '/ping')).toBe(0);
  });

  it('sends query params and JSON bodies', async () => {
    gw.on('POST', '/iserver/account/U1/orders', ok([{ order_id: '1' }]));
    const transport = makeTransport(gw, {}, []);

    await transport.post('/iserver/account/U1/orders', { orders: [{ conid: 265598 }] }, { dryRun: true });

    const [call] = gw.callsTo('POST', '/iserver/account/U1/orders');
    expect(call.body).toEqual({ orders: [{ conid: 265598 }] });
    expect(call.params).toEqual({ dryRun: true });
  });
});
