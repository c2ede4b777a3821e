export class GatewayError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.status = options.status;
  }
}

/** 401 from the gateway, or an auth-status payload reporting an unauthenticated session. */
export class AuthenticationRequiredError extends GatewayError {
  constructor(message = 'Authentication required') {
    super(message, { status: 401 });
    this.name = 'AuthenticationRequiredError';
  }
}

export class AccessForbiddenError extends GatewayError {
  constructor(message = 'Access forbidden') {
    super(message, { status: 403 });
    this.name = 'AccessForbiddenError';
  }
}

/** 5xx that survived every retry; `status` is the last code observed. */
export class ServerError extends GatewayError {
  constructor(status: number) {
    super(`Server error: ${status}`, { status });
    this.name = 'ServerError';
  }
}

export class NetworkError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'NetworkError';
  }
}

export class ReauthenticationFailedError extends GatewayError {
  constructor(cause?: unknown) {
    super('Reauthentication failed; manual login through the gateway is required', { cause });
    this.name = 'ReauthenticationFailedError';
  }
}

/** Non-2xx status outside the 401/403/5xx classes. Never retried. */
export class HttpStatusError extends GatewayError {
  constructor(status: number, readonly body: string) {
    super(`Request failed with status ${status}`, { status });
    this.name = 'HttpStatusError';
  }
}

export class InvalidResponseError extends GatewayError {
  constructor(status: number, readonly body: string, cause?: unknown) {
    super(`Gateway returned malformed JSON (status ${status})`, { status, cause });
    this.name = 'InvalidResponseError';
  }
}

export class RetriesExhaustedError extends GatewayError {
  constructor(maxRetries: number) {
    super(`Max retries (${maxRetries}) exceeded`);
    this.name = 'RetriesExhaustedError';
  }
}
