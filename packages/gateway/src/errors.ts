// packages/gateway/src/errors.ts

export type GatewayErrorCode = 'network' | 'timeout' | 'http_status' | 'bad_response';

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(code: GatewayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GatewayError';
    this.code = code;
  }
}

export class RequestTimeoutError extends GatewayError {
  constructor(url: string, timeoutMs: number) {
    super('timeout', `Request timed out after ${timeoutMs}ms: ${url}`);
    this.name = 'RequestTimeoutError';
  }
}

export class HttpStatusError extends GatewayError {
  readonly status: number;

  constructor(status: number, url: string) {
    super('http_status', `HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

export class ResponseFormatError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('bad_response', message, options);
    this.name = 'ResponseFormatError';
  }
}
