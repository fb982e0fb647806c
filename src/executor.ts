import type { HttpMethod, RequestOutcome, TemplateValue } from './types.js';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  body: string;
}

/**
 * Sends one request and resolves once the whole response body has arrived.
 * Implementations must tolerate concurrent calls.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export class FetchTransport implements Transport {
  async send(request: TransportRequest): Promise<TransportResponse> {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: request.timeoutMs !== undefined ? AbortSignal.timeout(request.timeoutMs) : undefined,
    });
    const body = await response.text();
    return { status: response.status, statusText: response.statusText, body };
  }
}

export class HttpStatusError extends Error {
  statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'HttpStatusError';
    this.statusCode = statusCode;
  }
}

export interface OutgoingRequest {
  name: string;
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** The resolved payload, recorded on failure. */
  data?: TemplateValue;
  /** `data` already encoded for the wire. */
  body?: string;
  timeoutMs?: number;
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.name === 'TimeoutError') return `Request timed out: ${error.message}`;
  // fetch wraps socket errors as "fetch failed" with the real reason in `cause`
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}

export class RequestExecutor {
  private transport: Transport;
  private now: () => number;

  constructor(options: { transport?: Transport; now?: () => number } = {}) {
    this.transport = options.transport ?? new FetchTransport();
    this.now = options.now ?? (() => performance.now());
  }

  /** Sends exactly one request. Never rejects: failures come back as outcomes. */
  async send(request: OutgoingRequest): Promise<RequestOutcome> {
    const base = { name: request.name, endpoint: request.url, method: request.method };
    const start = this.now();

    try {
      const response = await this.transport.send({
        method: request.method,
        url: request.url,
        headers: request.headers ?? {},
        body: request.body,
        timeoutMs: request.timeoutMs,
      });
      const responseTime = this.now() - start;

      if (response.status >= 400) {
        const kind = response.status >= 500 ? 'Server Error' : 'Client Error';
        const error = new HttpStatusError(
          `${response.status} ${kind}: ${response.statusText || 'request failed'} for url: ${request.url}`,
          response.status,
        );
        return this.failure(base, responseTime, error, request.data);
      }

      return { ...base, success: true, statusCode: response.status, responseTime };
    } catch (error) {
      const responseTime = this.now() - start;
      return this.failure(base, responseTime, error, request.data);
    }
  }

  private failure(
    base: Pick<RequestOutcome, 'name' | 'endpoint' | 'method'>,
    responseTime: number,
    error: unknown,
    data: TemplateValue | undefined,
  ): RequestOutcome {
    const outcome: RequestOutcome = {
      ...base,
      success: false,
      responseTime,
      error: describeError(error),
    };
    if (error instanceof HttpStatusError) {
      outcome.statusCode = error.statusCode;
    }
    if (data !== undefined) {
      outcome.requestData = data;
    }
    return outcome;
  }
}
