import { TransportError, errorMessage } from './errors.js';
import type { Transport, TransportRequest, TransportResponse } from './transport.js';
import type { TransportErrorKind } from './types.js';

export type RequestTransform = (req: Request) => Promise<Request> | Request;

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function causeCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth += 1) {
    if ('code' in current && typeof current.code === 'string') return current.code;
    current = current.cause;
  }
  return undefined;
}

function classifyFetchError(error: unknown): TransportErrorKind {
  const code = causeCode(error);
  if (code === 'UND_ERR_HEADERS_TIMEOUT' || code === 'UND_ERR_BODY_TIMEOUT') return 'timeout';
  if (code && CONNECTION_CODES.has(code)) return 'connection';
  // undici reports socket-level failures as a bare "fetch failed" TypeError
  if (error instanceof TypeError && /fetch failed/i.test(error.message)) return 'connection';
  return 'protocol';
}

export class HttpClient implements Transport {
  private headers: Record<string, string>;
  private transform: RequestTransform;

  constructor(config: { headers?: Record<string, string>; transform?: RequestTransform } = {}) {
    this.headers = { ...config.headers };
    this.transform = config.transform ?? ((req) => req);
  }

  public async send(options: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);

    try {
      let request: Request;
      try {
        const initialRequest = new Request(options.url, {
          method: options.method,
          headers: { ...this.headers, ...options.headers },
          body: options.method === 'GET' || options.method === 'HEAD' ? undefined : options.body,
        });
        request = await this.transform(initialRequest);
      } catch (error) {
        throw new TransportError('protocol', `Invalid request: ${errorMessage(error)}`, { cause: error });
      }

      const response = await fetch(request, { signal: controller.signal });
      const body = await response.text();
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });
      return { status: response.status, headers, body };
    } catch (error) {
      if (error instanceof TransportError) throw error;
      if (timedOut) {
        throw new TransportError('timeout', `Timeout after ${options.timeoutMs}ms`, { cause: error });
      }
      if (controller.signal.aborted) {
        throw new TransportError('connection', 'Request aborted', { cause: error });
      }
      throw new TransportError(classifyFetchError(error), errorMessage(error), { cause: error });
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
