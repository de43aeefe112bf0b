import type { ResolvedRequest } from './types.js';

export interface TransportRequest extends ResolvedRequest {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Sends one request. Resolves with any received response, non-2xx included;
 * rejects with a `TransportError` when no response arrives.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}
