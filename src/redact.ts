import { parsePath, type PathSegment } from './json-path.js';
import type { ExchangeSnapshot, FailureDetail, JsonValue, ResolvedRequest } from './types.js';

export const REDACTED = '[REDACTED]';

export interface RedactionPolicy {
  /** Header names, case-insensitive */
  headers: string[];
  /** JSON keys whose values are masked wherever they appear, case-insensitive */
  bodyKeys: string[];
  /** Free-text patterns masked in bodies and messages */
  patterns: RegExp[];
}

export const DEFAULT_REDACTION: RedactionPolicy = {
  headers: ['authorization', 'proxy-authorization', 'cookie', 'set-cookie', 'x-api-key'],
  bodyKeys: ['password', 'token', 'secret', 'apikey', 'api_key', 'access_token', 'refresh_token', 'client_secret'],
  patterns: [/\b(Bearer|Basic)\s+[A-Za-z0-9\-._~+/]+=*/gi],
};

export class Redactor {
  private headerNames: Set<string>;
  private bodyKeys: Set<string>;

  constructor(private policy: RedactionPolicy = DEFAULT_REDACTION) {
    this.headerNames = new Set(policy.headers.map((h) => h.toLowerCase()));
    this.bodyKeys = new Set(policy.bodyKeys.map((k) => k.toLowerCase()));
  }

  text(value: string): string {
    return this.policy.patterns.reduce(
      (acc, pattern) => acc.replace(pattern, (match, scheme?: string) =>
        typeof scheme === 'string' && match.startsWith(scheme) ? `${scheme} ${REDACTED}` : REDACTED
      ),
      value
    );
  }

  headers(headers: Record<string, string>): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      out[key] = this.headerNames.has(key.toLowerCase()) ? REDACTED : this.text(value);
    }
    return out;
  }

  json(value: JsonValue): JsonValue {
    if (Array.isArray(value)) return value.map((item) => this.json(item));
    if (value !== null && typeof value === 'object') {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, item] of Object.entries(value)) {
        out[key] = this.bodyKeys.has(key.toLowerCase()) ? REDACTED : this.json(item);
      }
      return out;
    }
    return typeof value === 'string' ? this.text(value) : value;
  }

  body(body: string): string {
    if (!body) return body;
    try {
      return JSON.stringify(this.json(JSON.parse(body)));
    } catch {
      return this.text(body);
    }
  }

  url(raw: string): string {
    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      return this.text(raw);
    }
    for (const key of [...url.searchParams.keys()]) {
      if (this.bodyKeys.has(key.toLowerCase())) url.searchParams.set(key, REDACTED);
    }
    if (url.password) url.password = REDACTED;
    return url.toString();
  }

  request(request: ResolvedRequest): ResolvedRequest {
    return {
      method: request.method,
      url: this.url(request.url),
      headers: this.headers(request.headers),
      body: request.body === undefined ? undefined : this.body(request.body),
    };
  }

  snapshot(snapshot: ExchangeSnapshot): ExchangeSnapshot {
    return {
      request: this.request(snapshot.request),
      response: snapshot.response && {
        status: snapshot.response.status,
        headers: this.headers(snapshot.response.headers),
        body: this.body(snapshot.response.body),
      },
    };
  }

  /** Whether the last key of a path expression names a secret */
  private secretPath(path: string): boolean {
    let segments: PathSegment[];
    try {
      segments = parsePath(path);
    } catch {
      return false;
    }
    const last = segments[segments.length - 1];
    return typeof last === 'string' && this.bodyKeys.has(last.toLowerCase());
  }

  failure(failure: FailureDetail): FailureDetail {
    if (failure.kind !== 'assertion') {
      return { ...failure, message: this.text(failure.message) };
    }
    const { mismatch } = failure;
    const masked = (value: unknown) => (value === undefined ? undefined : REDACTED);
    const text = (value: unknown) => (typeof value === 'string' ? this.text(value) : value);

    if (mismatch.check === 'header' && this.headerNames.has(mismatch.locator.toLowerCase())) {
      const message = `Header '${mismatch.locator}' mismatch`;
      const hide = (value: unknown) => (typeof value === 'string' ? REDACTED : value);
      return { kind: 'assertion', message, mismatch: { ...mismatch, expected: hide(mismatch.expected), actual: hide(mismatch.actual), message } };
    }
    if (mismatch.check === 'path' && this.secretPath(mismatch.locator)) {
      const message = mismatch.reason === 'missing' ? this.text(failure.message) : `Path '${mismatch.locator}' mismatch`;
      return { kind: 'assertion', message, mismatch: { ...mismatch, expected: masked(mismatch.expected), actual: masked(mismatch.actual), message } };
    }
    if (mismatch.check === 'schema' && typeof mismatch.actual === 'string' && this.secretPath(mismatch.actual)) {
      const message = `Schema violation at ${mismatch.actual} (${mismatch.locator})`;
      return { kind: 'assertion', message, mismatch: { ...mismatch, expected: masked(mismatch.expected), message } };
    }

    const message = this.text(failure.message);
    return {
      kind: 'assertion',
      message,
      mismatch: {
        ...mismatch,
        expected: text(mismatch.expected),
        actual: text(mismatch.actual),
        message,
      },
    };
  }
}
