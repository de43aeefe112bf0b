import type { TransportErrorKind } from './types.js';

export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class SuiteLoadError extends Error {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Failed to load ${path}: ${message}`);
    this.name = 'SuiteLoadError';
    this.path = path;
  }
}

export class TransportError extends Error {
  public readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
