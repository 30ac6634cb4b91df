export type ScanErrorCode = 'CONFIG_INVALID' | 'ADDRESS_SOURCE_FAILED' | 'OUTPUT_SINK_FAILED';

export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(message: string, code: ScanErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanError';
    this.code = code;
  }
}

export class ConfigError extends ScanError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Raised when no targets can be obtained; fatal before probing starts. */
export class AddressSourceError extends ScanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ADDRESS_SOURCE_FAILED', options);
    this.name = 'AddressSourceError';
  }
}

export class OutputSinkError extends ScanError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Could not write results to ${path}: ${describeError(options?.cause)}`, 'OUTPUT_SINK_FAILED', options);
    this.name = 'OutputSinkError';
    this.path = path;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return 'unknown error';
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
