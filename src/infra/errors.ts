export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/** A rule, profile, base or override document that could not be read or parsed. */
export class DocumentError extends AppError {
  constructor(
    public readonly file: string,
    public readonly reasons: string[],
    options?: ErrorOptions,
  ) {
    super(`Invalid document ${file}: ${reasons.join('; ')}`, 'DOCUMENT_ERROR', { file, reasons }, options);
    this.name = 'DocumentError';
  }
}

/** Every document error found while loading one config directory. */
export class DocumentLoadError extends AppError {
  constructor(public readonly errors: DocumentError[]) {
    super(
      `Failed to load ${errors.length} document(s):\n${errors.map((e) => `  ${e.message}`).join('\n')}`,
      'DOCUMENT_LOAD_ERROR',
      { files: errors.map((e) => e.file) },
    );
    this.name = 'DocumentLoadError';
  }
}

export class RuleCompileError extends AppError {
  constructor(
    public readonly ruleName: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Rule ${ruleName} cannot be compiled: ${reason}`, 'RULE_COMPILE_ERROR', { ruleName, reason }, options);
    this.name = 'RuleCompileError';
  }
}

export class FixApplicationError extends AppError {
  constructor(
    public readonly file: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to apply fixes to ${file}: ${reason}`, 'FIX_APPLICATION_ERROR', { file, reason }, options);
    this.name = 'FixApplicationError';
  }
}

export class EventParseError extends AppError {
  constructor(source: string, reason: string, options?: ErrorOptions) {
    super(`Cannot parse ${source} hook payload: ${reason}`, 'EVENT_PARSE_ERROR', { source, reason }, options);
    this.name = 'EventParseError';
  }
}

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
