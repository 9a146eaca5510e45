/**
 * Error Types Hierarchy for the settlement pipeline
 *
 * Row- and ticker-scoped problems are warnings: the pipeline substitutes a documented default,
 * logs the error and carries it in the report diagnostics. Table-scoped structural problems are
 * errors and abort the run.
 */

export type ErrorSeverity = 'error' | 'warning';

interface DomainErrorOptions {
  additionalContext?: Record<string, unknown> | undefined;
  cause?: unknown;
}

/**
 * Base domain error for ledger processing
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, options?: DomainErrorOptions) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.context = options?.additionalContext;
    if (options?.cause !== undefined) this.cause = options.cause;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * A single malformed trade or rate row. The row is skipped.
 */
export class RowParseError extends DomainError {
  readonly code = 'ROW_PARSE_ERROR';
  readonly severity = 'warning' as const;

  constructor(
    message: string,
    public readonly rowIndex: number,
    public readonly field: string,
    options?: DomainErrorOptions
  ) {
    super(message, { ...options, additionalContext: { ...options?.additionalContext, field, rowIndex } });
  }
}

/**
 * An optional column is absent from the whole table and a default was substituted.
 */
export class MissingColumnError extends DomainError {
  readonly code = 'MISSING_COLUMN';
  readonly severity = 'warning' as const;

  constructor(
    public readonly column: string,
    public readonly defaultValue: string
  ) {
    super(`Column "${column}" is missing; using default ${defaultValue}`, {
      additionalContext: { column, defaultValue },
    });
  }
}

/**
 * A structurally required column is absent. Fatal for the run.
 */
export class SchemaError extends DomainError {
  readonly code = 'SCHEMA_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly missingColumns: string[]
  ) {
    super(message, { additionalContext: { missingColumns } });
  }
}

/**
 * No rate is effective on or before the requested date.
 */
export class NoRateFoundError extends DomainError {
  readonly code = 'NO_RATE_FOUND';
  readonly severity = 'warning' as const;

  constructor(
    public readonly date: Date,
    options?: DomainErrorOptions
  ) {
    super(`No exchange rate effective on or before ${date.toISOString().slice(0, 10)}`, options);
  }
}

/**
 * Prior-period buy lots ran out before a ticker's negative balance was covered.
 */
export class InsufficientPriorDataError extends DomainError {
  readonly code = 'INSUFFICIENT_PRIOR_DATA';
  readonly severity = 'warning' as const;

  constructor(
    public readonly ticker: string,
    public readonly shortfall: number,
    public readonly residual: number
  ) {
    super(`Prior-period lots cover ${shortfall - residual} of ${shortfall} units for ${ticker}`, {
      additionalContext: { residual, shortfall, ticker },
    });
  }
}

/**
 * A trade or rate table without usable rows. Fatal for the run.
 */
export class EmptyInputError extends DomainError {
  readonly code = 'EMPTY_INPUT';
  readonly severity = 'error' as const;

  constructor(public readonly table: 'trades' | 'rates') {
    super(`The ${table} table contains no usable rows`, { additionalContext: { table } });
  }
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = 'error' as const;
}
