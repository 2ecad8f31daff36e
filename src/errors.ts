/**
 * Settlement error types
 * Structured errors with recovery suggestions
 */

export interface ErrorDetails {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
  retryable?: boolean;
}

/**
 * Base error class for all settlement errors
 */
export class SettlementError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  readonly suggestion: string;
  readonly retryable: boolean;

  constructor(config: ErrorDetails) {
    super(config.message);
    this.name = 'SettlementError';
    this.code = config.code;
    this.details = config.details ?? {};
    this.suggestion = config.suggestion ?? 'Check the error details and try again';
    this.retryable = config.retryable ?? false;
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
      retryable: this.retryable,
    };
  }

  override toString(): string {
    return `${this.code}: ${this.message}. ${this.suggestion}`;
  }
}

// ============ Validation Errors ============

export class ValidationError extends SettlementError {
  constructor(config: Omit<ErrorDetails, 'code'> & { code?: string }) {
    super({ ...config, code: config.code ?? 'VALIDATION_ERROR', retryable: false });
    this.name = 'ValidationError';
  }
}

export class InvalidAmountError extends ValidationError {
  constructor(field: string, amount: bigint, reason: string) {
    super({
      code: 'INVALID_AMOUNT',
      message: `Invalid ${field} ${amount.toString()}: ${reason}`,
      details: { field, amount: amount.toString(), reason },
      suggestion: 'Provide a non-negative amount that fits in 256 bits',
    });
    this.name = 'InvalidAmountError';
  }
}

// ============ Configuration Errors ============

export class ConfigurationError extends SettlementError {
  constructor(config: Omit<ErrorDetails, 'code'> & { code?: string }) {
    super({ ...config, code: config.code ?? 'CONFIGURATION_ERROR', retryable: false });
    this.name = 'ConfigurationError';
  }
}

export class NotInitializedError extends ConfigurationError {
  constructor(component: string) {
    super({
      code: 'NOT_INITIALIZED',
      message: `${component} has not been initialized`,
      details: { component },
      suggestion: 'Call initialize() with the token bridge and chain id first',
    });
    this.name = 'NotInitializedError';
  }
}

// ============ Arithmetic Errors ============

export class ArithmeticOverflowError extends SettlementError {
  constructor(operation: string, value: bigint) {
    super({
      code: 'ARITHMETIC_OVERFLOW',
      message: `Arithmetic overflow in ${operation}: ${value.toString()} does not fit uint256`,
      details: { operation, value: value.toString() },
      suggestion: 'Lower the gas price, amount or ratio involved in the computation',
      retryable: false,
    });
    this.name = 'ArithmeticOverflowError';
  }
}

// ============ Unexpected Errors ============

export class UnexpectedError extends SettlementError {
  constructor(cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super({
      code: 'UNEXPECTED_ERROR',
      message: `Unexpected failure: ${message}`,
      details: { cause: message },
      suggestion: 'Inspect the underlying capability that raised this error',
      retryable: false,
    });
    this.name = 'UnexpectedError';
  }
}

/**
 * Normalize anything thrown by a capability into a SettlementError
 */
export function toSettlementError(error: unknown): SettlementError {
  if (error instanceof SettlementError) return error;
  return new UnexpectedError(error);
}
