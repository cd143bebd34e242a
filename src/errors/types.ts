/**
 * Time Agreements Error Types
 *
 * Structured error handling with severity levels, error codes and
 * categories, so hosts can route failures to alerting or retry policies.
 */

/** Error severity levels */
export enum ErrorSeverity {
  /** Informational - normal operation events */
  INFO = 0,
  /** Low - minor issues that don't affect operation */
  LOW = 1,
  /** Medium - issues that may affect some functionality */
  MEDIUM = 2,
  /** High - significant issues affecting core functionality */
  HIGH = 3,
  /** Critical - issues requiring immediate action */
  CRITICAL = 4,
}

/** Error categories for classification */
export enum ErrorCategory {
  /** Reply parsing */
  PARSE = 'parse',
  /** Negotiation state machine */
  NEGOTIATION = 'negotiation',
  /** Dialogue backend calls */
  DIALOGUE = 'dialogue',
  /** Compliance tracking */
  COMPLIANCE = 'compliance',
  /** Enforcement actuators */
  ENFORCEMENT = 'enforcement',
  /** Notification delivery */
  NOTIFICATION = 'notification',
  /** Storage/persistence errors */
  STORAGE = 'storage',
  /** Configuration errors */
  CONFIG = 'config',
  /** Validation errors */
  VALIDATION = 'validation',
  /** System/internal errors */
  SYSTEM = 'system',
}

/** Error codes for specific error types */
export enum ErrorCode {
  // Parse errors (1000-1999)
  PARSE_AMBIGUOUS = 1001,

  // Negotiation errors (2000-2999)
  NEGOTIATION_FAILED = 2001,
  NEGOTIATION_INVALID_STATE = 2002,
  NEGOTIATION_CANCELLED = 2003,

  // Dialogue errors (3000-3999)
  DIALOGUE_BACKEND_FAILED = 3001,
  DIALOGUE_TIMEOUT = 3002,

  // Compliance errors (4000-4999)
  COMPLIANCE_SIGNAL_FAILED = 4001,
  COMPLIANCE_SIGNAL_TIMEOUT = 4002,
  COMPLIANCE_EVALUATION_FAILED = 4003,
  COMPLIANCE_AMBIENT_TIMEOUT = 4004,

  // Enforcement errors (5000-5999)
  ENFORCEMENT_ACTUATOR_UNAVAILABLE = 5001,
  ENFORCEMENT_ACTUATOR_FAILED = 5002,
  ENFORCEMENT_TIMEOUT = 5003,

  // Notification errors (6000-6999)
  NOTIFICATION_FAILED = 6001,

  // Storage errors (7000-7999)
  STORAGE_READ_FAILED = 7001,
  STORAGE_WRITE_FAILED = 7002,
  STORAGE_INTEGRITY_VIOLATION = 7003,
  STORAGE_NOT_INITIALIZED = 7004,
  AGREEMENT_NOT_FOUND = 7005,
  AGREEMENT_STATUS_CONFLICT = 7006,

  // Config errors (8000-8999)
  CONFIG_INVALID = 8001,

  // Validation errors (9000-9999)
  VALIDATION_FAILED = 9001,

  // System errors (10000+)
  SYSTEM_INTERNAL_ERROR = 10001,
  SYSTEM_TIMEOUT = 10002,
}

/** Context information for errors */
export interface ErrorContext {
  /** Agreement ID if applicable */
  agreement_id?: string;
  /** Negotiation conversation ID if applicable */
  conversation_id?: string;
  /** Operation that failed */
  operation?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
  /** Stack trace */
  stack?: string;
  /** Timestamp */
  timestamp: Date;
  /** Source component */
  source_component?: string;
}

/** Error handler callback type */
export type ErrorHandler = (error: TimeAgreementsError) => void | Promise<void>;

/** Error recovery strategy */
export interface RecoveryStrategy {
  /** Maximum retry attempts */
  max_retries: number;
  /** Base delay between retries in ms */
  base_delay_ms: number;
  /** Whether to use exponential backoff */
  exponential_backoff: boolean;
  /** Maximum delay cap in ms */
  max_delay_ms: number;
}

interface ErrorOptions {
  recoverable?: boolean;
  remediation?: string;
  cause?: unknown;
}

/**
 * Base error class for time agreements
 */
export class TimeAgreementsError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly recoverable: boolean;
  readonly event_id: string;
  readonly remediation?: string;

  constructor(
    message: string,
    code: ErrorCode,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: Partial<ErrorContext> = {},
    options: ErrorOptions = {}
  ) {
    super(message);
    this.name = 'TimeAgreementsError';
    if (options.cause !== undefined) {
      Object.defineProperty(this, 'cause', {
        value: options.cause,
        writable: true,
        configurable: true,
      });
    }
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = {
      timestamp: new Date(),
      stack: this.stack,
      ...context,
    };
    this.recoverable = options.recoverable ?? false;
    this.event_id = this.generateEventId();
    this.remediation = options.remediation;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  private generateEventId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 10);
    return `ta-err-${timestamp}-${random}`;
  }

  /** Convert to JSON for host-level reporting */
  toJSON(): Record<string, unknown> {
    return {
      event_id: this.event_id,
      error_type: this.name,
      code: this.code,
      category: this.category,
      severity: this.severity,
      severity_name: ErrorSeverity[this.severity],
      message: this.message,
      context: {
        ...this.context,
        timestamp: this.context.timestamp.toISOString(),
      },
      recoverable: this.recoverable,
      remediation: this.remediation,
    };
  }
}

/**
 * Formats an unknown thrown value for messages
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Specialized error classes

/**
 * A reply did not contain a recognizable duration. Not fatal: the caller
 * re-prompts.
 */
export class ParseAmbiguousError extends TimeAgreementsError {
  readonly input: string;

  constructor(input: string, context?: Partial<ErrorContext>) {
    super(
      `Could not find a duration in reply: "${input}"`,
      ErrorCode.PARSE_AMBIGUOUS,
      ErrorCategory.PARSE,
      ErrorSeverity.INFO,
      context,
      { recoverable: true, remediation: 'Ask the user to restate the duration' }
    );
    this.name = 'ParseAmbiguousError';
    this.input = input;
  }
}

/**
 * The dialogue backend could not be reached after retrying. The
 * conversation stays in its last stable state and can be resumed.
 */
export class NegotiationFailedError extends TimeAgreementsError {
  readonly reason: string;

  constructor(reason: string, context?: Partial<ErrorContext>, options: { cause?: unknown } = {}) {
    super(
      `Negotiation failed: ${reason}`,
      ErrorCode.NEGOTIATION_FAILED,
      ErrorCategory.NEGOTIATION,
      ErrorSeverity.MEDIUM,
      context,
      { recoverable: true, cause: options.cause, remediation: 'Retry the last reply' }
    );
    this.name = 'NegotiationFailedError';
    this.reason = reason;
  }
}

/**
 * A transition was attempted from a state that does not allow it
 */
export class InvalidStateError extends TimeAgreementsError {
  readonly state: string;
  readonly attempted: string;

  constructor(state: string, attempted: string, context?: Partial<ErrorContext>) {
    super(
      `Cannot ${attempted} while negotiation is in state "${state}"`,
      ErrorCode.NEGOTIATION_INVALID_STATE,
      ErrorCategory.NEGOTIATION,
      ErrorSeverity.MEDIUM,
      { operation: attempted, ...context }
    );
    this.name = 'InvalidStateError';
    this.state = state;
    this.attempted = attempted;
  }
}

export class DialogueError extends TimeAgreementsError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: Partial<ErrorContext>,
    options?: ErrorOptions
  ) {
    super(message, code, ErrorCategory.DIALOGUE, ErrorSeverity.LOW, context, {
      recoverable: true,
      ...options,
    });
    this.name = 'DialogueError';
  }
}

export class EnforcementError extends TimeAgreementsError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: Partial<ErrorContext>,
    options?: ErrorOptions
  ) {
    super(message, code, ErrorCategory.ENFORCEMENT, ErrorSeverity.HIGH, context, options);
    this.name = 'EnforcementError';
  }
}

export class RepositoryError extends TimeAgreementsError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: Partial<ErrorContext>,
    options?: ErrorOptions
  ) {
    super(message, code, ErrorCategory.STORAGE, ErrorSeverity.HIGH, context, {
      recoverable: true,
      ...options,
    });
    this.name = 'RepositoryError';
  }
}

export class TimeoutError extends TimeAgreementsError {
  readonly timeout_ms: number;

  constructor(
    operation: string,
    timeoutMs: number,
    code: ErrorCode = ErrorCode.SYSTEM_TIMEOUT,
    category: ErrorCategory = ErrorCategory.SYSTEM
  ) {
    super(
      `${operation} timed out after ${timeoutMs}ms`,
      code,
      category,
      ErrorSeverity.MEDIUM,
      { operation },
      { recoverable: true }
    );
    this.name = 'TimeoutError';
    this.timeout_ms = timeoutMs;
  }
}

export class ConfigError extends TimeAgreementsError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, ErrorCode.CONFIG_INVALID, ErrorCategory.CONFIG, ErrorSeverity.HIGH, context);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends TimeAgreementsError {
  readonly errors: string[];

  constructor(message: string, errors: string[], context?: Partial<ErrorContext>) {
    super(
      `${message}: ${errors.join(', ')}`,
      ErrorCode.VALIDATION_FAILED,
      ErrorCategory.VALIDATION,
      ErrorSeverity.MEDIUM,
      context
    );
    this.name = 'ValidationError';
    this.errors = errors;
  }
}
