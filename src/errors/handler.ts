/**
 * Error Handler for Time Agreements
 *
 * Centralized error handling with console logging, category handlers,
 * recovery strategies and error statistics.
 */

import {
  TimeAgreementsError,
  ErrorHandler,
  ErrorSeverity,
  ErrorCategory,
  ErrorCode,
  RecoveryStrategy,
  describeError,
} from './types';

/** Error handler configuration */
export interface ErrorHandlerConfig {
  /** Whether to log errors to console */
  console_logging: boolean;
  /** Minimum severity to log */
  min_log_severity: ErrorSeverity;
  /** Custom error handlers by category */
  category_handlers?: Partial<Record<ErrorCategory, ErrorHandler>>;
}

/** Error statistics */
export interface ErrorStats {
  total_errors: number;
  errors_by_severity: Record<ErrorSeverity, number>;
  errors_by_category: Record<ErrorCategory, number>;
  last_error_at?: Date;
  critical_errors_count: number;
}

/** Options for a retried operation */
export interface RetryOptions {
  operation?: string;
  metadata?: Record<string, unknown>;
  /** Overrides the category's default strategy */
  strategy?: RecoveryStrategy;
  /** Return false to stop retrying on this error */
  shouldRetry?: (error: unknown) => boolean;
}

/** Default recovery strategies by error category */
const DEFAULT_RECOVERY_STRATEGIES: Partial<Record<ErrorCategory, RecoveryStrategy>> = {
  [ErrorCategory.DIALOGUE]: {
    max_retries: 1,
    base_delay_ms: 500,
    exponential_backoff: true,
    max_delay_ms: 5000,
  },
  [ErrorCategory.STORAGE]: {
    max_retries: 2,
    base_delay_ms: 500,
    exponential_backoff: false,
    max_delay_ms: 5000,
  },
};

const FALLBACK_STRATEGY: RecoveryStrategy = {
  max_retries: 1,
  base_delay_ms: 1000,
  exponential_backoff: false,
  max_delay_ms: 5000,
};

function emptySeverityCounts(): Record<ErrorSeverity, number> {
  return {
    [ErrorSeverity.INFO]: 0,
    [ErrorSeverity.LOW]: 0,
    [ErrorSeverity.MEDIUM]: 0,
    [ErrorSeverity.HIGH]: 0,
    [ErrorSeverity.CRITICAL]: 0,
  };
}

function emptyCategoryCounts(): Record<ErrorCategory, number> {
  return {
    [ErrorCategory.PARSE]: 0,
    [ErrorCategory.NEGOTIATION]: 0,
    [ErrorCategory.DIALOGUE]: 0,
    [ErrorCategory.COMPLIANCE]: 0,
    [ErrorCategory.ENFORCEMENT]: 0,
    [ErrorCategory.NOTIFICATION]: 0,
    [ErrorCategory.STORAGE]: 0,
    [ErrorCategory.CONFIG]: 0,
    [ErrorCategory.VALIDATION]: 0,
    [ErrorCategory.SYSTEM]: 0,
  };
}

/**
 * Computes the wait before retry number `attempt` (1-based)
 */
export function backoffDelay(strategy: RecoveryStrategy, attempt: number): number {
  if (!strategy.exponential_backoff) {
    return Math.min(strategy.base_delay_ms, strategy.max_delay_ms);
  }
  return Math.min(strategy.base_delay_ms * Math.pow(2, attempt - 1), strategy.max_delay_ms);
}

/**
 * Centralized Error Handler
 */
export class CentralErrorHandler {
  private config: ErrorHandlerConfig;
  private stats: ErrorStats;
  private globalHandlers: ErrorHandler[] = [];

  constructor(config: Partial<ErrorHandlerConfig> = {}) {
    this.config = {
      console_logging: true,
      min_log_severity: ErrorSeverity.LOW,
      ...config,
    };

    this.stats = {
      total_errors: 0,
      errors_by_severity: emptySeverityCounts(),
      errors_by_category: emptyCategoryCounts(),
      critical_errors_count: 0,
    };
  }

  /** Register a global error handler */
  addGlobalHandler(handler: ErrorHandler): void {
    this.globalHandlers.push(handler);
  }

  /** Wraps any thrown value in a TimeAgreementsError */
  normalize(error: unknown): TimeAgreementsError {
    if (error instanceof TimeAgreementsError) {
      return error;
    }
    return new TimeAgreementsError(
      describeError(error),
      ErrorCode.SYSTEM_INTERNAL_ERROR,
      ErrorCategory.SYSTEM,
      ErrorSeverity.HIGH,
      { stack: error instanceof Error ? error.stack : undefined },
      { cause: error }
    );
  }

  /** Handle an error */
  async handleError(error: unknown): Promise<TimeAgreementsError> {
    const taError = this.normalize(error);

    this.updateStats(taError);

    if (this.config.console_logging && taError.severity >= this.config.min_log_severity) {
      this.logToConsole(taError);
    }

    const categoryHandler = this.config.category_handlers?.[taError.category];
    if (categoryHandler) {
      try {
        await categoryHandler(taError);
      } catch (handlerError) {
        console.error(`Error handler for ${taError.category} failed:`, handlerError);
      }
    }

    for (const handler of this.globalHandlers) {
      try {
        await handler(taError);
      } catch (handlerError) {
        console.error('Error handler failed:', handlerError);
      }
    }

    return taError;
  }

  /** Handle error with retry using recovery strategy */
  async handleWithRetry<T>(
    operation: () => Promise<T>,
    category: ErrorCategory,
    options: RetryOptions = {}
  ): Promise<T> {
    const strategy = options.strategy ?? DEFAULT_RECOVERY_STRATEGIES[category] ?? FALLBACK_STRATEGY;

    let lastError: unknown;
    let attempt = 0;

    while (attempt <= strategy.max_retries) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;
        attempt++;

        if (attempt > strategy.max_retries) {
          break;
        }
        if (options.shouldRetry && !options.shouldRetry(error)) {
          throw error;
        }

        const delay = backoffDelay(strategy, attempt);

        const retryError = new TimeAgreementsError(
          `Retry attempt ${attempt}/${strategy.max_retries}: ${describeError(error)}`,
          ErrorCode.SYSTEM_INTERNAL_ERROR,
          category,
          ErrorSeverity.LOW,
          { operation: options.operation, metadata: { ...options.metadata, attempt, delay } },
          { recoverable: true, cause: error }
        );

        await this.handleError(retryError);
        await this.delay(delay);
      }
    }

    const finalError = new TimeAgreementsError(
      `Operation failed after ${strategy.max_retries} retries: ${describeError(lastError)}`,
      ErrorCode.SYSTEM_INTERNAL_ERROR,
      category,
      ErrorSeverity.HIGH,
      { operation: options.operation, metadata: options.metadata },
      { recoverable: false, cause: lastError }
    );

    await this.handleError(finalError);
    throw finalError;
  }

  /** Get error statistics */
  getStats(): ErrorStats {
    return {
      ...this.stats,
      errors_by_severity: { ...this.stats.errors_by_severity },
      errors_by_category: { ...this.stats.errors_by_category },
    };
  }

  /** Reset error statistics */
  resetStats(): void {
    this.stats = {
      total_errors: 0,
      errors_by_severity: emptySeverityCounts(),
      errors_by_category: emptyCategoryCounts(),
      critical_errors_count: 0,
    };
  }

  private updateStats(error: TimeAgreementsError): void {
    this.stats.total_errors++;
    this.stats.errors_by_severity[error.severity]++;
    this.stats.errors_by_category[error.category]++;
    this.stats.last_error_at = new Date();

    if (error.severity === ErrorSeverity.CRITICAL) {
      this.stats.critical_errors_count++;
    }
  }

  private logToConsole(error: TimeAgreementsError): void {
    const prefix = `[${ErrorSeverity[error.severity]}] [${error.category}]`;
    const message = `${prefix} ${error.message} (${error.code})`;

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
      case ErrorSeverity.HIGH:
        console.error(message, error.context);
        break;
      case ErrorSeverity.MEDIUM:
        console.warn(message, error.context);
        break;
      default:
        // INFO and LOW stay off the console
        break;
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

// Singleton instance for convenience
let defaultHandler: CentralErrorHandler | undefined;

export function getDefaultErrorHandler(): CentralErrorHandler {
  if (!defaultHandler) {
    defaultHandler = new CentralErrorHandler();
  }
  return defaultHandler;
}

export function setDefaultErrorHandler(handler: CentralErrorHandler): void {
  defaultHandler = handler;
}
