/**
 * Enforcement Dispatcher
 *
 * Hands a violated agreement to the first actuator that can act on it.
 * Called once per violation and never retried: the agreement is already
 * VIOLATED, so later ticks will not come back to it.
 */

import { Agreement, EnforcementOutcome, EnforcementResult } from '../types';
import { AuditLogger } from '../audit/logger';
import {
  CentralErrorHandler,
  EnforcementError,
  ErrorCategory,
  ErrorCode,
  describeError,
  getDefaultErrorHandler,
} from '../errors';
import { withTimeout } from '../utils/timeout';
import { DEFAULT_COMPLIANCE_OPTIONS } from '../config';

/**
 * External capability that stops or blocks the subject of an agreement
 */
export interface Actuator {
  readonly name: string;
  /** Defaults to true when absent */
  supports?(agreement: Agreement): boolean;
  apply(agreement: Agreement, signal?: AbortSignal): Promise<EnforcementResult>;
}

export interface EnforcementDispatcherConfig {
  actuators?: Actuator[];
  timeout_ms?: number;
  auditLogger?: AuditLogger;
  errorHandler?: CentralErrorHandler;
}

export class EnforcementDispatcher {
  private actuators: Actuator[];
  private timeoutMs: number;
  private auditLogger?: AuditLogger;
  private errorHandler: CentralErrorHandler;

  constructor(config: EnforcementDispatcherConfig = {}) {
    this.actuators = [...(config.actuators ?? [])];
    this.timeoutMs = config.timeout_ms ?? DEFAULT_COMPLIANCE_OPTIONS.actuator_timeout_ms;
    this.auditLogger = config.auditLogger;
    this.errorHandler = config.errorHandler ?? getDefaultErrorHandler();
  }

  /**
   * Register an actuator; earlier registrations are tried first
   */
  register(actuator: Actuator): () => void {
    this.actuators.push(actuator);
    return () => {
      const index = this.actuators.indexOf(actuator);
      if (index > -1) {
        this.actuators.splice(index, 1);
      }
    };
  }

  getActuators(): Actuator[] {
    return [...this.actuators];
  }

  async enforce(agreement: Agreement): Promise<EnforcementResult> {
    const selection = this.select(agreement);

    let result: EnforcementResult;
    if ('failure' in selection) {
      result = selection.failure;
    } else if (!selection.actuator) {
      result = {
        outcome: EnforcementOutcome.ACTUATOR_UNAVAILABLE,
        reason: 'No actuator supports this agreement',
      };
    } else {
      result = await this.apply(selection.actuator, agreement);
    }

    this.auditLogger?.logEnforcement(agreement.agreement_id, result);

    if (result.outcome !== EnforcementOutcome.SUCCESS) {
      const code =
        result.outcome === EnforcementOutcome.ACTUATOR_UNAVAILABLE
          ? ErrorCode.ENFORCEMENT_ACTUATOR_UNAVAILABLE
          : ErrorCode.ENFORCEMENT_ACTUATOR_FAILED;
      await this.errorHandler.handleError(
        new EnforcementError(`Enforcement ${result.outcome}: ${result.reason ?? 'unknown'}`, code, {
          agreement_id: agreement.agreement_id,
          operation: 'enforce',
          metadata: { ...result },
        })
      );
    }

    return result;
  }

  /**
   * First actuator whose capability check passes. A throwing check fails
   * the enforcement rather than the caller.
   */
  private select(agreement: Agreement): { actuator?: Actuator } | { failure: EnforcementResult } {
    for (const actuator of this.actuators) {
      try {
        if (!actuator.supports || actuator.supports(agreement)) {
          return { actuator };
        }
      } catch (error) {
        return {
          failure: {
            outcome: EnforcementOutcome.ACTUATOR_FAILED,
            reason: `Capability check failed: ${describeError(error)}`,
            actuator: actuator.name,
          },
        };
      }
    }
    return {};
  }

  private async apply(actuator: Actuator, agreement: Agreement): Promise<EnforcementResult> {
    try {
      const result = await withTimeout((signal) => actuator.apply(agreement, signal), {
        operation: `actuator.${actuator.name}`,
        timeout_ms: this.timeoutMs,
        code: ErrorCode.ENFORCEMENT_TIMEOUT,
        category: ErrorCategory.ENFORCEMENT,
      });
      if (result.outcome === EnforcementOutcome.ACTUATOR_UNAVAILABLE) {
        return result;
      }
      return { ...result, actuator: result.actuator ?? actuator.name };
    } catch (error) {
      return {
        outcome: EnforcementOutcome.ACTUATOR_FAILED,
        reason: describeError(error),
        actuator: actuator.name,
      };
    }
  }
}
