/**
 * Compliance Tracker
 *
 * Periodically polls ACTIVE agreements against live activity and drives
 * them through warning, grace, and violation or completion. Every
 * agreement in a tick is judged against the same `now` and the same
 * activity reading for its subject.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Agreement,
  AgreementStatus,
  CompliancePhase,
  ComplianceSnapshot,
  PHASE_RANK,
} from '../types';
import { AgreementRepository } from '../storage/repository';
import { EnforcementDispatcher } from '../enforcement/dispatcher';
import { AuditLogger } from '../audit/logger';
import { CategoryPolicyTable, DEFAULT_CATEGORY_POLICIES } from '../policy';
import { msRemaining } from '../agreements/timing';
import {
  CentralErrorHandler,
  ErrorCategory,
  ErrorCode,
  ErrorSeverity,
  TimeAgreementsError,
  describeError,
  getDefaultErrorHandler,
} from '../errors';
import { ComplianceOptions, DEFAULT_COMPLIANCE_OPTIONS } from '../config';
import { Clock, systemClock } from '../utils/clock';
import { withTimeout } from '../utils/timeout';
import { derivePhase, isForward } from './phase';
import {
  ActivitySignal,
  AgreementEvaluation,
  AmbientMonitor,
  ComplianceTrackerStats,
  Notifier,
  NotifierEvent,
  PhaseTiming,
  SuppressionProvider,
  TickListener,
  TickResult,
} from './types';

export interface ComplianceTrackerConfig {
  repository: AgreementRepository;
  activitySignal: ActivitySignal;
  dispatcher: EnforcementDispatcher;
  notifier?: Notifier;
  suppression?: SuppressionProvider;
  ambientMonitor?: AmbientMonitor;
  clock?: Clock;
  auditLogger?: AuditLogger;
  errorHandler?: CentralErrorHandler;
  /** Per-category grace and warning overrides */
  policies?: CategoryPolicyTable;
  options?: Partial<ComplianceOptions>;
}

type SignalReading = { ok: true; active: boolean } | { ok: false; error: string };

interface TickCounters {
  warnings: number;
  grace_started: number;
  violations: number;
  completions: number;
}

export class ComplianceTracker {
  private repository: AgreementRepository;
  private activitySignal: ActivitySignal;
  private dispatcher: EnforcementDispatcher;
  private notifier: Notifier;
  private suppression?: SuppressionProvider;
  private ambientMonitor?: AmbientMonitor;
  private clock: Clock;
  private auditLogger?: AuditLogger;
  private errorHandler: CentralErrorHandler;
  private policies: CategoryPolicyTable;
  private options: ComplianceOptions;

  private intervalId: ReturnType<typeof setInterval> | null = null;
  private intervalMs: number;
  private inFlight: Promise<TickResult> | null = null;
  private tickListeners: TickListener[] = [];
  /** Highest phase already announced per agreement; entries leave with ACTIVE */
  private lastNotified: Map<string, CompliancePhase> = new Map();

  private lastTickAt: Date | null = null;
  private ticksCompleted = 0;
  private ticksSuppressed = 0;
  private totalWarnings = 0;
  private totalViolations = 0;
  private totalCompletions = 0;
  private totalErrors = 0;

  constructor(config: ComplianceTrackerConfig) {
    this.repository = config.repository;
    this.activitySignal = config.activitySignal;
    this.dispatcher = config.dispatcher;
    this.notifier = config.notifier ?? {};
    this.suppression = config.suppression;
    this.ambientMonitor = config.ambientMonitor;
    this.clock = config.clock ?? systemClock;
    this.auditLogger = config.auditLogger;
    this.errorHandler = config.errorHandler ?? getDefaultErrorHandler();
    this.policies = config.policies ?? DEFAULT_CATEGORY_POLICIES;
    this.options = { ...DEFAULT_COMPLIANCE_OPTIONS, ...config.options };
    this.intervalMs = this.options.interval_ms;
  }

  /**
   * Start periodic ticking. The first tick runs immediately.
   */
  start(intervalMs?: number): void {
    if (this.intervalId !== null) {
      return; // Already running
    }
    if (intervalMs !== undefined) {
      if (!Number.isInteger(intervalMs) || intervalMs < 1) {
        throw new TimeAgreementsError(
          `Tick interval must be a positive integer, got ${intervalMs}`,
          ErrorCode.CONFIG_INVALID,
          ErrorCategory.CONFIG,
          ErrorSeverity.HIGH
        );
      }
      this.intervalMs = intervalMs;
    }

    this.scheduleTick();
    this.intervalId = setInterval(() => {
      this.scheduleTick();
    }, this.intervalMs);
  }

  /**
   * Stop scheduling ticks. A tick already running finishes on its own.
   */
  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Runs one tick. While a tick is running, callers share its result.
   */
  tick(): Promise<TickResult> {
    if (!this.inFlight) {
      this.inFlight = this.runTick().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Phase of an agreement at `now`, without side effects
   */
  evaluate(agreement: Agreement, subjectActive: boolean, now: Date = this.clock.now()): ComplianceSnapshot {
    const remaining = msRemaining(agreement, now);
    if (agreement.status === AgreementStatus.COMPLETED) {
      return { agreement, ms_remaining: remaining, phase: CompliancePhase.COMPLETED };
    }
    if (agreement.status === AgreementStatus.VIOLATED) {
      return { agreement, ms_remaining: remaining, phase: CompliancePhase.VIOLATION };
    }
    return {
      agreement,
      ms_remaining: remaining,
      phase: derivePhase(remaining, subjectActive, this.timingFor(agreement)),
    };
  }

  /**
   * Register a listener for tick completion
   */
  onTickComplete(listener: TickListener): () => void {
    this.tickListeners.push(listener);
    return () => {
      const index = this.tickListeners.indexOf(listener);
      if (index > -1) {
        this.tickListeners.splice(index, 1);
      }
    };
  }

  getStats(): ComplianceTrackerStats {
    const nextTickAt =
      this.isRunning() && this.lastTickAt
        ? new Date(this.lastTickAt.getTime() + this.intervalMs)
        : null;

    return {
      isRunning: this.isRunning(),
      lastTickAt: this.lastTickAt,
      nextTickAt,
      ticksCompleted: this.ticksCompleted,
      ticksSuppressed: this.ticksSuppressed,
      totalWarnings: this.totalWarnings,
      totalViolations: this.totalViolations,
      totalCompletions: this.totalCompletions,
      totalErrors: this.totalErrors,
    };
  }

  resetStats(): void {
    this.ticksCompleted = 0;
    this.ticksSuppressed = 0;
    this.totalWarnings = 0;
    this.totalViolations = 0;
    this.totalCompletions = 0;
    this.totalErrors = 0;
  }

  private scheduleTick(): void {
    if (this.inFlight) {
      return; // Previous tick still running
    }
    this.tick().catch((error: unknown) => {
      console.error('Compliance tick failed:', error);
    });
  }

  private async runTick(): Promise<TickResult> {
    const now = this.clock.now();
    const results: AgreementEvaluation[] = [];
    const errors: string[] = [];
    const counters: TickCounters = { warnings: 0, grace_started: 0, violations: 0, completions: 0 };
    let ambientChecked = false;

    const suppressionReason = await this.checkSuppression(now, errors);

    if (suppressionReason !== null) {
      this.ticksSuppressed++;
      this.auditLogger?.logTickSuppressed(suppressionReason);
    } else {
      let active: Agreement[] | null = null;
      try {
        active = await this.repository.getActive();
      } catch (error) {
        errors.push(`Failed to load active agreements: ${describeError(error)}`);
        await this.errorHandler.handleError(error);
      }

      if (active !== null) {
        this.pruneNotified(active);
        const readings = await this.readSignals(active);

        for (const agreement of active) {
          const reading = readings.get(agreement.subject_key);
          if (!reading || !reading.ok) {
            const error = reading ? reading.error : 'No activity reading';
            results.push({
              agreement_id: agreement.agreement_id,
              phase: null,
              ms_remaining: msRemaining(agreement, now),
              subject_active: null,
              action: 'skipped',
              error,
            });
            errors.push(`Skipped ${agreement.agreement_id}: ${error}`);
            continue;
          }

          try {
            results.push(await this.process(agreement, reading.active, now, counters));
          } catch (error) {
            const message = `Failed to process agreement ${agreement.agreement_id}: ${describeError(error)}`;
            errors.push(message);
            results.push({
              agreement_id: agreement.agreement_id,
              phase: null,
              ms_remaining: msRemaining(agreement, now),
              subject_active: reading.active,
              action: 'none',
              error: message,
            });
            await this.errorHandler.handleError(error);
          }
        }

        // Agreement outcomes take priority over ambient monitoring
        const monitor = this.ambientMonitor;
        if (monitor && counters.violations === 0 && counters.completions === 0) {
          ambientChecked = true;
          try {
            await withTimeout(
              async (signal) => {
                await monitor.check(now, signal);
              },
              {
                operation: 'ambient.check',
                timeout_ms: this.options.ambient_timeout_ms,
                code: ErrorCode.COMPLIANCE_AMBIENT_TIMEOUT,
                category: ErrorCategory.COMPLIANCE,
              }
            );
          } catch (error) {
            errors.push(`Ambient monitor failed: ${describeError(error)}`);
            await this.errorHandler.handleError(error);
          }
        }
      }
    }

    this.lastTickAt = now;
    this.ticksCompleted++;
    this.totalWarnings += counters.warnings;
    this.totalViolations += counters.violations;
    this.totalCompletions += counters.completions;
    this.totalErrors += errors.length;

    const tickResult: TickResult = {
      tick_id: uuidv4(),
      now,
      suppressed: suppressionReason !== null,
      suppression_reason: suppressionReason,
      agreements_checked: results.length,
      warnings: counters.warnings,
      grace_started: counters.grace_started,
      violations: counters.violations,
      completions: counters.completions,
      ambient_checked: ambientChecked,
      results,
      errors,
    };

    for (const listener of this.tickListeners) {
      try {
        listener(tickResult);
      } catch (error) {
        console.error('Tick listener error:', error);
      }
    }

    return tickResult;
  }

  /**
   * Evaluates one agreement and applies the side effects of its phase
   */
  private async process(
    agreement: Agreement,
    subjectActive: boolean,
    now: Date,
    counters: TickCounters
  ): Promise<AgreementEvaluation> {
    const snapshot = this.evaluate(agreement, subjectActive, now);
    const previous = this.lastNotified.get(agreement.agreement_id);
    const evaluation: AgreementEvaluation = {
      agreement_id: agreement.agreement_id,
      phase: snapshot.phase,
      ms_remaining: snapshot.ms_remaining,
      subject_active: subjectActive,
      action: 'none',
    };

    // Phases never move backwards, even if the clock does
    if (previous !== undefined && !isForward(previous, snapshot.phase)) {
      evaluation.phase = previous;
      return evaluation;
    }

    switch (snapshot.phase) {
      case CompliancePhase.VIOLATION: {
        const marked = await this.repository.markViolated(agreement.agreement_id, now);
        if (!marked) {
          return evaluation;
        }
        this.lastNotified.delete(agreement.agreement_id);
        const violated: Agreement = {
          ...agreement,
          status: AgreementStatus.VIOLATED,
          violated_at: now,
        };
        this.auditLogger?.logStatusTransition(agreement.agreement_id, 'system', AgreementStatus.VIOLATED, {
          ms_remaining: snapshot.ms_remaining,
        });
        const enforcement = await this.dispatcher.enforce(violated);
        const violatedSnapshot = { ...snapshot, agreement: violated };
        this.notify('onViolation', (n) => n.onViolation?.(violatedSnapshot, enforcement));
        counters.violations++;
        evaluation.action = 'violated';
        evaluation.enforcement = enforcement;
        return evaluation;
      }

      case CompliancePhase.COMPLETED: {
        const marked = await this.repository.markCompleted(agreement.agreement_id, now);
        if (!marked) {
          return evaluation;
        }
        this.lastNotified.delete(agreement.agreement_id);
        const completed: Agreement = {
          ...agreement,
          status: AgreementStatus.COMPLETED,
          completed_at: now,
        };
        this.auditLogger?.logStatusTransition(agreement.agreement_id, 'system', AgreementStatus.COMPLETED, {
          ms_remaining: snapshot.ms_remaining,
        });
        const completedSnapshot = { ...snapshot, agreement: completed };
        this.notify('onCompleted', (n) => n.onCompleted?.(completedSnapshot));
        counters.completions++;
        evaluation.action = 'completed';
        return evaluation;
      }

      case CompliancePhase.EXPIRED_GRACE:
      case CompliancePhase.WARNING: {
        const phase = snapshot.phase;
        if (previous !== undefined && PHASE_RANK[previous] >= PHASE_RANK[phase]) {
          return evaluation; // Already announced
        }
        this.lastNotified.set(agreement.agreement_id, phase);
        this.auditLogger?.logPhaseNotice(agreement.agreement_id, phase, snapshot.ms_remaining);
        if (phase === CompliancePhase.WARNING) {
          this.notify('onWarning', (n) => n.onWarning?.(snapshot));
          counters.warnings++;
          evaluation.action = 'warned';
        } else {
          this.notify('onGraceStarted', (n) => n.onGraceStarted?.(snapshot));
          counters.grace_started++;
          evaluation.action = 'grace_started';
        }
        return evaluation;
      }

      default:
        return evaluation;
    }
  }

  private async checkSuppression(now: Date, errors: string[]): Promise<string | null> {
    if (!this.suppression) {
      return null;
    }
    try {
      if (!this.suppression.isSuppressed(now)) {
        return null;
      }
      return this.suppression.getReason?.(now) ?? 'suppressed';
    } catch (error) {
      errors.push(`Suppression check failed: ${describeError(error)}`);
      await this.errorHandler.handleError(error);
      return null;
    }
  }

  /**
   * Reads the activity signal once per distinct subject
   */
  private async readSignals(agreements: Agreement[]): Promise<Map<string | null, SignalReading>> {
    const subjects = Array.from(new Set(agreements.map((a) => a.subject_key)));
    const readings = new Map<string | null, SignalReading>();

    await Promise.all(
      subjects.map(async (subjectKey) => {
        try {
          const active = await withTimeout(
            async (signal) => this.activitySignal.isSubjectActive(subjectKey, signal),
            {
              operation: 'activity.isSubjectActive',
              timeout_ms: this.options.signal_timeout_ms,
              code: ErrorCode.COMPLIANCE_SIGNAL_TIMEOUT,
              category: ErrorCategory.COMPLIANCE,
            }
          );
          readings.set(subjectKey, { ok: true, active });
        } catch (error) {
          readings.set(subjectKey, { ok: false, error: describeError(error) });
          await this.errorHandler.handleError(
            error instanceof TimeAgreementsError
              ? error
              : new TimeAgreementsError(
                  `Activity signal failed for ${subjectKey ?? 'general activity'}: ${describeError(error)}`,
                  ErrorCode.COMPLIANCE_SIGNAL_FAILED,
                  ErrorCategory.COMPLIANCE,
                  ErrorSeverity.MEDIUM,
                  { operation: 'activity.isSubjectActive', metadata: { subject_key: subjectKey } },
                  { recoverable: true, cause: error }
                )
          );
        }
      })
    );

    return readings;
  }

  private pruneNotified(active: Agreement[]): void {
    const ids = new Set(active.map((a) => a.agreement_id));
    for (const id of Array.from(this.lastNotified.keys())) {
      if (!ids.has(id)) {
        this.lastNotified.delete(id);
      }
    }
  }

  private timingFor(agreement: Agreement): PhaseTiming {
    const policy = this.policies[agreement.category];
    return {
      grace_period_ms: policy.grace_period_ms ?? this.options.grace_period_ms,
      warning_threshold_ms: policy.warning_threshold_ms ?? this.options.warning_threshold_ms,
    };
  }

  /**
   * Calls a notifier without letting its failure reach the tick
   */
  private notify(event: NotifierEvent, invoke: (notifier: Notifier) => unknown): void {
    try {
      const pending = invoke(this.notifier);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => this.reportNotifierFailure(event, error));
      }
    } catch (error) {
      this.reportNotifierFailure(event, error);
    }
  }

  private reportNotifierFailure(event: NotifierEvent, error: unknown): void {
    this.totalErrors++;
    void this.errorHandler.handleError(
      new TimeAgreementsError(
        `Notifier ${event} failed: ${describeError(error)}`,
        ErrorCode.NOTIFICATION_FAILED,
        ErrorCategory.NOTIFICATION,
        ErrorSeverity.LOW,
        { operation: event },
        { recoverable: true, cause: error }
      )
    );
  }
}
