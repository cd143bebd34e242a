/**
 * Compliance Tracking Types
 *
 * Ports the tracker consumes and the results it reports.
 */

import { CompliancePhase, ComplianceSnapshot, EnforcementResult } from '../types';

/**
 * Live activity source: is the subject of an agreement in use right now?
 */
export interface ActivitySignal {
  isSubjectActive(subjectKey: string | null, signal?: AbortSignal): Promise<boolean> | boolean;
}

/**
 * Presentation callbacks. Fire-and-forget: failures are reported and never
 * affect agreement state.
 */
export interface Notifier {
  onWarning?(snapshot: ComplianceSnapshot): void | Promise<void>;
  onGraceStarted?(snapshot: ComplianceSnapshot): void | Promise<void>;
  onViolation?(snapshot: ComplianceSnapshot, enforcement: EnforcementResult): void | Promise<void>;
  onCompleted?(snapshot: ComplianceSnapshot): void | Promise<void>;
}

export type NotifierEvent = keyof Notifier;

/**
 * Tells the tracker whether compliance checks are skipped this tick
 */
export interface SuppressionProvider {
  isSuppressed(now: Date): boolean;
  /** Why the tick is suppressed, or null */
  getReason?(now: Date): string | null;
}

/**
 * Host-level monitoring that only runs when no agreement was resolved in
 * the same tick
 */
export interface AmbientMonitor {
  /** `signal` aborts once the check runs past `ambient_timeout_ms` */
  check(now: Date, signal?: AbortSignal): void | Promise<void>;
}

export interface PhaseTiming {
  grace_period_ms: number;
  warning_threshold_ms: number;
}

export type EvaluationAction =
  | 'none'
  | 'warned'
  | 'grace_started'
  | 'violated'
  | 'completed'
  | 'skipped';

/**
 * What happened to one agreement during a tick
 */
export interface AgreementEvaluation {
  agreement_id: string;
  phase: CompliancePhase | null;
  ms_remaining: number;
  subject_active: boolean | null;
  action: EvaluationAction;
  enforcement?: EnforcementResult;
  error?: string;
}

/**
 * Result of a single tick
 */
export interface TickResult {
  tick_id: string;
  now: Date;
  suppressed: boolean;
  suppression_reason: string | null;
  agreements_checked: number;
  warnings: number;
  grace_started: number;
  violations: number;
  completions: number;
  ambient_checked: boolean;
  results: AgreementEvaluation[];
  errors: string[];
}

/**
 * Listener for tick completion
 */
export type TickListener = (result: TickResult) => void;

/**
 * Tracker statistics
 */
export interface ComplianceTrackerStats {
  isRunning: boolean;
  lastTickAt: Date | null;
  nextTickAt: Date | null;
  ticksCompleted: number;
  ticksSuppressed: number;
  totalWarnings: number;
  totalViolations: number;
  totalCompletions: number;
  totalErrors: number;
}
