/**
 * Time Agreement Types
 *
 * A time agreement is a short, bounded commitment reached with the user
 * ("5 more minutes") and tracked against live activity until it is either
 * honored or broken.
 */

/**
 * Agreement status. Transitions are forward-only: ACTIVE → COMPLETED | VIOLATED.
 */
export enum AgreementStatus {
  ACTIVE = 'active',
  COMPLETED = 'completed',
  VIOLATED = 'violated',
}

/**
 * Activity categories used for policy lookups
 */
export enum AgreementCategory {
  GENERAL = 'general',
  SOCIAL_MEDIA = 'social_media',
  VIDEO = 'video',
  GAMES = 'games',
  NEWS = 'news',
  SHOPPING = 'shopping',
  /** Not negotiable: the agreement is an immediate stop */
  ADULT_CONTENT = 'adult_content',
}

/**
 * Persisted time agreement
 */
export interface Agreement {
  /** Unique agreement identifier */
  agreement_id: string;
  /** App, site or category key the agreement is about (null for general activity) */
  subject_key: string | null;
  /** Display name of the subject */
  subject_label: string;
  /** Category used for default policy lookups */
  category: AgreementCategory;
  /** Agreed duration, fixed at creation */
  agreed_duration_ms: number;
  /** Creation timestamp */
  created_at: Date;
  /** created_at + agreed_duration_ms */
  expires_at: Date;
  /** Current status */
  status: AgreementStatus;
  /** Set exactly once on ACTIVE → VIOLATED */
  violated_at: Date | null;
  /** Set exactly once on ACTIVE → COMPLETED */
  completed_at: Date | null;
  /** Negotiation conversation that produced the agreement */
  conversation_ref: string | null;
  /** Predecessor agreement when this one was created by an extension */
  extended_from: string | null;
  metadata?: Record<string, unknown>;
}

/**
 * Event emitted by the behavior source when a negotiation should start
 */
export interface BehavioralEvent {
  event_id?: string;
  category: AgreementCategory;
  subject_key: string | null;
  subject_label?: string;
  /** How long the flagged behavior has been going on */
  elapsed_ms: number;
  detected_at?: Date;
  /** Short descriptions of recent related activity, oldest first */
  recent_history?: string[];
  metadata?: Record<string, unknown>;
}

/**
 * Derived urgency of an active agreement at a point in time
 */
export enum CompliancePhase {
  SAFE = 'safe',
  WARNING = 'warning',
  EXPIRED_GRACE = 'expired_grace',
  VIOLATION = 'violation',
  COMPLETED = 'completed',
}

/**
 * Phase ordering: SAFE < WARNING < EXPIRED_GRACE < {VIOLATION, COMPLETED}
 */
export const PHASE_RANK: Record<CompliancePhase, number> = {
  [CompliancePhase.SAFE]: 0,
  [CompliancePhase.WARNING]: 1,
  [CompliancePhase.EXPIRED_GRACE]: 2,
  [CompliancePhase.VIOLATION]: 3,
  [CompliancePhase.COMPLETED]: 3,
};

/**
 * Instantaneous view of one agreement during a tick
 */
export interface ComplianceSnapshot {
  agreement: Agreement;
  ms_remaining: number;
  phase: CompliancePhase;
}

/**
 * Outcome of an enforcement attempt
 */
export enum EnforcementOutcome {
  SUCCESS = 'success',
  ACTUATOR_UNAVAILABLE = 'actuator_unavailable',
  ACTUATOR_FAILED = 'actuator_failed',
}

export type EnforcementResult =
  | { outcome: EnforcementOutcome.SUCCESS; actuator?: string }
  | { outcome: EnforcementOutcome.ACTUATOR_UNAVAILABLE; reason?: string }
  | { outcome: EnforcementOutcome.ACTUATOR_FAILED; reason: string; actuator?: string };

/**
 * Agreement validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
