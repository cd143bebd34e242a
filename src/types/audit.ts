/**
 * Audit and Logging Types
 *
 * Every agreement transition, negotiation step and enforcement decision is
 * appended to the audit history and never rewritten.
 */

import { AgreementStatus } from './agreement';

/**
 * Audit event types
 */
export enum AuditEventType {
  AGREEMENT_CREATED = 'agreement_created',
  AGREEMENT_EXTENDED = 'agreement_extended',
  AGREEMENT_COMPLETED = 'agreement_completed',
  AGREEMENT_VIOLATED = 'agreement_violated',
  NEGOTIATION_STARTED = 'negotiation_started',
  NEGOTIATION_COUNTER_OFFER = 'negotiation_counter_offer',
  NEGOTIATION_CLARIFICATION = 'negotiation_clarification',
  NEGOTIATION_REJECTED = 'negotiation_rejected',
  NEGOTIATION_CANCELLED = 'negotiation_cancelled',
  NEGOTIATION_FAILED = 'negotiation_failed',
  WARNING_ISSUED = 'warning_issued',
  GRACE_STARTED = 'grace_started',
  ENFORCEMENT_APPLIED = 'enforcement_applied',
  ENFORCEMENT_FAILED = 'enforcement_failed',
  TICK_SUPPRESSED = 'tick_suppressed',
}

/**
 * Audit event entry
 */
export interface AuditEvent {
  /** Unique event identifier */
  event_id: string;
  /** Event timestamp */
  timestamp: Date;
  /** Type of audit event */
  event_type: AuditEventType;
  /** Agreement this event relates to ('system' for tick-level events) */
  agreement_id: string;
  /** Negotiation conversation this event relates to */
  conversation_id?: string;
  /** Actor who triggered the event */
  actor: string;
  previous_status?: AgreementStatus;
  new_status?: AgreementStatus;
  /** Reason for the decision */
  reason?: string;
  details: Record<string, unknown>;
}

/**
 * Audit log query options
 */
export interface AuditQueryOptions {
  agreement_id?: string;
  conversation_id?: string;
  event_type?: AuditEventType;
  actor?: string;
  start_time?: Date;
  end_time?: Date;
  limit?: number;
  offset?: number;
}
