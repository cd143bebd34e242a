/**
 * Audit Logger
 *
 * All agreement transitions, negotiation steps and enforcement decisions
 * are logged and irreversible in audit history.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Agreement,
  AgreementStatus,
  AuditEvent,
  AuditEventType,
  AuditQueryOptions,
  CompliancePhase,
  EnforcementOutcome,
  EnforcementResult,
} from '../types';
import { Clock, systemClock } from '../utils/clock';

export class AuditLogger {
  private events: AuditEvent[] = [];

  constructor(private clock: Clock = systemClock) {}

  /**
   * Logs agreement creation
   */
  logAgreementCreated(agreement: Agreement, actor: string): void {
    this.log({
      event_type: AuditEventType.AGREEMENT_CREATED,
      agreement_id: agreement.agreement_id,
      conversation_id: agreement.conversation_ref ?? undefined,
      actor,
      new_status: AgreementStatus.ACTIVE,
      details: {
        subject_key: agreement.subject_key,
        category: agreement.category,
        agreed_duration_ms: agreement.agreed_duration_ms,
        expires_at: agreement.expires_at.toISOString(),
      },
    });
  }

  /**
   * Logs an extension: the original closes and a successor starts
   */
  logAgreementExtended(original: Agreement, successor: Agreement, actor: string): void {
    this.log({
      event_type: AuditEventType.AGREEMENT_EXTENDED,
      agreement_id: original.agreement_id,
      actor,
      previous_status: AgreementStatus.ACTIVE,
      new_status: AgreementStatus.COMPLETED,
      details: {
        successor_id: successor.agreement_id,
        successor_duration_ms: successor.agreed_duration_ms,
      },
    });
  }

  /**
   * Logs a status transition out of ACTIVE
   */
  logStatusTransition(
    agreementId: string,
    actor: string,
    newStatus: AgreementStatus.COMPLETED | AgreementStatus.VIOLATED,
    details: Record<string, unknown> = {}
  ): void {
    this.log({
      event_type:
        newStatus === AgreementStatus.VIOLATED
          ? AuditEventType.AGREEMENT_VIOLATED
          : AuditEventType.AGREEMENT_COMPLETED,
      agreement_id: agreementId,
      actor,
      previous_status: AgreementStatus.ACTIVE,
      new_status: newStatus,
      details,
    });
  }

  /**
   * Logs a negotiation step
   */
  logNegotiation(
    eventType:
      | AuditEventType.NEGOTIATION_STARTED
      | AuditEventType.NEGOTIATION_COUNTER_OFFER
      | AuditEventType.NEGOTIATION_CLARIFICATION
      | AuditEventType.NEGOTIATION_REJECTED
      | AuditEventType.NEGOTIATION_CANCELLED
      | AuditEventType.NEGOTIATION_FAILED,
    conversationId: string,
    details: Record<string, unknown> = {},
    reason?: string
  ): void {
    this.log({
      event_type: eventType,
      agreement_id: 'none',
      conversation_id: conversationId,
      actor: 'negotiation',
      reason,
      details,
    });
  }

  /**
   * Logs the first entry into WARNING or EXPIRED_GRACE
   */
  logPhaseNotice(
    agreementId: string,
    phase: CompliancePhase.WARNING | CompliancePhase.EXPIRED_GRACE,
    msRemaining: number
  ): void {
    this.log({
      event_type:
        phase === CompliancePhase.WARNING
          ? AuditEventType.WARNING_ISSUED
          : AuditEventType.GRACE_STARTED,
      agreement_id: agreementId,
      actor: 'system',
      details: { ms_remaining: msRemaining },
    });
  }

  /**
   * Logs an enforcement attempt
   */
  logEnforcement(agreementId: string, result: EnforcementResult): void {
    const succeeded = result.outcome === EnforcementOutcome.SUCCESS;
    this.log({
      event_type: succeeded ? AuditEventType.ENFORCEMENT_APPLIED : AuditEventType.ENFORCEMENT_FAILED,
      agreement_id: agreementId,
      actor: 'system',
      reason: 'reason' in result ? result.reason : undefined,
      details: { ...result },
    });
  }

  /**
   * Logs a tick skipped by quiet hours or snooze
   */
  logTickSuppressed(reason: string): void {
    this.log({
      event_type: AuditEventType.TICK_SUPPRESSED,
      agreement_id: 'system',
      actor: 'system',
      reason,
      details: {},
    });
  }

  /**
   * Core logging method
   */
  private log(eventData: Omit<AuditEvent, 'event_id' | 'timestamp'>): void {
    const event: AuditEvent = {
      event_id: uuidv4(),
      timestamp: this.clock.now(),
      ...eventData,
    };

    this.events.push(event);
  }

  /**
   * Queries audit log, newest first
   */
  query(options: AuditQueryOptions = {}): AuditEvent[] {
    const { start_time, end_time } = options;
    let results = this.events.map((e, index) => ({ e, index }));

    if (options.agreement_id) {
      results = results.filter(({ e }) => e.agreement_id === options.agreement_id);
    }

    if (options.conversation_id) {
      results = results.filter(({ e }) => e.conversation_id === options.conversation_id);
    }

    if (options.event_type) {
      results = results.filter(({ e }) => e.event_type === options.event_type);
    }

    if (options.actor) {
      results = results.filter(({ e }) => e.actor === options.actor);
    }

    if (start_time) {
      results = results.filter(({ e }) => e.timestamp >= start_time);
    }

    if (end_time) {
      results = results.filter(({ e }) => e.timestamp <= end_time);
    }

    // Newest first; events logged at the same instant keep reverse log order
    results.sort(
      (a, b) => b.e.timestamp.getTime() - a.e.timestamp.getTime() || b.index - a.index
    );

    const offset = options.offset ?? 0;
    const limit = options.limit ?? results.length;

    return results.slice(offset, offset + limit).map(({ e }) => e);
  }

  /**
   * Gets all events for an agreement
   */
  getAgreementHistory(agreementId: string): AuditEvent[] {
    return this.query({ agreement_id: agreementId });
  }

  /**
   * Gets all events for a negotiation conversation
   */
  getConversationHistory(conversationId: string): AuditEvent[] {
    return this.query({ conversation_id: conversationId });
  }

  /**
   * Gets all violations
   */
  getViolations(options: Omit<AuditQueryOptions, 'event_type'> = {}): AuditEvent[] {
    return this.query({
      ...options,
      event_type: AuditEventType.AGREEMENT_VIOLATED,
    });
  }

  /**
   * Export audit log (immutable)
   */
  export(): AuditEvent[] {
    return [...this.events];
  }

  /**
   * Get event count
   */
  getEventCount(): number {
    return this.events.length;
  }
}
