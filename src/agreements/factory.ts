/**
 * Agreement Factory
 *
 * Builds ACTIVE agreements from a negotiated duration or from an extension.
 */

import { v4 as uuidv4 } from 'uuid';
import { Agreement, AgreementCategory, AgreementStatus } from '../types';
import { ValidationError } from '../errors';
import { AgreementValidator } from './validator';

export interface AgreementDraft {
  subject_key: string | null;
  subject_label?: string;
  category: AgreementCategory;
  agreed_duration_ms: number;
  conversation_ref?: string | null;
  extended_from?: string | null;
  metadata?: Record<string, unknown>;
}

export class AgreementFactory {
  /**
   * Creates an ACTIVE agreement starting at `now`
   */
  static create(draft: AgreementDraft, now: Date): Agreement {
    const agreement: Agreement = {
      agreement_id: uuidv4(),
      subject_key: draft.subject_key,
      subject_label: draft.subject_label ?? draft.subject_key ?? 'General activity',
      category: draft.category,
      agreed_duration_ms: draft.agreed_duration_ms,
      created_at: new Date(now.getTime()),
      expires_at: new Date(now.getTime() + draft.agreed_duration_ms),
      status: AgreementStatus.ACTIVE,
      violated_at: null,
      completed_at: null,
      conversation_ref: draft.conversation_ref ?? null,
      extended_from: draft.extended_from ?? null,
      metadata: draft.metadata,
    };

    const validation = AgreementValidator.validate(agreement);
    if (!validation.valid) {
      throw new ValidationError('Invalid agreement draft', validation.errors);
    }

    return agreement;
  }

  /**
   * Creates the successor of an extended agreement. The successor covers
   * whatever time the original still had plus the additional time.
   */
  static createSuccessor(original: Agreement, additionalMs: number, now: Date): Agreement {
    const remaining = Math.max(0, original.expires_at.getTime() - now.getTime());

    return AgreementFactory.create(
      {
        subject_key: original.subject_key,
        subject_label: original.subject_label,
        category: original.category,
        agreed_duration_ms: remaining + additionalMs,
        conversation_ref: original.conversation_ref,
        extended_from: original.agreement_id,
        metadata: original.metadata,
      },
      now
    );
  }
}
