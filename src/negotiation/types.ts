/**
 * Negotiation Types
 */

import { Agreement, AgreementCategory } from '../types';

export type RejectionReason = 'user_cancelled' | 'user_declined';

/**
 * Negotiation state. `agreement_reached` and `rejected` are terminal.
 */
export type NegotiationState =
  | { kind: 'initial' }
  | { kind: 'proposed_time'; candidate_ms: number | null }
  | { kind: 'negotiating'; round: number; last_offer_ms: number }
  | { kind: 'agreement_reached'; agreement: Agreement }
  | { kind: 'rejected'; reason: RejectionReason };

export type NegotiationStateKind = NegotiationState['kind'];

/**
 * What the dialogue backend is being asked to say
 */
export type PromptPurpose =
  | 'opening'
  | 'immediate_stop'
  | 'accepted'
  | 'counter_offer'
  | 'compromise'
  | 'clarification'
  | 'default_imposed'
  | 'declined';

export interface TranscriptTurn {
  role: 'assistant' | 'user';
  text: string;
  at: Date;
}

/**
 * Everything the dialogue backend gets to write its next message
 */
export interface PromptContext {
  conversation_id: string;
  purpose: PromptPurpose;
  category: AgreementCategory;
  subject_key: string | null;
  subject_label: string;
  /** How long the flagged behavior has been going on */
  elapsed_ms: number;
  recent_history: string[];
  round: number;
  max_rounds: number;
  /** Duration the user asked for in the reply being answered */
  requested_ms: number | null;
  /** Duration being offered or agreed */
  offer_ms: number | null;
  min_duration_ms: number;
  max_duration_ms: number;
  default_duration_ms: number;
  /** The reply being answered */
  user_message: string | null;
  transcript: TranscriptTurn[];
}

/**
 * Dialogue backend port: prompt in, text out
 */
export interface DialogueBackend {
  generate(context: PromptContext, signal?: AbortSignal): Promise<string>;
}

export type NegotiationOutcome =
  | 'opened'
  | 'agreement'
  | 'counter_offer'
  | 'compromise'
  | 'clarification'
  | 'default_imposed'
  | 'declined'
  | 'cancelled';

/**
 * Result of one negotiation step
 */
export interface NegotiationResponse {
  /** Message to show the user */
  message: string;
  state: NegotiationState;
  outcome: NegotiationOutcome;
  round: number;
  /** Whether the negotiation has ended */
  isComplete: boolean;
  /** The persisted agreement (when one was reached) */
  agreement?: Agreement;
  /** The clamped duration being proposed back to the user */
  counterOfferMs?: number;
}

export interface NegotiationOptions {
  /** Out-of-bounds offers allowed before a compromise is forced */
  max_rounds: number;
  /** Consecutive unparsed replies before the category default is imposed */
  max_clarifications: number;
  dialogue_timeout_ms: number;
  /** First retry delay for a failed dialogue call; doubles per retry */
  retry_base_delay_ms: number;
}
