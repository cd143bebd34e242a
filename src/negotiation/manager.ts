/**
 * Negotiation Manager
 *
 * Per-conversation state machine that turns free-text replies into a
 * bounded time agreement:
 *
 *   initial → proposed_time → negotiating(n) → agreement_reached
 *                    ↘              ↘
 *                     rejected (declined | cancelled)
 *
 * Every dialogue message is obtained before state changes or anything is
 * persisted, so a failed backend call leaves the conversation where it was.
 */

import { v4 as uuidv4 } from 'uuid';
import { Agreement, AuditEventType, BehavioralEvent } from '../types';
import { AgreementFactory } from '../agreements/factory';
import { AgreementRepository } from '../storage/repository';
import { AuditLogger } from '../audit/logger';
import { ResponseParser } from '../parser';
import {
  CategoryPolicy,
  CategoryPolicyTable,
  DEFAULT_CATEGORY_POLICIES,
  clampToPolicy,
  isWithinPolicy,
} from '../policy';
import {
  CentralErrorHandler,
  DialogueError,
  ErrorCategory,
  ErrorCode,
  InvalidStateError,
  NegotiationFailedError,
  ParseAmbiguousError,
  TimeAgreementsError,
  ErrorSeverity,
  describeError,
  getDefaultErrorHandler,
} from '../errors';
import { Clock, systemClock } from '../utils/clock';
import { withTimeout } from '../utils/timeout';
import { DEFAULT_NEGOTIATION_OPTIONS } from '../config';
import {
  DialogueBackend,
  NegotiationOptions,
  NegotiationOutcome,
  NegotiationResponse,
  NegotiationState,
  PromptContext,
  PromptPurpose,
  TranscriptTurn,
} from './types';

export interface NegotiationManagerConfig {
  backend: DialogueBackend;
  repository: AgreementRepository;
  policies?: CategoryPolicyTable;
  parser?: ResponseParser;
  clock?: Clock;
  auditLogger?: AuditLogger;
  errorHandler?: CentralErrorHandler;
  options?: Partial<NegotiationOptions>;
  /** Defaults to a fresh uuid */
  conversationId?: string;
}

interface PromptDetails {
  requested_ms?: number | null;
  offer_ms?: number | null;
  user_message?: string | null;
}

function isTerminal(state: NegotiationState): boolean {
  return state.kind === 'agreement_reached' || state.kind === 'rejected';
}

export class NegotiationManager {
  private readonly backend: DialogueBackend;
  private readonly repository: AgreementRepository;
  private readonly policies: CategoryPolicyTable;
  private readonly parser: ResponseParser;
  private readonly clock: Clock;
  private readonly auditLogger?: AuditLogger;
  private readonly errorHandler: CentralErrorHandler;
  private readonly options: NegotiationOptions;
  private readonly conversationId: string;

  private state: NegotiationState = { kind: 'initial' };
  private round = 0;
  private clarifications = 0;
  private event?: BehavioralEvent;
  private transcript: TranscriptTurn[] = [];
  private controller = new AbortController();
  private busy = false;
  private persisting = false;

  constructor(config: NegotiationManagerConfig) {
    this.backend = config.backend;
    this.repository = config.repository;
    this.policies = config.policies ?? DEFAULT_CATEGORY_POLICIES;
    this.parser = config.parser ?? new ResponseParser();
    this.clock = config.clock ?? systemClock;
    this.auditLogger = config.auditLogger;
    this.errorHandler = config.errorHandler ?? getDefaultErrorHandler();
    this.options = { ...DEFAULT_NEGOTIATION_OPTIONS, ...config.options };
    this.conversationId = config.conversationId ?? uuidv4();
  }

  /**
   * Opens the negotiation for a flagged behavior. Categories that are not
   * negotiable end here with a zero-duration agreement.
   */
  async startNegotiation(event: BehavioralEvent): Promise<NegotiationResponse> {
    this.assertState(['initial'], 'start negotiation');

    return this.exclusive(async () => {
      this.event = event;
      const policy = this.policy();

      if (!policy.negotiable) {
        const message = await this.ask('immediate_stop', { offer_ms: 0 });
        this.auditLogger?.logNegotiation(AuditEventType.NEGOTIATION_STARTED, this.conversationId, {
          category: event.category,
          negotiable: false,
        });
        return this.conclude(message, 0, 'agreement');
      }

      const message = await this.ask('opening');
      this.state = { kind: 'proposed_time', candidate_ms: null };
      this.say(message);
      this.auditLogger?.logNegotiation(AuditEventType.NEGOTIATION_STARTED, this.conversationId, {
        category: event.category,
        subject_key: event.subject_key,
        elapsed_ms: event.elapsed_ms,
      });
      return this.respond(message, 'opened');
    });
  }

  /**
   * Handles one user reply
   */
  async processUserReply(text: string): Promise<NegotiationResponse> {
    this.assertState(['proposed_time', 'negotiating'], 'process a reply');

    return this.exclusive(async () => {
      if (this.parser.isDecline(text)) {
        const message = await this.ask('declined', { user_message: text });
        this.hear(text);
        this.state = { kind: 'rejected', reason: 'user_declined' };
        this.say(message);
        this.auditLogger?.logNegotiation(
          AuditEventType.NEGOTIATION_REJECTED,
          this.conversationId,
          { round: this.round },
          'user_declined'
        );
        return this.respond(message, 'declined');
      }

      const result = this.parser.parse(text);
      if (!result.parsed) {
        return this.handleUnparsed(text);
      }

      const policy = this.policy();
      const requested = result.duration_ms;

      if (isWithinPolicy(requested, policy)) {
        const message = await this.ask('accepted', {
          requested_ms: requested,
          offer_ms: requested,
          user_message: text,
        });
        return this.conclude(message, requested, 'agreement', { userText: text });
      }

      const clamped = clampToPolicy(requested, policy);
      const next = this.round + 1;

      if (next >= this.options.max_rounds) {
        const message = await this.ask('compromise', {
          requested_ms: requested,
          offer_ms: clamped,
          user_message: text,
        });
        return this.conclude(message, clamped, 'compromise', { userText: text, round: next });
      }

      const message = await this.ask('counter_offer', {
        requested_ms: requested,
        offer_ms: clamped,
        user_message: text,
      });
      this.hear(text);
      this.round = next;
      this.clarifications = 0;
      this.state = { kind: 'negotiating', round: next, last_offer_ms: clamped };
      this.say(message);
      this.auditLogger?.logNegotiation(AuditEventType.NEGOTIATION_COUNTER_OFFER, this.conversationId, {
        round: next,
        requested_ms: requested,
        offer_ms: clamped,
      });
      return { ...this.respond(message, 'counter_offer'), counterOfferMs: clamped };
    });
  }

  /**
   * Ends the negotiation without an agreement. Aborts a pending dialogue
   * call; the reply waiting on it resolves as cancelled.
   */
  cancelNegotiation(): NegotiationState {
    if (isTerminal(this.state)) {
      throw new InvalidStateError(this.state.kind, 'cancel negotiation', {
        conversation_id: this.conversationId,
      });
    }
    if (this.persisting) {
      throw new InvalidStateError(this.state.kind, 'cancel while the agreement is being saved', {
        conversation_id: this.conversationId,
      });
    }

    this.state = { kind: 'rejected', reason: 'user_cancelled' };
    this.controller.abort(
      new TimeAgreementsError(
        'Negotiation cancelled',
        ErrorCode.NEGOTIATION_CANCELLED,
        ErrorCategory.NEGOTIATION,
        ErrorSeverity.INFO,
        { conversation_id: this.conversationId }
      )
    );
    this.auditLogger?.logNegotiation(
      AuditEventType.NEGOTIATION_CANCELLED,
      this.conversationId,
      { round: this.round },
      'user_cancelled'
    );
    return this.getState();
  }

  getState(): NegotiationState {
    return { ...this.state };
  }

  getRound(): number {
    return this.round;
  }

  getConversationId(): string {
    return this.conversationId;
  }

  getTranscript(): TranscriptTurn[] {
    return this.transcript.map((turn) => ({ ...turn }));
  }

  isComplete(): boolean {
    return isTerminal(this.state);
  }

  private async handleUnparsed(text: string): Promise<NegotiationResponse> {
    const attempts = this.clarifications + 1;
    const policy = this.policy();

    if (attempts >= this.options.max_clarifications) {
      const message = await this.ask('default_imposed', {
        offer_ms: policy.default_duration_ms,
        user_message: text,
      });
      return this.conclude(message, policy.default_duration_ms, 'default_imposed', {
        userText: text,
      });
    }

    const message = await this.ask('clarification', { user_message: text });
    this.hear(text);
    this.clarifications = attempts;
    this.say(message);
    this.auditLogger?.logNegotiation(AuditEventType.NEGOTIATION_CLARIFICATION, this.conversationId, {
      attempt: attempts,
    });
    await this.errorHandler.handleError(
      new ParseAmbiguousError(text, { conversation_id: this.conversationId })
    );
    return this.respond(message, 'clarification');
  }

  /**
   * Persists the agreement and moves to the terminal state
   */
  private async conclude(
    message: string,
    durationMs: number,
    outcome: NegotiationOutcome,
    step: { userText?: string; round?: number } = {}
  ): Promise<NegotiationResponse> {
    const event = this.requireEvent();
    const round = step.round ?? this.round;
    const agreement: Agreement = AgreementFactory.create(
      {
        subject_key: event.subject_key,
        subject_label: event.subject_label,
        category: event.category,
        agreed_duration_ms: durationMs,
        conversation_ref: this.conversationId,
        metadata: { negotiation_round: round, outcome },
      },
      this.clock.now()
    );

    this.persisting = true;
    try {
      await this.repository.save(agreement);
    } finally {
      this.persisting = false;
    }

    if (step.userText !== undefined) {
      this.hear(step.userText);
    }
    this.round = round;
    this.state = { kind: 'agreement_reached', agreement };
    this.say(message);
    this.auditLogger?.logAgreementCreated(agreement, 'negotiation');
    return { ...this.respond(message, outcome), agreement };
  }

  /**
   * Gets the next message from the dialogue backend, bounded by a timeout
   * and retried once with backoff
   */
  private async ask(purpose: PromptPurpose, details: PromptDetails = {}): Promise<string> {
    const context = this.buildContext(purpose, details);
    const signal = this.controller.signal;

    let message: string;
    try {
      message = await this.errorHandler.handleWithRetry(
        async () => {
          const text = await withTimeout((callSignal) => this.backend.generate(context, callSignal), {
            operation: 'dialogue.generate',
            timeout_ms: this.options.dialogue_timeout_ms,
            code: ErrorCode.DIALOGUE_TIMEOUT,
            category: ErrorCategory.DIALOGUE,
            signal,
          });
          if (text.trim() === '') {
            throw new DialogueError(
              'Dialogue backend returned an empty message',
              ErrorCode.DIALOGUE_BACKEND_FAILED,
              { conversation_id: this.conversationId, operation: `dialogue.${purpose}` }
            );
          }
          return text;
        },
        ErrorCategory.DIALOGUE,
        {
          operation: `dialogue.${purpose}`,
          metadata: { conversation_id: this.conversationId },
          strategy: {
            max_retries: 1,
            base_delay_ms: this.options.retry_base_delay_ms,
            exponential_backoff: true,
            max_delay_ms: this.options.dialogue_timeout_ms,
          },
          shouldRetry: () => !signal.aborted,
        }
      );
    } catch (error) {
      if (signal.aborted) {
        throw new CancelledDuringCall();
      }
      this.auditLogger?.logNegotiation(
        AuditEventType.NEGOTIATION_FAILED,
        this.conversationId,
        { purpose, state: this.state.kind },
        describeError(error)
      );
      throw new NegotiationFailedError(
        describeError(error),
        { conversation_id: this.conversationId, operation: `dialogue.${purpose}` },
        { cause: error }
      );
    }

    if (signal.aborted) {
      throw new CancelledDuringCall();
    }
    return message;
  }

  private buildContext(purpose: PromptPurpose, details: PromptDetails): PromptContext {
    const event = this.requireEvent();
    const policy = this.policy();

    return {
      conversation_id: this.conversationId,
      purpose,
      category: event.category,
      subject_key: event.subject_key,
      subject_label: event.subject_label ?? event.subject_key ?? 'General activity',
      elapsed_ms: event.elapsed_ms,
      recent_history: [...(event.recent_history ?? [])],
      round: this.round,
      max_rounds: this.options.max_rounds,
      requested_ms: details.requested_ms ?? null,
      offer_ms: details.offer_ms ?? null,
      min_duration_ms: policy.min_duration_ms,
      max_duration_ms: policy.max_duration_ms,
      default_duration_ms: policy.default_duration_ms,
      user_message: details.user_message ?? null,
      transcript: this.getTranscript(),
    };
  }

  /**
   * Runs one step at a time; a cancel during the step turns it into a
   * cancelled response
   */
  private async exclusive(step: () => Promise<NegotiationResponse>): Promise<NegotiationResponse> {
    if (this.busy) {
      throw new InvalidStateError(this.state.kind, 'handle a reply while another is pending', {
        conversation_id: this.conversationId,
      });
    }

    this.busy = true;
    try {
      return await step();
    } catch (error) {
      if (error instanceof CancelledDuringCall) {
        return this.respond('', 'cancelled');
      }
      throw error;
    } finally {
      this.busy = false;
    }
  }

  private assertState(allowed: NegotiationState['kind'][], attempted: string): void {
    if (!allowed.includes(this.state.kind)) {
      throw new InvalidStateError(this.state.kind, attempted, {
        conversation_id: this.conversationId,
      });
    }
  }

  private respond(message: string, outcome: NegotiationOutcome): NegotiationResponse {
    return {
      message,
      state: this.getState(),
      outcome,
      round: this.round,
      isComplete: this.isComplete(),
    };
  }

  private policy(): CategoryPolicy {
    return this.policies[this.requireEvent().category];
  }

  private requireEvent(): BehavioralEvent {
    if (!this.event) {
      throw new InvalidStateError(this.state.kind, 'continue before negotiation started', {
        conversation_id: this.conversationId,
      });
    }
    return this.event;
  }

  private say(text: string): void {
    this.transcript.push({ role: 'assistant', text, at: this.clock.now() });
  }

  private hear(text: string): void {
    this.transcript.push({ role: 'user', text, at: this.clock.now() });
  }
}

/**
 * Raised internally when cancelNegotiation() aborts a pending call
 */
class CancelledDuringCall extends Error {
  constructor() {
    super('Negotiation cancelled during dialogue call');
    this.name = 'CancelledDuringCall';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
