/**
 * Negotiation
 *
 * Per-conversation state machine from flagged behavior to agreement.
 */

export * from './types';
export { NegotiationManager, NegotiationManagerConfig } from './manager';
