/**
 * Time Agreements
 *
 * Negotiates short, bounded time agreements with the user ("5 more
 * minutes"), tracks them against live activity and enforces the ones that
 * are broken.
 *
 * @packageDocumentation
 */

// Main system
export { TimeAgreementsSystem, TimeAgreementsSystemConfig } from './system';

// Types
export * from './types';

// Parsing
export * from './parser';

// Agreements
export {
  AgreementFactory,
  AgreementDraft,
  AgreementValidator,
  msRemaining,
  progressPercentage,
  formatDuration,
  toMinutes,
} from './agreements';

// Policy
export {
  CategoryPolicy,
  CategoryPolicyTable,
  DEFAULT_CATEGORY_POLICIES,
  resolvePolicies,
  clampToPolicy,
  isWithinPolicy,
} from './policy';

// Negotiation
export * from './negotiation';

// Storage
export {
  AgreementRepository,
  AgreementRepositoryConfig,
  AgreementStats,
  ExtensionResult,
} from './storage/repository';
export {
  StorageAdapter,
  SerializedAgreement,
  serializeAgreement,
  deserializeAgreement,
} from './storage/adapter';
export { MemoryStorageAdapter } from './storage/memory-adapter';
export { FileStorageAdapter, FileStorageConfig } from './storage/file-adapter';

// Compliance
export * from './compliance';

// Enforcement
export * from './enforcement';

// Audit
export { AuditLogger } from './audit/logger';

// Configuration
export * from './config';

// Errors
export * from './errors';

// Utilities
export { Clock, systemClock, MINUTE_MS, HOUR_MS } from './utils/clock';
export { withTimeout, TimeoutOptions } from './utils/timeout';
