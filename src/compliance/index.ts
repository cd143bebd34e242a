/**
 * Compliance
 *
 * Tick-driven tracking of active agreements.
 */

export * from './types';
export { derivePhase, isForward } from './phase';
export {
  SuppressionController,
  SuppressionControllerConfig,
  SuppressionReason,
  SnoozeResult,
  isWithinQuietHours,
} from './suppression';
export { ComplianceTracker, ComplianceTrackerConfig } from './tracker';
