/**
 * Phase derivation for active agreements
 */

import { CompliancePhase, PHASE_RANK } from '../types';
import { PhaseTiming } from './types';

/**
 * Derives the phase of an ACTIVE agreement. Checked in priority order:
 * violation, completion, grace, warning, safe.
 */
export function derivePhase(
  msRemaining: number,
  subjectActive: boolean,
  timing: PhaseTiming
): CompliancePhase {
  if (msRemaining <= -timing.grace_period_ms && subjectActive) {
    return CompliancePhase.VIOLATION;
  }
  if (msRemaining <= 0 && !subjectActive) {
    return CompliancePhase.COMPLETED;
  }
  if (msRemaining <= 0) {
    return CompliancePhase.EXPIRED_GRACE;
  }
  if (msRemaining <= timing.warning_threshold_ms) {
    return CompliancePhase.WARNING;
  }
  return CompliancePhase.SAFE;
}

/**
 * True when `next` does not come before `previous`
 */
export function isForward(previous: CompliancePhase, next: CompliancePhase): boolean {
  return PHASE_RANK[next] >= PHASE_RANK[previous];
}
