/**
 * Category Policies
 *
 * Negotiation bounds, defaults and timing overrides per activity category.
 */

import { AgreementCategory } from '../types';
import { MINUTE_MS } from '../utils/clock';
import { ConfigError } from '../errors';

/**
 * Negotiation policy for one category
 */
export interface CategoryPolicy {
  /** Smallest duration the user may agree to */
  min_duration_ms: number;
  /** Largest duration the user may agree to */
  max_duration_ms: number;
  /** Duration imposed when the user never names one */
  default_duration_ms: number;
  /** When false the agreement is an immediate stop with no dialogue */
  negotiable: boolean;
  /** Overrides the tracker's warning threshold */
  warning_threshold_ms?: number;
  /** Overrides the tracker's grace period */
  grace_period_ms?: number;
}

export type CategoryPolicyTable = Record<AgreementCategory, CategoryPolicy>;

function minutes(min: number, max: number, fallback: number): CategoryPolicy {
  return {
    min_duration_ms: min * MINUTE_MS,
    max_duration_ms: max * MINUTE_MS,
    default_duration_ms: fallback * MINUTE_MS,
    negotiable: true,
  };
}

export const DEFAULT_CATEGORY_POLICIES: CategoryPolicyTable = {
  [AgreementCategory.GENERAL]: minutes(1, 60, 10),
  [AgreementCategory.SOCIAL_MEDIA]: minutes(1, 30, 10),
  [AgreementCategory.VIDEO]: minutes(1, 60, 15),
  [AgreementCategory.GAMES]: minutes(1, 60, 15),
  [AgreementCategory.NEWS]: minutes(1, 20, 5),
  [AgreementCategory.SHOPPING]: minutes(1, 20, 5),
  [AgreementCategory.ADULT_CONTENT]: {
    min_duration_ms: 0,
    max_duration_ms: 0,
    default_duration_ms: 0,
    negotiable: false,
  },
};

/**
 * Merges per-category overrides onto the defaults and checks the bounds
 */
export function resolvePolicies(
  overrides: Partial<Record<AgreementCategory, Partial<CategoryPolicy>>> = {}
): CategoryPolicyTable {
  const table: CategoryPolicyTable = { ...DEFAULT_CATEGORY_POLICIES };

  for (const category of Object.values(AgreementCategory)) {
    const override = overrides[category];
    if (!override) continue;
    const policy: CategoryPolicy = { ...table[category], ...override };
    validatePolicy(category, policy);
    table[category] = policy;
  }

  return table;
}

function validatePolicy(category: AgreementCategory, policy: CategoryPolicy): void {
  const errors: string[] = [];

  if (policy.min_duration_ms < 0) {
    errors.push('min_duration_ms must be non-negative');
  }
  if (policy.max_duration_ms < policy.min_duration_ms) {
    errors.push('max_duration_ms must not be below min_duration_ms');
  }
  if (
    policy.default_duration_ms < policy.min_duration_ms ||
    policy.default_duration_ms > policy.max_duration_ms
  ) {
    errors.push('default_duration_ms must lie within the bounds');
  }
  if (policy.warning_threshold_ms !== undefined && policy.warning_threshold_ms < 0) {
    errors.push('warning_threshold_ms must be non-negative');
  }
  if (policy.grace_period_ms !== undefined && policy.grace_period_ms < 0) {
    errors.push('grace_period_ms must be non-negative');
  }

  if (errors.length > 0) {
    throw new ConfigError(`Invalid policy for ${category}: ${errors.join(', ')}`, {
      metadata: { category },
    });
  }
}

/**
 * Clamps a duration to the nearest policy bound
 */
export function clampToPolicy(durationMs: number, policy: CategoryPolicy): number {
  return Math.min(policy.max_duration_ms, Math.max(policy.min_duration_ms, durationMs));
}

export function isWithinPolicy(durationMs: number, policy: CategoryPolicy): boolean {
  return durationMs >= policy.min_duration_ms && durationMs <= policy.max_duration_ms;
}
