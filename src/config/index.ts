/**
 * Configuration
 *
 * Defaults for every tunable, merged with host overrides and validated.
 */

import { AgreementCategory } from '../types';
import { ConfigError } from '../errors';
import { CategoryPolicy, CategoryPolicyTable, resolvePolicies } from '../policy';
import { NegotiationOptions } from '../negotiation/types';
import { ResponseParserConfig } from '../parser/types';
import { DEFAULT_PARSER_CONFIG } from '../parser/response-parser';

export interface ComplianceOptions {
  /** Tick interval */
  interval_ms: number;
  /** How long past expiry the subject may stay active before a violation */
  grace_period_ms: number;
  /** Remaining time at which the warning fires */
  warning_threshold_ms: number;
  /** Bound on each activity signal read */
  signal_timeout_ms: number;
  /** Bound on each ambient monitor check */
  ambient_timeout_ms: number;
  /** Bound on each actuator call */
  actuator_timeout_ms: number;
}

export interface QuietHoursConfig {
  enabled: boolean;
  /** Minutes since midnight, 0-1439 */
  start_minute: number;
  /** Minutes since midnight, 0-1439; may be before start for overnight ranges */
  end_minute: number;
}

export interface TimeAgreementsConfig {
  negotiation: NegotiationOptions;
  compliance: ComplianceOptions;
  parser: ResponseParserConfig;
  quiet_hours: QuietHoursConfig;
  /** Refuses snooze requests */
  strict_mode: boolean;
  policies: CategoryPolicyTable;
}

export interface TimeAgreementsConfigInput {
  negotiation?: Partial<NegotiationOptions>;
  compliance?: Partial<ComplianceOptions>;
  parser?: Partial<ResponseParserConfig>;
  quiet_hours?: Partial<QuietHoursConfig>;
  strict_mode?: boolean;
  policies?: Partial<Record<AgreementCategory, Partial<CategoryPolicy>>>;
}

export const DEFAULT_NEGOTIATION_OPTIONS: NegotiationOptions = {
  max_rounds: 3,
  max_clarifications: 5,
  dialogue_timeout_ms: 5000,
  retry_base_delay_ms: 500,
};

export const DEFAULT_COMPLIANCE_OPTIONS: ComplianceOptions = {
  interval_ms: 2000,
  grace_period_ms: 30000,
  warning_threshold_ms: 60000,
  signal_timeout_ms: 3000,
  ambient_timeout_ms: 3000,
  actuator_timeout_ms: 5000,
};

export const DEFAULT_QUIET_HOURS: QuietHoursConfig = {
  enabled: false,
  start_minute: 23 * 60,
  end_minute: 7 * 60,
};

const MINUTES_PER_DAY = 1440;

/**
 * Merges overrides onto the defaults and validates the result
 */
export function resolveConfig(input: TimeAgreementsConfigInput = {}): TimeAgreementsConfig {
  const config: TimeAgreementsConfig = {
    negotiation: { ...DEFAULT_NEGOTIATION_OPTIONS, ...input.negotiation },
    compliance: { ...DEFAULT_COMPLIANCE_OPTIONS, ...input.compliance },
    parser: { ...DEFAULT_PARSER_CONFIG, ...input.parser },
    quiet_hours: { ...DEFAULT_QUIET_HOURS, ...input.quiet_hours },
    strict_mode: input.strict_mode ?? false,
    policies: resolvePolicies(input.policies),
  };

  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join(', ')}`, {
      metadata: { errors },
    });
  }

  return config;
}

/**
 * Returns one message per invalid setting
 */
export function validateConfig(config: TimeAgreementsConfig): string[] {
  const errors: string[] = [];

  const positive: Array<[string, number]> = [
    ['negotiation.dialogue_timeout_ms', config.negotiation.dialogue_timeout_ms],
    ['compliance.interval_ms', config.compliance.interval_ms],
    ['compliance.signal_timeout_ms', config.compliance.signal_timeout_ms],
    ['compliance.ambient_timeout_ms', config.compliance.ambient_timeout_ms],
    ['compliance.actuator_timeout_ms', config.compliance.actuator_timeout_ms],
    ['negotiation.max_rounds', config.negotiation.max_rounds],
    ['negotiation.max_clarifications', config.negotiation.max_clarifications],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${name} must be a positive integer`);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ['negotiation.retry_base_delay_ms', config.negotiation.retry_base_delay_ms],
    ['compliance.grace_period_ms', config.compliance.grace_period_ms],
    ['compliance.warning_threshold_ms', config.compliance.warning_threshold_ms],
    ['parser.short_default_ms', config.parser.short_default_ms],
    ['parser.minimal_default_ms', config.parser.minimal_default_ms],
  ];
  for (const [name, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) {
      errors.push(`${name} must be non-negative`);
    }
  }

  for (const [name, value] of [
    ['quiet_hours.start_minute', config.quiet_hours.start_minute],
    ['quiet_hours.end_minute', config.quiet_hours.end_minute],
  ] as const) {
    if (!Number.isInteger(value) || value < 0 || value >= MINUTES_PER_DAY) {
      errors.push(`${name} must be between 0 and ${MINUTES_PER_DAY - 1}`);
    }
  }

  return errors;
}
