/**
 * Agreement Validator
 *
 * Structural checks on agreement records, run on every write and again when
 * records are loaded back from storage.
 */

import { Agreement, AgreementCategory, AgreementStatus, ValidationResult } from '../types';

export class AgreementValidator {
  /**
   * Validates a complete agreement
   */
  static validate(agreement: Agreement): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!agreement.agreement_id || agreement.agreement_id.trim() === '') {
      errors.push('Agreement ID is required');
    }

    if (!Object.values(AgreementCategory).includes(agreement.category)) {
      errors.push(`Invalid category: ${agreement.category}`);
    }

    if (!Number.isInteger(agreement.agreed_duration_ms) || agreement.agreed_duration_ms < 0) {
      errors.push('Agreed duration must be a non-negative whole number of milliseconds');
    }

    if (agreement.expires_at < agreement.created_at) {
      errors.push('Expiry cannot be before creation');
    } else if (
      agreement.expires_at.getTime() - agreement.created_at.getTime() !==
      agreement.agreed_duration_ms
    ) {
      errors.push('Expiry must equal creation time plus agreed duration');
    }

    this.validateStatus(agreement, errors);

    if (agreement.agreed_duration_ms === 0 && agreement.category !== AgreementCategory.ADULT_CONTENT) {
      warnings.push('Zero-duration agreement expires immediately');
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
   * Status and its timestamps must agree
   */
  private static validateStatus(agreement: Agreement, errors: string[]): void {
    switch (agreement.status) {
      case AgreementStatus.ACTIVE:
        if (agreement.violated_at !== null || agreement.completed_at !== null) {
          errors.push('Active agreements cannot carry completion or violation times');
        }
        break;
      case AgreementStatus.COMPLETED:
        if (agreement.violated_at !== null) {
          errors.push('Completed agreements cannot carry a violation time');
        }
        if (agreement.completed_at === null) {
          errors.push('Completed agreements require a completion time');
        }
        break;
      case AgreementStatus.VIOLATED:
        if (agreement.violated_at === null) {
          errors.push('Violated agreements require a violation time');
        }
        if (agreement.completed_at !== null) {
          errors.push('Violated agreements cannot carry a completion time');
        }
        break;
      default:
        errors.push(`Invalid status: ${String(agreement.status)}`);
    }
  }

  /**
   * Status may only move forward from ACTIVE
   */
  static canTransition(from: AgreementStatus, to: AgreementStatus): boolean {
    return from === AgreementStatus.ACTIVE && to !== AgreementStatus.ACTIVE;
  }
}
