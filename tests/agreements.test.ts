/**
 * Agreement Factory, Validator and Timing Tests
 */

import {
  Agreement,
  AgreementCategory,
  AgreementFactory,
  AgreementStatus,
  AgreementValidator,
  ValidationError,
  formatDuration,
  msRemaining,
  progressPercentage,
  toMinutes,
} from '../src';

const MIN = 60000;
const T0 = new Date('2026-03-01T18:00:00.000Z');

function at(offsetMs: number): Date {
  return new Date(T0.getTime() + offsetMs);
}

describe('Agreements', () => {
  describe('AgreementFactory', () => {
    test('should create an ACTIVE agreement expiring after the agreed duration', () => {
      const agreement = AgreementFactory.create(
        { subject_key: 'youtube', category: AgreementCategory.VIDEO, agreed_duration_ms: 15 * MIN },
        T0
      );

      expect(agreement).toMatchObject({
        subject_key: 'youtube',
        subject_label: 'youtube',
        status: AgreementStatus.ACTIVE,
        violated_at: null,
        completed_at: null,
        conversation_ref: null,
        extended_from: null,
      });
      expect(agreement.agreement_id).toMatch(/^[0-9a-f-]{36}$/);
      expect(agreement.expires_at).toEqual(at(15 * MIN));
    });

    test('should label general activity', () => {
      const agreement = AgreementFactory.create(
        { subject_key: null, category: AgreementCategory.GENERAL, agreed_duration_ms: MIN },
        T0
      );
      expect(agreement.subject_label).toBe('General activity');
    });

    test('should reject an invalid duration', () => {
      expect(() =>
        AgreementFactory.create(
          { subject_key: 'x', category: AgreementCategory.NEWS, agreed_duration_ms: -1 },
          T0
        )
      ).toThrow(ValidationError);
      expect(() =>
        AgreementFactory.create(
          { subject_key: 'x', category: AgreementCategory.NEWS, agreed_duration_ms: 1.5 },
          T0
        )
      ).toThrow(
        'Invalid agreement draft: Agreed duration must be a non-negative whole number of milliseconds, Expiry must equal creation time plus agreed duration'
      );
    });

    test('should create a successor carrying the remaining time', () => {
      const original = AgreementFactory.create(
        {
          subject_key: 'reddit',
          subject_label: 'Reddit',
          category: AgreementCategory.NEWS,
          agreed_duration_ms: 10 * MIN,
          conversation_ref: 'conv-9',
        },
        T0
      );

      const successor = AgreementFactory.createSuccessor(original, 5 * MIN, at(7 * MIN));

      expect(successor.agreement_id).not.toBe(original.agreement_id);
      expect(successor).toMatchObject({
        subject_label: 'Reddit',
        agreed_duration_ms: 8 * MIN,
        conversation_ref: 'conv-9',
        extended_from: original.agreement_id,
      });
      expect(successor.created_at).toEqual(at(7 * MIN));
      expect(successor.expires_at).toEqual(at(15 * MIN));
    });
  });

  describe('AgreementValidator', () => {
    function base(): Agreement {
      return AgreementFactory.create(
        { subject_key: 'steam', category: AgreementCategory.GAMES, agreed_duration_ms: 20 * MIN },
        T0
      );
    }

    test('should accept a well-formed agreement', () => {
      expect(AgreementValidator.validate(base())).toEqual({ valid: true, errors: [], warnings: [] });
    });

    test('should require timestamps that match the status', () => {
      const violated: Agreement = { ...base(), status: AgreementStatus.VIOLATED };
      expect(AgreementValidator.validate(violated).errors).toEqual([
        'Violated agreements require a violation time',
      ]);

      const completed: Agreement = {
        ...base(),
        status: AgreementStatus.COMPLETED,
        completed_at: at(MIN),
        violated_at: at(MIN),
      };
      expect(AgreementValidator.validate(completed).errors).toEqual([
        'Completed agreements cannot carry a violation time',
      ]);
    });

    test('should reject an expiry before creation', () => {
      const agreement: Agreement = { ...base(), expires_at: at(-MIN) };
      expect(AgreementValidator.validate(agreement).errors).toEqual(['Expiry cannot be before creation']);
    });

    test('should warn about zero durations outside immediate-stop categories', () => {
      const zero = AgreementFactory.create(
        { subject_key: 'steam', category: AgreementCategory.GAMES, agreed_duration_ms: 0 },
        T0
      );
      expect(AgreementValidator.validate(zero).warnings).toEqual([
        'Zero-duration agreement expires immediately',
      ]);

      const stop = AgreementFactory.create(
        { subject_key: 'blocked', category: AgreementCategory.ADULT_CONTENT, agreed_duration_ms: 0 },
        T0
      );
      expect(AgreementValidator.validate(stop).warnings).toEqual([]);
    });

    test('should only allow transitions out of ACTIVE', () => {
      expect(AgreementValidator.canTransition(AgreementStatus.ACTIVE, AgreementStatus.VIOLATED)).toBe(true);
      expect(AgreementValidator.canTransition(AgreementStatus.ACTIVE, AgreementStatus.ACTIVE)).toBe(false);
      expect(AgreementValidator.canTransition(AgreementStatus.COMPLETED, AgreementStatus.VIOLATED)).toBe(
        false
      );
    });
  });

  describe('timing helpers', () => {
    const agreement = AgreementFactory.create(
      { subject_key: 'tiktok', category: AgreementCategory.SOCIAL_MEDIA, agreed_duration_ms: 10 * MIN },
      T0
    );

    test('should compute remaining time', () => {
      expect(msRemaining(agreement, at(4 * MIN))).toBe(6 * MIN);
      expect(msRemaining(agreement, at(12 * MIN))).toBe(-2 * MIN);
    });

    test('should compute progress clamped to 0-100', () => {
      expect(progressPercentage(agreement, at(-MIN))).toBe(0);
      expect(progressPercentage(agreement, at(2.5 * MIN))).toBe(25);
      expect(progressPercentage(agreement, at(30 * MIN))).toBe(100);
    });

    test.each([
      [45000, '45s'],
      [4.5 * MIN, '4m 30s'],
      [10 * MIN, '10m'],
      [65 * MIN, '1h 5m'],
      [120 * MIN, '2h'],
      [-5000, '0s'],
    ])('formatDuration(%d) = %s', (ms, expected) => {
      expect(formatDuration(ms)).toBe(expected);
    });

    test('should round to whole minutes', () => {
      expect(toMinutes(90000)).toBe(2);
      expect(toMinutes(29000)).toBe(0);
    });
  });
});
