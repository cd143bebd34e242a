/**
 * Compliance Tracker Tests
 */

import {
  Agreement,
  AgreementCategory,
  AgreementFactory,
  AgreementRepository,
  AgreementStatus,
  AuditEventType,
  AuditLogger,
  CentralErrorHandler,
  CompliancePhase,
  ComplianceTracker,
  ComplianceTrackerConfig,
  EnforcementDispatcher,
  EnforcementOutcome,
  ErrorCategory,
  SuppressionController,
  TickResult,
  resolvePolicies,
} from '../src';
import {
  FakeClock,
  MockActuator,
  RecordingNotifier,
  ScriptedActivitySignal,
} from '../src/testing';

const MIN = 60000;
const SEC = 1000;
const T0 = new Date('2026-03-01T14:00:00.000Z');

function at(offsetMs: number): Date {
  return new Date(T0.getTime() + offsetMs);
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('ComplianceTracker', () => {
  let clock: FakeClock;
  let repository: AgreementRepository;
  let signal: ScriptedActivitySignal;
  let actuator: MockActuator;
  let notifier: RecordingNotifier;
  let auditLogger: AuditLogger;
  let errorHandler: CentralErrorHandler;
  let dispatcher: EnforcementDispatcher;
  let tracker: ComplianceTracker;

  function createTracker(overrides: Partial<ComplianceTrackerConfig> = {}): ComplianceTracker {
    return new ComplianceTracker({
      repository,
      activitySignal: signal,
      dispatcher,
      notifier,
      clock,
      auditLogger,
      errorHandler,
      ...overrides,
    });
  }

  async function createAgreement(
    subjectKey: string | null = 'instagram',
    durationMs: number = 5 * MIN,
    createdAt: Date = T0
  ): Promise<Agreement> {
    const agreement = AgreementFactory.create(
      { subject_key: subjectKey, category: AgreementCategory.SOCIAL_MEDIA, agreed_duration_ms: durationMs },
      createdAt
    );
    await repository.save(agreement);
    return agreement;
  }

  async function tickAt(offsetMs: number): Promise<TickResult> {
    clock.set(at(offsetMs));
    return tracker.tick();
  }

  beforeEach(() => {
    clock = new FakeClock(T0);
    repository = new AgreementRepository({ clock });
    signal = new ScriptedActivitySignal(true);
    actuator = new MockActuator('blocker');
    notifier = new RecordingNotifier();
    auditLogger = new AuditLogger(clock);
    errorHandler = new CentralErrorHandler({ console_logging: false });
    dispatcher = new EnforcementDispatcher({ actuators: [actuator], auditLogger, errorHandler });
    tracker = createTracker();
  });

  afterEach(() => {
    tracker.stop();
    jest.restoreAllMocks();
  });

  describe('end-to-end scenarios', () => {
    test('should warn once, then enforce once when activity continues past grace', async () => {
      const agreement = await createAgreement();

      const safe = await tickAt(0);
      expect(safe.results[0]).toMatchObject({ phase: CompliancePhase.SAFE, action: 'none' });

      const warned = await tickAt(4 * MIN);
      expect(warned.warnings).toBe(1);
      expect(warned.results[0]).toMatchObject({
        phase: CompliancePhase.WARNING,
        ms_remaining: MIN,
        action: 'warned',
      });

      const again = await tickAt(4 * MIN + 30 * SEC);
      expect(again.warnings).toBe(0);
      expect(again.results[0].action).toBe('none');

      const grace = await tickAt(5 * MIN);
      expect(grace.grace_started).toBe(1);

      const violation = await tickAt(5 * MIN + 30 * SEC);
      expect(violation.violations).toBe(1);
      expect(violation.results[0]).toMatchObject({
        action: 'violated',
        enforcement: { outcome: EnforcementOutcome.SUCCESS, actuator: 'blocker' },
      });

      const after = await tickAt(6 * MIN);
      expect(after.agreements_checked).toBe(0);

      const stored = await repository.get(agreement.agreement_id);
      expect(stored?.status).toBe(AgreementStatus.VIOLATED);
      expect(stored?.violated_at).toEqual(at(5 * MIN + 30 * SEC));
      expect(actuator.calls).toHaveLength(1);
      expect(actuator.calls[0].status).toBe(AgreementStatus.VIOLATED);
      expect(notifier.eventsFor(agreement.agreement_id)).toEqual([
        'onWarning',
        'onGraceStarted',
        'onViolation',
      ]);
    });

    test('should complete without enforcement when activity stops within grace', async () => {
      const agreement = await createAgreement();

      await tickAt(4 * MIN);
      signal.setActive('instagram', false);
      const completed = await tickAt(5 * MIN + SEC);

      expect(completed.completions).toBe(1);
      expect(completed.results[0]).toMatchObject({
        phase: CompliancePhase.COMPLETED,
        ms_remaining: -SEC,
        subject_active: false,
        action: 'completed',
      });

      await tickAt(6 * MIN);

      const stored = await repository.get(agreement.agreement_id);
      expect(stored?.status).toBe(AgreementStatus.COMPLETED);
      expect(stored?.completed_at).toEqual(at(5 * MIN + SEC));
      expect(notifier.count('onCompleted')).toBe(1);
      expect(actuator.calls).toHaveLength(0);
    });
  });

  describe('phase ordering', () => {
    test('should never move a phase backwards when the clock does', async () => {
      const agreement = await createAgreement();

      await tickAt(5 * MIN);
      const rewound = await tickAt(4 * MIN);

      expect(rewound.results[0]).toMatchObject({
        phase: CompliancePhase.EXPIRED_GRACE,
        action: 'none',
      });
      expect(notifier.eventsFor(agreement.agreement_id)).toEqual(['onGraceStarted']);
    });

    test('should skip straight to the phase the agreement is in', async () => {
      const agreement = await createAgreement();

      const result = await tickAt(10 * MIN);

      expect(result.violations).toBe(1);
      expect(notifier.eventsFor(agreement.agreement_id)).toEqual(['onViolation']);
    });

    test('should apply per-category timing overrides', async () => {
      tracker = createTracker({
        policies: resolvePolicies({ [AgreementCategory.SOCIAL_MEDIA]: { grace_period_ms: 0 } }),
      });
      await createAgreement();

      const result = await tickAt(5 * MIN);
      expect(result.violations).toBe(1);
    });
  });

  describe('idempotence', () => {
    test('should enforce once when two trackers race on the same violation', async () => {
      await createAgreement();
      const other = createTracker();
      clock.set(at(6 * MIN));

      const [first, second] = await Promise.all([tracker.tick(), other.tick()]);

      expect(first.violations + second.violations).toBe(1);
      expect(actuator.calls).toHaveLength(1);
      expect(notifier.count('onViolation')).toBe(1);
    });

    test('should share a running tick between callers', async () => {
      await createAgreement();

      const [first, second] = await Promise.all([tracker.tick(), tracker.tick()]);
      expect(first).toBe(second);
    });
  });

  describe('isolation', () => {
    test('should keep processing other agreements when one fails', async () => {
      const bad = await createAgreement('instagram');
      const good = await createAgreement('youtube');
      const markViolated = repository.markViolated.bind(repository);
      jest
        .spyOn(repository, 'markViolated')
        .mockImplementation((id: string, when: Date) =>
          id === bad.agreement_id ? Promise.reject(new Error('db down')) : markViolated(id, when)
        );

      const result = await tickAt(6 * MIN);

      expect(result.violations).toBe(1);
      expect(result.errors).toEqual([`Failed to process agreement ${bad.agreement_id}: db down`]);
      expect(result.results.find((r) => r.agreement_id === good.agreement_id)?.action).toBe('violated');
      expect((await repository.get(bad.agreement_id))?.status).toBe(AgreementStatus.ACTIVE);
    });

    test('should skip the agreements of a subject whose signal fails', async () => {
      const instagram = await createAgreement('instagram');
      const youtube = await createAgreement('youtube');
      signal.fail('youtube');

      const result = await tickAt(4 * MIN);

      expect(result.results.find((r) => r.agreement_id === youtube.agreement_id)).toMatchObject({
        action: 'skipped',
        phase: null,
        subject_active: null,
        error: 'signal unavailable',
      });
      expect(result.results.find((r) => r.agreement_id === instagram.agreement_id)?.action).toBe(
        'warned'
      );
      expect(result.errors).toEqual([`Skipped ${youtube.agreement_id}: signal unavailable`]);
      expect(errorHandler.getStats().errors_by_category[ErrorCategory.COMPLIANCE]).toBe(1);
    });

    test('should skip a subject whose signal does not answer in time', async () => {
      await createAgreement('instagram');
      tracker = createTracker({
        activitySignal: { isSubjectActive: () => new Promise<boolean>(() => undefined) },
        options: { signal_timeout_ms: 20 },
      });

      const result = await tickAt(4 * MIN);

      expect(result.results[0]).toMatchObject({
        action: 'skipped',
        error: 'activity.isSubjectActive timed out after 20ms',
      });
    });

    test('should read each subject once per tick', async () => {
      await createAgreement('instagram');
      await createAgreement('instagram', 10 * MIN);
      await createAgreement(null);

      await tickAt(MIN);

      expect(signal.calls.sort()).toEqual(['instagram', null].sort());
    });

    test('should report notifier failures without affecting the tick', async () => {
      await createAgreement();
      tracker = createTracker({
        notifier: {
          onWarning: () => {
            throw new Error('ui gone');
          },
          onGraceStarted: () => Promise.reject(new Error('ui still gone')),
        },
      });

      const warned = await tickAt(4 * MIN);
      const grace = await tickAt(5 * MIN);
      await flush();

      expect(warned.warnings).toBe(1);
      expect(grace.grace_started).toBe(1);
      expect(errorHandler.getStats().errors_by_category[ErrorCategory.NOTIFICATION]).toBe(2);
      expect(tracker.getStats().totalErrors).toBe(2);
    });

    test('should record a failed enforcement and still notify the violation', async () => {
      dispatcher = new EnforcementDispatcher({
        actuators: [new MockActuator('blocker', { error: new Error('permission denied') })],
        auditLogger,
        errorHandler,
      });
      tracker = createTracker();
      const agreement = await createAgreement();

      const result = await tickAt(6 * MIN);

      expect(result.results[0].enforcement).toEqual({
        outcome: EnforcementOutcome.ACTUATOR_FAILED,
        reason: 'permission denied',
        actuator: 'blocker',
      });
      expect(notifier.notifications[0]).toMatchObject({
        event: 'onViolation',
        enforcement: { outcome: EnforcementOutcome.ACTUATOR_FAILED },
      });
      expect((await repository.get(agreement.agreement_id))?.status).toBe(AgreementStatus.VIOLATED);
    });
  });

  test('should still notify the violation when actuator selection throws', async () => {
    dispatcher = new EnforcementDispatcher({
      actuators: [
        new MockActuator('blocker', {
          supports: () => {
            throw new Error('boom');
          },
        }),
      ],
      auditLogger,
      errorHandler,
    });
    tracker = createTracker();
    const agreement = await createAgreement();

    const result = await tickAt(6 * MIN);

    expect(result.results[0]).toMatchObject({
      phase: CompliancePhase.VIOLATION,
      action: 'violated',
      enforcement: {
        outcome: EnforcementOutcome.ACTUATOR_FAILED,
        reason: 'Capability check failed: boom',
        actuator: 'blocker',
      },
    });
    expect(notifier.eventsFor(agreement.agreement_id)).toEqual(['onViolation']);
    expect((await repository.get(agreement.agreement_id))?.status).toBe(AgreementStatus.VIOLATED);
  });

  describe('ambient monitoring', () => {
    test('should not run when the tick resolved an agreement', async () => {
      const check = jest.fn();
      tracker = createTracker({ ambientMonitor: { check } });
      await createAgreement();

      const result = await tickAt(6 * MIN);

      expect(result.ambient_checked).toBe(false);
      expect(check).not.toHaveBeenCalled();
    });

    test('should run when nothing was resolved', async () => {
      const check = jest.fn();
      tracker = createTracker({ ambientMonitor: { check } });
      await createAgreement();

      const result = await tickAt(4 * MIN);

      expect(result.ambient_checked).toBe(true);
      expect(check).toHaveBeenCalledWith(at(4 * MIN), expect.any(AbortSignal));
    });

    test('should time out a hanging monitor and keep ticking', async () => {
      let aborted = false;
      tracker = createTracker({
        ambientMonitor: {
          check: (_now, signal) =>
            new Promise<void>(() => {
              signal?.addEventListener('abort', () => {
                aborted = true;
              });
            }),
        },
        options: { ambient_timeout_ms: 20 },
      });
      const agreement = await createAgreement();

      const first = await tickAt(0);
      expect(first.errors).toEqual(['Ambient monitor failed: ambient.check timed out after 20ms']);
      expect(aborted).toBe(true);
      expect(errorHandler.getStats().errors_by_category[ErrorCategory.COMPLIANCE]).toBe(1);

      const second = await tickAt(10 * MIN);
      expect(second.violations).toBe(1);
      expect((await repository.get(agreement.agreement_id))?.status).toBe(AgreementStatus.VIOLATED);
    });
  });

  describe('suppression', () => {
    test('should skip checks while snoozed without pausing the agreement clock', async () => {
      const suppression = new SuppressionController({ clock });
      tracker = createTracker({ suppression });
      const agreement = await createAgreement();

      clock.set(at(MIN));
      expect(suppression.snooze(10 * MIN).accepted).toBe(true);

      const suppressed = await tickAt(6 * MIN);
      expect(suppressed).toMatchObject({
        suppressed: true,
        suppression_reason: 'snooze',
        agreements_checked: 0,
        violations: 0,
      });
      expect((await repository.get(agreement.agreement_id))?.status).toBe(AgreementStatus.ACTIVE);

      const resumed = await tickAt(11 * MIN);
      expect(resumed.suppressed).toBe(false);
      expect(resumed.violations).toBe(1);
      expect(notifier.eventsFor(agreement.agreement_id)).toEqual(['onViolation']);

      expect(tracker.getStats().ticksSuppressed).toBe(1);
      expect(auditLogger.query({ event_type: AuditEventType.TICK_SUPPRESSED })).toHaveLength(1);
    });
  });

  describe('scheduling', () => {
    test('should tick immediately on start and stop on request', async () => {
      await createAgreement();
      const firstTick = new Promise<TickResult>((resolve) => {
        tracker.onTickComplete(resolve);
      });

      tracker.start(60 * SEC);
      expect(tracker.isRunning()).toBe(true);
      const result = await firstTick;
      tracker.stop();

      expect(result.agreements_checked).toBe(1);
      expect(tracker.isRunning()).toBe(false);
      expect(tracker.getStats()).toMatchObject({
        isRunning: false,
        lastTickAt: T0,
        nextTickAt: null,
        ticksCompleted: 1,
      });
    });

    test('should reject a non-positive interval', () => {
      expect(() => tracker.start(0)).toThrow('Tick interval must be a positive integer, got 0');
      expect(tracker.isRunning()).toBe(false);
    });

    test('should stop notifying an unsubscribed listener', async () => {
      const listener = jest.fn();
      const unsubscribe = tracker.onTickComplete(listener);

      await tracker.tick();
      unsubscribe();
      await tracker.tick();

      expect(listener).toHaveBeenCalledTimes(1);
    });

    test('should keep going when a listener throws', async () => {
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      tracker.onTickComplete(() => {
        throw new Error('listener broke');
      });

      const result = await tracker.tick();

      expect(result.errors).toEqual([]);
      expect(consoleError).toHaveBeenCalledWith('Tick listener error:', expect.any(Error));
    });
  });

  describe('statistics and dry runs', () => {
    test('should accumulate counts across ticks', async () => {
      await createAgreement('instagram');
      await createAgreement('youtube');
      signal.setActive('youtube', false);

      await tickAt(4 * MIN);
      await tickAt(6 * MIN);

      expect(tracker.getStats()).toMatchObject({
        ticksCompleted: 2,
        totalWarnings: 2,
        totalViolations: 1,
        totalCompletions: 1,
        totalErrors: 0,
      });

      tracker.resetStats();
      expect(tracker.getStats().ticksCompleted).toBe(0);
    });

    test('should evaluate an agreement without side effects', async () => {
      const agreement = await createAgreement();

      const snapshot = tracker.evaluate(agreement, true, at(4 * MIN));

      expect(snapshot).toEqual({ agreement, ms_remaining: MIN, phase: CompliancePhase.WARNING });
      expect(notifier.notifications).toEqual([]);
      expect((await repository.get(agreement.agreement_id))?.status).toBe(AgreementStatus.ACTIVE);
    });
  });
});
