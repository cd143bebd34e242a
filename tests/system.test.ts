/**
 * TimeAgreementsSystem Tests
 */

import {
  AgreementCategory,
  AgreementStatus,
  AuditEventType,
  BehavioralEvent,
  CentralErrorHandler,
  CompliancePhase,
  ConfigError,
  EnforcementOutcome,
  TimeAgreementsSystem,
} from '../src';
import {
  FakeClock,
  MockActuator,
  RecordingNotifier,
  ScriptedActivitySignal,
  ScriptedDialogueBackend,
} from '../src/testing';

const MIN = 60000;
const SEC = 1000;
const T0 = new Date('2026-03-01T16:00:00.000Z');

const youtube: BehavioralEvent = {
  category: AgreementCategory.VIDEO,
  subject_key: 'youtube',
  subject_label: 'YouTube',
  elapsed_ms: 40 * MIN,
};

describe('TimeAgreementsSystem', () => {
  let clock: FakeClock;
  let backend: ScriptedDialogueBackend;
  let signal: ScriptedActivitySignal;
  let notifier: RecordingNotifier;
  let actuator: MockActuator;
  let system: TimeAgreementsSystem;

  beforeEach(async () => {
    clock = new FakeClock(T0);
    backend = new ScriptedDialogueBackend();
    signal = new ScriptedActivitySignal(true);
    notifier = new RecordingNotifier();
    actuator = new MockActuator('closer');
    system = new TimeAgreementsSystem({
      dialogueBackend: backend,
      activitySignal: signal,
      actuators: [actuator],
      notifier,
      clock,
      errorHandler: new CentralErrorHandler({ console_logging: false }),
      settings: { negotiation: { retry_base_delay_ms: 0 } },
    });
    await system.initialize();
  });

  afterEach(async () => {
    await system.close();
  });

  async function negotiate(reply: string): Promise<string> {
    const negotiation = system.createNegotiation();
    await negotiation.startNegotiation(youtube);
    const response = await negotiation.processUserReply(reply);
    if (!response.agreement) {
      throw new Error(`No agreement reached for "${reply}"`);
    }
    return response.agreement.agreement_id;
  }

  test('should reject invalid settings', () => {
    expect(
      () =>
        new TimeAgreementsSystem({
          dialogueBackend: backend,
          activitySignal: signal,
          settings: { compliance: { interval_ms: 0 } },
        })
    ).toThrow(ConfigError);
  });

  describe('end to end', () => {
    test('should negotiate, warn and enforce an overrun', async () => {
      const negotiation = system.createNegotiation('conv-1');
      const opening = await negotiation.startNegotiation(youtube);
      const accepted = await negotiation.processUserReply('10 more minutes');

      expect(opening.message).toBe('[opening]');
      expect(accepted.outcome).toBe('agreement');
      expect(accepted.message).toBe('[accepted]');
      expect(system.getNegotiation('conv-1')).toBe(negotiation);

      const id = accepted.agreement?.agreement_id ?? '';
      expect(await system.getActiveAgreements()).toHaveLength(1);

      clock.advance(9 * MIN + 30 * SEC);
      const warningTick = await system.runComplianceTick();
      expect(warningTick.warnings).toBe(1);
      expect(notifier.eventsFor(id)).toEqual(['onWarning']);

      clock.advance(MIN);
      const violationTick = await system.runComplianceTick();
      expect(violationTick.violations).toBe(1);
      expect(violationTick.results[0].enforcement?.outcome).toBe(EnforcementOutcome.SUCCESS);
      expect(actuator.calls.map((a) => a.agreement_id)).toEqual([id]);
      expect(notifier.eventsFor(id)).toEqual(['onWarning', 'onViolation']);

      expect((await system.getAgreement(id))?.status).toBe(AgreementStatus.VIOLATED);
      expect(await system.getActiveAgreements()).toEqual([]);
      expect(system.getViolations().map((e) => e.agreement_id)).toEqual([id]);
      expect(await system.getStats()).toEqual({
        total: 1,
        active: 0,
        completed: 0,
        violated: 1,
        success_rate: 0,
      });
      expect(system.getComplianceStats()).toMatchObject({
        ticksCompleted: 2,
        totalWarnings: 1,
        totalViolations: 1,
      });
    });

    test('should complete an agreement when the subject stops in time', async () => {
      const id = await negotiate('10 more minutes');

      clock.advance(10 * MIN);
      signal.setActive('youtube', false);
      const tick = await system.runComplianceTick();

      expect(tick.completions).toBe(1);
      expect((await system.getAgreement(id))?.status).toBe(AgreementStatus.COMPLETED);
      expect(actuator.calls).toHaveLength(0);
      expect(await system.getStats()).toMatchObject({ completed: 1, success_rate: 100 });
    });

    test('should close an immediate-stop category without negotiating', async () => {
      const negotiation = system.createNegotiation();
      const response = await negotiation.startNegotiation({
        category: AgreementCategory.ADULT_CONTENT,
        subject_key: 'blocked-site',
        elapsed_ms: MIN,
      });

      expect(response.outcome).toBe('agreement');
      expect(response.isComplete).toBe(true);
      expect(response.agreement?.agreed_duration_ms).toBe(0);
      expect(backend.getPurposes()).toEqual(['immediate_stop']);
    });
  });

  describe('agreements', () => {
    test('should extend an agreement into a successor', async () => {
      const id = await negotiate('10 more minutes');
      clock.advance(4 * MIN);

      const result = await system.extendAgreement(id, 5 * MIN);

      expect(result?.original.status).toBe(AgreementStatus.COMPLETED);
      expect(result?.successor.agreed_duration_ms).toBe(11 * MIN);
      expect(result?.successor.extended_from).toBe(id);
      expect(system.getAgreementHistory(id).map((e) => [e.event_type, e.actor])).toEqual([
        [AuditEventType.AGREEMENT_EXTENDED, 'user'],
        [AuditEventType.AGREEMENT_CREATED, 'negotiation'],
      ]);
      expect(await system.getRecentAgreements(1)).toEqual([result?.successor]);
    });

    test('should not extend unknown or closed agreements', async () => {
      const id = await negotiate('10 more minutes');
      await system.extendAgreement(id, MIN);

      expect(await system.extendAgreement(id, MIN)).toBeNull();
      expect(await system.extendAgreement('missing', MIN)).toBeNull();
    });

    test('should find agreements by subject and range', async () => {
      const id = await negotiate('10 more minutes');
      const window = { from: new Date(T0.getTime() - MIN), to: new Date(T0.getTime() + MIN) };

      expect(
        (await system.getAgreementsInRange('youtube', window.from, window.to)).map((a) => a.agreement_id)
      ).toEqual([id]);
      expect(await system.getAgreementsInRange('steam', window.from, window.to)).toEqual([]);
      expect(await system.getAgreementsInRange(null, window.from, window.to)).toHaveLength(1);
    });

    test('should evaluate without side effects', async () => {
      const id = await negotiate('10 more minutes');
      const agreement = await system.getAgreement(id);
      if (!agreement) throw new Error('agreement missing');

      clock.advance(11 * MIN);
      expect(system.evaluateAgreement(agreement, true)).toEqual({
        agreement,
        ms_remaining: -MIN,
        phase: CompliancePhase.VIOLATION,
      });
      expect(actuator.calls).toHaveLength(0);
      expect((await system.getAgreement(id))?.status).toBe(AgreementStatus.ACTIVE);
    });
  });

  describe('negotiations', () => {
    test('should cancel an open negotiation once', async () => {
      const negotiation = system.createNegotiation('conv-2');
      await negotiation.startNegotiation(youtube);

      expect(system.cancelNegotiation('conv-2')).toBe(true);
      expect(negotiation.getState()).toEqual({ kind: 'rejected', reason: 'user_cancelled' });
      expect(system.cancelNegotiation('conv-2')).toBe(false);
      expect(system.cancelNegotiation('unknown')).toBe(false);
    });

    test('should forget finished negotiations', async () => {
      const open = system.createNegotiation('open');
      await open.startNegotiation(youtube);
      await negotiate('10 more minutes');

      expect(system.cleanupNegotiations()).toBe(1);
      expect(system.getNegotiation('open')).toBe(open);
      expect(system.cleanupNegotiations()).toBe(0);
    });

    test('should drop finished negotiations when a new one starts', async () => {
      const open = system.createNegotiation('open');
      await open.startNegotiation(youtube);
      const cancelled = system.createNegotiation('cancelled');
      await cancelled.startNegotiation(youtube);
      const agreed = system.createNegotiation('agreed');
      await agreed.startNegotiation(youtube);
      await agreed.processUserReply('10 more minutes');
      system.cancelNegotiation('cancelled');

      expect(system.getNegotiation('agreed')).toBe(agreed);

      const next = system.createNegotiation('next');

      expect(system.getNegotiation('agreed')).toBeNull();
      expect(system.getNegotiation('cancelled')).toBeNull();
      expect(system.getNegotiation('open')).toBe(open);
      expect(system.getNegotiation('next')).toBe(next);
      expect(system.cleanupNegotiations()).toBe(0);
    });
  });

  describe('suppression', () => {
    test('should skip ticks while snoozed', async () => {
      await negotiate('10 more minutes');
      expect(system.snooze(10 * MIN).accepted).toBe(true);
      expect(system.isSuppressed()).toBe(true);

      clock.advance(9 * MIN + 30 * SEC);
      const tick = await system.runComplianceTick();

      expect(tick).toMatchObject({ suppressed: true, suppression_reason: 'snooze', warnings: 0 });
      expect(notifier.notifications).toEqual([]);

      system.cancelSnooze();
      expect((await system.runComplianceTick()).warnings).toBe(1);
    });

    test('should refuse snoozes in strict mode', () => {
      system.setStrictMode(true);
      expect(system.snooze().accepted).toBe(false);
      expect(system.isSuppressed()).toBe(false);
    });

    test('should validate quiet hours updates', () => {
      expect(() => system.setQuietHours({ end_minute: 2000 })).toThrow(ConfigError);
    });
  });

  describe('lifecycle', () => {
    test('should start and stop the tracker', async () => {
      system.startCompliance(60 * SEC);
      expect(system.isComplianceRunning()).toBe(true);

      system.stopCompliance();
      expect(system.isComplianceRunning()).toBe(false);

      // The immediate tick started by startCompliance is shared
      const tick = await system.runComplianceTick();
      expect(tick.agreements_checked).toBe(0);
    });

    test('should notify tick listeners until unsubscribed', async () => {
      const seen: string[] = [];
      const unsubscribe = system.onTickComplete((result) => seen.push(result.tick_id));

      await system.runComplianceTick();
      unsubscribe();
      await system.runComplianceTick();

      expect(seen).toHaveLength(1);
    });

    test('should use late-registered actuators', async () => {
      const second = new MockActuator('second');
      const unregister = system.registerActuator(second);
      expect(typeof unregister).toBe('function');

      const id = await negotiate('10 more minutes');
      clock.advance(10 * MIN + 30 * SEC);
      await system.runComplianceTick();

      // first supporting actuator wins
      expect(actuator.calls.map((a) => a.agreement_id)).toEqual([id]);
      expect(second.calls).toEqual([]);
    });

    test('should expose the audit log and error stats', async () => {
      await negotiate('10 more minutes');

      expect(system.getAuditLog({ event_type: AuditEventType.NEGOTIATION_STARTED })).toHaveLength(1);
      expect(system.getErrorStats().total_errors).toBe(0);
      expect(system.getConfig().compliance.grace_period_ms).toBe(30 * SEC);
    });
  });
});
