/**
 * Basic Usage Examples for Time Agreements
 */

import {
  AgreementCategory,
  DialogueBackend,
  EnforcementOutcome,
  PromptContext,
  TimeAgreementsSystem,
  formatDuration,
} from '../src';
import { FakeClock, MockActuator, ScriptedActivitySignal } from '../src/testing';

const MIN = 60000;

/**
 * Canned dialogue in place of a language model
 */
const templateBackend: DialogueBackend = {
  async generate(context: PromptContext): Promise<string> {
    const offer = context.offer_ms === null ? '' : formatDuration(context.offer_ms);
    switch (context.purpose) {
      case 'opening':
        return `You've been on ${context.subject_label} for ${formatDuration(context.elapsed_ms)}. How much longer do you need?`;
      case 'accepted':
        return `Deal, ${offer} it is.`;
      case 'counter_offer':
        return `That's a lot. How about ${offer}?`;
      case 'compromise':
        return `Let's settle on ${offer}.`;
      case 'clarification':
        return 'Sorry, how many minutes did you mean?';
      case 'default_imposed':
        return `I'll set it to ${offer} for now.`;
      case 'declined':
        return 'Okay, no timer this time.';
      case 'immediate_stop':
        return 'This one needs to stop now.';
    }
  },
};

// Simulated time, so the examples run instantly
const clock = new FakeClock(new Date('2026-03-01T19:00:00.000Z'));
const signal = new ScriptedActivitySignal(true);
const actuator = new MockActuator('app-closer');

const system = new TimeAgreementsSystem({
  dialogueBackend: templateBackend,
  activitySignal: signal,
  actuators: [actuator],
  clock,
  notifier: {
    onWarning: (s) => console.log(`  ! ${formatDuration(s.ms_remaining)} left on ${s.agreement.subject_label}`),
    onGraceStarted: (s) => console.log(`  ! Time is up for ${s.agreement.subject_label}`),
    onViolation: (s, result) =>
      console.log(`  ! Overrun on ${s.agreement.subject_label}, enforcement: ${result.outcome}`),
    onCompleted: (s) => console.log(`  ✓ ${s.agreement.subject_label} finished on time`),
  },
});

/**
 * Example 1: Negotiating past the category limit
 */
async function example1_negotiation(): Promise<string | null> {
  console.log('\n=== Example 1: Negotiation ===');

  const negotiation = system.createNegotiation();
  const opening = await negotiation.startNegotiation({
    category: AgreementCategory.SOCIAL_MEDIA,
    subject_key: 'instagram',
    subject_label: 'Instagram',
    elapsed_ms: 35 * MIN,
  });
  console.log('Assistant:', opening.message);

  // Social media is capped at 30 minutes
  for (const reply of ['2 hours', '20 minutes']) {
    console.log('User:', reply);
    const response = await negotiation.processUserReply(reply);
    console.log('Assistant:', response.message);
    if (response.agreement) {
      console.log('Agreed:', formatDuration(response.agreement.agreed_duration_ms));
      return response.agreement.agreement_id;
    }
  }
  return null;
}

/**
 * Example 2: Ticking through warning, grace and violation
 */
async function example2_compliance(agreementId: string): Promise<void> {
  console.log('\n=== Example 2: Compliance Ticks ===');

  for (const minutes of [19, 1, 1]) {
    clock.advance(minutes * MIN);
    const tick = await system.runComplianceTick();
    console.log(`Tick at +${minutes}m: ${tick.results.map((r) => r.action).join(', ')}`);
  }

  const agreement = await system.getAgreement(agreementId);
  console.log('Final status:', agreement?.status);
  console.log('Actuator calls:', actuator.calls.length);
}

/**
 * Example 3: Stopping in time
 */
async function example3_completion(): Promise<void> {
  console.log('\n=== Example 3: Completion ===');

  const negotiation = system.createNegotiation();
  await negotiation.startNegotiation({
    category: AgreementCategory.NEWS,
    subject_key: 'news-site',
    elapsed_ms: 10 * MIN,
  });
  const response = await negotiation.processUserReply('5 minutes');
  console.log('Assistant:', response.message);

  clock.advance(5 * MIN);
  signal.setActive('news-site', false);
  await system.runComplianceTick();
}

/**
 * Example 4: Snooze and strict mode
 */
async function example4_suppression(): Promise<void> {
  console.log('\n=== Example 4: Suppression ===');

  console.log('Snooze:', system.snooze(10 * MIN));
  const tick = await system.runComplianceTick();
  console.log('Tick suppressed?', tick.suppressed, tick.suppression_reason);

  system.setStrictMode(true);
  console.log('Snooze in strict mode:', system.snooze());
  system.setStrictMode(false);
}

/**
 * Example 5: Audit trail and stats
 */
async function example5_audit(): Promise<void> {
  console.log('\n=== Example 5: Audit Trail ===');

  for (const event of system.getAuditLog({ limit: 8 })) {
    console.log(`  ${event.timestamp.toISOString()} ${event.event_type} (${event.actor})`);
  }

  const stats = await system.getStats();
  console.log('Stats:', stats);
  console.log(
    'Enforcements applied:',
    system.getAuditLog().filter((e) => e.details.outcome === EnforcementOutcome.SUCCESS).length
  );
}

async function runAllExamples(): Promise<void> {
  await system.initialize();

  const agreementId = await example1_negotiation();
  if (agreementId) {
    await example2_compliance(agreementId);
  }
  await example3_completion();
  await example4_suppression();
  await example5_audit();

  await system.close();
  console.log('\n=== All examples completed ===');
}

// Uncomment to run
// runAllExamples().catch((error) => console.error(error));

export {
  example1_negotiation,
  example2_compliance,
  example3_completion,
  example4_suppression,
  example5_audit,
  runAllExamples,
};
