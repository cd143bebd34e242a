export { AgreementFactory, AgreementDraft } from './factory';
export { AgreementValidator } from './validator';
export { msRemaining, progressPercentage, formatDuration, toMinutes } from './timing';
