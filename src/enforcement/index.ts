/**
 * Enforcement
 *
 * Violation to external actuator.
 */

export { EnforcementDispatcher, EnforcementDispatcherConfig, Actuator } from './dispatcher';
