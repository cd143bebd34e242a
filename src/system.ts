/**
 * Time Agreements System
 *
 * Main integration point. Wires negotiation, storage, compliance
 * tracking, suppression, enforcement and audit around one clock and one
 * resolved configuration.
 */

import { Agreement, AuditEvent, AuditQueryOptions, ComplianceSnapshot } from './types';
import { AuditLogger } from './audit/logger';
import { AgreementRepository, AgreementStats, ExtensionResult } from './storage/repository';
import { StorageAdapter } from './storage/adapter';
import { ResponseParser } from './parser';
import { NegotiationManager, DialogueBackend } from './negotiation';
import {
  ActivitySignal,
  AmbientMonitor,
  ComplianceTracker,
  ComplianceTrackerStats,
  Notifier,
  SnoozeResult,
  SuppressionController,
  TickListener,
  TickResult,
} from './compliance';
import { Actuator, EnforcementDispatcher } from './enforcement';
import { CentralErrorHandler, ErrorStats, getDefaultErrorHandler } from './errors';
import {
  QuietHoursConfig,
  TimeAgreementsConfig,
  TimeAgreementsConfigInput,
  resolveConfig,
} from './config';
import { Clock, systemClock } from './utils/clock';

export interface TimeAgreementsSystemConfig {
  dialogueBackend: DialogueBackend;
  activitySignal: ActivitySignal;
  actuators?: Actuator[];
  notifier?: Notifier;
  ambientMonitor?: AmbientMonitor;
  /** Defaults to in-memory storage */
  storage?: StorageAdapter;
  clock?: Clock;
  errorHandler?: CentralErrorHandler;
  settings?: TimeAgreementsConfigInput;
}

export class TimeAgreementsSystem {
  private config: TimeAgreementsConfig;
  private clock: Clock;
  private backend: DialogueBackend;
  private auditLogger: AuditLogger;
  private errorHandler: CentralErrorHandler;
  private repository: AgreementRepository;
  private parser: ResponseParser;
  private suppression: SuppressionController;
  private dispatcher: EnforcementDispatcher;
  private tracker: ComplianceTracker;
  private negotiations: Map<string, NegotiationManager> = new Map();

  constructor(options: TimeAgreementsSystemConfig) {
    this.config = resolveConfig(options.settings);
    this.clock = options.clock ?? systemClock;
    this.backend = options.dialogueBackend;
    this.errorHandler = options.errorHandler ?? getDefaultErrorHandler();
    this.auditLogger = new AuditLogger(this.clock);
    this.repository = new AgreementRepository({ adapter: options.storage, clock: this.clock });
    this.parser = new ResponseParser(this.config.parser);

    this.suppression = new SuppressionController({
      quiet_hours: this.config.quiet_hours,
      strict_mode: this.config.strict_mode,
      clock: this.clock,
    });

    this.dispatcher = new EnforcementDispatcher({
      actuators: options.actuators,
      timeout_ms: this.config.compliance.actuator_timeout_ms,
      auditLogger: this.auditLogger,
      errorHandler: this.errorHandler,
    });

    this.tracker = new ComplianceTracker({
      repository: this.repository,
      activitySignal: options.activitySignal,
      dispatcher: this.dispatcher,
      notifier: options.notifier,
      suppression: this.suppression,
      ambientMonitor: options.ambientMonitor,
      clock: this.clock,
      auditLogger: this.auditLogger,
      errorHandler: this.errorHandler,
      policies: this.config.policies,
      options: this.config.compliance,
    });
  }

  /**
   * Loads stored agreements. Other methods initialize lazily as well.
   */
  async initialize(): Promise<void> {
    await this.repository.initialize();
  }

  /**
   * Stops tracking and releases storage
   */
  async close(): Promise<void> {
    this.tracker.stop();
    await this.repository.close();
  }

  getConfig(): TimeAgreementsConfig {
    return this.config;
  }

  // ==========================================
  // Negotiation
  // ==========================================

  /**
   * Creates a negotiation for one conversation. Negotiations that have
   * finished since the last call are dropped first.
   */
  createNegotiation(conversationId?: string): NegotiationManager {
    this.cleanupNegotiations();
    const manager = new NegotiationManager({
      backend: this.backend,
      repository: this.repository,
      policies: this.config.policies,
      parser: this.parser,
      clock: this.clock,
      auditLogger: this.auditLogger,
      errorHandler: this.errorHandler,
      options: this.config.negotiation,
      conversationId,
    });
    this.negotiations.set(manager.getConversationId(), manager);
    return manager;
  }

  getNegotiation(conversationId: string): NegotiationManager | null {
    return this.negotiations.get(conversationId) ?? null;
  }

  /**
   * Cancels an open negotiation. Returns false when it is unknown or
   * already finished.
   */
  cancelNegotiation(conversationId: string): boolean {
    const manager = this.negotiations.get(conversationId);
    if (!manager || manager.isComplete()) {
      return false;
    }
    manager.cancelNegotiation();
    return true;
  }

  /**
   * Forgets finished negotiations. Returns how many were removed.
   */
  cleanupNegotiations(): number {
    let removed = 0;
    for (const [id, manager] of Array.from(this.negotiations.entries())) {
      if (manager.isComplete()) {
        this.negotiations.delete(id);
        removed++;
      }
    }
    return removed;
  }

  // ==========================================
  // Agreements
  // ==========================================

  async getAgreement(agreementId: string): Promise<Agreement | null> {
    return this.repository.get(agreementId);
  }

  async getActiveAgreements(): Promise<Agreement[]> {
    return this.repository.getActive();
  }

  async getRecentAgreements(limit = 10): Promise<Agreement[]> {
    return this.repository.getRecent(limit);
  }

  async getAgreementsInRange(subjectKey: string | null, from: Date, to: Date): Promise<Agreement[]> {
    return this.repository.getByDateRange(subjectKey, from, to);
  }

  /**
   * Closes an active agreement and starts a successor with the remaining
   * time plus `additionalMs`
   */
  async extendAgreement(
    agreementId: string,
    additionalMs: number,
    actor: string = 'user'
  ): Promise<ExtensionResult | null> {
    const result = await this.repository.extend(agreementId, additionalMs, this.clock.now());
    if (result) {
      this.auditLogger.logAgreementExtended(result.original, result.successor, actor);
    }
    return result;
  }

  async getStats(from?: Date, to?: Date): Promise<AgreementStats> {
    return this.repository.getStats(from, to);
  }

  // ==========================================
  // Compliance Tracking
  // ==========================================

  startCompliance(intervalMs?: number): void {
    this.tracker.start(intervalMs);
  }

  stopCompliance(): void {
    this.tracker.stop();
  }

  isComplianceRunning(): boolean {
    return this.tracker.isRunning();
  }

  /**
   * Runs one tick now
   */
  async runComplianceTick(): Promise<TickResult> {
    return this.tracker.tick();
  }

  evaluateAgreement(agreement: Agreement, subjectActive: boolean): ComplianceSnapshot {
    return this.tracker.evaluate(agreement, subjectActive, this.clock.now());
  }

  onTickComplete(listener: TickListener): () => void {
    return this.tracker.onTickComplete(listener);
  }

  getComplianceStats(): ComplianceTrackerStats {
    return this.tracker.getStats();
  }

  // ==========================================
  // Suppression
  // ==========================================

  snooze(durationMs?: number): SnoozeResult {
    return this.suppression.snooze(durationMs);
  }

  cancelSnooze(): void {
    this.suppression.cancelSnooze();
  }

  isSuppressed(): boolean {
    return this.suppression.isSuppressed(this.clock.now());
  }

  setStrictMode(enabled: boolean): void {
    this.suppression.setStrictMode(enabled);
  }

  setQuietHours(update: Partial<QuietHoursConfig>): void {
    this.suppression.setQuietHours(update);
  }

  // ==========================================
  // Enforcement
  // ==========================================

  registerActuator(actuator: Actuator): () => void {
    return this.dispatcher.register(actuator);
  }

  // ==========================================
  // Audit & Errors
  // ==========================================

  getAuditLog(options: AuditQueryOptions = {}): AuditEvent[] {
    return this.auditLogger.query(options);
  }

  getAgreementHistory(agreementId: string): AuditEvent[] {
    return this.auditLogger.getAgreementHistory(agreementId);
  }

  getViolations(): AuditEvent[] {
    return this.auditLogger.getViolations();
  }

  getErrorStats(): ErrorStats {
    return this.errorHandler.getStats();
  }
}
