/**
 * Agreement Repository
 *
 * Stores and retrieves time agreements. Reads are served from an in-memory
 * cache; every write reaches the storage adapter before the cache changes,
 * so a failed write leaves the previous record in place.
 */

import { Agreement, AgreementStatus } from '../types';
import { AgreementFactory } from '../agreements/factory';
import { AgreementValidator } from '../agreements/validator';
import { ErrorCode, RepositoryError, ValidationError, describeError } from '../errors';
import { Clock, systemClock } from '../utils/clock';
import { StorageAdapter, cloneAgreement } from './adapter';
import { MemoryStorageAdapter } from './memory-adapter';

export interface AgreementRepositoryConfig {
  /**
   * Storage adapter to use. Defaults to MemoryStorageAdapter.
   */
  adapter?: StorageAdapter;
  clock?: Clock;
}

export interface AgreementStats {
  total: number;
  active: number;
  completed: number;
  violated: number;
  /** completed / (completed + violated), as a rounded percentage */
  success_rate: number;
}

export interface ExtensionResult {
  original: Agreement;
  successor: Agreement;
}

function newestFirst(a: Agreement, b: Agreement): number {
  return b.created_at.getTime() - a.created_at.getTime();
}

export class AgreementRepository {
  private agreements: Map<string, Agreement> = new Map();
  private adapter: StorageAdapter;
  private clock: Clock;
  private initialized = false;
  private initializing?: Promise<void>;
  private locks: Map<string, Promise<void>> = new Map();

  constructor(config: AgreementRepositoryConfig = {}) {
    this.adapter = config.adapter ?? new MemoryStorageAdapter();
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Loads stored agreements into the cache. Called implicitly by every
   * operation.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    if (!this.initializing) {
      this.initializing = this.load().finally(() => {
        this.initializing = undefined;
      });
    }
    await this.initializing;
  }

  /**
   * Checks if the repository has been initialized
   */
  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Gets the storage adapter being used
   */
  getAdapter(): StorageAdapter {
    return this.adapter;
  }

  /**
   * Waits for in-flight status transitions, then closes storage
   */
  async close(): Promise<void> {
    await Promise.all(this.locks.values());
    await this.adapter.close();
    this.initialized = false;
  }

  /**
   * Stores a new agreement, or rewrites one that is still ACTIVE and stays
   * ACTIVE. Closing goes through markCompleted/markViolated/extend only.
   */
  async save(agreement: Agreement): Promise<void> {
    const validation = AgreementValidator.validate(agreement);
    if (!validation.valid) {
      throw new ValidationError('Invalid agreement', validation.errors, {
        agreement_id: agreement.agreement_id,
        operation: 'save',
      });
    }

    await this.initialize();
    await this.withLock(agreement.agreement_id, async () => {
      const current = this.agreements.get(agreement.agreement_id);
      if (current && current.status !== AgreementStatus.ACTIVE) {
        throw new RepositoryError(
          `Agreement ${agreement.agreement_id} is already ${current.status}`,
          ErrorCode.AGREEMENT_STATUS_CONFLICT,
          { agreement_id: agreement.agreement_id, operation: 'save' }
        );
      }
      if (current && agreement.status !== AgreementStatus.ACTIVE) {
        throw new RepositoryError(
          `Agreement ${agreement.agreement_id} can only leave ACTIVE through markCompleted, markViolated or extend`,
          ErrorCode.AGREEMENT_STATUS_CONFLICT,
          { agreement_id: agreement.agreement_id, operation: 'save' }
        );
      }

      const stored = cloneAgreement(agreement);
      await this.persist(stored, 'save');
      this.agreements.set(stored.agreement_id, stored);
    });
  }

  /**
   * Retrieves an agreement by ID
   */
  async get(agreementId: string): Promise<Agreement | null> {
    await this.initialize();
    const agreement = this.agreements.get(agreementId);
    return agreement ? cloneAgreement(agreement) : null;
  }

  /**
   * Gets all agreements, newest first
   */
  async getAll(): Promise<Agreement[]> {
    await this.initialize();
    return this.snapshot();
  }

  /**
   * Gets the most recently created agreements
   */
  async getRecent(limit = 10): Promise<Agreement[]> {
    await this.initialize();
    return this.snapshot().slice(0, Math.max(0, limit));
  }

  /**
   * Gets ACTIVE agreements, newest first
   */
  async getActive(): Promise<Agreement[]> {
    await this.initialize();
    return this.snapshot().filter((a) => a.status === AgreementStatus.ACTIVE);
  }

  /**
   * Gets agreements created within [from, to]. A null subject key matches
   * every subject.
   */
  async getByDateRange(subjectKey: string | null, from: Date, to: Date): Promise<Agreement[]> {
    await this.initialize();
    return this.snapshot().filter(
      (a) =>
        (subjectKey === null || a.subject_key === subjectKey) &&
        a.created_at.getTime() >= from.getTime() &&
        a.created_at.getTime() <= to.getTime()
    );
  }

  /**
   * ACTIVE → COMPLETED. Returns false when the agreement is missing or no
   * longer ACTIVE.
   */
  async markCompleted(agreementId: string, at?: Date): Promise<boolean> {
    const completedAt = at ?? this.clock.now();
    return this.transition(agreementId, 'markCompleted', (current) => ({
      ...current,
      status: AgreementStatus.COMPLETED,
      completed_at: new Date(completedAt.getTime()),
    }));
  }

  /**
   * ACTIVE → VIOLATED. Returns false when the agreement is missing or no
   * longer ACTIVE.
   */
  async markViolated(agreementId: string, at: Date): Promise<boolean> {
    return this.transition(agreementId, 'markViolated', (current) => ({
      ...current,
      status: AgreementStatus.VIOLATED,
      violated_at: new Date(at.getTime()),
    }));
  }

  /**
   * Closes an ACTIVE agreement as COMPLETED and stores a successor that
   * runs for the remaining time plus `additionalMs`. Returns null when the
   * agreement is missing or no longer ACTIVE.
   */
  async extend(agreementId: string, additionalMs: number, at?: Date): Promise<ExtensionResult | null> {
    await this.initialize();
    const now = at ?? this.clock.now();

    return this.withLock(agreementId, async () => {
      const current = this.agreements.get(agreementId);
      if (!current || current.status !== AgreementStatus.ACTIVE) {
        return null;
      }

      const successor = AgreementFactory.createSuccessor(current, additionalMs, now);
      const closed: Agreement = {
        ...cloneAgreement(current),
        status: AgreementStatus.COMPLETED,
        completed_at: new Date(now.getTime()),
      };

      await this.persist(successor, 'extend');
      await this.persist(closed, 'extend');
      this.agreements.set(successor.agreement_id, successor);
      this.agreements.set(closed.agreement_id, closed);

      return { original: cloneAgreement(closed), successor: cloneAgreement(successor) };
    });
  }

  /**
   * Counts by status, optionally limited to agreements created in [from, to]
   */
  async getStats(from?: Date, to?: Date): Promise<AgreementStats> {
    await this.initialize();
    const agreements = this.snapshot().filter(
      (a) =>
        (!from || a.created_at.getTime() >= from.getTime()) &&
        (!to || a.created_at.getTime() <= to.getTime())
    );

    const active = agreements.filter((a) => a.status === AgreementStatus.ACTIVE).length;
    const completed = agreements.filter((a) => a.status === AgreementStatus.COMPLETED).length;
    const violated = agreements.filter((a) => a.status === AgreementStatus.VIOLATED).length;
    const closed = completed + violated;

    return {
      total: agreements.length,
      active,
      completed,
      violated,
      success_rate: closed === 0 ? 0 : Math.round((completed / closed) * 100),
    };
  }

  /**
   * Gets count of agreements
   */
  async count(): Promise<number> {
    await this.initialize();
    return this.agreements.size;
  }

  /**
   * Clears all agreements (for testing)
   */
  async clear(): Promise<void> {
    await this.initialize();
    await this.adapter.clear();
    this.agreements.clear();
  }

  private async load(): Promise<void> {
    await this.adapter.initialize();
    const stored = await this.adapter.getAll();
    this.agreements.clear();
    for (const agreement of stored) {
      this.agreements.set(agreement.agreement_id, agreement);
    }
    this.initialized = true;
  }

  private snapshot(): Agreement[] {
    return Array.from(this.agreements.values()).map(cloneAgreement).sort(newestFirst);
  }

  private async transition(
    agreementId: string,
    operation: string,
    apply: (current: Agreement) => Agreement
  ): Promise<boolean> {
    await this.initialize();

    return this.withLock(agreementId, async () => {
      const current = this.agreements.get(agreementId);
      if (!current || current.status !== AgreementStatus.ACTIVE) {
        return false;
      }

      const updated = apply(cloneAgreement(current));
      await this.persist(updated, operation);
      this.agreements.set(agreementId, updated);
      return true;
    });
  }

  private async persist(agreement: Agreement, operation: string): Promise<void> {
    try {
      await this.adapter.save(agreement);
    } catch (error) {
      if (error instanceof RepositoryError) {
        throw error;
      }
      throw new RepositoryError(
        `Failed to persist agreement ${agreement.agreement_id}: ${describeError(error)}`,
        ErrorCode.STORAGE_WRITE_FAILED,
        { agreement_id: agreement.agreement_id, operation },
        { cause: error }
      );
    }
  }

  /**
   * Runs `fn` after every earlier call for the same ID has settled
   */
  private async withLock<T>(agreementId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(agreementId) ?? Promise.resolve();
    const run = previous.then(fn);
    // The chain only tracks ordering; failures reach the caller through `run`
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(agreementId, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(agreementId) === tail) {
        this.locks.delete(agreementId);
      }
    }
  }
}
