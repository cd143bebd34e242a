/**
 * Memory Storage Adapter
 *
 * In-memory storage adapter for development and testing.
 * Data is lost when the process ends.
 */

import { Agreement } from '../types';
import { StorageAdapter, cloneAgreement } from './adapter';

export class MemoryStorageAdapter implements StorageAdapter {
  private agreements: Map<string, Agreement> = new Map();

  async initialize(): Promise<void> {
    // No initialization needed for memory storage
  }

  async save(agreement: Agreement): Promise<void> {
    this.agreements.set(agreement.agreement_id, cloneAgreement(agreement));
  }

  async get(agreementId: string): Promise<Agreement | null> {
    const agreement = this.agreements.get(agreementId);
    return agreement ? cloneAgreement(agreement) : null;
  }

  async getAll(): Promise<Agreement[]> {
    return Array.from(this.agreements.values()).map(cloneAgreement);
  }

  async count(): Promise<number> {
    return this.agreements.size;
  }

  async clear(): Promise<void> {
    this.agreements.clear();
  }

  async close(): Promise<void> {
    // No cleanup needed for memory storage
  }
}
