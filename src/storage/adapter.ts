/**
 * Storage Adapter Interface
 *
 * Interface for persistent storage backends.
 * Implementations can include memory, file, SQLite, PostgreSQL, etc.
 */

import { Agreement, AgreementCategory, AgreementStatus } from '../types';
import { AgreementValidator } from '../agreements/validator';
import { ErrorCode, RepositoryError } from '../errors';

/**
 * Serialized agreement format for storage
 * Converts Date objects to ISO strings for JSON compatibility
 */
export interface SerializedAgreement {
  agreement_id: string;
  subject_key: string | null;
  subject_label: string;
  category: string;
  agreed_duration_ms: number;
  created_at: string; // ISO date string
  expires_at: string; // ISO date string
  status: string;
  violated_at: string | null;
  completed_at: string | null;
  conversation_ref: string | null;
  extended_from: string | null;
  metadata?: Record<string, unknown>;
}

/**
 * Storage adapter interface
 * All storage backends must implement this interface
 */
export interface StorageAdapter {
  /**
   * Initializes the storage adapter (e.g., create tables, open files)
   */
  initialize(): Promise<void>;

  /**
   * Saves an agreement, replacing any record with the same ID
   */
  save(agreement: Agreement): Promise<void>;

  /**
   * Retrieves an agreement by ID
   */
  get(agreementId: string): Promise<Agreement | null>;

  /**
   * Gets all agreements
   */
  getAll(): Promise<Agreement[]>;

  /**
   * Gets the count of agreements
   */
  count(): Promise<number>;

  /**
   * Clears all agreements (for testing)
   */
  clear(): Promise<void>;

  /**
   * Closes the storage connection/file
   */
  close(): Promise<void>;
}

/**
 * Copies an agreement so callers cannot mutate stored state
 */
export function cloneAgreement(agreement: Agreement): Agreement {
  return {
    ...agreement,
    created_at: new Date(agreement.created_at.getTime()),
    expires_at: new Date(agreement.expires_at.getTime()),
    violated_at: agreement.violated_at ? new Date(agreement.violated_at.getTime()) : null,
    completed_at: agreement.completed_at ? new Date(agreement.completed_at.getTime()) : null,
    metadata: agreement.metadata ? { ...agreement.metadata } : undefined,
  };
}

/**
 * Serializes an Agreement for JSON storage
 */
export function serializeAgreement(agreement: Agreement): SerializedAgreement {
  return {
    agreement_id: agreement.agreement_id,
    subject_key: agreement.subject_key,
    subject_label: agreement.subject_label,
    category: agreement.category,
    agreed_duration_ms: agreement.agreed_duration_ms,
    created_at: agreement.created_at.toISOString(),
    expires_at: agreement.expires_at.toISOString(),
    status: agreement.status,
    violated_at: agreement.violated_at?.toISOString() ?? null,
    completed_at: agreement.completed_at?.toISOString() ?? null,
    conversation_ref: agreement.conversation_ref,
    extended_from: agreement.extended_from,
    metadata: agreement.metadata,
  };
}

function parseStatus(value: string, id: string): AgreementStatus {
  const status = Object.values(AgreementStatus).find((s) => s === value);
  if (!status) {
    throw new RepositoryError(
      `Stored agreement has unknown status: ${value}`,
      ErrorCode.STORAGE_INTEGRITY_VIOLATION,
      { agreement_id: id }
    );
  }
  return status;
}

function parseCategory(value: string, id: string): AgreementCategory {
  const category = Object.values(AgreementCategory).find((c) => c === value);
  if (!category) {
    throw new RepositoryError(
      `Stored agreement has unknown category: ${value}`,
      ErrorCode.STORAGE_INTEGRITY_VIOLATION,
      { agreement_id: id }
    );
  }
  return category;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

/**
 * True when a parsed JSON value has the fields of a stored agreement
 */
export function isSerializedAgreement(value: unknown): value is SerializedAgreement {
  return (
    isRecord(value) &&
    typeof value.agreement_id === 'string' &&
    isNullableString(value.subject_key) &&
    typeof value.subject_label === 'string' &&
    typeof value.category === 'string' &&
    typeof value.agreed_duration_ms === 'number' &&
    typeof value.created_at === 'string' &&
    typeof value.expires_at === 'string' &&
    typeof value.status === 'string' &&
    isNullableString(value.violated_at) &&
    isNullableString(value.completed_at) &&
    isNullableString(value.conversation_ref) &&
    isNullableString(value.extended_from) &&
    (value.metadata === undefined || isRecord(value.metadata))
  );
}

/**
 * Deserializes a stored agreement back to Agreement.
 * Throws STORAGE_INTEGRITY_VIOLATION when the record fails validation.
 */
export function deserializeAgreement(data: SerializedAgreement): Agreement {
  const agreement: Agreement = {
    agreement_id: data.agreement_id,
    subject_key: data.subject_key,
    subject_label: data.subject_label,
    category: parseCategory(data.category, data.agreement_id),
    agreed_duration_ms: data.agreed_duration_ms,
    created_at: new Date(data.created_at),
    expires_at: new Date(data.expires_at),
    status: parseStatus(data.status, data.agreement_id),
    violated_at: data.violated_at ? new Date(data.violated_at) : null,
    completed_at: data.completed_at ? new Date(data.completed_at) : null,
    conversation_ref: data.conversation_ref,
    extended_from: data.extended_from,
    metadata: data.metadata,
  };

  const validation = AgreementValidator.validate(agreement);
  if (!validation.valid) {
    throw new RepositoryError(
      `Stored agreement ${data.agreement_id} is invalid: ${validation.errors.join(', ')}`,
      ErrorCode.STORAGE_INTEGRITY_VIOLATION,
      { agreement_id: data.agreement_id }
    );
  }
  return agreement;
}
