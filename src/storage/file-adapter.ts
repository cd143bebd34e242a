/**
 * File Storage Adapter
 *
 * JSON file-based storage adapter for persistent storage.
 * Uses atomic writes to prevent data corruption.
 * Includes SHA-256 integrity verification to detect tampering.
 */

import { createHash } from 'crypto';
import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { Agreement } from '../types';
import { ErrorCode, RepositoryError, describeError } from '../errors';
import {
  StorageAdapter,
  SerializedAgreement,
  cloneAgreement,
  serializeAgreement,
  deserializeAgreement,
  isRecord,
  isSerializedAgreement,
} from './adapter';

export interface FileStorageConfig {
  /**
   * Path to the storage file
   */
  filePath: string;

  /**
   * Whether to create the file if it doesn't exist
   */
  createIfMissing?: boolean;

  /**
   * Whether to pretty-print JSON (default: false)
   */
  prettyPrint?: boolean;
}

interface StorageFileFormat {
  version: number;
  updated_at: string;
  agreements: SerializedAgreement[];
  checksum?: string; // SHA-256 hash of agreements array
}

const FILE_VERSION = 1;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function checksumOf(agreements: SerializedAgreement[]): string {
  return createHash('sha256').update(JSON.stringify(agreements)).digest('hex');
}

export class FileStorageAdapter implements StorageAdapter {
  private agreements: Map<string, Agreement> = new Map();
  private filePath: string;
  private createIfMissing: boolean;
  private prettyPrint: boolean;
  private initialized = false;

  constructor(config: FileStorageConfig) {
    this.filePath = path.resolve(config.filePath);
    this.createIfMissing = config.createIfMissing ?? true;
    this.prettyPrint = config.prettyPrint ?? false;
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fsPromises.mkdir(path.dirname(this.filePath), { recursive: true });

    const content = await this.readFileIfPresent();
    if (content !== null) {
      this.agreements = this.parseFile(content);
    } else if (this.createIfMissing) {
      await this.writeFile(this.agreements);
    } else {
      throw new RepositoryError(
        `Storage file not found: ${this.filePath}`,
        ErrorCode.STORAGE_READ_FAILED
      );
    }

    this.initialized = true;
  }

  async save(agreement: Agreement): Promise<void> {
    this.ensureInitialized();
    const next = new Map(this.agreements);
    next.set(agreement.agreement_id, cloneAgreement(agreement));
    await this.writeFile(next);
    this.agreements = next;
  }

  async get(agreementId: string): Promise<Agreement | null> {
    this.ensureInitialized();
    const agreement = this.agreements.get(agreementId);
    return agreement ? cloneAgreement(agreement) : null;
  }

  async getAll(): Promise<Agreement[]> {
    this.ensureInitialized();
    return Array.from(this.agreements.values()).map(cloneAgreement);
  }

  async count(): Promise<number> {
    this.ensureInitialized();
    return this.agreements.size;
  }

  async clear(): Promise<void> {
    this.ensureInitialized();
    await this.writeFile(new Map());
    this.agreements.clear();
  }

  async close(): Promise<void> {
    if (this.initialized) {
      await this.writeFile(this.agreements);
    }
    this.initialized = false;
  }

  /**
   * Gets the file path being used
   */
  getFilePath(): string {
    return this.filePath;
  }

  private async readFileIfPresent(): Promise<string | null> {
    try {
      return await fsPromises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new RepositoryError(
        `Failed to read storage file: ${describeError(error)}`,
        ErrorCode.STORAGE_READ_FAILED,
        {},
        { cause: error }
      );
    }
  }

  /**
   * Parses and verifies the storage file
   */
  private parseFile(content: string): Map<string, Agreement> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new RepositoryError(
        `Failed to parse storage file: ${describeError(error)}`,
        ErrorCode.STORAGE_READ_FAILED,
        {},
        { cause: error }
      );
    }

    const data = this.checkFormat(parsed);

    if (data.checksum && checksumOf(data.agreements) !== data.checksum) {
      throw new RepositoryError(
        'Agreement file integrity check failed: checksum does not match contents',
        ErrorCode.STORAGE_INTEGRITY_VIOLATION
      );
    }

    const agreements = new Map<string, Agreement>();
    for (const serialized of data.agreements) {
      const agreement = deserializeAgreement(serialized);
      agreements.set(agreement.agreement_id, agreement);
    }
    return agreements;
  }

  /**
   * Checks the parsed file against the storage layout
   */
  private checkFormat(parsed: unknown): StorageFileFormat {
    if (!isRecord(parsed) || typeof parsed.version !== 'number') {
      throw new RepositoryError(
        'Storage file is not an agreement store: missing version',
        ErrorCode.STORAGE_INTEGRITY_VIOLATION
      );
    }

    if (parsed.version !== FILE_VERSION) {
      throw new RepositoryError(
        `Unsupported storage file version: ${parsed.version}`,
        ErrorCode.STORAGE_READ_FAILED
      );
    }

    const { agreements, checksum, updated_at } = parsed;
    if (!Array.isArray(agreements) || !agreements.every(isSerializedAgreement)) {
      throw new RepositoryError(
        'Storage file is not an agreement store: malformed agreements list',
        ErrorCode.STORAGE_INTEGRITY_VIOLATION
      );
    }
    if (checksum !== undefined && typeof checksum !== 'string') {
      throw new RepositoryError(
        'Storage file is not an agreement store: malformed checksum',
        ErrorCode.STORAGE_INTEGRITY_VIOLATION
      );
    }

    return {
      version: parsed.version,
      updated_at: typeof updated_at === 'string' ? updated_at : '',
      agreements,
      checksum,
    };
  }

  /**
   * Writes the given records using a temp file and rename
   */
  private async writeFile(records: Map<string, Agreement>): Promise<void> {
    const agreements = Array.from(records.values()).map(serializeAgreement);

    const data: StorageFileFormat = {
      version: FILE_VERSION,
      updated_at: new Date().toISOString(),
      agreements,
      checksum: checksumOf(agreements),
    };

    const content = this.prettyPrint ? JSON.stringify(data, null, 2) : JSON.stringify(data);

    const tempPath = `${this.filePath}.tmp`;
    try {
      // Owner read/write only
      await fsPromises.writeFile(tempPath, content, { mode: 0o600, encoding: 'utf-8' });
      await fsPromises.rename(tempPath, this.filePath);
      await fsPromises.chmod(this.filePath, 0o600);
    } catch (error) {
      await fsPromises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.error('Failed to remove temporary storage file:', cleanupError);
      });
      throw new RepositoryError(
        `Failed to save storage file: ${describeError(error)}`,
        ErrorCode.STORAGE_WRITE_FAILED,
        {},
        { cause: error }
      );
    }
  }

  /**
   * Ensures the adapter has been initialized
   */
  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new RepositoryError(
        'FileStorageAdapter has not been initialized. Call initialize() first.',
        ErrorCode.STORAGE_NOT_INITIALIZED
      );
    }
  }
}
