/**
 * Credential store for opaque API keys.
 *
 * Keys are held in memory and looked up by constant-time comparison against
 * every stored entry, never by indexing on the raw secret.
 */

import crypto from 'node:crypto';
import type { Logger } from '../logging/logger.js';

export type CredentialRecord = {
  readonly id: string;
  readonly name: string;
  readonly permissions: readonly string[];
  readonly createdAt: Date;
  readonly expiresAt?: Date;
  lastUsedAt?: Date;
};

export type CredentialFailureReason = 'unknown' | 'expired';

export type CredentialValidation =
  | Readonly<{ valid: true; record: Readonly<CredentialRecord> }>
  | Readonly<{ valid: false; reason: CredentialFailureReason }>;

export interface CredentialStore {
  validate(credential: string): Promise<CredentialValidation>;
  revoke(id: string): Promise<void>;
}

export class CredentialNotFoundError extends Error {
  constructor(readonly id: string) {
    super(`credential not found: ${id}`);
    this.name = 'CredentialNotFoundError';
  }
}

type StoredCredential = Readonly<{
  digest: Buffer;
  record: CredentialRecord;
}>;

const digestOf = (value: string): Buffer => crypto.createHash('sha256').update(value).digest();

/**
 * Shows only the first 8 characters of a credential for logging.
 */
export const maskCredential = (credential: string): string =>
  credential.length <= 8 ? '****' : `${credential.slice(0, 8)}****`;

export type InMemoryCredentialStoreOptions = Readonly<{
  logger: Logger;
  now?: () => Date;
}>;

/**
 * Every operation completes inside one synchronous section, so concurrent
 * validations and revocations on the event loop never observe a half-applied change.
 */
export class InMemoryCredentialStore implements CredentialStore {
  private readonly entries = new Map<string, StoredCredential>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: InMemoryCredentialStoreOptions) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  add(credential: string, record: Omit<CredentialRecord, 'lastUsedAt'>): void {
    if (credential.length === 0) {
      throw new Error(`credential for ${record.id} must not be empty`);
    }
    if (this.entries.has(record.id)) {
      throw new Error(`duplicate credential id: ${record.id}`);
    }
    this.entries.set(record.id, {
      digest: digestOf(credential),
      record: { ...record, permissions: [...record.permissions] },
    });
  }

  async validate(credential: string): Promise<CredentialValidation> {
    const candidate = digestOf(credential);

    // no early exit: every entry is compared
    let found: CredentialRecord | undefined;
    for (const entry of this.entries.values()) {
      if (crypto.timingSafeEqual(candidate, entry.digest) && found === undefined) {
        found = entry.record;
      }
    }

    if (!found) {
      this.logger.warn({ key_prefix: maskCredential(credential) }, 'Invalid API key attempted');
      return { valid: false, reason: 'unknown' };
    }

    const now = this.now();
    if (found.expiresAt && now.getTime() > found.expiresAt.getTime()) {
      this.logger.warn({ key_id: found.id }, 'Expired API key attempted');
      return { valid: false, reason: 'expired' };
    }

    found.lastUsedAt = now;
    this.logger.info({ key_id: found.id, key_name: found.name }, 'API key authenticated');
    return { valid: true, record: { ...found } };
  }

  async revoke(id: string): Promise<void> {
    if (!this.entries.delete(id)) {
      throw new CredentialNotFoundError(id);
    }
    this.logger.info({ key_id: id }, 'API key revoked');
  }

  get(id: string): Readonly<CredentialRecord> | undefined {
    const entry = this.entries.get(id);
    return entry ? { ...entry.record } : undefined;
  }

  list(): readonly Readonly<CredentialRecord>[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry.record }));
  }

  get size(): number {
    return this.entries.size;
  }
}
