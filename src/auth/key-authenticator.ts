import type { CredentialStore } from './credential-store.js';
import { authenticated, rejected, type AuthResult, type Authenticator } from './types.js';

const FAILURE_DETAIL = {
  unknown: 'invalid credential',
  expired: 'credential expired',
} as const;

export class ApiKeyAuthenticator implements Authenticator {
  constructor(private readonly store: CredentialStore) {}

  async authenticate(credential: string): Promise<AuthResult> {
    const result = await this.store.validate(credential);
    if (!result.valid) {
      return rejected(FAILURE_DETAIL[result.reason]);
    }

    const { record } = result;
    return authenticated({
      scheme: 'key',
      subject: record.name,
      permissions: record.permissions,
      attributes: {
        key_id: record.id,
        last_used_at: record.lastUsedAt?.toISOString(),
      },
    });
  }
}
