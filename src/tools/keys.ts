import { z } from 'zod';

import type { InMemoryCredentialStore } from '../auth/credential-store.js';
import type { ToolFactory, ToolSpec } from '../core/types.js';

type KeyAdministration = Pick<InMemoryCredentialStore, 'list' | 'revoke'>;

const toIso = (date: Date | undefined): string | null => (date ? date.toISOString() : null);

export const listKeys =
  (store: KeyAdministration): ToolFactory =>
  () => {
    const spec = {
      name: 'auth_list_keys',
      description: 'List registered API keys (metadata only, never the secret).',
      access: { action: 'list', resource: 'keys' },
      stability: 'stable',
      since: '0.1.0',
    } satisfies ToolSpec;

    const invoke = async () => ({
      keys: store.list().map((record) => ({
        id: record.id,
        name: record.name,
        permissions: record.permissions,
        createdAt: record.createdAt.toISOString(),
        expiresAt: toIso(record.expiresAt),
        lastUsedAt: toIso(record.lastUsedAt),
      })),
    });

    return { spec, invoke };
  };

export const revokeKey =
  (store: KeyAdministration): ToolFactory =>
  () => {
    const Schema = z.object({
      id: z.string().min(1),
      namespace: z.string().optional(),
    });

    const spec = {
      name: 'auth_revoke_key',
      description: 'Revoke an API key by id. Subsequent requests with that key fail.',
      inputSchema: Schema.shape,
      access: { action: 'revoke', resource: 'keys' },
      stability: 'stable',
      since: '0.1.0',
      notes: 'Revocation is immediate and cannot be undone; re-issue a key instead.',
    } satisfies ToolSpec;

    const invoke = async (raw: Readonly<Record<string, unknown>>) => {
      const { id } = Schema.parse(raw);
      await store.revoke(id);
      return { revoked: id };
    };

    return { spec, invoke };
  };
