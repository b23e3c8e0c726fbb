import fs from 'node:fs';
import { z } from 'zod';

import type { InMemoryCredentialStore } from '../auth/credential-store.js';

const SeedCredential = z
  .object({
    key: z.string().min(1),
    id: z.string().min(1),
    name: z.string().min(1),
    permissions: z.array(z.string().min(1)).default([]),
    expiresAt: z.string().datetime({ offset: true }).optional(),
  })
  .strict();

export const SeedCredentialsSchema = z.array(SeedCredential);

export type SeedCredential = z.infer<typeof SeedCredential>;

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');

export const parseSeedCredentials = (input: unknown): readonly SeedCredential[] => {
  const parsed = SeedCredentialsSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid API key seed file: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

/**
 * Adds every seed entry to the store and returns how many were added.
 */
export const seedCredentialStore = (
  store: InMemoryCredentialStore,
  seeds: readonly SeedCredential[],
  now: Date = new Date(),
): number => {
  for (const seed of seeds) {
    store.add(seed.key, {
      id: seed.id,
      name: seed.name,
      permissions: seed.permissions,
      createdAt: now,
      ...(seed.expiresAt ? { expiresAt: new Date(seed.expiresAt) } : {}),
    });
  }
  return seeds.length;
};

export const loadCredentialsFile = (filePath: string): readonly SeedCredential[] => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read API key seed file ${filePath}: ${message}`, { cause: error });
  }
  return parseSeedCredentials(raw);
};
