import type { AuthScheme } from '../auth/types.js';

export const AUTHORIZATION_HEADER = 'authorization';

const SCHEME_TOKENS: Readonly<Record<string, AuthScheme>> = {
  bearer: 'token',
  apikey: 'key',
};

export type HeaderParseResult =
  | Readonly<{ ok: true; scheme: AuthScheme; credential: string }>
  | Readonly<{ ok: false; error: string; schemeToken?: string }>;

/**
 * Finds the credential header by case-insensitive name.
 */
export const findAuthorizationHeader = (
  headers: Readonly<Record<string, string | readonly string[] | undefined>>,
): string | undefined => {
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== AUTHORIZATION_HEADER) continue;
    return typeof value === 'string' ? value : value?.[0];
  }
  return undefined;
};

/**
 * Parses `"<scheme-token> <credential>"`. The scheme token is matched
 * case-insensitively; anything but exactly two parts is malformed.
 */
export const parseAuthorizationHeader = (value: string | undefined): HeaderParseResult => {
  if (value === undefined || value.trim().length === 0) {
    return { ok: false, error: 'missing authorization header' };
  }

  const parts = value.trim().split(/\s+/);
  const [schemeToken, credential] = parts;
  if (parts.length !== 2 || !schemeToken || !credential) {
    return { ok: false, error: 'malformed header' };
  }

  const scheme = SCHEME_TOKENS[schemeToken.toLowerCase()];
  if (!scheme) {
    return { ok: false, error: `unsupported scheme: ${schemeToken}`, schemeToken };
  }

  return { ok: true, scheme, credential };
};
