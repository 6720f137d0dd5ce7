import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import type { InvalidEnvironError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { TemporaryCredentials } from './credentials.js';

/**
 * An environment as an ordered list of `KEY=VALUE` entries.
 */
export type Environ = readonly string[];

/** An environ produced by {@link buildChildEnviron}: credentials first, denylist stripped. */
export type ChildEnviron = Brand<Environ, 'ChildEnviron'>;

export const ACCESS_KEY_ID = 'AWS_ACCESS_KEY_ID';
export const SECRET_ACCESS_KEY = 'AWS_SECRET_ACCESS_KEY';
export const SESSION_TOKEN = 'AWS_SESSION_TOKEN';

/**
 * Keys never inherited from the parent. Anything here would either shadow the
 * injected credentials or make the SDK in the child pick a different source.
 */
export const DENYLISTED_KEYS: ReadonlySet<string> = new Set([
  'AWS_ROLE_ARN',
  ACCESS_KEY_ID,
  SECRET_ACCESS_KEY,
  SESSION_TOKEN,
  'AWS_WEB_IDENTITY_TOKEN_FILE',
]);

/**
 * Split an entry on its first `=`. `undefined` when there is none.
 */
export function splitEntry(entry: string): { readonly key: string; readonly value: string } | undefined {
  const at = entry.indexOf('=');
  if (at === -1) return undefined;
  return { key: entry.slice(0, at), value: entry.slice(at + 1) };
}

/**
 * Build the child environment.
 *
 * Output: the three credential entries, then every parent entry whose key is
 * not denylisted, unchanged and in original order. A parent entry without `=`
 * fails the whole build.
 */
export function buildChildEnviron(
  credentials: TemporaryCredentials,
  parent: Environ
): Result<ChildEnviron, InvalidEnvironError> {
  const inherited: string[] = [];
  for (const entry of parent) {
    const split = splitEntry(entry);
    if (!split) {
      return err(Err.invalidEnviron(entry));
    }
    if (DENYLISTED_KEYS.has(split.key)) continue;
    inherited.push(entry);
  }

  const environ: Environ = [
    `${ACCESS_KEY_ID}=${credentials.accessKeyId}`,
    `${SECRET_ACCESS_KEY}=${credentials.secretAccessKey}`,
    `${SESSION_TOKEN}=${credentials.sessionToken}`,
    ...inherited,
  ];
  return ok(environ as ChildEnviron);
}

/**
 * `process.env` -> environ. Keys whose value is `undefined` are skipped.
 */
export function environFromRecord(env: Readonly<Record<string, string | undefined>>): Environ {
  const environ: string[] = [];
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    environ.push(`${key}=${value}`);
  }
  return environ;
}

/**
 * Environ -> record for `child_process.spawn`. Later duplicates win, as they
 * would for a process reading its environment top to bottom.
 */
export function environToRecord(environ: ChildEnviron): Record<string, string> {
  const record: Record<string, string> = {};
  for (const entry of environ) {
    const split = splitEntry(entry);
    if (!split) continue;
    record[split.key] = split.value;
  }
  return record;
}
