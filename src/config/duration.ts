import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';

/**
 * Duration strings in the `300ms`, `-1.5h`, `2h45m` style: an optional sign
 * followed by one or more decimal numbers, each with a unit suffix.
 * A bare `0` needs no unit.
 */
const UNIT_NANOS: Readonly<Partial<Record<string, bigint>>> = {
  ns: 1n,
  us: 1_000n,
  'µs': 1_000n, // U+00B5 micro sign
  'μs': 1_000n, // U+03BC Greek mu
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
};

const COMPONENT = /(\d*)(?:\.(\d*))?(ns|us|µs|μs|ms|s|m|h)/y;

const NANOS_PER_SECOND = 1_000_000_000n;

/** Durations are signed 64-bit nanosecond counts. */
const MAX_NANOS = (1n << 63n) - 1n;

export function parseDuration(input: string): Result<bigint, string> {
  const invalid = `invalid duration "${input}"`;

  let rest = input;
  let negative = false;
  if (rest.startsWith('-') || rest.startsWith('+')) {
    negative = rest.startsWith('-');
    rest = rest.slice(1);
  }

  if (rest === '0') return ok(0n);
  if (rest === '') return err(invalid);

  let total = 0n;
  let pos = 0;
  while (pos < rest.length) {
    COMPONENT.lastIndex = pos;
    const match = COMPONENT.exec(rest);
    if (!match) return err(invalid);

    const [whole, intDigits, fracDigits = '', unit] = match;
    if (intDigits === '' && fracDigits === '') return err(invalid);

    const unitNanos = UNIT_NANOS[unit];
    if (unitNanos === undefined) return err(`unknown unit "${unit}" in duration "${input}"`);

    total += BigInt(intDigits || '0') * unitNanos;
    if (fracDigits !== '') {
      total += (BigInt(fracDigits) * unitNanos) / 10n ** BigInt(fracDigits.length);
    }
    if (total > (negative ? MAX_NANOS + 1n : MAX_NANOS)) return err(invalid);
    pos += whole.length;
  }

  return ok(negative ? -total : total);
}

/** Truncates toward zero, like a float-to-int conversion of the seconds value. */
export function toWholeSeconds(nanos: bigint): number {
  return Number(nanos / NANOS_PER_SECOND);
}
