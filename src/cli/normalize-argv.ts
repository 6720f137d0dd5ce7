/**
 * Accept single-dash long flags (`-role-arn X`, `-duration=1h`) by rewriting
 * them to the double-dash form before commander sees them.
 *
 * Rewriting stops at `--` and at the first operand: from there on every token
 * belongs to the child command and passes through untouched.
 */

/** Long flags that take a value. */
export const VALUE_FLAGS: ReadonlySet<string> = new Set([
  'role-arn',
  'role-session-name',
  'duration',
  'external-id',
  'serial-number',
  'token-code',
  'source-identity',
]);

/** Long flags without a value. */
const SWITCH_FLAGS: ReadonlySet<string> = new Set(['help', 'version']);

const FLAG = /^--?([A-Za-z][\w-]*)(=.*)?$/s;

export function normalizeArgv(argv: readonly string[]): string[] {
  const out: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === undefined || token === '--') {
      out.push(...argv.slice(i));
      break;
    }

    const match = FLAG.exec(token);
    if (!match) {
      // First operand: the command line starts here.
      out.push(...argv.slice(i));
      break;
    }

    const [, name = '', inlineValue] = match;
    if (!VALUE_FLAGS.has(name) && !SWITCH_FLAGS.has(name)) {
      // Unknown or short flag: leave it for commander to accept or reject.
      out.push(token);
      continue;
    }

    out.push(`--${name}${inlineValue ?? ''}`);

    if (VALUE_FLAGS.has(name) && inlineValue === undefined) {
      const value = argv[i + 1];
      if (value !== undefined) {
        out.push(value);
        i++;
      }
    }
  }

  return out;
}
