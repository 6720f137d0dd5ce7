import { describe, it, expect, vi, afterEach } from 'vitest';

vi.mock('chalk', () => ({
  default: {
    red: (str: string) => str,
    white: (str: string) => str,
    gray: (str: string) => str,
  },
}));

import { formatOutput, printResult } from '../../src/cli/output-formatter.js';
import { interpretCliResult } from '../../src/cli/interpret-result.js';
import { failure, misuse, success } from '../../src/cli/types/cli-result.js';
import { ThrowingProcessTerminator } from '../../src/runtime/adapters/throwing-process-terminator.js';

describe('formatOutput', () => {
  it('formats an error with details and suggestions', () => {
    const text = formatOutput({
      message: 'role-arn is required',
      details: ['role-arn: missing'],
      suggestions: ['Usage: x'],
    });

    expect(text).toBe(
      ['❌ role-arn is required', '', '  • role-arn: missing', '', '💡 Suggestions:', '  • Usage: x'].join('\n')
    );
  });

  it('formats a bare message on one line', () => {
    expect(formatOutput({ message: 'boom', details: [], suggestions: [] })).toBe('❌ boom');
  });

  it('separates several details from the message by one blank line', () => {
    expect(formatOutput({ message: 'Invalid configuration', details: ['a', 'b'] })).toBe(
      '❌ Invalid configuration\n\n  • a\n  • b'
    );
  });
});

describe('printResult / interpretCliResult', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints nothing for a success', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printResult(success());

    expect(error).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it('writes a failure to stderr only', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printResult(failure('boom'));

    expect(error).toHaveBeenCalledWith('❌ boom');
    expect(log).not.toHaveBeenCalled();
  });

  it('does not terminate on success', () => {
    expect(() => interpretCliResult(success(), new ThrowingProcessTerminator())).not.toThrow();
  });

  it('terminates with failure on misuse', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => interpretCliResult(misuse('bad flag'), new ThrowingProcessTerminator())).toThrow(
      '[ProcessTerminator] terminate(failure)'
    );
  });
});
