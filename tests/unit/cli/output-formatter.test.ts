import { describe, it, expect, beforeAll, vi } from 'vitest';
import chalk from 'chalk';
import { formatOutput, formatResult } from '../../../src/cli/output-formatter.js';
import { interpretCliResult } from '../../../src/cli/interpret-result.js';
import { failure, misuse, success } from '../../../src/cli/types/cli-result.js';
import { toNumericExitCode, toProcessExitCode } from '../../../src/cli/types/exit-code.js';
import { ThrowingProcessTerminator } from '../../../src/runtime/adapters/test-process-adapters.js';

describe('CLI output', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('prints details as given, then warnings and suggestions', () => {
    const text = formatOutput({ message: 'Done', details: ['a', '', 'b'], warnings: ['careful'], suggestions: ['try this'] });

    expect(text.split('\n')).toEqual([
      '✅ Done',
      '',
      '  a',
      '',
      '  b',
      '',
      '⚠️  Warnings:',
      '  • careful',
      '',
      '💡 Suggestions:',
      '  • try this',
    ]);
  });

  it('marks failures', () => {
    expect(formatResult(failure('Oops'))).toBe('❌ Oops');
  });

  it('prints nothing for a bare success', () => {
    expect(formatResult(success())).toBe('');
  });

  it('maps exit codes', () => {
    expect(toNumericExitCode({ kind: 'misuse' })).toBe(2);
    expect(toNumericExitCode({ kind: 'general_error' })).toBe(1);
    expect(toProcessExitCode({ kind: 'misuse' })).toEqual({ kind: 'failure' });
  });

  it('hands failures to the terminator', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => interpretCliResult(misuse('bad args'), new ThrowingProcessTerminator())).toThrow(
      '[ProcessTerminator] terminate(failure) called in test mode',
    );
  });

  it('lets a success end naturally', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    expect(() => interpretCliResult(success({ message: 'ok' }), new ThrowingProcessTerminator())).not.toThrow();
  });
});
