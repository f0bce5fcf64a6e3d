import { describe, it, expect } from 'vitest';
import { executeScanCommand, type ScanCommandDeps } from '../../../src/cli/commands/scan.js';
import { PatternClassifier } from '../../../src/application/services/pattern-classifier.js';

const classifier = new PatternClassifier();

function deps(read: () => Promise<string>): ScanCommandDeps {
  return { readFile: read, classifyText: (raw) => classifier.classifyText(raw) };
}

function fsError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('executeScanCommand', () => {
  it('lists matching lines and totals per kind', async () => {
    const content = [
      '2025-05-26 09:33:40,383 INFO fine',
      '2025-05-26 09:33:41,001 ERROR init schema: error: Internal error',
      "ERROR: object store 'charts' could not be opened",
      '',
    ].join('\r\n');

    const result = await executeScanCommand('app.log', deps(async () => content));

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: '2 known error line(s) in app.log',
        details: [
          'line 2: SCHEMA_CORRUPT (schema-init-internal-error) 2025-05-26 09:33:41,001 ERROR init schema: error: Internal error',
          "line 3: STORES_NOT_CORRECTLY_SET_UP (object-store-open-failed) ERROR: object store 'charts' could not be opened",
          '',
          'SCHEMA_CORRUPT: 1',
          'STORES_NOT_CORRECTLY_SET_UP: 1',
        ],
      },
    });
  });

  it('shortens very long lines', async () => {
    const line = `init schema: error: Internal error ${'x'.repeat(200)}`;

    const result = await executeScanCommand('app.log', deps(async () => line));

    const first = result.kind === 'success' ? result.output?.details?.[0] : undefined;
    const shown = first?.replace('line 1: SCHEMA_CORRUPT (schema-init-internal-error) ', '');
    expect(shown).toBe(`${line.slice(0, 159)}…`);
  });

  it('says so when nothing matches', async () => {
    const result = await executeScanCommand('app.log', deps(async () => 'all quiet\n'));

    expect(result).toEqual({ kind: 'success', output: { message: 'No known errors in app.log' } });
  });

  it('treats a directory as misuse', async () => {
    const result = await executeScanCommand(
      'logs',
      deps(() => Promise.reject(fsError('EISDIR', 'EISDIR: illegal operation on a directory, read'))),
    );

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: 'logs is a directory', suggestions: ['Pass a single log file, e.g. mobiletouch.log'] },
    });
  });

  it('reports a file that cannot be read', async () => {
    const result = await executeScanCommand(
      'missing.log',
      deps(() => Promise.reject(fsError('ENOENT', "ENOENT: no such file or directory, open 'missing.log'"))),
    );

    expect(result).toMatchObject({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: { message: "Cannot read missing.log: ENOENT: no such file or directory, open 'missing.log'" },
    });
  });
});
