import * as assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it } from 'node:test';

import type { RunLogWriters } from '../../src/cli/run-log.js';
import { createRunLog, formatDiagnosticLine } from '../../src/cli/run-log.js';

function captureWriters(): { writers: RunLogWriters; stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    writers: { stdout: (line) => stdout.push(line), stderr: (line) => stderr.push(line) },
    stdout,
    stderr,
  };
}

describe('formatDiagnosticLine', () => {
  it('prefixes warnings and errors and appends location and hint', () => {
    assert.equal(
      formatDiagnosticLine({
        code: 'GRID_FIELD_MISSING',
        path: 'records[3]',
        severity: 'warning',
        message: 'Grid key is missing for type: PathGrid.',
        suggestion: 'The record was left unchanged.',
        assetPath: 'mod.esp',
      }),
      'WARNING - Grid key is missing for type: PathGrid. [mod.esp]\n  The record was left unchanged.',
    );
    assert.equal(formatDiagnosticLine({ code: 'X', path: 'p', severity: 'info', message: 'plain' }), 'plain');
  });
});

describe('createRunLog', () => {
  it('routes errors to stderr and mirrors every line to the log file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'grid-log-'));
    try {
      const logFile = join(dir, 'run.log');
      const capture = captureWriters();
      const log = createRunLog({ silent: false, logFile, writers: capture.writers });

      log.report({ code: 'A', path: 'p', severity: 'info', message: 'found' });
      log.report({ code: 'B', path: 'p', severity: 'error', message: 'broken' });
      log.note('progress');
      log.summary('done');

      assert.deepEqual(capture.stdout, ['found', 'progress', 'done']);
      assert.deepEqual(capture.stderr, ['ERROR - broken']);
      assert.equal(readFileSync(logFile, 'utf8'), 'found\nERROR - broken\nprogress\ndone\n');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('drops info and progress lines in silent mode', () => {
    const capture = captureWriters();
    const log = createRunLog({ silent: true, writers: capture.writers });

    log.report({ code: 'A', path: 'p', severity: 'info', message: 'found' });
    log.report({ code: 'B', path: 'p', severity: 'warning', message: 'odd' });
    log.note('progress');
    log.summary('done');

    assert.deepEqual(capture.stdout, ['WARNING - odd', 'done']);
  });
});
