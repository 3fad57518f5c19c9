import { appendFileSync, writeFileSync } from 'node:fs';
import type { Diagnostic, DiagnosticSink } from '../kernel/diagnostics.js';
import { isAtLeastSeverity } from '../kernel/diagnostics.js';

/**
 * Operator-facing output for one run. Diagnostics and plain progress lines go
 * to the console and are mirrored into the log file.
 */
export interface RunLog extends DiagnosticSink {
  /** Progress detail; dropped in silent mode. */
  note(text: string): void;
  /** Always shown. */
  summary(text: string): void;
}

export interface RunLogWriters {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

export interface CreateRunLogOptions {
  readonly silent: boolean;
  readonly logFile?: string;
  readonly writers?: RunLogWriters;
}

const CONSOLE_WRITERS: RunLogWriters = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export function formatDiagnosticLine(diagnostic: Diagnostic): string {
  const prefix = diagnostic.severity === 'info' ? '' : `${diagnostic.severity.toUpperCase()} - `;
  const location = diagnostic.assetPath === undefined ? '' : ` [${diagnostic.assetPath}]`;
  const hint = diagnostic.suggestion === undefined ? '' : `\n  ${diagnostic.suggestion}`;
  return `${prefix}${diagnostic.message}${location}${hint}`;
}

export function createRunLog(options: CreateRunLogOptions): RunLog {
  const writers = options.writers ?? CONSOLE_WRITERS;
  const { logFile } = options;
  if (logFile !== undefined) {
    writeFileSync(logFile, '');
  }

  const persist = (line: string): void => {
    if (logFile !== undefined) {
      appendFileSync(logFile, `${line}\n`);
    }
  };

  return {
    report(diagnostic) {
      if (options.silent && !isAtLeastSeverity(diagnostic, 'warning')) {
        return;
      }
      const line = formatDiagnosticLine(diagnostic);
      if (diagnostic.severity === 'error') {
        writers.stderr(line);
      } else {
        writers.stdout(line);
      }
      persist(line);
    },
    note(text) {
      if (options.silent) {
        return;
      }
      writers.stdout(text);
      persist(text);
    },
    summary(text) {
      writers.stdout(text);
      persist(text);
    },
  };
}
