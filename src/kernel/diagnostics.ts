export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  readonly code: string;
  readonly path: string;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly suggestion?: string;
  readonly assetPath?: string;
  readonly entityId?: string;
}

/**
 * Receives every decision worth surfacing to an operator. The engine never
 * formats or buffers output itself; sinks decide where diagnostics go.
 */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

export interface DiagnosticCollector extends DiagnosticSink {
  readonly diagnostics: readonly Diagnostic[];
}

export function createDiagnosticCollector(forward?: DiagnosticSink): DiagnosticCollector {
  const diagnostics: Diagnostic[] = [];
  return {
    diagnostics,
    report(diagnostic) {
      diagnostics.push(diagnostic);
      forward?.report(diagnostic);
    },
  };
}

export const NULL_DIAGNOSTIC_SINK: DiagnosticSink = {
  report() {},
};

const DIAGNOSTIC_SEVERITY_RANK: Readonly<Record<DiagnosticSeverity, number>> = {
  error: 0,
  warning: 1,
  info: 2,
};

export function isAtLeastSeverity(diagnostic: Diagnostic, threshold: DiagnosticSeverity): boolean {
  return DIAGNOSTIC_SEVERITY_RANK[diagnostic.severity] <= DIAGNOSTIC_SEVERITY_RANK[threshold];
}

export function hasErrorDiagnostics(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}

export function formatError(error: unknown): string {
  if (error instanceof Error && error.message.trim() !== '') {
    return error.message;
  }
  return String(error);
}
