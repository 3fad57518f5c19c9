import { addConversionTag, findConversionTag } from './conversion-tag.js';
import type { MasterLayout } from './dependency-order.js';
import { checkDependencyOrder } from './dependency-order.js';
import type { Diagnostic } from './diagnostics.js';
import { createDiagnosticCollector } from './diagnostics.js';
import { scanDocument } from './document-scanner.js';
import type { ConversionDirection } from './grid.js';
import { DIRECTION_LABELS } from './grid.js';
import type { ConversionError } from './runtime-error.js';
import { conversionError, isConversionError } from './runtime-error.js';
import type { TranslationContext } from './translation-context.js';
import { withDiagnostics } from './translation-context.js';

export type SkipReason = 'already-converted' | 'no-changes';

export type DocumentConversionOutcome =
  | {
      readonly status: 'converted';
      readonly records: readonly unknown[];
      readonly layout: MasterLayout;
      readonly touchedScriptIds: readonly string[];
      readonly diagnostics: readonly Diagnostic[];
    }
  | {
      readonly status: 'skipped';
      readonly reason: SkipReason;
      readonly previousDirection?: ConversionDirection;
      readonly diagnostics: readonly Diagnostic[];
    }
  | {
      readonly status: 'failed';
      readonly error: ConversionError;
      readonly diagnostics: readonly Diagnostic[];
    };

/**
 * Runs the whole translation pass over one decoded document. The records are
 * mutated in place; the caller writes them back only for `converted`.
 */
export function convertDocument(document: unknown, context: TranslationContext): DocumentConversionOutcome {
  const collector = createDiagnosticCollector(context.diagnostics);
  const scoped = withDiagnostics(context, collector);

  if (!Array.isArray(document)) {
    return {
      status: 'failed',
      error: conversionError('DOCUMENT_MALFORMED', 'Decoded document is not an array of records.', {
        detail: document === null ? 'null' : typeof document,
      }),
      diagnostics: collector.diagnostics,
    };
  }
  const records: readonly unknown[] = document;

  const order = checkDependencyOrder(records);
  if (!order.ok) {
    return { status: 'failed', error: order.error, diagnostics: collector.diagnostics };
  }
  collector.report({
    code: 'MASTER_ORDER_VALID',
    path: 'records.Header.masters',
    severity: 'info',
    message: `Valid order of parent master files found: ${order.layout}.`,
  });

  const previousDirection = findConversionTag(records);
  if (previousDirection !== undefined) {
    collector.report({
      code: 'ALREADY_CONVERTED',
      path: 'records.Header.description',
      severity: 'warning',
      message: `Document already carries the ${DIRECTION_LABELS[previousDirection]} conversion marker; conversion skipped.`,
    });
    return { status: 'skipped', reason: 'already-converted', previousDirection, diagnostics: collector.diagnostics };
  }

  let touchedScriptIds: readonly string[];
  try {
    const state = scanDocument(records, scoped);
    if (!state.anyChanged) {
      collector.report({
        code: 'NO_REPLACEMENTS',
        path: 'records',
        severity: 'info',
        message: 'No replacements found; conversion skipped.',
      });
      return { status: 'skipped', reason: 'no-changes', diagnostics: collector.diagnostics };
    }
    touchedScriptIds = [...state.touchedScriptIds];
  } catch (error) {
    if (isConversionError(error)) {
      return { status: 'failed', error, diagnostics: collector.diagnostics };
    }
    throw error;
  }

  const tagged = addConversionTag(records, context.direction);
  if (!tagged.ok) {
    return { status: 'failed', error: tagged.error, diagnostics: collector.diagnostics };
  }

  return {
    status: 'converted',
    records,
    layout: order.layout,
    touchedScriptIds,
    diagnostics: collector.diagnostics,
  };
}
