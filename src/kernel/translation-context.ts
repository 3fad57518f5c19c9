import type { CellLookup } from './cell-set.js';
import { EMPTY_CELL_LOOKUP } from './cell-set.js';
import type { DiagnosticSink } from './diagnostics.js';
import { NULL_DIAGNOSTIC_SINK } from './diagnostics.js';
import type { ConversionDirection, GridOffset } from './grid.js';
import { resolveGridOffset } from './grid.js';

export interface TranslationContext {
  readonly direction: ConversionDirection;
  readonly offset: GridOffset;
  /** Known region cells, keyed in Bloodmoon space. */
  readonly referenceRegion: CellLookup;
  /** User cells, keyed in the space the user typed them in. */
  readonly overrides: CellLookup;
  readonly diagnostics: DiagnosticSink;
}

export interface CreateTranslationContextOptions {
  readonly direction: ConversionDirection;
  readonly referenceRegion: CellLookup;
  readonly overrides?: CellLookup;
  readonly diagnostics?: DiagnosticSink;
}

export function createTranslationContext(options: CreateTranslationContextOptions): TranslationContext {
  return {
    direction: options.direction,
    offset: resolveGridOffset(options.direction),
    referenceRegion: options.referenceRegion,
    overrides: options.overrides ?? EMPTY_CELL_LOOKUP,
    diagnostics: options.diagnostics ?? NULL_DIAGNOSTIC_SINK,
  };
}

export function withDiagnostics(context: TranslationContext, diagnostics: DiagnosticSink): TranslationContext {
  return { ...context, diagnostics };
}
