import { rewriteCommandText } from './command-rewriter.js';
import type { DocumentRecord } from './record-shape.js';
import { isDocumentRecord, readRecordId } from './record-shape.js';
import type { ReplacementState, ReplacementTracker } from './replacement-tracker.js';
import { createReplacementTracker } from './replacement-tracker.js';
import {
  isGridRecordType,
  isInteriorCell,
  shiftTemporaryReferences,
  translateGridField,
  translateInteriorDoorDestinations,
  translateTravelDestinations,
} from './structured-fields.js';
import type { TranslationContext } from './translation-context.js';

export const UNKNOWN_SCRIPT_ID = 'Unknown';

/**
 * Walks every record once, in document order, translating the fields each
 * record type carries. Records are mutated in place.
 */
export function scanDocument(records: readonly unknown[], context: TranslationContext): ReplacementState {
  const tracker = createReplacementTracker();

  records.forEach((record, index) => {
    const recordPath = `records[${index}]`;
    if (!isDocumentRecord(record)) {
      context.diagnostics.report({
        code: 'RECORD_SHAPE_UNSUPPORTED',
        path: recordPath,
        severity: 'warning',
        message: 'Record is not an object with a string "type"; it was left unchanged.',
      });
      return;
    }
    scanRecord(record, recordPath, context, tracker);
  });

  return tracker.state;
}

function scanRecord(
  record: DocumentRecord,
  recordPath: string,
  context: TranslationContext,
  tracker: ReplacementTracker,
): void {
  if (isGridRecordType(record.type)) {
    const moved = translateGridField(record, recordPath, context, tracker);
    if (record.type !== 'Cell') {
      return;
    }
    if (moved) {
      shiftTemporaryReferences(record, recordPath, context, tracker);
    }
    if (isInteriorCell(record)) {
      translateInteriorDoorDestinations(record, recordPath, context, tracker);
    }
    return;
  }

  switch (record.type) {
    case 'Npc':
      translateTravelDestinations(record, recordPath, context, tracker);
      return;
    case 'Script':
      rewriteScriptRecord(record, recordPath, context, tracker);
      return;
    case 'DialogueInfo':
      rewriteDialogueRecord(record, recordPath, context, tracker);
      return;
    default:
      return;
  }
}

function rewriteScriptRecord(
  record: DocumentRecord,
  recordPath: string,
  context: TranslationContext,
  tracker: ReplacementTracker,
): void {
  const text = record.text;
  if (typeof text !== 'string') {
    return;
  }

  const scriptId = readRecordId(record) ?? UNKNOWN_SCRIPT_ID;
  const result = rewriteCommandText(text, context, {
    owner: 'Script',
    path: `${recordPath}.text`,
    recordId: scriptId,
  });
  if (result.rewrittenCount > 0) {
    record.text = result.text;
    tracker.markScriptTouched(scriptId);
  }
}

function rewriteDialogueRecord(
  record: DocumentRecord,
  recordPath: string,
  context: TranslationContext,
  tracker: ReplacementTracker,
): void {
  const text = record.script_text;
  if (typeof text !== 'string') {
    return;
  }

  const infoId = readRecordId(record);
  const result = rewriteCommandText(text, context, {
    owner: 'DialogueInfo',
    path: `${recordPath}.script_text`,
    ...(infoId === undefined ? {} : { recordId: infoId }),
  });
  if (result.rewrittenCount > 0) {
    record.script_text = result.text;
    tracker.markChanged();
  }
}
