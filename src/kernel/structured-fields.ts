import { isCoordinateValid } from './coordinate-validator.js';
import type { CellIndex } from './grid.js';
import { CELL_SIZE, cellOf, formatCell, formatCoordinate, translateCell, translateCoordinate } from './grid.js';
import type { DocumentRecord, NumberPairField } from './record-shape.js';
import { isRecord, isUnknownArray, readNumberPair, readRecordId, writeNumberPair } from './record-shape.js';
import type { ReplacementTracker } from './replacement-tracker.js';
import type { TranslationContext } from './translation-context.js';

export const GRID_RECORD_TYPES = ['Cell', 'Landscape', 'PathGrid'] as const;

export type GridRecordType = (typeof GRID_RECORD_TYPES)[number];

export function isGridRecordType(type: string): type is GridRecordType {
  return (GRID_RECORD_TYPES as readonly string[]).includes(type);
}

interface GridField {
  readonly field: NumberPairField;
  readonly path: string;
}

/** Grid pairs live either on the record itself or under its `data` object. */
function locateGridField(record: DocumentRecord, recordPath: string): GridField | 'missing' | 'invalid' {
  let candidate: unknown;
  let path: string;
  if (isUnknownArray(record.grid)) {
    candidate = record.grid;
    path = `${recordPath}.grid`;
  } else if (isRecord(record.data) && isUnknownArray(record.data.grid)) {
    candidate = record.data.grid;
    path = `${recordPath}.data.grid`;
  } else {
    return 'missing';
  }

  const field = readNumberPair(candidate);
  if (field === undefined || !Number.isInteger(field.first) || !Number.isInteger(field.second)) {
    return 'invalid';
  }
  return { field, path };
}

/**
 * Validates and shifts the grid index of a Cell, Landscape or PathGrid record.
 * Returns whether the grid moved. A missing or malformed grid is a warning.
 */
export function translateGridField(
  record: DocumentRecord,
  recordPath: string,
  context: TranslationContext,
  tracker: ReplacementTracker,
): boolean {
  const located = locateGridField(record, recordPath);
  if (located === 'missing' || located === 'invalid') {
    context.diagnostics.report({
      code: located === 'missing' ? 'GRID_FIELD_MISSING' : 'GRID_FIELD_INVALID',
      path: recordPath,
      severity: 'warning',
      message:
        located === 'missing'
          ? `Grid key is missing for type: ${record.type}.`
          : `Grid of ${record.type} record is not an integer [x, y] pair.`,
      suggestion: 'The record was left unchanged.',
      ...entityOf(record),
    });
    return false;
  }

  const cell: CellIndex = { gx: located.field.first, gy: located.field.second };
  if (!isCoordinateValid(cell, context)) {
    return false;
  }

  const target = translateCell(cell, context.offset);
  writeNumberPair(located.field, target.gx, target.gy);
  tracker.markChanged();
  context.diagnostics.report({
    code: 'GRID_TRANSLATED',
    path: located.path,
    severity: 'info',
    message: `Updating grid coordinates for (${record.type}): ${formatCell(cell)} -> ${formatCell(target)}.`,
    ...entityOf(record),
  });
  return true;
}

/**
 * Moves the temporary references of a Cell whose grid has just been shifted.
 * No region check: the references follow their cell.
 */
export function shiftTemporaryReferences(
  cell: DocumentRecord,
  recordPath: string,
  context: TranslationContext,
  tracker: ReplacementTracker,
): void {
  const references = cell.references;
  if (!isUnknownArray(references)) {
    context.diagnostics.report({
      code: 'CELL_REFERENCES_MISSING',
      path: `${recordPath}.references`,
      severity: 'info',
      message: 'References key is missing or is not an array.',
      ...entityOf(cell),
    });
    return;
  }

  references.forEach((reference, index) => {
    const path = `${recordPath}.references[${index}]`;
    if (!isRecord(reference) || reference.deleted === true) {
      return;
    }

    const translation = 'temporary' in reference ? readNumberPair(reference.translation) : undefined;
    if (translation === undefined) {
      context.diagnostics.report({
        code: 'CELL_REFERENCE_NOT_TEMPORARY',
        path,
        severity: 'info',
        message: `No temporary translation found in reference: ${readRecordId(reference) ?? 'Unknown ID'}.`,
      });
      return;
    }

    const shiftedX = translation.first + context.offset.dx * CELL_SIZE;
    const shiftedY = translation.second + context.offset.dy * CELL_SIZE;
    writeNumberPair(translation, shiftedX, shiftedY);
    tracker.markChanged();
    context.diagnostics.report({
      code: 'CELL_REFERENCE_SHIFTED',
      path: `${path}.translation`,
      severity: 'info',
      message:
        `Reference ${readRecordId(reference) ?? 'Unknown ID'}: ` +
        `${formatCoordinate({ x: translation.first, y: translation.second })} -> ${formatCoordinate({ x: shiftedX, y: shiftedY })}.`,
    });
  });
}

export function isInteriorCell(cell: DocumentRecord): boolean {
  return isRecord(cell.data) && typeof cell.data.flags === 'string' && cell.data.flags.includes('IS_INTERIOR');
}

/** Shifts where interior doors lead; the door's own placement stays put. */
export function translateInteriorDoorDestinations(
  cell: DocumentRecord,
  recordPath: string,
  context: TranslationContext,
  tracker: ReplacementTracker,
): void {
  const references = cell.references;
  if (!isUnknownArray(references)) {
    return;
  }

  references.forEach((reference, index) => {
    if (!isRecord(reference) || !isUnknownArray(reference.translation) || !isRecord(reference.destination)) {
      return;
    }
    translateCoordinateField(
      reference.destination.translation,
      `${recordPath}.references[${index}].destination.translation`,
      'Interior Door',
      context,
      tracker,
      readRecordId(cell),
    );
  });
}

export function translateTravelDestinations(
  npc: DocumentRecord,
  recordPath: string,
  context: TranslationContext,
  tracker: ReplacementTracker,
): void {
  const destinations = npc.travel_destinations;
  if (!isUnknownArray(destinations)) {
    return;
  }

  destinations.forEach((destination, index) => {
    if (!isRecord(destination)) {
      return;
    }
    translateCoordinateField(
      destination.translation,
      `${recordPath}.travel_destinations[${index}].translation`,
      "NPC 'Travel Service'",
      context,
      tracker,
      readRecordId(npc),
    );
  });
}

function translateCoordinateField(
  value: unknown,
  path: string,
  label: string,
  context: TranslationContext,
  tracker: ReplacementTracker,
  entityId: string | undefined,
): void {
  const field = readNumberPair(value);
  if (field === undefined) {
    return;
  }

  const position = { x: field.first, y: field.second };
  const cell = cellOf(position);
  if (!isCoordinateValid(cell, context)) {
    return;
  }

  const translated = translateCoordinate(position, cell, context.offset);
  writeNumberPair(field, translated.x, translated.y);
  tracker.markChanged();
  context.diagnostics.report({
    code: 'DESTINATION_TRANSLATED',
    path,
    severity: 'info',
    message:
      `Found: ${label} translation -> grid ${formatCell(cell)} | coordinates ${formatCoordinate(position)}; ` +
      `new grid ${formatCell(translateCell(cell, context.offset))} | coordinates ${formatCoordinate(translated)}.`,
    ...(entityId === undefined ? {} : { entityId }),
  });
}

function entityOf(record: DocumentRecord): { readonly entityId?: string } {
  const id = readRecordId(record);
  return id === undefined ? {} : { entityId: id };
}
