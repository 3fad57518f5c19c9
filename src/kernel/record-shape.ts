export type DocumentRecord = Record<string, unknown> & { readonly type: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isUnknownArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isDocumentRecord(value: unknown): value is DocumentRecord {
  return isRecord(value) && typeof value.type === 'string';
}

export function readRecordId(record: Record<string, unknown>): string | undefined {
  const id = record.id;
  return typeof id === 'string' && id !== '' ? id : undefined;
}

/** The first two components of an `[x, y, ...]` array, left in place for writing back. */
export interface NumberPairField {
  readonly values: unknown[];
  readonly first: number;
  readonly second: number;
}

export function readNumberPair(value: unknown): NumberPairField | undefined {
  if (!isUnknownArray(value) || value.length < 2) {
    return undefined;
  }
  const [first, second] = value;
  if (!isFiniteNumber(first) || !isFiniteNumber(second)) {
    return undefined;
  }
  return { values: value, first, second };
}

export function writeNumberPair(field: NumberPairField, first: number, second: number): void {
  field.values[0] = first;
  field.values[1] = second;
}
