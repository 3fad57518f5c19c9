import type { ConversionDirection } from './grid.js';
import { CONVERSION_DIRECTIONS, DIRECTION_LABELS } from './grid.js';
import { findHeaderRecord, readHeaderDescription } from './header.js';
import type { ConversionError } from './runtime-error.js';
import { conversionError } from './runtime-error.js';

export const conversionTagFor = (direction: ConversionDirection): string => `[${DIRECTION_LABELS[direction]}]`;

/** Direction of the first conversion marker in the Header description, if any. */
export function findConversionTag(records: readonly unknown[]): ConversionDirection | undefined {
  const header = findHeaderRecord(records);
  if (header === undefined) {
    return undefined;
  }
  const description = readHeaderDescription(header.record);
  if (description === undefined) {
    return undefined;
  }

  let found: { readonly direction: ConversionDirection; readonly at: number } | undefined;
  for (const direction of CONVERSION_DIRECTIONS) {
    const at = description.indexOf(conversionTagFor(direction));
    if (at >= 0 && (found === undefined || at < found.at)) {
      found = { direction, at };
    }
  }
  return found?.direction;
}

export type AddConversionTagResult =
  | { readonly ok: true; readonly description: string }
  | { readonly ok: false; readonly error: ConversionError<'HEADER_MISSING' | 'HEADER_DESCRIPTION_MISSING'> };

export function addConversionTag(records: readonly unknown[], direction: ConversionDirection): AddConversionTagResult {
  const header = findHeaderRecord(records);
  if (header === undefined) {
    return { ok: false, error: conversionError('HEADER_MISSING', 'Missing Header record.') };
  }

  const description = readHeaderDescription(header.record);
  if (description === undefined) {
    return {
      ok: false,
      error: conversionError('HEADER_DESCRIPTION_MISSING', 'Could not find or modify the header description.'),
    };
  }

  const tagged = `${conversionTagFor(direction)} ${description}`;
  header.record.description = tagged;
  return { ok: true, description: tagged };
}
