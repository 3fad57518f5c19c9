import { z } from 'zod';
import type { DocumentRecord } from './record-shape.js';
import { isDocumentRecord } from './record-shape.js';

export const MasterEntrySchema = z.union([
  z.tuple([z.string()]).rest(z.unknown()),
  z.object({ name: z.string() }).passthrough(),
]);

// Each Header field parses on its own so one malformed field does not hide another.
export const HeaderMastersSchema = z.object({ masters: z.array(z.unknown()).optional() }).passthrough();

export const HeaderDescriptionSchema = z.object({ description: z.string().optional() }).passthrough();

export interface LocatedHeader {
  readonly record: DocumentRecord;
  readonly index: number;
}

export function findHeaderRecord(records: readonly unknown[]): LocatedHeader | undefined {
  const index = records.findIndex((record) => isDocumentRecord(record) && record.type === 'Header');
  const record = records[index];
  return index >= 0 && isDocumentRecord(record) ? { record, index } : undefined;
}

/**
 * Master names in declaration order. Entries that do not carry a name keep
 * their slot as `undefined` so positions stay comparable.
 */
export function readMasterNames(header: DocumentRecord): readonly (string | undefined)[] | undefined {
  const parsed = HeaderMastersSchema.safeParse(header);
  if (!parsed.success || parsed.data.masters === undefined) {
    return undefined;
  }

  return parsed.data.masters.map((entry) => {
    const master = MasterEntrySchema.safeParse(entry);
    if (!master.success) {
      return undefined;
    }
    return Array.isArray(master.data) ? master.data[0] : master.data.name;
  });
}

export function readHeaderDescription(header: DocumentRecord): string | undefined {
  const parsed = HeaderDescriptionSchema.safeParse(header);
  return parsed.success ? parsed.data.description : undefined;
}
