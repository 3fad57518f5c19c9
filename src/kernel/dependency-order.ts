import { findHeaderRecord, readMasterNames } from './header.js';
import type { ConversionError } from './runtime-error.js';
import { conversionError } from './runtime-error.js';

export const BASE_MASTER = 'Morrowind.esm';
export const FIRST_EXPANSION_MASTER = 'Tribunal.esm';
export const SECOND_EXPANSION_MASTER = 'Bloodmoon.esm';

export type MasterLayout = 'M+B' | 'M+T+B';

export type DependencyOrderError = ConversionError<
  'HEADER_MISSING' | 'MASTERS_MISSING' | 'MASTER_BASE_MISSING' | 'MASTER_EXPANSION_MISSING' | 'MASTER_ORDER_INVALID'
>;

export type DependencyOrderResult =
  | { readonly ok: true; readonly layout: MasterLayout; readonly masters: readonly string[] }
  | { readonly ok: false; readonly error: DependencyOrderError };

function positionOf(masters: readonly (string | undefined)[], name: string): number | undefined {
  const target = name.toLowerCase();
  const index = masters.findIndex((master) => master?.toLowerCase() === target);
  return index >= 0 ? index : undefined;
}

/**
 * Requires the base master, then Bloodmoon after it; when Tribunal is present
 * it must sit between the two.
 */
export function checkDependencyOrder(records: readonly unknown[]): DependencyOrderResult {
  const header = findHeaderRecord(records);
  if (header === undefined) {
    return { ok: false, error: conversionError('HEADER_MISSING', 'Missing Header record.') };
  }

  const masterSlots = readMasterNames(header.record);
  if (masterSlots === undefined) {
    return { ok: false, error: conversionError('MASTERS_MISSING', "Header record has no 'masters' list.") };
  }
  const masters = masterSlots.filter((name): name is string => name !== undefined);

  const base = positionOf(masterSlots, BASE_MASTER);
  const first = positionOf(masterSlots, FIRST_EXPANSION_MASTER);
  const second = positionOf(masterSlots, SECOND_EXPANSION_MASTER);

  if (base === undefined) {
    return {
      ok: false,
      error: conversionError('MASTER_BASE_MISSING', `${BASE_MASTER} dependency not found.`, { masters }),
    };
  }

  if (second === undefined) {
    return {
      ok: false,
      error: conversionError('MASTER_EXPANSION_MISSING', `${SECOND_EXPANSION_MASTER} dependency not found.`, {
        masters,
      }),
    };
  }

  if (first !== undefined) {
    if (base < first && first < second) {
      return { ok: true, layout: 'M+T+B', masters };
    }
    return {
      ok: false,
      error: conversionError('MASTER_ORDER_INVALID', 'Invalid order of parent master files.', { masters }),
    };
  }

  if (base < second) {
    return { ok: true, layout: 'M+B', masters };
  }
  return {
    ok: false,
    error: conversionError('MASTER_ORDER_INVALID', 'Invalid order of parent master files.', { masters }),
  };
}
