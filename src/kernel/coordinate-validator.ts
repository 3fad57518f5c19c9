import { formatError } from './diagnostics.js';
import type { CellIndex } from './grid.js';
import { formatCell, resolveGridOffset, translateCell } from './grid.js';
import type { TranslationContext } from './translation-context.js';

type RegionLookupResult = 'member' | 'absent' | 'failed';

/**
 * Decides whether a cell belongs to the translatable region.
 *
 * The reference region is keyed in Bloodmoon space, so for `ab-to-bm` the probe
 * is shifted back into that space before the lookup. Overrides are always
 * matched against the cell exactly as it appears in the document.
 *
 * A failing region lookup is reported and answers `false`, overrides included.
 */
export function isCoordinateValid(cell: CellIndex, context: TranslationContext): boolean {
  const probe = context.direction === 'ab-to-bm' ? translateCell(cell, resolveGridOffset('ab-to-bm')) : cell;

  const lookup = lookupReferenceRegion(probe, context);
  if (lookup === 'failed') {
    return false;
  }
  if (lookup === 'member') {
    return true;
  }

  return context.overrides.contains(cell);
}

function lookupReferenceRegion(probe: CellIndex, context: TranslationContext): RegionLookupResult {
  try {
    return context.referenceRegion.contains(probe) ? 'member' : 'absent';
  } catch (error) {
    context.diagnostics.report({
      code: 'REFERENCE_REGION_LOOKUP_FAILED',
      path: 'referenceRegion',
      severity: 'error',
      message: `Reference region lookup failed for cell ${formatCell(probe)}: ${formatError(error)}.`,
      suggestion: 'Check the reference region dataset; the cell is treated as outside the region.',
    });
    return 'failed';
  }
}
