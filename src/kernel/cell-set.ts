import type { CellIndex } from './grid.js';

/** Membership capability shared by the reference region and the override list. */
export interface CellLookup {
  contains(cell: CellIndex): boolean;
}

const cellKey = (cell: CellIndex): string => `${cell.gx},${cell.gy}`;

export class CellSet implements CellLookup {
  private readonly keys = new Set<string>();

  constructor(cells: Iterable<CellIndex> = []) {
    for (const cell of cells) {
      this.add(cell);
    }
  }

  add(cell: CellIndex): void {
    this.keys.add(cellKey(cell));
  }

  contains(cell: CellIndex): boolean {
    return this.keys.has(cellKey(cell));
  }

  get size(): number {
    return this.keys.size;
  }
}

export const EMPTY_CELL_LOOKUP: CellLookup = {
  contains: () => false,
};
