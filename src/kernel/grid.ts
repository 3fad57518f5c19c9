/** Edge length of one exterior cell, in world units. */
export const CELL_SIZE = 8192;

export const CONVERSION_DIRECTIONS = ['bm-to-ab', 'ab-to-bm'] as const;

export type ConversionDirection = (typeof CONVERSION_DIRECTIONS)[number];

export interface Coordinate {
  readonly x: number;
  readonly y: number;
}

export interface CellIndex {
  readonly gx: number;
  readonly gy: number;
}

export interface GridOffset {
  readonly dx: number;
  readonly dy: number;
}

const GRID_OFFSETS: Readonly<Record<ConversionDirection, GridOffset>> = {
  'bm-to-ab': { dx: 7, dy: 6 },
  'ab-to-bm': { dx: -7, dy: -6 },
};

export const DIRECTION_LABELS: Readonly<Record<ConversionDirection, string>> = {
  'bm-to-ab': 'BM->AB',
  'ab-to-bm': 'AB->BM',
};

export function resolveGridOffset(direction: ConversionDirection): GridOffset {
  return GRID_OFFSETS[direction];
}

export function inverseDirection(direction: ConversionDirection): ConversionDirection {
  return direction === 'bm-to-ab' ? 'ab-to-bm' : 'bm-to-ab';
}

export function cellOf(coord: Coordinate): CellIndex {
  return {
    gx: Math.floor(coord.x / CELL_SIZE),
    gy: Math.floor(coord.y / CELL_SIZE),
  };
}

export function translateCell(cell: CellIndex, offset: GridOffset): CellIndex {
  return { gx: cell.gx + offset.dx, gy: cell.gy + offset.dy };
}

/**
 * Moves a world position by whole cells. Only the cell placement changes; the
 * position of the point inside its cell is carried over unchanged.
 */
export function translateCoordinate(coord: Coordinate, cell: CellIndex, offset: GridOffset): Coordinate {
  const target = translateCell(cell, offset);
  return {
    x: target.gx * CELL_SIZE + (coord.x - cell.gx * CELL_SIZE),
    y: target.gy * CELL_SIZE + (coord.y - cell.gy * CELL_SIZE),
  };
}

export const formatCell = (cell: CellIndex): string => `(${cell.gx}, ${cell.gy})`;

/** Fixed-point text; exact binary ties round to even, where `toFixed` rounds them away from zero. */
export function formatFixed(value: number, digits: number): string {
  const text = value.toFixed(digits);
  // A tie at `digits` places is exactly an odd number of 2^-(digits + 1) steps.
  const halfSteps = value * 2 ** (digits + 1);
  if (!Number.isSafeInteger(halfSteps) || halfSteps % 2 === 0) {
    return text;
  }
  const last = Number(text.slice(-1));
  // An odd last digit after rounding up means the even neighbour is one step toward zero; no borrow is possible.
  return last % 2 === 0 ? text : `${text.slice(0, -1)}${last - 1}`;
}

export const formatCoordinate = (coord: Coordinate): string => `(${formatFixed(coord.x, 3)}, ${formatFixed(coord.y, 3)})`;
