import { readFileSync } from 'node:fs';
import { CellSet } from '../kernel/cell-set.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { formatError } from '../kernel/diagnostics.js';

export interface OverrideListResult {
  readonly overrides: CellSet;
  readonly diagnostics: readonly Diagnostic[];
}

const COMMENT_PREFIX = '//';
const CELL_PAIR_PATTERN = /^(-?\d+)\s*,\s*(-?\d+)$/;

/**
 * One `gx,gy` pair per line. Blank lines and `//` comments are skipped;
 * anything else that is not an integer pair is warned about and skipped.
 */
export function parseOverrideList(text: string, sourcePath?: string): OverrideListResult {
  const overrides = new CellSet();
  const diagnostics: Diagnostic[] = [];
  const assetPath = sourcePath === undefined ? {} : { assetPath: sourcePath };

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith(COMMENT_PREFIX)) {
      return;
    }

    const path = `overrides.line[${index + 1}]`;
    const match = CELL_PAIR_PATTERN.exec(line);
    const gx = match?.[1];
    const gy = match?.[2];
    if (gx === undefined || gy === undefined) {
      diagnostics.push({
        code: 'OVERRIDE_LINE_INVALID',
        path,
        severity: 'warning',
        message: `Invalid coordinate format: ${line}`,
        suggestion: 'Write one "x,y" integer pair per line, for example "-3,12".',
        ...assetPath,
      });
      return;
    }

    overrides.add({ gx: Number(gx), gy: Number(gy) });
    diagnostics.push({
      code: 'OVERRIDE_CELL_LOADED',
      path,
      severity: 'info',
      message: `Coordinate: ${Number(gx)},${Number(gy)}`,
      ...assetPath,
    });
  });

  return { overrides, diagnostics };
}

export function loadOverrideListFromFile(filePath: string): OverrideListResult {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (error) {
    return {
      overrides: new CellSet(),
      diagnostics: [
        {
          code: 'OVERRIDE_FILE_UNREADABLE',
          path: 'overrides.file',
          severity: 'error',
          message: `Failed to open custom grid coordinates file: ${formatError(error)}.`,
          suggestion: 'Create the file (it may be empty) or point the configuration at an existing one.',
          assetPath: filePath,
        },
      ],
    };
  }

  return parseOverrideList(text, filePath);
}
