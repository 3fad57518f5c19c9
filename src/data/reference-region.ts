import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { CellSet } from '../kernel/cell-set.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { formatError } from '../kernel/diagnostics.js';

export const REFERENCE_REGION_ASSET_VERSION = 1;

/** Largest number of cells one range may expand to. */
export const MAX_RANGE_CELLS = 65_536;

const spanOf = ([min, max]: readonly [number, number]): number => Math.max(0, max - min + 1);

const CellPairSchema = z.tuple([z.number().int(), z.number().int()]);

const CellRangeSchema = z
  .object({
    x: CellPairSchema,
    y: CellPairSchema,
  })
  .strict()
  .refine((range) => range.x[0] <= range.x[1] && range.y[0] <= range.y[1], {
    message: 'Range bounds must be ordered as [min, max].',
  })
  .refine((range) => spanOf(range.x) * spanOf(range.y) <= MAX_RANGE_CELLS, {
    message: `Range must cover at most ${MAX_RANGE_CELLS} cells.`,
  });

export const ReferenceRegionPayloadSchema = z
  .object({
    cells: z.array(CellPairSchema).optional(),
    ranges: z.array(CellRangeSchema).optional(),
  })
  .strict();

export const ReferenceRegionAssetSchema = z
  .object({
    id: z.string().min(1),
    kind: z.literal('referenceRegion'),
    version: z.number().int(),
    description: z.string().optional(),
    payload: ReferenceRegionPayloadSchema,
  })
  .strict();

export type ReferenceRegionAsset = z.infer<typeof ReferenceRegionAssetSchema>;

export interface LoadReferenceRegionResult {
  readonly region: CellSet | null;
  readonly diagnostics: readonly Diagnostic[];
}

/** Expands explicit cells and inclusive ranges into one lookup set. */
export function buildReferenceRegion(asset: ReferenceRegionAsset): CellSet {
  const region = new CellSet();
  for (const [gx, gy] of asset.payload.cells ?? []) {
    region.add({ gx, gy });
  }
  for (const range of asset.payload.ranges ?? []) {
    for (let gx = range.x[0]; gx <= range.x[1]; gx += 1) {
      for (let gy = range.y[0]; gy <= range.y[1]; gy += 1) {
        region.add({ gx, gy });
      }
    }
  }
  return region;
}

export function parseReferenceRegionAsset(value: unknown, assetPath: string): LoadReferenceRegionResult {
  const parsed = ReferenceRegionAssetSchema.safeParse(value);
  if (!parsed.success) {
    return {
      region: null,
      diagnostics: parsed.error.issues.map((issue) => ({
        code: 'REFERENCE_REGION_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `asset.${issue.path.join('.')}` : 'asset',
        severity: 'error',
        message: issue.message,
        assetPath,
      })),
    };
  }

  const asset = parsed.data;
  if (asset.version !== REFERENCE_REGION_ASSET_VERSION) {
    return {
      region: null,
      diagnostics: [
        {
          code: 'REFERENCE_REGION_VERSION_UNSUPPORTED',
          path: 'asset.version',
          severity: 'error',
          message: `Unsupported reference region version ${asset.version}; expected ${REFERENCE_REGION_ASSET_VERSION}.`,
          assetPath,
          entityId: asset.id,
        },
      ],
    };
  }

  const region = buildReferenceRegion(asset);
  const diagnostics: Diagnostic[] = [];
  if (region.size === 0) {
    diagnostics.push({
      code: 'REFERENCE_REGION_EMPTY',
      path: 'asset.payload',
      severity: 'warning',
      message: 'Reference region lists no cells; only user overrides will be translated.',
      assetPath,
      entityId: asset.id,
    });
  }
  return { region, diagnostics };
}

export function loadReferenceRegionFromFile(assetPath: string): LoadReferenceRegionResult {
  const extension = extname(assetPath).toLowerCase();
  if (extension !== '.json' && extension !== '.yaml' && extension !== '.yml') {
    return {
      region: null,
      diagnostics: [
        {
          code: 'REFERENCE_REGION_FORMAT_UNSUPPORTED',
          path: 'asset.file',
          severity: 'error',
          message: `Unsupported reference region format "${extension || '(none)'}".`,
          suggestion: 'Use a .json, .yaml, or .yml reference region file.',
          assetPath,
        },
      ],
    };
  }

  let value: unknown;
  try {
    const source = readFileSync(assetPath, 'utf8');
    value = extension === '.json' ? JSON.parse(source) : parseYaml(source);
  } catch (error) {
    return {
      region: null,
      diagnostics: [
        {
          code: 'REFERENCE_REGION_PARSE_ERROR',
          path: 'asset.file',
          severity: 'error',
          message: `Failed to read reference region file: ${formatError(error)}.`,
          suggestion: 'Fix the file path or syntax and try again.',
          assetPath,
        },
      ],
    };
  }

  return parseReferenceRegionAsset(value, assetPath);
}
