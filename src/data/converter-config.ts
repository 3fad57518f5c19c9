import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { formatError } from '../kernel/diagnostics.js';
import { CONVERSION_DIRECTIONS } from '../kernel/grid.js';

export const DEFAULT_CONFIG_PATH = 'tes3_ab.config.yaml';

export const DEFAULT_DECODER_COMMAND = process.platform === 'win32' ? 'tes3conv.exe' : './tes3conv';

export const ConverterConfigSchema = z
  .object({
    direction: z.enum(CONVERSION_DIRECTIONS).optional(),
    referenceRegionPath: z.string().min(1).default('tes3_ab_cell_x-y_data.yaml'),
    overridesPath: z.string().min(1).default('tes3_ab_custom_cell_x-y_data.txt'),
    decoderCommand: z.string().min(1).default(DEFAULT_DECODER_COMMAND),
    logFile: z.string().min(1).default('tes3_ab.log'),
    silent: z.boolean().default(false),
    batch: z.boolean().default(false),
    backup: z.boolean().default(true),
  })
  .strict();

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;

export interface LoadConverterConfigResult {
  readonly config: ConverterConfig | null;
  readonly diagnostics: readonly Diagnostic[];
}

export const defaultConverterConfig = (): ConverterConfig => ConverterConfigSchema.parse({});

export function parseConverterConfig(value: unknown, sourcePath: string): LoadConverterConfigResult {
  const parsed = ConverterConfigSchema.safeParse(value ?? {});
  if (!parsed.success) {
    return {
      config: null,
      diagnostics: parsed.error.issues.map((issue) => ({
        code: 'CONFIG_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `config.${issue.path.join('.')}` : 'config',
        severity: 'error',
        message: issue.message,
        assetPath: sourcePath,
      })),
    };
  }
  return { config: parsed.data, diagnostics: [] };
}

/**
 * Reads the YAML configuration. A missing file at the default location falls
 * back to defaults; a missing file that was asked for explicitly is an error.
 */
export function loadConverterConfig(configPath: string | undefined): LoadConverterConfigResult {
  const resolvedPath = configPath ?? DEFAULT_CONFIG_PATH;
  if (!existsSync(resolvedPath)) {
    if (configPath === undefined) {
      return { config: defaultConverterConfig(), diagnostics: [] };
    }
    return {
      config: null,
      diagnostics: [
        {
          code: 'CONFIG_FILE_NOT_FOUND',
          path: 'config.file',
          severity: 'error',
          message: `Configuration file not found: ${resolvedPath}.`,
          assetPath: resolvedPath,
        },
      ],
    };
  }

  let value: unknown;
  try {
    value = parseYaml(readFileSync(resolvedPath, 'utf8'));
  } catch (error) {
    return {
      config: null,
      diagnostics: [
        {
          code: 'CONFIG_PARSE_ERROR',
          path: 'config.file',
          severity: 'error',
          message: `Failed to parse configuration file: ${formatError(error)}.`,
          assetPath: resolvedPath,
        },
      ],
    };
  }

  return parseConverterConfig(value, resolvedPath);
}
