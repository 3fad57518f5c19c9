import { parseArgs } from 'node:util';
import type { ConverterConfig } from '../data/converter-config.js';
import { formatError } from '../kernel/diagnostics.js';
import type { ConversionDirection } from '../kernel/grid.js';

export interface CliOptions {
  readonly help: boolean;
  readonly batch: boolean;
  readonly silent: boolean;
  readonly noBackup: boolean;
  readonly direction?: ConversionDirection;
  readonly configPath?: string;
  readonly targets: readonly string[];
}

export type ParseCliResult =
  | { readonly ok: true; readonly options: CliOptions }
  | { readonly ok: false; readonly message: string };

/** Effective settings once command-line flags are layered over the config file. */
export interface RunSettings {
  readonly direction?: ConversionDirection;
  readonly batch: boolean;
  readonly silent: boolean;
  readonly backup: boolean;
  readonly referenceRegionPath: string;
  readonly overridesPath: string;
  readonly decoderCommand: string;
  readonly logFile: string;
}

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  '-b',
  '--batch',
  '-s',
  '--silent',
  '-1',
  '--bm-to-ab',
  '-2',
  '--ab-to-bm',
  '-c',
  '--config',
  '--no-backup',
  '-h',
  '--help',
]);

export const USAGE = [
  'Usage:',
  '  tes3-ab-convert [OPTIONS] "[TARGETS]"',
  '',
  'Options:',
  '  -b, --batch         Enable batch mode (required when processing multiple files)',
  '  -s, --silent        Suppress non-critical messages',
  '  -1, --bm-to-ab      Convert Bloodmoon -> Anthology Bloodmoon',
  '  -2, --ab-to-bm      Convert Anthology Bloodmoon -> Bloodmoon',
  '  -c, --config <path> Read settings from a YAML file (default: tes3_ab.config.yaml)',
  '      --no-backup     Do not keep a .bak copy of converted files',
  '  -h, --help          Show this help message',
  '',
  'Targets:',
  '  mod.esp                              single file',
  '  file1.esp;file2.esm;"file 3.esp"     several files (requires -b)',
  '  "./Data Files/"                      directory, searched recursively (requires -b)',
].join('\n');

// Flags are matched case-insensitively; values and targets keep their case.
function normalizeFlags(argv: readonly string[]): string[] {
  return argv.map((arg) => {
    const lower = arg.toLowerCase();
    return arg.startsWith('-') && KNOWN_FLAGS.has(lower) ? lower : arg;
  });
}

export function parseCliArguments(argv: readonly string[]): ParseCliResult {
  let parsed;
  try {
    parsed = parseArgs({
      args: normalizeFlags(argv),
      allowPositionals: true,
      strict: true,
      options: {
        batch: { type: 'boolean', short: 'b' },
        silent: { type: 'boolean', short: 's' },
        'bm-to-ab': { type: 'boolean', short: '1' },
        'ab-to-bm': { type: 'boolean', short: '2' },
        config: { type: 'string', short: 'c' },
        'no-backup': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    return { ok: false, message: formatError(error) };
  }

  const { values, positionals } = parsed;
  if (values['bm-to-ab'] === true && values['ab-to-bm'] === true) {
    return { ok: false, message: 'Options --bm-to-ab and --ab-to-bm cannot be combined.' };
  }

  const direction: ConversionDirection | undefined =
    values['bm-to-ab'] === true ? 'bm-to-ab' : values['ab-to-bm'] === true ? 'ab-to-bm' : undefined;

  return {
    ok: true,
    options: {
      help: values.help === true,
      batch: values.batch === true,
      silent: values.silent === true,
      noBackup: values['no-backup'] === true,
      ...(direction === undefined ? {} : { direction }),
      ...(values.config === undefined ? {} : { configPath: values.config }),
      targets: positionals,
    },
  };
}

export function resolveRunSettings(options: CliOptions, config: ConverterConfig): RunSettings {
  const direction = options.direction ?? config.direction;
  return {
    ...(direction === undefined ? {} : { direction }),
    batch: options.batch || config.batch,
    silent: options.silent || config.silent,
    backup: options.noBackup ? false : config.backup,
    referenceRegionPath: config.referenceRegionPath,
    overridesPath: config.overridesPath,
    decoderCommand: config.decoderCommand,
    logFile: config.logFile,
  };
}
