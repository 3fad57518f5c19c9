import { loadConverterConfig } from '../data/converter-config.js';
import { loadOverrideListFromFile } from '../data/override-list.js';
import { loadReferenceRegionFromFile } from '../data/reference-region.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { hasErrorDiagnostics } from '../kernel/diagnostics.js';
import type { ConversionDirection } from '../kernel/grid.js';
import { DIRECTION_LABELS } from '../kernel/grid.js';
import { createTranslationContext } from '../kernel/translation-context.js';
import type { BatchSummary } from './batch.js';
import { runBatch } from './batch.js';
import type { DocumentCodec } from './document-codec.js';
import { createTes3convCodec, isDecoderAvailable } from './document-codec.js';
import { checkBatchRequirement, discoverInputFiles } from './input-discovery.js';
import { parseCliArguments, resolveRunSettings, USAGE } from './options.js';
import { promptDirection, promptTargets } from './prompt.js';
import type { RunLog, RunLogWriters } from './run-log.js';
import { createRunLog, formatDiagnosticLine } from './run-log.js';

export const EXIT_OK = 0;
export const EXIT_STARTUP_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliEnvironment {
  readonly interactive: boolean;
  readonly writers?: RunLogWriters;
  readonly createCodec: (command: string) => DocumentCodec;
  readonly promptDirection: () => Promise<ConversionDirection>;
  readonly promptTargets: () => Promise<string>;
  readonly onSummary?: (summary: BatchSummary) => void;
}

export const DEFAULT_CLI_ENVIRONMENT: CliEnvironment = {
  interactive: process.stdin.isTTY === true,
  createCodec: createTes3convCodec,
  promptDirection,
  promptTargets,
};

function reportAll(log: RunLog, diagnostics: readonly Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    log.report(diagnostic);
  }
}

export async function runCli(argv: readonly string[], environment: CliEnvironment = DEFAULT_CLI_ENVIRONMENT): Promise<number> {
  const stdout = environment.writers?.stdout ?? ((line: string) => console.log(line));
  const stderr = environment.writers?.stderr ?? ((line: string) => console.error(line));

  const parsed = parseCliArguments(argv);
  if (!parsed.ok) {
    stderr(`ERROR - ${parsed.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  const { options } = parsed;
  if (options.help) {
    stdout(USAGE);
    return EXIT_OK;
  }

  const loadedConfig = loadConverterConfig(options.configPath);
  if (loadedConfig.config === null) {
    for (const diagnostic of loadedConfig.diagnostics) {
      stderr(formatDiagnosticLine(diagnostic));
    }
    return EXIT_STARTUP_FAILED;
  }

  const settings = resolveRunSettings(options, loadedConfig.config);
  const log = createRunLog({
    silent: settings.silent,
    logFile: settings.logFile,
    ...(environment.writers === undefined ? {} : { writers: environment.writers }),
  });

  if (!isDecoderAvailable(settings.decoderCommand)) {
    log.report({
      code: 'DECODER_MISSING',
      path: 'config.decoderCommand',
      severity: 'error',
      message: `Decoder not found: ${settings.decoderCommand}`,
      suggestion: 'Download tes3conv and place it next to this program, or set decoderCommand in the configuration.',
    });
    return EXIT_STARTUP_FAILED;
  }

  const loadedRegion = loadReferenceRegionFromFile(settings.referenceRegionPath);
  reportAll(log, loadedRegion.diagnostics);
  if (loadedRegion.region === null) {
    return EXIT_STARTUP_FAILED;
  }
  log.note('Reference region loaded successfully...');

  const loadedOverrides = loadOverrideListFromFile(settings.overridesPath);
  reportAll(log, loadedOverrides.diagnostics);
  if (hasErrorDiagnostics(loadedOverrides.diagnostics)) {
    return EXIT_STARTUP_FAILED;
  }

  let direction = settings.direction;
  if (direction === undefined && environment.interactive) {
    direction = await environment.promptDirection();
  }
  if (direction === undefined) {
    stderr(`ERROR - No conversion direction given; pass -1/--bm-to-ab or -2/--ab-to-bm.\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  log.note(`Conversion direction: ${DIRECTION_LABELS[direction]}`);

  let targets = options.targets;
  if (targets.length === 0 && environment.interactive) {
    targets = [await environment.promptTargets()];
  }

  const discovered = discoverInputFiles(targets);
  reportAll(log, discovered.diagnostics);
  if (discovered.files.length === 0) {
    log.report({
      code: 'INPUT_NONE_FOUND',
      path: 'inputs',
      severity: 'error',
      message: 'Input files not found: check their directory, names, and extensions!',
    });
    return EXIT_STARTUP_FAILED;
  }
  const batchProblem = checkBatchRequirement(discovered.files, settings.batch);
  if (batchProblem !== undefined) {
    log.report(batchProblem);
    return EXIT_STARTUP_FAILED;
  }
  log.note(`Found ${discovered.files.length} valid input files:`);
  for (const file of discovered.files) {
    log.note(`  ${file}`);
  }

  const context = createTranslationContext({
    direction,
    referenceRegion: loadedRegion.region,
    overrides: loadedOverrides.overrides,
    diagnostics: log,
  });
  const summary = runBatch(discovered.files, {
    codec: environment.createCodec(settings.decoderCommand),
    context,
    log,
    backup: settings.backup,
  });
  environment.onSummary?.(summary);
  return EXIT_OK;
}
