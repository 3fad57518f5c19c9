import { copyFileSync, existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import type { SkipReason } from '../kernel/convert-document.js';
import { convertDocument } from '../kernel/convert-document.js';
import { formatError } from '../kernel/diagnostics.js';
import type { TranslationContext } from '../kernel/translation-context.js';
import type { DocumentCodec } from './document-codec.js';
import type { RunLog } from './run-log.js';

export interface BatchDependencies {
  readonly codec: DocumentCodec;
  readonly context: TranslationContext;
  readonly log: RunLog;
  readonly backup: boolean;
  readonly clock?: () => number;
}

export type FileOutcome =
  | {
      readonly path: string;
      readonly status: 'converted';
      readonly touchedScriptIds: readonly string[];
      readonly backupPath?: string;
    }
  | { readonly path: string; readonly status: 'skipped'; readonly reason: SkipReason }
  | { readonly path: string; readonly status: 'failed'; readonly message: string };

export interface BatchSummary {
  readonly converted: number;
  readonly skipped: number;
  readonly failed: number;
  readonly outcomes: readonly FileOutcome[];
  readonly elapsedSeconds: number;
}

export interface WorkingPaths {
  readonly decodedPath: string;
  readonly exportPath: string;
}

export function workingPathsFor(pluginPath: string): WorkingPaths {
  const directory = dirname(pluginPath);
  const stem = basename(pluginPath, extname(pluginPath));
  return {
    decodedPath: join(directory, `${stem}.json`),
    exportPath: join(directory, `TEMP_${stem}.json`),
  };
}

/** `<name>.bak`, then `<name>.1.bak`, `<name>.2.bak`, ... when taken. */
export function nextBackupPath(pluginPath: string): string {
  let candidate = `${pluginPath}.bak`;
  for (let suffix = 1; existsSync(candidate); suffix += 1) {
    candidate = `${pluginPath}.${suffix}.bak`;
  }
  return candidate;
}

function logTouchedScripts(log: RunLog, touchedScriptIds: readonly string[]): void {
  if (touchedScriptIds.length === 0) {
    log.note('No scripts were updated.');
    return;
  }
  log.summary('Updated scripts list:');
  for (const id of touchedScriptIds) {
    log.summary(`- Script ID: ${id}`);
  }
}

function failFile(pluginPath: string, log: RunLog, code: string, message: string): FileOutcome {
  log.report({ code, path: 'file', severity: 'error', message, assetPath: pluginPath });
  return { path: pluginPath, status: 'failed', message };
}

export function processFile(pluginPath: string, dependencies: BatchDependencies): FileOutcome {
  const { codec, context, log } = dependencies;
  const { decodedPath, exportPath } = workingPathsFor(pluginPath);
  log.note(`\nProcessing file: ${pluginPath}`);

  try {
    codec.decode(pluginPath, decodedPath);
    const document: unknown = JSON.parse(readFileSync(decodedPath, 'utf8'));
    const outcome = convertDocument(document, context);

    if (outcome.status === 'skipped') {
      log.summary(`Conversion skipped for file: ${pluginPath}`);
      return { path: pluginPath, status: 'skipped', reason: outcome.reason };
    }
    if (outcome.status === 'failed') {
      return failFile(pluginPath, log, outcome.error.code, outcome.error.message);
    }

    logTouchedScripts(log, outcome.touchedScriptIds);
    writeFileSync(exportPath, JSON.stringify(outcome.records, null, 2));

    let backupPath: string | undefined;
    if (dependencies.backup) {
      backupPath = nextBackupPath(pluginPath);
      copyFileSync(pluginPath, backupPath);
      log.note(`Backup created: ${backupPath}`);
    }

    codec.encode(exportPath, pluginPath);
    log.summary(`File converted: ${pluginPath}`);
    return {
      path: pluginPath,
      status: 'converted',
      touchedScriptIds: outcome.touchedScriptIds,
      ...(backupPath === undefined ? {} : { backupPath }),
    };
  } catch (error) {
    return failFile(pluginPath, log, 'FILE_CONVERSION_FAILED', `Failed to process file: ${formatError(error)}`);
  } finally {
    rmSync(decodedPath, { force: true });
    rmSync(exportPath, { force: true });
  }
}

export function runBatch(files: readonly string[], dependencies: BatchDependencies): BatchSummary {
  const clock = dependencies.clock ?? Date.now;
  const startedAt = clock();
  const outcomes = files.map((file) => processFile(file, dependencies));
  const elapsedSeconds = (clock() - startedAt) / 1000;

  const summary: BatchSummary = {
    converted: outcomes.filter((outcome) => outcome.status === 'converted').length,
    skipped: outcomes.filter((outcome) => outcome.status === 'skipped').length,
    failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
    outcomes,
    elapsedSeconds,
  };
  dependencies.log.summary(formatBatchSummary(summary));
  return summary;
}

export function formatBatchSummary(summary: BatchSummary): string {
  return (
    `\nConverted: ${summary.converted}, skipped: ${summary.skipped}, failed: ${summary.failed} ` +
    `(total processing time: ${summary.elapsedSeconds.toFixed(3)} seconds)`
  );
}
