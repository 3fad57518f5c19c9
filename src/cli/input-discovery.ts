import { existsSync, readdirSync, statSync } from 'node:fs';
import { extname, join } from 'node:path';
import type { Diagnostic } from '../kernel/diagnostics.js';

export const PLUGIN_EXTENSIONS: readonly string[] = ['.esp', '.esm'];

export interface InputDiscoveryResult {
  readonly files: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
}

export function isPluginFile(path: string): boolean {
  return PLUGIN_EXTENSIONS.includes(extname(path).toLowerCase());
}

/** Splits `a.esp;"b c.esm"` style targets into trimmed, unquoted paths. */
export function splitTargets(targets: readonly string[]): string[] {
  return targets
    .flatMap((target) => target.split(';'))
    .map((part) => part.replaceAll('"', '').trim())
    .filter((part) => part !== '');
}

function collectPluginFiles(directory: string, files: string[]): void {
  const entries = readdirSync(directory, { withFileTypes: true }).sort((left, right) =>
    left.name.localeCompare(right.name),
  );
  for (const entry of entries) {
    const entryPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      collectPluginFiles(entryPath, files);
    } else if (entry.isFile() && isPluginFile(entry.name)) {
      files.push(entryPath);
    }
  }
}

export function discoverInputFiles(targets: readonly string[]): InputDiscoveryResult {
  const files: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const target of splitTargets(targets)) {
    if (!existsSync(target)) {
      diagnostics.push({
        code: 'INPUT_PATH_MISSING',
        path: 'inputs',
        severity: 'warning',
        message: `Input path not found: ${target}`,
        assetPath: target,
      });
      continue;
    }
    if (statSync(target).isDirectory()) {
      collectPluginFiles(target, files);
      continue;
    }
    if (!isPluginFile(target)) {
      diagnostics.push({
        code: 'INPUT_EXTENSION_UNSUPPORTED',
        path: 'inputs',
        severity: 'warning',
        message: `Input file has invalid extension: ${target}`,
        suggestion: 'Only .esp and .esm files are converted.',
        assetPath: target,
      });
      continue;
    }
    files.push(target);
  }

  return { files, diagnostics };
}

export function checkBatchRequirement(files: readonly string[], batch: boolean): Diagnostic | undefined {
  if (batch || files.length <= 1) {
    return undefined;
  }
  return {
    code: 'INPUT_BATCH_REQUIRED',
    path: 'inputs',
    severity: 'error',
    message: `Found ${files.length} input files; batch mode is required to convert more than one file.`,
    suggestion: 'Re-run with -b/--batch.',
  };
}
