import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';

/** Converts between a binary plugin and its JSON record list on disk. */
export interface DocumentCodec {
  decode(pluginPath: string, jsonPath: string): void;
  encode(jsonPath: string, pluginPath: string): void;
}

export function createTes3convCodec(command: string): DocumentCodec {
  const run = (source: string, target: string): void => {
    execFileSync(command, [source, target], { stdio: 'pipe' });
  };
  return {
    decode: run,
    encode: run,
  };
}

/** Commands given as a path must exist; bare names are left to PATH lookup. */
export function isDecoderAvailable(command: string): boolean {
  if (!command.includes('/') && !command.includes('\\')) {
    return true;
  }
  return existsSync(command);
}
