import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { pathIsFile } from '../utils/fs-helpers.js';

export const DEFAULT_INPUT_FILE_NAME = 'usage-data.json';

export type ResolveInputPathOptions = {
  explicitPath?: string;
  envPath?: string;
  defaultPath?: string;
  cwd?: string;
  isFile?: (filePath: string) => Promise<boolean>;
};

/** `usage-data.json` at the package root, from both `src/cli` and `dist/cli`. */
export function getDefaultInputPath(): string {
  return fileURLToPath(new URL(`../../${DEFAULT_INPUT_FILE_NAME}`, import.meta.url));
}

/**
 * Explicit argument first, then the environment override, then the packaged default. The
 * working-directory file is only consulted when the packaged default is missing.
 */
export async function resolveInputPath(options: ResolveInputPathOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const isFile = options.isFile ?? pathIsFile;
  const explicitPath = options.explicitPath?.trim() ? options.explicitPath : undefined;
  const requestedPath = explicitPath ?? options.envPath;

  if (requestedPath) {
    return path.resolve(cwd, requestedPath);
  }

  const defaultPath = options.defaultPath ?? getDefaultInputPath();

  if (await isFile(defaultPath)) {
    return defaultPath;
  }

  const workingDirectoryPath = path.join(cwd, DEFAULT_INPUT_FILE_NAME);
  return (await isFile(workingDirectoryPath)) ? workingDirectoryPath : defaultPath;
}
