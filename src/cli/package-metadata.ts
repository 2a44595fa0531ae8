import { readFileSync } from 'node:fs';

import { asRecord } from '../utils/as-record.js';

export type PackageMetadata = {
  packageName: string;
  packageVersion: string;
};

const DEFAULT_PACKAGE_NAME = 'usage-invoicing';
const DEFAULT_PACKAGE_VERSION = '0.0.0';

// Relative to src/cli and dist/cli.
const defaultPackageJsonCandidates = ['../../package.json'] as const;

type JsonLoader = (candidatePath: string) => unknown;

function readJsonBesideModule(candidatePath: string): unknown {
  const text = readFileSync(new URL(candidatePath, import.meta.url), 'utf8');
  return JSON.parse(text);
}

function normalizeMetadata(candidate: unknown): PackageMetadata | undefined {
  const packageJson = asRecord(candidate);

  if (!packageJson) {
    return undefined;
  }

  const packageName = typeof packageJson.name === 'string' ? packageJson.name.trim() : undefined;
  const packageVersion =
    typeof packageJson.version === 'string' ? packageJson.version.trim() : undefined;

  if (!packageName || !packageVersion) {
    return undefined;
  }

  return { packageName, packageVersion };
}

export function resolvePackageMetadata(
  loadJson: JsonLoader = readJsonBesideModule,
  packageJsonCandidates: readonly string[] = defaultPackageJsonCandidates,
): PackageMetadata {
  for (const candidatePath of packageJsonCandidates) {
    let candidate: unknown;

    try {
      candidate = loadJson(candidatePath);
    } catch {
      continue;
    }

    const metadata = normalizeMetadata(candidate);

    if (metadata) {
      return metadata;
    }
  }

  return {
    packageName: DEFAULT_PACKAGE_NAME,
    packageVersion: DEFAULT_PACKAGE_VERSION,
  };
}
