#!/usr/bin/env node

import { logger } from '../utils/logger.js';
import { createCli } from './create-cli.js';
import { resolvePackageMetadata } from './package-metadata.js';

const { packageVersion } = resolvePackageMetadata();

const cli = createCli({ version: packageVersion });

try {
  await cli.parseAsync(process.argv);
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`Fatal error: ${message}`);
  process.exitCode = 1;
}
