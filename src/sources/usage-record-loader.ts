import type { Stats } from 'node:fs';
import { readFile } from 'node:fs/promises';

import type { UsageRecord } from '../domain/usage-record.js';
import { pathStat } from '../utils/fs-helpers.js';
import { parseUsageEntry, type RecordRejection } from './usage-entry-parser.js';
import { UsageInputError } from './usage-input-error.js';

export type UsageRecordBatch = {
  valid: UsageRecord[];
  rejected: RecordRejection[];
};

export type UsageRecordLoadResult =
  | { ok: true; batch: UsageRecordBatch }
  | { ok: false; error: UsageInputError };

export type LoadUsageRecordsOptions = {
  maxInputBytes?: number;
};

function loadFailed(error: UsageInputError): UsageRecordLoadResult {
  return { ok: false, error };
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function parseUsageRecords(content: string): UsageRecordLoadResult {
  let parsed: unknown;

  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/u, ''));
  } catch (error) {
    return loadFailed(new UsageInputError('invalid-json', `Invalid JSON: ${toErrorMessage(error)}`));
  }

  if (!Array.isArray(parsed)) {
    return loadFailed(new UsageInputError('not-array', 'Root JSON is not an array'));
  }

  const batch: UsageRecordBatch = { valid: [], rejected: [] };

  parsed.forEach((entry: unknown, index) => {
    const result = parseUsageEntry(entry, index);

    if (result.accepted) {
      batch.valid.push(result.record);
    } else {
      batch.rejected.push(result.rejection);
    }
  });

  return { ok: true, batch };
}

export async function loadUsageRecordsFromFile(
  filePath: string,
  options: LoadUsageRecordsOptions = {},
): Promise<UsageRecordLoadResult> {
  let fileStat: Stats | undefined;

  try {
    fileStat = await pathStat(filePath);
  } catch (error) {
    return loadFailed(
      new UsageInputError('unreadable', `Unable to read file: ${toErrorMessage(error)}`),
    );
  }

  if (!fileStat) {
    return loadFailed(new UsageInputError('not-found', `Input file not found at '${filePath}'`));
  }

  if (!fileStat.isFile()) {
    return loadFailed(
      new UsageInputError('unreadable', `Unable to read file: '${filePath}' is not a file`),
    );
  }

  if (options.maxInputBytes !== undefined && fileStat.size > options.maxInputBytes) {
    return loadFailed(
      new UsageInputError(
        'unreadable',
        `Unable to read file: ${fileStat.size} bytes exceeds the ${options.maxInputBytes} byte limit`,
      ),
    );
  }

  let content: string;

  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    return loadFailed(
      new UsageInputError('unreadable', `Unable to read file: ${toErrorMessage(error)}`),
    );
  }

  return parseUsageRecords(content);
}
