import { getActiveEnvVarOverrides } from '../config/env-var-display.js';
import { getInputRuntimeConfig } from '../config/runtime-overrides.js';
import { InvoiceCalculator } from '../pricing/invoice-calculator.js';
import { summarizeRejections } from '../sources/rejection-stats.js';
import { loadUsageRecordsFromFile } from '../sources/usage-record-loader.js';
import type { InvoiceDataResult } from './invoice-data-contracts.js';
import { resolveInputPath } from './resolve-input-path.js';

export type BuildInvoiceDataDeps = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  defaultInputPath?: string;
  calculator?: InvoiceCalculator;
};

/** Throws the loader's `UsageInputError` when the input cannot be used at all. */
export async function buildInvoiceData(
  input: string | undefined,
  deps: BuildInvoiceDataDeps = {},
): Promise<InvoiceDataResult> {
  const env = deps.env ?? process.env;
  const runtimeConfig = getInputRuntimeConfig(env);
  const inputPath = await resolveInputPath({
    explicitPath: input,
    envPath: runtimeConfig.inputPath,
    defaultPath: deps.defaultInputPath,
    cwd: deps.cwd,
  });

  const loadResult = await loadUsageRecordsFromFile(inputPath, {
    maxInputBytes: runtimeConfig.maxInputBytes,
  });

  if (!loadResult.ok) {
    throw loadResult.error;
  }

  const { valid, rejected } = loadResult.batch;
  const calculator = deps.calculator ?? new InvoiceCalculator();
  const invoices = calculator.calculateAll(valid);

  return {
    lines: valid.map((record, index) => ({ record, invoice: invoices[index] })),
    rejected,
    diagnostics: {
      inputPath,
      entriesRead: valid.length + rejected.length,
      validRecords: valid.length,
      rejectionStats: summarizeRejections(rejected),
      activeEnvOverrides: getActiveEnvVarOverrides(env),
    },
  };
}
