import { buildInvoiceData, type BuildInvoiceDataDeps } from './build-invoice-data.js';
import { emitDiagnostics } from './emit-diagnostics.js';
import type { InvoiceDataResult } from './invoice-data-contracts.js';
import { renderRejectionText } from '../render/invoice-text.js';
import { logger } from '../utils/logger.js';

export type ValidateCommandOptions = {
  json?: boolean;
};

export function renderValidationReport(
  invoiceData: InvoiceDataResult,
  options: ValidateCommandOptions = {},
): string {
  if (options.json) {
    return JSON.stringify(
      {
        inputPath: invoiceData.diagnostics.inputPath,
        validRecords: invoiceData.diagnostics.validRecords,
        rejected: invoiceData.rejected,
      },
      null,
      2,
    );
  }

  return [
    `Valid records: ${invoiceData.diagnostics.validRecords}`,
    `Rejected entries: ${invoiceData.rejected.length}`,
    ...invoiceData.rejected.map((rejection) => renderRejectionText(rejection)),
  ].join('\n');
}

export async function runValidateReport(
  input: string | undefined,
  options: ValidateCommandOptions,
  deps: BuildInvoiceDataDeps = {},
): Promise<void> {
  const invoiceData = await buildInvoiceData(input, deps);

  emitDiagnostics(invoiceData.diagnostics, logger);

  if (invoiceData.rejected.length === 0) {
    logger.success('All usage entries are valid');
  }

  console.log(renderValidationReport(invoiceData, options));
}
