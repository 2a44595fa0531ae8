import { buildInvoiceData, type BuildInvoiceDataDeps } from './build-invoice-data.js';
import { emitDiagnostics } from './emit-diagnostics.js';
import type { InvoiceCommandOptions, InvoiceDiagnostics } from './invoice-data-contracts.js';
import { renderInvoiceReport, type InvoiceReportFormat } from '../render/render-invoice-report.js';
import { logger } from '../utils/logger.js';

type PreparedInvoiceReport = {
  format: InvoiceReportFormat;
  output: string;
  diagnostics: InvoiceDiagnostics;
};

export function validateOutputFormatOptions(options: InvoiceCommandOptions): void {
  if (options.markdown && options.json) {
    throw new Error('Choose either --markdown or --json, not both');
  }
}

export function resolveReportFormat(options: InvoiceCommandOptions): InvoiceReportFormat {
  if (options.json) {
    return 'json';
  }

  if (options.markdown) {
    return 'markdown';
  }

  return 'terminal';
}

async function prepareInvoiceReport(
  input: string | undefined,
  options: InvoiceCommandOptions,
  deps: BuildInvoiceDataDeps,
): Promise<PreparedInvoiceReport> {
  validateOutputFormatOptions(options);

  const invoiceData = await buildInvoiceData(input, deps);
  const format = resolveReportFormat(options);

  return {
    format,
    diagnostics: invoiceData.diagnostics,
    output: renderInvoiceReport(invoiceData, format, {
      useColor: options.color === false ? false : undefined,
    }),
  };
}

export async function buildInvoiceReport(
  input: string | undefined,
  options: InvoiceCommandOptions,
  deps: BuildInvoiceDataDeps = {},
): Promise<string> {
  const preparedReport = await prepareInvoiceReport(input, options, deps);
  return preparedReport.output;
}

export async function runInvoiceReport(
  input: string | undefined,
  options: InvoiceCommandOptions,
  deps: BuildInvoiceDataDeps = {},
): Promise<void> {
  const preparedReport = await prepareInvoiceReport(input, options, deps);

  emitDiagnostics(preparedReport.diagnostics, logger);
  console.log(preparedReport.output);
}
