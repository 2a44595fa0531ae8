import { formatEnvVarOverrides } from '../config/env-var-display.js';
import type { InvoiceDataResult, InvoiceLine } from '../cli/invoice-data-contracts.js';
import { shouldUseColorByDefault } from './color-support.js';
import { renderInvoiceText, renderRejectionText } from './invoice-text.js';
import { renderMarkdownInvoiceTable } from './markdown-table.js';
import { renderReportHeader } from './report-header.js';

export type InvoiceReportFormat = 'terminal' | 'markdown' | 'json';

export type RenderInvoiceReportOptions = {
  useColor?: boolean;
};

function toJsonInvoice({ record, invoice }: InvoiceLine) {
  return {
    customerId: invoice.customerId,
    usage: {
      apiCalls: record.apiCalls,
      storageGb: record.storageGb.toString(),
      computeMinutes: record.computeMinutes,
    },
    apiCost: invoice.apiCost.toFixed(2),
    storageCost: invoice.storageCost.toFixed(2),
    computeCost: invoice.computeCost.toFixed(2),
    total: invoice.total.toFixed(2),
  };
}

function renderJsonInvoiceReport(invoiceData: InvoiceDataResult): string {
  return JSON.stringify(
    {
      invoices: invoiceData.lines.map((line) => toJsonInvoice(line)),
      rejected: invoiceData.rejected,
    },
    null,
    2,
  );
}

function renderTerminalInvoiceReport(
  invoiceData: InvoiceDataResult,
  options: RenderInvoiceReportOptions,
): string {
  const outputLines: string[] = [];
  const envVarOverrideLines = formatEnvVarOverrides(invoiceData.diagnostics.activeEnvOverrides);
  const useColor = options.useColor ?? shouldUseColorByDefault();

  if (envVarOverrideLines.length > 0) {
    outputLines.push(...envVarOverrideLines);
    outputLines.push('');
  }

  outputLines.push(
    renderReportHeader({
      title: 'Usage Invoices',
      details: [
        `Source: ${invoiceData.diagnostics.inputPath}`,
        `${invoiceData.lines.length} invoiced, ${invoiceData.rejected.length} skipped`,
      ],
      useColor,
    }),
  );
  outputLines.push('');

  for (const line of invoiceData.lines) {
    outputLines.push(renderInvoiceText(line, { useColor }));
    outputLines.push('');
  }

  for (const rejection of invoiceData.rejected) {
    outputLines.push(renderRejectionText(rejection, { useColor }));
  }

  return outputLines.join('\n').trimEnd();
}

export function renderInvoiceReport(
  invoiceData: InvoiceDataResult,
  format: InvoiceReportFormat,
  options: RenderInvoiceReportOptions = {},
): string {
  switch (format) {
    case 'json':
      return renderJsonInvoiceReport(invoiceData);
    case 'markdown':
      return renderMarkdownInvoiceTable(invoiceData.lines, invoiceData.rejected);
    case 'terminal':
      return renderTerminalInvoiceReport(invoiceData, options);
  }
}

