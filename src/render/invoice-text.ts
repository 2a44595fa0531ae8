import pc from 'picocolors';

import type { InvoiceLine } from '../cli/invoice-data-contracts.js';
import type { RecordRejection } from '../sources/usage-entry-parser.js';
import { formatUsd } from './money.js';

const separator = '-'.repeat(29);

export type InvoiceTextOptions = {
  useColor?: boolean;
};

export function renderInvoiceText(line: InvoiceLine, options: InvoiceTextOptions = {}): string {
  const { record, invoice } = line;
  const useColor = options.useColor ?? false;
  const heading = `Invoice for Customer: ${invoice.customerId}`;
  const totalLine = `Total Due: ${formatUsd(invoice.total)}`;

  return [
    useColor ? pc.bold(heading) : heading,
    useColor ? pc.gray(separator) : separator,
    `API Calls: ${record.apiCalls} calls -> ${formatUsd(invoice.apiCost)}`,
    `Storage: ${record.storageGb.toString()} GB -> ${formatUsd(invoice.storageCost)}`,
    `Compute Time: ${record.computeMinutes} minutes -> ${formatUsd(invoice.computeCost)}`,
    useColor ? pc.gray(separator) : separator,
    useColor ? pc.green(totalLine) : totalLine,
  ].join('\n');
}

export function renderRejectionText(
  rejection: RecordRejection,
  options: InvoiceTextOptions = {},
): string {
  const line = `Skipped invalid entry: ${rejection.message}`;
  return options.useColor ? pc.yellow(line) : line;
}
