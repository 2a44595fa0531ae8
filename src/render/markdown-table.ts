import { markdownTable } from 'markdown-table';

import type { InvoiceLine } from '../cli/invoice-data-contracts.js';
import type { RecordRejection } from '../sources/usage-entry-parser.js';
import { formatUsd } from './money.js';

export const invoiceTableHeaders = [
  'Customer',
  'API Calls',
  'Storage (GB)',
  'Compute (min)',
  'API Cost',
  'Storage Cost',
  'Compute Cost',
  'Total',
] as const;

function toMarkdownSafeCell(value: string): string {
  return value.replace(/\|/gu, '\\|').replace(/\r?\n/gu, '<br>');
}

export function toInvoiceTableCells(lines: readonly InvoiceLine[]): string[][] {
  return lines.map(({ record, invoice }) => [
    toMarkdownSafeCell(invoice.customerId),
    String(record.apiCalls),
    record.storageGb.toString(),
    String(record.computeMinutes),
    formatUsd(invoice.apiCost),
    formatUsd(invoice.storageCost),
    formatUsd(invoice.computeCost),
    formatUsd(invoice.total),
  ]);
}

export function renderMarkdownInvoiceTable(
  lines: readonly InvoiceLine[],
  rejected: readonly RecordRejection[] = [],
): string {
  const tableRows = [Array.from(invoiceTableHeaders), ...toInvoiceTableCells(lines)];
  const alignment = invoiceTableHeaders.map((_, index) => (index === 0 ? 'l' : 'r'));
  const sections = [markdownTable(tableRows, { align: alignment })];

  if (rejected.length > 0) {
    sections.push(
      ['**Skipped entries**', '', ...rejected.map((rejection) => `- ${rejection.message}`)].join(
        '\n',
      ),
    );
  }

  return sections.join('\n\n');
}
