import { describe, expect, it } from 'vitest';

import { renderInvoiceText, renderRejectionText } from '../../src/render/invoice-text.js';
import { formatUsd } from '../../src/render/money.js';
import { Decimal } from '../../src/domain/decimal.js';
import { createInvoiceLine, missingIdRejection } from './invoice-fixtures.js';

describe('formatUsd', () => {
  it('rounds to cents only when formatting', () => {
    expect(formatUsd(Decimal.of('57.5'))).toBe('$57.50');
    expect(formatUsd(Decimal.of('10.625'))).toBe('$10.63');
    expect(formatUsd(Decimal.of('-5'))).toBe('$-5.00');
  });
});

describe('renderInvoiceText', () => {
  it('renders one invoice block with verbatim usage figures', () => {
    const rendered = renderInvoiceText(createInvoiceLine('A', 5000, '10', 100), {
      useColor: false,
    });

    expect(rendered.split('\n')).toEqual([
      'Invoice for Customer: A',
      '-----------------------------',
      'API Calls: 5000 calls -> $50.00',
      'Storage: 10 GB -> $2.50',
      'Compute Time: 100 minutes -> $5.00',
      '-----------------------------',
      'Total Due: $57.50',
    ]);
  });

  it('keeps the storage scale from the input', () => {
    const rendered = renderInvoiceText(createInvoiceLine('B', 15_000, '42.50', 1200));

    expect(rendered).toContain('Storage: 42.50 GB -> $10.63');
    expect(rendered).toContain('API Calls: 15000 calls -> $140.00');
    expect(rendered).toContain('Total Due: $210.63');
  });

  it('renders rejection lines', () => {
    expect(renderRejectionText(missingIdRejection)).toBe(
      'Skipped invalid entry: Missing or invalid fields for CustomerId: UNKNOWN (Missing CustomerId)',
    );
  });
});
