import { describe, expect, it } from 'vitest';

import { renderReportHeader } from '../../src/render/report-header.js';

describe('renderReportHeader', () => {
  it('renders a plain boxed header with centered detail lines', () => {
    const rendered = renderReportHeader({
      title: 'Usage Invoices',
      details: ['Source: x'],
      useColor: false,
    });

    expect(rendered.split('\n')).toEqual([
      `┌${'─'.repeat(18)}┐`,
      '│  Usage Invoices  │',
      '│    Source: x     │',
      `└${'─'.repeat(18)}┘`,
    ]);
  });

  it('renders only the title when no details are given', () => {
    const rendered = renderReportHeader({ title: 'Usage', useColor: false });

    expect(rendered.split('\n')).toEqual([`┌${'─'.repeat(9)}┐`, '│  Usage  │', `└${'─'.repeat(9)}┘`]);
  });

  it('keeps the content when color is enabled', () => {
    const rendered = renderReportHeader({ title: 'Usage Invoices', useColor: true });

    expect(rendered).toContain('Usage Invoices');
    expect(rendered).toContain('┌');
    expect(rendered).toContain('┘');
  });
});
