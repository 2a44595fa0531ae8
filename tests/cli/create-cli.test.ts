import path from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { createCli } from '../../src/cli/create-cli.js';

const fixturePath = path.resolve('tests/fixtures/usage/mixed-usage.json');

afterEach(() => {
  vi.restoreAllMocks();
});

function captureStdout() {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  return vi.spyOn(console, 'log').mockImplementation(() => undefined);
}

describe('createCli', () => {
  it('registers invoice and validate commands', () => {
    const cli = createCli({ version: '1.2.3' });

    expect(cli.name()).toBe('usage-invoice');
    expect(cli.version()).toBe('1.2.3');
    expect(cli.commands.map((command) => command.name())).toEqual(['invoice', 'validate']);
  });

  it('exposes output format flags on the invoice command', () => {
    const invoiceCommand = createCli().commands.find((command) => command.name() === 'invoice');

    expect(invoiceCommand?.options.map((option) => option.long)).toEqual([
      '--markdown',
      '--json',
      '--no-color',
    ]);
  });

  it('runs the invoice command by default', async () => {
    const logSpy = captureStdout();

    await createCli().parseAsync([fixturePath, '--json'], { from: 'user' });

    const parsed = JSON.parse(String(logSpy.mock.calls[0]?.[0])) as {
      invoices: { total: string }[];
    };
    expect(parsed.invoices.map((invoice) => invoice.total)).toEqual(['57.50', '210.63', '100.63']);
  });

  it('runs the validate command', async () => {
    const logSpy = captureStdout();

    await createCli().parseAsync(['validate', fixturePath], { from: 'user' });

    expect(String(logSpy.mock.calls[0]?.[0]).split('\n').slice(0, 2)).toEqual([
      'Valid records: 3',
      'Rejected entries: 3',
    ]);
  });

  it('propagates load failures to the caller', async () => {
    captureStdout();
    const missingPath = path.resolve('tests/fixtures/usage/does-not-exist.json');

    await expect(
      createCli().parseAsync(['invoice', missingPath], { from: 'user' }),
    ).rejects.toThrow(`Input file not found at '${missingPath}'`);
  });
});
