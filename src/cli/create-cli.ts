import { Command } from 'commander';

import type { InvoiceCommandOptions } from './invoice-data-contracts.js';
import { runInvoiceReport } from './run-invoice-report.js';
import { runValidateReport, type ValidateCommandOptions } from './run-validate-report.js';

export type CreateCliOptions = {
  version?: string;
};

const inputArgumentDescription =
  'Path to the usage JSON file (default: $USAGE_INVOICING_INPUT, then usage-data.json)';

function createInvoiceCommand(): Command {
  return new Command('invoice')
    .description('Calculate tiered invoices for every valid usage entry')
    .argument('[input]', inputArgumentDescription)
    .option('--markdown', 'Render invoices as a markdown table')
    .option('--json', 'Render invoices as JSON')
    .option('--no-color', 'Disable colored terminal output')
    .action(async (input: string | undefined, options: InvoiceCommandOptions) => {
      await runInvoiceReport(input, options);
    });
}

function createValidateCommand(): Command {
  return new Command('validate')
    .description('Validate usage entries without calculating invoices')
    .argument('[input]', inputArgumentDescription)
    .option('--json', 'Render the validation result as JSON')
    .action(async (input: string | undefined, options: ValidateCommandOptions) => {
      await runValidateReport(input, options);
    });
}

function rootDescription(): string {
  return [
    'Compute tiered usage invoices from a JSON batch of customer usage entries',
    '',
    'Examples:',
    '  $ usage-invoice',
    '  $ usage-invoice invoice ./usage-data.json',
    '  $ usage-invoice invoice ./usage-data.json --markdown',
    '  $ usage-invoice validate ./usage-data.json --json',
  ].join('\n');
}

export function createCli(options: CreateCliOptions = {}): Command {
  const program = new Command();

  program
    .name('usage-invoice')
    .description(rootDescription())
    .version(options.version ?? '0.0.0')
    .showHelpAfterError()
    .addCommand(createInvoiceCommand(), { isDefault: true })
    .addCommand(createValidateCommand());

  return program;
}
