import type { EnvVarOverride } from '../config/env-var-display.js';
import type { Invoice } from '../domain/invoice.js';
import type { UsageRecord } from '../domain/usage-record.js';
import type { RejectionCauseStat } from '../sources/rejection-stats.js';
import type { RecordRejection } from '../sources/usage-entry-parser.js';

export type InvoiceCommandOptions = {
  markdown?: boolean;
  json?: boolean;
  color?: boolean;
};

export type InvoiceLine = {
  record: UsageRecord;
  invoice: Invoice;
};

export type InvoiceDiagnostics = {
  inputPath: string;
  entriesRead: number;
  validRecords: number;
  rejectionStats: RejectionCauseStat[];
  activeEnvOverrides: EnvVarOverride[];
};

export type InvoiceDataResult = {
  lines: InvoiceLine[];
  rejected: RecordRejection[];
  diagnostics: InvoiceDiagnostics;
};
