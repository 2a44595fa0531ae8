import type { InvoiceDiagnostics } from './invoice-data-contracts.js';
import { logger } from '../utils/logger.js';

export type DiagnosticsLogger = Pick<typeof logger, 'info' | 'warn' | 'dim'>;

function pluralizeEntries(count: number): string {
  return count === 1 ? 'entry' : 'entries';
}

export function emitDiagnostics(
  diagnostics: InvoiceDiagnostics,
  diagnosticsLogger: DiagnosticsLogger = logger,
): void {
  diagnosticsLogger.info(
    `Read ${diagnostics.entriesRead} usage ${pluralizeEntries(diagnostics.entriesRead)} from ${diagnostics.inputPath}`,
  );

  if (diagnostics.validRecords === 0) {
    diagnosticsLogger.warn('No valid usage records found');
  }

  const totalRejected = diagnostics.rejectionStats.reduce((sum, stat) => sum + stat.count, 0);

  if (totalRejected === 0) {
    return;
  }

  diagnosticsLogger.warn(`Skipped ${totalRejected} malformed ${pluralizeEntries(totalRejected)}`);

  for (const stat of diagnostics.rejectionStats) {
    diagnosticsLogger.dim(`  ${stat.cause}: ${stat.count}`);
  }
}
