import { describe, expect, it, vi } from 'vitest';

import { emitDiagnostics, type DiagnosticsLogger } from '../../src/cli/emit-diagnostics.js';
import type { InvoiceDiagnostics } from '../../src/cli/invoice-data-contracts.js';

function createLoggerSpy(): DiagnosticsLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    dim: vi.fn(),
  };
}

function createDiagnostics(overrides: Partial<InvoiceDiagnostics> = {}): InvoiceDiagnostics {
  return {
    inputPath: '/data/usage.json',
    entriesRead: 1,
    validRecords: 1,
    rejectionStats: [],
    activeEnvOverrides: [],
    ...overrides,
  };
}

describe('emitDiagnostics', () => {
  it('reports the number of entries read without warnings for a clean batch', () => {
    const diagnosticsLogger = createLoggerSpy();

    emitDiagnostics(createDiagnostics(), diagnosticsLogger);

    expect(diagnosticsLogger.info).toHaveBeenCalledWith('Read 1 usage entry from /data/usage.json');
    expect(diagnosticsLogger.warn).not.toHaveBeenCalled();
    expect(diagnosticsLogger.dim).not.toHaveBeenCalled();
  });

  it('summarizes skipped entries by cause in order', () => {
    const callSequence: string[] = [];
    const diagnosticsLogger: DiagnosticsLogger = {
      info: (message) => {
        callSequence.push(`info:${message}`);
      },
      warn: (message) => {
        callSequence.push(`warn:${message}`);
      },
      dim: (message) => {
        callSequence.push(`dim:${message}`);
      },
    };

    emitDiagnostics(
      createDiagnostics({
        entriesRead: 4,
        validRecords: 1,
        rejectionStats: [
          { cause: 'Missing CustomerId', count: 1 },
          { cause: 'Invalid API_Calls', count: 2 },
        ],
      }),
      diagnosticsLogger,
    );

    expect(callSequence).toEqual([
      'info:Read 4 usage entries from /data/usage.json',
      'warn:Skipped 3 malformed entries',
      'dim:  Missing CustomerId: 1',
      'dim:  Invalid API_Calls: 2',
    ]);
  });

  it('warns when no record survived validation', () => {
    const diagnosticsLogger = createLoggerSpy();

    emitDiagnostics(
      createDiagnostics({
        validRecords: 0,
        rejectionStats: [{ cause: 'Entry is not an object', count: 1 }],
      }),
      diagnosticsLogger,
    );

    expect(diagnosticsLogger.warn).toHaveBeenCalledWith('No valid usage records found');
    expect(diagnosticsLogger.warn).toHaveBeenCalledWith('Skipped 1 malformed entry');
  });
});
