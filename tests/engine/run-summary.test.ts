import { describe, it, expect } from 'vitest';
import { RunSummaryRecorder } from '@bankrecon/engine';
import type { DatasetStats } from '@bankrecon/types';

function stats(overrides: Partial<DatasetStats> = {}): DatasetStats {
  return {
    totalRows: 2,
    totalColumns: 3,
    staticColumns: ['Kundenummer'],
    dynamicColumns: ['RETAIL', 'SAVINGS'],
    multiCategory: 1,
    ...overrides,
  };
}

describe('RunSummaryRecorder', () => {
  it('should sort file outcomes into merged, missing and errors', () => {
    const recorder = new RunSummaryRecorder();
    recorder.recordFileOutcomes('1234', [
      { fileName: 'X.B1234.A.CSV', status: 'merged', category: 'RETAIL', rowCount: 1 },
      { fileName: 'X.B1234.B.CSV', status: 'no-data', reason: 'no data rows' },
      { fileName: 'X.B1234.C.CSV', status: 'error', error: 'boom' },
    ]);

    expect(recorder.toSummary().banks.get('1234')).toEqual({
      merged: ['RETAIL'],
      missing: ['X.B1234.B.CSV'],
      errors: ['X.B1234.C.CSV'],
      columns: [],
      notes: [],
    });
  });

  it('should accumulate lists across flows and keep the last dataset', () => {
    const recorder = new RunSummaryRecorder();
    recorder.recordFileOutcomes('1234', [
      { fileName: 'X.B1234.A.CSV', status: 'merged', category: 'RETAIL', rowCount: 1 },
    ]);
    recorder.recordDataset('1234', stats());
    recorder.recordFileOutcomes('1234', [
      { fileName: 'X.B1234.A.CSV.BM', status: 'merged', category: 'BEDRIFT', rowCount: 1 },
    ]);
    recorder.recordDataset('1234', stats({ staticColumns: ['Kundenummer', 'AVTALE_IDs'], dynamicColumns: ['BEDRIFT'] }));

    const info = recorder.toSummary().banks.get('1234');
    expect(info?.merged).toEqual(['RETAIL', 'BEDRIFT']);
    expect(info?.columns).toEqual(['BEDRIFT', 'Kundenummer', 'AVTALE_IDs']);
    expect(info?.stats?.dynamicColumns).toEqual(['BEDRIFT']);
  });

  it('should keep notes per bank in first-touch order', () => {
    const recorder = new RunSummaryRecorder();
    recorder.entry('5678');
    recorder.addNote('1234', 'first');
    recorder.addNote('5678', 'No lookup data found for bank 5678');

    const summary = recorder.toSummary();
    expect([...summary.banks.keys()]).toEqual(['5678', '1234']);
    expect(summary.banks.get('5678')?.notes).toEqual(['No lookup data found for bank 5678']);
  });
});
