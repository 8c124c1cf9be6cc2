import { describe, it, expect } from 'vitest';
import { reconcileDuplicates } from '@bankrecon/engine';
import { MissingKeyColumnError } from '@bankrecon/types';
import type { Table } from '@bankrecon/types';

describe('duplicate-reconciler', () => {
  const table: Table = {
    columns: ['Kundenummer', 'Navn', 'Epost', 'RETAIL', 'SAVINGS'],
    rows: [
      { Kundenummer: '002', Navn: 'Kari', Epost: '', RETAIL: 'N', SAVINGS: 'J' },
      { Kundenummer: '001', Navn: '', Epost: 'a@example.test', RETAIL: 'J', SAVINGS: 'N' },
      { Kundenummer: '001', Navn: 'Ola', Epost: 'b@example.test', RETAIL: 'N', SAVINGS: 'J' },
    ],
  };

  it('should collapse rows sharing a key into one row per customer', () => {
    const result = reconcileDuplicates(table);

    expect(result.table.rows).toEqual([
      { Kundenummer: '001', Navn: 'Ola', Epost: 'a@example.test', RETAIL: 'J', SAVINGS: 'J' },
      { Kundenummer: '002', Navn: 'Kari', Epost: '', RETAIL: 'N', SAVINGS: 'J' },
    ]);
    expect(result.groups).toBe(2);
    expect(result.duplicatesCollapsed).toBe(1);
    expect(result.droppedWithoutKey).toBe(0);
  });

  it('should keep the column order', () => {
    expect(reconcileDuplicates(table).table.columns).toEqual(table.columns);
  });

  it('should set N when no row in the group has J', () => {
    const result = reconcileDuplicates({
      columns: ['Kundenummer', 'RETAIL', 'SAVINGS'],
      rows: [
        { Kundenummer: '001', RETAIL: '', SAVINGS: 'J' },
        { Kundenummer: '001', RETAIL: 'N', SAVINGS: 'N' },
      ],
    });

    expect(result.table.rows).toEqual([{ Kundenummer: '001', RETAIL: 'N', SAVINGS: 'J' }]);
  });

  it('should order customers by key as text', () => {
    const result = reconcileDuplicates({
      columns: ['Kundenummer', 'RETAIL'],
      rows: [
        { Kundenummer: '9', RETAIL: 'J' },
        { Kundenummer: '10', RETAIL: 'J' },
      ],
    });

    expect(result.table.rows.map((row) => row['Kundenummer'])).toEqual(['10', '9']);
  });

  it('should drop rows without a key', () => {
    const result = reconcileDuplicates({
      columns: ['Kundenummer', 'RETAIL'],
      rows: [
        { Kundenummer: '', RETAIL: 'J' },
        { Kundenummer: '001', RETAIL: 'J' },
      ],
    });

    expect(result.table.rows).toEqual([{ Kundenummer: '001', RETAIL: 'J' }]);
    expect(result.droppedWithoutKey).toBe(1);
  });

  it('should group on a custom key column', () => {
    const result = reconcileDuplicates(
      {
        columns: ['Orgnr', 'RETAIL'],
        rows: [
          { Orgnr: '912345678', RETAIL: 'N' },
          { Orgnr: '912345678', RETAIL: 'J' },
        ],
      },
      { keyColumn: 'Orgnr' }
    );

    expect(result.table.rows).toEqual([{ Orgnr: '912345678', RETAIL: 'J' }]);
  });

  it('should fail when the key column is missing', () => {
    expect(() =>
      reconcileDuplicates({ columns: ['Navn'], rows: [{ Navn: 'Ola' }] })
    ).toThrow(MissingKeyColumnError);
  });

  it('should pass an empty table through', () => {
    expect(reconcileDuplicates({ columns: [], rows: [] }).table).toEqual({ columns: [], rows: [] });
  });
});
