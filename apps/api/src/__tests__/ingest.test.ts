import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { ingestTableBuffer, isSpreadsheet } from '../ingest/table';

const makeWorkbookBuffer = (
  data: unknown[][] = [
    ['Product', 'Amount', 'Note'],
    ['Widget', 100, 'first'],
    ['Gadget', 50]
  ]
) => {
  const sheet = XLSX.utils.aoa_to_sheet(data);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, sheet, 'Sheet1');
  return XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
};

describe('ingestTableBuffer', () => {
  it('reads CSV values as strings under their header', () => {
    const csv = 'Date,Product,Amount\n2024-01-05,Widget,100\n2024-01-20,Gadget,50';
    const dataset = ingestTableBuffer(Buffer.from(csv), 'sales.csv');
    expect(dataset.name).toBe('sales');
    expect(dataset.source).toBe('csv');
    expect(dataset.columns).toEqual(['Date', 'Product', 'Amount']);
    expect(dataset.rows).toEqual([
      { Date: '2024-01-05', Product: 'Widget', Amount: '100' },
      { Date: '2024-01-20', Product: 'Gadget', Amount: '50' }
    ]);
  });

  it('reads XLSX rows and fills blank cells', () => {
    const dataset = ingestTableBuffer(Buffer.from(makeWorkbookBuffer()), 'orders.xlsx');
    expect(dataset.name).toBe('orders');
    expect(dataset.source).toBe('excel');
    expect(dataset.columns).toEqual(['Product', 'Amount', 'Note']);
    expect(dataset.rows).toEqual([
      { Product: 'Widget', Amount: 100, Note: 'first' },
      { Product: 'Gadget', Amount: 50, Note: '' }
    ]);
  });

  it('names XLSX columns after number and date header cells', () => {
    const buffer = makeWorkbookBuffer([
      ['Product', 2024, new Date(Date.UTC(2024, 0, 1))],
      ['Widget', 100, 7],
      ['Gadget', 50, 3]
    ]);
    const dataset = ingestTableBuffer(Buffer.from(buffer), 'yearly.xlsx');

    expect(dataset.columns).toHaveLength(3);
    expect(dataset.columns.slice(0, 2)).toEqual(['Product', '2024']);
    const [, , dateHeader] = dataset.columns;
    expect(dateHeader).not.toBe('');
    expect(dataset.rows).toEqual([
      { Product: 'Widget', '2024': 100, [dateHeader]: 7 },
      { Product: 'Gadget', '2024': 50, [dateHeader]: 3 }
    ]);
  });

  it('suffixes repeated XLSX header names', () => {
    const buffer = makeWorkbookBuffer([
      ['Amount', 'Amount'],
      [10, 20]
    ]);
    const dataset = ingestTableBuffer(Buffer.from(buffer), 'twice.xlsx');
    expect(dataset.columns).toEqual(['Amount', 'Amount_1']);
    expect(dataset.rows).toEqual([{ Amount: 10, Amount_1: 20 }]);
  });

  it('trims headers and strips a byte order mark', () => {
    const dataset = ingestTableBuffer(Buffer.from('\uFEFF Date , Amount \n2024-01-01,5'), 'bom.csv');
    expect(dataset.columns).toEqual(['Date', 'Amount']);
    expect(dataset.rows).toEqual([{ Date: '2024-01-01', Amount: '5' }]);
  });

  it('keeps ragged rows and drops extra fields', () => {
    const dataset = ingestTableBuffer(Buffer.from('a,b\n1\n2,3,4'), 'ragged.csv');
    expect(dataset.rows).toEqual([
      { a: '1', b: null },
      { a: '2', b: '3' }
    ]);
  });

  it('reads a single-column file', () => {
    const dataset = ingestTableBuffer(Buffer.from('Amount\n10\n20'), 'single.csv');
    expect(dataset.columns).toEqual(['Amount']);
    expect(dataset.rows).toHaveLength(2);
  });

  it('rejects broken quoting', () => {
    expect(() => ingestTableBuffer(Buffer.from('a,b\n"unterminated,1\n2,3'), 'broken.csv')).toThrow(/CSV parse error/);
  });

  it('rejects a file without a header row', () => {
    expect(() => ingestTableBuffer(Buffer.from(''), 'empty.csv')).toThrow('No header row found');
  });
});

describe('isSpreadsheet', () => {
  it('recognises Excel extensions', () => {
    expect(isSpreadsheet('report.XLSX')).toBe(true);
    expect(isSpreadsheet('legacy.xls')).toBe(true);
    expect(isSpreadsheet('data.csv')).toBe(false);
  });
});
