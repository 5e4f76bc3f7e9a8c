import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { Dataset, Row } from '../types/schema';

const stripExt = (name: string) => name.replace(/\.(csv|xlsx|xls)$/i, '');

export const isSpreadsheet = (filename: string) => /\.(xlsx|xls)$/i.test(filename);

// Repeated header names get a numeric suffix: Amount, Amount_1.
const uniqueNames = (names: string[]) => {
  const seen = new Map<string, number>();
  return names.map(name => {
    if (!name) return name;
    const count = seen.get(name) ?? 0;
    seen.set(name, count + 1);
    return count ? `${name}_${count}` : name;
  });
};

// The header row is read as displayed text, so a date or number header names its column the way it appears.
const parseWorkbook = (buffer: Buffer) => {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) throw new Error('Workbook has no sheets');
  const worksheet = workbook.Sheets[sheetName];
  const [header = []] = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    raw: false,
    defval: '',
    blankrows: false
  });
  const [, ...body] = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, defval: '', blankrows: false });

  const names = uniqueNames(header.map(h => String(h ?? '').trim()));
  const rows: Row[] = body.map(values => Object.fromEntries(names.map((name, i) => [name, values[i] ?? ''])));
  return { columns: names.filter(name => name !== ''), rows };
};

const parseCsv = (buffer: Buffer) => {
  const text = buffer.toString('utf-8').replace(/^\uFEFF/, '');
  const parsed = Papa.parse<Row>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: header => header.trim()
  });

  if (parsed.errors?.length) {
    // ragged rows and single-column files are readable; broken quoting is not
    const fatal = parsed.errors.find(e => e.type === 'Quotes');
    if (fatal) throw new Error(`CSV parse error: ${fatal.message}`);
  }

  return { columns: (parsed.meta.fields || []).filter(Boolean), rows: parsed.data || [] };
};

/** Reads a CSV or XLSX upload into a dataset; the header row names the columns. */
export const ingestTableBuffer = (buffer: Buffer, filename: string): Dataset => {
  const { columns, rows } = isSpreadsheet(filename) ? parseWorkbook(buffer) : parseCsv(buffer);
  if (!columns.length) throw new Error('No header row found');
  return {
    name: stripExt(filename),
    columns,
    rows: rows.map(row => Object.fromEntries(columns.map(col => [col, row[col] ?? null]))),
    source: isSpreadsheet(filename) ? 'excel' : 'csv'
  };
};
