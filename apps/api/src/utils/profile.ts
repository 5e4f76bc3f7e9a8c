import { DataType } from '../types/schema';
import { isMissing, toDate, toNumber } from './values';

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

const isBoolean = (v: unknown) => typeof v === 'boolean' || /^(true|false|yes|no)$/i.test(String(v).trim());
const isCurrency = (v: unknown) => typeof v === 'string' && /^[$€£]\s?\d+(,\d{3})*(\.\d+)?$/.test(v.trim());

export const isNumericType = (type: DataType) => type === 'number' || type === 'currency';

/** A type wins when at least 80% of the present values look like it. */
export const inferDataType = (values: unknown[]): DataType => {
  const present = values.filter(v => !isMissing(v));
  if (!present.length) return 'unknown';

  let numberCount = 0;
  let booleanCount = 0;
  let dateCount = 0;
  let uuidCount = 0;
  let currencyCount = 0;

  for (const v of present) {
    if (typeof v === 'string' && UUID_REGEX.test(v.trim())) uuidCount++;
    if (isCurrency(v)) currencyCount++;
    if (isBoolean(v)) booleanCount++;
    if (toNumber(v) !== null) numberCount++;
    if (toDate(v)) dateCount++;
  }

  const ratio = (n: number) => n / present.length;

  if (ratio(uuidCount) >= 0.8) return 'uuid';
  if (ratio(currencyCount) >= 0.8) return 'currency';
  if (ratio(numberCount) >= 0.8) return 'number';
  if (ratio(booleanCount) >= 0.8) return 'boolean';
  if (ratio(dateCount) >= 0.8) return 'date';
  return 'string';
};

/** Timestamp-typed column, or up to 10 sampled present values that all parse as dates. */
export const isDateLike = (values: unknown[]) => {
  const present = values.filter(v => !isMissing(v));
  if (!present.length) return false;
  if (present.every(v => v instanceof Date)) return true;
  if (present.some(v => typeof v === 'number')) return false;
  return present.slice(0, 10).every(v => toDate(v) !== null);
};
