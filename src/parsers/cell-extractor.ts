import * as XLSX from 'xlsx';

export interface RangeSource {
  sheet: XLSX.WorkSheet;
  /** A1-style range, e.g. "B9:B1000" */
  range: string;
}

/**
 * Read a cell as a trimmed string. Blank, missing and error cells are undefined.
 */
export function readCell(sheet: XLSX.WorkSheet, address: string): string | undefined {
  const cell: XLSX.CellObject | undefined = sheet[address];
  if (!cell || cell.t === 'e' || cell.t === 'z') return undefined;
  if (cell.v === null || cell.v === undefined) return undefined;

  let text: string;
  if (typeof cell.v === 'boolean') {
    text = cell.v ? 'TRUE' : 'FALSE';
  } else if (cell.v instanceof Date) {
    text = cell.v.toISOString().split('T')[0];
  } else {
    text = String(cell.v);
  }

  const trimmed = text.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * 1-based number of the last row the sheet declares in its range, 0 when empty
 */
export function lastRowNumber(sheet: XLSX.WorkSheet): number {
  const ref = sheet['!ref'];
  if (!ref) return 0;
  return XLSX.utils.decode_range(ref).e.r + 1;
}

/**
 * Every non-empty value of a rectangular range, row-major
 */
export function readRange(sheet: XLSX.WorkSheet, range: string): string[] {
  const { s, e } = XLSX.utils.decode_range(range);
  const values: string[] = [];

  for (let row = s.r; row <= e.r; row++) {
    for (let col = s.c; col <= e.c; col++) {
      const value = readCell(sheet, XLSX.utils.encode_cell({ r: row, c: col }));
      if (value !== undefined) values.push(value);
    }
  }

  return values;
}

/**
 * Values of several ranges in order; later duplicates are dropped.
 */
export function extractOrderedUnique(sources: RangeSource[]): string[] {
  const seen = new Set<string>();
  const values: string[] = [];

  for (const source of sources) {
    for (const value of readRange(source.sheet, source.range)) {
      if (seen.has(value)) continue;
      seen.add(value);
      values.push(value);
    }
  }

  return values;
}

export function extractDistinct(sheet: XLSX.WorkSheet, range: string): Set<string> {
  return new Set(readRange(sheet, range));
}

export function columnRange(column: string, startRow: number, endRow: number): string {
  return `${column}${startRow}:${column}${endRow}`;
}
