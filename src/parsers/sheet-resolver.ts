import type * as XLSX from 'xlsx';
import { SheetNotFoundError } from '../utils/error-handler.js';

export interface ResolvedSheet {
  name: string;
  sheet: XLSX.WorkSheet;
}

/**
 * Normalize a sheet name for case/space-insensitive matching
 */
export function normalizeSheetName(name: string): string {
  return name.toLowerCase().replace(/\s+/g, '');
}

/**
 * Find a worksheet even if its capitalization or spacing differs.
 * With several candidate names the first one present wins.
 */
export function resolveSheet(workbook: XLSX.WorkBook, wanted: string | string[]): ResolvedSheet {
  const candidates = Array.isArray(wanted) ? wanted : [wanted];

  for (const candidate of candidates) {
    const wantedNorm = normalizeSheetName(candidate);
    const name = workbook.SheetNames.find((sheetName) => normalizeSheetName(sheetName) === wantedNorm);
    const sheet = name === undefined ? undefined : workbook.Sheets[name];
    if (name !== undefined && sheet) {
      return { name, sheet };
    }
  }

  throw new SheetNotFoundError(candidates, [...workbook.SheetNames]);
}
