import * as XLSX from 'xlsx';

export type CellMap = Record<string, string | number | boolean>;

export function buildSheet(cells: CellMap): XLSX.WorkSheet {
  const sheet = XLSX.utils.aoa_to_sheet([]);
  for (const [address, value] of Object.entries(cells)) {
    XLSX.utils.sheet_add_aoa(sheet, [[value]], { origin: address });
  }
  return sheet;
}

export function buildWorkbook(sheets: Record<string, CellMap>): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const [name, cells] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, buildSheet(cells), name);
  }
  return workbook;
}

/**
 * Serialize through xlsx bytes, the way an uploaded file arrives
 */
export function toXlsxBuffer(workbook: XLSX.WorkBook): Buffer {
  const bytes: Uint8Array = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return Buffer.from(bytes);
}

export const USER_DETAILS: CellMap = {
  B3: 'Acme Corp',
  A9: 'Jane Doe',
  B9: '3125550101',
  D9: '3125550100',
  E9: '101',
  F9: 'jane@example.com',
  H9: 'Company Admin',
  I9: 'Sales',
  M9: 'UCaaS|Link Standard',
  N9: 'AABBCCDDEE01',
  O9: 'Sales Queue',
  A10: 'Front Desk',
  B10: '3125550102',
  I10: 'Support',
  M10: 'UCaaS|Link Basic Auto-Attendant',
  A11: 'Spare',
  B11: '3125550103',
  M11: 'Reserve Number',
  A12: 'John Roe',
  B12: '3125550104',
  H12: 'User',
  I12: 'Sales',
  J12: 'America/New_York',
  M12: 'UCaaS|Link Complete',
  O12: 'Sales Queue',
  R12: 'ROUTE9',
};

export const ENGINEERING: CellMap = {
  C4: 'CH',
  C5: 'America/Chicago',
  C12: 'BGLCC',
  C17: 'LCC1DEF',
  C18: 'LCC2DEF',
  C19: 'LCC3DEF',
  F4: 'CHICAGO',
  G4: 'CHI01',
  F5: 'EVANSTON',
  G5: 'EVN02',
  F6: 'SKOKIE',
};

export const CALL_FLOW: CellMap = {
  B17: 'Sales Queue',
  C17: 'Ring All',
  D17: '3125550199',
  H17: 'Yes',
  B18: 'Support Queue',
  C18: 'Circular',
};

export function buildOrderWorkbook(): XLSX.WorkBook {
  return buildWorkbook({
    'User details': USER_DETAILS,
    'Engineering': ENGINEERING,
    'Call flow': CALL_FLOW,
  });
}
