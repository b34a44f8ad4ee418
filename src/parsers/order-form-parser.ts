/**
 * Parser for customer provisioning order workbooks.
 * Reads the context cells, user rows, hunt group window, number pools and the
 * engineering rate-center table through the column schema in config.
 */

import * as XLSX from 'xlsx';
import { resolveSheet } from './sheet-resolver.js';
import { readCell, extractOrderedUnique, extractDistinct, columnRange, lastRowNumber } from './cell-extractor.js';
import { WorkbookParseError } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';
import type { Config, SheetKey } from '../utils/config.js';
import type {
  CustomerContext,
  HuntGroupRow,
  OrderForm,
  RateCenterTableEntry,
  UserRow,
} from '../types/order-form.js';

type UserColumns = Config['userRows']['columns'];
type UserField = keyof UserColumns;

const USER_FIELDS: UserField[] = [
  'name',
  'phone',
  'callingNumber',
  'extension',
  'email',
  'accountType',
  'department',
  'timezone',
  'template',
  'macAddress',
  'huntGroup',
  'routingOverride',
];

export const SUPPORTED_EXTENSIONS = ['xlsx', 'xlsm', 'xls'];

/**
 * Load workbook bytes. Formula cells are read as their cached values.
 */
export function readWorkbook(buffer: Buffer, filename?: string): XLSX.WorkBook {
  try {
    return XLSX.read(buffer, { type: 'buffer' });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Failed to read workbook', { filename, error: message });
    throw new WorkbookParseError(`Failed to read workbook: ${message}`, { filename });
  }
}

export class OrderFormParser {
  private sheets: Record<SheetKey, XLSX.WorkSheet> | null = null;
  private warnings: string[] = [];

  constructor(private readonly config: Config) {}

  parse(workbook: XLSX.WorkBook): OrderForm {
    this.warnings = [];

    // All sheets are resolved before anything is read
    const userDetails = resolveSheet(workbook, this.config.sheets.userDetails);
    const engineering = resolveSheet(workbook, this.config.sheets.engineering);
    const callFlow = resolveSheet(workbook, this.config.sheets.callFlow);

    this.sheets = {
      userDetails: userDetails.sheet,
      engineering: engineering.sheet,
      callFlow: callFlow.sheet,
    };

    logger.debug('Resolved order form sheets', {
      available: workbook.SheetNames,
      userDetails: userDetails.name,
      engineering: engineering.name,
      callFlow: callFlow.name,
    });

    const context = this.parseContext();
    const lastUserRow = this.resolveLastUserRow();
    const users = this.parseUsers(lastUserRow);
    const huntGroups = this.parseHuntGroups();

    const { userRows, huntGroups: hg } = this.config;
    const numberPool = extractOrderedUnique([
      {
        sheet: this.sheets.userDetails,
        range: columnRange(userRows.columns.phone, userRows.startRow, lastUserRow),
      },
      {
        sheet: this.sheets.callFlow,
        range: columnRange(hg.columns.pilotNumber, hg.startRow, hg.endRow),
      },
    ]);
    const departments = extractDistinct(
      this.sheets.userDetails,
      columnRange(userRows.columns.department, userRows.startRow, lastUserRow)
    );

    return {
      sheetNames: {
        userDetails: userDetails.name,
        engineering: engineering.name,
        callFlow: callFlow.name,
      },
      context,
      users,
      huntGroups,
      numberPool,
      departments,
      rateCenterTable: this.parseRateCenterTable(),
      warnings: this.warnings,
    };
  }

  // ==========================================================================
  // PRIVATE METHODS
  // ==========================================================================

  private parseContext(): CustomerContext {
    const cells = this.config.context;

    const customerName = this.getContextValue(cells.customerName, 'Customer name');
    const region = this.getContextValue(cells.region, 'Region code');
    const timezone = this.getContextValue(cells.timezone, 'Default timezone');

    return {
      customerName,
      region,
      timezone,
      lineClassDefaults: {
        businessGroup: this.getCellString(cells.businessGroupLcc.sheet, cells.businessGroupLcc.cell) ?? '',
        lcc1: this.getCellString(cells.lcc1.sheet, cells.lcc1.cell) ?? '',
        lcc2: this.getCellString(cells.lcc2.sheet, cells.lcc2.cell) ?? '',
        lcc3: this.getCellString(cells.lcc3.sheet, cells.lcc3.cell) ?? '',
      },
    };
  }

  private getContextValue(ref: { sheet: SheetKey; cell: string }, label: string): string {
    const value = this.getCellString(ref.sheet, ref.cell);
    if (value === undefined) {
      this.warnings.push(`${label} (${ref.cell}) is empty`);
      return '';
    }
    return value;
  }

  /**
   * Last user row to read: the end of the sheet, or the configured cap when one
   * is set. Rows with data below the cap are reported.
   */
  private resolveLastUserRow(): number {
    const { startRow, endRow, columns } = this.config.userRows;
    const sheetEnd = lastRowNumber(this.requireSheet('userDetails'));
    if (endRow === undefined || endRow >= sheetEnd) return sheetEnd;

    for (let rowNumber = Math.max(endRow + 1, startRow); rowNumber <= sheetEnd; rowNumber++) {
      const hasValue = USER_FIELDS.some(
        (field) => this.getCellString('userDetails', `${columns[field]}${rowNumber}`) !== undefined
      );
      if (hasValue) {
        this.warnings.push(`User rows below row ${endRow} were not read (data found in row ${rowNumber})`);
        break;
      }
    }
    return endRow;
  }

  private parseUsers(endRow: number): UserRow[] {
    const { startRow, columns } = this.config.userRows;
    const users: UserRow[] = [];

    for (let rowNumber = startRow; rowNumber <= endRow; rowNumber++) {
      const row: UserRow = { rowNumber };
      let hasValue = false;

      for (const field of USER_FIELDS) {
        const value = this.getCellString('userDetails', `${columns[field]}${rowNumber}`);
        if (value !== undefined) {
          row[field] = value;
          hasValue = true;
        }
      }

      if (hasValue) users.push(row);
    }

    return users;
  }

  private parseHuntGroups(): HuntGroupRow[] {
    const { startRow, endRow, columns } = this.config.huntGroups;
    const groups: HuntGroupRow[] = [];

    for (let rowNumber = startRow; rowNumber <= endRow; rowNumber++) {
      const name = this.getCellString('callFlow', `${columns.name}${rowNumber}`);
      if (!name) continue;

      groups.push({
        rowNumber,
        name,
        distributionAlgorithm: this.getCellString('callFlow', `${columns.distributionAlgorithm}${rowNumber}`),
        pilotNumber: this.getCellString('callFlow', `${columns.pilotNumber}${rowNumber}`),
        voicemail: this.getCellString('callFlow', `${columns.voicemail}${rowNumber}`),
      });
    }

    return groups;
  }

  private parseRateCenterTable(): RateCenterTableEntry[] {
    const { sheet, startRow, endRow, rateCenterColumn, codeColumn } = this.config.rateCenters.table;
    const entries: RateCenterTableEntry[] = [];

    for (let row = startRow; row <= endRow; row++) {
      const rateCenter = this.getCellString(sheet, `${rateCenterColumn}${row}`);
      const code = this.getCellString(sheet, `${codeColumn}${row}`);
      if (rateCenter && code) {
        entries.push({ rateCenter, code });
      }
    }

    return entries;
  }

  private requireSheet(key: SheetKey): XLSX.WorkSheet {
    if (!this.sheets) {
      throw new WorkbookParseError('Order form sheets have not been resolved');
    }
    return this.sheets[key];
  }

  private getCellString(key: SheetKey, cellRef: string): string | undefined {
    return readCell(this.requireSheet(key), cellRef);
  }
}

export function parseOrderForm(workbook: XLSX.WorkBook, config: Config): OrderForm {
  return new OrderFormParser(config).parse(workbook);
}
