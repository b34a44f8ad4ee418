/**
 * Type definitions for the customer provisioning order workbook
 * Used for ingestion, enrichment and record building
 */

// ============================================================================
// WORKBOOK INPUT TYPES
// ============================================================================

/**
 * One provisioning subject from the 'User details' sheet.
 * Every field is either a non-empty trimmed string or undefined.
 */
export interface UserRow {
  /** 1-based sheet row */
  rowNumber: number;
  name?: string;
  phone?: string;
  callingNumber?: string;
  extension?: string;
  email?: string;
  accountType?: string;
  department?: string;
  timezone?: string;
  /** Raw plan label, e.g. "UCaaS|Link Standard" */
  template?: string;
  macAddress?: string;
  /** Name of the hunt group this user belongs to */
  huntGroup?: string;
  /** Overrides the rate-center derived LCC1 */
  routingOverride?: string;
}

/**
 * One hunt group row from the 'Call flow' sheet
 */
export interface HuntGroupRow {
  rowNumber: number;
  name: string;
  distributionAlgorithm?: string;
  pilotNumber?: string;
  voicemail?: string;
}

export interface LineClassDefaults {
  businessGroup: string;
  lcc1: string;
  lcc2: string;
  lcc3: string;
}

/**
 * Scalar facts read once per run
 */
export interface CustomerContext {
  customerName: string;
  /** Two-letter region code, e.g. "CH" or "LV" */
  region: string;
  timezone: string;
  lineClassDefaults: LineClassDefaults;
}

export interface RateCenterTableEntry {
  rateCenter: string;
  code: string;
}

export interface OrderForm {
  /** Actual sheet names as found in the workbook */
  sheetNames: {
    userDetails: string;
    engineering: string;
    callFlow: string;
  };
  context: CustomerContext;
  users: UserRow[];
  huntGroups: HuntGroupRow[];
  /** Subscriber numbers then pilot numbers, first occurrence kept */
  numberPool: string[];
  departments: Set<string>;
  rateCenterTable: RateCenterTableEntry[];
  warnings: string[];
}

// ============================================================================
// ENRICHMENT TYPES
// ============================================================================

export interface RateCenterInfo {
  rateCenter: string;
  lata: string;
}

export interface LineClassCodes {
  lcc1: string;
  lcc2: string;
  lcc3: string;
}

/**
 * NPA-NXX prefix lookup capability. Returns null when nothing is known about
 * the prefix.
 */
export interface RateCenterLookup {
  lookup(npa: string, nxx: string): Promise<RateCenterInfo | null>;
}

// ============================================================================
// OUTPUT TYPES
// ============================================================================

export type RecordKind =
  | 'businessGroup'
  | 'numberBlock'
  | 'department'
  | 'subscriber'
  | 'managedDevice'
  | 'intercomRange'
  | 'huntGroup'
  | 'huntGroupPilot';

export type ExportRecord = string[];

export type RecordSet = Record<RecordKind, ExportRecord[]>;

export interface ExportFile {
  filename: string;
  content: string;
  sections: RecordKind[];
}

export interface ExportResult {
  customerName: string;
  region: string;
  timezone: string;
  files: ExportFile[];
  counts: Record<RecordKind, number>;
  warnings: string[];
}
