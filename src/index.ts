/**
 * Provisioning Import Generator
 *
 * Main entry point for programmatic usage.
 * For CLI usage, see src/scripts/generate-import.ts
 */

// Core exports
export { generateProvisioningExport } from './core/export-processor.js';
export { classifyTemplate, isAutoAttendant, isExcludedTemplate, isEligibleUser } from './core/template-classifier.js';
export {
  RateCenterEnricher,
  CachedRateCenterLookup,
  getDefaultRateCenterLookup,
  splitPrefix,
  normalizeRateCenter,
} from './core/rate-center-enricher.js';
export {
  buildBusinessGroupRecord,
  buildNumberBlockRecord,
  buildDepartmentRecord,
  buildSubscriberRecord,
  buildManagedDeviceRecord,
  buildIntercomRangeRecord,
  buildHuntGroupRecord,
  buildHuntGroupPilotRecord,
  buildRecordSet,
  createBuildContext,
  type BuildContext,
} from './core/record-builders.js';
export { RECORD_LAYOUTS, fitRecord, recordWidth } from './core/record-layouts.js';
export { renderSection, assembleSections, buildExportFiles } from './core/section-assembler.js';

// Parser exports
export { resolveSheet, readCell, readRange, extractOrderedUnique, extractDistinct, parseOrderForm, readWorkbook } from './parsers/index.js';

// Service exports
export { HttpRateCenterLookup, parsePrefixResponse } from './services/rate-center-client.js';

// Utility exports
export { logger, createChildLogger, configureLogger } from './utils/logger.js';
export { loadConfig, getConfig, parseConfig } from './utils/config.js';
export {
  ProvisioningImportError,
  SheetNotFoundError,
  WorkbookParseError,
  ConfigError,
  RateCenterLookupError,
  describeError,
  handleError,
} from './utils/error-handler.js';

// Type exports
export type {
  UserRow,
  HuntGroupRow,
  CustomerContext,
  LineClassDefaults,
  OrderForm,
  RateCenterInfo,
  RateCenterLookup,
  RateCenterTableEntry,
  LineClassCodes,
  RecordKind,
  ExportRecord,
  RecordSet,
  ExportFile,
  ExportResult,
  ExportOptions,
  Config,
  BlankPilotPolicy,
  ExportMode,
} from './types/index.js';
