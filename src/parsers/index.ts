export { resolveSheet, normalizeSheetName, type ResolvedSheet } from './sheet-resolver.js';
export {
  readCell,
  readRange,
  extractOrderedUnique,
  extractDistinct,
  columnRange,
  type RangeSource,
} from './cell-extractor.js';
export { OrderFormParser, parseOrderForm, readWorkbook, SUPPORTED_EXTENSIONS } from './order-form-parser.js';
