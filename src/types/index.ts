/**
 * Core type definitions for the provisioning import generator
 */

import type { BlankPilotPolicy, Config, ExportMode } from '../utils/config.js';
import type { RateCenterLookup } from './order-form.js';

// Re-export workbook and record types
export * from './order-form.js';

export type { Config, SheetKey, BlankPilotPolicy, ExportMode, LogFormat } from '../utils/config.js';

export interface ExportOptions {
  /** Defaults to the loaded config/default.json */
  config?: Config;
  mode?: ExportMode;
  /** Generation time; drives the managed device trust window */
  now?: Date;
  /** Set false to skip NPA-NXX lookups and use the engineering defaults */
  enrichRateCenters?: boolean;
  rateCenterLookup?: RateCenterLookup;
  blankPilotPolicy?: BlankPilotPolicy;
}
