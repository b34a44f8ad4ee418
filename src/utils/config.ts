import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './error-handler.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const ColumnSchema = z.string().regex(/^[A-Z]{1,3}$/, 'expected a column letter such as "B"');
const CellSchema = z.string().regex(/^[A-Z]{1,3}[1-9][0-9]*$/, 'expected a cell address such as "C4"');
const SheetKeySchema = z.enum(['userDetails', 'engineering', 'callFlow']);

const CellRefSchema = z.object({
  sheet: SheetKeySchema,
  cell: CellSchema,
});

const RowWindowSchema = z.object({
  startRow: z.number().int().positive(),
  endRow: z.number().int().positive(),
});

export const ConfigSchema = z.object({
  platform: z.object({
    cfsName: z.string(),
    easName: z.string(),
    subscriberGroup: z.string(),
    easPreferredLanguage: z.string(),
    deviceModel: z.string(),
    deviceVersion: z.string(),
  }),
  sheets: z.object({
    userDetails: z.array(z.string().min(1)).min(1),
    engineering: z.array(z.string().min(1)).min(1),
    callFlow: z.array(z.string().min(1)).min(1),
  }),
  context: z.object({
    customerName: CellRefSchema,
    region: CellRefSchema,
    timezone: CellRefSchema,
    businessGroupLcc: CellRefSchema,
    lcc1: CellRefSchema,
    lcc2: CellRefSchema,
    lcc3: CellRefSchema,
  }),
  userRows: z.object({
    startRow: z.number().int().positive(),
    /** Optional cap; rows are otherwise read to the end of the sheet */
    endRow: z.number().int().positive().optional(),
    columns: z.object({
      name: ColumnSchema,
      phone: ColumnSchema,
      callingNumber: ColumnSchema,
      extension: ColumnSchema,
      email: ColumnSchema,
      accountType: ColumnSchema,
      department: ColumnSchema,
      timezone: ColumnSchema,
      template: ColumnSchema,
      macAddress: ColumnSchema,
      huntGroup: ColumnSchema,
      routingOverride: ColumnSchema,
    }),
  }),
  huntGroups: RowWindowSchema.extend({
    columns: z.object({
      name: ColumnSchema,
      distributionAlgorithm: ColumnSchema,
      pilotNumber: ColumnSchema,
      voicemail: ColumnSchema,
    }),
    blankPilotPolicy: z.enum(['skip', 'membersOnly']),
  }),
  templates: z.object({
    excludedLabels: z.array(z.string()),
    adminAccountTypes: z.array(z.string()),
    autoAttendantSuffixes: z.array(z.string()),
    labels: z.record(z.string(), z.string()),
  }),
  businessGroup: z.object({
    musicOnHoldClassOfService: z.string(),
    musicOnHoldMaxConcurrentCalls: z.string(),
    musicOnHoldServiceLevel: z.string(),
    musicOnHoldApplicationServer: z.string(),
  }),
  rateCenters: z.object({
    enabled: z.boolean(),
    serviceUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
    concurrency: z.number().int().positive(),
    table: RowWindowSchema.extend({
      sheet: SheetKeySchema,
      rateCenterColumn: ColumnSchema,
      codeColumn: ColumnSchema,
    }),
  }),
  output: z.object({
    mode: z.enum(['split', 'combined']),
    commentMarker: z.string().min(1),
    sectionSpacing: z.number().int().min(0),
    groupSpacing: z.number().int().min(0),
  }),
  logging: z.object({
    level: z.string(),
    format: z.enum(['json', 'pretty']),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SheetKey = z.infer<typeof SheetKeySchema>;
export type BlankPilotPolicy = Config['huntGroups']['blankPilotPolicy'];
export type ExportMode = Config['output']['mode'];
export type LogFormat = Config['logging']['format'];

let config: Config | null = null;

/**
 * Validate a raw config object. Used for the bundled default and for configs
 * handed in by callers.
 */
export function parseConfig(raw: unknown, source = 'inline config'): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`, { source });
  }
  return result.data;
}

function applyEnvOverrides(loaded: Config): Config {
  if (process.env.LOG_LEVEL) {
    loaded.logging.level = process.env.LOG_LEVEL;
  }
  if (process.env.LOG_FORMAT === 'json' || process.env.LOG_FORMAT === 'pretty') {
    loaded.logging.format = process.env.LOG_FORMAT;
  }
  if (process.env.RATE_CENTER_ENABLED) {
    loaded.rateCenters.enabled = process.env.RATE_CENTER_ENABLED === 'true';
  }
  if (process.env.RATE_CENTER_URL) {
    loaded.rateCenters.serviceUrl = process.env.RATE_CENTER_URL;
  }
  if (process.env.RATE_CENTER_TIMEOUT_MS) {
    loaded.rateCenters.timeoutMs = parseInt(process.env.RATE_CENTER_TIMEOUT_MS, 10);
  }
  if (process.env.RATE_CENTER_CONCURRENCY) {
    loaded.rateCenters.concurrency = parseInt(process.env.RATE_CENTER_CONCURRENCY, 10);
  }
  if (process.env.EXPORT_MODE === 'split' || process.env.EXPORT_MODE === 'combined') {
    loaded.output.mode = process.env.EXPORT_MODE;
  }
  if (process.env.BLANK_PILOT_POLICY === 'skip' || process.env.BLANK_PILOT_POLICY === 'membersOnly') {
    loaded.huntGroups.blankPilotPolicy = process.env.BLANK_PILOT_POLICY;
  }
  return loaded;
}

export function loadConfig(): Config {
  if (config) return config;

  const configPath = join(__dirname, '../..', 'config', 'default.json');

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load config from ${configPath}: ${message}`, { configPath });
  }

  // Overrides are re-validated so a bad env value fails the same way a bad file does
  config = parseConfig(applyEnvOverrides(parseConfig(raw, configPath)), configPath);
  return config;
}

export function getConfig(): Config {
  return loadConfig();
}

export function resetConfigCache(): void {
  config = null;
}
