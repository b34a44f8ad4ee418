import type * as XLSX from 'xlsx';
import { parseOrderForm, readWorkbook } from '../parsers/order-form-parser.js';
import { RateCenterEnricher, getDefaultRateCenterLookup } from './rate-center-enricher.js';
import { buildRecordSet, createBuildContext } from './record-builders.js';
import { buildExportFiles } from './section-assembler.js';
import { isEligibleUser } from './template-classifier.js';
import { createChildLogger } from '../utils/logger.js';
import { getConfig, type Config } from '../utils/config.js';
import type { ExportOptions } from '../types/index.js';
import type { ExportResult, LineClassCodes, OrderForm, RecordKind, RecordSet } from '../types/order-form.js';

function countRecords(records: RecordSet): Record<RecordKind, number> {
  return {
    businessGroup: records.businessGroup.length,
    numberBlock: records.numberBlock.length,
    department: records.department.length,
    subscriber: records.subscriber.length,
    managedDevice: records.managedDevice.length,
    intercomRange: records.intercomRange.length,
    huntGroup: records.huntGroup.length,
    huntGroupPilot: records.huntGroupPilot.length,
  };
}

async function resolveLineClassCodes(
  form: OrderForm,
  config: Config,
  options: ExportOptions
): Promise<Map<string, LineClassCodes>> {
  const enabled = options.enrichRateCenters ?? config.rateCenters.enabled;
  if (!enabled) return new Map();

  const lookup = options.rateCenterLookup ?? getDefaultRateCenterLookup(config.rateCenters);
  const enricher = new RateCenterEnricher(lookup, form.rateCenterTable);

  const phones: string[] = [];
  for (const user of form.users) {
    if (user.phone !== undefined && isEligibleUser(user, config.templates)) {
      phones.push(user.phone);
    }
  }

  return enricher.enrichAll(phones, config.rateCenters.concurrency);
}

/**
 * Turn an order workbook into provisioning import files.
 * Throws before building any output when a required sheet is missing.
 */
export async function generateProvisioningExport(
  source: Buffer | XLSX.WorkBook,
  options: ExportOptions = {},
  filename?: string
): Promise<ExportResult> {
  const startTime = Date.now();
  const config = options.config ?? getConfig();
  const log = createChildLogger({ filename });

  const workbook = Buffer.isBuffer(source) ? readWorkbook(source, filename) : source;
  log.info('Processing order workbook', { sheets: workbook.SheetNames });

  const form = parseOrderForm(workbook, config);
  const { context } = form;

  log.info('Loaded order form', {
    customer: context.customerName,
    region: context.region,
    timezone: context.timezone,
    users: form.users.length,
    huntGroups: form.huntGroups.length,
  });
  for (const warning of form.warnings) {
    log.warn(warning);
  }

  const lineClassCodes = await resolveLineClassCodes(form, config, options);

  const records = buildRecordSet(form, createBuildContext(context, config), {
    now: options.now ?? new Date(),
    lineClassCodes,
    blankPilotPolicy: options.blankPilotPolicy ?? config.huntGroups.blankPilotPolicy,
  });

  const files = buildExportFiles(records, context.customerName, options.mode ?? config.output.mode, config.output);
  const counts = countRecords(records);

  log.info('Provisioning export built', {
    files: files.map((file) => file.filename),
    counts,
    durationMs: Date.now() - startTime,
  });

  return {
    customerName: context.customerName,
    region: context.region,
    timezone: context.timezone,
    files,
    counts,
    warnings: form.warnings,
  };
}
