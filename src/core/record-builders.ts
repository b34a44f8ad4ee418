/**
 * Record builders: one pure function per output record kind.
 * Builders for per-row kinds return null when the row does not qualify.
 */

import { RECORD_LAYOUTS, layoutRecord } from './record-layouts.js';
import { classifyTemplate, isAutoAttendant, isEligibleUser } from './template-classifier.js';
import type { BlankPilotPolicy, Config } from '../utils/config.js';
import type {
  CustomerContext,
  ExportRecord,
  HuntGroupRow,
  LineClassCodes,
  OrderForm,
  RecordSet,
  UserRow,
} from '../types/order-form.js';

export interface BuildContext {
  context: CustomerContext;
  platform: Config['platform'];
  templates: Config['templates'];
  businessGroup: Config['businessGroup'];
}

export interface RecordSetOptions {
  now: Date;
  /** Enrichment results keyed by phone number */
  lineClassCodes: Map<string, LineClassCodes>;
  blankPilotPolicy: BlankPilotPolicy;
}

export const TRUST_WINDOW_DAYS = 28;

export function createBuildContext(context: CustomerContext, config: Config): BuildContext {
  return {
    context,
    platform: config.platform,
    templates: config.templates,
    businessGroup: config.businessGroup,
  };
}

// ============================================================================
// BUSINESS GROUP / NUMBER BLOCK / DEPARTMENT
// ============================================================================

export function buildBusinessGroupRecord(ctx: BuildContext): ExportRecord {
  const { context, platform, businessGroup } = ctx;
  const bgTemplate = `${context.region} BG`;

  return layoutRecord(RECORD_LAYOUTS.businessGroup.columns, {
    'MetaSphere CFS': platform.cfsName,
    'MetaSphere EAS': platform.easName,
    'Business Group': context.customerName,
    'Template': bgTemplate,
    'CFS Persistent Profile': bgTemplate,
    'Local CNAM name': '',
    'Music On Hold Service - Subscribed': 'TRUE',
    'Music On Hold Service - class of service': businessGroup.musicOnHoldClassOfService,
    'Music On Hold Service - limit concurrent calls': 'TRUE',
    'Music On Hold Service - maximum concurrent calls': businessGroup.musicOnHoldMaxConcurrentCalls,
    'Music On Hold Service - Service Level': businessGroup.musicOnHoldServiceLevel,
    'Music On Hold Service - Application Server': businessGroup.musicOnHoldApplicationServer,
    'Line Class Code': context.lineClassDefaults.businessGroup,
  });
}

export function buildNumberBlockRecord(phone: string, ctx: BuildContext): ExportRecord {
  return layoutRecord(RECORD_LAYOUTS.numberBlock.columns, {
    'MetaSphere CFS': ctx.platform.cfsName,
    'Business Group': ctx.context.customerName,
    'First Phone number': phone,
    'Block size': '1',
    'CFS Subscriber Group': ctx.platform.subscriberGroup,
  });
}

export function buildDepartmentRecord(department: string, ctx: BuildContext): ExportRecord {
  return layoutRecord(RECORD_LAYOUTS.department.columns, {
    'MetaSphere CFS': ctx.platform.cfsName,
    'MetaSphere EAS': ctx.platform.easName,
    'Business Group': ctx.context.customerName,
    'Department Name': department,
  });
}

// ============================================================================
// PER-USER RECORDS
// ============================================================================

export function resolveAccountType(accountType: string | undefined, adminAccountTypes: string[]): string {
  return accountType !== undefined && adminAccountTypes.includes(accountType) ? 'Administrator' : 'Normal';
}

export function buildSubscriberRecord(
  row: UserRow,
  ctx: BuildContext,
  codes?: LineClassCodes
): ExportRecord | null {
  if (!isEligibleUser(row, ctx.templates) || row.phone === undefined) return null;

  const { context, platform, templates } = ctx;
  const phone = row.phone;
  const name = row.name ?? '';
  const template = classifyTemplate(row.template, context.region, templates.labels);

  // Auto-attendants and unmapped plans carry no presence or caller-ID behaviour
  const seatFeatures = template !== '' && !isAutoAttendant(template, context.region, templates.autoAttendantSuffixes);

  const accountType = resolveAccountType(row.accountType, templates.adminAccountTypes);
  const timezone = row.timezone ?? context.timezone;
  const department = row.department ?? '';
  const defaults = context.lineClassDefaults;

  return layoutRecord(RECORD_LAYOUTS.subscriber.columns, {
    'MetaSphere CFS': platform.cfsName,
    'MetaSphere EAS': platform.easName,
    'Phone Number': phone,
    'Template': template,
    'Business Group (CFS)': context.customerName,
    'Business Group (EAS)': context.customerName,
    'CFS Subscriber Group': platform.subscriberGroup,
    'Name (CFS)': name,
    'Name (EAS)': name,
    'PIN (CFS)': '',
    'PIN (EAS)': '',
    'EAS Preferred Language': platform.easPreferredLanguage,
    'EAS Password': '',
    'Business Group Administration - account type (CFS)': accountType,
    'Business Group Administration - account type (EAS)': accountType,
    'Line State Monitoring - Subscribed': seatFeatures ? 'TRUE' : '',
    'Calling Name Delivery - local name (BG subscriber)': seatFeatures ? name : '',
    'Account Email': row.email ?? '',
    'Timezone (CFS)': timezone,
    'Timezone (EAS)': timezone,
    'Calling party number': row.callingNumber ?? '',
    'Charge number': phone,
    'Calling party number for emergency calls': phone,
    'Department (CFS)': department,
    'Department (EAS)': department,
    'Calling Name Delivery - use local name for intra-BG calls only': seatFeatures ? 'TRUE' : '',
    'Line Class Code 1': row.routingOverride ?? (codes?.lcc1 || defaults.lcc1),
    'Line Class Code 2': codes?.lcc2 || defaults.lcc2,
    'Line Class Code 3': codes?.lcc3 || defaults.lcc3,
  });
}

/**
 * Generation time plus the trust window, pinned to 23:59:59 local time
 */
export function computeTrustedUntil(now: Date): Date {
  const until = new Date(now.getTime());
  until.setDate(until.getDate() + TRUST_WINDOW_DAYS);
  until.setHours(23, 59, 59, 0);
  return until;
}

/**
 * Format as "M/D/YYYY  11:59:59 PM" (two spaces before the time)
 */
export function formatTrustedUntil(date: Date): string {
  return `${date.getMonth() + 1}/${date.getDate()}/${date.getFullYear()}  11:59:59 PM`;
}

export function buildManagedDeviceRecord(row: UserRow, ctx: BuildContext, now: Date): ExportRecord | null {
  if (!isEligibleUser(row, ctx.templates) || row.phone === undefined) return null;
  if (row.macAddress === undefined) return null;

  return layoutRecord(RECORD_LAYOUTS.managedDevice.columns, {
    'MetaSphere EAS': ctx.platform.easName,
    'Business Group': ctx.context.customerName,
    'MAC address': row.macAddress,
    'Assigned to user': 'TRUE',
    'User directory number': row.phone,
    'MAC trusted until': formatTrustedUntil(computeTrustedUntil(now)),
    'Device version': ctx.platform.deviceVersion,
    'Device model': ctx.platform.deviceModel,
    'Description': '',
  });
}

export function buildIntercomRangeRecord(row: UserRow, ctx: BuildContext): ExportRecord | null {
  if (!isEligibleUser(row, ctx.templates) || row.phone === undefined) return null;
  if (row.extension === undefined) return null;

  return layoutRecord(RECORD_LAYOUTS.intercomRange.columns, {
    'First Code': row.extension,
    'Last Code': row.extension,
    'First Directory Number': row.phone,
  });
}

// ============================================================================
// HUNT GROUPS
// ============================================================================

export function normalizeDistributionAlgorithm(algorithm: string | undefined): string {
  if (algorithm === undefined) return '';
  return algorithm === 'Ring All' ? 'Ring all' : algorithm;
}

export function formatHuntGroupMember(phone: string): string {
  return `{'${phone}';'FALSE'}`;
}

/**
 * Phone numbers of eligible users in the group, in sheet order
 */
export function collectHuntGroupMembers(group: HuntGroupRow, users: UserRow[], ctx: BuildContext): string[] {
  const members: string[] = [];
  for (const user of users) {
    if (user.huntGroup !== group.name || user.phone === undefined) continue;
    if (!isEligibleUser(user, ctx.templates)) continue;
    members.push(user.phone);
  }
  return members;
}

export function buildHuntGroupRecord(
  group: HuntGroupRow,
  users: UserRow[],
  ctx: BuildContext,
  blankPilotPolicy: BlankPilotPolicy
): ExportRecord | null {
  if (group.pilotNumber === undefined && blankPilotPolicy === 'skip') return null;

  const members = collectHuntGroupMembers(group, users, ctx);

  return layoutRecord(RECORD_LAYOUTS.huntGroup.columns, {
    'MetaSphere CFS': ctx.platform.cfsName,
    'Business Group': ctx.context.customerName,
    'MLHG Name': group.name,
    'Members;Directory number;Login/logout supported': members.map(formatHuntGroupMember).join(';'),
    'Distribution algorithm': normalizeDistributionAlgorithm(group.distributionAlgorithm),
    'Hunt on no-answer': 'FALSE',
  });
}

export function buildHuntGroupPilotRecord(group: HuntGroupRow, ctx: BuildContext): ExportRecord | null {
  if (group.pilotNumber === undefined) return null;

  const region = ctx.context.region;
  const hasVoicemail = group.voicemail?.trim().toLowerCase() === 'yes';
  const pilotName = `${group.name} Pilot`;

  return layoutRecord(RECORD_LAYOUTS.huntGroupPilot.columns, {
    'MetaSphere CFS': ctx.platform.cfsName,
    'MetaSphere EAS': ctx.platform.easName,
    'Phone number': group.pilotNumber,
    'Template': hasVoicemail ? `${region}_MLHG_Pilot` : `${region}_MLHG_Pilot_NoVM`,
    'Business Group': ctx.context.customerName,
    'CFS Subscriber Group': ctx.platform.subscriberGroup,
    'Name (CFS)': pilotName,
    'Name (EAS)': pilotName,
    'PIN (EAS)': '*',
    'EAS Password': '*',
  });
}

// ============================================================================
// FULL RECORD SET
// ============================================================================

function collect<T>(items: Iterable<T>, build: (item: T) => ExportRecord | null): ExportRecord[] {
  const records: ExportRecord[] = [];
  for (const item of items) {
    const record = build(item);
    if (record) records.push(record);
  }
  return records;
}

export function buildRecordSet(form: OrderForm, ctx: BuildContext, options: RecordSetOptions): RecordSet {
  const { now, lineClassCodes, blankPilotPolicy } = options;

  return {
    businessGroup: [buildBusinessGroupRecord(ctx)],
    numberBlock: collect(form.numberPool, (phone) => buildNumberBlockRecord(phone, ctx)),
    department: collect(form.departments, (department) => buildDepartmentRecord(department, ctx)),
    subscriber: collect(form.users, (user) =>
      buildSubscriberRecord(user, ctx, user.phone === undefined ? undefined : lineClassCodes.get(user.phone))
    ),
    managedDevice: collect(form.users, (user) => buildManagedDeviceRecord(user, ctx, now)),
    intercomRange: collect(form.users, (user) => buildIntercomRangeRecord(user, ctx)),
    huntGroup: collect(form.huntGroups, (group) => buildHuntGroupRecord(group, form.users, ctx, blankPilotPolicy)),
    huntGroupPilot: collect(form.huntGroups, (group) => buildHuntGroupPilotRecord(group, ctx)),
  };
}
