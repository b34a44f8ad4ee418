import type { ExportRecord, RecordKind } from '../types/order-form.js';

export interface RecordLayout {
  /** Object type line the importer keys the section on */
  title: string;
  columns: readonly string[];
}

export const RECORD_LAYOUTS = {
  businessGroup: {
    title: 'Business Group',
    columns: [
      'MetaSphere CFS',
      'MetaSphere EAS',
      'Business Group',
      'Template',
      'CFS Persistent Profile',
      'Local CNAM name',
      'Music On Hold Service - Subscribed',
      'Music On Hold Service - class of service',
      'Music On Hold Service - limit concurrent calls',
      'Music On Hold Service - maximum concurrent calls',
      'Music On Hold Service - Service Level',
      'Music On Hold Service - Application Server',
      'Line Class Code',
    ],
  },
  numberBlock: {
    title: 'Number Block',
    columns: [
      'MetaSphere CFS',
      'Business Group',
      'First Phone number',
      'Block size',
      'CFS Subscriber Group',
    ],
  },
  department: {
    title: 'Department',
    columns: [
      'MetaSphere CFS',
      'MetaSphere EAS',
      'Business Group',
      'Department Name',
    ],
  },
  subscriber: {
    title: 'Subscriber',
    columns: [
      'MetaSphere CFS',
      'MetaSphere EAS',
      'Phone Number',
      'Template',
      'Business Group (CFS)',
      'Business Group (EAS)',
      'CFS Subscriber Group',
      'Name (CFS)',
      'Name (EAS)',
      'PIN (CFS)',
      'PIN (EAS)',
      'EAS Preferred Language',
      'EAS Password',
      'Business Group Administration - account type (CFS)',
      'Business Group Administration - account type (EAS)',
      'Line State Monitoring - Subscribed',
      'Calling Name Delivery - local name (BG subscriber)',
      'Account Email',
      'Timezone (CFS)',
      'Timezone (EAS)',
      'Calling party number',
      'Charge number',
      'Calling party number for emergency calls',
      'Department (CFS)',
      'Department (EAS)',
      'Calling Name Delivery - use local name for intra-BG calls only',
      'Line Class Code 1',
      'Line Class Code 2',
      'Line Class Code 3',
    ],
  },
  managedDevice: {
    title: 'Managed Device',
    columns: [
      'MetaSphere EAS',
      'Business Group',
      'MAC address',
      'Assigned to user',
      'User directory number',
      'MAC trusted until',
      'Device version',
      'Device model',
      'Description',
    ],
  },
  intercomRange: {
    title: 'Intercom Code Range',
    columns: [
      'First Code',
      'Last Code',
      'First Directory Number',
    ],
  },
  huntGroup: {
    title: 'MLHG',
    columns: [
      'MetaSphere CFS',
      'Business Group',
      'MLHG Name',
      'Members;Directory number;Login/logout supported',
      'Distribution algorithm',
      'Hunt on no-answer',
    ],
  },
  huntGroupPilot: {
    title: 'MLHG Pilot Subscriber',
    columns: [
      'MetaSphere CFS',
      'MetaSphere EAS',
      'Phone number',
      'Template',
      'Business Group',
      'CFS Subscriber Group',
      'Name (CFS)',
      'Name (EAS)',
      'PIN (EAS)',
      'EAS Password',
    ],
  },
} as const satisfies Record<RecordKind, RecordLayout>;

/** Section order within each output file */
export const BG_FILE_KINDS: RecordKind[] = ['businessGroup', 'numberBlock', 'department'];
export const SEATS_FILE_KINDS: RecordKind[] = [
  'subscriber',
  'managedDevice',
  'intercomRange',
  'huntGroup',
  'huntGroupPilot',
];

export function recordWidth(kind: RecordKind): number {
  return RECORD_LAYOUTS[kind].columns.length;
}

/**
 * Right-pad with blanks or truncate from the right to exactly `width` fields
 */
export function fitRecord(values: readonly string[], width: number): ExportRecord {
  if (values.length >= width) return values.slice(0, width);
  return [...values, ...new Array<string>(width - values.length).fill('')];
}

/**
 * Lay named fields out in the column order of a record kind
 */
export function layoutRecord<C extends string>(
  columns: readonly C[],
  fields: { [P in C]?: string }
): ExportRecord {
  const values: string[] = [];
  for (const column of columns) {
    values.push(fields[column] ?? '');
  }
  return fitRecord(values, columns.length);
}
