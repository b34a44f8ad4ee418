import { describe, it, expect } from 'vitest';
import {
  buildBusinessGroupRecord,
  buildHuntGroupPilotRecord,
  buildHuntGroupRecord,
  buildIntercomRangeRecord,
  buildManagedDeviceRecord,
  buildNumberBlockRecord,
  buildRecordSet,
  buildSubscriberRecord,
  collectHuntGroupMembers,
  computeTrustedUntil,
  createBuildContext,
  formatTrustedUntil,
  normalizeDistributionAlgorithm,
} from '../../src/core/record-builders.js';
import { RECORD_LAYOUTS } from '../../src/core/record-layouts.js';
import { parseOrderForm } from '../../src/parsers/order-form-parser.js';
import { getConfig } from '../../src/utils/config.js';
import type { CustomerContext, HuntGroupRow, UserRow } from '../../src/types/order-form.js';
import { buildOrderWorkbook } from '../helpers/workbook.js';

const CONTEXT: CustomerContext = {
  customerName: 'Acme Corp',
  region: 'CH',
  timezone: 'America/Chicago',
  lineClassDefaults: { businessGroup: 'BGLCC', lcc1: 'LCC1DEF', lcc2: 'LCC2DEF', lcc3: 'LCC3DEF' },
};

const ctx = createBuildContext(CONTEXT, getConfig());

const JANE: UserRow = {
  rowNumber: 9,
  name: 'Jane Doe',
  phone: '3125550101',
  callingNumber: '3125550100',
  extension: '101',
  email: 'jane@example.com',
  accountType: 'Company Admin',
  department: 'Sales',
  template: 'UCaaS|Link Standard',
  macAddress: 'AABBCCDDEE01',
  huntGroup: 'Sales Queue',
};

const NOW = new Date(2026, 0, 10, 9, 30);

describe('buildBusinessGroupRecord', () => {
  it('uses the region BG template and the BG line class code', () => {
    expect(buildBusinessGroupRecord(ctx)).toEqual([
      'CommandLink',
      'CommandLink_vEAS_LV',
      'Acme Corp',
      'CH BG',
      'CH BG',
      '',
      'TRUE',
      '0',
      'TRUE',
      '16',
      'Enhanced',
      'EAS Voicemail',
      'BGLCC',
    ]);
  });
});

describe('buildNumberBlockRecord', () => {
  it('describes a single-number block', () => {
    expect(buildNumberBlockRecord('3125550101', ctx)).toEqual([
      'CommandLink',
      'Acme Corp',
      '3125550101',
      '1',
      'Standard Subscribers',
    ]);
  });
});

describe('buildSubscriberRecord', () => {
  it('fills a seat subscriber with enriched line class codes', () => {
    const record = buildSubscriberRecord(JANE, ctx, { lcc1: 'CHI01', lcc2: '358', lcc3: '312' });

    expect(record).toEqual([
      'CommandLink',
      'CommandLink_vEAS_LV',
      '3125550101',
      'CH_STD',
      'Acme Corp',
      'Acme Corp',
      'Standard Subscribers',
      'Jane Doe',
      'Jane Doe',
      '',
      '',
      'eng',
      '',
      'Administrator',
      'Administrator',
      'TRUE',
      'Jane Doe',
      'jane@example.com',
      'America/Chicago',
      'America/Chicago',
      '3125550100',
      '3125550101',
      '3125550101',
      'Sales',
      'Sales',
      'TRUE',
      'CHI01',
      '358',
      '312',
    ]);
    expect(record).toHaveLength(RECORD_LAYOUTS.subscriber.columns.length);
  });

  it('blanks seat features for auto-attendants', () => {
    const record = buildSubscriberRecord(
      { rowNumber: 10, name: 'Front Desk', phone: '3125550102', template: 'UCaaS|Link Basic Auto-Attendant' },
      ctx
    );

    expect(record?.[3]).toBe('CH_AA_Easy');
    expect(record?.[13]).toBe('Normal');
    expect(record?.[15]).toBe('');
    expect(record?.[16]).toBe('');
    expect(record?.[25]).toBe('');
  });

  it('blanks seat features when the plan is unknown', () => {
    const record = buildSubscriberRecord({ rowNumber: 11, name: 'Mystery', phone: '3125550105', template: 'Gold' }, ctx);

    expect(record?.[3]).toBe('');
    expect(record?.[15]).toBe('');
  });

  it('prefers the row timezone and the routing override', () => {
    const record = buildSubscriberRecord(
      { ...JANE, timezone: 'America/New_York', routingOverride: 'ROUTE9' },
      ctx,
      { lcc1: 'CHI01', lcc2: '358', lcc3: '312' }
    );

    expect(record?.slice(18, 20)).toEqual(['America/New_York', 'America/New_York']);
    expect(record?.slice(26)).toEqual(['ROUTE9', '358', '312']);
  });

  it('falls back to the engineering defaults for blank codes', () => {
    const record = buildSubscriberRecord(JANE, ctx, { lcc1: '', lcc2: '', lcc3: '312' });
    expect(record?.slice(26)).toEqual(['LCC1DEF', 'LCC2DEF', '312']);

    const unenriched = buildSubscriberRecord(JANE, ctx);
    expect(unenriched?.slice(26)).toEqual(['LCC1DEF', 'LCC2DEF', 'LCC3DEF']);
  });

  it('skips reserved numbers', () => {
    expect(buildSubscriberRecord({ ...JANE, template: 'Reserve Number' }, ctx)).toBeNull();
  });
});

describe('trusted-until date', () => {
  it('adds 28 days and pins the end of day', () => {
    const until = computeTrustedUntil(NOW);

    expect(until.getFullYear()).toBe(2026);
    expect(until.getMonth()).toBe(1);
    expect(until.getDate()).toBe(7);
    expect(until.getHours()).toBe(23);
    expect(until.getMinutes()).toBe(59);
    expect(until.getSeconds()).toBe(59);
  });

  it('formats without zero padding and with two spaces before the time', () => {
    expect(formatTrustedUntil(new Date(2026, 1, 7, 23, 59, 59))).toBe('2/7/2026  11:59:59 PM');
  });
});

describe('buildManagedDeviceRecord', () => {
  it('assigns the device to the subscriber number', () => {
    expect(buildManagedDeviceRecord(JANE, ctx, NOW)).toEqual([
      'CommandLink_vEAS_LV',
      'Acme Corp',
      'AABBCCDDEE01',
      'TRUE',
      '3125550101',
      '2/7/2026  11:59:59 PM',
      '2',
      'Determined by Endpoint Pack',
      '',
    ]);
  });

  it('needs a MAC address', () => {
    const { macAddress: _mac, ...withoutMac } = JANE;
    expect(buildManagedDeviceRecord(withoutMac, ctx, NOW)).toBeNull();
  });
});

describe('buildIntercomRangeRecord', () => {
  it('maps the extension to the phone number', () => {
    expect(buildIntercomRangeRecord(JANE, ctx)).toEqual(['101', '101', '3125550101']);
  });

  it('needs an extension', () => {
    expect(buildIntercomRangeRecord({ rowNumber: 9, phone: '3125550101' }, ctx)).toBeNull();
  });
});

describe('hunt groups', () => {
  const SALES: HuntGroupRow = {
    rowNumber: 17,
    name: 'Sales Queue',
    distributionAlgorithm: 'Ring All',
    pilotNumber: '3125550199',
    voicemail: 'Yes',
  };
  const USERS: UserRow[] = [
    JANE,
    { rowNumber: 10, phone: '3125550103', template: 'Reserve Number', huntGroup: 'Sales Queue' },
    { rowNumber: 11, phone: '3125550104', huntGroup: 'Support Queue' },
    { rowNumber: 12, phone: '3125550105', huntGroup: 'Sales Queue' },
  ];

  it('normalizes only the ring-all spelling', () => {
    expect(normalizeDistributionAlgorithm('Ring All')).toBe('Ring all');
    expect(normalizeDistributionAlgorithm('Circular')).toBe('Circular');
    expect(normalizeDistributionAlgorithm(undefined)).toBe('');
  });

  it('collects eligible members in sheet order', () => {
    expect(collectHuntGroupMembers(SALES, USERS, ctx)).toEqual(['3125550101', '3125550105']);
  });

  it('builds the member list in importer syntax', () => {
    expect(buildHuntGroupRecord(SALES, USERS, ctx, 'skip')).toEqual([
      'CommandLink',
      'Acme Corp',
      'Sales Queue',
      "{'3125550101';'FALSE'};{'3125550105';'FALSE'}",
      'Ring all',
      'FALSE',
    ]);
  });

  it('applies the blank pilot policy', () => {
    const support: HuntGroupRow = { rowNumber: 18, name: 'Support Queue' };

    expect(buildHuntGroupRecord(support, USERS, ctx, 'skip')).toBeNull();
    expect(buildHuntGroupRecord(support, USERS, ctx, 'membersOnly')).toEqual([
      'CommandLink',
      'Acme Corp',
      'Support Queue',
      "{'3125550104';'FALSE'}",
      '',
      'FALSE',
    ]);
    expect(buildHuntGroupPilotRecord(support, ctx)).toBeNull();
  });

  it('picks the pilot template from the voicemail flag', () => {
    expect(buildHuntGroupPilotRecord(SALES, ctx)).toEqual([
      'CommandLink',
      'CommandLink_vEAS_LV',
      '3125550199',
      'CH_MLHG_Pilot',
      'Acme Corp',
      'Standard Subscribers',
      'Sales Queue Pilot',
      'Sales Queue Pilot',
      '*',
      '*',
    ]);
    expect(buildHuntGroupPilotRecord({ ...SALES, voicemail: 'No' }, ctx)?.[3]).toBe('CH_MLHG_Pilot_NoVM');
  });
});

describe('buildRecordSet', () => {
  it('builds every record kind from a parsed order form', () => {
    const config = getConfig();
    const form = parseOrderForm(buildOrderWorkbook(), config);
    const records = buildRecordSet(form, createBuildContext(form.context, config), {
      now: NOW,
      lineClassCodes: new Map(),
      blankPilotPolicy: 'skip',
    });

    expect(records.businessGroup).toHaveLength(1);
    expect(records.numberBlock.map((record) => record[2])).toEqual([
      '3125550101',
      '3125550102',
      '3125550103',
      '3125550104',
      '3125550199',
    ]);
    expect(records.department.map((record) => record[3])).toEqual(['Sales', 'Support']);
    expect(records.subscriber.map((record) => record[2])).toEqual(['3125550101', '3125550102', '3125550104']);
    expect(records.managedDevice).toHaveLength(1);
    expect(records.intercomRange).toHaveLength(1);
    expect(records.huntGroup.map((record) => record[2])).toEqual(['Sales Queue']);
    expect(records.huntGroupPilot.map((record) => record[2])).toEqual(['3125550199']);
  });
});

describe('order scenarios', () => {
  it('turns a standard location admin into a seat subscriber', () => {
    const record = buildSubscriberRecord(
      {
        rowNumber: 9,
        name: 'Jane Doe',
        phone: '5551234567',
        template: 'UCaaS|Link Standard',
        accountType: 'Location Admin',
        department: 'Sales',
      },
      ctx
    );

    expect(record?.[3]).toBe('CH_STD');
    expect(record?.slice(13, 15)).toEqual(['Administrator', 'Administrator']);
    expect(record?.[16]).toBe('Jane Doe');
    expect(record?.slice(21, 25)).toEqual(['5551234567', '5551234567', 'Sales', 'Sales']);
  });

  it('lists hunt group members in row order, not number order', () => {
    const group: HuntGroupRow = {
      rowNumber: 17,
      name: 'Sales Queue',
      distributionAlgorithm: 'Ring All',
      pilotNumber: '5559999999',
      voicemail: 'Yes',
    };
    const users: UserRow[] = [
      { rowNumber: 9, phone: '5552222222', huntGroup: 'Other Queue' },
      { rowNumber: 10, phone: '5551111111', huntGroup: 'Sales Queue' },
      { rowNumber: 11, phone: '5552222222', huntGroup: 'Sales Queue' },
    ];
    const reversed: UserRow[] = [
      { rowNumber: 9, phone: '5552222222', huntGroup: 'Sales Queue' },
      { rowNumber: 10, phone: '5551111111', huntGroup: 'Sales Queue' },
    ];

    const record = buildHuntGroupRecord(group, users, ctx, 'skip');

    expect(record?.[3]).toBe("{'5551111111';'FALSE'};{'5552222222';'FALSE'}");
    expect(record?.[4]).toBe('Ring all');
    expect(buildHuntGroupPilotRecord(group, ctx)?.[3]).toBe('CH_MLHG_Pilot');
    expect(buildHuntGroupRecord(group, reversed, ctx, 'skip')?.[3]).toBe(
      "{'5552222222';'FALSE'};{'5551111111';'FALSE'}"
    );
  });

  it('emits nothing for a reserved or phoneless row', () => {
    const rows: UserRow[] = [
      { rowNumber: 9, name: 'Held', phone: '5551230000', template: 'None | Reserve Number', macAddress: 'AA', extension: '1' },
      { rowNumber: 10, name: 'No Number', template: 'UCaaS|Link Standard', macAddress: 'BB', extension: '2' },
    ];

    for (const row of rows) {
      expect(buildSubscriberRecord(row, ctx)).toBeNull();
      expect(buildManagedDeviceRecord(row, ctx, NOW)).toBeNull();
      expect(buildIntercomRangeRecord(row, ctx)).toBeNull();
    }
  });
});
