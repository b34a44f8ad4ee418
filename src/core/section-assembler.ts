import { stringify } from 'csv-stringify/sync';
import { BG_FILE_KINDS, RECORD_LAYOUTS, SEATS_FILE_KINDS, fitRecord, recordWidth } from './record-layouts.js';
import type { Config, ExportMode } from '../utils/config.js';
import type { ExportFile, ExportRecord, RecordKind, RecordSet } from '../types/order-form.js';

type OutputSettings = Config['output'];

export function toCsv(rows: ExportRecord[]): string {
  return stringify(rows, { record_delimiter: 'unix' });
}

/**
 * Comment banner, title line, header line and data rows of one record kind.
 * Ends with a line feed.
 */
export function renderSection(kind: RecordKind, records: ExportRecord[], output: OutputSettings): string {
  const { title, columns } = RECORD_LAYOUTS[kind];
  const marker = output.commentMarker;
  const noun = records.length === 1 ? 'record' : 'records';

  const banner = [marker, `${marker} ${title}: ${records.length} ${noun}`, marker, title].join('\n');
  const width = recordWidth(kind);
  const rows = records.map((record) => fitRecord(record, width));

  return `${banner}\n${toCsv([[...columns], ...rows])}`;
}

export function assembleSections(kinds: RecordKind[], records: RecordSet, output: OutputSettings): string {
  return kinds
    .map((kind) => renderSection(kind, records[kind], output))
    .join('\n'.repeat(output.sectionSpacing));
}

/**
 * Replace characters that are not allowed in file names
 */
export function safeFilenamePart(customerName: string): string {
  const cleaned = customerName.replace(/[\\/:*?"<>|\x00-\x1F]/g, '-').trim();
  return cleaned || 'customer';
}

export function buildExportFiles(
  records: RecordSet,
  customerName: string,
  mode: ExportMode,
  output: OutputSettings
): ExportFile[] {
  const customer = safeFilenamePart(customerName);
  const bgContent = assembleSections(BG_FILE_KINDS, records, output);
  const seatsContent = assembleSections(SEATS_FILE_KINDS, records, output);

  if (mode === 'combined') {
    return [
      {
        filename: `${customer}-Meta-Import-Combined.csv`,
        content: `${bgContent}${'\n'.repeat(output.groupSpacing)}${seatsContent}`,
        sections: [...BG_FILE_KINDS, ...SEATS_FILE_KINDS],
      },
    ];
  }

  return [
    {
      filename: `BG-NumberBlock-Departments-${customer}.csv`,
      content: bgContent,
      sections: [...BG_FILE_KINDS],
    },
    {
      filename: `Seats-Devices-Exts-MLHG-${customer}.csv`,
      content: seatsContent,
      sections: [...SEATS_FILE_KINDS],
    },
  ];
}
