import type { OptionRecord } from '../spec/types';

export type BannerRow = [switches: string, defaultValue: string, doc: string];

const HEADER: BannerRow = ['Switches', 'Default', 'Desc'];
const SEPARATOR: BannerRow = ['--------', '-------', '----'];

function formatDefault(r: OptionRecord): string {
  if (!r.hasDefault) return '';
  const v = r.defaultValue;
  if (v === undefined || v === null) return '';
  if (typeof v === 'object') return JSON.stringify(v);
  return String(v);
}

function rowFor(r: OptionRecord): BannerRow {
  return [r.switches.join(', '), formatDefault(r), r.doc];
}

/** Header, separator, then one row per record in declaration order. */
export function bannerRows(records: readonly OptionRecord[]): BannerRow[] {
  return [HEADER, SEPARATOR, ...records.map(rowFor)];
}

export function columnWidths(rows: readonly BannerRow[]): [number, number, number] {
  const widths: [number, number, number] = [0, 0, 0];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i], cell.length);
    });
  }
  return widths;
}

/**
 * Usage text: a `Usage:` line, a blank line, then the table. Every cell is
 * padded on the right to its column width, cells are separated by two spaces
 * and each row is framed by one space on either side.
 */
export function formatBanner(records: readonly OptionRecord[]): string {
  const rows = bannerRows(records);
  const widths = columnWidths(rows);
  const lines = rows.map((row) => ` ${row.map((cell, i) => cell.padEnd(widths[i])).join('  ')} \n`);
  return `Usage:\n\n${lines.join('')}`;
}
