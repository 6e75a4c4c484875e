import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import pino from 'pino';
import type { RankedDeal } from '../deals/types.js';
import { EXPORT_COLUMNS, toExportRecord } from './export-record.js';

const log = pino({ name: 'csv-export' });

export type ExportMode = 'single' | 'saved';

/** CSV with the fixed export header, one row per ranked deal. */
export function toCsv(deals: readonly RankedDeal[]): string {
  const rows = deals.map((deal) => {
    const record = toExportRecord(deal);
    return EXPORT_COLUMNS.map(({ key }) => record[key] ?? '');
  });

  return Papa.unparse(
    { fields: EXPORT_COLUMNS.map((c) => c.header), data: rows },
    // Text cells starting with = + - @ get a leading quote
    { escapeFormulae: true },
  );
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS. */
export function exportTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function exportFilename(mode: ExportMode, date: Date): string {
  return `flipscout_${mode}_${exportTimestamp(date)}.csv`;
}

/**
 * Write the result set under `dir` and return the file path.
 */
export async function writeCsvExport(
  deals: readonly RankedDeal[],
  mode: ExportMode,
  dir: string,
  now: Date = new Date(),
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, exportFilename(mode, now));
  await writeFile(filePath, toCsv(deals), 'utf8');
  log.info({ filePath, rows: deals.length, mode }, 'CSV export written');
  return filePath;
}
