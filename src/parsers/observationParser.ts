import { parse } from 'csv-parse/sync';
import { readFileSync } from 'fs';
import { DateTime } from 'luxon';
import { DATETIME_FORMAT } from '../constants/index.js';
import type { Observation, ObservationSeries } from '../types/index.js';

export interface ParsedObservationData {
  series: ObservationSeries;
  startDate: Date | null;
  endDate: Date | null;
  skippedRows: number;
  duplicateRows: number;
  hasNightLabels: boolean;
}

export interface ObservationParseOptions {
  zone?: string;  // zone of naive timestamps, default UTC
}

export function parseObservationCsv(content: string, options: ObservationParseOptions = {}): ParsedObservationData {
  const zone = options.zone ?? 'utc';
  const rows = readRows(content);

  // Keyed by timestamp; a later row for the same instant replaces the earlier one
  const byTime = new Map<number, Observation>();
  let skippedRows = 0;
  let duplicateRows = 0;

  for (const row of rows) {
    const dt = parseDateTime(row['datetime'] ?? '', zone);
    if (!dt) {
      console.warn(`Invalid date: ${row['datetime']}`);
      skippedRows++;
      continue;
    }

    const outdoorTemp = parseFloat(row['t_outdoor'] ?? '');
    if (!Number.isFinite(outdoorTemp)) {
      console.warn(`Invalid outdoor temperature at ${row['datetime']}: ${row['t_outdoor']}`);
      skippedRows++;
      continue;
    }

    const flow = parseFloat(row['t_vorlauf'] ?? '');
    const observation: Observation = {
      timestamp: dt.toJSDate(),
      outdoorTemp,
      flowTemp: Number.isFinite(flow) ? flow : null,
      hour: dt.hour
    };

    const isNight = parseBoolean(row['is_night']);
    if (isNight !== undefined) observation.isNight = isNight;

    const key = dt.toMillis();
    if (byTime.has(key)) duplicateRows++;
    byTime.set(key, observation);
  }

  if (duplicateRows > 0) {
    console.warn(`⚠️  ${duplicateRows} duplicate timestamps, kept the last reading of each`);
  }

  const observations = [...byTime.values()].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  return {
    series: { observations },
    startDate: observations.length > 0 ? observations[0].timestamp : null,
    endDate: observations.length > 0 ? observations[observations.length - 1].timestamp : null,
    skippedRows,
    duplicateRows,
    hasNightLabels: observations.length > 0 && observations.every(o => o.isNight !== undefined)
  };
}

export function readObservationCsv(filePath: string, options?: ObservationParseOptions): ParsedObservationData {
  return parseObservationCsv(readFileSync(filePath, 'utf-8'), options);
}

// ISO first, then "yyyy-MM-dd HH:mm:ss"
export function parseDateTime(value: string, zone: string = 'utc'): DateTime | null {
  const trimmed = value.trim();
  if (!trimmed) return null;

  const iso = DateTime.fromISO(trimmed, { zone });
  if (iso.isValid) return iso;

  const formatted = DateTime.fromFormat(trimmed, DATETIME_FORMAT, { zone });
  if (formatted.isValid) return formatted;

  const sql = DateTime.fromSQL(trimmed, { zone });
  return sql.isValid ? sql : null;
}

export function readRows(content: string): Record<string, string>[] {
  const records: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true
  });

  if (!Array.isArray(records)) return [];

  const items: unknown[] = records;
  const rows: Record<string, string>[] = [];
  for (const record of items) {
    if (typeof record !== 'object' || record === null) continue;
    const row: Record<string, string> = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = typeof value === 'string' ? value : String(value);
    }
    rows.push(row);
  }
  return rows;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      console.warn(`Invalid is_night value: ${value}`);
      return undefined;
  }
}
