import { stringify } from 'csv-stringify/sync';
import { writeFileSync } from 'fs';
import { DateTime } from 'luxon';
import { DATETIME_FORMAT, GROUND_TRUTH_KEYS, CONFIG_FIELDS } from '../constants/index.js';
import type { HeatingCurveConfig, ObservationSeries } from '../types/index.js';

export interface ObservationWriterOptions {
  zone?: string;           // Default: 'utc'
  decimalPlaces?: number;  // Default: 2
}

// datetime,t_outdoor,t_vorlauf[,is_night]; a missing flow is an empty cell
export function formatObservationCsv(series: ObservationSeries, options?: ObservationWriterOptions): string {
  const opts = {
    zone: options?.zone ?? 'utc',
    decimalPlaces: options?.decimalPlaces ?? 2
  };

  const withLabels = series.observations.some(o => o.isNight !== undefined);
  const columns = withLabels
    ? ['datetime', 't_outdoor', 't_vorlauf', 'is_night']
    : ['datetime', 't_outdoor', 't_vorlauf'];

  const rows = series.observations.map(o => {
    const row: Record<string, string | number> = {
      datetime: DateTime.fromJSDate(o.timestamp, { zone: opts.zone }).toFormat(DATETIME_FORMAT),
      t_outdoor: Number(o.outdoorTemp.toFixed(opts.decimalPlaces)),
      t_vorlauf: o.flowTemp === null ? '' : Number(o.flowTemp.toFixed(opts.decimalPlaces))
    };
    if (withLabels) {
      row['is_night'] = o.isNight === undefined ? '' : String(o.isNight);
    }
    return row;
  });

  return stringify(rows, { header: true, columns });
}

export function writeObservationCsv(series: ObservationSeries, filePath: string, options?: ObservationWriterOptions): void {
  writeFileSync(filePath, formatObservationCsv(series, options));
}

export function formatGroundTruth(config: HeatingCurveConfig): string {
  const record: Record<string, number> = {};
  for (const field of CONFIG_FIELDS) {
    record[GROUND_TRUTH_KEYS[field]] = config[field];
  }
  return JSON.stringify(record, null, 2);
}

export function writeGroundTruthJson(config: HeatingCurveConfig, filePath: string): void {
  writeFileSync(filePath, formatGroundTruth(config) + '\n');
}
