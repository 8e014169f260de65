import { readFileSync } from 'fs';
import type { OutdoorPoint } from '../types/index.js';
import { parseDateTime, readRows } from './observationParser.js';

export interface ParsedWeatherData {
  points: OutdoorPoint[];
  startDate: Date | null;
  endDate: Date | null;
}

// Outdoor temperature readings: datetime plus t_outdoor (or temp)
export function parseWeatherCsv(content: string, zone: string = 'utc'): ParsedWeatherData {
  const points: OutdoorPoint[] = [];

  for (const row of readRows(content)) {
    const dt = parseDateTime(row['datetime'] ?? '', zone);
    if (!dt) {
      console.warn(`Invalid date: ${row['datetime']}`);
      continue;
    }

    const outdoorTemp = parseFloat(row['t_outdoor'] ?? row['temp'] ?? '');
    if (!Number.isFinite(outdoorTemp)) {
      console.warn(`Invalid temperature at ${row['datetime']}`);
      continue;
    }

    points.push({ timestamp: dt.toJSDate(), outdoorTemp });
  }

  points.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  return {
    points,
    startDate: points.length > 0 ? points[0].timestamp : null,
    endDate: points.length > 0 ? points[points.length - 1].timestamp : null
  };
}

export function readWeatherCsv(filePath: string, zone?: string): ParsedWeatherData {
  return parseWeatherCsv(readFileSync(filePath, 'utf-8'), zone);
}
