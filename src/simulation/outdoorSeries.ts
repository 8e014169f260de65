import { DateTime } from 'luxon';
import { DEFAULT_SEED, SAMPLE_INTERVAL_MINUTES } from '../constants/index.js';
import type { OutdoorPoint } from '../types/index.js';
import { deriveRng, uniform } from '../utils/random.js';

const WEATHER_SALT = 0x57EA7;

export interface OutdoorSeriesOptions {
  start: string;             // ISO date or datetime
  days: number;
  intervalMinutes?: number;
  seed?: number;
  meanTemp?: number;
  dailyVariation?: number;   // half-width of the uniform day-to-day offset
  diurnalAmplitude?: number; // warmest at 15:00
  jitter?: number;           // half-width of the uniform per-sample noise
  zone?: string;
}

/**
 * Synthetic winter outdoor temperatures on a fixed grid.
 * Each day draws its own mean offset; each sample adds a diurnal swing and jitter.
 */
export function generateOutdoorSeries(options: OutdoorSeriesOptions): OutdoorPoint[] {
  const zone = options.zone ?? 'utc';
  const start = DateTime.fromISO(options.start, { zone }).startOf('day');
  if (!start.isValid) {
    throw new Error(`Invalid start date: ${options.start}`);
  }
  if (!Number.isInteger(options.days) || options.days < 1) {
    throw new Error(`days must be a positive integer (got ${options.days})`);
  }

  const interval = options.intervalMinutes ?? SAMPLE_INTERVAL_MINUTES;
  const samplesPerDay = Math.round((24 * 60) / interval);
  const meanTemp = options.meanTemp ?? 3;
  const dailyVariation = options.dailyVariation ?? 6;
  const diurnalAmplitude = options.diurnalAmplitude ?? 3;
  const jitter = options.jitter ?? 1;
  const rng = deriveRng(options.seed ?? DEFAULT_SEED, WEATHER_SALT);

  const points: OutdoorPoint[] = [];
  for (let day = 0; day < options.days; day++) {
    const dayOffset = uniform(rng, -dailyVariation, dailyVariation);

    for (let step = 0; step < samplesPerDay; step++) {
      const dt = start.plus({ days: day, minutes: step * interval });
      const hourOfDay = dt.hour + dt.minute / 60;
      const diurnal = diurnalAmplitude * Math.cos((2 * Math.PI * (hourOfDay - 15)) / 24);

      points.push({
        timestamp: dt.toJSDate(),
        outdoorTemp: meanTemp + dayOffset + diurnal + uniform(rng, -jitter, jitter)
      });
    }
  }

  return points;
}

/**
 * Linear interpolation of coarser readings (e.g. hourly weather) onto a regular grid
 * spanning the first to the last reading.
 */
export function interpolateSeries(points: readonly OutdoorPoint[], intervalMinutes: number = SAMPLE_INTERVAL_MINUTES): OutdoorPoint[] {
  if (points.length < 2) {
    return points.map(p => ({ ...p }));
  }

  const sorted = [...points].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const stepMs = intervalMinutes * 60 * 1000;
  const first = sorted[0].timestamp.getTime();
  const last = sorted[sorted.length - 1].timestamp.getTime();

  const result: OutdoorPoint[] = [];
  let segment = 0;

  for (let t = first; t <= last; t += stepMs) {
    while (segment < sorted.length - 2 && sorted[segment + 1].timestamp.getTime() < t) {
      segment++;
    }

    const left = sorted[segment];
    const right = sorted[segment + 1];
    const t0 = left.timestamp.getTime();
    const t1 = right.timestamp.getTime();
    const fraction = t1 === t0 ? 0 : (t - t0) / (t1 - t0);

    result.push({
      timestamp: new Date(t),
      outdoorTemp: left.outdoorTemp + fraction * (right.outdoorTemp - left.outdoorTemp)
    });
  }

  return result;
}
