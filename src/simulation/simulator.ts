import { DateTime } from 'luxon';
import { flowTemperature, modeAt } from '../models/curveModel.js';
import type { HeatingCurveConfig, NoiseProfile, ObservationSeries, OutdoorPoint } from '../types/index.js';
import { injectNoise } from './noiseInjector.js';

export interface SimulationResult {
  ideal: ObservationSeries;
  observed: ObservationSeries;
}

export function hourOfDay(timestamp: Date, zone: string = 'utc'): number {
  return DateTime.fromJSDate(timestamp, { zone }).hour;
}

// Apply the heating curve to every outdoor sample; heating-off samples get a null flow
export function simulateIdealSeries(
  outdoor: readonly OutdoorPoint[],
  config: HeatingCurveConfig,
  zone: string = 'utc'
): ObservationSeries {
  const observations = outdoor.map(point => {
    const hour = hourOfDay(point.timestamp, zone);
    return {
      timestamp: point.timestamp,
      outdoorTemp: point.outdoorTemp,
      flowTemp: flowTemperature(point.outdoorTemp, hour, config),
      hour,
      isNight: modeAt(hour, config) === 'night'
    };
  });

  return { observations, config };
}

export function generateSimulation(
  outdoor: readonly OutdoorPoint[],
  config: HeatingCurveConfig,
  profile: NoiseProfile,
  seed: number,
  zone: string = 'utc'
): SimulationResult {
  const ideal = simulateIdealSeries(outdoor, config, zone);
  return { ideal, observed: injectNoise(ideal, profile, seed) };
}
