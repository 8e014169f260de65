import { createConfig } from '../../config/curveConfig.js';
import { flowTemperature, modeAt } from '../../models/curveModel.js';
import type { HeatingCurveConfig, Observation, ObservationSeries } from '../../types/index.js';

const START = Date.UTC(2024, 0, 1);
const STEP_MS = 15 * 60 * 1000;

export function range(from: number, to: number, step: number): number[] {
  const values: number[] = [];
  const count = Math.round((to - from) / step);
  for (let k = 0; k <= count; k++) values.push(from + k * step);
  return values;
}

// Every outdoor temperature crossed with every hour of the day, noiseless
export function gridSeries(config: HeatingCurveConfig, temps: readonly number[], hours: readonly number[] = range(0, 23, 1)): ObservationSeries {
  const observations: Observation[] = [];
  let index = 0;
  for (const temp of temps) {
    for (const hour of hours) {
      observations.push({
        timestamp: new Date(START + index * STEP_MS),
        outdoorTemp: temp,
        flowTemp: flowTemperature(temp, hour, config),
        hour,
        isNight: modeAt(hour, config) === 'night'
      });
      index++;
    }
  }
  return { observations, config };
}

export function seriesFromFlows(flows: readonly (number | null)[]): ObservationSeries {
  return {
    observations: flows.map((flowTemp, i) => ({
      timestamp: new Date(START + i * STEP_MS),
      outdoorTemp: -5 + i * 0.1,
      flowTemp,
      hour: i % 24
    }))
  };
}

// Defaults (K 1.4, base 20, day 20, night 16) with limits never reached on UNCLAMPED_TEMPS
export const unclampedConfig = createConfig({ minFlowTemp: 25, maxFlowTemp: 75 });
export const UNCLAMPED_TEMPS = range(-4.5, 11.5, 0.5);

// Same curve clamped at 55 / 25 over CLAMPED_TEMPS
export const clampedConfig = createConfig({ minFlowTemp: 25, maxFlowTemp: 55 });
export const CLAMPED_TEMPS = range(-12, 14, 0.5);

// Clamps at 52 / 32 that both hold a large share of CLAMPED_TEMPS
export const doubleClampConfig = createConfig({ minFlowTemp: 32, maxFlowTemp: 52 });
