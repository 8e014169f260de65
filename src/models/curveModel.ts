import type { HeatingCurveConfig, OperatingMode } from '../types/index.js';

/**
 * Whether an hour of day falls inside the night window [start, end).
 * A window with start > end wraps past midnight; start === end means no night.
 */
export function isNightHour(hour: number, nightStartHour: number, nightEndHour: number): boolean {
  const h = ((hour % 24) + 24) % 24;
  const start = nightStartHour % 24;
  const end = nightEndHour % 24;

  if (start === end) return false;
  if (start < end) return h >= start && h < end;
  return h >= start || h < end;
}

export function modeAt(hour: number, config: HeatingCurveConfig): OperatingMode {
  return isNightHour(hour, config.nightStartHour, config.nightEndHour) ? 'night' : 'day';
}

export function roomTargetAt(hour: number, config: HeatingCurveConfig): number {
  return modeAt(hour, config) === 'night' ? config.nightRoomTarget : config.dayRoomTarget;
}

/**
 * Ideal flow temperature for an outdoor temperature and hour of day.
 * Returns null when heating is off (outdoor at or above the summer cutoff).
 * Inputs must be finite.
 */
export function flowTemperature(outdoorTemp: number, hour: number, config: HeatingCurveConfig): number | null {
  if (outdoorTemp >= config.summerCutoff) {
    return null;
  }

  const roomTarget = roomTargetAt(hour, config);
  const raw = config.baseTemperature + config.slope * (roomTarget - outdoorTemp);

  return Math.min(config.maxFlowTemp, Math.max(config.minFlowTemp, raw));
}
