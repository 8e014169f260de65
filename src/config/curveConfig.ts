import { DEFAULT_CONFIG, TEMPERATURE_RANGE } from '../constants/index.js';
import type { HeatingCurveConfig, HeatingCurveConfigInput } from '../types/index.js';
import { InvalidConfigurationError } from '../utils/errors.js';

const TEMPERATURE_FIELDS = [
  'baseTemperature',
  'dayRoomTarget',
  'nightRoomTarget',
  'minFlowTemp',
  'maxFlowTemp',
  'summerCutoff'
] as const;

const HOUR_FIELDS = ['nightStartHour', 'nightEndHour'] as const;

/**
 * Build an immutable heating curve configuration.
 * Missing fields take the defaults; every violated rule is reported at once.
 */
export function createConfig(input: HeatingCurveConfigInput = {}): HeatingCurveConfig {
  const merged: HeatingCurveConfig = { ...DEFAULT_CONFIG, ...input };
  const issues: string[] = [];

  if (!Number.isFinite(merged.slope)) {
    issues.push('slope must be a finite number');
  }

  for (const field of TEMPERATURE_FIELDS) {
    const value = merged[field];
    if (!Number.isFinite(value)) {
      issues.push(`${field} must be a finite number`);
    } else if (value < TEMPERATURE_RANGE.min || value > TEMPERATURE_RANGE.max) {
      issues.push(`${field} must be within ${TEMPERATURE_RANGE.min}..${TEMPERATURE_RANGE.max} °C (got ${value})`);
    }
  }

  for (const field of HOUR_FIELDS) {
    const value = merged[field];
    if (!Number.isFinite(value) || value < 0 || value > 24) {
      issues.push(`${field} must be within 0..24 (got ${value})`);
    }
  }

  if (merged.minFlowTemp >= merged.maxFlowTemp) {
    issues.push(`minFlowTemp (${merged.minFlowTemp}) must be below maxFlowTemp (${merged.maxFlowTemp})`);
  }
  if (merged.dayRoomTarget <= merged.nightRoomTarget) {
    issues.push(`dayRoomTarget (${merged.dayRoomTarget}) must be above nightRoomTarget (${merged.nightRoomTarget})`);
  }

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  return Object.freeze({
    ...merged,
    nightStartHour: merged.nightStartHour % 24,
    nightEndHour: merged.nightEndHour % 24
  });
}
