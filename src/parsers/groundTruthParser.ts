import { readFileSync } from 'fs';
import { createConfig } from '../config/curveConfig.js';
import { CONFIG_FIELDS, GROUND_TRUTH_KEYS } from '../constants/index.js';
import type { HeatingCurveConfig } from '../types/index.js';
import { InvalidConfigurationError } from '../utils/errors.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Every value validation scores against must be given; the rest may default
const REQUIRED_FIELDS: readonly (keyof HeatingCurveConfig)[] = [
  'slope',
  'dayRoomTarget',
  'nightRoomTarget',
  'minFlowTemp',
  'maxFlowTemp'
];

/**
 * Read curve parameters from a key-value record. Keys may use the export
 * naming (t_room_day, t_vorlauf_max, ...) or the config field names.
 */
export function configFromRecord(record: Record<string, unknown>): HeatingCurveConfig {
  const input: { -readonly [K in keyof HeatingCurveConfig]?: number } = {};
  const issues: string[] = [];

  for (const field of CONFIG_FIELDS) {
    const key = GROUND_TRUTH_KEYS[field];
    const value = record[key] ?? record[field];
    if (value === undefined) {
      if (REQUIRED_FIELDS.includes(field)) issues.push(`${key} is required`);
      continue;
    }

    if (typeof value === 'number') {
      input[field] = value;
    } else {
      issues.push(`${key} must be a number`);
    }
  }

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  return createConfig(input);
}

export function parseGroundTruth(content: string): HeatingCurveConfig {
  const data: unknown = JSON.parse(content);
  if (!isRecord(data)) {
    throw new InvalidConfigurationError(['ground truth must be a JSON object']);
  }
  return configFromRecord(data);
}

export function readGroundTruth(filePath: string): HeatingCurveConfig {
  return parseGroundTruth(readFileSync(filePath, 'utf-8'));
}
