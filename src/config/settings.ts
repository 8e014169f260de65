import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { CONFIG_FIELDS, DEFAULT_SEED, DEFAULT_TOLERANCES } from '../constants/index.js';
import type {
  CanonicalProfileName,
  HeatingCurveConfigInput,
  Tolerances,
  ValidatedField
} from '../types/index.js';
import { errorMessage } from '../utils/errors.js';

export const SETTINGS_FILE = 'heatcurve.config.json';
export const SETTINGS_ENV = 'HEATCURVE_CONFIG';

export interface SimulationSettings {
  start: string;
  days: number;
  meanTemp: number;
  dailyVariation: number;
  diurnalAmplitude: number;
  jitter: number;
}

export interface AppSettings {
  seed: number;
  databasePath?: string;
  curve: HeatingCurveConfigInput;
  simulation: SimulationSettings;
  tolerances: Record<CanonicalProfileName, Tolerances>;
  loadedFrom: string | null;
}

export const DEFAULT_SIMULATION: SimulationSettings = {
  start: '2023-11-01',
  days: 120,
  meanTemp: 3,
  dailyVariation: 6,
  diurnalAmplitude: 3,
  jitter: 1
};

const PROFILE_NAMES: readonly CanonicalProfileName[] = ['clean', 'moderate', 'noisy'];
const TOLERANCE_FIELDS: readonly ValidatedField[] = ['slope', 'dayRoomTarget', 'nightRoomTarget', 'upperLimit', 'lowerLimit'];
const SIMULATION_NUMBERS = ['days', 'meanTemp', 'dailyVariation', 'diurnalAmplitude', 'jitter'] as const;

export function defaultSettings(): AppSettings {
  return {
    seed: DEFAULT_SEED,
    curve: {},
    simulation: { ...DEFAULT_SIMULATION },
    tolerances: {
      clean: { ...DEFAULT_TOLERANCES.clean },
      moderate: { ...DEFAULT_TOLERANCES.moderate },
      noisy: { ...DEFAULT_TOLERANCES.noisy }
    },
    loadedFrom: null
  };
}

/**
 * Settings file lookup: explicit path, then $HEATCURVE_CONFIG, then
 * heatcurve.config.json in the working directory. Falls back to defaults.
 */
export function resolveSettingsPath(configPath?: string): string | null {
  if (configPath) return resolve(configPath);
  if (process.env[SETTINGS_ENV]) return resolve(process.env[SETTINGS_ENV] ?? '');

  const local = join(process.cwd(), SETTINGS_FILE);
  return existsSync(local) ? local : null;
}

export function loadSettings(configPath?: string): AppSettings {
  const path = resolveSettingsPath(configPath);
  if (!path) return defaultSettings();

  if (!existsSync(path)) {
    throw new Error(`Settings file not found: ${path}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new Error(`Could not read settings from ${path}: ${errorMessage(error)}`);
  }

  const settings = applySettings(defaultSettings(), data, message => console.warn(`⚠️  ${path}: ${message}`));
  return { ...settings, loadedFrom: path };
}

// Merge a parsed settings object over a base; invalid entries are reported and skipped
export function applySettings(base: AppSettings, data: unknown, warn: (message: string) => void): AppSettings {
  if (!isObject(data)) {
    warn('settings must be a JSON object, using defaults');
    return base;
  }

  const settings: AppSettings = {
    ...base,
    curve: { ...base.curve },
    simulation: { ...base.simulation },
    tolerances: { ...base.tolerances }
  };

  if (data.seed !== undefined) {
    if (typeof data.seed === 'number' && Number.isInteger(data.seed)) settings.seed = data.seed;
    else warn('seed must be an integer');
  }

  if (data.databasePath !== undefined) {
    if (typeof data.databasePath === 'string') settings.databasePath = data.databasePath;
    else warn('databasePath must be a string');
  }

  if (isObject(data.curve)) {
    const curve: { -readonly [K in keyof HeatingCurveConfigInput]: number } = {};
    for (const field of CONFIG_FIELDS) {
      const value = data.curve[field];
      if (value === undefined) continue;
      if (typeof value === 'number') curve[field] = value;
      else warn(`curve.${field} must be a number`);
    }
    settings.curve = { ...settings.curve, ...curve };
  }

  if (isObject(data.simulation)) {
    const simulation = data.simulation;
    if (simulation.start !== undefined) {
      if (typeof simulation.start === 'string') settings.simulation.start = simulation.start;
      else warn('simulation.start must be an ISO date string');
    }
    for (const field of SIMULATION_NUMBERS) {
      const value = simulation[field];
      if (value === undefined) continue;
      if (typeof value === 'number' && Number.isFinite(value)) settings.simulation[field] = value;
      else warn(`simulation.${field} must be a number`);
    }
  }

  if (isObject(data.tolerances)) {
    for (const profile of PROFILE_NAMES) {
      const entry = data.tolerances[profile];
      if (entry === undefined) continue;
      if (!isObject(entry)) {
        warn(`tolerances.${profile} must be an object`);
        continue;
      }
      const tolerances: Tolerances = { ...settings.tolerances[profile] };
      for (const field of TOLERANCE_FIELDS) {
        const value = entry[field];
        if (value === undefined) continue;
        if (typeof value === 'number' && value >= 0) tolerances[field] = value;
        else warn(`tolerances.${profile}.${field} must be a non-negative number`);
      }
      settings.tolerances[profile] = tolerances;
    }
  }

  return settings;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
