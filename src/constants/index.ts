import type {
  CanonicalProfileName,
  DiagnosticCode,
  HeatingCurveConfig,
  HeatingCurveConfigInput,
  NoiseProfile,
  Tolerances
} from '../types/index.js';

// Physically plausible temperature range for any configured value (°C)
export const TEMPERATURE_RANGE = { min: -30, max: 100 } as const;

// Flow sensor range; noisy readings are clipped to it
export const SENSOR_RANGE = { min: 0, max: 100 } as const;

export const DEFAULT_CONFIG: HeatingCurveConfig = {
  slope: 1.4,
  baseTemperature: 20,
  dayRoomTarget: 20,
  nightRoomTarget: 16,
  minFlowTemp: 25,
  maxFlowTemp: 75,
  summerCutoff: 15,
  nightStartHour: 22,
  nightEndHour: 6
};

export const DEFAULT_SEED = 42;

export const SAMPLE_INTERVAL_MINUTES = 15;

export const NOISE_PROFILES: Record<CanonicalProfileName, NoiseProfile> = {
  clean: {
    name: 'clean',
    description: 'Well-calibrated sensor, Gaussian noise only',
    gaussianSigma: 1.5,
    spikeProbability: 0,
    spikeMagnitude: { min: 0, max: 0 },
    missingBlockProbability: 0,
    missingBlockLength: { min: 1, max: 8 },
    outlierProbability: 0,
    outlierMagnitude: { min: 0, max: 0 },
    stuckProbability: 0
  },
  moderate: {
    name: 'moderate',
    description: 'Typical installation with hot-water interference',
    gaussianSigma: 3.5,
    spikeProbability: 0.02,
    spikeMagnitude: { min: 8, max: 16 },
    missingBlockProbability: 0,
    missingBlockLength: { min: 1, max: 8 },
    outlierProbability: 0.005,
    outlierMagnitude: { min: 10, max: 20 },
    stuckProbability: 0
  },
  noisy: {
    name: 'noisy',
    description: 'Poor sensor placement, dropouts and stuck readings',
    gaussianSigma: 5.0,
    spikeProbability: 0.03,
    spikeMagnitude: { min: 12, max: 18 },
    missingBlockProbability: 0.05,
    missingBlockLength: { min: 1, max: 8 },
    outlierProbability: 0.015,
    outlierMagnitude: { min: 10, max: 20 },
    stuckProbability: 0.01
  }
};

export const DEFAULT_TOLERANCES: Record<CanonicalProfileName, Tolerances> = {
  clean: { slope: 0.1, dayRoomTarget: 1, nightRoomTarget: 1, upperLimit: 3, lowerLimit: 3 },
  moderate: { slope: 0.2, dayRoomTarget: 1.5, nightRoomTarget: 1.5, upperLimit: 5, lowerLimit: 5 },
  noisy: { slope: 0.3, dayRoomTarget: 2, nightRoomTarget: 2, upperLimit: 8, lowerLimit: 8 }
};

export interface BuildingPreset {
  name: string;
  description: string;
  config: HeatingCurveConfigInput;
}

export const BUILDING_PRESETS: Record<string, BuildingPreset> = {
  'heat-pump-floor': {
    name: 'Heat Pump + Floor Heating',
    description: 'Low-temperature system, flat curve',
    config: { slope: 0.3, maxFlowTemp: 55, minFlowTemp: 25 }
  },
  'radiators-good': {
    name: 'Radiators + Good Insulation',
    description: 'Modern radiators in a renovated building',
    config: { slope: 1.0, maxFlowTemp: 65, minFlowTemp: 25 }
  },
  'radiators-poor': {
    name: 'Radiators + Poor Insulation',
    description: 'Older radiators, steep curve',
    config: { slope: 1.4, maxFlowTemp: 75, minFlowTemp: 25 }
  },
  'historic': {
    name: 'Historic Building',
    description: 'Solid walls, high flow temperatures',
    config: { slope: 1.6, maxFlowTemp: 80, minFlowTemp: 25 }
  }
};

export const CONFIG_FIELDS: readonly (keyof HeatingCurveConfig)[] = [
  'slope',
  'baseTemperature',
  'dayRoomTarget',
  'nightRoomTarget',
  'minFlowTemp',
  'maxFlowTemp',
  'summerCutoff',
  'nightStartHour',
  'nightEndHour'
];

// Ground-truth / export key names, matching the tabular column naming
export const GROUND_TRUTH_KEYS: Record<keyof HeatingCurveConfig, string> = {
  slope: 'slope',
  baseTemperature: 't_base',
  dayRoomTarget: 't_room_day',
  nightRoomTarget: 't_room_night',
  minFlowTemp: 't_vorlauf_min',
  maxFlowTemp: 't_vorlauf_max',
  summerCutoff: 't_outdoor_summer_cutoff',
  nightStartHour: 'night_start_hour',
  nightEndHour: 'night_end_hour'
};

export const OBSERVATION_COLUMNS = ['datetime', 't_outdoor', 't_vorlauf', 'is_night'] as const;

export const DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export const DIAGNOSTIC_CODES: readonly DiagnosticCode[] = [
  'upper-limit-unresolved',
  'lower-limit-unresolved',
  'plateau-detection-failed',
  'mode-separation-failed',
  'mode-labels-inverted',
  'day-fit-unresolved',
  'night-fit-unresolved',
  'slope-disagreement',
  'negative-slope',
  'targets-unresolved',
  'base-temperature-assumed'
];
