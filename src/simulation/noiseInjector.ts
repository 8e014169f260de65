import { SENSOR_RANGE } from '../constants/index.js';
import type { NoiseProfile, ObservationSeries, ValueRange } from '../types/index.js';
import { InvalidConfigurationError } from '../utils/errors.js';
import { deriveRng, gaussian, randomInt, uniform } from '../utils/random.js';
import { mean } from '../utils/stats.js';

// One stream per component so each draws the same numbers whatever the others do
const STREAM_SALTS = {
  gaussian: 0x9E3779B9,
  spikes: 0x85EBCA6B,
  outliers: 0xC2B2AE35,
  stuck: 0x27D4EB2F,
  missing: 0x165667B1
} as const;

export function validateNoiseProfile(profile: NoiseProfile): void {
  const issues: string[] = [];

  const probabilities = {
    spikeProbability: profile.spikeProbability,
    missingBlockProbability: profile.missingBlockProbability,
    outlierProbability: profile.outlierProbability,
    stuckProbability: profile.stuckProbability
  };
  for (const [field, value] of Object.entries(probabilities)) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      issues.push(`${field} must be within [0, 1] (got ${value})`);
    }
  }

  if (!Number.isFinite(profile.gaussianSigma) || profile.gaussianSigma < 0) {
    issues.push(`gaussianSigma must be >= 0 (got ${profile.gaussianSigma})`);
  }

  checkRange('spikeMagnitude', profile.spikeMagnitude, issues);
  checkRange('outlierMagnitude', profile.outlierMagnitude, issues);
  checkRange('missingBlockLength', profile.missingBlockLength, issues);
  if (!Number.isInteger(profile.missingBlockLength.min) || profile.missingBlockLength.min < 1 ||
      !Number.isInteger(profile.missingBlockLength.max)) {
    issues.push('missingBlockLength must be whole samples, at least 1');
  }

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  if (profile.missingBlockProbability + profile.outlierProbability > 0.5) {
    console.warn(`⚠️  Noise profile "${profile.name}" leaves less than half of the series intact`);
  }
}

/**
 * Corrupt an ideal series with the profile's noise components.
 *
 * Fixed order: gaussian, spikes, outliers, stuck sensor, sensor clip, missing blocks.
 * Samples without an ideal value (heating off) stay absent.
 */
export function injectNoise(series: ObservationSeries, profile: NoiseProfile, seed: number): ObservationSeries {
  validateNoiseProfile(profile);

  const values = series.observations.map(o => o.flowTemp);
  const n = values.length;
  const idealValues = values.filter((v): v is number => v !== null);
  const idealMean = mean(idealValues);

  const gaussianRng = deriveRng(seed, STREAM_SALTS.gaussian);
  for (let i = 0; i < n; i++) {
    const z = gaussian(gaussianRng);
    const v = values[i];
    if (v !== null) values[i] = v + profile.gaussianSigma * z;
  }

  // Domestic hot water draws: positive offsets only
  const spikeRng = deriveRng(seed, STREAM_SALTS.spikes);
  for (let i = 0; i < n; i++) {
    const hit = spikeRng() < profile.spikeProbability;
    const magnitude = uniform(spikeRng, profile.spikeMagnitude.min, profile.spikeMagnitude.max);
    const v = values[i];
    if (hit && v !== null) values[i] = v + magnitude;
  }

  const outlierRng = deriveRng(seed, STREAM_SALTS.outliers);
  for (let i = 0; i < n; i++) {
    const hit = outlierRng() < profile.outlierProbability;
    const sign = outlierRng() < 0.5 ? -1 : 1;
    const magnitude = uniform(outlierRng, profile.outlierMagnitude.min, profile.outlierMagnitude.max);
    if (hit && values[i] !== null && idealValues.length > 0) {
      values[i] = idealMean + sign * magnitude;
    }
  }

  const stuckRng = deriveRng(seed, STREAM_SALTS.stuck);
  for (let i = 0; i < n; i++) {
    const hit = stuckRng() < profile.stuckProbability;
    const previous = i > 0 ? values[i - 1] : null;
    if (hit && values[i] !== null && previous !== null) values[i] = previous;
  }

  for (let i = 0; i < n; i++) {
    const v = values[i];
    if (v !== null) values[i] = Math.min(SENSOR_RANGE.max, Math.max(SENSOR_RANGE.min, v));
  }

  // Dropouts come as contiguous runs; start chance is scaled so the expected
  // missing share is close to missingBlockProbability
  const missingRng = deriveRng(seed, STREAM_SALTS.missing);
  const { min: minLength, max: maxLength } = profile.missingBlockLength;
  const startProbability = profile.missingBlockProbability / ((minLength + maxLength) / 2);
  let i = 0;
  while (i < n) {
    const hit = missingRng() < startProbability;
    const length = randomInt(missingRng, minLength, maxLength);
    if (hit) {
      for (let k = i; k < Math.min(n, i + length); k++) values[k] = null;
      i += length;
    } else {
      i++;
    }
  }

  return {
    observations: series.observations.map((o, idx) => ({ ...o, flowTemp: values[idx] })),
    config: series.config,
    profileName: profile.name
  };
}

function checkRange(field: string, range: ValueRange, issues: string[]): void {
  if (!Number.isFinite(range.min) || !Number.isFinite(range.max) || range.min > range.max) {
    issues.push(`${field} must satisfy min <= max (got ${range.min}..${range.max})`);
  }
}
