import { describe, expect, it } from 'vitest';
import { createConfig } from '../../config/curveConfig.js';
import { DEFAULT_TOLERANCES, NOISE_PROFILES } from '../../constants/index.js';
import { generateOutdoorSeries } from '../../simulation/outdoorSeries.js';
import { generateSimulation } from '../../simulation/simulator.js';
import type { ExtractedParameters, NoiseProfile, ObservationSeries } from '../../types/index.js';
import { extractParameters } from '../parameterExtractor.js';
import {
  CLAMPED_TEMPS,
  clampedConfig,
  doubleClampConfig,
  gridSeries,
  range,
  seriesFromFlows,
  UNCLAMPED_TEMPS,
  unclampedConfig
} from './helpers.js';

const outdoor = generateOutdoorSeries({
  start: '2023-11-01', days: 180, seed: 42, meanTemp: 3.5, dailyVariation: 5.5, diurnalAmplitude: 0, jitter: 2.5
});

function simulate(profile: NoiseProfile): ObservationSeries {
  return generateSimulation(outdoor, clampedConfig, profile, 42).observed;
}

function resultFor(results: readonly ExtractedParameters[], estimator: 'ols' | 'ransac'): ExtractedParameters {
  const result = results.find(r => r.estimator === estimator);
  if (!result) throw new Error(`no ${estimator} result`);
  return result;
}

function slopeError(result: ExtractedParameters): number {
  if (result.slope === null) throw new Error(`${result.estimator} slope unresolved`);
  return Math.abs(result.slope - 1.4);
}

describe('extractParameters', () => {
  it('recovers the curve from a lightly noisy season', () => {
    const report = extractParameters(simulate(NOISE_PROFILES.clean), {
      seed: 42,
      groundTruth: clampedConfig,
      tolerances: DEFAULT_TOLERANCES.clean
    });

    expect(report.sampleCount).toBe(180 * 96);
    expect(report.missingCount).toBe(0);
    expect(report.modes.status === 'resolved' && report.modes.value.accuracy).toBeGreaterThan(0.9);
    expect(report.results.map(r => r.estimator)).toEqual(['ols', 'ransac']);

    for (const result of report.results) {
      expect(slopeError(result)).toBeLessThan(0.1);
      expect(Math.abs((result.dayRoomTarget ?? Infinity) - 20)).toBeLessThan(1);
      expect(Math.abs((result.nightRoomTarget ?? Infinity) - 16)).toBeLessThan(1);
      expect(result.baseTemperatureAssumed).toBe(true);
    }

    expect(report.validations).toHaveLength(2);
    for (const validation of report.validations) {
      expect(validation.fields.slice(0, 3).map(f => f.status)).toEqual(['pass', 'pass', 'pass']);
    }
  });

  it('holds up better with the robust estimator when readings are corrupted', () => {
    const degraded: NoiseProfile = {
      ...NOISE_PROFILES.noisy,
      name: 'degraded',
      spikeProbability: 0,
      stuckProbability: 0
    };
    const report = extractParameters(simulate(degraded), { seed: 42 });

    const ols = resultFor(report.results, 'ols');
    const ransac = resultFor(report.results, 'ransac');
    expect(report.missingCount).toBeGreaterThan(0);
    expect(report.usableCount).toBe(report.sampleCount - report.missingCount);
    expect(slopeError(ransac)).toBeLessThan(0.3);
    expect(slopeError(ransac)).toBeLessThan(slopeError(ols));
    expect(ransac.goodnessOfFit.day?.inlierRatio).toBeGreaterThan(0.5);
    expect(ols.goodnessOfFit.day?.inlierRatio).toBeNull();
  });

  it('takes modes from labels when asked', () => {
    const report = extractParameters(gridSeries(unclampedConfig, UNCLAMPED_TEMPS), { modeSource: 'labels', estimators: ['ols'] });
    expect(report.modeSource).toBe('labels');
    expect(report.modes.status === 'resolved' && report.modes.value.accuracy).toBe(1);
    expect(report.results).toHaveLength(1);
    expect(report.results[0].slope).toBeCloseTo(1.4, 9);
    expect(report.results[0].dayRoomTarget).toBeCloseTo(20, 9);
    expect(report.results[0].nightRoomTarget).toBeCloseTo(16, 9);
    // the grid never reaches its flow limits
    expect(report.results[0].status).toBe('partial');
  });

  it('leaves both limits unresolved when noise never meets a clamp', () => {
    const wide = createConfig({ minFlowTemp: 10, maxFlowTemp: 90 });
    const report = extractParameters(generateSimulation(outdoor, wide, NOISE_PROFILES.clean, 42).observed, { seed: 42 });

    expect(report.plateaus.status).toBe('resolved');
    expect(report.linearRegionCount).toBe(report.usableCount);
    for (const result of report.results) {
      expect(result.status).toBe('partial');
      expect(result.upperLimit).toBeNull();
      expect(result.lowerLimit).toBeNull();
      expect(result.diagnostics.map(d => d.code).slice(0, 2)).toEqual(['upper-limit-unresolved', 'lower-limit-unresolved']);
      expect(slopeError(result)).toBeLessThan(0.1);
    }
  });

  it('reports the clamps of a curve that reaches them', () => {
    const report = extractParameters(gridSeries(doubleClampConfig, CLAMPED_TEMPS), { modeSource: 'labels', estimators: ['ols'] });
    const [result] = report.results;

    expect(report.linearRegionCount).toBe(672);
    expect(result.upperLimit).toBe(52);
    expect(result.lowerLimit).toBe(32);
    expect(result.slope).toBeCloseTo(1.4, 9);
    expect(result.status).toBe('complete');
  });

  it('reports a day-only series as partial', () => {
    const series = gridSeries(unclampedConfig, UNCLAMPED_TEMPS, range(8, 20, 1));
    const report = extractParameters(series, { estimators: ['ols'] });
    const [result] = report.results;

    expect(report.modes.status).toBe('unresolved');
    expect(result.status).toBe('partial');
    expect(result.slope).toBeCloseTo(1.4, 9);
    expect(result.dayRoomTarget).toBeCloseTo(20, 9);
    expect(result.nightRoomTarget).toBeNull();
    expect(result.upperLimit).toBeNull();
    expect(result.lowerLimit).toBeNull();
    expect(result.diagnostics.map(d => d.code)).toEqual([
      'upper-limit-unresolved',
      'lower-limit-unresolved',
      'mode-separation-failed',
      'night-fit-unresolved',
      'base-temperature-assumed'
    ]);
  });

  it('reports every component unresolved for a series without readings', () => {
    const report = extractParameters(seriesFromFlows(new Array<number | null>(50).fill(null)));

    expect(report.usableCount).toBe(0);
    expect(report.missingCount).toBe(50);
    expect(report.plateaus.status).toBe('unresolved');
    expect(report.modes.status).toBe('unresolved');
    for (const result of report.results) {
      expect(result.status).toBe('unresolved');
      expect(result.slope).toBeNull();
      expect(result.diagnostics.map(d => d.code)).toEqual([
        'plateau-detection-failed', 'mode-separation-failed', 'day-fit-unresolved', 'night-fit-unresolved'
      ]);
    }
  });

  it('drops samples at or above the summer cutoff', () => {
    const base = gridSeries(unclampedConfig, UNCLAMPED_TEMPS);
    const summer = range(0, 23, 1).map(hour => ({
      timestamp: new Date(Date.UTC(2024, 6, 1, hour)),
      outdoorTemp: 18,
      flowTemp: 30,
      hour
    }));
    const series: ObservationSeries = { observations: [...base.observations, ...summer] };

    const filtered = extractParameters(series, { summerCutoff: 15, estimators: ['ols'] });
    expect(filtered.heatingOffCount).toBe(24);
    expect(filtered.usableCount).toBe(792);

    const unfiltered = extractParameters(series, { estimators: ['ols'] });
    expect(unfiltered.heatingOffCount).toBe(0);
    expect(unfiltered.usableCount).toBe(816);
  });

  it('counts absent flows above the cutoff as heating off', () => {
    const series = gridSeries(unclampedConfig, [...UNCLAMPED_TEMPS, 15, 16]);

    const withCutoff = extractParameters(series, { summerCutoff: 15, estimators: ['ols'] });
    expect(withCutoff.heatingOffCount).toBe(48);
    expect(withCutoff.missingCount).toBe(0);
    expect(withCutoff.usableCount).toBe(792);

    const withoutCutoff = extractParameters(series, { estimators: ['ols'] });
    expect(withoutCutoff.heatingOffCount).toBe(0);
    expect(withoutCutoff.missingCount).toBe(48);
    expect(withoutCutoff.usableCount).toBe(792);
  });

  it('is reproducible for a seed', () => {
    const observed = generateSimulation(outdoor.slice(0, 30 * 96), clampedConfig, NOISE_PROFILES.noisy, 3).observed;
    expect(extractParameters(observed, { seed: 3 })).toEqual(extractParameters(observed, { seed: 3 }));
  });

  it('never reads the ground truth during extraction', () => {
    const observed = generateSimulation(outdoor.slice(0, 30 * 96), clampedConfig, NOISE_PROFILES.moderate, 5).observed;
    const withTruth = extractParameters(observed, { seed: 5, groundTruth: clampedConfig });
    const withoutTruth = extractParameters({ observations: observed.observations }, { seed: 5 });
    expect(withTruth.results).toEqual(withoutTruth.results);
  });
});
