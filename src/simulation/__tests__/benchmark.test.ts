import { describe, expect, it } from 'vitest';
import { createConfig } from '../../config/curveConfig.js';
import { DEFAULT_TOLERANCES, NOISE_PROFILES } from '../../constants/index.js';
import { runBenchmark } from '../benchmark.js';
import { generateOutdoorSeries } from '../outdoorSeries.js';

describe('runBenchmark', () => {
  it('simulates, extracts and validates each scenario', () => {
    const config = createConfig({ maxFlowTemp: 55 });
    const outdoor = generateOutdoorSeries({ start: '2023-11-01', days: 30, seed: 42 });
    const entries = runBenchmark(config, outdoor, [
      { profile: NOISE_PROFILES.clean, tolerances: DEFAULT_TOLERANCES.clean },
      { profile: NOISE_PROFILES.noisy, tolerances: DEFAULT_TOLERANCES.noisy }
    ], 42, { estimators: ['ransac'] });

    expect(entries.map(e => e.profile.name)).toEqual(['clean', 'noisy']);
    for (const entry of entries) {
      expect(entry.observed.observations).toHaveLength(30 * 96);
      expect(entry.observed.profileName).toBe(entry.profile.name);
      expect(entry.report.results).toHaveLength(1);
      expect(entry.report.validations).toHaveLength(1);
      expect(entry.report.validations[0].fields[0].truth).toBe(1.4);
    }
    expect(entries[0].report.validations[0].fields[0].tolerance).toBe(0.1);
    expect(entries[1].report.validations[0].fields[0].tolerance).toBe(0.3);
  });
});
