import { extractParameters } from '../analysis/parameterExtractor.js';
import type { ExtractionOptions } from '../analysis/parameterExtractor.js';
import type {
  ExtractionReport,
  HeatingCurveConfig,
  NoiseProfile,
  ObservationSeries,
  OutdoorPoint,
  Tolerances
} from '../types/index.js';
import { generateSimulation } from './simulator.js';

export interface BenchmarkScenario {
  profile: NoiseProfile;
  tolerances: Tolerances;
}

export interface BenchmarkEntry {
  profile: NoiseProfile;
  observed: ObservationSeries;
  report: ExtractionReport;
}

/**
 * Simulate the same building under each noise profile, extract, and validate
 * against the known configuration.
 */
export function runBenchmark(
  config: HeatingCurveConfig,
  outdoor: readonly OutdoorPoint[],
  scenarios: readonly BenchmarkScenario[],
  seed: number,
  options: Omit<ExtractionOptions, 'groundTruth' | 'tolerances' | 'seed'> = {}
): BenchmarkEntry[] {
  return scenarios.map(({ profile, tolerances }) => {
    const { observed } = generateSimulation(outdoor, config, profile, seed);
    const report = extractParameters(observed, {
      ...options,
      seed,
      groundTruth: config,
      tolerances
    });
    return { profile, observed, report };
  });
}
