export { generateOutdoorSeries, interpolateSeries } from './outdoorSeries.js';
export type { OutdoorSeriesOptions } from './outdoorSeries.js';
export { injectNoise, validateNoiseProfile } from './noiseInjector.js';
export { simulateIdealSeries, generateSimulation, hourOfDay } from './simulator.js';
export type { SimulationResult } from './simulator.js';
export { runBenchmark } from './benchmark.js';
export type { BenchmarkScenario, BenchmarkEntry } from './benchmark.js';
