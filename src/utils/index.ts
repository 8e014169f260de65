export { InvalidConfigurationError, DegenerateInputError, errorMessage } from './errors.js';
export { createRng, deriveRng, uniform, randomInt, gaussian } from './random.js';
export type { RandomSource } from './random.js';
export {
  mean,
  variance,
  std,
  median,
  medianAbsoluteDeviation,
  countDistinct,
  calculateMetrics
} from './stats.js';
export type { FitMetrics } from './stats.js';
