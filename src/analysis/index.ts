export { separateModes, assignModesFromLabels, labelAccuracy } from './modeSeparator.js';
export type { ModeSeparationOptions } from './modeSeparator.js';
export { detectLimits } from './plateauDetector.js';
export type { PlateauOptions } from './plateauDetector.js';
export { fitModes, recoverParameters } from './regressionEngine.js';
export type { ModeFitOutcome, ModeFits, RecoveryOptions, RecoveredParameters } from './regressionEngine.js';
export { validate } from './validator.js';
export { extractParameters } from './parameterExtractor.js';
export type { ExtractionOptions } from './parameterExtractor.js';
