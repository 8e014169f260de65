export { parseObservationCsv, readObservationCsv, parseDateTime, readRows } from './observationParser.js';
export type { ParsedObservationData, ObservationParseOptions } from './observationParser.js';
export { parseWeatherCsv, readWeatherCsv } from './weatherParser.js';
export type { ParsedWeatherData } from './weatherParser.js';
export { parseGroundTruth, readGroundTruth, configFromRecord, isRecord } from './groundTruthParser.js';
