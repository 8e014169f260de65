// Curve model and line estimators

export { flowTemperature, isNightHour, modeAt, roomTargetAt } from './curveModel.js';
export { fitLine, OlsEstimator, RansacEstimator, createEstimator } from './regressionModel.js';
export type { LineEstimator, RegressionFit, RansacOptions } from './regressionModel.js';
