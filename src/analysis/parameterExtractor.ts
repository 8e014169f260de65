import { DEFAULT_SEED } from '../constants/index.js';
import { createEstimator } from '../models/regressionModel.js';
import type { RansacOptions } from '../models/regressionModel.js';
import type {
  ComponentOutcome,
  Diagnostic,
  DiagnosticCode,
  EstimatorName,
  ExtractedParameters,
  ExtractionReport,
  ExtractionStatus,
  GoodnessOfFit,
  HeatingCurveConfig,
  ModeSeparation,
  Observation,
  ObservationSeries,
  PlateauDetection,
  Tolerances
} from '../types/index.js';
import { DegenerateInputError } from '../utils/errors.js';
import { assignModesFromLabels, separateModes } from './modeSeparator.js';
import { detectLimits } from './plateauDetector.js';
import type { PlateauOptions } from './plateauDetector.js';
import { fitModes, recoverParameters } from './regressionEngine.js';
import type { ModeFitOutcome } from './regressionEngine.js';
import { validate } from './validator.js';

export interface ExtractionOptions {
  estimators?: EstimatorName[];
  baseTemperature?: number;
  summerCutoff?: number;
  modeSource?: 'detected' | 'labels';
  seed?: number;
  ransac?: Omit<RansacOptions, 'seed'>;
  plateau?: PlateauOptions;
  slopeDisagreementTolerance?: number;
  // Validation only; never read by the extraction itself
  groundTruth?: HeatingCurveConfig;
  tolerances?: Tolerances;
}

const PARTIAL_CODES: readonly DiagnosticCode[] = [
  'upper-limit-unresolved',
  'lower-limit-unresolved',
  'plateau-detection-failed',
  'mode-separation-failed',
  'day-fit-unresolved',
  'night-fit-unresolved',
  'targets-unresolved'
];

/**
 * Run the full extraction: plateau detection and mode separation on the
 * heating-on samples, then a per-mode fit and parameter recovery for every
 * requested estimator. Components that fail on degenerate input are reported
 * as unresolved and the rest carry on.
 */
export function extractParameters(series: ObservationSeries, options: ExtractionOptions = {}): ExtractionReport {
  const estimators = options.estimators ?? ['ols', 'ransac'];
  const seed = options.seed ?? DEFAULT_SEED;
  const modeSource = options.modeSource ?? 'detected';
  const cutoff = options.summerCutoff;

  const all = series.observations;
  // With a known cutoff, an absent flow above it is heating off, not a dropout
  const heatingOff = (o: Observation) => cutoff !== undefined && o.outdoorTemp >= cutoff;
  const heatingOffCount = all.filter(heatingOff).length;
  const missingCount = all.filter(o => o.flowTemp === null && !heatingOff(o)).length;

  const working: ObservationSeries = {
    observations: all.filter(o =>
      o.flowTemp !== null &&
      Number.isFinite(o.flowTemp) &&
      Number.isFinite(o.outdoorTemp) &&
      (cutoff === undefined || o.outdoorTemp < cutoff)
    )
  };

  const plateaus = attempt(() => detectLimits(working, options.plateau));
  const modes = attempt(() => modeSource === 'labels'
    ? assignModesFromLabels(working)
    : separateModes(working, { seed }));

  const mask = plateaus.status === 'resolved'
    ? plateaus.value.linearRegionMask
    : working.observations.map(() => true);
  const assignment = modes.status === 'resolved' ? modes.value.assignment : null;
  const componentDiagnostics = describeComponents(plateaus, modes);

  const results = estimators.map(name => {
    const estimator = createEstimator(name, { ...options.ransac, seed });
    const fits = fitModes(working, assignment, mask, estimator);
    const recovered = recoverParameters(fits, {
      baseTemperature: options.baseTemperature,
      slopeDisagreementTolerance: options.slopeDisagreementTolerance
    });

    const diagnostics = [...componentDiagnostics, ...recovered.diagnostics];
    const result: ExtractedParameters = {
      estimator: name,
      slope: recovered.slope,
      daySlope: recovered.daySlope,
      nightSlope: recovered.nightSlope,
      slopeDisagreement: recovered.slopeDisagreement,
      dayRoomTarget: recovered.dayRoomTarget,
      nightRoomTarget: recovered.nightRoomTarget,
      baseTemperature: recovered.baseTemperature,
      baseTemperatureAssumed: recovered.baseTemperatureAssumed,
      upperLimit: limitValue(plateaus, 'upper'),
      lowerLimit: limitValue(plateaus, 'lower'),
      goodnessOfFit: { day: goodness(fits.day), night: goodness(fits.night) },
      status: statusOf(recovered.slope, diagnostics),
      diagnostics
    };
    return result;
  });

  const groundTruth = options.groundTruth;
  const validations = groundTruth
    ? results.map(r => validate(r, groundTruth, options.tolerances ?? {}))
    : [];

  return {
    sampleCount: all.length,
    usableCount: working.observations.length,
    missingCount,
    heatingOffCount,
    linearRegionCount: mask.filter(Boolean).length,
    modeSource,
    plateaus,
    modes,
    results,
    validations
  };
}

function attempt<T>(run: () => T): ComponentOutcome<T> {
  try {
    return { status: 'resolved', value: run() };
  } catch (error) {
    if (error instanceof DegenerateInputError) {
      return { status: 'unresolved', reason: error.message };
    }
    throw error;
  }
}

function describeComponents(
  plateaus: ComponentOutcome<PlateauDetection>,
  modes: ComponentOutcome<ModeSeparation>
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  if (plateaus.status === 'unresolved') {
    diagnostics.push({ code: 'plateau-detection-failed', message: plateaus.reason });
  } else {
    const { upper, lower } = plateaus.value;
    if (!upper.detected) diagnostics.push({ code: 'upper-limit-unresolved', message: upper.reason });
    if (!lower.detected) diagnostics.push({ code: 'lower-limit-unresolved', message: lower.reason });
  }

  if (modes.status === 'unresolved') {
    diagnostics.push({ code: 'mode-separation-failed', message: modes.reason });
  } else if (modes.value.labelingInverted) {
    diagnostics.push({
      code: 'mode-labels-inverted',
      message: 'global slope is positive, the lower-residual cluster was labelled day'
    });
  }

  return diagnostics;
}

function limitValue(plateaus: ComponentOutcome<PlateauDetection>, side: 'upper' | 'lower'): number | null {
  if (plateaus.status !== 'resolved') return null;
  const limit = plateaus.value[side];
  return limit.detected ? limit.value : null;
}

function goodness(outcome: ModeFitOutcome): GoodnessOfFit | null {
  if (outcome.status !== 'fitted') return null;
  const { r2, rmse, mae, sampleCount, inlierRatio } = outcome.fit;
  return { r2, rmse, mae, sampleCount, inlierRatio };
}

function statusOf(slope: number | null, diagnostics: readonly Diagnostic[]): ExtractionStatus {
  if (slope === null) return 'unresolved';
  return diagnostics.some(d => PARTIAL_CODES.includes(d.code)) ? 'partial' : 'complete';
}
