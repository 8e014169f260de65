import type { LineEstimator, RegressionFit } from '../models/regressionModel.js';
import type { Diagnostic, ModeAssignment, ObservationSeries, OperatingMode } from '../types/index.js';
import { DegenerateInputError } from '../utils/errors.js';

// Smaller slopes cannot be inverted back to room targets
const MIN_SLOPE = 1e-9;

export type ModeFitOutcome =
  | { status: 'fitted'; fit: RegressionFit }
  | { status: 'unresolved'; reason: string };

export type ModeFits = Record<OperatingMode, ModeFitOutcome>;

export interface RecoveryOptions {
  baseTemperature?: number;
  slopeDisagreementTolerance?: number;
}

export interface RecoveredParameters {
  slope: number | null;
  daySlope: number | null;
  nightSlope: number | null;
  slopeDisagreement: number | null;
  dayRoomTarget: number | null;
  nightRoomTarget: number | null;
  baseTemperature: number | null;
  baseTemperatureAssumed: boolean;
  diagnostics: Diagnostic[];
}

/**
 * Fit one line per mode over the linear-region samples.
 * Without a mode assignment every sample is fitted as day and night stays unresolved.
 */
export function fitModes(
  series: ObservationSeries,
  assignment: ModeAssignment | null,
  linearRegionMask: readonly boolean[],
  estimator: LineEstimator
): ModeFits {
  const groups: Record<OperatingMode, { x: number[]; y: number[] }> = {
    day: { x: [], y: [] },
    night: { x: [], y: [] }
  };

  series.observations.forEach((o, i) => {
    if (!linearRegionMask[i] || o.flowTemp === null) return;
    const mode = assignment ? assignment.labels[i] : 'day';
    if (!mode) return;
    groups[mode].x.push(o.outdoorTemp);
    groups[mode].y.push(o.flowTemp);
  });

  return {
    day: fitGroup('day', groups.day.x, groups.day.y, estimator),
    night: assignment
      ? fitGroup('night', groups.night.x, groups.night.y, estimator)
      : { status: 'unresolved', reason: 'no mode assignment, all samples fitted as day' }
  };
}

function fitGroup(mode: OperatingMode, x: number[], y: number[], estimator: LineEstimator): ModeFitOutcome {
  try {
    return { status: 'fitted', fit: estimator.fit(x, y) };
  } catch (error) {
    if (error instanceof DegenerateInputError) {
      return { status: 'unresolved', reason: `${mode} ${error.message}` };
    }
    throw error;
  }
}

/**
 * Turn per-mode lines (flow = I + s * outdoor) into curve parameters.
 *
 * K = -s per mode, combined as a sample-weighted mean. Room targets follow from
 * I = base + K * target. Without a supplied base temperature the base is taken
 * equal to the day target, so day = I_day / (1 + K_day); the result says so.
 */
export function recoverParameters(fits: ModeFits, options: RecoveryOptions = {}): RecoveredParameters {
  const diagnostics: Diagnostic[] = [];
  const tolerance = options.slopeDisagreementTolerance ?? 0.2;

  const dayFit = fits.day.status === 'fitted' ? fits.day.fit : null;
  const nightFit = fits.night.status === 'fitted' ? fits.night.fit : null;

  if (fits.day.status === 'unresolved') {
    diagnostics.push({ code: 'day-fit-unresolved', message: fits.day.reason });
  }
  if (fits.night.status === 'unresolved') {
    diagnostics.push({ code: 'night-fit-unresolved', message: fits.night.reason });
  }

  const daySlope = dayFit ? -dayFit.slope : null;
  const nightSlope = nightFit ? -nightFit.slope : null;

  let slope: number | null = null;
  let slopeDisagreement: number | null = null;
  if (dayFit && nightFit && daySlope !== null && nightSlope !== null) {
    const total = dayFit.sampleCount + nightFit.sampleCount;
    slope = (daySlope * dayFit.sampleCount + nightSlope * nightFit.sampleCount) / total;
    slopeDisagreement = Math.abs(daySlope - nightSlope);
    if (slopeDisagreement > tolerance) {
      diagnostics.push({
        code: 'slope-disagreement',
        message: `day slope ${daySlope.toFixed(3)} and night slope ${nightSlope.toFixed(3)} differ by more than ${tolerance}`
      });
    }
  } else {
    slope = daySlope ?? nightSlope;
  }

  if (slope !== null && slope < 0) {
    diagnostics.push({ code: 'negative-slope', message: `flow rises with outdoor temperature (K = ${slope.toFixed(3)})` });
  }

  const suppliedBase = options.baseTemperature;
  let dayRoomTarget: number | null = null;
  if (dayFit && daySlope !== null && Math.abs(daySlope) >= MIN_SLOPE) {
    if (suppliedBase !== undefined) {
      dayRoomTarget = (dayFit.intercept - suppliedBase) / daySlope;
    } else if (Math.abs(1 + daySlope) >= MIN_SLOPE) {
      dayRoomTarget = dayFit.intercept / (1 + daySlope);
    }
  }

  const baseTemperature = suppliedBase ?? dayRoomTarget;
  const baseTemperatureAssumed = suppliedBase === undefined && baseTemperature !== null;
  if (baseTemperatureAssumed) {
    diagnostics.push({
      code: 'base-temperature-assumed',
      message: 'base temperature not identifiable from a single line, assumed equal to the day room target'
    });
  }

  let nightRoomTarget: number | null = null;
  if (nightFit && nightSlope !== null && Math.abs(nightSlope) >= MIN_SLOPE && baseTemperature !== null) {
    nightRoomTarget = (nightFit.intercept - baseTemperature) / nightSlope;
  }

  if ((dayFit && dayRoomTarget === null) || (nightFit && nightRoomTarget === null)) {
    diagnostics.push({ code: 'targets-unresolved', message: 'room targets could not be recovered from the fitted lines' });
  }

  return {
    slope,
    daySlope,
    nightSlope,
    slopeDisagreement,
    dayRoomTarget,
    nightRoomTarget,
    baseTemperature,
    baseTemperatureAssumed,
    diagnostics
  };
}
