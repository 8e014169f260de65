import type {
  ExtractedParameters,
  FieldStatus,
  FieldValidation,
  HeatingCurveConfig,
  Tolerances,
  ValidatedField,
  ValidationReport
} from '../types/index.js';

const LIMIT_FIELDS: readonly ValidatedField[] = ['upperLimit', 'lowerLimit'];

/**
 * Compare extracted parameters with known ground truth.
 * Unresolved plateau limits are reported but do not fail the run; unresolved
 * slope or room targets do.
 */
export function validate(
  extracted: ExtractedParameters,
  groundTruth: HeatingCurveConfig,
  tolerances: Tolerances
): ValidationReport {
  const truths: Record<ValidatedField, number> = {
    slope: groundTruth.slope,
    dayRoomTarget: groundTruth.dayRoomTarget,
    nightRoomTarget: groundTruth.nightRoomTarget,
    upperLimit: groundTruth.maxFlowTemp,
    lowerLimit: groundTruth.minFlowTemp
  };

  const order: ValidatedField[] = ['slope', 'dayRoomTarget', 'nightRoomTarget', 'upperLimit', 'lowerLimit'];
  const fields: FieldValidation[] = order.map(field => {
    const estimate = extracted[field];
    const truth = truths[field];
    const tolerance = tolerances[field] ?? null;
    const error = estimate === null ? null : Math.abs(estimate - truth);

    let status: FieldStatus;
    if (error === null) status = 'unresolved';
    else if (tolerance === null) status = 'unchecked';
    else status = error <= tolerance ? 'pass' : 'fail';

    return { field, estimate, truth, error, tolerance, status };
  });

  const passed = fields.every(f =>
    f.status === 'pass' ||
    f.status === 'unchecked' ||
    (f.status === 'unresolved' && LIMIT_FIELDS.includes(f.field))
  );

  return { estimator: extracted.estimator, fields, passed };
}
