export type EstimatorName = 'ols' | 'ransac';

// Heating curve parameters (immutable once built by createConfig)
export interface HeatingCurveConfig {
  readonly slope: number;
  readonly baseTemperature: number;
  readonly dayRoomTarget: number;
  readonly nightRoomTarget: number;
  readonly minFlowTemp: number;
  readonly maxFlowTemp: number;
  readonly summerCutoff: number;
  readonly nightStartHour: number;
  readonly nightEndHour: number;
}

export type HeatingCurveConfigInput = Partial<HeatingCurveConfig>;

// One 15-minute sample
export interface Observation {
  timestamp: Date;
  outdoorTemp: number;
  flowTemp: number | null;  // null = missing, or heating off
  hour: number;
  isNight?: boolean;
}

export interface ObservationSeries {
  readonly observations: readonly Observation[];
  readonly config?: HeatingCurveConfig;  // ground truth, synthetic data only
  readonly profileName?: string;
}

// Outdoor temperature sample before the curve is applied
export interface OutdoorPoint {
  timestamp: Date;
  outdoorTemp: number;
}

export interface ValueRange {
  min: number;
  max: number;
}

export interface NoiseProfile {
  name: string;
  description: string;
  gaussianSigma: number;
  spikeProbability: number;
  spikeMagnitude: ValueRange;
  missingBlockProbability: number;
  missingBlockLength: ValueRange;
  outlierProbability: number;
  outlierMagnitude: ValueRange;
  stuckProbability: number;
}

export type CanonicalProfileName = 'clean' | 'moderate' | 'noisy';

export type OperatingMode = 'day' | 'night';

export interface ModeAssignment {
  labels: (OperatingMode | null)[];
}

export interface LinearFit {
  slope: number;
  intercept: number;
  r2: number;
  rmse: number;
  mae: number;
  sampleCount: number;
}

export interface ModeSeparation {
  assignment: ModeAssignment;
  globalFit: LinearFit;
  clusterMeans: Record<OperatingMode, number>;
  counts: Record<OperatingMode, number>;
  separation: number;
  accuracy: number | null;
  labelingInverted: boolean;
}

export type PlateauLimit =
  | { detected: true; value: number; windowCount: number }
  | { detected: false; reason: string };

export interface PlateauDetection {
  upper: PlateauLimit;
  lower: PlateauLimit;
  linearRegionMask: boolean[];
  overallStd: number;
  tailSize: number;
}

// A component that either produced a value or failed locally
export type ComponentOutcome<T> =
  | { status: 'resolved'; value: T }
  | { status: 'unresolved'; reason: string };

export type DiagnosticCode =
  | 'upper-limit-unresolved'
  | 'lower-limit-unresolved'
  | 'plateau-detection-failed'
  | 'mode-separation-failed'
  | 'mode-labels-inverted'
  | 'day-fit-unresolved'
  | 'night-fit-unresolved'
  | 'slope-disagreement'
  | 'negative-slope'
  | 'targets-unresolved'
  | 'base-temperature-assumed';

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
}

export interface GoodnessOfFit {
  r2: number;
  rmse: number;
  mae: number;
  sampleCount: number;
  inlierRatio: number | null;
}

export type ExtractionStatus = 'complete' | 'partial' | 'unresolved';

export interface ExtractedParameters {
  readonly estimator: EstimatorName;
  readonly slope: number | null;
  readonly daySlope: number | null;
  readonly nightSlope: number | null;
  readonly slopeDisagreement: number | null;
  readonly dayRoomTarget: number | null;
  readonly nightRoomTarget: number | null;
  readonly baseTemperature: number | null;
  readonly baseTemperatureAssumed: boolean;
  readonly upperLimit: number | null;
  readonly lowerLimit: number | null;
  readonly goodnessOfFit: Record<OperatingMode, GoodnessOfFit | null>;
  readonly status: ExtractionStatus;
  readonly diagnostics: readonly Diagnostic[];
}

export type ValidatedField = 'slope' | 'dayRoomTarget' | 'nightRoomTarget' | 'upperLimit' | 'lowerLimit';

export type Tolerances = Partial<Record<ValidatedField, number>>;

export type FieldStatus = 'pass' | 'fail' | 'unchecked' | 'unresolved';

export interface FieldValidation {
  field: ValidatedField;
  estimate: number | null;
  truth: number;
  error: number | null;
  tolerance: number | null;
  status: FieldStatus;
}

export interface ValidationReport {
  estimator: EstimatorName;
  fields: FieldValidation[];
  passed: boolean;
}

export interface ExtractionReport {
  sampleCount: number;
  usableCount: number;
  missingCount: number;
  heatingOffCount: number;
  linearRegionCount: number;
  modeSource: 'detected' | 'labels';
  plateaus: ComponentOutcome<PlateauDetection>;
  modes: ComponentOutcome<ModeSeparation>;
  results: ExtractedParameters[];
  validations: ValidationReport[];
}
