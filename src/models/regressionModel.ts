import { Matrix, solve } from 'ml-matrix';
import { DEFAULT_SEED } from '../constants/index.js';
import type { EstimatorName, LinearFit } from '../types/index.js';
import { DegenerateInputError } from '../utils/errors.js';
import { createRng } from '../utils/random.js';
import { calculateMetrics, medianAbsoluteDeviation, variance } from '../utils/stats.js';

// Below this the outdoor temperature carries no slope information
const MIN_X_VARIANCE = 1e-12;

export interface RegressionFit extends LinearFit {
  estimator: EstimatorName;
  inlierRatio: number | null;
  inlierCount: number;
}

// Both estimators fit flow = intercept + slope * outdoor
export interface LineEstimator {
  readonly name: EstimatorName;
  fit(x: readonly number[], y: readonly number[]): RegressionFit;
}

export interface RansacOptions {
  seed?: number;
  maxTrials?: number;
  residualThreshold?: number;  // default: median absolute deviation of y
  minSamples?: number;
  refinementIterations?: number;
}

/**
 * Ordinary least squares line through the design matrix [x, 1].
 */
export function fitLine(x: readonly number[], y: readonly number[]): LinearFit {
  if (x.length !== y.length) {
    throw new Error(`x and y differ in length (${x.length} vs ${y.length})`);
  }
  if (x.length < 2) {
    throw new DegenerateInputError('regression', `needs at least 2 samples (got ${x.length})`);
  }
  if (variance(x) < MIN_X_VARIANCE) {
    throw new DegenerateInputError('regression', 'outdoor temperature has zero variance');
  }

  const design = new Matrix(x.map(v => [v, 1]));
  const target = Matrix.columnVector(y);
  const coefficients = solve(design, target);

  const slope = coefficients.get(0, 0);
  const intercept = coefficients.get(1, 0);
  const predictions = x.map(v => intercept + slope * v);

  return {
    slope,
    intercept,
    ...calculateMetrics(y, predictions),
    sampleCount: x.length
  };
}

export class OlsEstimator implements LineEstimator {
  readonly name = 'ols' as const;

  fit(x: readonly number[], y: readonly number[]): RegressionFit {
    return {
      ...fitLine(x, y),
      estimator: this.name,
      inlierRatio: null,
      inlierCount: x.length
    };
  }
}

interface Consensus {
  mask: boolean[];
  count: number;
  sse: number;
}

/**
 * Sampling-consensus line fit.
 *
 * Draws two-point candidate lines, keeps the one with the most points within
 * the residual threshold (ties go to the lower inlier SSE), then refits by OLS
 * on its inliers until the inlier set stops changing.
 */
export class RansacEstimator implements LineEstimator {
  readonly name = 'ransac' as const;
  private seed: number;
  private maxTrials: number;
  private residualThreshold: number | undefined;
  private minSamples: number;
  private refinementIterations: number;

  constructor(options: RansacOptions = {}) {
    this.seed = options.seed ?? DEFAULT_SEED;
    this.maxTrials = options.maxTrials ?? 100;
    this.residualThreshold = options.residualThreshold;
    this.minSamples = options.minSamples ?? 10;
    this.refinementIterations = options.refinementIterations ?? 10;
  }

  fit(x: readonly number[], y: readonly number[]): RegressionFit {
    const n = x.length;
    if (n !== y.length) {
      throw new Error(`x and y differ in length (${n} vs ${y.length})`);
    }
    if (n < Math.max(2, this.minSamples)) {
      throw new DegenerateInputError('ransac', `needs at least ${this.minSamples} samples (got ${n})`);
    }
    if (variance(x) < MIN_X_VARIANCE) {
      throw new DegenerateInputError('ransac', 'outdoor temperature has zero variance');
    }

    const threshold = this.residualThreshold ?? medianAbsoluteDeviation(y);
    const rng = createRng(this.seed);
    let best: Consensus | null = null;

    for (let trial = 0; trial < this.maxTrials; trial++) {
      const i = Math.floor(rng() * n);
      let j = Math.floor(rng() * (n - 1));
      if (j >= i) j++;
      if (x[i] === x[j]) continue;

      const slope = (y[j] - y[i]) / (x[j] - x[i]);
      const intercept = y[i] - slope * x[i];
      const candidate = scoreLine(x, y, slope, intercept, threshold);

      if (!best || candidate.count > best.count || (candidate.count === best.count && candidate.sse < best.sse)) {
        best = candidate;
      }
      if (best.count === n) break;
    }

    if (!best || best.count < 2) {
      throw new DegenerateInputError('ransac', 'no consensus set found');
    }

    let mask = best.mask;
    let fit = fitLine(select(x, mask), select(y, mask));

    for (let pass = 0; pass < this.refinementIterations; pass++) {
      const next = scoreLine(x, y, fit.slope, fit.intercept, threshold);
      if (sameMask(next.mask, mask)) break;

      const nextX = select(x, next.mask);
      if (nextX.length < 2 || variance(nextX) < MIN_X_VARIANCE) break;

      mask = next.mask;
      fit = fitLine(nextX, select(y, mask));
    }

    const inlierCount = mask.filter(Boolean).length;
    return {
      ...fit,
      estimator: this.name,
      inlierRatio: inlierCount / n,
      inlierCount
    };
  }
}

export function createEstimator(name: EstimatorName, options: RansacOptions = {}): LineEstimator {
  switch (name) {
    case 'ols':
      return new OlsEstimator();
    case 'ransac':
      return new RansacEstimator(options);
  }
}

function scoreLine(
  x: readonly number[],
  y: readonly number[],
  slope: number,
  intercept: number,
  threshold: number
): Consensus {
  const mask: boolean[] = new Array(x.length);
  let count = 0;
  let sse = 0;

  for (let k = 0; k < x.length; k++) {
    const residual = y[k] - (intercept + slope * x[k]);
    const inlier = Math.abs(residual) <= threshold;
    mask[k] = inlier;
    if (inlier) {
      count++;
      sse += residual * residual;
    }
  }

  return { mask, count, sse };
}

function select(values: readonly number[], mask: readonly boolean[]): number[] {
  return values.filter((_, i) => mask[i]);
}

function sameMask(a: readonly boolean[], b: readonly boolean[]): boolean {
  return a.every((v, i) => v === b[i]);
}
