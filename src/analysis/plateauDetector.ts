import type { ObservationSeries, PlateauDetection, PlateauLimit } from '../types/index.js';
import { DegenerateInputError } from '../utils/errors.js';
import { median, std } from '../utils/stats.js';

export interface PlateauOptions {
  tailFraction?: number;
  minTailSize?: number;
  minSamples?: number;
  stdRatio?: number;  // plateau when window std < overall std / stdRatio
  pileUpRatio?: number;
}

/**
 * Locate the clamped flow limits from the tails of the flow distribution.
 *
 * Each tail (top and bottom share of all sorted readings) is scanned with a
 * sliding window; windows much flatter than the series as a whole mark a
 * candidate. Sorted extremes are always locally flat, so a candidate only
 * counts as a clamp when readings pile up against it: the band within one
 * threshold of the limit must hold `pileUpRatio` times the readings of the
 * next band inward.
 */
export function detectLimits(series: ObservationSeries, options: PlateauOptions = {}): PlateauDetection {
  const tailFraction = options.tailFraction ?? 0.01;
  const minTailSize = options.minTailSize ?? 5;
  const minSamples = options.minSamples ?? 20;
  const stdRatio = options.stdRatio ?? 3;
  const pileUpRatio = options.pileUpRatio ?? 2;

  const flows = series.observations
    .map(o => o.flowTemp)
    .filter((v): v is number => v !== null && Number.isFinite(v));

  if (flows.length < minSamples) {
    throw new DegenerateInputError('plateau detection', `needs at least ${minSamples} flow readings (got ${flows.length})`);
  }

  const overallStd = std(flows);
  if (overallStd < 1e-9) {
    throw new DegenerateInputError('plateau detection', 'flow temperature is constant');
  }

  const sorted = [...flows].sort((a, b) => a - b);
  const n = sorted.length;
  const tailSize = Math.min(Math.floor(n / 2), Math.max(minTailSize, Math.ceil(tailFraction * n)));
  const windowSize = Math.min(tailSize, Math.max(3, Math.floor(tailSize / 2)));
  const threshold = overallStd / stdRatio;

  const upper = confirmPileUp(scanTail(sorted.slice(n - tailSize), windowSize, threshold), sorted, 'upper', threshold, pileUpRatio);
  const lower = confirmPileUp(scanTail(sorted.slice(0, tailSize), windowSize, threshold), sorted, 'lower', threshold, pileUpRatio);

  const linearRegionMask = series.observations.map(o => {
    const flow = o.flowTemp;
    if (flow === null || !Number.isFinite(flow)) return false;
    if (upper.detected && flow >= upper.value) return false;
    if (lower.detected && flow <= lower.value) return false;
    return true;
  });

  return { upper, lower, linearRegionMask, overallStd, tailSize };
}

function scanTail(tail: readonly number[], windowSize: number, threshold: number): PlateauLimit {
  const members = new Set<number>();
  let windowCount = 0;

  for (let start = 0; start + windowSize <= tail.length; start++) {
    const window = tail.slice(start, start + windowSize);
    if (std(window) < threshold) {
      windowCount++;
      for (let k = start; k < start + windowSize; k++) members.add(k);
    }
  }

  if (windowCount === 0) {
    return {
      detected: false,
      reason: `no tail window flatter than ${threshold.toFixed(2)} °C std`
    };
  }

  return {
    detected: true,
    value: median([...members].map(k => tail[k])),
    windowCount
  };
}

function confirmPileUp(
  candidate: PlateauLimit,
  sorted: readonly number[],
  side: 'upper' | 'lower',
  band: number,
  ratio: number
): PlateauLimit {
  if (!candidate.detected) return candidate;

  const limit = candidate.value;
  let near = 0;
  let inner = 0;
  for (const flow of sorted) {
    // distance inward from the limit; readings beyond it count as near
    const distance = side === 'upper' ? limit - flow : flow - limit;
    if (distance <= band) near++;
    else if (distance <= 2 * band) inner++;
  }

  if (near < ratio * inner) {
    return {
      detected: false,
      reason: `no pile-up at ${limit.toFixed(1)} °C (${near} readings within ${band.toFixed(2)} °C, ${inner} in the next band)`
    };
  }
  return candidate;
}
