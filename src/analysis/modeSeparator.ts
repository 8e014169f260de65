import { kmeans } from 'ml-kmeans';
import { DEFAULT_SEED } from '../constants/index.js';
import { fitLine } from '../models/regressionModel.js';
import type { LinearFit, ModeSeparation, ObservationSeries, OperatingMode } from '../types/index.js';
import { DegenerateInputError } from '../utils/errors.js';
import { countDistinct, mean } from '../utils/stats.js';

export interface ModeSeparationOptions {
  seed?: number;
  maxIterations?: number;
}

interface ResidualSet {
  indices: number[];
  residuals: number[];
  globalFit: LinearFit;
}

/**
 * Split samples into day-like and night-like operation from the residuals of
 * one global line, clustered with two-means. Time of day is not an input.
 */
export function separateModes(series: ObservationSeries, options: ModeSeparationOptions = {}): ModeSeparation {
  const { indices, residuals, globalFit } = globalResiduals(series, 'mode separation');

  // Rounded so float noise around a single line does not count as structure
  if (countDistinct(residuals.map(r => Math.round(r * 1e9))) < 2) {
    throw new DegenerateInputError('mode separation', 'fewer than 2 distinct residual values');
  }

  const result = kmeans(residuals.map(r => [r]), 2, {
    seed: options.seed ?? DEFAULT_SEED,
    maxIterations: options.maxIterations ?? 100,
    initialization: 'kmeans++'
  });

  const clusterResiduals: [number[], number[]] = [[], []];
  result.clusters.forEach((cluster, k) => {
    clusterResiduals[cluster === 0 ? 0 : 1].push(residuals[k]);
  });
  if (clusterResiduals[0].length === 0 || clusterResiduals[1].length === 0) {
    throw new DegenerateInputError('mode separation', 'clustering produced an empty cluster');
  }

  const clusterMean = clusterResiduals.map(values => mean(values));
  const higher = clusterMean[0] >= clusterMean[1] ? 0 : 1;

  // A falling curve (K > 0) puts the warmer day target above the line; a rising one flips it
  const labelingInverted = globalFit.slope > 0;
  const dayCluster = labelingInverted ? 1 - higher : higher;

  const labels: (OperatingMode | null)[] = series.observations.map(() => null);
  indices.forEach((obsIndex, k) => {
    const cluster = result.clusters[k] === 0 ? 0 : 1;
    labels[obsIndex] = cluster === dayCluster ? 'day' : 'night';
  });

  return summarize(series, labels, indices, residuals, globalFit, labelingInverted);
}

/**
 * Mode assignment taken from the series' own is_night flags.
 */
export function assignModesFromLabels(series: ObservationSeries): ModeSeparation {
  const { indices, residuals, globalFit } = globalResiduals(series, 'mode labels');

  const labels: (OperatingMode | null)[] = series.observations.map(() => null);
  for (const obsIndex of indices) {
    const isNight = series.observations[obsIndex].isNight;
    if (isNight === undefined) {
      throw new DegenerateInputError('mode labels', 'series carries no is_night labels');
    }
    labels[obsIndex] = isNight ? 'night' : 'day';
  }

  const counts = countLabels(labels);
  if (counts.day === 0 || counts.night === 0) {
    throw new DegenerateInputError('mode labels', 'labels cover only one mode');
  }

  return summarize(series, labels, indices, residuals, globalFit, false);
}

// Share of labelled samples whose mode matches is_night; null without labels
export function labelAccuracy(series: ObservationSeries, labels: readonly (OperatingMode | null)[]): number | null {
  let total = 0;
  let correct = 0;

  for (let i = 0; i < labels.length; i++) {
    const label = labels[i];
    if (label === null) continue;
    const isNight = series.observations[i].isNight;
    if (isNight === undefined) return null;
    total++;
    if ((label === 'night') === isNight) correct++;
  }

  return total === 0 ? null : correct / total;
}

function globalResiduals(series: ObservationSeries, component: string): ResidualSet {
  const indices: number[] = [];
  const x: number[] = [];
  const y: number[] = [];

  series.observations.forEach((o, i) => {
    if (o.flowTemp === null || !Number.isFinite(o.flowTemp) || !Number.isFinite(o.outdoorTemp)) return;
    indices.push(i);
    x.push(o.outdoorTemp);
    y.push(o.flowTemp);
  });

  if (indices.length < 2) {
    throw new DegenerateInputError(component, `needs at least 2 samples with a flow value (got ${indices.length})`);
  }

  const globalFit = fitLine(x, y);
  const residuals = y.map((v, k) => v - (globalFit.intercept + globalFit.slope * x[k]));

  return { indices, residuals, globalFit };
}

function countLabels(labels: readonly (OperatingMode | null)[]): Record<OperatingMode, number> {
  return {
    day: labels.filter(l => l === 'day').length,
    night: labels.filter(l => l === 'night').length
  };
}

function summarize(
  series: ObservationSeries,
  labels: (OperatingMode | null)[],
  indices: readonly number[],
  residuals: readonly number[],
  globalFit: LinearFit,
  labelingInverted: boolean
): ModeSeparation {
  const byMode: Record<OperatingMode, number[]> = { day: [], night: [] };
  indices.forEach((obsIndex, k) => {
    const label = labels[obsIndex];
    if (label !== null) byMode[label].push(residuals[k]);
  });

  const clusterMeans = { day: mean(byMode.day), night: mean(byMode.night) };

  return {
    assignment: { labels },
    globalFit,
    clusterMeans,
    counts: countLabels(labels),
    separation: Math.abs(clusterMeans.day - clusterMeans.night),
    accuracy: labelAccuracy(series, labels),
    labelingInverted
  };
}
