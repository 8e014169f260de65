import { describe, expect, it } from 'vitest';
import { DegenerateInputError } from '../../utils/errors.js';
import { detectLimits } from '../plateauDetector.js';
import {
  CLAMPED_TEMPS,
  doubleClampConfig,
  gridSeries,
  range,
  seriesFromFlows,
  UNCLAMPED_TEMPS,
  unclampedConfig
} from './helpers.js';

describe('detectLimits', () => {
  it('finds both clamps of a noiseless clamped curve', () => {
    const series = gridSeries(doubleClampConfig, CLAMPED_TEMPS);
    const result = detectLimits(series);

    expect(series.observations).toHaveLength(1272);
    expect(result.tailSize).toBe(13);
    expect(result.upper).toMatchObject({ detected: true, value: 52 });
    expect(result.lower).toMatchObject({ detected: true, value: 32 });
  });

  it('keeps only samples strictly inside the limits in the linear region', () => {
    const series = gridSeries(doubleClampConfig, CLAMPED_TEMPS);
    const { linearRegionMask } = detectLimits(series);

    series.observations.forEach((o, i) => {
      if (o.flowTemp === 52 || o.flowTemp === 32) {
        expect(linearRegionMask[i]).toBe(false);
      }
      if (linearRegionMask[i]) {
        expect(o.flowTemp).toBeGreaterThan(32);
        expect(o.flowTemp).toBeLessThan(52);
      }
    });
    expect(linearRegionMask.filter(Boolean)).toHaveLength(672);
  });

  it('does not report limits for a curve that never clamps', () => {
    const series = gridSeries(unclampedConfig, UNCLAMPED_TEMPS);
    const result = detectLimits(series);

    expect(result.upper).toEqual({
      detected: false,
      reason: 'no pile-up at 54.3 °C (64 readings within 2.39 °C, 48 in the next band)'
    });
    expect(result.lower).toEqual({
      detected: false,
      reason: 'no pile-up at 26.3 °C (32 readings within 2.39 °C, 24 in the next band)'
    });
    expect(result.linearRegionMask.every(Boolean)).toBe(true);
  });

  it('finds a repeated reading at the top of an even spread', () => {
    const dense = range(0, 99, 1).map(k => 40 + (10 * k) / 99);
    const series = seriesFromFlows([...dense, ...new Array<number>(20).fill(50)]);
    const result = detectLimits(series);

    expect(result.upper).toMatchObject({ detected: true, value: 50 });
    expect(result.lower.detected).toBe(false);
    expect(result.linearRegionMask.filter(Boolean)).toHaveLength(99);
  });

  it('leaves sparse and evenly spread tails unresolved', () => {
    const dense = range(0, 99, 1).map(k => 40 + (10 * k) / 99);
    const series = seriesFromFlows([...dense, 60, 70, 80, 90, 100]);
    const result = detectLimits(series);

    expect(result.tailSize).toBe(5);
    expect(result.upper).toEqual({ detected: false, reason: 'no tail window flatter than 2.85 °C std' });
    expect(result.lower.detected).toBe(false);
    expect(result.linearRegionMask).toHaveLength(105);
    expect(result.linearRegionMask.every(Boolean)).toBe(true);
  });

  it('ignores missing readings', () => {
    const dense = range(0, 29, 1).map(k => 30 + k);
    const series = seriesFromFlows([null, ...dense, null]);
    const result = detectLimits(series);
    expect(result.linearRegionMask[0]).toBe(false);
    expect(result.linearRegionMask[31]).toBe(false);
  });

  it('needs at least 20 readings', () => {
    expect(() => detectLimits(seriesFromFlows(range(0, 18, 1)))).toThrow(DegenerateInputError);
  });

  it('rejects a constant series', () => {
    expect(() => detectLimits(seriesFromFlows(new Array<number>(30).fill(40)))).toThrow(/constant/);
  });
});
