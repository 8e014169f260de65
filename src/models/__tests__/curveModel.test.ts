import { describe, expect, it } from 'vitest';
import { createConfig } from '../../config/curveConfig.js';
import { InvalidConfigurationError } from '../../utils/errors.js';
import { flowTemperature, isNightHour, roomTargetAt } from '../curveModel.js';

const config = createConfig({ minFlowTemp: 25, maxFlowTemp: 55 });

describe('flowTemperature', () => {
  it('follows base + K * (target - outdoor) between the limits', () => {
    expect(flowTemperature(0, 12, config)).toBeCloseTo(48, 10);
    expect(flowTemperature(0, 23, config)).toBeCloseTo(42.4, 10);
    expect(flowTemperature(5, 3, config)).toBeCloseTo(35.4, 10);
  });

  it('clamps to the configured flow limits', () => {
    expect(flowTemperature(-20, 12, config)).toBe(55);
    expect(flowTemperature(14, 3, config)).toBe(25);
  });

  it('stays within [min, max] for every hour and outdoor temperature below the cutoff', () => {
    for (let tenth = -300; tenth < 150; tenth++) {
      for (let hour = 0; hour < 24; hour++) {
        const flow = flowTemperature(tenth / 10, hour, config);
        expect(flow).not.toBeNull();
        expect(flow).toBeGreaterThanOrEqual(25);
        expect(flow).toBeLessThanOrEqual(55);
      }
    }
  });

  it('signals heating off at and above the summer cutoff', () => {
    expect(flowTemperature(15, 12, config)).toBeNull();
    expect(flowTemperature(25, 3, config)).toBeNull();
    expect(flowTemperature(14.99, 12, config)).not.toBeNull();
  });
});

describe('isNightHour', () => {
  it('wraps a window that crosses midnight', () => {
    expect([21, 22, 23, 0, 5, 6].map(h => isNightHour(h, 22, 6))).toEqual([false, true, true, true, true, false]);
  });

  it('handles a window inside one day', () => {
    expect([0, 1, 4, 5].map(h => isNightHour(h, 1, 5))).toEqual([false, true, true, false]);
  });

  it('has no night when start equals end', () => {
    expect(isNightHour(3, 4, 4)).toBe(false);
    expect(isNightHour(4, 4, 4)).toBe(false);
  });

  it('reads hour 24 as midnight', () => {
    expect(isNightHour(0, 24, 6)).toBe(true);
    expect(isNightHour(23, 24, 6)).toBe(false);
  });

  it('picks the room target by window', () => {
    expect(roomTargetAt(23, config)).toBe(16);
    expect(roomTargetAt(12, config)).toBe(20);
  });
});

describe('createConfig', () => {
  it('fills defaults and freezes the result', () => {
    const c = createConfig();
    expect(c.slope).toBe(1.4);
    expect(c.maxFlowTemp).toBe(75);
    expect(c.nightStartHour).toBe(22);
    expect(Object.isFrozen(c)).toBe(true);
  });

  it('normalises hour 24 to 0', () => {
    expect(createConfig({ nightStartHour: 24 }).nightStartHour).toBe(0);
  });

  it('rejects min flow at or above max flow', () => {
    expect(() => createConfig({ minFlowTemp: 60, maxFlowTemp: 60 })).toThrow(InvalidConfigurationError);
  });

  it('rejects a night target at or above the day target', () => {
    expect(() => createConfig({ dayRoomTarget: 18, nightRoomTarget: 18 })).toThrow(/dayRoomTarget/);
  });

  it('rejects temperatures outside -30..100 and non-finite values', () => {
    expect(() => createConfig({ maxFlowTemp: 120 })).toThrow(/maxFlowTemp/);
    expect(() => createConfig({ slope: Number.NaN })).toThrow(/slope/);
  });

  it('reports every violated rule', () => {
    try {
      createConfig({ minFlowTemp: 80, maxFlowTemp: 70, nightRoomTarget: 25 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.issues).toHaveLength(2);
      }
    }
  });
});
