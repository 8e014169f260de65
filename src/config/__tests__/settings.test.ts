import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_SIMULATION, applySettings, defaultSettings, loadSettings } from '../settings.js';

describe('applySettings', () => {
  it('merges valid entries over the defaults', () => {
    const warn = vi.fn();
    const settings = applySettings(defaultSettings(), {
      seed: 7,
      databasePath: 'runs.db',
      curve: { slope: 1.1, maxFlowTemp: 60 },
      simulation: { days: 30, start: '2024-01-01' },
      tolerances: { noisy: { slope: 0.5 } }
    }, warn);

    expect(warn).not.toHaveBeenCalled();
    expect(settings.seed).toBe(7);
    expect(settings.databasePath).toBe('runs.db');
    expect(settings.curve).toEqual({ slope: 1.1, maxFlowTemp: 60 });
    expect(settings.simulation).toEqual({ ...DEFAULT_SIMULATION, days: 30, start: '2024-01-01' });
    expect(settings.tolerances.noisy).toEqual({ slope: 0.5, dayRoomTarget: 2, nightRoomTarget: 2, upperLimit: 8, lowerLimit: 8 });
    expect(settings.tolerances.clean.slope).toBe(0.1);
  });

  it('skips and reports invalid entries', () => {
    const warn = vi.fn();
    const settings = applySettings(defaultSettings(), {
      seed: 'random',
      curve: { slope: 'steep' },
      simulation: { jitter: null },
      tolerances: { clean: { slope: -1 }, moderate: 3 }
    }, warn);

    expect(warn.mock.calls.map(call => call[0])).toEqual([
      'seed must be an integer',
      'curve.slope must be a number',
      'simulation.jitter must be a number',
      'tolerances.clean.slope must be a non-negative number',
      'tolerances.moderate must be an object'
    ]);
    expect(settings).toEqual(defaultSettings());
  });

  it('falls back to the defaults for a non-object', () => {
    const warn = vi.fn();
    expect(applySettings(defaultSettings(), [1, 2], warn)).toEqual(defaultSettings());
    expect(warn).toHaveBeenCalledWith('settings must be a JSON object, using defaults');
  });

  it('does not mutate the base settings', () => {
    const base = defaultSettings();
    applySettings(base, { simulation: { days: 5 }, tolerances: { clean: { slope: 1 } } }, vi.fn());
    expect(base).toEqual(defaultSettings());
  });
});

describe('loadSettings', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('reads an explicit settings file', () => {
    dir = mkdtempSync(join(tmpdir(), 'heatcurve-'));
    const file = join(dir, 'settings.json');
    writeFileSync(file, JSON.stringify({ seed: 11 }));

    const settings = loadSettings(file);
    expect(settings.seed).toBe(11);
    expect(settings.loadedFrom).toBe(file);
  });

  it('rejects a missing or malformed file', () => {
    dir = mkdtempSync(join(tmpdir(), 'heatcurve-'));
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ seed: ');
    const absent = join(dir, 'absent.json');

    expect(() => loadSettings(absent)).toThrow(/not found/);
    expect(() => loadSettings(file)).toThrow(/Could not read settings/);
  });
});
