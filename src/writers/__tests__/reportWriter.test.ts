import { describe, expect, it } from 'vitest';
import { extractParameters } from '../../analysis/parameterExtractor.js';
import { CLAMPED_TEMPS, doubleClampConfig, gridSeries } from '../../analysis/__tests__/helpers.js';
import type { ExtractedParameters } from '../../types/index.js';
import { formatExtractionReport, formatResultsTable, formatValue } from '../reportWriter.js';

const tolerances = { slope: 0.1, dayRoomTarget: 1, nightRoomTarget: 1 };
const report = extractParameters(gridSeries(doubleClampConfig, CLAMPED_TEMPS), {
  modeSource: 'labels',
  estimators: ['ols'],
  groundTruth: doubleClampConfig,
  tolerances
});

describe('formatValue', () => {
  it('spells out unresolved values', () => {
    expect(formatValue(null, 2)).toBe('unresolved');
    expect(formatValue(1.23456, 3)).toBe('1.235');
  });
});

describe('formatExtractionReport', () => {
  const lines = formatExtractionReport(report, { source: 'grid.csv' }).split('\n');

  it('opens with the run summary', () => {
    expect(lines.slice(0, 8)).toEqual([
      '# Heating Curve Extraction Report',
      '',
      '- Source: grid.csv',
      '- Samples: 1272',
      '- Missing flow readings: 0',
      '- Heating off (summer cutoff): 0',
      '- Usable samples: 1272',
      '- Linear region samples: 672'
    ]);
  });

  it('lists the detected limits and mode counts', () => {
    expect(lines).toContain('| Upper | 52.0 | detected |');
    expect(lines).toContain('| Lower | 32.0 | detected |');
    expect(lines).toContain('- Source: is_night labels');
    expect(lines).toContain('- Day samples: 848');
    expect(lines).toContain('- Night samples: 424');
    expect(lines).toContain('- Accuracy vs labels: 100.0%');
  });

  it('tabulates validation per field', () => {
    expect(lines).toContain('| OLS | slope | 1.400 | 1.4 | 0.000 | 0.1 | pass |');
    expect(lines).toContain('| OLS | upperLimit | 52.000 | 52 | 0.000 | - | unchecked |');
    expect(lines).toContain('**OLS**: PASS');
  });

  it('lists diagnostics per estimator', () => {
    expect(lines).toContain('- [ols] base-temperature-assumed: base temperature not identifiable from a single line, assumed equal to the day room target');
  });
});

describe('formatResultsTable', () => {
  it('prints one row per result', () => {
    const table = formatResultsTable([
      { label: 'grid', result: report.results[0], validation: report.validations[0] }
    ]).split('\n');

    expect(table).toHaveLength(3);
    expect(table[2].trim().split(/\s+/)).toEqual(['grid', 'OLS', 'complete', '1.400', '20.00', '16.00', '0.000', '0.00', '0.00', 'PASS']);
  });

  it('marks unresolved values and missing validation', () => {
    const unresolved: ExtractedParameters = { ...report.results[0], slope: null, status: 'unresolved' };
    const table = formatResultsTable([{ label: 'empty', result: unresolved }]).split('\n');
    expect(table[2].trim().split(/\s+/)).toEqual(['empty', 'OLS', 'unresolved', 'unresolved', '20.00', '16.00', '-', '-', '-', '-']);
  });
});
