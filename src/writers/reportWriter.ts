import { writeFileSync } from 'fs';
import type { ExtractedParameters, ExtractionReport, ValidationReport } from '../types/index.js';

export interface ReportMeta {
  title?: string;
  source?: string;
  profileName?: string;
}

export interface ResultsRow {
  label: string;
  result: ExtractedParameters;
  validation?: ValidationReport;
}

// Unresolved values are spelled out, never shown as a number
export function formatValue(value: number | null, digits: number): string {
  return value === null ? 'unresolved' : value.toFixed(digits);
}

export function formatExtractionReport(report: ExtractionReport, meta: ReportMeta = {}): string {
  const lines: string[] = [];

  lines.push(`# ${meta.title ?? 'Heating Curve Extraction Report'}`);
  lines.push('');
  if (meta.source) lines.push(`- Source: ${meta.source}`);
  if (meta.profileName) lines.push(`- Noise profile: ${meta.profileName}`);
  lines.push(`- Samples: ${report.sampleCount}`);
  lines.push(`- Missing flow readings: ${report.missingCount}`);
  lines.push(`- Heating off (summer cutoff): ${report.heatingOffCount}`);
  lines.push(`- Usable samples: ${report.usableCount}`);
  lines.push(`- Linear region samples: ${report.linearRegionCount}`);
  lines.push('');

  lines.push('## Flow Limits');
  lines.push('');
  if (report.plateaus.status === 'resolved') {
    const { upper, lower } = report.plateaus.value;
    lines.push('| Limit | Value | Status |');
    lines.push('|-------|-------|--------|');
    lines.push(`| Upper | ${upper.detected ? upper.value.toFixed(1) : '-'} | ${upper.detected ? 'detected' : `unresolved (${upper.reason})`} |`);
    lines.push(`| Lower | ${lower.detected ? lower.value.toFixed(1) : '-'} | ${lower.detected ? 'detected' : `unresolved (${lower.reason})`} |`);
  } else {
    lines.push(`Unresolved: ${report.plateaus.reason}`);
  }
  lines.push('');

  lines.push('## Operating Modes');
  lines.push('');
  lines.push(`- Source: ${report.modeSource === 'labels' ? 'is_night labels' : 'residual clustering'}`);
  if (report.modes.status === 'resolved') {
    const modes = report.modes.value;
    lines.push(`- Day samples: ${modes.counts.day}`);
    lines.push(`- Night samples: ${modes.counts.night}`);
    lines.push(`- Separation: ${modes.separation.toFixed(2)} °C`);
    if (modes.accuracy !== null) {
      lines.push(`- Accuracy vs labels: ${(modes.accuracy * 100).toFixed(1)}%`);
    }
  } else {
    lines.push(`- Unresolved: ${report.modes.reason}`);
  }
  lines.push('');

  lines.push('## Extracted Parameters');
  lines.push('');
  lines.push('| Estimator | Status | K | T_day | T_night | Base | R² day | R² night | Inliers day | Inliers night |');
  lines.push('|-----------|--------|---|-------|---------|------|--------|----------|-------------|---------------|');
  for (const r of report.results) {
    const fit = r.goodnessOfFit;
    const base = r.baseTemperature === null
      ? 'unresolved'
      : `${r.baseTemperature.toFixed(2)}${r.baseTemperatureAssumed ? ' (assumed)' : ''}`;
    lines.push(`| ${r.estimator.toUpperCase()} | ${r.status} | ${formatValue(r.slope, 3)} | ${formatValue(r.dayRoomTarget, 2)} | ${formatValue(r.nightRoomTarget, 2)} | ${base} | ${formatValue(fit.day?.r2 ?? null, 4)} | ${formatValue(fit.night?.r2 ?? null, 4)} | ${formatRatio(fit.day?.inlierRatio)} | ${formatRatio(fit.night?.inlierRatio)} |`);
  }
  lines.push('');

  if (report.validations.length > 0) {
    lines.push('## Validation');
    lines.push('');
    lines.push('| Estimator | Field | Estimate | Truth | Error | Tolerance | Result |');
    lines.push('|-----------|-------|----------|-------|-------|-----------|--------|');
    for (const v of report.validations) {
      for (const f of v.fields) {
        lines.push(`| ${v.estimator.toUpperCase()} | ${f.field} | ${formatValue(f.estimate, 3)} | ${f.truth} | ${formatValue(f.error, 3)} | ${f.tolerance ?? '-'} | ${f.status} |`);
      }
    }
    lines.push('');
    for (const v of report.validations) {
      lines.push(`**${v.estimator.toUpperCase()}**: ${v.passed ? 'PASS' : 'FAIL'}`);
    }
    lines.push('');
  }

  const diagnostics = report.results.flatMap(r => r.diagnostics.map(d => ({ estimator: r.estimator, ...d })));
  if (diagnostics.length > 0) {
    lines.push('## Diagnostics');
    lines.push('');
    for (const d of diagnostics) {
      lines.push(`- [${d.estimator}] ${d.code}: ${d.message}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function writeExtractionReport(report: ExtractionReport, filePath: string, meta?: ReportMeta): void {
  writeFileSync(filePath, formatExtractionReport(report, meta));
}

export function formatResultsTable(rows: readonly ResultsRow[]): string {
  const header = [
    'Scenario'.padEnd(14),
    'Est.'.padEnd(7),
    'Status'.padEnd(11),
    'K'.padStart(11),
    'T_day'.padStart(11),
    'T_night'.padStart(11),
    'ΔK'.padStart(8),
    'ΔT_day'.padStart(8),
    'ΔT_night'.padStart(9),
    'Result'.padStart(7)
  ].join(' ');

  const lines = [header, '-'.repeat(header.length)];

  for (const row of rows) {
    const r = row.result;
    const errors = row.validation
      ? new Map(row.validation.fields.map(f => [f.field, f.error]))
      : null;
    const errorCell = (field: 'slope' | 'dayRoomTarget' | 'nightRoomTarget', width: number, digits: number) => {
      if (!errors) return '-'.padStart(width);
      const value = errors.get(field);
      return (value === undefined || value === null ? 'n/a' : value.toFixed(digits)).padStart(width);
    };

    lines.push([
      row.label.padEnd(14),
      r.estimator.toUpperCase().padEnd(7),
      r.status.padEnd(11),
      formatValue(r.slope, 3).padStart(11),
      formatValue(r.dayRoomTarget, 2).padStart(11),
      formatValue(r.nightRoomTarget, 2).padStart(11),
      errorCell('slope', 8, 3),
      errorCell('dayRoomTarget', 8, 2),
      errorCell('nightRoomTarget', 9, 2),
      (row.validation ? (row.validation.passed ? 'PASS' : 'FAIL') : '-').padStart(7)
    ].join(' '));
  }

  return lines.join('\n');
}

function formatRatio(ratio: number | null | undefined): string {
  return ratio === null || ratio === undefined ? '-' : `${(ratio * 100).toFixed(1)}%`;
}
