#!/usr/bin/env node
import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { DateTime } from 'luxon';
import { extractParameters } from './analysis/index.js';
import { createConfig, loadSettings } from './config/index.js';
import type { AppSettings } from './config/index.js';
import { BUILDING_PRESETS, NOISE_PROFILES } from './constants/index.js';
import { closeDatabase, getDatabase } from './database/index.js';
import { readGroundTruth, readObservationCsv, readWeatherCsv } from './parsers/index.js';
import { generateOutdoorSeries, generateSimulation, interpolateSeries, runBenchmark } from './simulation/index.js';
import type {
  CanonicalProfileName,
  EstimatorName,
  ExtractionReport,
  HeatingCurveConfig,
  NoiseProfile,
  OutdoorPoint
} from './types/index.js';
import { errorMessage } from './utils/index.js';
import {
  formatExtractionReport,
  formatResultsTable,
  formatValue,
  writeExtractionReport,
  writeGroundTruthJson,
  writeObservationCsv
} from './writers/index.js';

interface SimulateOptions {
  output: string;
  profile: string;
  preset?: string;
  days?: string;
  start?: string;
  seed?: string;
  weather?: string;
  truth?: string;
  config?: string;
}

interface ExtractOptions {
  input: string;
  estimators: string;
  base?: string;
  summerCutoff?: string;
  useLabels?: boolean;
  truth?: string;
  profile: string;
  seed?: string;
  report?: string;
  save?: boolean;
  config?: string;
}

interface EvaluateOptions {
  preset?: string;
  days?: string;
  seed?: string;
  report?: string;
  save?: boolean;
  config?: string;
}

const program = new Command();

program
  .name('heatcurve')
  .description('Recover heating curve parameters from flow temperature time series')
  .version('1.0.0');

// SIMULATE command - Generate a synthetic observation series with known parameters
program
  .command('simulate')
  .description('Generate a noisy observation series from a known heating curve')
  .requiredOption('-o, --output <file>', 'Output CSV file')
  .option('-p, --profile <name>', 'Noise profile: clean, moderate, noisy', 'clean')
  .option('--preset <name>', `Building preset: ${Object.keys(BUILDING_PRESETS).join(', ')}`)
  .option('-d, --days <n>', 'Number of days to simulate')
  .option('-s, --start <date>', 'Start date (YYYY-MM-DD)')
  .option('--seed <n>', 'Random seed')
  .option('-w, --weather <file>', 'Outdoor temperature CSV (datetime,t_outdoor) instead of synthetic weather')
  .option('-t, --truth <file>', 'Write the ground-truth parameters to this JSON file')
  .option('-c, --config <file>', 'Settings file')
  .action((options: SimulateOptions) => {
    try {
      const settings = loadSettings(options.config);
      const config = buildConfig(settings, options.preset);
      const profile = resolveProfile(options.profile);
      const seed = parseInteger(options.seed, settings.seed, 'seed');

      console.log('\n🔄 Preparing outdoor temperatures...');
      const outdoor = loadOutdoor(settings, options, seed);
      console.log(`  📊 ${outdoor.length} samples`);
      if (outdoor.length > 0) {
        console.log(`  📅 Range: ${formatDate(outdoor[0].timestamp)} to ${formatDate(outdoor[outdoor.length - 1].timestamp)}`);
      }

      console.log(`\n🎛️  Heating curve: K=${config.slope}, day ${config.dayRoomTarget}°C, night ${config.nightRoomTarget}°C, flow ${config.minFlowTemp}-${config.maxFlowTemp}°C`);
      console.log(`🔊 Noise profile: ${profile.name} (${profile.description})`);

      const { observed } = generateSimulation(outdoor, config, profile, seed);
      const missing = observed.observations.filter(o => o.flowTemp === null).length;

      writeObservationCsv(observed, options.output);
      console.log(`\n💾 Observations saved to: ${options.output}`);
      console.log(`   ${observed.observations.length} rows, ${missing} without a flow reading`);

      if (options.truth) {
        writeGroundTruthJson(config, options.truth);
        console.log(`💾 Ground truth saved to: ${options.truth}`);
      }

      console.log('\n✅ Simulation complete!');
    } catch (error) {
      console.error(`\n❌ Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

// EXTRACT command - Recover parameters from an observation series
program
  .command('extract')
  .description('Extract heating curve parameters from an observation CSV')
  .requiredOption('-i, --input <file>', 'Observation CSV (datetime,t_outdoor,t_vorlauf[,is_night])')
  .option('-e, --estimators <list>', 'Comma-separated estimators: ols, ransac', 'ols,ransac')
  .option('-b, --base <temp>', 'Known base temperature (otherwise assumed equal to the day target)')
  .option('--summer-cutoff <temp>', 'Exclude samples at or above this outdoor temperature')
  .option('--use-labels', 'Use the is_night column instead of unsupervised mode separation')
  .option('-t, --truth <file>', 'Ground-truth JSON for validation')
  .option('-p, --profile <name>', 'Tolerance set for validation: clean, moderate, noisy', 'clean')
  .option('--seed <n>', 'Random seed')
  .option('-r, --report <file>', 'Write a Markdown report')
  .option('--save', 'Save the results to the database')
  .option('-c, --config <file>', 'Settings file')
  .action((options: ExtractOptions) => {
    try {
      const settings = loadSettings(options.config);
      const profileName = resolveProfileName(options.profile);

      console.log('\n🔄 Loading observations...');
      const data = readObservationCsv(options.input);
      console.log(`  📊 ${data.series.observations.length} samples (${data.skippedRows} rows skipped)`);
      if (data.startDate && data.endDate) {
        console.log(`  📅 Range: ${formatDate(data.startDate)} to ${formatDate(data.endDate)}`);
      }
      if (options.useLabels && !data.hasNightLabels) {
        console.warn('  ⚠️  --use-labels given but the file has no complete is_night column');
      }

      const groundTruth = options.truth ? readGroundTruth(options.truth) : undefined;

      console.log('\n🔍 Extracting parameters...');
      const report = extractParameters(data.series, {
        estimators: parseEstimators(options.estimators),
        baseTemperature: parseNumber(options.base, 'base'),
        summerCutoff: parseNumber(options.summerCutoff, 'summer cutoff'),
        modeSource: options.useLabels ? 'labels' : 'detected',
        seed: parseInteger(options.seed, settings.seed, 'seed'),
        groundTruth,
        tolerances: settings.tolerances[profileName]
      });

      printReport(report);

      if (options.report) {
        writeExtractionReport(report, options.report, { source: options.input, profileName });
        console.log(`\n📄 Report saved to: ${options.report}`);
      }

      if (options.save) {
        const db = getDatabase(settings.databasePath);
        const runId = db.saveExtraction(report, { source: options.input, profile: groundTruth ? profileName : undefined });
        closeDatabase();
        console.log(`💾 Saved as run #${runId}`);
      }

      console.log('\n✅ Extraction complete!');
    } catch (error) {
      console.error(`\n❌ Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

// EVALUATE command - Run every noise profile against a known curve
program
  .command('evaluate')
  .description('Simulate all noise profiles, extract and validate against the known curve')
  .option('--preset <name>', 'Building preset')
  .option('-d, --days <n>', 'Number of days to simulate')
  .option('--seed <n>', 'Random seed')
  .option('-r, --report <file>', 'Write a Markdown report covering all profiles')
  .option('--save', 'Save the results to the database')
  .option('-c, --config <file>', 'Settings file')
  .action((options: EvaluateOptions) => {
    try {
      const settings = loadSettings(options.config);
      const config = buildConfig(settings, options.preset);
      const seed = parseInteger(options.seed, settings.seed, 'seed');
      const outdoor = loadOutdoor(settings, options, seed);

      const profileNames: CanonicalProfileName[] = ['clean', 'moderate', 'noisy'];
      console.log(`\n🔄 Evaluating ${profileNames.length} noise profiles on ${outdoor.length} samples (seed ${seed})...`);

      const entries = runBenchmark(
        config,
        outdoor,
        profileNames.map(name => ({ profile: NOISE_PROFILES[name], tolerances: settings.tolerances[name] })),
        seed
      );

      const rows = entries.flatMap(entry => entry.report.results.map(result => ({
        label: entry.profile.name,
        result,
        validation: entry.report.validations.find(v => v.estimator === result.estimator)
      })));

      console.log('\n' + formatResultsTable(rows));

      if (options.report) {
        const sections = entries.map(entry => formatExtractionReport(entry.report, {
          title: `Noise profile: ${entry.profile.name}`,
          source: 'simulation',
          profileName: entry.profile.name
        }));
        writeFileSync(options.report, sections.join('\n\n'));
        console.log(`\n📄 Report saved to: ${options.report}`);
      }

      if (options.save) {
        const db = getDatabase(settings.databasePath);
        for (const entry of entries) {
          const runId = db.saveExtraction(entry.report, { source: 'simulation', profile: entry.profile.name });
          console.log(`💾 ${entry.profile.name}: run #${runId}`);
        }
        closeDatabase();
      }

      const failed = entries.flatMap(e => e.report.validations).filter(v => !v.passed).length;
      if (failed > 0) {
        console.log(`\n⚠️  ${failed} estimator run(s) outside tolerance`);
      }
      console.log('\n✅ Evaluation complete!');
    } catch (error) {
      console.error(`\n❌ Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

// PRESETS command - List building presets and noise profiles
program
  .command('presets')
  .description('List building presets and noise profiles')
  .action(() => {
    console.log('\n🏠 Building presets:');
    for (const [key, preset] of Object.entries(BUILDING_PRESETS)) {
      const c = preset.config;
      console.log(`  • ${key.padEnd(16)} ${preset.name} (K=${c.slope}, flow ${c.minFlowTemp}-${c.maxFlowTemp}°C)`);
    }

    console.log('\n🔊 Noise profiles:');
    for (const profile of Object.values(NOISE_PROFILES)) {
      console.log(`  • ${profile.name.padEnd(16)} σ=${profile.gaussianSigma}°C, spikes ${pct(profile.spikeProbability)}, missing ${pct(profile.missingBlockProbability)}, outliers ${pct(profile.outlierProbability)}`);
    }
  });

// DATABASE commands
const dbCommand = program
  .command('db')
  .description('Extraction history commands');

// DB STATUS - Show database statistics
dbCommand
  .command('status')
  .description('Show database statistics')
  .option('-c, --config <file>', 'Settings file')
  .action((options: { config?: string }) => {
    console.log('\n📊 Database Status\n');

    try {
      const db = getDatabase(loadSettings(options.config).databasePath);
      const stats = db.getStats();

      console.log(`Database Path: ${db.getPath()}\n`);
      console.log('📈 Record Counts:');
      console.log(`  • Extraction runs: ${stats.runs}`);
      console.log(`  • Estimator results: ${stats.results}`);

      if (stats.firstRun && stats.lastRun) {
        console.log('\n📅 Run Range:');
        console.log(`  • First: ${stats.firstRun}`);
        console.log(`  • Last: ${stats.lastRun}`);
      }

      closeDatabase();
      console.log('\n✅ Database status complete!');
    } catch (error) {
      console.error(`\n❌ Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

// DB RUNS - List saved extraction runs
dbCommand
  .command('runs')
  .description('List saved extraction runs')
  .option('-l, --limit <n>', 'Number of runs to show', '10')
  .option('-c, --config <file>', 'Settings file')
  .action((options: { limit: string; config?: string }) => {
    try {
      const db = getDatabase(loadSettings(options.config).databasePath);
      const runs = db.getRuns(parseInteger(options.limit, 10, 'limit'));
      closeDatabase();

      if (runs.length === 0) {
        console.log('\n📭 No saved runs');
        return;
      }

      console.log('\n📋 Saved runs:\n');
      for (const run of runs) {
        console.log(`#${run.id}  ${run.createdAt}  ${run.source}${run.profile ? ` [${run.profile}]` : ''}  ${run.usableCount}/${run.sampleCount} usable`);
        for (const r of run.results) {
          const validation = r.validationPassed === null ? '' : r.validationPassed ? '  ✅' : '  ❌';
          console.log(`    ${r.estimator.toUpperCase().padEnd(7)} ${r.status.padEnd(11)} K=${formatValue(r.slope, 3)}  day=${formatValue(r.dayRoomTarget, 2)}  night=${formatValue(r.nightRoomTarget, 2)}${validation}`);
        }
      }
    } catch (error) {
      console.error(`\n❌ Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

// DB CLEAR - Delete the extraction history
dbCommand
  .command('clear')
  .description('Delete all saved extraction runs')
  .option('--confirm', 'Confirm clearing all runs')
  .option('-c, --config <file>', 'Settings file')
  .action((options: { confirm?: boolean; config?: string }) => {
    if (!options.confirm) {
      console.log('\n⚠️  This will delete ALL saved runs from the database.');
      console.log('   Use --confirm to proceed.');
      return;
    }

    try {
      const db = getDatabase(loadSettings(options.config).databasePath);
      db.clearRuns();
      closeDatabase();
      console.log('\n✅ Database cleared successfully');
    } catch (error) {
      console.error(`\n❌ Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program.parse();

// ============ HELPERS ============

function buildConfig(settings: AppSettings, presetKey?: string): HeatingCurveConfig {
  if (!presetKey) return createConfig(settings.curve);

  const preset = BUILDING_PRESETS[presetKey];
  if (!preset) {
    throw new Error(`Unknown preset "${presetKey}". Available: ${Object.keys(BUILDING_PRESETS).join(', ')}`);
  }
  return createConfig({ ...settings.curve, ...preset.config });
}

function resolveProfileName(name: string): CanonicalProfileName {
  switch (name) {
    case 'clean':
    case 'moderate':
    case 'noisy':
      return name;
    default:
      throw new Error(`Unknown noise profile "${name}". Available: clean, moderate, noisy`);
  }
}

function resolveProfile(name: string): NoiseProfile {
  return NOISE_PROFILES[resolveProfileName(name)];
}

function loadOutdoor(
  settings: AppSettings,
  options: { weather?: string; days?: string; start?: string },
  seed: number
): OutdoorPoint[] {
  if (options.weather) {
    const weather = readWeatherCsv(options.weather);
    if (weather.points.length < 2) {
      throw new Error(`Weather file ${options.weather} needs at least 2 readings`);
    }
    return interpolateSeries(weather.points);
  }

  return generateOutdoorSeries({
    ...settings.simulation,
    start: options.start ?? settings.simulation.start,
    days: parseInteger(options.days, settings.simulation.days, 'days'),
    seed
  });
}

function parseEstimators(list: string): EstimatorName[] {
  const names = list.split(',').map(s => s.trim().toLowerCase()).filter(Boolean);
  return names.map(name => {
    if (name === 'ols' || name === 'ransac') return name;
    throw new Error(`Unknown estimator "${name}". Available: ols, ransac`);
  });
}

function parseNumber(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseFloat(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return parsed;
}

function parseInteger(value: string | undefined, fallback: number, label: string): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return parsed;
}

function printReport(report: ExtractionReport): void {
  console.log(`  📊 Usable: ${report.usableCount}, missing: ${report.missingCount}, heating off: ${report.heatingOffCount}, linear region: ${report.linearRegionCount}`);

  if (report.plateaus.status === 'resolved') {
    const { upper, lower } = report.plateaus.value;
    console.log(`  📈 Upper limit: ${upper.detected ? `${upper.value.toFixed(1)}°C` : 'unresolved'}`);
    console.log(`  📉 Lower limit: ${lower.detected ? `${lower.value.toFixed(1)}°C` : 'unresolved'}`);
  } else {
    console.log(`  ⚠️  Plateau detection unresolved: ${report.plateaus.reason}`);
  }

  if (report.modes.status === 'resolved') {
    const modes = report.modes.value;
    const accuracy = modes.accuracy === null ? '' : `, accuracy ${(modes.accuracy * 100).toFixed(1)}%`;
    console.log(`  🌗 Modes: ${modes.counts.day} day / ${modes.counts.night} night, separation ${modes.separation.toFixed(2)}°C${accuracy}`);
  } else {
    console.log(`  ⚠️  Mode separation unresolved: ${report.modes.reason}`);
  }

  console.log('\n' + formatResultsTable(report.results.map(result => ({
    label: report.modeSource,
    result,
    validation: report.validations.find(v => v.estimator === result.estimator)
  }))));

  for (const result of report.results) {
    for (const d of result.diagnostics) {
      console.log(`  ⚠️  [${result.estimator}] ${d.code}: ${d.message}`);
    }
  }
}

function formatDate(date: Date): string {
  return DateTime.fromJSDate(date, { zone: 'utc' }).toISODate() ?? date.toISOString();
}

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}
