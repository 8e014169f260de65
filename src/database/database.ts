import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { DateTime } from 'luxon';
import { CREATE_TABLES_SQL, SCHEMA_VERSION } from './schema.js';
import { DIAGNOSTIC_CODES } from '../constants/index.js';
import type { Diagnostic, EstimatorName, ExtractionReport, ExtractionStatus } from '../types/index.js';

export interface DatabaseStats {
  runs: number;
  results: number;
  firstRun: string | null;
  lastRun: string | null;
}

export interface StoredResult {
  estimator: EstimatorName;
  status: ExtractionStatus;
  slope: number | null;
  dayRoomTarget: number | null;
  nightRoomTarget: number | null;
  baseTemperature: number | null;
  baseTemperatureAssumed: boolean;
  upperLimit: number | null;
  lowerLimit: number | null;
  r2Day: number | null;
  r2Night: number | null;
  diagnostics: Diagnostic[];
  validationPassed: boolean | null;
}

export interface StoredRun {
  id: number;
  createdAt: string;
  source: string;
  profile: string | null;
  sampleCount: number;
  usableCount: number;
  linearRegionCount: number;
  modeSource: string;
  modeAccuracy: number | null;
  notes: string | null;
  results: StoredResult[];
}

export interface RunMeta {
  source: string;
  profile?: string;
  notes?: string;
}

interface RunRow {
  id: number;
  created_at: string;
  source: string;
  profile: string | null;
  sample_count: number;
  usable_count: number;
  linear_region_count: number;
  mode_source: string;
  mode_accuracy: number | null;
  notes: string | null;
}

interface ResultRow {
  estimator: string;
  status: string;
  slope: number | null;
  day_room_target: number | null;
  night_room_target: number | null;
  base_temperature: number | null;
  base_assumed: number;
  upper_limit: number | null;
  lower_limit: number | null;
  r2_day: number | null;
  r2_night: number | null;
  diagnostics: string;
  validation_passed: number | null;
}

export class DatabaseService {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath?: string) {
    this.dbPath = dbPath || join(process.cwd(), 'data', 'heatcurve.db');

    // Ensure directory exists
    if (this.dbPath !== ':memory:') {
      const dir = dirname(this.dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(CREATE_TABLES_SQL);

    // Set schema version if not exists
    const stmt = this.db.prepare('INSERT OR IGNORE INTO schema_info (key, value) VALUES (?, ?)');
    stmt.run('version', String(SCHEMA_VERSION));
  }

  // ============ EXTRACTION RUNS ============

  saveExtraction(report: ExtractionReport, meta: RunMeta): number {
    const insertRun = this.db.prepare(`
      INSERT INTO extraction_runs (created_at, source, profile, sample_count, usable_count, linear_region_count, mode_source, mode_accuracy, notes)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertResult = this.db.prepare(`
      INSERT INTO extraction_results (run_id, estimator, status, slope, day_room_target, night_room_target, base_temperature, base_assumed, upper_limit, lower_limit, r2_day, r2_night, diagnostics, validation_passed)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const modeAccuracy = report.modes.status === 'resolved' ? report.modes.value.accuracy : null;

    const transaction = this.db.transaction((): number => {
      const run = insertRun.run(
        DateTime.utc().toISO() ?? '',
        meta.source,
        meta.profile ?? null,
        report.sampleCount,
        report.usableCount,
        report.linearRegionCount,
        report.modeSource,
        modeAccuracy,
        meta.notes ?? null
      );
      const runId = Number(run.lastInsertRowid);

      for (const result of report.results) {
        const validation = report.validations.find(v => v.estimator === result.estimator);
        insertResult.run(
          runId,
          result.estimator,
          result.status,
          result.slope,
          result.dayRoomTarget,
          result.nightRoomTarget,
          result.baseTemperature,
          result.baseTemperatureAssumed ? 1 : 0,
          result.upperLimit,
          result.lowerLimit,
          result.goodnessOfFit.day?.r2 ?? null,
          result.goodnessOfFit.night?.r2 ?? null,
          JSON.stringify(result.diagnostics),
          validation ? (validation.passed ? 1 : 0) : null
        );
      }

      return runId;
    });

    return transaction();
  }

  getRuns(limit: number = 20): StoredRun[] {
    const rows = this.db
      .prepare<[number], RunRow>('SELECT * FROM extraction_runs ORDER BY id DESC LIMIT ?')
      .all(limit);
    return rows.map(row => this.toStoredRun(row));
  }

  getRun(id: number): StoredRun | null {
    const row = this.db
      .prepare<[number], RunRow>('SELECT * FROM extraction_runs WHERE id = ?')
      .get(id);
    return row ? this.toStoredRun(row) : null;
  }

  private toStoredRun(row: RunRow): StoredRun {
    const results = this.db
      .prepare<[number], ResultRow>('SELECT * FROM extraction_results WHERE run_id = ? ORDER BY id')
      .all(row.id);

    return {
      id: row.id,
      createdAt: row.created_at,
      source: row.source,
      profile: row.profile,
      sampleCount: row.sample_count,
      usableCount: row.usable_count,
      linearRegionCount: row.linear_region_count,
      modeSource: row.mode_source,
      modeAccuracy: row.mode_accuracy,
      notes: row.notes,
      results: results.map(toStoredResult)
    };
  }

  // ============ UTILITIES ============

  getStats(): DatabaseStats {
    const runs = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM extraction_runs').get();
    const results = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM extraction_results').get();
    const range = this.db
      .prepare<[], { first: string | null; last: string | null }>('SELECT MIN(created_at) as first, MAX(created_at) as last FROM extraction_runs')
      .get();

    return {
      runs: runs?.count ?? 0,
      results: results?.count ?? 0,
      firstRun: range?.first ?? null,
      lastRun: range?.last ?? null
    };
  }

  close(): void {
    this.db.close();
  }

  getPath(): string {
    return this.dbPath;
  }

  clearRuns(): void {
    this.db.exec('DELETE FROM extraction_results');
    this.db.exec('DELETE FROM extraction_runs');
  }
}

function toStoredResult(row: ResultRow): StoredResult {
  return {
    estimator: row.estimator === 'ransac' ? 'ransac' : 'ols',
    status: toStatus(row.status),
    slope: row.slope,
    dayRoomTarget: row.day_room_target,
    nightRoomTarget: row.night_room_target,
    baseTemperature: row.base_temperature,
    baseTemperatureAssumed: row.base_assumed === 1,
    upperLimit: row.upper_limit,
    lowerLimit: row.lower_limit,
    r2Day: row.r2_day,
    r2Night: row.r2_night,
    diagnostics: parseDiagnostics(row.diagnostics),
    validationPassed: row.validation_passed === null ? null : row.validation_passed === 1
  };
}

function toStatus(value: string): ExtractionStatus {
  switch (value) {
    case 'complete':
    case 'partial':
    case 'unresolved':
      return value;
    default:
      return 'unresolved';
  }
}

function parseDiagnostics(text: string): Diagnostic[] {
  const data: unknown = JSON.parse(text);
  if (!Array.isArray(data)) return [];

  const items: unknown[] = data;
  const diagnostics: Diagnostic[] = [];
  for (const item of items) {
    if (typeof item !== 'object' || item === null || !('code' in item)) continue;
    const code = DIAGNOSTIC_CODES.find(c => c === item.code);
    const message = 'message' in item && typeof item.message === 'string' ? item.message : '';
    if (code) diagnostics.push({ code, message });
  }
  return diagnostics;
}

// Singleton instance
let dbInstance: DatabaseService | null = null;

export function getDatabase(dbPath?: string): DatabaseService {
  if (!dbInstance) {
    dbInstance = new DatabaseService(dbPath);
  }
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
