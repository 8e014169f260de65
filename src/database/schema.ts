// Database schema definitions

export const SCHEMA_VERSION = 1;

export const CREATE_TABLES_SQL = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_info (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

-- One extraction run over one observation series
CREATE TABLE IF NOT EXISTS extraction_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created_at TEXT NOT NULL,
  source TEXT NOT NULL,
  profile TEXT,
  sample_count INTEGER NOT NULL,
  usable_count INTEGER NOT NULL,
  linear_region_count INTEGER NOT NULL,
  mode_source TEXT NOT NULL,
  mode_accuracy REAL,
  notes TEXT
);

-- Parameters recovered by each estimator within a run
CREATE TABLE IF NOT EXISTS extraction_results (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id INTEGER NOT NULL REFERENCES extraction_runs(id) ON DELETE CASCADE,
  estimator TEXT NOT NULL,
  status TEXT NOT NULL,
  slope REAL,
  day_room_target REAL,
  night_room_target REAL,
  base_temperature REAL,
  base_assumed INTEGER NOT NULL DEFAULT 0,
  upper_limit REAL,
  lower_limit REAL,
  r2_day REAL,
  r2_night REAL,
  diagnostics TEXT NOT NULL DEFAULT '[]',
  validation_passed INTEGER,
  UNIQUE(run_id, estimator)
);

CREATE INDEX IF NOT EXISTS idx_runs_created ON extraction_runs(created_at);
CREATE INDEX IF NOT EXISTS idx_results_run ON extraction_results(run_id);
`;
