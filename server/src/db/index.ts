import Database from 'better-sqlite3';
import { INDEX_TYPES } from '../constants';
import { createLogger } from '../log';

const log = createLogger('DB');

const regionColumns = INDEX_TYPES.map(t => `
            ${t}_mean REAL,
            ${t}_min REAL,
            ${t}_max REAL,
            ${t}_std REAL,
            ${t}_sample_count INTEGER,`).join('');

export const initDB = (db: Database.Database) => {
    db.exec(`
        CREATE TABLE IF NOT EXISTS scenes (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            product_id TEXT NOT NULL UNIQUE,
            acquired_at INTEGER NOT NULL,
            acquisition_date TEXT NOT NULL,
            cloud_coverage REAL NOT NULL CHECK (cloud_coverage >= 0 AND cloud_coverage <= 100),
            footprint TEXT NOT NULL,
            min_lon REAL NOT NULL,
            min_lat REAL NOT NULL,
            max_lon REAL NOT NULL,
            max_lat REAL NOT NULL,
            center_lon REAL NOT NULL,
            center_lat REAL NOT NULL,
            assets TEXT NOT NULL DEFAULT '{}',
            metadata TEXT NOT NULL DEFAULT '{}',
            ingested_at INTEGER NOT NULL,
            updated_at INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_scenes_acquisition_date ON scenes(acquisition_date);

        CREATE TABLE IF NOT EXISTS index_results (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            scene_id INTEGER NOT NULL REFERENCES scenes(id) ON DELETE CASCADE,
            index_type TEXT NOT NULL,
            mean REAL NOT NULL CHECK (mean >= -1 AND mean <= 1),
            min REAL NOT NULL CHECK (min >= -1 AND min <= 1),
            max REAL NOT NULL CHECK (max >= -1 AND max <= 1),
            std REAL NOT NULL CHECK (std >= 0),
            median REAL NOT NULL CHECK (median >= -1 AND median <= 1),
            category TEXT NOT NULL,
            coverage_pct REAL NOT NULL,
            quality_score REAL NOT NULL CHECK (quality_score >= 0 AND quality_score <= 1),
            quality TEXT NOT NULL CHECK (quality IN ('exact', 'approximate')),
            valid_pixels INTEGER,
            total_pixels INTEGER,
            metadata TEXT NOT NULL DEFAULT '{}',
            calculated_at INTEGER NOT NULL,
            UNIQUE (scene_id, index_type)
        );

        CREATE TABLE IF NOT EXISTS region_statistics (
            region_name TEXT NOT NULL,
            date TEXT NOT NULL,
            bbox TEXT NOT NULL,${regionColumns}
            updated_at INTEGER NOT NULL,
            PRIMARY KEY (region_name, date)
        );
        CREATE INDEX IF NOT EXISTS idx_region_statistics_date ON region_statistics(date);

        CREATE TABLE IF NOT EXISTS pipeline_runs (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            trigger TEXT NOT NULL,
            status TEXT NOT NULL CHECK (status IN ('running', 'succeeded', 'failed')),
            started_at INTEGER NOT NULL,
            finished_at INTEGER,
            scenes_found INTEGER NOT NULL DEFAULT 0,
            scenes_ingested INTEGER NOT NULL DEFAULT 0,
            scenes_processed INTEGER NOT NULL DEFAULT 0,
            errors INTEGER NOT NULL DEFAULT 0,
            error_details TEXT NOT NULL DEFAULT '[]'
        );
        -- At most one running run, enforced by storage
        CREATE UNIQUE INDEX IF NOT EXISTS idx_pipeline_runs_one_running ON pipeline_runs(status) WHERE status = 'running';
    `);
};

export const openDatabase = (file: string): Database.Database => {
    const db = new Database(file);
    if (file !== ':memory:') {
        // Enable WAL mode for better concurrency
        db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    initDB(db);
    log.info(`Initialized SQLite database at ${file}`);
    return db;
};
