import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

export function createStoreDatabase(dbPath: string): Database.Database {
    if (dbPath !== ':memory:') {
        mkdirSync(dirname(dbPath), { recursive: true })
    }
    const db = new Database(dbPath)

    db.pragma('journal_mode = WAL')
    // fsync on every commit: an acknowledged append must survive power loss
    db.pragma('synchronous = FULL')

    db.exec(`
        CREATE TABLE IF NOT EXISTS pending_measurements (
            sequence INTEGER PRIMARY KEY,
            sensor_id TEXT NOT NULL,
            wall TEXT NOT NULL,
            monotonic_ms REAL NOT NULL,
            metric_values TEXT NOT NULL,
            appended_at TEXT NOT NULL DEFAULT (datetime('now'))
        );

        CREATE TABLE IF NOT EXISTS failed_measurements (
            sequence INTEGER PRIMARY KEY,
            sensor_id TEXT NOT NULL,
            wall TEXT NOT NULL,
            monotonic_ms REAL NOT NULL,
            metric_values TEXT NOT NULL,
            reason TEXT NOT NULL,
            failed_at TEXT NOT NULL DEFAULT (datetime('now'))
        );

        CREATE TABLE IF NOT EXISTS resume_points (
            sensor_id TEXT PRIMARY KEY,
            sequence INTEGER NOT NULL,
            wall TEXT NOT NULL
        );
    `)

    return db
}
