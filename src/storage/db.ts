/**
 * SQLite storage layer for persisted security events.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { getChildLogger } from "../logging.js";
import { CONFIG_DIR } from "../utils.js";

const logger = getChildLogger({ module: "storage" });

export const DEFAULT_DB_FILE = path.join(CONFIG_DIR, "audit.db");
export const MEMORY_DB = ":memory:";

const SCHEMA_VERSION = 1;

const VersionRowSchema = z.object({ version: z.number().int() });

/**
 * Open a database in WAL mode and bring its schema up to date.
 * File-backed databases get owner-only permissions.
 */
export function openDb(file: string = DEFAULT_DB_FILE): Database.Database {
	if (file === MEMORY_DB) {
		const db = new Database(MEMORY_DB);
		migrate(db);
		return db;
	}

	const dbDir = path.dirname(file);
	fs.mkdirSync(dbDir, { recursive: true, mode: 0o700 });

	const db = new Database(file);

	try {
		fs.chmodSync(file, 0o600);
	} catch {
		logger.warn({ path: file }, "could not set database file permissions to 0600");
	}

	db.pragma("journal_mode = WAL");
	migrate(db);

	logger.info({ path: file }, "database initialized");
	return db;
}

/**
 * Run database migrations.
 */
export function migrate(database: Database.Database): void {
	database.exec(`
		CREATE TABLE IF NOT EXISTS schema_version (
			version INTEGER PRIMARY KEY
		)
	`);

	const row = VersionRowSchema.safeParse(
		database.prepare("SELECT version FROM schema_version LIMIT 1").get(),
	);
	const currentVersion = row.success ? row.data.version : 0;

	if (currentVersion >= SCHEMA_VERSION) {
		return;
	}

	logger.info({ from: currentVersion, to: SCHEMA_VERSION }, "running migrations");

	// Migration 1: security events
	if (currentVersion < 1) {
		database.exec(`
			CREATE TABLE IF NOT EXISTS security_events (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				timestamp INTEGER NOT NULL,
				threat_type TEXT NOT NULL,
				severity TEXT NOT NULL,
				source_component TEXT NOT NULL,
				description TEXT NOT NULL,
				identifier TEXT,
				payload_excerpt TEXT,
				metadata TEXT
			);
			CREATE INDEX IF NOT EXISTS idx_security_events_timestamp ON security_events(timestamp);
			CREATE INDEX IF NOT EXISTS idx_security_events_identifier ON security_events(identifier);
		`);
	}

	database.prepare("DELETE FROM schema_version").run();
	database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);

	logger.info({ version: SCHEMA_VERSION }, "migrations complete");
}
