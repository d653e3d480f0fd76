/**
 * SQLite-backed audit sink.
 */

import type Database from "better-sqlite3";
import { z } from "zod";
import { getChildLogger } from "../logging.js";
import type { AuditSink } from "../security/audit.js";
import { SECURITY_LEVELS, type SecurityEvent, THREAT_TYPES } from "../security/types.js";

const logger = getChildLogger({ module: "audit-store" });

const MetadataSchema = z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]));

const EventRowSchema = z.object({
	timestamp: z.number(),
	threat_type: z.enum(THREAT_TYPES),
	severity: z.enum(SECURITY_LEVELS),
	source_component: z.string(),
	description: z.string(),
	identifier: z.string().nullable(),
	payload_excerpt: z.string().nullable(),
	metadata: z.string().nullable(),
});

type EventRow = z.infer<typeof EventRowSchema>;

function parseMetadata(raw: string | null): SecurityEvent["metadata"] {
	if (raw === null) return undefined;
	try {
		const parsed = MetadataSchema.safeParse(JSON.parse(raw));
		return parsed.success ? Object.freeze(parsed.data) : undefined;
	} catch {
		return undefined;
	}
}

function rowToEvent(row: EventRow): SecurityEvent {
	const metadata = parseMetadata(row.metadata);
	return Object.freeze({
		timestamp: new Date(row.timestamp),
		threatType: row.threat_type,
		severity: row.severity,
		sourceComponent: row.source_component,
		description: row.description,
		...(row.identifier !== null ? { identifier: row.identifier } : {}),
		...(row.payload_excerpt !== null ? { payloadExcerpt: row.payload_excerpt } : {}),
		...(metadata ? { metadata } : {}),
	});
}

export class SqliteAuditSink implements AuditSink {
	private readonly insertStmt: Database.Statement;
	private readonly pruneStmt: Database.Statement;
	private readonly selectStmt: Database.Statement;

	constructor(private readonly db: Database.Database) {
		this.insertStmt = db.prepare(`
			INSERT INTO security_events
				(timestamp, threat_type, severity, source_component, description,
				 identifier, payload_excerpt, metadata)
			VALUES (?, ?, ?, ?, ?, ?, ?, ?)
		`);
		this.pruneStmt = db.prepare("DELETE FROM security_events WHERE timestamp < ?");
		this.selectStmt = db.prepare(`
			SELECT timestamp, threat_type, severity, source_component, description,
				identifier, payload_excerpt, metadata
			FROM security_events
			WHERE timestamp >= ?
			ORDER BY timestamp ASC, id ASC
		`);
	}

	append(event: SecurityEvent): void {
		this.insertStmt.run(
			event.timestamp.getTime(),
			event.threatType,
			event.severity,
			event.sourceComponent,
			event.description,
			event.identifier ?? null,
			event.payloadExcerpt ?? null,
			event.metadata ? JSON.stringify(event.metadata) : null,
		);
	}

	prune(before: number): number {
		const result = this.pruneStmt.run(before);
		if (result.changes > 0) {
			logger.debug({ removed: result.changes }, "pruned persisted security events");
		}
		return result.changes;
	}

	/**
	 * Persisted events at or after `since` (epoch ms), oldest first.
	 * Rows that no longer match the event shape are skipped.
	 */
	loadEvents(since = 0): SecurityEvent[] {
		const events: SecurityEvent[] = [];
		let skipped = 0;
		for (const raw of this.selectStmt.all(since)) {
			const row = EventRowSchema.safeParse(raw);
			if (row.success) {
				events.push(rowToEvent(row.data));
			} else {
				skipped++;
			}
		}
		if (skipped > 0) {
			logger.warn({ skipped }, "skipped malformed persisted security events");
		}
		return events;
	}

	count(): number {
		const row = z
			.object({ n: z.number() })
			.safeParse(this.db.prepare("SELECT COUNT(*) AS n FROM security_events").get());
		return row.success ? row.data.n : 0;
	}
}
