/**
 * Append-only store of security events with reporting queries.
 *
 * Events are kept in memory in arrival order (which is time order, since
 * every record() runs on the event loop). An optional sink receives each
 * event as it is recorded, for persistence.
 */

import { DEFAULT_POLICY } from "../config/policy.js";
import { getChildLogger } from "../logging.js";
import {
	type PatternCategory,
	type SecurityEvent,
	type SecurityLevel,
	severityRank,
	type ThreatType,
} from "./types.js";

const logger = getChildLogger({ module: "audit" });

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export const RECOMMENDATIONS = {
	critical: "CRITICAL security events detected - immediate attention required",
	highVolume: "High number of HIGH severity events - review security configuration",
	denialOfService:
		"Multiple denial-of-service attempts detected - consider stricter rate limiting",
	injection: "Injection attempts detected - review input validation",
	none: "No significant security issues detected",
} as const;

const HIGH_EVENT_THRESHOLD = 5;
const DOS_EVENT_THRESHOLD = 10;

const INJECTION_TYPES: readonly PatternCategory[] = [
	"sql_injection",
	"xss",
	"command_injection",
	"path_traversal",
];

/**
 * Persistence collaborator. Calls are synchronous.
 */
export interface AuditSink {
	append(event: SecurityEvent): void;
	/** Delete events with a timestamp before `before` (epoch ms) */
	prune(before: number): number;
}

export type AuditLogOptions = {
	retentionDays?: number;
	maxEvents?: number;
	maxScanEvents?: number;
	sink?: AuditSink;
};

export type AuditSummary = {
	generatedAt: Date;
	periodHours: number;
	totalEvents: number;
	eventCounts: Partial<Record<ThreatType, number>>;
	severityCounts: Partial<Record<SecurityLevel, number>>;
	sourceCounts: Record<string, number>;
	recommendations: string[];
	/** True when the scan stopped at maxScanEvents before leaving the period */
	truncated: boolean;
};

export type AuditQuery = {
	threatTypes?: readonly ThreatType[];
	minSeverity?: SecurityLevel;
	identifier?: string;
	/** Case-insensitive substring of the description */
	text?: string;
	/** Only events at or after this time */
	since?: Date;
	limit?: number;
};

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
	counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Ranked recommendations for a set of counts.
 */
export function recommend(
	eventCounts: Partial<Record<ThreatType, number>>,
	severityCounts: Partial<Record<SecurityLevel, number>>,
): string[] {
	const recommendations: string[] = [];

	if ((severityCounts.critical ?? 0) > 0) {
		recommendations.push(RECOMMENDATIONS.critical);
	}
	if ((severityCounts.high ?? 0) > HIGH_EVENT_THRESHOLD) {
		recommendations.push(RECOMMENDATIONS.highVolume);
	}
	if ((eventCounts.denial_of_service ?? 0) > DOS_EVENT_THRESHOLD) {
		recommendations.push(RECOMMENDATIONS.denialOfService);
	}
	for (const type of INJECTION_TYPES) {
		if ((eventCounts[type] ?? 0) > 0) {
			recommendations.push(RECOMMENDATIONS.injection);
			break;
		}
	}

	if (recommendations.length === 0) {
		recommendations.push(RECOMMENDATIONS.none);
	}
	return recommendations;
}

export class AuditLog {
	// Ring buffer: grows by push up to maxEvents, then overwrites the oldest slot.
	// While it is still growing, head is 0.
	private slots: SecurityEvent[] = [];
	private head = 0;
	// Sequence numbers of the oldest retained event and of the next append
	private firstSeq = 0;
	private nextSeq = 0;
	private readonly retentionDays: number;
	private readonly maxEvents: number;
	private readonly maxScanEvents: number;
	private readonly sink?: AuditSink;

	constructor(options: AuditLogOptions = {}) {
		this.retentionDays = options.retentionDays ?? DEFAULT_POLICY.audit.retentionDays;
		this.maxEvents = Math.max(1, options.maxEvents ?? DEFAULT_POLICY.audit.maxEvents);
		this.maxScanEvents = options.maxScanEvents ?? DEFAULT_POLICY.audit.maxScanEvents;
		this.sink = options.sink;
	}

	get size(): number {
		return this.slots.length;
	}

	/**
	 * Append an event. The stored copy is frozen.
	 */
	record(event: SecurityEvent): SecurityEvent {
		const frozen = Object.isFrozen(event) ? event : Object.freeze({ ...event });
		if (this.append(frozen)) {
			logger.debug({ dropped: 1 }, "audit log at capacity, dropped oldest event");
		}

		if (this.sink) {
			try {
				this.sink.append(frozen);
			} catch (err) {
				logger.error({ error: String(err) }, "failed to persist security event");
			}
		}

		return frozen;
	}

	/**
	 * Restore previously persisted events, oldest first. Not forwarded to the sink.
	 */
	load(events: Iterable<SecurityEvent>): number {
		let loaded = 0;
		for (const event of events) {
			this.append(Object.isFrozen(event) ? event : Object.freeze({ ...event }));
			loaded++;
		}
		return loaded;
	}

	/** Returns true when the oldest event was overwritten. */
	private append(event: SecurityEvent): boolean {
		this.nextSeq++;
		if (this.slots.length < this.maxEvents) {
			this.slots.push(event);
			return false;
		}
		this.slots[this.head] = event;
		this.head = (this.head + 1) % this.slots.length;
		this.firstSeq++;
		return true;
	}

	/** Event with sequence number `seq`, if still retained. */
	private at(seq: number): SecurityEvent | undefined {
		if (seq < this.firstSeq || seq >= this.nextSeq) return undefined;
		return this.slots[(this.head + (seq - this.firstSeq)) % this.slots.length];
	}

	/** Retained events oldest first, compacted so head is 0. */
	private ordered(): SecurityEvent[] {
		return [...this.slots.slice(this.head), ...this.slots.slice(0, this.head)];
	}

	/**
	 * Summarize events of the last `periodHours` hours.
	 */
	report(periodHours: number, now = Date.now()): AuditSummary {
		const cutoff = now - periodHours * HOUR_MS;
		const eventCounts: Partial<Record<ThreatType, number>> = {};
		const severityCounts: Partial<Record<SecurityLevel, number>> = {};
		const sourceCounts: Record<string, number> = {};

		let totalEvents = 0;
		let scanned = 0;
		let truncated = false;

		for (let seq = this.nextSeq - 1; seq >= this.firstSeq; seq--) {
			const event = this.at(seq);
			if (event === undefined || event.timestamp.getTime() < cutoff) break;
			if (scanned >= this.maxScanEvents) {
				truncated = true;
				break;
			}
			scanned++;
			totalEvents++;
			increment(eventCounts, event.threatType);
			increment(severityCounts, event.severity);
			sourceCounts[event.sourceComponent] = (sourceCounts[event.sourceComponent] ?? 0) + 1;
		}

		return {
			generatedAt: new Date(now),
			periodHours,
			totalEvents,
			eventCounts,
			severityCounts,
			sourceCounts,
			recommendations: recommend(eventCounts, severityCounts),
			truncated,
		};
	}

	/**
	 * Matching events, newest first. Lazy; stops after maxScanEvents events
	 * have been examined.
	 */
	*search(query: AuditQuery = {}): Generator<SecurityEvent> {
		const types = query.threatTypes ? new Set(query.threatTypes) : undefined;
		const minRank = query.minSeverity ? severityRank(query.minSeverity) : 0;
		const text = query.text?.toLowerCase();
		const since = query.since?.getTime();
		const limit = query.limit ?? Number.POSITIVE_INFINITY;

		// Walk back by sequence number; stops once the walk reaches events
		// evicted or pruned while the generator was suspended
		let scanned = 0;
		let yielded = 0;

		for (let seq = this.nextSeq - 1; yielded < limit; seq--) {
			if (scanned >= this.maxScanEvents) return;
			scanned++;

			const event = this.at(seq);
			if (event === undefined) return;
			if (since !== undefined && event.timestamp.getTime() < since) return;
			if (types && !types.has(event.threatType)) continue;
			if (severityRank(event.severity) < minRank) continue;
			if (query.identifier !== undefined && event.identifier !== query.identifier) continue;
			if (text !== undefined && !event.description.toLowerCase().includes(text)) continue;

			yielded++;
			yield event;
		}
	}

	/**
	 * Delete events older than the retention period.
	 */
	prune(now = Date.now()): number {
		const cutoff = now - this.retentionDays * DAY_MS;
		const events = this.ordered();
		const firstKept = events.findIndex((e) => e.timestamp.getTime() >= cutoff);
		const removed = firstKept === -1 ? events.length : firstKept;

		if (removed > 0) {
			this.slots = events.slice(removed);
			this.head = 0;
			this.firstSeq += removed;
			logger.info({ removed, retentionDays: this.retentionDays }, "pruned expired security events");
		}

		if (this.sink) {
			try {
				this.sink.prune(cutoff);
			} catch (err) {
				logger.error({ error: String(err) }, "failed to prune persisted security events");
			}
		}

		return removed;
	}

	/**
	 * Drop every in-memory event.
	 */
	clear(): number {
		const removed = this.slots.length;
		this.slots = [];
		this.head = 0;
		this.firstSeq = this.nextSeq;
		logger.info({ removed }, "security events cleared");
		return removed;
	}
}
