import { describe, expect, it, vi } from "vitest";
import { AuditLog, type AuditSink, RECOMMENDATIONS, recommend } from "../../src/security/audit.js";
import type { SecurityEvent, SecurityLevel, ThreatType } from "../../src/security/types.js";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

function event(
	at: number,
	threatType: ThreatType,
	severity: SecurityLevel,
	extra: Partial<SecurityEvent> = {},
): SecurityEvent {
	return {
		timestamp: new Date(at),
		threatType,
		severity,
		sourceComponent: "test",
		description: `${threatType} event`,
		...extra,
	};
}

describe("recommend", () => {
	it("reports no issues for empty counts", () => {
		expect(recommend({}, {})).toEqual([RECOMMENDATIONS.none]);
	});

	it("orders recommendations by rank", () => {
		expect(
			recommend({ denial_of_service: 11, xss: 1 }, { critical: 1, high: 6 }),
		).toEqual([
			RECOMMENDATIONS.critical,
			RECOMMENDATIONS.highVolume,
			RECOMMENDATIONS.denialOfService,
			RECOMMENDATIONS.injection,
		]);
	});

	it("uses strict thresholds", () => {
		expect(recommend({ denial_of_service: 10 }, { high: 5 })).toEqual([RECOMMENDATIONS.none]);
	});

	it("adds the injection recommendation once", () => {
		expect(recommend({ sql_injection: 2, path_traversal: 1 }, { high: 3 })).toEqual([
			RECOMMENDATIONS.injection,
		]);
	});
});

describe("AuditLog", () => {
	describe("record", () => {
		it("stores frozen events", () => {
			const audit = new AuditLog();
			const stored = audit.record(event(0, "xss", "high"));

			expect(Object.isFrozen(stored)).toBe(true);
			expect(audit.size).toBe(1);
		});

		it("drops the oldest events past capacity", () => {
			const audit = new AuditLog({ maxEvents: 2 });
			audit.record(event(1, "xss", "high"));
			audit.record(event(2, "xss", "high"));
			audit.record(event(3, "sql_injection", "high"));

			expect(audit.size).toBe(2);
			expect([...audit.search()].map((e) => e.timestamp.getTime())).toEqual([3, 2]);
		});

		it("reuses its storage once at capacity", () => {
			const audit = new AuditLog({ maxEvents: 3 });
			for (let i = 0; i < 3; i++) audit.record(event(i, "xss", "high"));
			const storage = audit["slots"];

			for (let i = 3; i < 10; i++) {
				audit.record(event(i, "xss", "high"));
				expect(audit["slots"]).toBe(storage);
			}
			expect(storage).toHaveLength(3);
			expect([...audit.search()].map((e) => e.timestamp.getTime())).toEqual([9, 8, 7]);
		});

		it("reports and prunes across the wrap point", () => {
			const audit = new AuditLog({ maxEvents: 3, retentionDays: 1 });
			audit.record(event(0, "xss", "high"));
			audit.record(event(1, "xss", "high"));
			audit.record(event(2 * DAY, "sql_injection", "high"));
			audit.record(event(2 * DAY + 1, "sql_injection", "low"));

			expect(audit.report(1, 2 * DAY + 1).totalEvents).toBe(2);
			expect(audit.prune(2 * DAY + 1)).toBe(1);
			expect([...audit.search()].map((e) => e.timestamp.getTime())).toEqual([
				2 * DAY + 1,
				2 * DAY,
			]);

			audit.record(event(2 * DAY + 2, "xss", "low"));
			expect(audit.size).toBe(3);
		});

		it("ends a suspended search at events evicted meanwhile", () => {
			const audit = new AuditLog({ maxEvents: 2 });
			audit.record(event(1, "xss", "high"));
			audit.record(event(2, "xss", "high"));

			const results = audit.search();
			expect(results.next().value?.timestamp.getTime()).toBe(2);
			audit.record(event(3, "xss", "high"));
			audit.record(event(4, "xss", "high"));

			expect(results.next().done).toBe(true);
		});

		it("forwards events to the sink", () => {
			const sink: AuditSink = { append: vi.fn(), prune: vi.fn(() => 0) };
			const audit = new AuditLog({ sink });
			const stored = audit.record(event(0, "xss", "high"));

			expect(sink.append).toHaveBeenCalledWith(stored);
		});

		it("keeps recording when the sink throws", () => {
			const sink: AuditSink = {
				append: () => {
					throw new Error("disk full");
				},
				prune: () => 0,
			};
			const audit = new AuditLog({ sink });

			expect(() => audit.record(event(0, "xss", "high"))).not.toThrow();
			expect(audit.size).toBe(1);
		});

		it("does not forward loaded events to the sink", () => {
			const sink: AuditSink = { append: vi.fn(), prune: vi.fn(() => 0) };
			const audit = new AuditLog({ sink });

			expect(audit.load([event(0, "xss", "high"), event(1, "xss", "low")])).toBe(2);
			expect(audit.size).toBe(2);
			expect(sink.append).not.toHaveBeenCalled();
		});
	});

	describe("report", () => {
		it("summarizes an empty log", () => {
			const summary = new AuditLog().report(24, 0);

			expect(summary).toEqual({
				generatedAt: new Date(0),
				periodHours: 24,
				totalEvents: 0,
				eventCounts: {},
				severityCounts: {},
				sourceCounts: {},
				recommendations: [RECOMMENDATIONS.none],
				truncated: false,
			});
		});

		it("counts events inside the period only", () => {
			const audit = new AuditLog();
			const now = 10 * DAY;
			audit.record(event(now - 2 * DAY, "xss", "high"));
			audit.record(event(now - HOUR, "sql_injection", "high", { sourceComponent: "input_validator" }));
			audit.record(event(now - 1, "denial_of_service", "medium", { sourceComponent: "rate_limiter" }));

			const summary = audit.report(24, now);

			expect(summary.totalEvents).toBe(2);
			expect(summary.eventCounts).toEqual({ sql_injection: 1, denial_of_service: 1 });
			expect(summary.severityCounts).toEqual({ high: 1, medium: 1 });
			expect(summary.sourceCounts).toEqual({ input_validator: 1, rate_limiter: 1 });
			expect(summary.recommendations).toEqual([RECOMMENDATIONS.injection]);
		});

		it("flags a truncated scan", () => {
			const audit = new AuditLog({ maxScanEvents: 3 });
			for (let i = 1; i <= 5; i++) audit.record(event(i, "xss", "low"));

			const summary = audit.report(1, 10);

			expect(summary.totalEvents).toBe(3);
			expect(summary.truncated).toBe(true);
		});

		it("is not truncated when the scan limit is exactly the period size", () => {
			const audit = new AuditLog({ maxScanEvents: 3 });
			for (let i = 1; i <= 3; i++) audit.record(event(i, "xss", "low"));

			expect(audit.report(1, 10).truncated).toBe(false);
		});
	});

	describe("search", () => {
		const audit = new AuditLog();
		audit.record(event(1000, "xss", "low", { identifier: "a" }));
		audit.record(event(2000, "sql_injection", "high", { identifier: "b" }));
		audit.record(event(3000, "denial_of_service", "critical", { identifier: "a" }));
		audit.record(event(4000, "xss", "medium", { identifier: "b", description: "Script tag" }));

		const times = (events: Iterable<SecurityEvent>) =>
			[...events].map((e) => e.timestamp.getTime());

		it("returns newest first", () => {
			expect(times(audit.search())).toEqual([4000, 3000, 2000, 1000]);
		});

		it("filters by type, severity and identifier", () => {
			expect(times(audit.search({ threatTypes: ["xss"] }))).toEqual([4000, 1000]);
			expect(times(audit.search({ minSeverity: "high" }))).toEqual([3000, 2000]);
			expect(times(audit.search({ identifier: "a" }))).toEqual([3000, 1000]);
		});

		it("matches description text case-insensitively", () => {
			expect(times(audit.search({ text: "SCRIPT" }))).toEqual([4000]);
		});

		it("honors since and limit", () => {
			expect(times(audit.search({ since: new Date(2000) }))).toEqual([4000, 3000, 2000]);
			expect(times(audit.search({ limit: 1 }))).toEqual([4000]);
		});
	});

	describe("prune", () => {
		it("drops events past retention and prunes the sink", () => {
			const sink: AuditSink = { append: vi.fn(), prune: vi.fn(() => 1) };
			const audit = new AuditLog({ retentionDays: 1, sink });
			audit.record(event(0, "xss", "low"));
			audit.record(event(DAY, "xss", "low"));

			expect(audit.prune(DAY + 1)).toBe(1);
			expect(audit.size).toBe(1);
			expect(sink.prune).toHaveBeenCalledWith(1);
		});
	});

	it("clear removes every event", () => {
		const audit = new AuditLog();
		audit.record(event(0, "xss", "low"));
		audit.record(event(1, "xss", "low"));

		expect(audit.clear()).toBe(2);
		expect(audit.size).toBe(0);
	});
});
