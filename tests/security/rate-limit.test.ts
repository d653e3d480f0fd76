/**
 * Tests for rate limiter behavior.
 *
 * Critical behaviors:
 * - A request is admitted only when every window has room
 * - Rejected and blocked requests never increment a counter
 * - Repeat violations back off progressively up to the ceiling
 */

import { describe, expect, it, vi } from "vitest";
import { BlockTable } from "../../src/security/block-table.js";
import {
	createRateLimiter,
	type RateLimitConfig,
	RateLimiter,
} from "../../src/security/rate-limit.js";

// Mock logging to avoid noise
vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

const MINUTE = 60_000;

const CONFIG: RateLimitConfig = {
	limits: { perMinute: 3, perHour: 100, perDay: 1000 },
	backoff: { baseMs: 1000, ceilingMs: 4000, cooldownMs: 10_000, stateTtlMs: MINUTE },
};

function exhaust(limiter: RateLimiter, identifier: string, now: number): void {
	for (let i = 0; i < CONFIG.limits.perMinute; i++) {
		expect(limiter.check(identifier, now).allowed).toBe(true);
	}
}

describe("RateLimiter", () => {
	describe("basic limits", () => {
		it("reports remaining capacity per window", () => {
			const limiter = new RateLimiter(CONFIG);
			expect(limiter.check("client", 0)).toEqual({
				allowed: true,
				remaining: { minute: 2, hour: 99, day: 999 },
			});
		});

		it("rejects the request that would exceed the limit and blocks", () => {
			const limiter = new RateLimiter(CONFIG);
			exhaust(limiter, "client", 0);

			expect(limiter.check("client", 0)).toEqual({
				allowed: false,
				reason: "limit_exceeded",
				window: "minute",
				retryAfterMs: 1000,
				blockedUntil: 1000,
				violationCount: 1,
				escalation: "first",
			});
			expect(limiter.usage("client", 0)).toEqual({ minute: 3, hour: 3, day: 3 });
		});

		it("fails fast while blocked without touching counters", () => {
			const limiter = new RateLimiter(CONFIG);
			exhaust(limiter, "client", 0);
			limiter.check("client", 0);

			expect(limiter.check("client", 500)).toEqual({
				allowed: false,
				reason: "blocked",
				retryAfterMs: 500,
				blockedUntil: 1000,
				violationCount: 1,
			});
			expect(limiter.usage("client", 500)).toEqual({ minute: 3, hour: 3, day: 3 });
		});

		it("names the day window when only the daily limit is hit", () => {
			const limiter = new RateLimiter({
				...CONFIG,
				limits: { perMinute: 10, perHour: 10, perDay: 2 },
			});
			limiter.check("client", 0);
			limiter.check("client", 0);

			const decision = limiter.check("client", 0);
			expect(decision.allowed).toBe(false);
			if (!decision.allowed) {
				expect(decision.window).toBe("day");
			}
		});

		it("resets a window lazily once it has elapsed", () => {
			const limiter = new RateLimiter(CONFIG);
			exhaust(limiter, "client", 0);

			expect(limiter.check("client", MINUTE)).toEqual({
				allowed: true,
				remaining: { minute: 2, hour: 96, day: 996 },
			});
		});

		it("never admits more than the limit from concurrent callers", async () => {
			const limiter = new RateLimiter({
				...CONFIG,
				limits: { perMinute: 60, perHour: 1000, perDay: 10_000 },
			});

			const decisions = await Promise.all(
				Array.from({ length: 100 }, async () => limiter.check("client", 0)),
			);

			expect(decisions.filter((d) => d.allowed)).toHaveLength(60);
		});

		it("tracks identifiers independently", () => {
			const limiter = new RateLimiter(CONFIG);
			exhaust(limiter, "a", 0);
			limiter.check("a", 0);

			expect(limiter.isBlocked("a", 0)).toBe(true);
			expect(limiter.check("b", 0).allowed).toBe(true);
		});
	});

	describe("block expiry", () => {
		it("is blocked just before the duration ends and not after", () => {
			const limiter = new RateLimiter(CONFIG);
			exhaust(limiter, "client", 0);
			limiter.check("client", 0);

			expect(limiter.isBlocked("client", 999)).toBe(true);
			expect(limiter.isBlocked("client", 1000)).toBe(false);
		});
	});

	describe("progressive backoff", () => {
		it("doubles the block for repeat violations and plateaus at the ceiling", () => {
			const limiter = new RateLimiter(CONFIG);
			exhaust(limiter, "client", 0);

			const durations: number[] = [];
			const escalations: string[] = [];
			let now = 0;
			for (let i = 0; i < 5; i++) {
				const decision = limiter.check("client", now);
				if (decision.allowed) throw new Error("expected a rejection");
				durations.push(decision.retryAfterMs);
				escalations.push(decision.escalation ?? "none");
				now = decision.blockedUntil;
			}

			expect(durations).toEqual([1000, 2000, 4000, 4000, 4000]);
			expect(escalations).toEqual(["first", "repeat", "ceiling", "ceiling", "ceiling"]);
		});

		it("starts over after the cooldown has passed", () => {
			const limiter = new RateLimiter(CONFIG);
			exhaust(limiter, "client", 0);
			limiter.check("client", 0);

			const decision = limiter.check("client", 1000 + 10_001);
			expect(decision).toMatchObject({
				allowed: false,
				reason: "limit_exceeded",
				retryAfterMs: 1000,
				violationCount: 1,
				escalation: "first",
			});
		});
	});

	describe("block table", () => {
		it("mirrors automatic blocks into the shared table", () => {
			const table = new BlockTable();
			const limiter = new RateLimiter(CONFIG, table);
			exhaust(limiter, "client", 0);
			limiter.check("client", 0);

			expect(table.latest("client", 0)).toEqual({
				identifier: "client",
				reason: "rate limit exceeded (per minute)",
				createdAt: 0,
				expiresAt: 1000,
				origin: "automatic",
			});
		});

		it("release lifts the block but keeps violation history", () => {
			const table = new BlockTable();
			const limiter = new RateLimiter(CONFIG, table);
			exhaust(limiter, "client", 0);
			limiter.check("client", 0);

			expect(limiter.release("client", 500)).toBe(true);
			expect(limiter.isBlocked("client", 500)).toBe(false);
			expect(table.isBlocked("client", 500)).toBe(false);

			expect(limiter.check("client", 500)).toMatchObject({
				reason: "limit_exceeded",
				retryAfterMs: 2000,
				violationCount: 2,
				escalation: "repeat",
			});
		});

		it("release returns false when nothing is blocked", () => {
			const limiter = new RateLimiter(CONFIG);
			expect(limiter.release("client", 0)).toBe(false);
		});
	});

	describe("state lifecycle", () => {
		it("reset forgets an identifier", () => {
			const limiter = new RateLimiter(CONFIG);
			limiter.check("client", 0);
			limiter.reset("client");

			expect(limiter.trackedCount).toBe(0);
			expect(limiter.usage("client", 0)).toEqual({ minute: 0, hour: 0, day: 0 });
		});

		it("sweeps state idle for the TTL", () => {
			const limiter = new RateLimiter(CONFIG);
			limiter.check("client", 0);

			expect(limiter.sweep(MINUTE - 1)).toBe(0);
			expect(limiter.sweep(MINUTE)).toBe(1);
			expect(limiter.trackedCount).toBe(0);
		});

		it("keeps blocked identifiers during a sweep", () => {
			const limiter = new RateLimiter({
				...CONFIG,
				backoff: { ...CONFIG.backoff, baseMs: 2 * MINUTE, ceilingMs: 4 * MINUTE },
			});
			exhaust(limiter, "client", 0);
			limiter.check("client", 0);

			expect(limiter.sweep(MINUTE)).toBe(0);
			expect(limiter.trackedCount).toBe(1);
		});
	});

	describe("createRateLimiter", () => {
		it("fills missing sections from the default policy", () => {
			const limiter = createRateLimiter({ limits: CONFIG.limits });

			expect(limiter.getConfig()).toEqual({
				limits: { perMinute: 3, perHour: 100, perDay: 1000 },
				backoff: {
					baseMs: 5 * MINUTE,
					ceilingMs: 60 * MINUTE,
					cooldownMs: 15 * MINUTE,
					stateTtlMs: 24 * 60 * MINUTE,
				},
			});
		});

		it("mirrors automatic blocks into a shared table", () => {
			const table = new BlockTable();
			const limiter = createRateLimiter(CONFIG, table);
			exhaust(limiter, "client", 0);
			limiter.check("client", 0);

			expect(table.latest("client", 0)).toMatchObject({ origin: "automatic", expiresAt: 1000 });
		});
	});
});
