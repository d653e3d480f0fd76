/**
 * In-memory rate limiter with progressive blocking.
 *
 * Each identifier has three fixed windows (minute, hour, day) that reset
 * lazily on the first check after they elapse. A request is admitted only
 * when every window has room; otherwise nothing is counted, the request is
 * rejected and the identifier is blocked. Repeat offenders within the
 * cooldown get a doubled block, capped at the ceiling.
 *
 * State is keyed per identifier and every check runs to completion on the
 * event loop, so checks for different identifiers never wait on each other.
 */

import { type BackoffPolicy, DEFAULT_POLICY, type WindowLimits } from "../config/policy.js";
import { getChildLogger } from "../logging.js";
import type { BlockTable } from "./block-table.js";
import type {
	BackoffEscalation,
	RateLimitDecision,
	RateLimitWindow,
	WindowUsage,
} from "./types.js";

const logger = getChildLogger({ module: "rate-limit" });

// Window durations in milliseconds
const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

export const WINDOW_DURATIONS: Readonly<Record<RateLimitWindow, number>> = Object.freeze({
	minute: MINUTE_MS,
	hour: HOUR_MS,
	day: DAY_MS,
});

const WINDOWS: readonly RateLimitWindow[] = ["minute", "hour", "day"];

/**
 * Rate limiter configuration.
 */
export type RateLimitConfig = {
	limits: WindowLimits;
	backoff: BackoffPolicy;
};

type WindowState = {
	count: number;
	start: number;
};

export type RateLimitState = {
	windows: Record<RateLimitWindow, WindowState>;
	/** 0 when not blocked */
	blockedUntil: number;
	/** Duration of the most recent block */
	lastBlockMs: number;
	/** When the most recent block ended (or was released) */
	lastBlockEndedAt: number;
	violationCount: number;
	lastSeen: number;
};

function limitFor(limits: WindowLimits, window: RateLimitWindow): number {
	switch (window) {
		case "minute":
			return limits.perMinute;
		case "hour":
			return limits.perHour;
		case "day":
			return limits.perDay;
	}
}

export class RateLimiter {
	private readonly config: RateLimitConfig;
	private readonly states = new Map<string, RateLimitState>();
	private readonly blockTable?: BlockTable;

	constructor(config: Partial<RateLimitConfig> = {}, blockTable?: BlockTable) {
		this.config = {
			limits: { ...(config.limits ?? DEFAULT_POLICY.rateLimits) },
			backoff: { ...(config.backoff ?? DEFAULT_POLICY.backoff) },
		};
		this.blockTable = blockTable;
	}

	/**
	 * Count one request for `identifier` if every window has room.
	 */
	check(identifier: string, now = Date.now()): RateLimitDecision {
		const state = this.stateFor(identifier, now);
		state.lastSeen = now;

		if (state.blockedUntil > now) {
			return {
				allowed: false,
				reason: "blocked",
				retryAfterMs: state.blockedUntil - now,
				blockedUntil: state.blockedUntil,
				violationCount: state.violationCount,
			};
		}

		if (state.blockedUntil !== 0) {
			state.lastBlockEndedAt = state.blockedUntil;
			state.blockedUntil = 0;
			logger.debug({ identifier }, "rate limit block expired");
		}

		for (const window of WINDOWS) {
			const w = state.windows[window];
			if (now - w.start >= WINDOW_DURATIONS[window]) {
				w.count = 0;
				w.start = now;
			}
		}

		const exceeded = WINDOWS.find(
			(window) => state.windows[window].count + 1 > limitFor(this.config.limits, window),
		);
		if (exceeded) {
			return this.block(identifier, state, exceeded, now);
		}

		for (const window of WINDOWS) {
			state.windows[window].count++;
		}

		return { allowed: true, remaining: this.remaining(state) };
	}

	private block(
		identifier: string,
		state: RateLimitState,
		window: RateLimitWindow,
		now: number,
	): RateLimitDecision {
		const { baseMs, ceilingMs, cooldownMs } = this.config.backoff;

		const escalate =
			state.violationCount > 0 &&
			state.lastBlockEndedAt > 0 &&
			now - state.lastBlockEndedAt <= cooldownMs;

		const violationCount = escalate ? state.violationCount + 1 : 1;
		const durationMs = escalate
			? Math.min(state.lastBlockMs * 2, ceilingMs)
			: Math.min(baseMs, ceilingMs);

		let escalation: BackoffEscalation = "repeat";
		if (violationCount === 1) {
			escalation = "first";
		} else if (durationMs >= ceilingMs) {
			escalation = "ceiling";
		}

		state.violationCount = violationCount;
		state.lastBlockMs = durationMs;
		state.blockedUntil = now + durationMs;

		this.blockTable?.put(
			identifier,
			"automatic",
			`rate limit exceeded (per ${window})`,
			durationMs,
			now,
		);

		logger.warn(
			{ identifier, window, durationMs, violationCount, escalation },
			"rate limit exceeded - identifier blocked",
		);

		return {
			allowed: false,
			reason: "limit_exceeded",
			window,
			retryAfterMs: durationMs,
			blockedUntil: state.blockedUntil,
			violationCount,
			escalation,
		};
	}

	private stateFor(identifier: string, now: number): RateLimitState {
		let state = this.states.get(identifier);
		if (!state) {
			state = {
				windows: {
					minute: { count: 0, start: now },
					hour: { count: 0, start: now },
					day: { count: 0, start: now },
				},
				blockedUntil: 0,
				lastBlockMs: 0,
				lastBlockEndedAt: 0,
				violationCount: 0,
				lastSeen: now,
			};
			this.states.set(identifier, state);
		}
		return state;
	}

	private remaining(state: RateLimitState): WindowUsage {
		const limits = this.config.limits;
		return {
			minute: Math.max(0, limits.perMinute - state.windows.minute.count),
			hour: Math.max(0, limits.perHour - state.windows.hour.count),
			day: Math.max(0, limits.perDay - state.windows.day.count),
		};
	}

	/**
	 * Whether the identifier is currently under a rate-limit block.
	 */
	isBlocked(identifier: string, now = Date.now()): boolean {
		const state = this.states.get(identifier);
		return state !== undefined && state.blockedUntil > now;
	}

	/**
	 * End an active rate-limit block early. Violation history is kept, so a
	 * new violation within the cooldown still escalates.
	 */
	release(identifier: string, now = Date.now()): boolean {
		this.blockTable?.remove(identifier, "automatic");
		const state = this.states.get(identifier);
		if (!state || state.blockedUntil <= now) return false;
		state.blockedUntil = 0;
		state.lastBlockEndedAt = now;
		logger.info({ identifier }, "rate limit block released");
		return true;
	}

	/**
	 * Forget all state for an identifier.
	 */
	reset(identifier: string): void {
		this.states.delete(identifier);
		this.blockTable?.remove(identifier, "automatic");
		logger.info({ identifier }, "rate limits reset for identifier");
	}

	/**
	 * Current counts per window, as the next check would see them.
	 */
	usage(identifier: string, now = Date.now()): WindowUsage {
		const state = this.states.get(identifier);
		const usage: WindowUsage = { minute: 0, hour: 0, day: 0 };
		if (!state) return usage;
		for (const window of WINDOWS) {
			const w = state.windows[window];
			usage[window] = now - w.start >= WINDOW_DURATIONS[window] ? 0 : w.count;
		}
		return usage;
	}

	/**
	 * Number of identifiers with tracked state.
	 */
	get trackedCount(): number {
		return this.states.size;
	}

	/**
	 * Get the current rate limit configuration.
	 */
	getConfig(): RateLimitConfig {
		return this.config;
	}

	/**
	 * Drop state for identifiers idle longer than the state TTL.
	 * Blocked identifiers are kept until their block ends.
	 */
	sweep(now = Date.now()): number {
		let removed = 0;
		for (const [identifier, state] of this.states) {
			if (state.blockedUntil > now) continue;
			if (now - state.lastSeen >= this.config.backoff.stateTtlMs) {
				this.states.delete(identifier);
				removed++;
			}
		}
		if (removed > 0) {
			logger.debug({ removed }, "cleaned idle rate limit state");
		}
		return removed;
	}
}

/**
 * Create a rate limiter from config.
 */
export function createRateLimiter(
	config?: Partial<RateLimitConfig>,
	blockTable?: BlockTable,
): RateLimiter {
	return new RateLimiter(config, blockTable);
}
