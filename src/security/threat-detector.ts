/**
 * Turns validator, limiter and access signals into classified security events.
 *
 * Every event is written to the audit log (when one is attached) and to the
 * process logger before the emitting call returns.
 */

import { DEFAULT_POLICY } from "../config/policy.js";
import { getChildLogger } from "../logging.js";
import { truncate } from "../utils.js";
import type { AuditLog } from "./audit.js";
import { redactInline } from "./sanitizer.js";
import type {
	BackoffEscalation,
	BlockOrigin,
	InputKind,
	RateLimitDecision,
	SecurityEvent,
	SecurityLevel,
	ThreatType,
	ValidationResult,
} from "./types.js";

const logger = getChildLogger({ module: "threat-detector" });

const HOUR_MS = 60 * 60 * 1000;

export const MAX_EXCERPT_LENGTH = 120;

/** Activity name whose volume is also watched outside working hours */
export const API_CALL_ACTIVITY = "api_call";
export const DEFAULT_OFF_HOURS_THRESHOLD = 10;

// Local hours 23:00-05:59
function isOffHours(now: number): boolean {
	const hour = new Date(now).getHours();
	return hour < 6 || hour > 22;
}

export type ThreatDetectorOptions = {
	audit?: AuditLog;
	errorWindow?: number;
	errorRateThreshold?: number;
	activityThreshold?: number;
	/** API calls per hour tolerated during off hours */
	offHoursThreshold?: number;
};

type EventInput = {
	threatType: ThreatType;
	severity: SecurityLevel;
	sourceComponent: string;
	description: string;
	identifier?: string;
	payloadExcerpt?: string;
	metadata?: Record<string, string | number | boolean>;
};

type ErrorRateState = {
	outcomes: boolean[];
	flagged: boolean;
	lastSeen: number;
};

type ActivityState = {
	timestamps: number[];
	lastFlaggedAt: number;
	lastOffHoursFlaggedAt: number;
};

type FailedValidation = Extract<ValidationResult, { ok: false }>;

const ESCALATION_SEVERITY: Readonly<Record<BackoffEscalation, SecurityLevel>> = {
	first: "medium",
	repeat: "high",
	ceiling: "critical",
};

function recentlyFlagged(flaggedAt: number, now: number): boolean {
	return flaggedAt !== 0 && now - flaggedAt < HOUR_MS;
}

/**
 * Short, redacted excerpt of untrusted input for event records.
 */
export function excerpt(value: string): string {
	return truncate(redactInline(value), MAX_EXCERPT_LENGTH);
}

function classifyValidationFailure(result: FailedValidation): {
	threatType: ThreatType;
	severity: SecurityLevel;
} {
	switch (result.failure) {
		case "malicious_content":
			return { threatType: result.threatType ?? "malicious_input", severity: "high" };
		case "path_traversal":
			return { threatType: "path_traversal", severity: "high" };
		case "domain_not_allowed":
			return { threatType: "unauthorized_access", severity: "high" };
		case "length_exceeded":
		case "invalid_format":
			return { threatType: "malicious_input", severity: "medium" };
	}
}

export class ThreatDetector {
	private readonly audit?: AuditLog;
	private readonly errorWindow: number;
	private readonly errorRateThreshold: number;
	private readonly activityThreshold: number;
	private readonly offHoursThreshold: number;
	private readonly errorRates = new Map<string, ErrorRateState>();
	private readonly activities = new Map<string, ActivityState>();

	constructor(options: ThreatDetectorOptions = {}) {
		this.audit = options.audit;
		this.errorWindow = options.errorWindow ?? DEFAULT_POLICY.detection.errorWindow;
		this.errorRateThreshold =
			options.errorRateThreshold ?? DEFAULT_POLICY.detection.errorRateThreshold;
		this.activityThreshold = options.activityThreshold ?? DEFAULT_POLICY.detection.activityThreshold;
		this.offHoursThreshold = options.offHoursThreshold ?? DEFAULT_OFF_HOURS_THRESHOLD;
	}

	/**
	 * Record a classified event.
	 */
	emit(input: EventInput, now = Date.now()): SecurityEvent {
		const event: SecurityEvent = Object.freeze({
			timestamp: new Date(now),
			...input,
			...(input.metadata ? { metadata: Object.freeze({ ...input.metadata }) } : {}),
		});

		const fields = {
			threatType: event.threatType,
			severity: event.severity,
			source: event.sourceComponent,
			identifier: event.identifier,
		};
		if (event.severity === "critical") {
			logger.error(fields, event.description);
		} else {
			logger.warn(fields, event.description);
		}

		this.audit?.record(event);
		return event;
	}

	onValidationFailure(
		result: FailedValidation,
		context: { kind: InputKind; value?: string; identifier?: string },
		now = Date.now(),
	): SecurityEvent {
		const { threatType, severity } = classifyValidationFailure(result);
		const metadata: Record<string, string | number | boolean> = {
			kind: context.kind,
			failure: result.failure,
		};
		if (result.categories && result.categories.length > 0) {
			metadata.categories = result.categories.join(",");
		}

		// API keys never reach an event, even redacted
		const payloadExcerpt =
			context.value !== undefined && context.kind !== "api_key"
				? excerpt(context.value)
				: undefined;

		return this.emit(
			{
				threatType,
				severity,
				sourceComponent: "input_validator",
				description: `Input validation failed: ${result.reason}`,
				identifier: context.identifier,
				payloadExcerpt,
				metadata,
			},
			now,
		);
	}

	/**
	 * Event for a request that was just blocked for exceeding a limit.
	 * Decisions that only report an existing block produce no event here.
	 */
	onRateLimitBlock(
		identifier: string,
		decision: RateLimitDecision,
		now = Date.now(),
	): SecurityEvent | undefined {
		if (decision.allowed || decision.reason !== "limit_exceeded") return undefined;

		const escalation = decision.escalation ?? "first";
		const metadata: Record<string, string | number | boolean> = {
			violationCount: decision.violationCount,
			blockMs: decision.retryAfterMs,
			escalation,
		};
		if (decision.window) metadata.window = decision.window;

		return this.emit(
			{
				threatType: "denial_of_service",
				severity: ESCALATION_SEVERITY[escalation],
				sourceComponent: "rate_limiter",
				description: `Rate limit exceeded (per ${decision.window ?? "window"})`,
				identifier,
				metadata,
			},
			now,
		);
	}

	onAccessDenied(
		identifier: string,
		reason: string,
		origin: BlockOrigin,
		now = Date.now(),
	): SecurityEvent {
		return this.emit(
			{
				threatType: "unauthorized_access",
				severity: "medium",
				sourceComponent: "access_controller",
				description: `Blocked identifier denied: ${reason}`,
				identifier,
				metadata: { origin },
			},
			now,
		);
	}

	onManualBlock(
		identifier: string,
		reason: string,
		durationMs: number,
		now = Date.now(),
	): SecurityEvent {
		return this.emit(
			{
				threatType: "unauthorized_access",
				severity: "high",
				sourceComponent: "manual_block",
				description: `Identifier manually blocked: ${reason}`,
				identifier,
				metadata: { blockMs: durationMs },
			},
			now,
		);
	}

	/**
	 * Track one request outcome for the rolling error rate. Reports once when
	 * the rate first rises above the threshold over a full window, and again
	 * only after it has dropped back.
	 */
	recordOutcome(identifier: string, success: boolean, now = Date.now()): SecurityEvent | undefined {
		let state = this.errorRates.get(identifier);
		if (!state) {
			state = { outcomes: [], flagged: false, lastSeen: now };
			this.errorRates.set(identifier, state);
		}
		state.lastSeen = now;
		state.outcomes.push(!success);
		if (state.outcomes.length > this.errorWindow) {
			state.outcomes.shift();
		}

		if (state.outcomes.length < this.errorWindow) return undefined;

		const errors = state.outcomes.filter(Boolean).length;
		const rate = errors / state.outcomes.length;

		if (rate <= this.errorRateThreshold) {
			state.flagged = false;
			return undefined;
		}
		if (state.flagged) return undefined;

		state.flagged = true;
		const percent = Math.round(rate * 100);
		return this.emit(
			{
				threatType: "anomalous_behavior",
				severity: "medium",
				sourceComponent: "threat_detector",
				description: `High error rate detected: ${percent}% of last ${this.errorWindow} requests failed`,
				identifier,
				metadata: { errorRate: rate, window: this.errorWindow },
			},
			now,
		);
	}

	/**
	 * Count one occurrence of `activity` for an identifier. More than the
	 * threshold within an hour is reported, at most once per hour. API calls
	 * are also reported, as unauthorized access, when more than
	 * offHoursThreshold arrive within an hour during local off hours.
	 */
	recordActivity(activity: string, identifier: string, now = Date.now()): SecurityEvent | undefined {
		const key = `${identifier}\u0000${activity}`;
		let state = this.activities.get(key);
		if (!state) {
			state = { timestamps: [], lastFlaggedAt: 0, lastOffHoursFlaggedAt: 0 };
			this.activities.set(key, state);
		}

		const cutoff = now - HOUR_MS;
		state.timestamps = state.timestamps.filter((t) => t > cutoff);
		state.timestamps.push(now);
		// Only "more than a threshold" matters, so older entries beyond that are dropped
		if (state.timestamps.length > Math.max(this.activityThreshold, this.offHoursThreshold) + 1) {
			state.timestamps.shift();
		}

		const count = state.timestamps.length;
		if (count > this.activityThreshold && !recentlyFlagged(state.lastFlaggedAt, now)) {
			state.lastFlaggedAt = now;
			return this.emit(
				{
					threatType: "denial_of_service",
					severity: "high",
					sourceComponent: "threat_detector",
					description: `High frequency ${activity} detected: more than ${this.activityThreshold} in the last hour`,
					identifier,
					metadata: { activity, threshold: this.activityThreshold },
				},
				now,
			);
		}

		if (
			activity === API_CALL_ACTIVITY &&
			count > this.offHoursThreshold &&
			isOffHours(now) &&
			!recentlyFlagged(state.lastOffHoursFlaggedAt, now)
		) {
			state.lastOffHoursFlaggedAt = now;
			return this.emit(
				{
					threatType: "unauthorized_access",
					severity: "medium",
					sourceComponent: "threat_detector",
					description: `Unusual time ${activity} activity: more than ${this.offHoursThreshold} in the last hour`,
					identifier,
					metadata: {
						activity,
						hour: new Date(now).getHours(),
						threshold: this.offHoursThreshold,
					},
				},
				now,
			);
		}

		return undefined;
	}

	/**
	 * Drop tracking state idle for longer than `idleMs`.
	 */
	sweep(idleMs: number, now = Date.now()): number {
		let removed = 0;
		for (const [identifier, state] of this.errorRates) {
			if (now - state.lastSeen >= idleMs) {
				this.errorRates.delete(identifier);
				removed++;
			}
		}
		for (const [key, state] of this.activities) {
			const last = state.timestamps[state.timestamps.length - 1] ?? 0;
			if (
				now - last >= HOUR_MS &&
				!recentlyFlagged(state.lastFlaggedAt, now) &&
				!recentlyFlagged(state.lastOffHoursFlaggedAt, now)
			) {
				this.activities.delete(key);
				removed++;
			}
		}
		return removed;
	}
}
