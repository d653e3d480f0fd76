/**
 * Category of detected malicious or abusive behavior.
 */
export const THREAT_TYPES = [
	"sql_injection",
	"xss",
	"path_traversal",
	"command_injection",
	"malicious_input",
	"denial_of_service",
	"unauthorized_access",
	"anomalous_behavior",
] as const;
export type ThreatType = (typeof THREAT_TYPES)[number];

/**
 * Threat types the pattern library can classify text into.
 */
export type PatternCategory = Extract<
	ThreatType,
	"sql_injection" | "xss" | "path_traversal" | "command_injection"
>;

export const SECURITY_LEVELS = ["low", "medium", "high", "critical"] as const;
export type SecurityLevel = (typeof SECURITY_LEVELS)[number];

export function severityRank(level: SecurityLevel): number {
	return SECURITY_LEVELS.indexOf(level);
}

/**
 * A recorded security event. Frozen once created.
 */
export type SecurityEvent = Readonly<{
	timestamp: Date;
	threatType: ThreatType;
	severity: SecurityLevel;
	sourceComponent: string;
	description: string;
	identifier?: string;
	/** Short, already-redacted excerpt of the offending input */
	payloadExcerpt?: string;
	metadata?: Readonly<Record<string, string | number | boolean>>;
}>;

export type InputKind = "general" | "prompt" | "filename" | "url" | "api_key";

export type ValidationFailure =
	| "length_exceeded"
	| "malicious_content"
	| "path_traversal"
	| "domain_not_allowed"
	| "invalid_format";

/**
 * Outcome of validating one value. Failures are values, never exceptions.
 */
export type ValidationResult =
	| { ok: true }
	| {
			ok: false;
			failure: ValidationFailure;
			reason: string;
			/** Primary matched category for malicious content */
			threatType?: PatternCategory;
			/** Every matched category for malicious content */
			categories?: PatternCategory[];
	  };

export type RateLimitWindow = "minute" | "hour" | "day";

export type BackoffEscalation = "first" | "repeat" | "ceiling";

export type WindowUsage = Record<RateLimitWindow, number>;

/**
 * Rate limit check result.
 */
export type RateLimitDecision =
	| {
			allowed: true;
			remaining: WindowUsage;
	  }
	| {
			allowed: false;
			reason: "blocked" | "limit_exceeded";
			/** Window whose limit was exceeded (limit_exceeded only) */
			window?: RateLimitWindow;
			retryAfterMs: number;
			blockedUntil: number;
			violationCount: number;
			/** Escalation step of the block just applied (limit_exceeded only) */
			escalation?: BackoffEscalation;
	  };

export type BlockOrigin = "manual" | "automatic";

export type BlockEntry = Readonly<{
	identifier: string;
	reason: string;
	createdAt: number;
	expiresAt: number;
	origin: BlockOrigin;
}>;

/**
 * Result of asking whether an identifier may proceed.
 */
export type AccessResult =
	| { allowed: true }
	| { allowed: false; reason: string; blockedUntil: number; origin: BlockOrigin };
