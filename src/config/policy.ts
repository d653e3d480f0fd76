/**
 * Default-policy table and tolerant policy resolution.
 *
 * Every tunable of the engine has exactly one default here. Resolution never
 * throws: a missing value takes its default silently, an invalid value takes
 * its default and produces a warning for the caller to log. Availability of
 * the host wins over strict enforcement of a broken configuration.
 */

import { z } from "zod";

export type FeatureFlags = {
	rateLimiting: boolean;
	inputValidation: boolean;
	threatDetection: boolean;
	auditLogging: boolean;
};

export type WindowLimits = {
	perMinute: number;
	perHour: number;
	perDay: number;
};

export type BackoffPolicy = {
	/** Block duration for a first violation */
	baseMs: number;
	/** Upper bound for progressive backoff */
	ceilingMs: number;
	/** A violation this soon after the previous block ended escalates */
	cooldownMs: number;
	/** Idle rate-limit state older than this is garbage-collected */
	stateTtlMs: number;
};

export type DetectionPolicy = {
	/** Number of recent outcomes in the rolling error-rate window */
	errorWindow: number;
	/** Error rate above which an anomaly is reported */
	errorRateThreshold: number;
	/** Activities of one type per identifier per hour before flagging */
	activityThreshold: number;
};

export type AuditPolicy = {
	retentionDays: number;
	maxEvents: number;
	maxScanEvents: number;
	/** SQLite file for persisted events; in-memory only when unset */
	dbFile?: string;
};

export type SanitizerPolicy = {
	maxDepth: number;
	extraSensitiveKeys: string[];
};

export type ValidationPolicy = {
	maxScanLength: number;
	maxFileSizeBytes: number;
	allowedExtensions: string[];
};

export type SecurityPolicy = {
	features: FeatureFlags;
	rateLimits: WindowLimits;
	backoff: BackoffPolicy;
	allowedDomains: string[];
	detection: DetectionPolicy;
	audit: AuditPolicy;
	sanitizer: SanitizerPolicy;
	validation: ValidationPolicy;
	manualBlockMs: number;
	maintenanceIntervalMs: number;
};

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export const DEFAULT_POLICY: Readonly<SecurityPolicy> = Object.freeze({
	features: {
		rateLimiting: true,
		inputValidation: true,
		threatDetection: true,
		auditLogging: true,
	},
	rateLimits: {
		perMinute: 60,
		perHour: 1000,
		perDay: 10000,
	},
	backoff: {
		baseMs: 5 * MINUTE_MS,
		ceilingMs: HOUR_MS,
		cooldownMs: 15 * MINUTE_MS,
		stateTtlMs: 24 * HOUR_MS,
	},
	allowedDomains: [
		"api.openai.com",
		"api.z.ai",
		"context7.com",
		"jina.ai",
		"tavily.com",
		"api.github.com",
		"github.com",
		"supabase.com",
	],
	detection: {
		errorWindow: 10,
		errorRateThreshold: 0.5,
		activityThreshold: 100,
	},
	audit: {
		retentionDays: 90,
		maxEvents: 10000,
		maxScanEvents: 10000,
	},
	sanitizer: {
		maxDepth: 20,
		extraSensitiveKeys: [],
	},
	validation: {
		maxScanLength: 100_000,
		maxFileSizeBytes: 50 * 1024 * 1024,
		allowedExtensions: [
			".txt",
			".md",
			".json",
			".yaml",
			".yml",
			".csv",
			".jpg",
			".jpeg",
			".png",
			".gif",
			".webp",
			".pdf",
			".doc",
			".docx",
		],
	},
	manualBlockMs: 24 * HOUR_MS,
	maintenanceIntervalMs: 5 * MINUTE_MS,
});

export type PolicyResolution = {
	policy: SecurityPolicy;
	warnings: string[];
};

const PositiveInt = z.number().int().positive();
const PositiveMs = z.number().finite().positive();
const Flag = z.boolean();
const StringList = z.array(z.string().min(1));

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(
	raw: Record<string, unknown> | undefined,
	name: string,
	warnings: string[],
): Record<string, unknown> | undefined {
	const value = raw?.[name];
	if (value === undefined) return undefined;
	if (isRecord(value)) return value;
	warnings.push(`security.${name}: expected an object, using defaults`);
	return undefined;
}

function field<T>(
	value: unknown,
	path: string,
	schema: z.ZodType<T>,
	fallback: T,
	warnings: string[],
): T {
	if (value === undefined) return fallback;
	const parsed = schema.safeParse(value);
	if (parsed.success) return parsed.data;
	const message = parsed.error.issues[0]?.message ?? "invalid value";
	warnings.push(`security.${path}: ${message}, using default ${JSON.stringify(fallback)}`);
	return fallback;
}

/**
 * Resolve a raw `security` config section against the default-policy table.
 */
export function resolvePolicy(raw: unknown): PolicyResolution {
	const warnings: string[] = [];
	const d = DEFAULT_POLICY;

	let root: Record<string, unknown> | undefined;
	if (isRecord(raw)) {
		root = raw;
	} else if (raw !== undefined && raw !== null) {
		warnings.push("security: expected an object, using defaults");
	}

	// Reader for one section: `read(key, schema, fallback)`
	const reader =
		(sec: Record<string, unknown> | undefined, prefix?: string) =>
		<T>(key: string, schema: z.ZodType<T>, fallback: T): T =>
			field(sec?.[key], prefix ? `${prefix}.${key}` : key, schema, fallback, warnings);

	const top = reader(root);
	const features = reader(section(root, "features", warnings), "features");
	const limits = reader(section(root, "rateLimits", warnings), "rateLimits");
	const backoff = reader(section(root, "backoff", warnings), "backoff");
	const detection = reader(section(root, "detection", warnings), "detection");
	const audit = reader(section(root, "audit", warnings), "audit");
	const sanitizer = reader(section(root, "sanitizer", warnings), "sanitizer");
	const validation = reader(section(root, "validation", warnings), "validation");

	const policy: SecurityPolicy = {
		features: {
			rateLimiting: features("rateLimiting", Flag, d.features.rateLimiting),
			inputValidation: features("inputValidation", Flag, d.features.inputValidation),
			threatDetection: features("threatDetection", Flag, d.features.threatDetection),
			auditLogging: features("auditLogging", Flag, d.features.auditLogging),
		},
		rateLimits: {
			perMinute: limits("perMinute", PositiveInt, d.rateLimits.perMinute),
			perHour: limits("perHour", PositiveInt, d.rateLimits.perHour),
			perDay: limits("perDay", PositiveInt, d.rateLimits.perDay),
		},
		backoff: {
			baseMs: backoff("baseMs", PositiveMs, d.backoff.baseMs),
			ceilingMs: backoff("ceilingMs", PositiveMs, d.backoff.ceilingMs),
			cooldownMs: backoff("cooldownMs", z.number().finite().nonnegative(), d.backoff.cooldownMs),
			stateTtlMs: backoff("stateTtlMs", PositiveMs, d.backoff.stateTtlMs),
		},
		allowedDomains: top("allowedDomains", StringList, [...d.allowedDomains]),
		detection: {
			errorWindow: detection("errorWindow", PositiveInt, d.detection.errorWindow),
			errorRateThreshold: detection(
				"errorRateThreshold",
				z.number().min(0).max(1),
				d.detection.errorRateThreshold,
			),
			activityThreshold: detection("activityThreshold", PositiveInt, d.detection.activityThreshold),
		},
		audit: {
			retentionDays: audit("retentionDays", z.number().finite().positive(), d.audit.retentionDays),
			maxEvents: audit("maxEvents", PositiveInt, d.audit.maxEvents),
			maxScanEvents: audit("maxScanEvents", PositiveInt, d.audit.maxScanEvents),
			dbFile: audit("dbFile", z.string().min(1).optional(), undefined),
		},
		sanitizer: {
			maxDepth: sanitizer("maxDepth", PositiveInt, d.sanitizer.maxDepth),
			extraSensitiveKeys: sanitizer("extraSensitiveKeys", StringList, []),
		},
		validation: {
			maxScanLength: validation("maxScanLength", PositiveInt, d.validation.maxScanLength),
			maxFileSizeBytes: validation("maxFileSizeBytes", PositiveInt, d.validation.maxFileSizeBytes),
			allowedExtensions: validation("allowedExtensions", StringList, [
				...d.validation.allowedExtensions,
			]),
		},
		manualBlockMs: top("manualBlockMs", PositiveMs, d.manualBlockMs),
		maintenanceIntervalMs: top("maintenanceIntervalMs", PositiveMs, d.maintenanceIntervalMs),
	};

	if (policy.backoff.ceilingMs < policy.backoff.baseMs) {
		warnings.push(
			`security.backoff.ceilingMs (${policy.backoff.ceilingMs}) is below baseMs, using baseMs`,
		);
		policy.backoff.ceilingMs = policy.backoff.baseMs;
	}

	return { policy, warnings };
}

const RateLimitEnvSchema = z
	.object({
		perMinute: PositiveInt.optional(),
		perHour: PositiveInt.optional(),
		perDay: PositiveInt.optional(),
		requests_per_minute: PositiveInt.optional(),
		requests_per_hour: PositiveInt.optional(),
		requests_per_day: PositiveInt.optional(),
	})
	.strict();

function parseEnvFlag(value: string): boolean | undefined {
	const normalized = value.trim().toLowerCase();
	if (["true", "1", "yes", "on"].includes(normalized)) return true;
	if (["false", "0", "no", "off"].includes(normalized)) return false;
	return undefined;
}

const ENV_FLAGS: ReadonlyArray<[string, keyof FeatureFlags]> = [
	["HARDLINE_RATE_LIMITING", "rateLimiting"],
	["HARDLINE_INPUT_VALIDATION", "inputValidation"],
	["HARDLINE_THREAT_DETECTION", "threatDetection"],
	["HARDLINE_AUDIT_LOGGING", "auditLogging"],
];

/**
 * Apply environment overrides on top of a resolved policy.
 *
 * HARDLINE_ALLOWED_DOMAINS extends the allowlist; it never replaces it.
 */
export function applyEnvOverrides(
	resolution: PolicyResolution,
	env: NodeJS.ProcessEnv = process.env,
): PolicyResolution {
	const { policy, warnings } = resolution;
	const next: SecurityPolicy = {
		...policy,
		features: { ...policy.features },
		rateLimits: { ...policy.rateLimits },
		allowedDomains: [...policy.allowedDomains],
	};
	const nextWarnings = [...warnings];

	for (const [name, flag] of ENV_FLAGS) {
		const value = env[name];
		if (value === undefined || value === "") continue;
		const parsed = parseEnvFlag(value);
		if (parsed === undefined) {
			nextWarnings.push(`${name}: expected true/false, got "${value}"; ignoring`);
			continue;
		}
		next.features[flag] = parsed;
	}

	const domains = env.HARDLINE_ALLOWED_DOMAINS;
	if (domains) {
		for (const domain of domains.split(",")) {
			const trimmed = domain.trim();
			if (trimmed) next.allowedDomains.push(trimmed);
		}
	}

	const limits = env.HARDLINE_RATE_LIMIT;
	if (limits) {
		let raw: unknown;
		try {
			raw = JSON.parse(limits);
		} catch {
			raw = undefined;
		}
		const parsed = RateLimitEnvSchema.safeParse(raw);
		if (parsed.success) {
			const l = parsed.data;
			next.rateLimits = {
				perMinute: l.perMinute ?? l.requests_per_minute ?? next.rateLimits.perMinute,
				perHour: l.perHour ?? l.requests_per_hour ?? next.rateLimits.perHour,
				perDay: l.perDay ?? l.requests_per_day ?? next.rateLimits.perDay,
			};
		} else {
			nextWarnings.push("HARDLINE_RATE_LIMIT: expected a JSON object of positive limits; ignoring");
		}
	}

	return { policy: next, warnings: nextWarnings };
}
