/**
 * Redaction of sensitive data before it is logged or exported.
 *
 * Works on copies: the caller's structure is never modified. Every
 * replacement is a fixed point, so sanitizing twice gives the same result
 * as sanitizing once.
 */

import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "sanitizer" });

export const REDACTION_MARKER = "***REDACTED***";
export const TRUNCATION_MARKER = "[TRUNCATED]";
export const DEFAULT_MAX_DEPTH = 20;

export type SanitizationRule = Readonly<{
	/** Case-folded substring matched against key names */
	keyPattern: string;
	marker: string;
}>;

export const DEFAULT_SENSITIVE_KEYS = [
	"token",
	"key",
	"password",
	"secret",
	"credential",
	"auth",
] as const;

export const DEFAULT_RULES: readonly SanitizationRule[] = Object.freeze(
	DEFAULT_SENSITIVE_KEYS.map((keyPattern) => ({ keyPattern, marker: REDACTION_MARKER })),
);

type InlinePattern = {
	name: string;
	pattern: RegExp;
	replacement: string;
};

// Secrets embedded in free text. None of the replacements can be matched
// again by its own pattern.
const INLINE_PATTERNS: readonly InlinePattern[] = [
	{
		name: "openai_key",
		pattern: /\bsk-[A-Za-z0-9_-]{20,}/g,
		replacement: "sk-***REDACTED***",
	},
	{
		name: "bearer",
		pattern: /\bBearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
		replacement: "Bearer ***REDACTED***",
	},
	{
		name: "token_assignment",
		pattern: /(token["']?\s*[:=]\s*["']?)[A-Za-z0-9\-._~+/]+=*/gi,
		replacement: `$1${REDACTION_MARKER}`,
	},
	{
		name: "password_assignment",
		pattern: /(password["']?\s*[:=]\s*["']?)[^"'\s]+/gi,
		replacement: `$1${REDACTION_MARKER}`,
	},
	{
		name: "secret_assignment",
		pattern: /(secret["']?\s*[:=]\s*["']?)[^"'\s]+/gi,
		replacement: `$1${REDACTION_MARKER}`,
	},
	{
		name: "key_assignment",
		pattern: /(key["']?\s*[:=]\s*["']?)[A-Za-z0-9\-._~+/]+=*/gi,
		replacement: `$1${REDACTION_MARKER}`,
	},
];

export type SanitizerOptions = {
	maxDepth?: number;
	/** Key substrings redacted in addition to the defaults */
	extraSensitiveKeys?: readonly string[];
	/** Scrub secrets embedded in string values (default true) */
	scrubStrings?: boolean;
};

type SanitizeStats = { redacted: number; truncated: number };

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Redact secrets embedded in a string.
 */
export function redactInline(text: string): string {
	let result = text;
	for (const { pattern, replacement } of INLINE_PATTERNS) {
		result = result.replace(pattern, replacement);
	}
	return result;
}

export class DataSanitizer {
	private readonly rules: readonly SanitizationRule[];
	private readonly maxDepth: number;
	private readonly scrubStrings: boolean;

	constructor(options: SanitizerOptions = {}) {
		const extra = (options.extraSensitiveKeys ?? [])
			.map((k) => k.trim().toLowerCase())
			.filter((k) => k.length > 0)
			.map((keyPattern) => ({ keyPattern, marker: REDACTION_MARKER }));
		this.rules = Object.freeze([...DEFAULT_RULES, ...extra]);
		this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
		this.scrubStrings = options.scrubStrings ?? true;
	}

	/**
	 * Marker for a key, or undefined when the key is not sensitive.
	 */
	markerFor(key: string): string | undefined {
		const folded = key.toLowerCase();
		return this.rules.find((rule) => folded.includes(rule.keyPattern))?.marker;
	}

	/**
	 * Deep copy of `value` with sensitive fields redacted.
	 *
	 * @param context - label for the debug log line (e.g. "log", "export")
	 */
	sanitize(value: unknown, context = "general"): unknown {
		const stats: SanitizeStats = { redacted: 0, truncated: 0 };
		const result = this.walk(value, 0, stats);
		if (stats.redacted > 0 || stats.truncated > 0) {
			logger.debug({ context, ...stats }, "sanitized data");
		}
		return result;
	}

	private walk(value: unknown, depth: number, stats: SanitizeStats): unknown {
		if (depth > this.maxDepth) {
			stats.truncated++;
			return TRUNCATION_MARKER;
		}

		if (typeof value === "string") {
			if (!this.scrubStrings) return value;
			const scrubbed = redactInline(value);
			if (scrubbed !== value) stats.redacted++;
			return scrubbed;
		}

		if (Array.isArray(value)) {
			return value.map((item) => this.walk(item, depth + 1, stats));
		}

		if (isPlainObject(value)) {
			// fromEntries defines own properties, so a "__proto__" key stays data
			return Object.fromEntries(
				Object.entries(value).map(([key, inner]) => {
					const marker = this.markerFor(key);
					if (marker !== undefined) {
						stats.redacted++;
						return [key, marker];
					}
					return [key, this.walk(inner, depth + 1, stats)];
				}),
			);
		}

		if (value instanceof Map) {
			const copy = new Map<unknown, unknown>();
			for (const [key, inner] of value) {
				const marker = typeof key === "string" ? this.markerFor(key) : undefined;
				if (marker !== undefined) {
					stats.redacted++;
					copy.set(key, marker);
				} else {
					copy.set(key, this.walk(inner, depth + 1, stats));
				}
			}
			return copy;
		}

		if (value instanceof Set) {
			const copy = new Set<unknown>();
			for (const item of value) copy.add(this.walk(item, depth + 1, stats));
			return copy;
		}

		return value;
	}
}
