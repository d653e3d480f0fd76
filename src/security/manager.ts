/**
 * Security façade: the single entry point the application layer calls.
 *
 * Composes the validator, sanitizer, limiter, access controller, detector
 * and audit log around one resolved policy. Internal failures are logged and
 * answered with the permissive result so that a fault in this layer never
 * takes the host down. Sanitization is the exception: a failure there
 * returns the redaction marker rather than the raw value.
 */

import crypto from "node:crypto";

import type Database from "better-sqlite3";
import { loadConfigWithDiagnostics } from "../config/config.js";
import {
	applyEnvOverrides,
	type FeatureFlags,
	type PolicyResolution,
	resolvePolicy,
	type SecurityPolicy,
} from "../config/policy.js";
import { getChildLogger } from "../logging.js";
import { SqliteAuditSink } from "../storage/audit-store.js";
import { openDb } from "../storage/db.js";
import { AccessController } from "./access-control.js";
import { AuditLog, type AuditQuery, type AuditSink, type AuditSummary } from "./audit.js";
import { BlockTable } from "./block-table.js";
import { InputValidator, MAX_FILENAME_LENGTH } from "./input-validator.js";
import { CORE_SIGNATURES, PatternLibrary, PatternRegistry } from "./patterns.js";
import { RateLimiter } from "./rate-limit.js";
import { DataSanitizer, REDACTION_MARKER } from "./sanitizer.js";
import { ThreatDetector } from "./threat-detector.js";
import type {
	AccessResult,
	BlockEntry,
	InputKind,
	PatternCategory,
	RateLimitDecision,
	SecurityEvent,
	ValidationResult,
} from "./types.js";

const logger = getChildLogger({ module: "security-manager" });

export const DEFAULT_MAX_INPUT_LENGTH = 10_000;
export const DEFAULT_REPORT_HOURS = 24;
export const DEFAULT_TOKEN_BYTES = 32;
const MAX_TOKEN_BYTES = 1024;

const PBKDF2_ITERATIONS = 100_000;
const PBKDF2_KEY_BYTES = 32;
const SALT_BYTES = 16;

export type SecurityManagerOptions = {
	/** Raw `security` config section, resolved against the default policy */
	config?: unknown;
	/** Environment overrides to apply on top of the config */
	env?: NodeJS.ProcessEnv;
	/** Persistence for audit events */
	sink?: AuditSink;
};

export type ValidateInputOptions = {
	identifier?: string;
	provider?: string;
};

export type SecurityReport = AuditSummary & {
	blockedIdentifiers: string[];
	/** Identifiers with tracked rate-limit state */
	rateLimitActive: number;
	securityFeatures: FeatureFlags;
};

export type SecurityReportPayload = {
	report_timestamp: string;
	period_hours: number;
	total_events: number;
	event_counts: Record<string, number>;
	severity_counts: Record<string, number>;
	source_counts: Record<string, number>;
	recommendations: string[];
	blocked_identifiers: string[];
	rate_limit_active: number;
	truncated: boolean;
	security_features: {
		rate_limiting_enabled: boolean;
		input_validation_enabled: boolean;
		threat_detection_enabled: boolean;
		audit_logging_enabled: boolean;
	};
};

export type HashedData = {
	hash: string;
	salt: string;
};

export type MaintenanceResult = {
	rateLimitStates: number;
	blocks: number;
	detectorStates: number;
	events: number;
};

/**
 * Wire form of a report, with snake_case keys.
 */
export function toReportPayload(report: SecurityReport): SecurityReportPayload {
	return {
		report_timestamp: report.generatedAt.toISOString(),
		period_hours: report.periodHours,
		total_events: report.totalEvents,
		event_counts: { ...report.eventCounts },
		severity_counts: { ...report.severityCounts },
		source_counts: { ...report.sourceCounts },
		recommendations: [...report.recommendations],
		blocked_identifiers: [...report.blockedIdentifiers],
		rate_limit_active: report.rateLimitActive,
		truncated: report.truncated,
		security_features: {
			rate_limiting_enabled: report.securityFeatures.rateLimiting,
			input_validation_enabled: report.securityFeatures.inputValidation,
			threat_detection_enabled: report.securityFeatures.threatDetection,
			audit_logging_enabled: report.securityFeatures.auditLogging,
		},
	};
}

export class SecurityManager {
	readonly policy: Readonly<SecurityPolicy>;
	readonly audit: AuditLog;
	private readonly patterns: PatternRegistry;
	private readonly access: AccessController;
	private readonly validator: InputValidator;
	private readonly sanitizer: DataSanitizer;
	private readonly limiter: RateLimiter;
	private readonly detector: ThreatDetector;
	private maintenanceTimer: NodeJS.Timeout | null = null;
	private db: Database.Database | null = null;

	constructor(options: SecurityManagerOptions = {}) {
		let resolution: PolicyResolution = resolvePolicy(options.config);
		if (options.env) {
			resolution = applyEnvOverrides(resolution, options.env);
		}
		for (const warning of resolution.warnings) {
			logger.warn({ warning }, "security config value ignored");
		}

		const policy = resolution.policy;
		this.policy = policy;

		const blockTable = new BlockTable();
		this.patterns = new PatternRegistry(
			new PatternLibrary(CORE_SIGNATURES, policy.validation.maxScanLength),
		);
		this.access = new AccessController({
			allowedDomains: policy.allowedDomains,
			defaultBlockMs: policy.manualBlockMs,
			blockTable,
		});
		this.validator = new InputValidator({
			patterns: this.patterns,
			access: this.access,
			allowedExtensions: policy.validation.allowedExtensions,
			maxFileSizeBytes: policy.validation.maxFileSizeBytes,
			scanFileContent: policy.features.threatDetection,
		});
		this.sanitizer = new DataSanitizer({
			maxDepth: policy.sanitizer.maxDepth,
			extraSensitiveKeys: policy.sanitizer.extraSensitiveKeys,
		});
		this.limiter = new RateLimiter(
			{ limits: policy.rateLimits, backoff: policy.backoff },
			blockTable,
		);
		this.audit = new AuditLog({
			retentionDays: policy.audit.retentionDays,
			maxEvents: policy.audit.maxEvents,
			maxScanEvents: policy.audit.maxScanEvents,
			sink: options.sink,
		});
		this.detector = new ThreatDetector({
			audit: policy.features.auditLogging ? this.audit : undefined,
			errorWindow: policy.detection.errorWindow,
			errorRateThreshold: policy.detection.errorRateThreshold,
			activityThreshold: policy.detection.activityThreshold,
		});

		logger.info({ features: policy.features }, "security manager initialized");
	}

	/**
	 * Build a manager from the config file and process environment. When
	 * `security.audit.dbFile` is set, events persist to SQLite and events
	 * within the retention period are restored.
	 */
	static fromConfig(env: NodeJS.ProcessEnv = process.env): SecurityManager {
		const { config, path, warnings } = loadConfigWithDiagnostics();
		for (const warning of warnings) {
			logger.warn({ path, warning }, "config problem");
		}

		const dbFile = resolvePolicy(config.security).policy.audit.dbFile;
		if (!dbFile) {
			return new SecurityManager({ config: config.security, env });
		}

		let db: Database.Database;
		try {
			db = openDb(dbFile);
		} catch (err) {
			logger.error(
				{ dbFile, error: String(err) },
				"audit database unavailable, events kept in memory",
			);
			return new SecurityManager({ config: config.security, env });
		}

		const sink = new SqliteAuditSink(db);
		const manager = new SecurityManager({ config: config.security, env, sink });
		manager.db = db;

		const since = Date.now() - manager.policy.audit.retentionDays * 24 * 60 * 60 * 1000;
		const restored = manager.audit.load(sink.loadEvents(since));
		logger.debug({ restored }, "restored persisted security events");
		return manager;
	}

	private guard<T>(operation: string, fallback: () => T, fn: () => T): T {
		try {
			return fn();
		} catch (err) {
			logger.error({ operation, error: String(err) }, "security operation failed, allowing");
			return fallback();
		}
	}

	private get detecting(): boolean {
		return this.policy.features.threatDetection;
	}

	// Validation and admission results feed the rolling error rate
	private trackOutcome(identifier: string | undefined, ok: boolean, now = Date.now()): void {
		if (identifier === undefined || !this.detecting) return;
		this.detector.recordOutcome(identifier, ok, now);
	}

	validateInput(
		value: unknown,
		kind: InputKind,
		maxLength?: number,
		options: ValidateInputOptions = {},
	): ValidationResult {
		if (!this.policy.features.inputValidation) return { ok: true };

		return this.guard(
			"validateInput",
			() => ({ ok: true }),
			() => {
				const limit =
					maxLength ?? (kind === "filename" ? MAX_FILENAME_LENGTH : DEFAULT_MAX_INPUT_LENGTH);
				const result = this.validator.validate(value, kind, limit, { provider: options.provider });
				if (!result.ok && this.detecting) {
					this.detector.onValidationFailure(result, {
						kind,
						value: typeof value === "string" ? value : undefined,
						identifier: options.identifier,
					});
				}
				this.trackOutcome(options.identifier, result.ok);
				return result;
			},
		);
	}

	validateFileUpload(
		filename: string,
		sizeBytes: number,
		content?: string | Uint8Array,
		options: { identifier?: string } = {},
	): ValidationResult {
		if (!this.policy.features.inputValidation) return { ok: true };

		return this.guard(
			"validateFileUpload",
			() => ({ ok: true }),
			() => {
				const result = this.validator.validateFileUpload(filename, sizeBytes, content);
				if (!result.ok && this.detecting) {
					this.detector.onValidationFailure(result, {
						kind: "filename",
						value: filename,
						identifier: options.identifier,
					});
				}
				this.trackOutcome(options.identifier, result.ok);
				return result;
			},
		);
	}

	/**
	 * Admit or reject one request. A manual block takes precedence over the
	 * rate limiter and leaves its counters untouched.
	 */
	checkRateLimit(identifier: string): RateLimitDecision {
		const permissive = (): RateLimitDecision => ({
			allowed: true,
			remaining: {
				minute: this.policy.rateLimits.perMinute,
				hour: this.policy.rateLimits.perHour,
				day: this.policy.rateLimits.perDay,
			},
		});
		if (!this.policy.features.rateLimiting) return permissive();

		return this.guard("checkRateLimit", permissive, () => {
			const now = Date.now();
			const manual = this.access.blocks
				.active(identifier, now)
				.find((entry) => entry.origin === "manual");
			if (manual) {
				if (this.detecting) {
					this.detector.onAccessDenied(identifier, manual.reason, "manual", now);
				}
				this.trackOutcome(identifier, false, now);
				return {
					allowed: false,
					reason: "blocked",
					retryAfterMs: manual.expiresAt - now,
					blockedUntil: manual.expiresAt,
					violationCount: 0,
				};
			}

			const decision = this.limiter.check(identifier, now);
			if (!decision.allowed && this.detecting) {
				if (decision.reason === "limit_exceeded") {
					this.detector.onRateLimitBlock(identifier, decision, now);
				} else {
					this.detector.onAccessDenied(identifier, "rate limit block active", "automatic", now);
				}
			}
			this.trackOutcome(identifier, decision.allowed, now);
			return decision;
		});
	}

	/**
	 * Whether an identifier may proceed. Denials are recorded.
	 */
	checkAccess(identifier: string): AccessResult {
		return this.guard<AccessResult>(
			"checkAccess",
			() => ({ allowed: true }),
			() => {
				const now = Date.now();
				const block = this.access.getBlock(identifier, now);
				if (!block) return { allowed: true };
				if (this.detecting) {
					this.detector.onAccessDenied(identifier, block.reason, block.origin, now);
				}
				return {
					allowed: false,
					reason: block.reason,
					blockedUntil: block.expiresAt,
					origin: block.origin,
				};
			},
		);
	}

	sanitize(value: unknown, context = "general"): unknown {
		return this.guard(
			"sanitize",
			() => REDACTION_MARKER,
			() => this.sanitizer.sanitize(value, context),
		);
	}

	blockIdentifier(identifier: string, reason: string, durationMs?: number): BlockEntry | undefined {
		return this.guard(
			"blockIdentifier",
			() => undefined,
			() => {
				const now = Date.now();
				const entry = this.access.block(identifier, reason, durationMs, now);
				if (this.detecting) {
					this.detector.onManualBlock(identifier, reason, entry.expiresAt - now, now);
				}
				return entry;
			},
		);
	}

	/**
	 * Lift every block on an identifier, manual and automatic. Rate-limit
	 * history is kept, so a fresh violation soon after still escalates.
	 */
	unblockIdentifier(identifier: string): boolean {
		return this.guard(
			"unblockIdentifier",
			() => false,
			() => {
				const released = this.limiter.release(identifier);
				const unblocked = this.access.unblock(identifier);
				return released || unblocked;
			},
		);
	}

	isBlocked(identifier: string): boolean {
		return this.guard(
			"isBlocked",
			() => false,
			() => this.access.isBlocked(identifier),
		);
	}

	recordOutcome(identifier: string, success: boolean): SecurityEvent | undefined {
		if (!this.detecting) return undefined;
		return this.guard(
			"recordOutcome",
			() => undefined,
			() => this.detector.recordOutcome(identifier, success),
		);
	}

	recordActivity(activity: string, identifier: string): SecurityEvent | undefined {
		if (!this.detecting) return undefined;
		return this.guard(
			"recordActivity",
			() => undefined,
			() => this.detector.recordActivity(activity, identifier),
		);
	}

	addAllowedDomain(domain: string): boolean {
		return this.access.addDomain(domain);
	}

	removeAllowedDomain(domain: string): boolean {
		return this.access.removeDomain(domain);
	}

	getAllowedDomains(): string[] {
		return this.access.listDomains();
	}

	revokeApiKey(key: string): void {
		this.validator.revokeApiKey(key);
		logger.warn("API key revoked");
	}

	/**
	 * Add threat signatures from pattern sources. Returns how many compiled.
	 */
	addPatterns(category: PatternCategory, sources: readonly string[]): number {
		return this.patterns.addPatterns(category, sources);
	}

	generateReport(hours = DEFAULT_REPORT_HOURS): SecurityReport {
		let period = hours;
		if (!Number.isFinite(period) || period <= 0) {
			logger.warn(
				{ hours, fallback: DEFAULT_REPORT_HOURS },
				"invalid report period, using default",
			);
			period = DEFAULT_REPORT_HOURS;
		}
		const summary = this.audit.report(period);
		return {
			...summary,
			blockedIdentifiers: this.access.listBlocked(),
			rateLimitActive: this.limiter.trackedCount,
			securityFeatures: { ...this.policy.features },
		};
	}

	searchEvents(query: AuditQuery = {}): SecurityEvent[] {
		return [...this.audit.search(query)];
	}

	clearEvents(): number {
		return this.audit.clear();
	}

	/**
	 * Random URL-safe token from `bytes` bytes of entropy.
	 */
	generateSecureToken(bytes = DEFAULT_TOKEN_BYTES): string {
		if (!Number.isInteger(bytes) || bytes <= 0 || bytes > MAX_TOKEN_BYTES) {
			throw new RangeError(`Token size must be an integer between 1 and ${MAX_TOKEN_BYTES} bytes`);
		}
		return crypto.randomBytes(bytes).toString("base64url");
	}

	/**
	 * PBKDF2-SHA256 hash of `data`. A random salt is generated when none is
	 * given; keep the returned salt to verify later.
	 */
	hashSensitiveData(data: string, salt?: string): HashedData {
		const usedSalt = salt ?? crypto.randomBytes(SALT_BYTES).toString("hex");
		const hash = crypto
			.pbkdf2Sync(data, usedSalt, PBKDF2_ITERATIONS, PBKDF2_KEY_BYTES, "sha256")
			.toString("hex");
		return { hash, salt: usedSalt };
	}

	/**
	 * Expire idle and stale state everywhere.
	 */
	runMaintenance(now = Date.now()): MaintenanceResult {
		return this.guard(
			"runMaintenance",
			() => ({ rateLimitStates: 0, blocks: 0, detectorStates: 0, events: 0 }),
			() => {
				const result: MaintenanceResult = {
					rateLimitStates: this.limiter.sweep(now),
					blocks: this.access.blocks.sweep(now),
					detectorStates: this.detector.sweep(this.policy.backoff.stateTtlMs, now),
					events: this.audit.prune(now),
				};
				logger.debug(result, "security maintenance complete");
				return result;
			},
		);
	}

	/**
	 * Run maintenance periodically. The timer does not keep the process alive.
	 */
	start(): void {
		if (this.maintenanceTimer) return;
		this.maintenanceTimer = setInterval(() => {
			this.runMaintenance();
		}, this.policy.maintenanceIntervalMs);
		this.maintenanceTimer.unref();
	}

	close(): void {
		if (this.maintenanceTimer) {
			clearInterval(this.maintenanceTimer);
			this.maintenanceTimer = null;
		}
		if (this.db) {
			this.db.close();
			this.db = null;
		}
		logger.debug("security manager closed");
	}
}
