/**
 * Validation of untrusted input by kind.
 *
 * Every check returns a ValidationResult; nothing here throws across the
 * trust boundary. API keys are never logged or echoed in a reason.
 */

import crypto from "node:crypto";

import { DEFAULT_POLICY } from "../config/policy.js";
import { getChildLogger } from "../logging.js";
import type { AccessController } from "./access-control.js";
import { type PatternRegistry, primaryCategory } from "./patterns.js";
import type { InputKind, PatternCategory, ValidationFailure, ValidationResult } from "./types.js";

const logger = getChildLogger({ module: "input-validator" });

export const INPUT_KINDS: readonly InputKind[] = [
	"general",
	"prompt",
	"filename",
	"url",
	"api_key",
];

export const MAX_FILENAME_LENGTH = 255;

const API_KEY_SHAPE = /^[A-Za-z0-9._~+/=:-]{8,512}$/;

// Parent segments, absolute and drive-rooted paths, and encoded dots/slashes
const TRAVERSAL_CHECKS: readonly RegExp[] = [
	/(^|[/\\])\.\.([/\\]|$)/,
	/^[/\\]/,
	/^[a-z]:/i,
	/%2e|%2f|%5c|%252e|%c0%ae|%c0%af|%c1%9c/i,
];

// biome-ignore lint/suspicious/noControlCharactersInRegex: control characters are what we reject
const DISALLOWED_FILENAME_CHARS = /[<>:"|?*\u0000-\u001f\u007f]/;

type ContentSignature = { category: PatternCategory; pattern: RegExp };

// Embedded script or executable content in uploaded files
const FILE_CONTENT_SIGNATURES: readonly ContentSignature[] = [
	{ category: "xss", pattern: /<script[^>]*>/i },
	{ category: "xss", pattern: /javascript:/i },
	{ category: "xss", pattern: /vbscript:/i },
	{ category: "xss", pattern: /onload\s*=/i },
	{ category: "xss", pattern: /onerror\s*=/i },
	{ category: "command_injection", pattern: /\bexec\s*\(/i },
	{ category: "command_injection", pattern: /\beval\s*\(/i },
	{ category: "command_injection", pattern: /\bsystem\s*\(/i },
];

export type InputValidatorOptions = {
	patterns: PatternRegistry;
	access: AccessController;
	allowedExtensions?: readonly string[];
	maxFileSizeBytes?: number;
	/** Scan uploaded file content for embedded scripts */
	scanFileContent?: boolean;
};

export type ValidateOptions = {
	/** Provider name for provider-specific API key shapes */
	provider?: string;
};

function fail(
	failure: ValidationFailure,
	reason: string,
	extra: { threatType?: PatternCategory; categories?: PatternCategory[] } = {},
): ValidationResult {
	return { ok: false, failure, reason, ...extra };
}

function isInputKind(kind: string): kind is InputKind {
	return INPUT_KINDS.some((k) => k === kind);
}

function sha256(value: string): Buffer {
	return crypto.createHash("sha256").update(value).digest();
}

function fileExtension(filename: string): string {
	const base = filename.split(/[/\\]/).pop() ?? filename;
	const dot = base.lastIndexOf(".");
	return dot > 0 ? base.slice(dot).toLowerCase() : "";
}

export class InputValidator {
	private readonly patterns: PatternRegistry;
	private readonly access: AccessController;
	private readonly allowedExtensions: ReadonlySet<string>;
	private readonly maxFileSizeBytes: number;
	private readonly scanFileContent: boolean;
	private revokedKeyHashes: readonly Buffer[] = [];

	constructor(options: InputValidatorOptions) {
		this.patterns = options.patterns;
		this.access = options.access;
		this.allowedExtensions = new Set(
			(options.allowedExtensions ?? DEFAULT_POLICY.validation.allowedExtensions).map((e) =>
				e.toLowerCase(),
			),
		);
		this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_POLICY.validation.maxFileSizeBytes;
		this.scanFileContent = options.scanFileContent ?? true;
	}

	validate(
		value: unknown,
		kind: InputKind,
		maxLength: number,
		options: ValidateOptions = {},
	): ValidationResult {
		if (typeof value !== "string") {
			return fail("invalid_format", "Input must be a string");
		}
		if (!isInputKind(kind)) {
			return fail("invalid_format", `Unknown input kind: ${String(kind)}`);
		}

		if (value.length > maxLength) {
			return fail("length_exceeded", `Input too long (max ${maxLength} characters)`);
		}

		switch (kind) {
			case "general":
			case "prompt":
				return this.validateText(value);
			case "filename":
				return this.validateFilename(value);
			case "url":
				return this.validateUrl(value);
			case "api_key":
				return this.validateApiKey(value, options.provider);
		}
	}

	private validateText(value: string): ValidationResult {
		const categories = this.patterns.get().classify(value);
		const primary = primaryCategory(categories);
		if (!primary) return { ok: true };

		return fail("malicious_content", "Input contains potentially malicious content", {
			threatType: primary,
			categories: [...categories],
		});
	}

	private validateFilename(value: string): ValidationResult {
		if (value.trim().length === 0) {
			return fail("invalid_format", "Filename is empty");
		}

		if (TRAVERSAL_CHECKS.some((check) => check.test(value))) {
			return fail("path_traversal", "Invalid filename format", { threatType: "path_traversal" });
		}

		if (DISALLOWED_FILENAME_CHARS.test(value)) {
			return fail("path_traversal", "Filename contains disallowed characters", {
				threatType: "path_traversal",
			});
		}

		const ext = fileExtension(value);
		if (!this.allowedExtensions.has(ext)) {
			return fail("invalid_format", `File extension not allowed: ${ext || "(none)"}`);
		}

		return { ok: true };
	}

	private validateUrl(value: string): ValidationResult {
		let url: URL;
		try {
			url = new URL(value);
		} catch {
			return fail("invalid_format", "Invalid URL format");
		}

		if (url.protocol !== "https:") {
			return fail("domain_not_allowed", `URL scheme not allowed: ${url.protocol.replace(/:$/, "")}`);
		}

		if (!this.access.isDomainAllowed(url.hostname)) {
			return fail("domain_not_allowed", `Domain not allowed: ${url.hostname}`);
		}

		return { ok: true };
	}

	/**
	 * Shape check plus revocation list. The key itself never appears in a
	 * reason or log line.
	 */
	validateApiKey(key: string, provider?: string): ValidationResult {
		if (!key) {
			return fail("invalid_format", "API key is required");
		}

		if (!API_KEY_SHAPE.test(key)) {
			return fail("invalid_format", "Invalid API key format");
		}

		if (provider === "openai" && !key.startsWith("sk-")) {
			return fail("invalid_format", "Invalid OpenAI API key format");
		}
		if ((provider === "zai" || provider === "z_ai") && key.length < 20) {
			return fail("invalid_format", "Invalid Z.AI API key format");
		}

		if (this.isRevoked(key)) {
			logger.warn({ provider }, "revoked API key presented");
			return fail("invalid_format", "API key is not authorized");
		}

		return { ok: true };
	}

	/**
	 * Add a key to the revocation list. Only its SHA-256 digest is kept.
	 */
	revokeApiKey(key: string): void {
		this.revokedKeyHashes = [...this.revokedKeyHashes, sha256(key)];
	}

	private isRevoked(key: string): boolean {
		const digest = sha256(key);
		// Compare against every entry so timing does not depend on list position
		let revoked = false;
		for (const hash of this.revokedKeyHashes) {
			if (crypto.timingSafeEqual(hash, digest)) revoked = true;
		}
		return revoked;
	}

	/**
	 * Validate an upload: filename, size cap, and embedded script content.
	 */
	validateFileUpload(
		filename: string,
		sizeBytes: number,
		content?: string | Uint8Array,
	): ValidationResult {
		const nameResult = this.validate(filename, "filename", MAX_FILENAME_LENGTH);
		if (!nameResult.ok) return nameResult;

		if (!Number.isFinite(sizeBytes) || sizeBytes < 0) {
			return fail("invalid_format", "Invalid file size");
		}
		if (sizeBytes > this.maxFileSizeBytes) {
			const maxMb = Math.floor(this.maxFileSizeBytes / (1024 * 1024));
			return fail("length_exceeded", `File too large (max ${maxMb}MB)`);
		}

		if (content !== undefined && this.scanFileContent) {
			const maxScan = this.patterns.get().maxScanLength;
			const text =
				typeof content === "string"
					? content.slice(0, maxScan)
					: Buffer.from(content.subarray(0, maxScan)).toString("utf-8");
			const hit = FILE_CONTENT_SIGNATURES.find(({ pattern }) => pattern.test(text));
			if (hit) {
				return fail("malicious_content", "File contains potentially malicious content", {
					threatType: hit.category,
					categories: [hit.category],
				});
			}
		}

		return { ok: true };
	}
}
