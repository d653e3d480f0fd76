import { describe, expect, it, vi } from "vitest";
import { formatReport } from "../../src/commands/report.js";
import { parseSanitizeInput } from "../../src/commands/sanitize.js";
import { formatValidationResult, parseInputKind } from "../../src/commands/validate.js";
import { RECOMMENDATIONS } from "../../src/security/audit.js";
import type { SecurityReport } from "../../src/security/manager.js";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

const FEATURES = {
	rateLimiting: true,
	inputValidation: true,
	threatDetection: true,
	auditLogging: true,
};

describe("parseInputKind", () => {
	it("accepts known kinds only", () => {
		expect(parseInputKind("api_key")).toBe("api_key");
		expect(parseInputKind("email")).toBeUndefined();
	});
});

describe("formatValidationResult", () => {
	it("formats a pass", () => {
		expect(formatValidationResult("url", { ok: true })).toBe("\u2713 valid url");
	});

	it("formats a failure with its threat type", () => {
		expect(
			formatValidationResult("general", {
				ok: false,
				failure: "malicious_content",
				reason: "Input contains potentially malicious content",
				threatType: "xss",
			}),
		).toBe("\u2717 malicious_content [xss]: Input contains potentially malicious content");
	});

	it("formats a failure without a threat type", () => {
		expect(
			formatValidationResult("url", {
				ok: false,
				failure: "invalid_format",
				reason: "Invalid URL format",
			}),
		).toBe("\u2717 invalid_format: Invalid URL format");
	});
});

describe("parseSanitizeInput", () => {
	it("parses JSON", () => {
		expect(parseSanitizeInput('{"token":"test-secret"}')).toEqual({ token: "test-secret" });
	});

	it("keeps plain text as a string", () => {
		expect(parseSanitizeInput("password=test-secret")).toBe("password=test-secret");
	});
});

describe("formatReport", () => {
	it("lists counts, blocks and recommendations", () => {
		const report: SecurityReport = {
			generatedAt: new Date(0),
			periodHours: 24,
			totalEvents: 3,
			eventCounts: { sql_injection: 1, xss: 2 },
			severityCounts: { high: 3 },
			sourceCounts: { input_validator: 3 },
			recommendations: [RECOMMENDATIONS.injection],
			truncated: false,
			blockedIdentifiers: ["a", "b"],
			rateLimitActive: 0,
			securityFeatures: FEATURES,
		};

		expect(formatReport(report).split("\n")).toEqual([
			"Security report (last 24h)",
			"  Total events: 3",
			"  By type:",
			"    xss: 2",
			"    sql_injection: 1",
			"  By severity:",
			"    high: 3",
			"  By source:",
			"    input_validator: 3",
			"  Blocked identifiers: a, b",
			"  Recommendations:",
			"    - Injection attempts detected - review input validation",
		]);
	});

	it("formats an empty, truncated report", () => {
		const report: SecurityReport = {
			generatedAt: new Date(0),
			periodHours: 1,
			totalEvents: 0,
			eventCounts: {},
			severityCounts: {},
			sourceCounts: {},
			recommendations: [RECOMMENDATIONS.none],
			truncated: true,
			blockedIdentifiers: [],
			rateLimitActive: 0,
			securityFeatures: FEATURES,
		};

		expect(formatReport(report)).toBe(
			[
				"Security report (last 1h)",
				"  Total events: 0 (scan truncated)",
				"  Blocked identifiers: none",
				"  Recommendations:",
				"    - No significant security issues detected",
			].join("\n"),
		);
	});
});
