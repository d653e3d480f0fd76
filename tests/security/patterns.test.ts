/**
 * Tests for the threat signature catalogue.
 */

import { describe, expect, it, vi } from "vitest";
import {
	CORE_SIGNATURES,
	compileSignatures,
	PatternLibrary,
	PatternRegistry,
	primaryCategory,
} from "../../src/security/patterns.js";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

describe("PatternLibrary", () => {
	const library = new PatternLibrary();

	describe("classify", () => {
		it("classifies a quote-terminated DROP TABLE as SQL injection", () => {
			expect([...library.classify("'; DROP TABLE users; --")]).toEqual(["sql_injection"]);
		});

		it("names the SQL signatures that matched", () => {
			expect(library.match("'; DROP TABLE users; --")).toEqual([
				"sql_ddl",
				"sql_quote_terminator",
			]);
		});

		it("classifies script tags as XSS", () => {
			expect([...library.classify("<script>alert(1)</script>")]).toEqual(["xss"]);
		});

		it("classifies chained shell commands as command injection", () => {
			expect(library.match("cat notes.txt; rm -rf /")).toEqual([
				"cmd_chained",
				"cmd_recursive_delete",
			]);
		});

		it("classifies parent-directory sequences as path traversal", () => {
			expect([...library.classify("open ../../secrets.txt")]).toEqual(["path_traversal"]);
		});

		it("returns an empty set for ordinary text", () => {
			expect(library.classify("hello world, how are you?").size).toBe(0);
			expect(library.classify("Please select the best option from the list").size).toBe(0);
		});
	});

	describe("normalization before matching", () => {
		it("folds fullwidth letters", () => {
			const fullwidth = "\uFF24\uFF32\uFF2F\uFF30 \uFF34\uFF21\uFF22\uFF2C\uFF25 users";
			expect(library.classify(fullwidth).has("sql_injection")).toBe(true);
		});

		it("ignores zero-width characters inside keywords", () => {
			expect(library.classify("<scr\u200Bipt>alert(1)</script>").has("xss")).toBe(true);
		});

		it("maps Cyrillic lookalikes", () => {
			expect(library.classify("<s\u0441ript>").has("xss")).toBe(true);
		});
	});

	describe("scan length cap", () => {
		it("ignores content beyond maxScanLength", () => {
			const capped = new PatternLibrary(CORE_SIGNATURES, 50);
			expect(capped.classify(`${"a".repeat(60)}<script>`).size).toBe(0);
			expect(capped.classify("<script>").has("xss")).toBe(true);
		});
	});

	describe("withSignatures", () => {
		it("returns a new snapshot and leaves the original untouched", () => {
			const extended = library.withSignatures([
				{ name: "extra", category: "sql_injection", pattern: /\bshow\s+tables\b/i },
			]);
			expect(library.size).toBe(28);
			expect(extended.size).toBe(29);
			expect(library.classify("SHOW TABLES").size).toBe(0);
			expect([...extended.classify("SHOW TABLES")]).toEqual(["sql_injection"]);
		});
	});
});

describe("primaryCategory", () => {
	it("prefers SQL injection over XSS", () => {
		expect(primaryCategory(new Set(["xss", "sql_injection"]))).toBe("sql_injection");
	});

	it("prefers command injection over path traversal", () => {
		expect(primaryCategory(new Set(["path_traversal", "command_injection"]))).toBe(
			"command_injection",
		);
	});

	it("returns undefined for no categories", () => {
		expect(primaryCategory(new Set())).toBeUndefined();
	});
});

describe("compileSignatures", () => {
	it("skips invalid expressions", () => {
		const compiled = compileSignatures("xss", ["onfocusin\\s*=", "(unclosed"]);
		expect(compiled).toHaveLength(1);
		expect(compiled[0]?.name).toBe("custom_xss_0");
		expect(compiled[0]?.pattern.test("ONFOCUSIN =")).toBe(true);
	});
});

describe("PatternRegistry", () => {
	it("swaps in a new snapshot when patterns are added", () => {
		const registry = new PatternRegistry();
		const before = registry.get();

		expect(registry.addPatterns("sql_injection", ["\\bshow\\s+tables\\b"])).toBe(1);

		expect(registry.get()).not.toBe(before);
		expect(registry.get().classify("show tables").has("sql_injection")).toBe(true);
		expect(before.classify("show tables").size).toBe(0);
	});

	it("keeps the current snapshot when nothing compiles", () => {
		const registry = new PatternRegistry();
		const before = registry.get();

		expect(registry.addPatterns("xss", ["[unterminated"])).toBe(0);
		expect(registry.get()).toBe(before);
	});
});
