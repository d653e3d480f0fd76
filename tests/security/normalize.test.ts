import { describe, expect, it } from "vitest";
import { containsInvisible, normalizeForScan } from "../../src/security/normalize.js";

describe("normalizeForScan", () => {
	it("folds compatibility ligatures", () => {
		expect(normalizeForScan("\uFB01le")).toBe("file");
	});

	it("folds fullwidth letters", () => {
		expect(normalizeForScan("\uFF33\uFF25\uFF2C\uFF25\uFF23\uFF34")).toBe("SELECT");
	});

	it("strips zero-width and soft-hyphen characters", () => {
		expect(normalizeForScan("ja\u200Bva\u00ADscr\uFEFFipt")).toBe("javascript");
	});

	it("maps Cyrillic lookalikes to Latin", () => {
		expect(normalizeForScan("\u0430dmin")).toBe("admin");
		expect(normalizeForScan("\u0421\u041E\u041C")).toBe("COM");
	});

	it("leaves plain ASCII unchanged", () => {
		expect(normalizeForScan("plain text 123")).toBe("plain text 123");
	});
});

describe("containsInvisible", () => {
	it("detects invisible characters", () => {
		expect(containsInvisible("a\u200Bb")).toBe(true);
		expect(containsInvisible("a\u2060b")).toBe(true);
	});

	it("returns false for visible text", () => {
		expect(containsInvisible("ab")).toBe(false);
	});

	it("gives the same answer on repeated calls", () => {
		expect(containsInvisible("x\u200By")).toBe(true);
		expect(containsInvisible("x\u200By")).toBe(true);
	});
});
