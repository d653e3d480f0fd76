/**
 * Threat signature catalogue.
 *
 * Each signature maps one case-insensitive regex to a threat category.
 * A PatternLibrary is an immutable snapshot; runtime edits build a new
 * snapshot and swap it in through PatternRegistry, so a reader never sees a
 * half-updated catalogue.
 *
 * Signatures avoid nested unbounded quantifiers; scanning cost is linear in
 * the (capped) input length.
 */

import { getChildLogger } from "../logging.js";
import { normalizeForScan } from "./normalize.js";
import type { PatternCategory } from "./types.js";

const logger = getChildLogger({ module: "patterns" });

export const DEFAULT_MAX_SCAN_LENGTH = 100_000;

export type ThreatSignature = Readonly<{
	name: string;
	category: PatternCategory;
	pattern: RegExp;
}>;

/**
 * Order in which categories are reported when one input matches several.
 */
export const CATEGORY_PRECEDENCE: readonly PatternCategory[] = [
	"sql_injection",
	"command_injection",
	"xss",
	"path_traversal",
];

export const CORE_SIGNATURES: readonly ThreatSignature[] = Object.freeze([
	// === SQL injection ===
	{
		name: "sql_union_select",
		category: "sql_injection",
		pattern: /\bunion\s+(all\s+)?select\b/i,
	},
	{
		name: "sql_select_from",
		category: "sql_injection",
		pattern: /\bselect\s+(\*|[\w.]+(\s*,\s*[\w.]+)*)\s+from\s+[\w.`"[\]]+/i,
	},
	{
		name: "sql_insert_into",
		category: "sql_injection",
		pattern: /\binsert\s+into\s+[\w.`"[\]]+\s*(\(|values\b|select\b)/i,
	},
	{
		name: "sql_update_set",
		category: "sql_injection",
		pattern: /\bupdate\s+[\w.`"[\]]+\s+set\s+[\w.`"[\]]+\s*=/i,
	},
	{
		name: "sql_delete_from",
		category: "sql_injection",
		pattern: /\bdelete\s+from\s+[\w.`"[\]]+\s*(where\b|;|$)/i,
	},
	{
		name: "sql_ddl",
		category: "sql_injection",
		pattern: /\b(drop|truncate|alter)\s+(table|database|schema|view|index)\b/i,
	},
	{
		name: "sql_create",
		category: "sql_injection",
		pattern: /\bcreate\s+(table|database)\b/i,
	},
	{
		name: "sql_tautology",
		category: "sql_injection",
		pattern: /['"]\s*(or|and)\s+['"]?\w+['"]?\s*=\s*['"]?\w+/i,
	},
	{
		name: "sql_quote_terminator",
		category: "sql_injection",
		pattern: /'\s*(--|\/\*|;\s*(drop|delete|insert|update|select|shutdown|exec|truncate|alter)\b)/i,
	},
	{
		name: "sql_time_based",
		category: "sql_injection",
		pattern: /\b(waitfor\s+delay|benchmark\s*\(|pg_sleep\s*\(|sleep\s*\(\s*\d+\s*\))/i,
	},
	{
		name: "sql_stored_procedure",
		category: "sql_injection",
		pattern: /\bexec(ute)?\s+(xp|sp)_\w+/i,
	},

	// === Cross-site scripting ===
	{
		name: "xss_script_tag",
		category: "xss",
		pattern: /<\s*\/?\s*script\b/i,
	},
	{
		name: "xss_script_uri",
		category: "xss",
		pattern: /\b(javascript|vbscript|livescript)\s*:/i,
	},
	{
		name: "xss_event_handler",
		category: "xss",
		pattern:
			/\bon(load|error|click|mouseover|mouseenter|focus|blur|submit|change|input|keydown|keyup|animationstart|toggle|pointerdown)\s*=/i,
	},
	{
		name: "xss_embedding_tag",
		category: "xss",
		pattern: /<\s*(iframe|object|embed|applet|meta|base|frameset)\b/i,
	},
	{
		name: "xss_dom_access",
		category: "xss",
		pattern: /\b(document\s*\.\s*(cookie|write|domain)|window\s*\.\s*location|location\s*\.\s*href\s*=)/i,
	},
	{
		name: "xss_data_uri",
		category: "xss",
		pattern: /\bdata\s*:\s*text\/html/i,
	},
	{
		name: "xss_css_expression",
		category: "xss",
		pattern: /\bexpression\s*\(/i,
	},

	// === Path traversal ===
	{
		name: "traversal_dot_dot",
		category: "path_traversal",
		pattern: /\.\.[/\\]/,
	},
	{
		name: "traversal_encoded",
		category: "path_traversal",
		pattern: /(%2e|\.){2}(%2f|%5c)|%2e%2e[/\\]|%252e%252e|%c0%ae|%c0%af|%c1%9c/i,
	},
	{
		name: "traversal_sensitive_file",
		category: "path_traversal",
		pattern: /\/etc\/(passwd|shadow|sudoers|hosts)\b|\/proc\/self\/|\b[a-z]:\\windows\\system32\b/i,
	},

	// === Command injection ===
	{
		name: "cmd_chained",
		category: "command_injection",
		pattern:
			/(;|\|\|?|&&)\s*(rm|cat|ls|wget|curl|nc|ncat|netcat|bash|sh|zsh|python[23]?|perl|ruby|php|chmod|chown|sudo|kill|shutdown|reboot|whoami)\b/i,
	},
	{
		name: "cmd_substitution",
		category: "command_injection",
		pattern: /\$\([^)]*\)/,
	},
	{
		name: "cmd_exec_call",
		category: "command_injection",
		pattern: /\b(eval|exec|system|popen|shell_exec|passthru|proc_open)\(/i,
	},
	{
		name: "cmd_pipe_to_shell",
		category: "command_injection",
		pattern: /\b(curl|wget)\b[^\n|]{0,200}\|\s*(ba|z)?sh\b/i,
	},
	{
		name: "cmd_recursive_delete",
		category: "command_injection",
		pattern: /\brm\s+-[rf]{1,2}\s+[/~]/i,
	},
	{
		name: "cmd_reverse_shell",
		category: "command_injection",
		pattern: /\b(nc|ncat|netcat)\b[^\n]{0,100}\s-e\s|\/dev\/(tcp|udp)\/|\/bin\/(ba)?sh\s+-i\b/i,
	},
	{
		name: "cmd_windows_shell",
		category: "command_injection",
		pattern: /\bcmd(\.exe)?\s+\/c\b|\bpowershell(\.exe)?\s+-(enc|encodedcommand|command|c)\b/i,
	},
] satisfies ThreatSignature[]);

/**
 * Immutable snapshot of threat signatures.
 */
export class PatternLibrary {
	private readonly signatures: readonly ThreatSignature[];
	readonly maxScanLength: number;

	constructor(
		signatures: readonly ThreatSignature[] = CORE_SIGNATURES,
		maxScanLength = DEFAULT_MAX_SCAN_LENGTH,
	) {
		this.signatures = Object.freeze([...signatures]);
		this.maxScanLength = maxScanLength;
	}

	get size(): number {
		return this.signatures.length;
	}

	/**
	 * Every category with at least one matching signature.
	 * Input beyond maxScanLength is ignored.
	 */
	classify(text: string): Set<PatternCategory> {
		const found = new Set<PatternCategory>();
		const scanned = this.prepare(text);

		for (const { category, pattern } of this.signatures) {
			if (found.has(category)) continue;
			if (pattern.test(scanned)) {
				found.add(category);
			}
		}

		return found;
	}

	/**
	 * Names of all matching signatures, for logging and event metadata.
	 */
	match(text: string): string[] {
		const scanned = this.prepare(text);
		return this.signatures.filter((s) => s.pattern.test(scanned)).map((s) => s.name);
	}

	/**
	 * New library with additional signatures. This instance is unchanged.
	 */
	withSignatures(extra: readonly ThreatSignature[]): PatternLibrary {
		return new PatternLibrary([...this.signatures, ...extra], this.maxScanLength);
	}

	private prepare(text: string): string {
		const capped = text.length > this.maxScanLength ? text.slice(0, this.maxScanLength) : text;
		return normalizeForScan(capped);
	}
}

/**
 * Pick the category to report from a classification, by fixed precedence.
 */
export function primaryCategory(
	categories: ReadonlySet<PatternCategory>,
): PatternCategory | undefined {
	return CATEGORY_PRECEDENCE.find((c) => categories.has(c));
}

/**
 * Compile user-supplied pattern sources into signatures.
 * Invalid expressions are skipped with a warning.
 */
export function compileSignatures(
	category: PatternCategory,
	sources: readonly string[],
	namePrefix = "custom",
): ThreatSignature[] {
	const compiled: ThreatSignature[] = [];
	sources.forEach((source, index) => {
		try {
			compiled.push({
				name: `${namePrefix}_${category}_${index}`,
				category,
				pattern: new RegExp(source, "i"),
			});
		} catch (err) {
			logger.warn({ category, source, error: String(err) }, "skipping invalid threat pattern");
		}
	});
	return compiled;
}

/**
 * Holder of the active PatternLibrary snapshot.
 */
export class PatternRegistry {
	private current: PatternLibrary;

	constructor(initial: PatternLibrary = new PatternLibrary()) {
		this.current = initial;
	}

	get(): PatternLibrary {
		return this.current;
	}

	/**
	 * Build the next snapshot from the current one and swap it in.
	 */
	update(next: (current: PatternLibrary) => PatternLibrary): PatternLibrary {
		this.current = next(this.current);
		return this.current;
	}

	addPatterns(category: PatternCategory, sources: readonly string[]): number {
		const compiled = compileSignatures(category, sources, `custom${this.current.size}`);
		if (compiled.length > 0) {
			this.update((lib) => lib.withSignatures(compiled));
			logger.info({ category, added: compiled.length }, "threat patterns added");
		}
		return compiled.length;
	}
}
