import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { resolveConfigPath } from "./path.js";

// Logging configuration schema
const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	// "-" writes to stdout instead of a file
	file: z.string().optional(),
});

// The security section is validated field by field in policy.ts so that one bad
// value degrades to its default instead of rejecting the whole file.
const HardlineConfigSchema = z.object({
	security: z.unknown().optional(),
	logging: LoggingConfigSchema.optional(),
});

export type HardlineConfig = z.infer<typeof HardlineConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export type ConfigLoadResult = {
	config: HardlineConfig;
	path: string;
	warnings: string[];
};

let cachedResult: ConfigLoadResult | null = null;
let configMtime: number | null = null;

/**
 * Load and parse the configuration file, reporting problems as warnings.
 *
 * Never throws: a missing file yields an empty config, an unreadable or
 * malformed one yields an empty config plus a warning. Callers log the
 * warnings (logging.ts itself reads this config, so this module cannot).
 */
export function loadConfigWithDiagnostics(): ConfigLoadResult {
	const configPath = resolveConfigPath();

	let stat: fs.Stats;
	try {
		stat = fs.statSync(configPath);
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "ENOENT") {
			return { config: {}, path: configPath, warnings: [] };
		}
		return {
			config: {},
			path: configPath,
			warnings: [`config file not accessible (${code ?? String(err)}), using defaults`],
		};
	}

	// Invalidate cache if path changed or mtime changed
	if (cachedResult && cachedResult.path === configPath && configMtime === stat.mtimeMs) {
		return cachedResult;
	}

	let result: ConfigLoadResult;
	try {
		const raw = fs.readFileSync(configPath, "utf-8");
		const parsed: unknown = JSON5.parse(raw);
		const validated = HardlineConfigSchema.safeParse(parsed);
		if (validated.success) {
			result = { config: validated.data, path: configPath, warnings: [] };
		} else {
			const issues = validated.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
			result = {
				config: {},
				path: configPath,
				warnings: [`config file rejected (${issues.join("; ")}), using defaults`],
			};
		}
	} catch (err) {
		result = {
			config: {},
			path: configPath,
			warnings: [`config file could not be parsed (${String(err)}), using defaults`],
		};
	}

	cachedResult = result;
	configMtime = stat.mtimeMs;
	return result;
}

export function loadConfig(): HardlineConfig {
	return loadConfigWithDiagnostics().config;
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedResult = null;
	configMtime = null;
}
