import fs from "node:fs";
import type { Command } from "commander";
import { getChildLogger } from "../logging.js";
import { SecurityManager } from "../security/manager.js";

const logger = getChildLogger({ module: "cmd-sanitize" });

export type SanitizeCommandOptions = {
	file?: string;
};

/**
 * Parse JSON input, falling back to treating it as a plain string.
 */
export function parseSanitizeInput(raw: string): unknown {
	try {
		const parsed: unknown = JSON.parse(raw);
		return parsed;
	} catch {
		return raw;
	}
}

export function registerSanitizeCommand(program: Command): void {
	program
		.command("sanitize [json]")
		.description("Print a JSON value (or plain text) with sensitive data redacted")
		.option("-f, --file <path>", "Read input from a file")
		.action((json: string | undefined, opts: SanitizeCommandOptions) => {
			let raw: string;
			if (opts.file) {
				try {
					raw = fs.readFileSync(opts.file, "utf-8");
				} catch (err) {
					logger.error({ file: opts.file, error: String(err) }, "could not read sanitize input");
					console.error(`Could not read ${opts.file}: ${String(err)}`);
					process.exitCode = 1;
					return;
				}
			} else if (json !== undefined) {
				raw = json;
			} else {
				console.error("Provide a JSON argument or --file");
				process.exitCode = 1;
				return;
			}

			const manager = SecurityManager.fromConfig();
			try {
				const sanitized = manager.sanitize(parseSanitizeInput(raw), "cli");
				console.log(
					typeof sanitized === "string" ? sanitized : JSON.stringify(sanitized, null, 2),
				);
			} finally {
				manager.close();
			}
		});
}
