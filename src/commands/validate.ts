import chalk from "chalk";
import type { Command } from "commander";
import { getChildLogger } from "../logging.js";
import { INPUT_KINDS } from "../security/input-validator.js";
import { SecurityManager } from "../security/manager.js";
import type { InputKind, ValidationResult } from "../security/types.js";

const logger = getChildLogger({ module: "cmd-validate" });

export type ValidateCommandOptions = {
	maxLength?: string;
	provider?: string;
	json?: boolean;
};

export function parseInputKind(kind: string): InputKind | undefined {
	return INPUT_KINDS.find((k) => k === kind);
}

export function formatValidationResult(kind: InputKind, result: ValidationResult): string {
	if (result.ok) {
		return `✓ valid ${kind}`;
	}
	const threat = result.threatType ? ` [${result.threatType}]` : "";
	return `✗ ${result.failure}${threat}: ${result.reason}`;
}

export function registerValidateCommand(program: Command): void {
	program
		.command("validate <kind> <value>")
		.description(`Validate a value as one of: ${INPUT_KINDS.join(", ")}`)
		.option("-m, --max-length <n>", "Maximum allowed length")
		.option("-p, --provider <name>", "API key provider (api_key only)")
		.option("--json", "Output as JSON")
		.action((kindArg: string, value: string, opts: ValidateCommandOptions) => {
			const kind = parseInputKind(kindArg);
			if (!kind) {
				console.error(`Unknown kind: ${kindArg} (expected one of ${INPUT_KINDS.join(", ")})`);
				process.exitCode = 1;
				return;
			}

			let maxLength: number | undefined;
			if (opts.maxLength !== undefined) {
				maxLength = Number.parseInt(opts.maxLength, 10);
				if (!Number.isInteger(maxLength) || maxLength <= 0) {
					console.error(`Invalid --max-length: ${opts.maxLength}`);
					process.exitCode = 1;
					return;
				}
			}

			const manager = SecurityManager.fromConfig();
			try {
				const result = manager.validateInput(value, kind, maxLength, {
					identifier: "cli",
					provider: opts.provider,
				});
				if (opts.json) {
					console.log(JSON.stringify(result, null, 2));
				} else {
					const line = formatValidationResult(kind, result);
					console.log(result.ok ? chalk.green(line) : chalk.red(line));
				}
				if (!result.ok) {
					logger.info({ kind, failure: result.failure }, "validation rejected via CLI");
					process.exitCode = 1;
				}
			} finally {
				manager.close();
			}
		});
}
