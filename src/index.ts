#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerReportCommand } from "./commands/report.js";
import { registerSanitizeCommand } from "./commands/sanitize.js";
import { registerTokenCommand } from "./commands/token.js";
import { registerValidateCommand } from "./commands/validate.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, getLogger } from "./logging.js";

// Create CLI program
const program = createProgram();

// Register commands
registerValidateCommand(program);
registerSanitizeCommand(program);
registerReportCommand(program);
registerTokenCommand(program);

// Apply global options before any command loads config
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (typeof opts.config === "string") {
		setConfigPath(opts.config);
	}
	if (opts.verbose === true) {
		setVerbose(true);
	}
	// Initialize logger after config path is set
	getLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		// Commander prints some errors itself; keep this minimal.
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// Let the process exit: the pino destination keeps a handle open.
		closeLogger();
	});
