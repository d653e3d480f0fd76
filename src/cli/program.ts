import { createRequire } from "node:module";
import { Command } from "commander";

const require = createRequire(import.meta.url);

function getVersion(): string {
	try {
		// Resolve package.json relative to this module (works from src or dist)
		const pkg: unknown = require("../../package.json");
		if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
			return typeof pkg.version === "string" ? pkg.version : "0.0.0";
		}
		return "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("hardline")
		.description("Input validation, rate limiting and audit tooling for service security")
		.version(getVersion())
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file");

	return program;
}
