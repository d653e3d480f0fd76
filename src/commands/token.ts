import chalk from "chalk";
import type { Command } from "commander";
import { DEFAULT_TOKEN_BYTES, SecurityManager } from "../security/manager.js";

export type TokenCommandOptions = {
	bytes?: string;
};

export function registerTokenCommand(program: Command): void {
	program
		.command("token")
		.description("Generate a random URL-safe token")
		.option("-b, --bytes <n>", "Bytes of entropy", String(DEFAULT_TOKEN_BYTES))
		.action((opts: TokenCommandOptions) => {
			const bytes = Number(opts.bytes ?? DEFAULT_TOKEN_BYTES);
			const manager = new SecurityManager();
			try {
				console.log(manager.generateSecureToken(bytes));
			} catch (err) {
				console.error(chalk.red(err instanceof Error ? err.message : String(err)));
				process.exitCode = 1;
			} finally {
				manager.close();
			}
		});
}
