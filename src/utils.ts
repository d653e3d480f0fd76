import os from "node:os";
import path from "node:path";

export const CONFIG_DIR = process.env.HARDLINE_DATA_DIR ?? path.join(os.homedir(), ".hardline");

/**
 * Shorten text for log lines and event excerpts.
 */
export function truncate(text: string, max: number): string {
	if (text.length <= max) return text;
	return `${text.slice(0, Math.max(0, max - 3))}...`;
}
