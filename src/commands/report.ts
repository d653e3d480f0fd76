import chalk from "chalk";
import type { Command } from "commander";
import { getChildLogger } from "../logging.js";
import {
	DEFAULT_REPORT_HOURS,
	SecurityManager,
	type SecurityReport,
	toReportPayload,
} from "../security/manager.js";

const logger = getChildLogger({ module: "cmd-report" });

export type ReportCommandOptions = {
	hours?: string;
	json?: boolean;
};

function formatCounts(counts: Record<string, number | undefined>): string[] {
	const entries = Object.entries(counts)
		.filter((entry): entry is [string, number] => entry[1] !== undefined)
		.sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
	return entries.map(([name, count]) => `    ${name}: ${count}`);
}

/**
 * Human-readable report.
 */
export function formatReport(report: SecurityReport): string {
	const lines = [
		`Security report (last ${report.periodHours}h)`,
		`  Total events: ${report.totalEvents}${report.truncated ? " (scan truncated)" : ""}`,
	];

	if (report.totalEvents > 0) {
		lines.push("  By type:", ...formatCounts(report.eventCounts));
		lines.push("  By severity:", ...formatCounts(report.severityCounts));
		lines.push("  By source:", ...formatCounts(report.sourceCounts));
	}

	const blocked = report.blockedIdentifiers;
	lines.push(`  Blocked identifiers: ${blocked.length > 0 ? blocked.join(", ") : "none"}`);
	lines.push("  Recommendations:");
	for (const recommendation of report.recommendations) {
		lines.push(`    - ${recommendation}`);
	}
	return lines.join("\n");
}

export function registerReportCommand(program: Command): void {
	program
		.command("report")
		.description("Summarize recorded security events")
		.option("--hours <n>", "Reporting period in hours", String(DEFAULT_REPORT_HOURS))
		.option("--json", "Output as JSON")
		.action((opts: ReportCommandOptions) => {
			const hours = Number(opts.hours ?? DEFAULT_REPORT_HOURS);
			if (!Number.isFinite(hours) || hours <= 0) {
				console.error(`Invalid --hours: ${opts.hours}`);
				process.exitCode = 1;
				return;
			}

			const manager = SecurityManager.fromConfig();
			try {
				const report = manager.generateReport(hours);
				logger.debug({ hours, totalEvents: report.totalEvents }, "report generated via CLI");
				if (opts.json) {
					console.log(JSON.stringify(toReportPayload(report), null, 2));
				} else {
					const [title = "", ...rest] = formatReport(report).split("\n");
					console.log([chalk.bold(title), ...rest].join("\n"));
				}
			} finally {
				manager.close();
			}
		});
}
