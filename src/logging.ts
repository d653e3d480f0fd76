import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { type LoggingConfig, loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { CONFIG_DIR } from "./utils.js";

const DEFAULT_LOG_DIR = path.join(CONFIG_DIR, "logs");
export const DEFAULT_LOG_FILE = path.join(DEFAULT_LOG_DIR, "hardline.log");

/** Log file value that routes output to stdout */
export const STDOUT_LOG_FILE = "-";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

export type LoggerSettings = LoggingConfig;

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};
export type LoggerResolvedSettings = ResolvedSettings;

type Destination = ReturnType<typeof pino.destination>;

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: Destination | null = null;
// Child loggers created before a settings change still write here
const retiredDestinations: Destination[] = [];
let overrideSettings: LoggerSettings | null = null;

function isLevel(level: string): level is LevelWithSilent {
	return ALLOWED_LEVELS.some((allowed) => allowed === level);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function resolveSettings(): ResolvedSettings {
	const cfg = overrideSettings ?? loadConfig().logging;
	const level = normalizeLevel(cfg?.level);
	const file = cfg?.file ?? DEFAULT_LOG_FILE;
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination): void {
	try {
		dest.flushSync();
	} catch {
		// best-effort; nothing buffered or stream already closed
	}
	dest.end();
}

function prepareLogFile(file: string): void {
	const logDir = path.dirname(file);
	fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });

	// O_EXCL creates the file with 0600 atomically; an existing file keeps its
	// contents and only has its mode tightened.
	try {
		const fd = fs.openSync(
			file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
		fs.chmodSync(file, 0o600);
	}
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: Destination } {
	const toStdout = settings.file === STDOUT_LOG_FILE;
	if (!toStdout) {
		prepareLogFile(settings.file);
	}

	const destination = pino.destination({
		dest: toStdout ? 1 : settings.file,
		mkdir: !toStdout,
		sync: true, // deterministic for tests; log volume is modest.
	});
	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			retiredDestinations.push(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	return getLogger().child(bindings ?? {}, opts);
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	cachedLogger = null;
	cachedSettings = null;
}

export function closeLogger(): void {
	for (const dest of retiredDestinations.splice(0)) {
		closeDestination(dest);
	}
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
