import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { isVerbose } from "./globals.js";
import { expandHome } from "./utils.js";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

// stdout carries lookup results, so the default sink is stderr.
const STDERR_FD = 2;

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string | null;
};

type ClosableDestination = pino.DestinationStream & {
	flushSync?: () => void;
	end?: () => void;
};

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: ClosableDestination | null = null;
let overrideSettings: LoggerSettings | null = null;

function isLevel(candidate: string): candidate is LevelWithSilent {
	return ALLOWED_LEVELS.some((level) => level === candidate);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "warn";
	return isLevel(candidate) ? candidate : "warn";
}

function resolveSettings(): ResolvedSettings {
	const level = normalizeLevel(overrideSettings?.level ?? process.env.STOREDSAFE_LOG_LEVEL);
	const file = overrideSettings?.file ?? process.env.STOREDSAFE_LOG_FILE;
	return { level, file: file ? expandHome(file) : null };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: ClosableDestination): void {
	try {
		dest.flushSync?.();
	} catch {
		// best-effort
	}
	// Never end the shared stderr stream; file destinations are ours to close.
	if (cachedSettings?.file) {
		try {
			dest.end?.();
		} catch {
			// best-effort
		}
	}
}

function buildLogger(settings: ResolvedSettings): {
	logger: Logger;
	destination: ClosableDestination;
} {
	let destination: ClosableDestination;
	if (settings.file) {
		fs.mkdirSync(path.dirname(settings.file), { recursive: true, mode: 0o700 });
		// Lookup logs may name object ids and servers; keep them private.
		try {
			const fd = fs.openSync(
				settings.file,
				fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
				0o600,
			);
			fs.closeSync(fd);
		} catch (err) {
			if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
		}
		destination = pino.destination({ dest: settings.file, mkdir: true, sync: true });
	} else {
		destination = pino.destination({ dest: STDERR_FD, sync: true });
	}

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
			closeDestination(cachedDestination);
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

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	cachedLogger = null;
	cachedSettings = null;
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
