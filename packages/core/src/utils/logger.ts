import nodeConsole from "node:console";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export type LogStream = "stdout" | "stderr";

const isLogStream = (value: string | undefined): value is LogStream =>
	value === "stdout" || value === "stderr";

const stderrConsole = new nodeConsole.Console({
	stdout: process.stderr,
	stderr: process.stderr,
});

const LOG_STREAM = process.env.LOG_STREAM;

let activeStream: LogStream = isLogStream(LOG_STREAM) ? LOG_STREAM : "stdout";

/**
 * Routes every subsequent log line. A process that prints its own result on
 * stdout sends logs to stderr.
 */
export const setLogStream = (stream: LogStream): void => {
	activeStream = stream;
};

const sink = (): Console => (activeStream === "stderr" ? stderrConsole : console);

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const entry: BaseLogPayload = { ts, ...payload };
	const out = sink();

	if (prettyEnabled) {
		try {
			printPretty(entry, out);
		} catch (error) {
			out.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		out.log(serializeEntry(entry));
	}
}

const serializeEntry = (entry: BaseLogPayload): string => {
	try {
		return JSON.stringify(sanitizeValue(entry, new WeakSet<object>()));
	} catch (err) {
		return JSON.stringify({
			ts: entry.ts,
			level: "error",
			event: "logging_error",
			module: "logger",
			error: err instanceof Error ? err.message : "serialization_failed",
		});
	}
};

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

export const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(entry: BaseLogPayload, out: Console): void {
	const { level, event, module, ts, ...rest } = entry;
	out.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	if (event === "analysis_summary") {
		printAnalysisSummary(rest, out);
		return;
	}
	if (Object.keys(rest).length) {
		out.log(rest);
	}
}

const printAnalysisSummary = (rest: Record<string, unknown>, out: Console): void => {
	const { candles, operations, counts } = rest;
	const row: Record<string, unknown> = { candles, operations };
	if (counts && typeof counts === "object") {
		Object.assign(row, counts);
	}
	out.table([row]);
};
