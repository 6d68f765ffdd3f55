import type { Writable } from 'node:stream';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export type LogFields = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warning: 30,
	error: 40,
};

const ROOT_LOGGER = 'docex';

interface SetupLoggingOptions {
	stream?: Writable;
	logLevel?: LogLevel;
	json?: boolean;
	forceSetup?: boolean;
}

export const isLogLevel = (value: unknown): value is LogLevel =>
	typeof value === 'string' && Object.hasOwn(LEVEL_PRIORITY, value);

const levelFromEnv = (): LogLevel => {
	const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
	if (raw === 'warn') {
		return 'warning';
	}
	return isLogLevel(raw) ? raw : 'info';
};

let configured = false;
let globalLevel: LogLevel = levelFromEnv();
let jsonOutput = false;
let outputStream: Writable = process.stderr;

const serializeField = (value: unknown): unknown => {
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	return value;
};

const formatText = (level: LogLevel, name: string, message: string, fields?: LogFields) => {
	const paddedLevel = level.toUpperCase().padEnd(7, ' ');
	const line = `${paddedLevel} [${name}] ${message}`;
	if (!fields || Object.keys(fields).length === 0) {
		return line;
	}
	const rendered = Object.fromEntries(Object.entries(fields).map(([key, value]) => [key, serializeField(value)]));
	return `${line} ${JSON.stringify(rendered)}`;
};

const formatJson = (level: LogLevel, name: string, message: string, fields?: LogFields) => {
	const payload: Record<string, unknown> = {
		timestamp: new Date().toISOString(),
		level,
		logger: name,
		message,
	};
	for (const [key, value] of Object.entries(fields ?? {})) {
		payload[key] = serializeField(value);
	}
	return JSON.stringify(payload);
};

export class Logger {
	constructor(public readonly name: string) { }

	private shouldLog(level: LogLevel) {
		return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[globalLevel];
	}

	public get level(): LogLevel {
		return globalLevel;
	}

	private emit(level: LogLevel, message: string, fields?: LogFields) {
		if (!this.shouldLog(level)) {
			return;
		}

		const line = jsonOutput
			? formatJson(level, this.name, message, fields)
			: formatText(level, this.name, message, fields);
		outputStream.write(`${line}\n`);
	}

	debug(message: string, fields?: LogFields) {
		this.emit('debug', message, fields);
	}

	info(message: string, fields?: LogFields) {
		this.emit('info', message, fields);
	}

	warning(message: string, fields?: LogFields) {
		this.emit('warning', message, fields);
	}

	// Alias for compatibility
	warn(message: string, fields?: LogFields) {
		this.warning(message, fields);
	}

	error(message: string, fields?: LogFields) {
		this.emit('error', message, fields);
	}

	child(suffix: string) {
		return new Logger(`${this.name}.${suffix}`);
	}
}

export const createLogger = (name: string) => new Logger(name.startsWith(ROOT_LOGGER) ? name : `${ROOT_LOGGER}.${name}`);

export const setupLogging = (options: SetupLoggingOptions = {}) => {
	if (configured && !options.forceSetup) {
		return logger;
	}

	globalLevel = options.logLevel || levelFromEnv();
	jsonOutput = options.json ?? false;
	outputStream = options.stream || process.stderr;
	configured = true;

	return logger;
};

export const logger = new Logger(ROOT_LOGGER);
