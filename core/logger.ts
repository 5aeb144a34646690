/**
 * Leveled logging for factories and registries.
 *
 * ConsoleLogger prints `HH:MM:SS.mmm [name] [LEVEL] message {context}` lines;
 * SilentLogger is the default so library users see nothing unless they ask.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogContext = Record<string, unknown>;

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

export class ConsoleLogger implements Logger {
	private readonly minLevel: number;

	constructor(
		level: LogLevel = "info",
		private readonly prefix = "flyweight",
	) {
		this.minLevel = LOG_LEVELS.indexOf(level);
	}

	debug(message: string, context?: LogContext): void {
		if (this.enabled("debug")) console.debug(this.format("DEBUG", message, context));
	}

	info(message: string, context?: LogContext): void {
		if (this.enabled("info")) console.info(this.format("INFO ", message, context));
	}

	warn(message: string, context?: LogContext): void {
		if (this.enabled("warn")) console.warn(this.format("WARN ", message, context));
	}

	error(message: string, context?: LogContext): void {
		if (this.enabled("error")) console.error(this.format("ERROR", message, context));
	}

	private enabled(level: LogLevel): boolean {
		return LOG_LEVELS.indexOf(level) >= this.minLevel;
	}

	private format(label: string, message: string, context?: LogContext): string {
		const ts = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
		const ctx = context !== undefined ? `  ${JSON.stringify(context)}` : "";
		return `${ts} [${this.prefix}] [${label}] ${message}${ctx}`;
	}
}

export class SilentLogger implements Logger {
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
}

/**
 * Build a logger for a level; "silent" gives a SilentLogger.
 */
export function createLogger(level: LogLevel, prefix?: string): Logger {
	return level === "silent" ? new SilentLogger() : new ConsoleLogger(level, prefix);
}
