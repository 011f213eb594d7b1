/**
 * Log level enum
 * Defines the severity levels for logging
 */
export enum LogLevel {
	DEBUG = 'debug',
	INFO = 'info',
	WARN = 'warn',
	ERROR = 'error',
}

/**
 * Logger interface
 * Defines the contract for logger implementations
 */
export interface ILogger {
	debug(message: string, context?: Record<string, unknown>): void;
	info(message: string, context?: Record<string, unknown>): void;
	warn(message: string, context?: Record<string, unknown>): void;
	error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Console logger implementation.
 * Every level goes to stderr: stdout carries the MCP stdio transport.
 */
export class ConsoleLogger implements ILogger {
	/**
	 * Creates a new console logger
	 * @param level - Minimum log level to display
	 */
	constructor(private readonly level: LogLevel = LogLevel.INFO) {}

	debug(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.DEBUG, message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.INFO, message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.WARN, message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.write(LogLevel.ERROR, message, context);
	}

	private write(messageLevel: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (!this.shouldLog(messageLevel)) {
			return;
		}
		console.error(`[${messageLevel.toUpperCase()}] ${message}`, context || '');
	}

	/**
	 * Checks if a message with the given level should be logged
	 */
	private shouldLog(messageLevel: LogLevel): boolean {
		return LEVEL_ORDER.indexOf(messageLevel) >= LEVEL_ORDER.indexOf(this.level);
	}
}
