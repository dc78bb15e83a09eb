import winston from "winston";
import { config } from "./config";

/**
 * Receiver for row- and cell-level violations.
 *
 * Passing a sink switches reading into lenient mode: violations are reported here and the
 * offending row is skipped. A winston logger satisfies this interface.
 */
export interface LogSink {
	warn(message: string): void;
}

const consoleFormat = winston.format.combine(
	winston.format.timestamp({ format: "HH:mm:ss" }),
	winston.format.printf(({ timestamp, level, message, component }) => {
		const suffix = typeof component === "string" ? ` (${component})` : "";
		return `${timestamp} [${level}]: ${message}${suffix}`;
	})
);

export const logger = winston.createLogger({
	level: config.logging.level,
	defaultMeta: { service: "tabular-metadata" },
	transports: [
		new winston.transports.Console({
			format: config.nodeEnv === "production" ? winston.format.json() : consoleFormat,
			stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
		}),
	],
});

export const createComponentLogger = (component: string): winston.Logger => {
	return logger.child({ component });
};

/** A sink that drops every message; reads become lenient without reporting anything. */
export const silentLog: LogSink = {
	warn(): void {},
};

/**
 * A sink that remembers what it was told. Handy for callers that want to inspect
 * violations after a lenient read.
 */
export class CollectingLog implements LogSink {
	private readonly _messages: string[] = [];

	get messages(): readonly string[] {
		return this._messages;
	}

	warn(message: string): void {
		this._messages.push(message);
	}
}
