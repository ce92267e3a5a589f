// CHANGE: In-process logger that records entries for assertions

import { type Layer, Logger } from "effect";

export interface LogEntry {
	readonly level: string;
	readonly message: string;
	readonly annotations: Readonly<Record<string, unknown>>;
}

/**
 * Replace the default logger with one that appends to `entries`.
 */
export function captureLogs(): {
	readonly entries: LogEntry[];
	readonly layer: Layer.Layer<never>;
} {
	const entries: LogEntry[] = [];
	const logger = Logger.make(({ logLevel, message, annotations }) => {
		entries.push({
			level: logLevel._tag,
			message: String(message),
			annotations: Object.fromEntries(annotations),
		});
	});
	return { entries, layer: Logger.replace(Logger.defaultLogger, logger) };
}
