import pino from "pino";

export type Logger = pino.Logger;

/**
 * Anything pino can write JSON lines into.
 */
export interface LogSink {
	write(line: string): void;
}

export interface LoggerOptions {
	readonly level?: string;
	/** Write to this sink instead of stdout (no transport is used then) */
	readonly destination?: LogSink;
}

const serviceName = "schema-reverse";

function buildTransport(): pino.TransportSingleOptions | undefined {
	if (process.env.NODE_ENV !== "development") {
		// Plain JSON lines on stdout
		return undefined;
	}
	return {
		target: "pino-pretty",
		options: {
			colorize: true,
			translateTime: "SYS:standard",
			ignore: "pid,hostname",
		},
	};
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const config: pino.LoggerOptions = {
		level: options.level ?? process.env.LOG_LEVEL ?? "info",
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
			// Child bindings pass through this formatter as well
			bindings: ({ pid, hostname, ...rest }) =>
				pid === undefined ? rest : { ...rest, pid, host: hostname, service: serviceName },
		},
	};

	if (options.destination) {
		return pino(config, options.destination);
	}
	return pino({ ...config, transport: buildTransport() });
}
