import * as fs from "fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";

export const reverseConfigSchema = z.object({
	/** Entities scoring below this are rejected */
	minConfidence: z.number().min(0).max(1).default(0.8),
	/** Table-kind prefixes stripped before classification */
	tablePrefixes: z.array(z.string().min(1)).default(["tb_", "tv_"]),
	vocabularySuffix: z.string().min(1).default("_info"),
	logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type ReverseConfig = z.infer<typeof reverseConfigSchema>;
export type ReverseConfigInput = z.input<typeof reverseConfigSchema>;

export interface LoadConfigOptions {
	/** JSON file with any subset of the config keys */
	readonly file?: string;
	readonly env?: NodeJS.ProcessEnv;
	readonly overrides?: ReverseConfigInput;
}

/**
 * Resolve configuration from file, environment and explicit overrides
 * (later sources win).
 */
export function loadConfig(options: LoadConfigOptions = {}): ReverseConfig {
	const env = options.env ?? process.env;
	const merged: Record<string, unknown> = {};

	if (options.file) {
		Object.assign(merged, readConfigFile(options.file));
	}

	if (env.SCHEMA_REVERSE_MIN_CONFIDENCE !== undefined) {
		merged.minConfidence = Number(env.SCHEMA_REVERSE_MIN_CONFIDENCE);
	}
	if (env.LOG_LEVEL !== undefined) {
		merged.logLevel = env.LOG_LEVEL;
	}

	for (const [key, value] of Object.entries(options.overrides ?? {})) {
		if (value !== undefined) {
			merged[key] = value;
		}
	}

	const parsed = reverseConfigSchema.safeParse(merged);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid configuration: ${issues}`);
	}
	return parsed.data;
}

function readConfigFile(file: string): Record<string, unknown> {
	let content: unknown;
	try {
		content = JSON.parse(fs.readFileSync(file, "utf-8"));
	} catch (error) {
		throw new ConfigError(`Cannot read config file ${file}: ${errorMessage(error)}`);
	}
	if (typeof content !== "object" || content === null || Array.isArray(content)) {
		throw new ConfigError(`Config file ${file} must contain a JSON object`);
	}
	return { ...content };
}
