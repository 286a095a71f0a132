import { Command } from "commander";
import * as fs from "fs";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { openDatabase } from "./database.js";
import { extractSchema } from "./schemaExtractor.js";
import { ParserCoordinator } from "./parserCoordinator.js";
import { SchemaReverser, type ReverseResult } from "./schemaReverser.js";

/**
 * Where the CLI writes: results to `out`, summaries and logs to `err`.
 */
export interface CliIo {
	out(text: string): void;
	err(text: string): void;
}

const processIo: CliIo = {
	out: (text) => process.stdout.write(`${text}\n`),
	err: (text) => process.stderr.write(`${text}\n`),
};

interface ReverseOptions {
	connection?: string;
	schema: string;
	minConfidence?: number;
	config?: string;
	output?: string;
	metrics?: boolean;
}

interface ConstructsOptions {
	config?: string;
	metrics?: boolean;
}

function parseNumber(value: string): number {
	const parsed = Number(value);
	if (Number.isNaN(parsed)) {
		throw new ConfigError(`Not a number: ${value}`);
	}
	return parsed;
}

/** Logs go to stderr so stdout stays valid JSON */
function stderrLogger(level: string): Logger {
	return createLogger({ level, destination: { write: (line) => process.stderr.write(line) } });
}

function writeResult(io: CliIo, json: string, output: string | undefined): void {
	if (output) {
		fs.writeFileSync(output, `${json}\n`);
		io.err(`Written to ${output}`);
	} else {
		io.out(json);
	}
}

function summarize(result: ReverseResult, minConfidence: number): string {
	const total = result.entities.length + result.rejected.length;
	const lines = [
		`Entities above threshold (${Math.round(minConfidence * 100)}%): ${result.entities.length}/${total}`,
		`Info/instance pairs: ${result.pairs.length}`,
		`Unattached routines: ${result.unattachedActions.length}`,
	];
	if (result.errors.length > 0) {
		lines.push(`Excluded statements: ${result.errors.length}`);
	}
	return lines.join("\n");
}

export function createProgram(io: CliIo = processIo): Command {
	const program = new Command();

	program
		.name("schema-reverse")
		.description("Reverse-engineer canonical entities from PostgreSQL DDL and routines")
		.version("1.0.0");

	program
		.command("reverse")
		.description("Score tables, attach routines and detect info/instance pairs")
		.argument("[files...]", "SQL files to read")
		.option("-c, --connection <string>", "Read a live database instead (pglite:[path] or PostgreSQL URL)")
		.option("-s, --schema <name>", "Schema to read with --connection", "public")
		.option("-m, --min-confidence <number>", "Minimum confidence threshold (default: 0.80)", parseNumber)
		.option("--config <file>", "JSON configuration file")
		.option("-o, --output <file>", "Output JSON file (defaults to stdout)")
		.option("--metrics", "Print parser success rates")
		.action(async (files: string[], options: ReverseOptions) => {
			const config = loadConfig({
				file: options.config,
				overrides: { minConfidence: options.minConfidence },
			});
			const logger = stderrLogger(config.logLevel);
			const coordinator = new ParserCoordinator({ logger });
			const reverser = new SchemaReverser({ config, logger, coordinator });

			let result: ReverseResult;
			if (options.connection) {
				const db = await openDatabase(options.connection);
				try {
					result = reverser.reverseExtracted(await extractSchema(db.client, options.schema));
				} finally {
					await db.close();
				}
			} else {
				if (files.length === 0) {
					throw new ConfigError("Give at least one SQL file or --connection");
				}
				result = reverser.reverseSources(files.map((file) => ({ name: file, sql: fs.readFileSync(file, "utf-8") })));
			}

			const report = {
				entities: result.entities,
				rejected: result.rejected,
				pairs: result.pairs,
				unattachedActions: result.unattachedActions,
				errors: result.errors,
			};
			writeResult(io, JSON.stringify(report, null, 2), options.output);
			io.err(summarize(result, config.minConfidence));
			if (options.metrics) {
				io.err(coordinator.getMetricsSummary());
			}
		});

	program
		.command("constructs")
		.description("Show the constructs the specialized parsers find in a routine body")
		.argument("<file>", "File holding the routine body")
		.option("--config <file>", "JSON configuration file")
		.option("--metrics", "Print parser success rates")
		.action((file: string, options: ConstructsOptions) => {
			const config = loadConfig({ file: options.config });
			const logger = stderrLogger(config.logLevel);
			const coordinator = new ParserCoordinator({ logger });

			const results = coordinator.parseWithBestParsers(fs.readFileSync(file, "utf-8"));
			io.out(JSON.stringify({ results, totalDelta: coordinator.totalDelta(results) }, null, 2));
			if (options.metrics) {
				io.err(coordinator.getMetricsSummary());
			}
		});

	return program;
}
