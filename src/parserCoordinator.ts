import {
	CONSTRUCT_KINDS,
	emptyMetrics,
	roundScore,
	type ConstructKind,
	type ConstructStep,
	type ParserMetadata,
	type ParserMetrics,
	type ParserMetricsSnapshot,
	type ParserResult,
} from "./model.js";
import { ConstructParseError, errorMessage, type ParseErrorKind } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { ConstructParser } from "./constructParser.js";
import { CteParser } from "./cteParser.js";
import { ExceptionHandlerParser } from "./exceptionHandlerParser.js";
import { DynamicSqlParser } from "./dynamicSqlParser.js";
import { ControlFlowParser } from "./controlFlowParser.js";
import { WindowFunctionParser } from "./windowFunctionParser.js";
import { AggregateFilterParser } from "./aggregateFilterParser.js";
import { CursorOperationsParser } from "./cursorOperationsParser.js";
import { SIGNAL_DETECTORS } from "./signalDetector.js";

export interface ParserCoordinatorOptions {
	readonly logger?: Logger;
	/** Replace the parser used for a construct */
	readonly parsers?: Partial<Record<ConstructKind, ConstructParser>>;
}

/** Why an invocation produced no steps */
export type FailureReason = ParseErrorKind | "empty" | "unexpected";

type Outcome =
	| { readonly status: "succeeded"; readonly steps: readonly ConstructStep[]; readonly metadata: ParserMetadata }
	| { readonly status: "failed"; readonly reason: FailureReason };

type Counter = { -readonly [K in keyof ParserMetrics]: ParserMetrics[K] };

export function defaultParsers(): Record<ConstructKind, ConstructParser> {
	return {
		"cte": new CteParser(),
		"exception": new ExceptionHandlerParser(),
		"dynamic-sql": new DynamicSqlParser(),
		"control-flow": new ControlFlowParser(),
		"window": new WindowFunctionParser(),
		"aggregate": new AggregateFilterParser(),
		"cursor": new CursorOperationsParser(),
	};
}

/**
 * Confidence adjustment a successful parse contributes.
 */
export function confidenceDeltaFor(construct: ConstructKind, metadata: ParserMetadata): number {
	switch (construct) {
		case "cte": {
			let delta = metadata.isRecursive === true ? 0.15 : 0.1;
			const cteCount = metadata.cteCount;
			if (typeof cteCount === "number" && cteCount > 2) {
				delta += 0.05;
			}
			return roundScore(delta, 2);
		}
		case "exception":
			return 0.05;
		case "dynamic-sql":
			return -0.1;
		case "control-flow":
			return 0.08;
		case "window":
			return 0.08;
		case "aggregate":
			return 0.07;
		case "cursor":
			return 0.08;
		default: {
			const unknownConstruct: never = construct;
			throw new Error(`Unknown construct ${String(unknownConstruct)}`);
		}
	}
}

/**
 * Runs the construct parsers a text fragment needs and keeps per-construct
 * success metrics. Parser failures are contained here: no call on this class
 * throws because a parser did.
 */
export class ParserCoordinator {
	private readonly _parsers: Record<ConstructKind, ConstructParser>;
	private readonly _logger: Logger;
	private _metrics: Record<ConstructKind, Counter> = emptyMetrics();

	constructor(options: ParserCoordinatorOptions = {}) {
		this._parsers = { ...defaultParsers() };
		for (const kind of CONSTRUCT_KINDS) {
			const override = options.parsers?.[kind];
			if (override) {
				this._parsers[kind] = override;
			}
		}
		this._logger = (options.logger ?? createLogger()).child({ component: "parser-coordinator" });
	}

	/**
	 * Run every construct parser whose signal fires, in dispatch order.
	 * Only successful results are returned.
	 */
	parseWithBestParsers(text: string): ParserResult[] {
		const results: ParserResult[] = [];
		for (const kind of CONSTRUCT_KINDS) {
			if (!SIGNAL_DETECTORS[kind](text)) {
				continue;
			}
			const result = this._run(kind, text);
			if (result.succeeded) {
				results.push(result);
			}
		}
		return results;
	}

	/**
	 * Run one construct parser regardless of its signal.
	 */
	parseWith(construct: ConstructKind, text: string): ParserResult {
		return this._run(construct, text);
	}

	parseWithCte(text: string): ParserResult {
		return this._run("cte", text);
	}

	parseWithException(text: string): ParserResult {
		return this._run("exception", text);
	}

	parseWithDynamicSql(text: string): ParserResult {
		return this._run("dynamic-sql", text);
	}

	parseWithControlFlow(text: string): ParserResult {
		return this._run("control-flow", text);
	}

	parseWithWindow(text: string): ParserResult {
		return this._run("window", text);
	}

	parseWithAggregate(text: string): ParserResult {
		return this._run("aggregate", text);
	}

	parseWithCursor(text: string): ParserResult {
		return this._run("cursor", text);
	}

	shouldUse(construct: ConstructKind, text: string): boolean {
		return SIGNAL_DETECTORS[construct](text);
	}

	shouldUseCteParser(text: string): boolean {
		return this.shouldUse("cte", text);
	}

	shouldUseExceptionParser(text: string): boolean {
		return this.shouldUse("exception", text);
	}

	shouldUseDynamicSqlParser(text: string): boolean {
		return this.shouldUse("dynamic-sql", text);
	}

	shouldUseControlFlowParser(text: string): boolean {
		return this.shouldUse("control-flow", text);
	}

	shouldUseWindowParser(text: string): boolean {
		return this.shouldUse("window", text);
	}

	shouldUseAggregateParser(text: string): boolean {
		return this.shouldUse("aggregate", text);
	}

	shouldUseCursorParser(text: string): boolean {
		return this.shouldUse("cursor", text);
	}

	totalDelta(results: readonly ParserResult[]): number {
		return roundScore(results.reduce((sum, r) => sum + r.confidenceDelta, 0));
	}

	getMetrics(): ParserMetricsSnapshot {
		const snapshot = emptyMetrics();
		for (const kind of CONSTRUCT_KINDS) {
			snapshot[kind] = { ...this._metrics[kind] };
		}
		return snapshot;
	}

	getSuccessRates(): Record<ConstructKind, number> {
		const rates = {
			"cte": 0,
			"exception": 0,
			"dynamic-sql": 0,
			"control-flow": 0,
			"window": 0,
			"aggregate": 0,
			"cursor": 0,
		};
		for (const kind of CONSTRUCT_KINDS) {
			const { attempts, successes } = this._metrics[kind];
			rates[kind] = attempts === 0 ? 0 : successes / attempts;
		}
		return rates;
	}

	resetMetrics(): void {
		this._metrics = emptyMetrics();
	}

	getMetricsSummary(): string {
		const rates = this.getSuccessRates();
		const lines = ["Parser Success Rates:"];
		const attempted = CONSTRUCT_KINDS.filter((kind) => this._metrics[kind].attempts > 0).sort();

		for (const kind of attempted) {
			const percent = `${(rates[kind] * 100).toFixed(1)}%`;
			lines.push(`  ${kind.padEnd(15)}: ${percent.padStart(6)} (${this._metrics[kind].attempts} attempts)`);
		}
		return lines.join("\n");
	}

	private _run(construct: ConstructKind, text: string): ParserResult {
		const counter = this._metrics[construct];
		counter.attempts++;

		const outcome = this._invoke(construct, text);
		if (outcome.status === "succeeded") {
			counter.successes++;
			return {
				construct,
				steps: outcome.steps,
				confidenceDelta: confidenceDeltaFor(construct, outcome.metadata),
				metadata: outcome.metadata,
				succeeded: true,
			};
		}

		counter.failures++;
		return {
			construct,
			steps: [],
			confidenceDelta: 0,
			metadata: { failure: outcome.reason },
			succeeded: false,
		};
	}

	/**
	 * Isolation boundary around a single parser call.
	 */
	private _invoke(construct: ConstructKind, text: string): Outcome {
		const parser = this._parsers[construct];
		try {
			const steps = parser.parse(text);
			if (steps.length === 0) {
				return { status: "failed", reason: "empty" };
			}
			return { status: "succeeded", steps, metadata: parser.describe(text, steps) };
		} catch (error) {
			const reason = failureReason(error);
			this._logger.warn(
				{ construct, errorKind: reason, error: errorMessage(error) },
				`${construct} parser failed`
			);
			return { status: "failed", reason };
		}
	}
}

function failureReason(error: unknown): FailureReason {
	if (!(error instanceof ConstructParseError)) {
		return "unexpected";
	}
	switch (error.kind) {
		case "invalid-input":
		case "unbalanced-parentheses":
		case "unterminated-block":
		case "malformed-clause":
		case "nesting-too-deep":
			return error.kind;
		default: {
			const unknownKind: never = error.kind;
			return unknownKind;
		}
	}
}
