import { describe, test, expect } from "vitest";
import { ParserCoordinator, confidenceDeltaFor } from "./parserCoordinator.js";
import { createLogger } from "./logger.js";
import { emptyMetrics } from "./model.js";
import type { ConstructParser } from "./constructParser.js";

function capture() {
	const lines: string[] = [];
	const logger = createLogger({ level: "warn", destination: { write: (line) => lines.push(line) } });
	const records = () => lines.map((line): unknown => JSON.parse(line));
	return { logger, records };
}

const FOUR_CTES = "WITH a AS (SELECT 1), b AS (SELECT 2), c AS (SELECT 3), d AS (SELECT 4) SELECT * FROM d";

describe("confidence deltas", () => {
	test("a recursive query with two CTEs adds 0.15", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });
		const result = coordinator.parseWithCte(
			"WITH RECURSIVE walk AS (SELECT 1 AS n UNION ALL SELECT n + 1 FROM walk WHERE n < 5), total AS (SELECT sum(n) FROM walk) SELECT * FROM total"
		);

		expect(result.succeeded).toBe(true);
		expect(result.confidenceDelta).toBe(0.15);
		expect(result.metadata.cteCount).toBe(2);
	});

	test("more than two plain CTEs add 0.15", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });
		expect(coordinator.parseWithCte(FOUR_CTES).confidenceDelta).toBe(0.15);
	});

	test("recursion and complexity stack", () => {
		expect(confidenceDeltaFor("cte", { isRecursive: true, cteCount: 3 })).toBe(0.2);
		expect(confidenceDeltaFor("cte", { isRecursive: false, cteCount: 1 })).toBe(0.1);
	});

	test("dynamic SQL lowers confidence", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });
		const result = coordinator.parseWithDynamicSql("EXECUTE format('SELECT %s FROM tb_x', col);");

		expect(result.confidenceDelta).toBe(-0.1);
		expect(result.metadata.hasFormat).toBe(true);
	});

	test("fixed deltas per construct", () => {
		expect(confidenceDeltaFor("exception", {})).toBe(0.05);
		expect(confidenceDeltaFor("control-flow", {})).toBe(0.08);
		expect(confidenceDeltaFor("window", {})).toBe(0.08);
		expect(confidenceDeltaFor("aggregate", {})).toBe(0.07);
		expect(confidenceDeltaFor("cursor", {})).toBe(0.08);
	});
});

describe("ParserCoordinator", () => {
	test("runs the parsers whose signals fire, in order", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });
		const results = coordinator.parseWithBestParsers(
			"BEGIN WITH RECURSIVE t AS (SELECT 1 UNION SELECT 2) SELECT * FROM t; EXCEPTION WHEN others THEN NULL; END;"
		);

		expect(results.map((r) => [r.construct, r.confidenceDelta])).toEqual([
			["cte", 0.15],
			["exception", 0.05],
		]);
		expect(coordinator.totalDelta(results)).toBe(0.2);
		expect(coordinator.getMetrics()).toEqual({
			...emptyMetrics(),
			"cte": { attempts: 1, successes: 1, failures: 0 },
			"exception": { attempts: 1, successes: 1, failures: 0 },
		});
	});

	test("contains parser errors and logs a warning", () => {
		const { logger, records } = capture();
		const coordinator = new ParserCoordinator({ logger });

		const result = coordinator.parseWithControlFlow("IF ready THEN go();");

		expect(result).toEqual({
			construct: "control-flow",
			steps: [],
			confidenceDelta: 0,
			metadata: { failure: "unterminated-block" },
			succeeded: false,
		});
		expect(records()).toHaveLength(1);
		expect(records()[0]).toMatchObject({
			level: "warn",
			component: "parser-coordinator",
			construct: "control-flow",
			errorKind: "unterminated-block",
			error: "IF block is missing END IF",
			msg: "control-flow parser failed",
		});
		expect(coordinator.getMetrics()["control-flow"]).toEqual({ attempts: 1, successes: 0, failures: 1 });
	});

	test("a RAISE EXCEPTION body counts as an exception block", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });
		const result = coordinator.parseWithException("BEGIN IF n < 0 THEN RAISE EXCEPTION 'negative'; END IF; END;");

		expect(result.succeeded).toBe(true);
		expect(result.confidenceDelta).toBe(0.05);
		expect(result.steps.map((s) => s.rawText)).toEqual(["EXCEPTION 'negative'; END IF; END;"]);
		expect(coordinator.getMetrics()["exception"]).toEqual({ attempts: 1, successes: 1, failures: 0 });
	});

	test("an empty result is a quiet failure", () => {
		const { logger, records } = capture();
		const coordinator = new ParserCoordinator({ logger });

		expect(coordinator.parseWithCte("SELECT 1").metadata).toEqual({ failure: "empty" });
		expect(coordinator.parseWithCte("   ").metadata).toEqual({ failure: "invalid-input" });
		expect(records()).toEqual([expect.objectContaining({ errorKind: "invalid-input" })]);
	});

	test("errors that are not parse errors are contained as unexpected", () => {
		const broken: ConstructParser = {
			construct: "window",
			parse: () => {
				throw new Error("boom");
			},
			describe: () => ({}),
		};
		const { logger, records } = capture();
		const coordinator = new ParserCoordinator({ logger, parsers: { window: broken } });

		expect(coordinator.parseWithBestParsers("SELECT rank() OVER (ORDER BY x) FROM tb_x")).toEqual([]);
		expect(records()[0]).toMatchObject({ construct: "window", errorKind: "unexpected", error: "boom" });
	});

	test("parseWith skips signal detection", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });
		const text = "SELECT rank() OVER w FROM tb_x WINDOW w AS (ORDER BY score)";

		expect(coordinator.shouldUseWindowParser(text)).toBe(false);
		expect(coordinator.parseWithBestParsers(text)).toEqual([]);

		const result = coordinator.parseWith("window", text);
		expect(result.succeeded).toBe(true);
		expect(result.confidenceDelta).toBe(0.08);
		expect(result.steps[0].attributes).toEqual({ function: "rank", window: "w" });
	});

	test("success rates are zero before any attempt", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });

		expect(Object.values(coordinator.getSuccessRates())).toEqual([0, 0, 0, 0, 0, 0, 0]);
		expect(coordinator.getMetricsSummary()).toBe("Parser Success Rates:");
	});

	test("summarizes attempted constructs sorted by name", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });
		coordinator.parseWithCte(FOUR_CTES);
		coordinator.parseWithControlFlow("WHILE x LOOP NULL;");

		expect(coordinator.getSuccessRates()["cte"]).toBe(1);
		expect(coordinator.getMetricsSummary()).toBe(
			["Parser Success Rates:", "  control-flow   :   0.0% (1 attempts)", "  cte            : 100.0% (1 attempts)"].join("\n")
		);
	});

	test("metrics snapshots are copies and reset is idempotent", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });
		const before = coordinator.getMetrics();
		coordinator.parseWithCte(FOUR_CTES);

		expect(before["cte"].attempts).toBe(0);

		coordinator.resetMetrics();
		coordinator.resetMetrics();
		expect(coordinator.getMetrics()).toEqual(emptyMetrics());
	});

	test("reset then the same calls reproduce the same snapshot", () => {
		const coordinator = new ParserCoordinator({ logger: capture().logger });
		const run = () => {
			coordinator.parseWithCte(FOUR_CTES);
			coordinator.parseWithControlFlow("IF ready THEN go();");
			coordinator.parseWithCursor("SELECT 1");
			coordinator.parseWithBestParsers("BEGIN NULL; EXCEPTION WHEN others THEN NULL; END;");
			return coordinator.getMetrics();
		};

		const first = run();
		expect(first).toEqual({
			...emptyMetrics(),
			"cte": { attempts: 1, successes: 1, failures: 0 },
			"control-flow": { attempts: 1, successes: 0, failures: 1 },
			"cursor": { attempts: 1, successes: 0, failures: 1 },
			"exception": { attempts: 1, successes: 1, failures: 0 },
		});

		coordinator.resetMetrics();
		expect(run()).toEqual(first);
	});
});
