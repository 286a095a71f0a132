import { describe, test, expect } from "vitest";
import {
	SIGNAL_DETECTORS,
	shouldUseAggregateParser,
	shouldUseControlFlowParser,
	shouldUseCteParser,
	shouldUseCursorParser,
	shouldUseDynamicSqlParser,
	shouldUseExceptionParser,
	shouldUseWindowParser,
} from "./signalDetector.js";

describe("signal detection", () => {
	test("matches keywords case-insensitively on word boundaries", () => {
		expect(shouldUseCteParser("with recent AS (SELECT 1) SELECT * FROM recent")).toBe(true);
		expect(shouldUseCteParser("SELECT withdrawn FROM tb_account")).toBe(false);
		expect(shouldUseExceptionParser("BEGIN NULL; Exception WHEN others THEN NULL; END")).toBe(true);
		expect(shouldUseDynamicSqlParser("EXECUTE 'SELECT 1'")).toBe(true);
		expect(shouldUseDynamicSqlParser("SELECT executed_at FROM tb_job")).toBe(false);
	});

	test("control flow needs a loop keyword", () => {
		expect(shouldUseControlFlowParser("FOR r IN SELECT 1 LOOP NULL; END LOOP")).toBe(true);
		expect(shouldUseControlFlowParser("WHILE n > 0 LOOP n := n - 1; END LOOP")).toBe(true);
		expect(shouldUseControlFlowParser("IF x THEN y := 1; END IF")).toBe(false);
	});

	test("window functions are recognized by OVER, PARTITION BY or ROW_NUMBER", () => {
		expect(shouldUseWindowParser("rank() over (ORDER BY score)")).toBe(true);
		expect(shouldUseWindowParser("PARTITION  BY tenant_id")).toBe(true);
		expect(shouldUseWindowParser("SELECT row_number")).toBe(true);
		expect(shouldUseWindowParser("SELECT overdue FROM tb_invoice")).toBe(false);
	});

	test("aggregate filter needs FILTER followed by WHERE", () => {
		expect(shouldUseAggregateParser("count(*) FILTER ( where active)")).toBe(true);
		expect(shouldUseAggregateParser("SELECT filter FROM tb_rule")).toBe(false);
	});

	test("cursor operations", () => {
		expect(shouldUseCursorParser("OPEN c")).toBe(true);
		expect(shouldUseCursorParser("fetch next FROM c INTO r")).toBe(true);
		expect(shouldUseCursorParser("SELECT opened_at FROM tb_ticket")).toBe(false);
	});

	test("every construct has a detector", () => {
		expect(Object.keys(SIGNAL_DETECTORS)).toEqual([
			"cte",
			"exception",
			"dynamic-sql",
			"control-flow",
			"window",
			"aggregate",
			"cursor",
		]);
		expect(SIGNAL_DETECTORS["cte"]).toBe(shouldUseCteParser);
	});
});
