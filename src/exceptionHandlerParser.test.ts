import { describe, test, expect } from "vitest";
import { ExceptionHandlerParser } from "./exceptionHandlerParser.js";
import { ConstructParseError } from "./errors.js";

const BODY = "BEGIN INSERT INTO tb_log VALUES (1); EXCEPTION WHEN unique_violation THEN NULL; WHEN OTHERS THEN RAISE; END;";

describe("ExceptionHandlerParser", () => {
	const parser = new ExceptionHandlerParser();

	test("summarizes the handler block as one step", () => {
		const steps = parser.parse(BODY);

		expect(steps).toEqual([
			{
				kind: "try-except",
				rawText: "EXCEPTION WHEN unique_violation THEN NULL; WHEN OTHERS THEN RAISE; END;",
				thenBranch: [],
				elseBranch: [],
				attributes: {},
			},
		]);
		expect(parser.describe(BODY)).toEqual({ handlerCount: 2 });
	});

	test("splits handlers into condition and action", () => {
		expect(parser.parseHandlers(" WHEN unique_violation THEN NULL; WHEN OTHERS THEN RAISE; END;")).toEqual([
			{ condition: "unique_violation", action: "NULL;" },
			{ condition: "OTHERS", action: "RAISE; END;" },
		]);
	});

	test("splits on the first EXCEPTION, including RAISE EXCEPTION", () => {
		expect(parser.parse("IF n < 0 THEN RAISE EXCEPTION 'negative'; END IF;").map((s) => s.rawText)).toEqual([
			"EXCEPTION 'negative'; END IF;",
		]);
		expect(parser.describe("RAISE EXCEPTION 'negative';")).toEqual({ handlerCount: 0 });
	});

	test("a RAISE EXCEPTION before the block starts the step text", () => {
		const text = "BEGIN RAISE EXCEPTION 'x'; EXCEPTION WHEN others THEN NULL; END";
		const [step] = parser.parse(text);

		expect(step.rawText).toBe("EXCEPTION 'x'; EXCEPTION WHEN others THEN NULL; END");
		expect(parser.describe(text)).toEqual({ handlerCount: 1 });
	});

	test("a handler without THEN is malformed", () => {
		let error: unknown;
		try {
			parser.parse("BEGIN x; EXCEPTION WHEN others NULL; END");
		} catch (e) {
			error = e;
		}
		expect(error).toBeInstanceOf(ConstructParseError);
		expect(error).toMatchObject({
			construct: "exception",
			kind: "malformed-clause",
			message: 'Exception handler "WHEN others NULL; END" has no THEN',
		});
	});
});
