import { describe, test, expect } from "vitest";
import { findClosingParen, splitStatements, splitTopLevel, stripPrefix, tokenize } from "./sqlText.js";

describe("tokenize", () => {
	test("reads strings, quoted identifiers, dollar bodies and parameters", () => {
		const tokens = tokenize(`SELECT 'it''s', "Col" -- trailing comment
$$body; x$$ $1 a::int /* block */`);

		expect(tokens.map((t) => [t.type, t.value])).toEqual([
			["word", "SELECT"],
			["string", "it's"],
			["symbol", ","],
			["quoted", "Col"],
			["string", "body; x"],
			["word", "$1"],
			["word", "a"],
			["symbol", "::"],
			["word", "int"],
		]);
	});

	test("upper-cases words only", () => {
		const [word, text] = tokenize("select 'abc'");
		expect(word.upper).toBe("SELECT");
		expect(text.upper).toBe("abc");
	});

	test("runs an unterminated string to the end of the text", () => {
		const tokens = tokenize("x = 'open");
		expect(tokens[2]).toEqual({ type: "string", value: "open", upper: "open", start: 4, end: 9 });
	});

	test("keeps a tagged dollar body whole", () => {
		const tokens = tokenize("AS $fn$ SELECT $$inner$$; $fn$ LANGUAGE sql");
		expect(tokens.map((t) => t.value)).toEqual(["AS", " SELECT $$inner$$; ", "LANGUAGE", "sql"]);
	});
});

describe("splitStatements", () => {
	test("splits on top-level semicolons only", () => {
		const statements = splitStatements("CREATE TABLE a (x int); SELECT ';' ;  ");
		expect(statements.map((s) => s.text)).toEqual(["CREATE TABLE a (x int)", "SELECT ';'"]);
	});

	test("keeps BEGIN ATOMIC bodies together", () => {
		const statements = splitStatements(
			"CREATE FUNCTION f() RETURNS int LANGUAGE sql BEGIN ATOMIC SELECT CASE WHEN true THEN 1 END; END; SELECT 3;"
		);
		expect(statements.map((s) => s.text)).toEqual([
			"CREATE FUNCTION f() RETURNS int LANGUAGE sql BEGIN ATOMIC SELECT CASE WHEN true THEN 1 END; END",
			"SELECT 3",
		]);
	});
});

describe("helpers", () => {
	test("findClosingParen matches nested parentheses", () => {
		const tokens = tokenize("f(a, (b), c) + 1");
		expect(findClosingParen(tokens, 1)).toBe(9);
		expect(findClosingParen(tokenize("f(a, (b)"), 1)).toBe(-1);
	});

	test("splitTopLevel ignores separators inside parentheses", () => {
		const parts = splitTopLevel(tokenize("a numeric(10, 2), b text"));
		expect(parts.map((p) => p.map((t) => t.value).join(" "))).toEqual(["a numeric ( 10 , 2 )", "b text"]);
	});

	test("stripPrefix lower-cases and strips each prefix in order", () => {
		expect(stripPrefix("TB_Contact", ["tb_", "tv_"])).toBe("contact");
		expect(stripPrefix("tb_tv_x", ["tb_", "tv_"])).toBe("x");
		expect(stripPrefix("tv_tb_x", ["tb_", "tv_"])).toBe("tb_x");
		expect(stripPrefix("contact", ["tb_"])).toBe("contact");
	});
});
