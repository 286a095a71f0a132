import { describe, test, expect } from "vitest";
import { isCreateRoutine, parseParameters, parseRoutine } from "./routineParser.js";
import { DdlParseError } from "./errors.js";
import { tokenize } from "./sqlText.js";

function thrown(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	return undefined;
}

describe("parseRoutine", () => {
	test("reads a dollar-quoted plpgsql function", () => {
		const routine = parseRoutine(`CREATE OR REPLACE FUNCTION app.fn_create_unit(
	p_identifier text,
	OUT p_id uuid,
	p_limit integer DEFAULT 10,
	double precision
) RETURNS SETOF record LANGUAGE plpgsql STABLE AS $$
BEGIN
	RETURN QUERY SELECT 1;
END;
$$;`);

		expect(routine).toEqual({
			schema: "app",
			name: "fn_create_unit",
			kind: "function",
			parameters: [
				{ mode: "IN", name: "p_identifier", type: "text" },
				{ mode: "OUT", name: "p_id", type: "uuid" },
				{ mode: "IN", name: "p_limit", type: "integer", defaultValue: "10" },
				{ mode: "IN", type: "double precision" },
			],
			returns: "SETOF record",
			language: "plpgsql",
			body: "\nBEGIN\n\tRETURN QUERY SELECT 1;\nEND;\n",
		});
	});

	test("reads a BEGIN ATOMIC procedure body", () => {
		const routine = parseRoutine(
			"CREATE PROCEDURE tb_note_touch(p_id bigint) LANGUAGE sql BEGIN ATOMIC UPDATE tb_note SET touched = CASE WHEN touched THEN false ELSE true END WHERE pk_note = p_id; END"
		);

		expect(routine.kind).toBe("procedure");
		expect(routine.returns).toBeUndefined();
		expect(routine.language).toBe("sql");
		expect(routine.body).toBe(
			"BEGIN ATOMIC UPDATE tb_note SET touched = CASE WHEN touched THEN false ELSE true END WHERE pk_note = p_id; END"
		);
	});

	test("reads a RETURN expression body", () => {
		const routine = parseRoutine("CREATE FUNCTION add_one(integer) RETURNS integer RETURN $1 + 1");

		expect(routine.parameters).toEqual([{ mode: "IN", type: "integer" }]);
		expect(routine.returns).toBe("integer");
		expect(routine.body).toBe("RETURN $1 + 1");
		expect(routine.schema).toBe("public");
	});

	test("RETURNS NULL ON NULL INPUT is not part of the return type", () => {
		const routine = parseRoutine("CREATE FUNCTION f() RETURNS int RETURNS NULL ON NULL INPUT LANGUAGE sql AS 'SELECT 1'");
		expect(routine.returns).toBe("int");
		expect(routine.body).toBe("SELECT 1");
	});

	test.each([
		["CREATE FUNCTION f() RETURNS int LANGUAGE sql", "f has no body"],
		["CREATE FUNCTION f RETURNS int", "Expected parameter list after f"],
		["CREATE FUNCTION f() AS 1", "Body of f must be a string literal"],
		["CREATE FUNCTION f() RETURNS int BEGIN ATOMIC SELECT 1;", "BEGIN ATOMIC without END"],
		["CREATE VIEW v AS SELECT 1", "Not a CREATE FUNCTION or CREATE PROCEDURE statement"],
	])("rejects %s", (sql, message) => {
		const error = thrown(() => parseRoutine(sql));
		expect(error).toBeInstanceOf(DdlParseError);
		expect(error).toMatchObject({ message });
	});
});

describe("parseParameters", () => {
	test("reads modes, array types and defaults", () => {
		expect(parseParameters("p_id uuid, VARIADIC p_tags text[], p_x integer = 5")).toEqual([
			{ mode: "IN", name: "p_id", type: "uuid" },
			{ mode: "VARIADIC", name: "p_tags", type: "text[]" },
			{ mode: "IN", name: "p_x", type: "integer", defaultValue: "5" },
		]);
	});

	test("an empty list has no parameters", () => {
		expect(parseParameters("")).toEqual([]);
	});
});

describe("isCreateRoutine", () => {
	test("accepts OR REPLACE", () => {
		expect(isCreateRoutine(tokenize("CREATE OR REPLACE PROCEDURE p() AS $$ $$"))).toBe(true);
		expect(isCreateRoutine(tokenize("CREATE TABLE t (a int)"))).toBe(false);
	});
});
