import { describe, test, expect } from "vitest";
import { isCreateTable, parseCommentOnTable, parseCreateTable } from "./tableParser.js";
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

const UNIT_DDL = `
CREATE TABLE IF NOT EXISTS app.tb_unit (
	pk_unit bigint GENERATED ALWAYS AS IDENTITY,
	id uuid NOT NULL DEFAULT gen_random_uuid() UNIQUE,
	identifier varchar(64) NOT NULL,
	fk_unit_info bigint REFERENCES app.tb_unit_info (pk_unit_info) ON DELETE SET DEFAULT,
	amount numeric(10, 2) CHECK (amount >= 0 AND amount IS NOT NULL),
	created_at timestamp   with time zone,
	CONSTRAINT pk_tb_unit PRIMARY KEY (pk_unit),
	CONSTRAINT uq_identifier UNIQUE (identifier),
	FOREIGN KEY (id) REFERENCES other_table
);
COMMENT ON TABLE app.tb_unit IS 'Organizational units';
`;

describe("parseCreateTable", () => {
	test("reads columns, keys and constraints", () => {
		const table = parseCreateTable(UNIT_DDL);

		expect(table.schema).toBe("app");
		expect(table.name).toBe("tb_unit");
		expect(table.comment).toBe("Organizational units");
		expect(table.columns).toEqual([
			{ name: "pk_unit", type: "bigint", isNullable: false, hasDefault: true, isPrimaryKey: true, isUnique: false },
			{ name: "id", type: "uuid", isNullable: false, hasDefault: true, isPrimaryKey: false, isUnique: true },
			{ name: "identifier", type: "varchar(64)", isNullable: false, hasDefault: false, isPrimaryKey: false, isUnique: false },
			{ name: "fk_unit_info", type: "bigint", isNullable: true, hasDefault: false, isPrimaryKey: false, isUnique: false },
			{ name: "amount", type: "numeric(10, 2)", isNullable: true, hasDefault: false, isPrimaryKey: false, isUnique: false },
			{ name: "created_at", type: "timestamp with time zone", isNullable: true, hasDefault: false, isPrimaryKey: false, isUnique: false },
		]);
		expect(table.primaryKey).toEqual(["pk_unit"]);
		expect(table.uniqueConstraints).toEqual([["identifier"]]);
		expect(table.checkConstraints).toEqual(["amount >= 0 AND amount IS NOT NULL"]);
		expect(table.foreignKeys).toEqual([
			{ columns: ["fk_unit_info"], referencedSchema: "app", referencedTable: "tb_unit_info", referencedColumns: ["pk_unit_info"] },
			{ columns: ["id"], referencedTable: "other_table", referencedColumns: [] },
		]);
	});

	test("uses inline primary keys and serial defaults", () => {
		const table = parseCreateTable("CREATE TEMP TABLE tb_tag (pk_tag serial PRIMARY KEY, name text)");

		expect(table.schema).toBe("public");
		expect(table.primaryKey).toEqual(["pk_tag"]);
		expect(table.columns[0]).toEqual({
			name: "pk_tag",
			type: "serial",
			isNullable: false,
			hasDefault: true,
			isPrimaryKey: true,
			isUnique: false,
		});
		expect(table.comment).toBeUndefined();
	});

	test("keeps quoted identifiers as written", () => {
		const table = parseCreateTable('CREATE TABLE "Tb_Mixed" ("Name" text)');
		expect(table.name).toBe("Tb_Mixed");
		expect(table.columns.map((c) => c.name)).toEqual(["Name"]);
	});

	test("ignores comments on other tables", () => {
		const table = parseCreateTable("CREATE TABLE tb_a (x int); COMMENT ON TABLE tb_b IS 'other';");
		expect(table.comment).toBeUndefined();
	});

	test.each([
		["SELECT 1", "No CREATE TABLE statement found"],
		["CREATE TABLE tb_x", "Expected column list after table tb_x"],
		["CREATE TABLE tb_x (a int", "Column list of table tb_x is not closed"],
		["CREATE TABLE tb_x ()", "Table tb_x has no columns"],
		["CREATE TABLE tb_x (a NOT NULL)", "Column a has no type"],
	])("rejects %s", (sql, message) => {
		const error = thrown(() => parseCreateTable(sql));
		expect(error).toBeInstanceOf(DdlParseError);
		expect(error).toMatchObject({ message });
	});

	test("errors carry a flattened excerpt of the statement", () => {
		expect(thrown(() => parseCreateTable("CREATE TABLE\n\ttb_x"))).toMatchObject({ excerpt: "CREATE TABLE tb_x" });
	});
});

describe("statement classification", () => {
	test("isCreateTable accepts table modifiers", () => {
		expect(isCreateTable(tokenize("CREATE UNLOGGED TABLE t (a int)"))).toBe(true);
		expect(isCreateTable(tokenize("CREATE GLOBAL TEMPORARY TABLE t (a int)"))).toBe(true);
		expect(isCreateTable(tokenize("CREATE INDEX i ON t (a)"))).toBe(false);
	});

	test("parseCommentOnTable", () => {
		const parse = (sql: string) => parseCommentOnTable(sql, tokenize(sql));

		expect(parse("COMMENT ON TABLE tb_x IS 'Things'")).toEqual({ table: "tb_x", comment: "Things" });
		expect(parse("COMMENT ON TABLE tb_x IS NULL")).toBeUndefined();
		expect(parse("COMMENT ON COLUMN tb_x.a IS 'A'")).toBeUndefined();
		expect(thrown(() => parse("COMMENT ON TABLE tb_x IS 42"))).toMatchObject({
			message: "COMMENT ON TABLE needs a string literal",
		});
	});
});
