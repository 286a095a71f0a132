import { describe, test, expect } from "vitest";
import { BASE_SCORE, scoreTable } from "./baselineConfidence.js";
import type { ParsedTable } from "./model.js";

function table(name: string, columns: [string, string][], primaryKey: string[] = []): ParsedTable {
	return {
		schema: "public",
		name,
		columns: columns.map(([column, type]) => ({
			name: column,
			type,
			isNullable: !primaryKey.includes(column),
			hasDefault: false,
			isPrimaryKey: primaryKey.includes(column),
			isUnique: false,
		})),
		primaryKey,
		uniqueConstraints: [],
		foreignKeys: [],
		checkConstraints: [],
	};
}

describe("scoreTable", () => {
	test("a table following every convention", () => {
		const contact = table(
			"tb_contact",
			[
				["pk_contact", "bigint"],
				["id", "uuid"],
				["identifier", "text"],
				["tenant_id", "uuid"],
				["deleted_at", "timestamptz"],
				["created_at", "timestamptz"],
				["updated_at", "timestamptz"],
			],
			["pk_contact"]
		);

		expect(scoreTable(contact)).toEqual({
			score: 0.95,
			signals: ["surrogate-key", "external-id", "identifier", "multi-tenant", "soft-delete", "audit-trail", "trinity"],
		});
	});

	test("a table following none starts at the base score", () => {
		expect(scoreTable(table("tb_note", [["note", "text"]]))).toEqual({ score: BASE_SCORE, signals: [] });
	});

	test("a single integer primary key counts as a surrogate key", () => {
		expect(scoreTable(table("tb_code", [["code", "integer"]], ["code"]))).toEqual({
			score: 0.6,
			signals: ["surrogate-key"],
		});
	});

	test("a pk_<entity> column counts whatever its type, after the prefix is stripped", () => {
		expect(scoreTable(table("tv_summary", [["pk_summary", "text"]])).signals).toEqual(["surrogate-key"]);
	});

	test("id must be a uuid and audit needs both timestamps", () => {
		const result = scoreTable(
			table("tb_order", [
				["id", "UUID"],
				["fk_customer_org", "bigint"],
				["created_at", "timestamptz"],
			])
		);
		expect(result).toEqual({ score: 0.55, signals: ["external-id", "multi-tenant"] });

		expect(scoreTable(table("tb_order", [["id", "bigint"]])).signals).toEqual([]);
	});
});
