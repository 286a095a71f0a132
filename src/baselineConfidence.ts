import { roundScore, type BaselineScore, type ConventionSignal, type ParsedTable } from "./model.js";
import { stripPrefix } from "./sqlText.js";

export const BASE_SCORE = 0.4;

const SIGNAL_WEIGHTS: Readonly<Record<Exclude<ConventionSignal, "trinity">, number>> = {
	"surrogate-key": 0.2,
	"external-id": 0.1,
	"identifier": 0.1,
	"multi-tenant": 0.05,
	"soft-delete": 0.05,
	"audit-trail": 0.05,
};

const INTEGER_TYPES = [
	"smallint", "integer", "int", "bigint", "int2", "int4", "int8",
	"smallserial", "serial", "bigserial", "serial2", "serial4", "serial8",
];

/**
 * Score how closely a table follows the house conventions: a `pk_<entity>`
 * surrogate key, a uuid `id`, an `identifier` lookup key, tenant scoping,
 * soft deletes and audit timestamps.
 */
export function scoreTable(table: ParsedTable, tablePrefixes: readonly string[] = ["tb_", "tv_"]): BaselineScore {
	const columns = new Map(table.columns.map((c) => [c.name.toLowerCase(), c]));
	const signals: ConventionSignal[] = [];

	const entity = stripPrefix(table.name, tablePrefixes);
	const singleKey = table.primaryKey.length === 1 ? columns.get(table.primaryKey[0].toLowerCase()) : undefined;
	if (columns.has(`pk_${entity}`) || (singleKey !== undefined && INTEGER_TYPES.includes(baseType(singleKey.type)))) {
		signals.push("surrogate-key");
	}

	const id = columns.get("id");
	if (id !== undefined && baseType(id.type) === "uuid") {
		signals.push("external-id");
	}
	if (columns.has("identifier")) {
		signals.push("identifier");
	}
	if (columns.has("tenant_id") || columns.has("fk_customer_org")) {
		signals.push("multi-tenant");
	}
	if (columns.has("deleted_at")) {
		signals.push("soft-delete");
	}
	if (columns.has("created_at") && columns.has("updated_at")) {
		signals.push("audit-trail");
	}

	let score = BASE_SCORE;
	for (const signal of signals) {
		if (signal !== "trinity") {
			score += SIGNAL_WEIGHTS[signal];
		}
	}

	if (signals.includes("surrogate-key") && signals.includes("external-id") && signals.includes("identifier")) {
		signals.push("trinity");
	}

	return { score: roundScore(score), signals };
}

function baseType(type: string): string {
	return type.toLowerCase().replace(/\(.*$/, "").trim();
}
