import type { ForeignKeyRef, ParsedColumn, ParsedTable } from "./model.js";
import { DdlParseError } from "./errors.js";
import {
	findClosingParen,
	isSymbol,
	isWord,
	readQualifiedName,
	sliceTokens,
	splitStatements,
	splitTopLevel,
	tokenize,
	type Token,
} from "./sqlText.js";

export const DEFAULT_SCHEMA = "public";

/** Keywords that end the type of a column definition */
const COLUMN_CONSTRAINT_WORDS = [
	"NOT", "NULL", "DEFAULT", "PRIMARY", "UNIQUE", "REFERENCES", "CHECK",
	"CONSTRAINT", "GENERATED", "COLLATE",
];

const SERIAL_TYPES = ["smallserial", "serial", "bigserial", "serial2", "serial4", "serial8"];

export interface TableComment {
	readonly schema?: string;
	readonly table: string;
	readonly comment: string;
}

interface MutableColumn {
	name: string;
	type: string;
	isNullable: boolean;
	hasDefault: boolean;
	isPrimaryKey: boolean;
	isUnique: boolean;
}

/**
 * Parse the first CREATE TABLE statement in `sql`. A `COMMENT ON TABLE` for the
 * same table anywhere in `sql` is attached.
 */
export function parseCreateTable(sql: string): ParsedTable {
	const statements = splitStatements(sql);
	const create = statements.find((s) => isCreateTable(s.tokens));
	if (!create) {
		throw new DdlParseError("No CREATE TABLE statement found", sql);
	}

	const table = parseCreateTableTokens(create.text, tokenize(create.text));

	for (const statement of statements) {
		const comment = parseCommentOnTable(statement.text, statement.tokens);
		if (comment && comment.table === table.name && (comment.schema ?? DEFAULT_SCHEMA) === table.schema) {
			return { ...table, comment: comment.comment };
		}
	}
	return table;
}

export function isCreateTable(tokens: readonly Token[]): boolean {
	if (!isWord(tokens[0], "CREATE")) return false;
	for (let i = 1; i < tokens.length && i < 4; i++) {
		if (isWord(tokens[i], "TABLE")) return true;
		if (!isWord(tokens[i], "GLOBAL", "LOCAL", "TEMP", "TEMPORARY", "UNLOGGED")) return false;
	}
	return false;
}

/**
 * `COMMENT ON TABLE [schema.]name IS '...'`, or undefined for any other statement.
 */
export function parseCommentOnTable(text: string, tokens: readonly Token[]): TableComment | undefined {
	if (!isWord(tokens[0], "COMMENT") || !isWord(tokens[1], "ON") || !isWord(tokens[2], "TABLE")) {
		return undefined;
	}
	const name = readQualifiedName(tokens, 3);
	if (!name || !isWord(tokens[name.next], "IS")) {
		throw new DdlParseError("Malformed COMMENT ON TABLE", text);
	}
	const value = tokens[name.next + 1];
	if (!value || value.type !== "string") {
		if (isWord(value, "NULL")) return undefined;
		throw new DdlParseError("COMMENT ON TABLE needs a string literal", text);
	}
	return name.schema !== undefined
		? { schema: name.schema, table: name.name, comment: value.value }
		: { table: name.name, comment: value.value };
}

/**
 * Parse a single CREATE TABLE statement; token offsets must refer to `text`.
 */
export function parseCreateTableTokens(text: string, tokens: readonly Token[]): ParsedTable {
	let i = 1;
	while (i < tokens.length && !isWord(tokens[i], "TABLE")) i++;
	i++;
	if (isWord(tokens[i], "IF") && isWord(tokens[i + 1], "NOT") && isWord(tokens[i + 2], "EXISTS")) {
		i += 3;
	}

	const name = readQualifiedName(tokens, i);
	if (!name) {
		throw new DdlParseError("CREATE TABLE without a table name", text);
	}
	if (!isSymbol(tokens[name.next], "(")) {
		throw new DdlParseError(`Expected column list after table ${name.name}`, text);
	}
	const close = findClosingParen(tokens, name.next);
	if (close === -1) {
		throw new DdlParseError(`Column list of table ${name.name} is not closed`, text);
	}

	const elements = splitTopLevel(tokens.slice(name.next + 1, close));
	if (elements.length === 0) {
		throw new DdlParseError(`Table ${name.name} has no columns`, text);
	}

	const columns: MutableColumn[] = [];
	const inlinePrimaryKey: string[] = [];
	let primaryKey: string[] | undefined;
	const uniqueConstraints: string[][] = [];
	const foreignKeys: ForeignKeyRef[] = [];
	const checkConstraints: string[] = [];

	for (const element of elements) {
		let parts = element;
		if (isWord(parts[0], "CONSTRAINT")) {
			parts = parts.slice(2);
		}
		const head = parts[0];
		if (!head) {
			throw new DdlParseError(`Empty element in table ${name.name}`, text);
		}

		if (isWord(head, "PRIMARY") && isWord(parts[1], "KEY")) {
			primaryKey = readColumnList(text, parts, 2);
		} else if (isWord(head, "UNIQUE")) {
			uniqueConstraints.push(readColumnList(text, parts, isWord(parts[1], "NULLS") ? 4 : 1));
		} else if (isWord(head, "FOREIGN") && isWord(parts[1], "KEY")) {
			const local = readColumnList(text, parts, 2);
			const referencesAt = parts.findIndex((t) => isWord(t, "REFERENCES"));
			if (referencesAt === -1) {
				throw new DdlParseError("FOREIGN KEY without REFERENCES", text);
			}
			foreignKeys.push(readReference(text, parts, referencesAt + 1, local));
		} else if (isWord(head, "CHECK")) {
			checkConstraints.push(readParenthesized(text, parts, 1));
		} else if (isWord(head, "EXCLUDE", "LIKE")) {
			continue;
		} else if (head.type === "word" || head.type === "quoted") {
			const column = readColumn(text, parts, foreignKeys, checkConstraints);
			if (column.isPrimaryKey) inlinePrimaryKey.push(column.name);
			columns.push(column);
		} else {
			throw new DdlParseError(`Unexpected "${head.value}" in table ${name.name}`, text);
		}
	}

	const key = primaryKey ?? inlinePrimaryKey;
	const finalColumns: ParsedColumn[] = columns.map((c) =>
		key.includes(c.name) ? { ...c, isPrimaryKey: true, isNullable: false } : c
	);

	return {
		schema: name.schema ?? DEFAULT_SCHEMA,
		name: name.name,
		columns: finalColumns,
		primaryKey: key,
		uniqueConstraints,
		foreignKeys,
		checkConstraints,
	};
}

function readColumn(
	text: string,
	parts: readonly Token[],
	foreignKeys: ForeignKeyRef[],
	checkConstraints: string[]
): MutableColumn {
	const name = parts[0].value;
	let i = 1;
	let depth = 0;
	while (i < parts.length) {
		if (isSymbol(parts[i], "(")) depth++;
		else if (isSymbol(parts[i], ")")) depth--;
		else if (depth === 0 && isWord(parts[i], ...COLUMN_CONSTRAINT_WORDS)) break;
		i++;
	}
	if (i === 1) {
		throw new DdlParseError(`Column ${name} has no type`, text);
	}

	const type = normalizeType(sliceTokens(text, parts.slice(1, i)));
	const column: MutableColumn = {
		name,
		type,
		isNullable: true,
		hasDefault: SERIAL_TYPES.includes(type),
		isPrimaryKey: false,
		isUnique: false,
	};

	for (depth = 0; i < parts.length; i++) {
		const token = parts[i];
		if (isSymbol(token, "(")) depth++;
		else if (isSymbol(token, ")")) depth--;
		if (depth > 0 || isSymbol(token, ")")) continue;

		if (isWord(token, "NOT") && isWord(parts[i + 1], "NULL")) {
			column.isNullable = false;
			i++;
		} else if (isWord(token, "PRIMARY") && isWord(parts[i + 1], "KEY")) {
			column.isPrimaryKey = true;
			column.isNullable = false;
			i++;
		} else if (isWord(token, "UNIQUE")) {
			column.isUnique = true;
		} else if (isWord(token, "DEFAULT", "GENERATED") && !isWord(parts[i - 1], "SET")) {
			column.hasDefault = true;
		} else if (isWord(token, "REFERENCES")) {
			foreignKeys.push(readReference(text, parts, i + 1, [name]));
		} else if (isWord(token, "CHECK")) {
			checkConstraints.push(readParenthesized(text, parts, i + 1));
		}
	}

	return column;
}

function readReference(text: string, parts: readonly Token[], index: number, columns: string[]): ForeignKeyRef {
	const target = readQualifiedName(parts, index);
	if (!target) {
		throw new DdlParseError("REFERENCES without a table", text);
	}
	const referencedColumns = isSymbol(parts[target.next], "(") ? readColumnList(text, parts, target.next) : [];
	const reference = { columns, referencedTable: target.name, referencedColumns };
	return target.schema !== undefined ? { ...reference, referencedSchema: target.schema } : reference;
}

function readColumnList(text: string, parts: readonly Token[], openIndex: number): string[] {
	if (!isSymbol(parts[openIndex], "(")) {
		throw new DdlParseError("Expected a column list", text);
	}
	const close = findClosingParen(parts, openIndex);
	if (close === -1) {
		throw new DdlParseError("Column list is not closed", text);
	}
	return splitTopLevel(parts.slice(openIndex + 1, close))
		.filter((column) => column.length > 0)
		.map((column) => column[0].value);
}

function readParenthesized(text: string, parts: readonly Token[], openIndex: number): string {
	if (!isSymbol(parts[openIndex], "(")) {
		throw new DdlParseError("Expected a parenthesized expression", text);
	}
	const close = findClosingParen(parts, openIndex);
	if (close === -1) {
		throw new DdlParseError("Expression is not closed", text);
	}
	return sliceTokens(text, parts.slice(openIndex + 1, close));
}

function normalizeType(type: string): string {
	return type.replace(/\s+/g, " ").toLowerCase();
}
