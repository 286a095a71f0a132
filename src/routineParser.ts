import type { ParameterMode, ParsedRoutine, RoutineParameter } from "./model.js";
import { DdlParseError } from "./errors.js";
import {
	findClosingParen,
	isSymbol,
	isWord,
	readQualifiedName,
	sliceTokens,
	splitTopLevel,
	tokenize,
	type Token,
} from "./sqlText.js";
import { DEFAULT_SCHEMA } from "./tableParser.js";

const PARAMETER_MODES: readonly ParameterMode[] = ["IN", "OUT", "INOUT", "VARIADIC"];

/** Routine attributes that may follow the argument list, in any order */
const ROUTINE_OPTIONS = [
	"LANGUAGE", "AS", "IMMUTABLE", "STABLE", "VOLATILE", "STRICT", "SECURITY", "CALLED",
	"PARALLEL", "COST", "ROWS", "SET", "WINDOW", "LEAKPROOF", "NOT", "EXTERNAL",
	"SUPPORT", "TRANSFORM", "BEGIN", "RETURN", "RETURNS",
];

/** Second words of multi-word type names (`double precision`, `timestamp with time zone`) */
const TYPE_CONTINUATIONS = ["PRECISION", "VARYING", "WITH", "WITHOUT"];

export function isCreateRoutine(tokens: readonly Token[]): boolean {
	if (!isWord(tokens[0], "CREATE")) return false;
	const next = isWord(tokens[1], "OR") && isWord(tokens[2], "REPLACE") ? 3 : 1;
	return isWord(tokens[next], "FUNCTION", "PROCEDURE");
}

/**
 * Parse `CREATE [OR REPLACE] FUNCTION|PROCEDURE` with its parameters, return
 * type, language and body (dollar-quoted, quoted or `BEGIN ATOMIC`).
 */
export function parseRoutine(sql: string): ParsedRoutine {
	const tokens = tokenize(sql);
	if (!isCreateRoutine(tokens)) {
		throw new DdlParseError("Not a CREATE FUNCTION or CREATE PROCEDURE statement", sql);
	}

	let i = isWord(tokens[1], "OR") ? 3 : 1;
	const kind = tokens[i].upper === "PROCEDURE" ? "procedure" : "function";
	i++;

	const name = readQualifiedName(tokens, i);
	if (!name) {
		throw new DdlParseError(`CREATE ${kind.toUpperCase()} without a name`, sql);
	}
	if (!isSymbol(tokens[name.next], "(")) {
		throw new DdlParseError(`Expected parameter list after ${name.name}`, sql);
	}
	const close = findClosingParen(tokens, name.next);
	if (close === -1) {
		throw new DdlParseError(`Parameter list of ${name.name} is not closed`, sql);
	}
	const parameters = readParameters(sql, tokens.slice(name.next + 1, close));

	let returns: string | undefined;
	let language: string | undefined;
	let body: string | undefined;

	i = close + 1;
	while (i < tokens.length && !isSymbol(tokens[i], ";")) {
		const token = tokens[i];

		if (isWord(token, "RETURNS") && !isWord(tokens[i + 1], "NULL")) {
			const end = nextOption(tokens, i + 1);
			returns = collapse(sliceTokens(sql, tokens.slice(i + 1, end)));
			i = end;
		} else if (isWord(token, "LANGUAGE")) {
			const value = tokens[i + 1];
			if (!value) {
				throw new DdlParseError("LANGUAGE without a name", sql);
			}
			language = value.value.toLowerCase();
			i += 2;
		} else if (isWord(token, "AS")) {
			const value = tokens[i + 1];
			if (!value || value.type !== "string") {
				throw new DdlParseError(`Body of ${name.name} must be a string literal`, sql);
			}
			body = value.value;
			// AS 'obj_file', 'link_symbol' for C functions
			i = isSymbol(tokens[i + 2], ",") ? i + 4 : i + 2;
		} else if (isWord(token, "BEGIN") && isWord(tokens[i + 1], "ATOMIC")) {
			const end = atomicBodyEnd(sql, tokens, i + 2);
			body = sliceTokens(sql, tokens.slice(i, end + 1));
			language = language ?? "sql";
			i = end + 1;
		} else if (isWord(token, "RETURN")) {
			const end = nextStatementEnd(tokens, i);
			body = sliceTokens(sql, tokens.slice(i, end));
			i = end;
		} else {
			i++;
		}
	}

	if (body === undefined) {
		throw new DdlParseError(`${name.name} has no body`, sql);
	}

	const routine = {
		schema: name.schema ?? DEFAULT_SCHEMA,
		name: name.name,
		kind,
		parameters,
		language: language ?? "sql",
		body,
	} satisfies ParsedRoutine;

	return returns !== undefined ? { ...routine, returns } : routine;
}

/**
 * Parse an argument list such as `p_id uuid, OUT total integer DEFAULT 0`
 * (also the text `pg_get_function_arguments` returns).
 */
export function parseParameters(text: string): RoutineParameter[] {
	return readParameters(text, tokenize(text));
}

function readParameters(text: string, tokens: readonly Token[]): RoutineParameter[] {
	return splitTopLevel(tokens)
		.filter((part) => part.length > 0)
		.map((part) => readParameter(text, part));
}

function readParameter(text: string, part: readonly Token[]): RoutineParameter {
	let tokens = part;
	let mode: ParameterMode = "IN";
	const modeWord = PARAMETER_MODES.find((m) => isWord(tokens[0], m));
	if (modeWord && tokens.length > 1) {
		mode = modeWord;
		tokens = tokens.slice(1);
	}

	let defaultValue: string | undefined;
	const defaultAt = tokens.findIndex((t) => isWord(t, "DEFAULT") || isSymbol(t, "="));
	if (defaultAt !== -1) {
		defaultValue = sliceTokens(text, tokens.slice(defaultAt + 1));
		tokens = tokens.slice(0, defaultAt);
	}

	if (tokens.length === 0) {
		throw new DdlParseError("Parameter without a type", sliceTokens(text, part));
	}

	let name: string | undefined;
	if (hasParameterName(tokens)) {
		name = tokens[0].value;
		tokens = tokens.slice(1);
	}

	const parameter: RoutineParameter = { mode, type: collapse(sliceTokens(text, tokens)) };
	return {
		...parameter,
		...(name !== undefined ? { name } : {}),
		...(defaultValue !== undefined ? { defaultValue } : {}),
	};
}

function hasParameterName(tokens: readonly Token[]): boolean {
	if (tokens.length < 2) return false;
	const [first, second] = tokens;
	if (first.type !== "word" && first.type !== "quoted") return false;
	if (second.type === "symbol") return false;
	return !isWord(second, ...TYPE_CONTINUATIONS);
}

function nextOption(tokens: readonly Token[], from: number): number {
	let depth = 0;
	for (let i = from; i < tokens.length; i++) {
		if (isSymbol(tokens[i], "(")) depth++;
		else if (isSymbol(tokens[i], ")")) depth--;
		else if (depth === 0 && (isSymbol(tokens[i], ";") || isWord(tokens[i], ...ROUTINE_OPTIONS))) {
			return i;
		}
	}
	return tokens.length;
}

function atomicBodyEnd(sql: string, tokens: readonly Token[], from: number): number {
	let depth = 1;
	for (let i = from; i < tokens.length; i++) {
		if (isWord(tokens[i], "BEGIN") || (isWord(tokens[i], "CASE") && !isWord(tokens[i - 1], "END"))) depth++;
		else if (isWord(tokens[i], "END")) {
			depth--;
			if (depth === 0) return i;
		}
	}
	throw new DdlParseError("BEGIN ATOMIC without END", sql);
}

function nextStatementEnd(tokens: readonly Token[], from: number): number {
	const end = tokens.findIndex((t, i) => i >= from && isSymbol(t, ";"));
	return end === -1 ? tokens.length : end;
}

function collapse(text: string): string {
	return text.replace(/\s+/g, " ").trim();
}
