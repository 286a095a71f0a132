/**
 * Lexical helpers shared by the construct parsers and the DDL parsers.
 *
 * The tokenizer never fails: unterminated strings, comments and
 * dollar-quoted bodies run to the end of the text instead of failing.
 */

export type TokenType = "word" | "number" | "string" | "quoted" | "symbol";

export interface Token {
	readonly type: TokenType;
	/** Token text; for strings and quoted identifiers, the unquoted content */
	readonly value: string;
	/** Upper-cased value for keyword comparisons (words only, else value) */
	readonly upper: string;
	readonly start: number;
	readonly end: number;
}

export interface Statement {
	readonly text: string;
	readonly start: number;
	readonly end: number;
	readonly tokens: readonly Token[];
}

const MULTI_CHAR_SYMBOLS = ["<<", ">>", "::", ":=", "||", "<=", ">=", "<>", "!=", "=>"];

const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

export function tokenize(text: string): Token[] {
	const tokens: Token[] = [];
	let i = 0;

	while (i < text.length) {
		const ch = text[i];

		if (/\s/.test(ch)) {
			i++;
			continue;
		}

		// Line comment
		if (ch === "-" && text[i + 1] === "-") {
			const eol = text.indexOf("\n", i);
			i = eol === -1 ? text.length : eol + 1;
			continue;
		}

		// Block comment
		if (ch === "/" && text[i + 1] === "*") {
			const close = text.indexOf("*/", i + 2);
			i = close === -1 ? text.length : close + 2;
			continue;
		}

		if (ch === "'") {
			const { value, end } = readQuoted(text, i, "'");
			tokens.push({ type: "string", value, upper: value, start: i, end });
			i = end;
			continue;
		}

		if (ch === '"') {
			const { value, end } = readQuoted(text, i, '"');
			tokens.push({ type: "quoted", value, upper: value, start: i, end });
			i = end;
			continue;
		}

		if (ch === "$") {
			const tag = DOLLAR_TAG.exec(text.slice(i));
			if (tag) {
				const bodyStart = i + tag[0].length;
				const close = text.indexOf(tag[0], bodyStart);
				const end = close === -1 ? text.length : close + tag[0].length;
				const value = text.slice(bodyStart, close === -1 ? text.length : close);
				tokens.push({ type: "string", value, upper: value, start: i, end });
				i = end;
				continue;
			}
			// Positional parameter ($1)
			const param = /^\$\d+/.exec(text.slice(i));
			if (param) {
				tokens.push({ type: "word", value: param[0], upper: param[0], start: i, end: i + param[0].length });
				i += param[0].length;
				continue;
			}
		}

		const word = /^[A-Za-z_][A-Za-z0-9_$]*/.exec(text.slice(i, i + 256));
		if (word) {
			const value = word[0];
			tokens.push({ type: "word", value, upper: value.toUpperCase(), start: i, end: i + value.length });
			i += value.length;
			continue;
		}

		const num = /^\d+(?:\.\d+)?/.exec(text.slice(i, i + 64));
		if (num) {
			tokens.push({ type: "number", value: num[0], upper: num[0], start: i, end: i + num[0].length });
			i += num[0].length;
			continue;
		}

		const pair = text.slice(i, i + 2);
		const symbol = MULTI_CHAR_SYMBOLS.includes(pair) ? pair : ch;
		tokens.push({ type: "symbol", value: symbol, upper: symbol, start: i, end: i + symbol.length });
		i += symbol.length;
	}

	return tokens;
}

function readQuoted(text: string, start: number, quote: string): { value: string; end: number } {
	let value = "";
	let i = start + 1;
	while (i < text.length) {
		if (text[i] === quote) {
			if (text[i + 1] === quote) {
				value += quote;
				i += 2;
				continue;
			}
			return { value, end: i + 1 };
		}
		value += text[i];
		i++;
	}
	return { value, end: text.length };
}

export function isWord(token: Token | undefined, ...keywords: string[]): boolean {
	return token !== undefined && token.type === "word" && keywords.includes(token.upper);
}

export function isSymbol(token: Token | undefined, symbol: string): boolean {
	return token !== undefined && token.type === "symbol" && token.value === symbol;
}

/**
 * Index of the ")" closing the "(" at openIndex, or -1 when unbalanced.
 */
export function findClosingParen(tokens: readonly Token[], openIndex: number): number {
	let depth = 0;
	for (let i = openIndex; i < tokens.length; i++) {
		if (isSymbol(tokens[i], "(")) depth++;
		else if (isSymbol(tokens[i], ")")) {
			depth--;
			if (depth === 0) return i;
		}
	}
	return -1;
}

/**
 * Index of the "(" opening the ")" at closeIndex, or -1 when unbalanced.
 */
export function findOpeningParen(tokens: readonly Token[], closeIndex: number): number {
	let depth = 0;
	for (let i = closeIndex; i >= 0; i--) {
		if (isSymbol(tokens[i], ")")) depth++;
		else if (isSymbol(tokens[i], "(")) {
			depth--;
			if (depth === 0) return i;
		}
	}
	return -1;
}

/**
 * Split token ranges on a symbol at parenthesis depth zero.
 */
export function splitTopLevel(tokens: readonly Token[], separator = ","): Token[][] {
	const parts: Token[][] = [];
	let current: Token[] = [];
	let depth = 0;
	for (const token of tokens) {
		if (isSymbol(token, "(") || isSymbol(token, "[")) depth++;
		if (isSymbol(token, ")") || isSymbol(token, "]")) depth--;
		if (depth === 0 && isSymbol(token, separator)) {
			parts.push(current);
			current = [];
		} else {
			current.push(token);
		}
	}
	if (current.length > 0) parts.push(current);
	return parts;
}

/**
 * Source text covered by a token range (original spacing preserved).
 */
export function sliceTokens(text: string, tokens: readonly Token[]): string {
	if (tokens.length === 0) return "";
	return text.slice(tokens[0].start, tokens[tokens.length - 1].end);
}

/**
 * Split a script into statements on top-level semicolons.
 */
export function splitStatements(script: string): Statement[] {
	const tokens = tokenize(script);
	const statements: Statement[] = [];
	let current: Token[] = [];

	const flush = () => {
		if (current.length === 0) return;
		const start = current[0].start;
		const end = current[current.length - 1].end;
		statements.push({ text: script.slice(start, end), start, end, tokens: current });
		current = [];
	};

	// BEGIN ATOMIC routine bodies contain semicolons of their own
	let atomicDepth = 0;
	let caseDepth = 0;

	for (const token of tokens) {
		const previous = current[current.length - 1];
		if (isWord(token, "ATOMIC") && isWord(previous, "BEGIN")) {
			atomicDepth++;
		} else if (atomicDepth > 0 && isWord(token, "CASE") && !isWord(previous, "END")) {
			caseDepth++;
		} else if (atomicDepth > 0 && isWord(token, "END")) {
			if (caseDepth > 0) caseDepth--;
			else atomicDepth--;
		}

		if (isSymbol(token, ";") && atomicDepth === 0) {
			flush();
		} else {
			current.push(token);
		}
	}
	flush();

	return statements;
}

/**
 * Lower-case a name and strip each table-kind prefix in turn, each at most once.
 */
export function stripPrefix(name: string, prefixes: readonly string[]): string {
	let stripped = name.toLowerCase();
	for (const prefix of prefixes) {
		const lower = prefix.toLowerCase();
		if (stripped.startsWith(lower)) {
			stripped = stripped.slice(lower.length);
		}
	}
	return stripped;
}

/**
 * Read a possibly schema-qualified name starting at index.
 */
export function readQualifiedName(
	tokens: readonly Token[],
	index: number
): { schema?: string; name: string; next: number } | undefined {
	const first = tokens[index];
	if (!first || (first.type !== "word" && first.type !== "quoted")) return undefined;
	if (isSymbol(tokens[index + 1], ".")) {
		const second = tokens[index + 2];
		if (second && (second.type === "word" || second.type === "quoted")) {
			return { schema: first.value, name: second.value, next: index + 3 };
		}
		return undefined;
	}
	return { name: first.value, next: index + 1 };
}
