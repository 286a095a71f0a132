import { createStep, type ConstructStep, type ParserMetadata, type StepKind } from "./model.js";
import { ConstructParseError } from "./errors.js";
import { requireText, type ConstructParser } from "./constructParser.js";
import { findClosingParen, isSymbol, isWord, sliceTokens, tokenize, type Token } from "./sqlText.js";

/**
 * Parses explicit cursor handling: declarations (bound cursors and
 * refcursor variables), OPEN, FETCH, MOVE and CLOSE, in source order.
 */
export class CursorOperationsParser implements ConstructParser {
	readonly construct = "cursor" as const;

	parse(text: string): ConstructStep[] {
		requireText(this.construct, text);

		const tokens = tokenize(text);
		const steps: ConstructStep[] = [];

		for (let i = 0; i < tokens.length; i++) {
			const token = tokens[i];
			let read: { step: ConstructStep; end: number } | undefined;

			if (isWord(token, "OPEN")) {
				read = this._readOpen(text, tokens, i);
			} else if (isWord(token, "FETCH", "MOVE")) {
				read = this._readFetchOrMove(text, tokens, i);
			} else if (isWord(token, "CLOSE")) {
				read = this._readClose(text, tokens, i);
			} else if (token.type === "word" && isCursorDeclaration(tokens, i)) {
				read = this._readDeclaration(text, tokens, i);
			}

			if (read) {
				steps.push(read.step);
				i = read.end;
			}
		}

		return steps;
	}

	describe(_text: string, steps: readonly ConstructStep[]): ParserMetadata {
		const names = steps.map((s) => s.attributes.name ?? "");
		const closed = new Set(steps.filter((s) => s.kind === "cursor-close").map((s) => s.attributes.name));
		const opened = steps.filter((s) => s.kind === "cursor-open").map((s) => s.attributes.name ?? "");

		return {
			cursorNames: [...new Set(names)],
			operationCount: steps.length,
			unclosedCursors: [...new Set(opened.filter((name) => !closed.has(name)))],
		};
	}

	private _readDeclaration(text: string, tokens: readonly Token[], index: number): { step: ConstructStep; end: number } {
		const name = tokens[index].value;
		const end = statementEnd(tokens, index);

		if (isWord(tokens[index + 1], "REFCURSOR")) {
			return {
				step: createStep("cursor-declare", sliceTokens(text, tokens.slice(index, end)), {
					attributes: { name, bound: "false" },
				}),
				end,
			};
		}

		const attributes: Record<string, string> = { name, bound: "true" };
		let i = index + 1;
		if (isWord(tokens[i], "NO") && isWord(tokens[i + 1], "SCROLL")) {
			attributes.scroll = "false";
			i += 2;
		} else if (isWord(tokens[i], "SCROLL")) {
			attributes.scroll = "true";
			i++;
		}
		i++; // CURSOR

		if (isSymbol(tokens[i], "(")) {
			const close = findClosingParen(tokens, i);
			if (close === -1) {
				throw new ConstructParseError(this.construct, "unbalanced-parentheses", `Arguments of cursor "${name}" are not closed`);
			}
			attributes.arguments = sliceTokens(text, tokens.slice(i + 1, close));
			i = close + 1;
		}

		if (!isWord(tokens[i], "FOR", "IS")) {
			throw new ConstructParseError(this.construct, "malformed-clause", `Cursor "${name}" has no FOR query`);
		}
		attributes.query = sliceTokens(text, tokens.slice(i + 1, end));

		return { step: createStep("cursor-declare", sliceTokens(text, tokens.slice(index, end)), { attributes }), end };
	}

	private _readOpen(text: string, tokens: readonly Token[], index: number): { step: ConstructStep; end: number } {
		const end = statementEnd(tokens, index);
		const name = requireName(this.construct, tokens[index + 1], "OPEN");
		const attributes: Record<string, string> = { name };

		const forIndex = tokens.findIndex((t, i) => i > index + 1 && i < end && isWord(t, "FOR"));
		if (forIndex !== -1) {
			attributes.query = sliceTokens(text, tokens.slice(forIndex + 1, end));
		} else if (isSymbol(tokens[index + 2], "(")) {
			attributes.arguments = sliceTokens(text, tokens.slice(index + 3, end - 1));
		}

		return { step: createStep("cursor-open", sliceTokens(text, tokens.slice(index, end)), { attributes }), end };
	}

	private _readFetchOrMove(
		text: string,
		tokens: readonly Token[],
		index: number
	): { step: ConstructStep; end: number } | undefined {
		const keyword = tokens[index].upper;
		const kind: StepKind = keyword === "FETCH" ? "cursor-fetch" : "cursor-move";
		const end = statementEnd(tokens, index);

		const clause = tokens.slice(index + 1, end);
		const intoAt = clause.findIndex((t) => isWord(t, "INTO"));
		const head = intoAt === -1 ? clause : clause.slice(0, intoAt);
		// Row limiting clause of a query: FETCH FIRST n ROWS ONLY
		if (isWord(head[head.length - 1], "ONLY", "TIES")) return undefined;

		// FETCH [direction { FROM | IN }] name
		const fromAt = head.findIndex((t) => isWord(t, "FROM", "IN"));
		const nameToken = fromAt === -1 ? head[head.length - 1] : head[fromAt + 1];
		const direction = fromAt === -1 ? head.slice(0, -1) : head.slice(0, fromAt);

		const attributes: Record<string, string> = { name: requireName(this.construct, nameToken, keyword) };
		if (direction.length > 0) attributes.direction = sliceTokens(text, direction).toUpperCase();
		if (intoAt !== -1) attributes.into = sliceTokens(text, clause.slice(intoAt + 1));

		return { step: createStep(kind, sliceTokens(text, tokens.slice(index, end)), { attributes }), end };
	}

	private _readClose(text: string, tokens: readonly Token[], index: number): { step: ConstructStep; end: number } {
		const end = statementEnd(tokens, index);
		const name = requireName(this.construct, tokens[index + 1], "CLOSE");
		return {
			step: createStep("cursor-close", sliceTokens(text, tokens.slice(index, end)), { attributes: { name } }),
			end,
		};
	}
}

/**
 * `name CURSOR`, `name [NO] SCROLL CURSOR` or `name refcursor`.
 */
function isCursorDeclaration(tokens: readonly Token[], index: number): boolean {
	const previous = tokens[index - 1];
	// Skip `OPEN name`, `CLOSE name` and the like
	if (previous && previous.type === "word" && !isWord(previous, "DECLARE")) return false;

	const next = tokens[index + 1];
	if (isWord(next, "CURSOR", "REFCURSOR")) return true;
	if (isWord(next, "SCROLL")) return isWord(tokens[index + 2], "CURSOR");
	return isWord(next, "NO") && isWord(tokens[index + 2], "SCROLL") && isWord(tokens[index + 3], "CURSOR");
}

function requireName(construct: "cursor", token: Token | undefined, keyword: string): string {
	if (!token || (token.type !== "word" && token.type !== "quoted")) {
		throw new ConstructParseError(construct, "malformed-clause", `${keyword} without a cursor name`);
	}
	return token.value;
}

function statementEnd(tokens: readonly Token[], from: number): number {
	let depth = 0;
	for (let i = from; i < tokens.length; i++) {
		if (isSymbol(tokens[i], "(")) depth++;
		else if (isSymbol(tokens[i], ")")) depth--;
		else if (depth <= 0 && isSymbol(tokens[i], ";")) return i;
	}
	return tokens.length;
}
