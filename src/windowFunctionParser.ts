import { createStep, type ConstructStep, type ParserMetadata } from "./model.js";
import { ConstructParseError } from "./errors.js";
import { requireText, type ConstructParser } from "./constructParser.js";
import { findClosingParen, findOpeningParen, isSymbol, isWord, sliceTokens, tokenize, type Token } from "./sqlText.js";

const FRAME_KEYWORDS = ["ROWS", "RANGE", "GROUPS"];

/**
 * Parses `fn(args) [FILTER (WHERE ...)] OVER (window spec | window name)`.
 */
export class WindowFunctionParser implements ConstructParser {
	readonly construct = "window" as const;

	parse(text: string): ConstructStep[] {
		requireText(this.construct, text);

		const tokens = tokenize(text);
		const steps: ConstructStep[] = [];

		for (let i = 0; i < tokens.length; i++) {
			if (!isWord(tokens[i], "OVER")) continue;

			const call = findCall(tokens, i - 1);
			if (!call) continue;

			const attributes: Record<string, string> = { function: tokens[call.nameIndex].value.toLowerCase() };
			if (call.filter) attributes.filter = sliceTokens(text, call.filter);

			let end: number;
			const next = tokens[i + 1];
			if (isSymbol(next, "(")) {
				const close = findClosingParen(tokens, i + 1);
				if (close === -1) {
					throw new ConstructParseError(
						this.construct,
						"unbalanced-parentheses",
						`OVER clause of ${attributes.function}() is not closed`
					);
				}
				Object.assign(attributes, readWindowSpec(text, tokens.slice(i + 2, close)));
				end = close;
			} else if (next && (next.type === "word" || next.type === "quoted")) {
				attributes.window = next.value;
				end = i + 1;
			} else {
				throw new ConstructParseError(
					this.construct,
					"malformed-clause",
					`OVER of ${attributes.function}() has no window`
				);
			}

			steps.push(createStep("window-function", text.slice(tokens[call.nameIndex].start, tokens[end].end), { attributes }));
			i = end;
		}

		return steps;
	}

	describe(_text: string, steps: readonly ConstructStep[]): ParserMetadata {
		return {
			functionCount: steps.length,
			functions: [...new Set(steps.map((s) => s.attributes.function ?? ""))],
			hasPartition: steps.some((s) => s.attributes.partitionBy !== undefined),
			hasFrame: steps.some((s) => s.attributes.frame !== undefined),
		};
	}
}

interface CallSite {
	readonly nameIndex: number;
	readonly filter?: readonly Token[];
}

/**
 * Walk back from the token before OVER to the function name, skipping an
 * aggregate FILTER clause.
 */
function findCall(tokens: readonly Token[], lastIndex: number): CallSite | undefined {
	if (!isSymbol(tokens[lastIndex], ")")) return undefined;
	let open = findOpeningParen(tokens, lastIndex);
	if (open === -1) return undefined;

	let filter: Token[] | undefined;
	if (isWord(tokens[open - 1], "FILTER")) {
		filter = tokens.slice(open + 1, lastIndex);
		if (isWord(filter[0], "WHERE")) filter = filter.slice(1);
		const argsClose = open - 2;
		if (!isSymbol(tokens[argsClose], ")")) return undefined;
		open = findOpeningParen(tokens, argsClose);
		if (open === -1) return undefined;
	}

	const name = tokens[open - 1];
	if (!name || (name.type !== "word" && name.type !== "quoted")) return undefined;
	return filter ? { nameIndex: open - 1, filter } : { nameIndex: open - 1 };
}

function readWindowSpec(text: string, spec: readonly Token[]): Record<string, string> {
	const attributes: Record<string, string> = {};
	let depth = 0;
	let partitionAt = -1;
	let orderAt = -1;
	let frameAt = -1;

	for (let i = 0; i < spec.length; i++) {
		if (isSymbol(spec[i], "(")) depth++;
		else if (isSymbol(spec[i], ")")) depth--;
		if (depth !== 0) continue;

		if (isWord(spec[i], "PARTITION") && isWord(spec[i + 1], "BY")) partitionAt = i;
		else if (isWord(spec[i], "ORDER") && isWord(spec[i + 1], "BY")) orderAt = i;
		else if (isWord(spec[i], ...FRAME_KEYWORDS) && frameAt === -1) frameAt = i;
	}

	const boundaries = [partitionAt, orderAt, frameAt, spec.length].filter((b) => b !== -1);
	const until = (from: number) => Math.min(...boundaries.filter((b) => b > from));

	const firstClause = Math.min(...boundaries);
	if (firstClause > 0) {
		// OVER (w ORDER BY ...) refines an existing window
		attributes.window = sliceTokens(text, spec.slice(0, firstClause));
	}
	if (partitionAt !== -1) {
		attributes.partitionBy = sliceTokens(text, spec.slice(partitionAt + 2, until(partitionAt)));
	}
	if (orderAt !== -1) {
		attributes.orderBy = sliceTokens(text, spec.slice(orderAt + 2, until(orderAt)));
	}
	if (frameAt !== -1) {
		attributes.frame = sliceTokens(text, spec.slice(frameAt));
	}

	return attributes;
}
