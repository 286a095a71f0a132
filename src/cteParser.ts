import { createStep, type ConstructStep, type ParserMetadata } from "./model.js";
import { ConstructParseError } from "./errors.js";
import { requireText, type ConstructParser } from "./constructParser.js";
import { findClosingParen, isSymbol, isWord, tokenize, type Token } from "./sqlText.js";

export type CtePattern = "recursive-hierarchy" | "tree-traversal" | "materialized-path";

const DEFAULT_MAX_DEPTH = 10;

/**
 * Parses common table expressions: `WITH [RECURSIVE] name [(cols)] AS (...)`.
 *
 * One `cte` step is emitted per named CTE. CTEs nested inside a CTE body are
 * parsed recursively and emitted before the CTE that contains them.
 */
export class CteParser implements ConstructParser {
	readonly construct = "cte" as const;

	constructor(private readonly _maxDepth: number = DEFAULT_MAX_DEPTH) { }

	parse(text: string): ConstructStep[] {
		requireText(this.construct, text);
		return this._parseAtDepth(text, 0);
	}

	describe(text: string, steps: readonly ConstructStep[]): ParserMetadata {
		return {
			isRecursive: /\bRECURSIVE\b/i.test(text),
			cteCount: steps.length,
			cteNames: steps.map((s) => s.attributes.name ?? ""),
			patterns: detectCtePatterns(steps),
		};
	}

	private _parseAtDepth(text: string, depth: number): ConstructStep[] {
		if (depth > this._maxDepth) {
			throw new ConstructParseError(
				this.construct,
				"nesting-too-deep",
				`CTE nesting exceeds ${this._maxDepth} levels`
			);
		}

		const tokens = tokenize(text);
		const steps: ConstructStep[] = [];
		let consumedUntil = -1;

		for (let i = 0; i < tokens.length; i++) {
			if (i <= consumedUntil || !isWord(tokens[i], "WITH")) continue;
			const clause = this._readWithClause(text, tokens, i + 1, depth);
			steps.push(...clause.steps);
			consumedUntil = clause.end;
		}

		return steps;
	}

	/**
	 * Read the CTE list following a WITH keyword. Stops at the first token that
	 * does not continue the list (usually the main query).
	 */
	private _readWithClause(
		text: string,
		tokens: readonly Token[],
		index: number,
		depth: number
	): { steps: ConstructStep[]; end: number } {
		const steps: ConstructStep[] = [];
		let i = isWord(tokens[index], "RECURSIVE") ? index + 1 : index;
		let end = index - 1;

		while (i < tokens.length) {
			const nameToken = tokens[i];
			if (nameToken.type !== "word" && nameToken.type !== "quoted") break;

			let j = i + 1;
			let columns: string[] = [];
			if (isSymbol(tokens[j], "(")) {
				const close = findClosingParen(tokens, j);
				if (close === -1) {
					throw new ConstructParseError(
						this.construct,
						"unbalanced-parentheses",
						`Column list of CTE "${nameToken.value}" is not closed`
					);
				}
				columns = tokens
					.slice(j + 1, close)
					.filter((t) => t.type === "word" || t.type === "quoted")
					.map((t) => t.value);
				j = close + 1;
			}

			if (!isWord(tokens[j], "AS")) break;
			j++;
			let materialized: string | undefined;
			if (isWord(tokens[j], "NOT") && isWord(tokens[j + 1], "MATERIALIZED")) {
				materialized = "false";
				j += 2;
			} else if (isWord(tokens[j], "MATERIALIZED")) {
				materialized = "true";
				j++;
			}
			if (!isSymbol(tokens[j], "(")) break;

			const close = findClosingParen(tokens, j);
			if (close === -1) {
				throw new ConstructParseError(
					this.construct,
					"unbalanced-parentheses",
					`CTE "${nameToken.value}" has no closing parenthesis`
				);
			}

			const body = text.slice(tokens[j].end, tokens[close].start);
			if (/\bWITH\b/i.test(body)) {
				steps.push(...this._parseAtDepth(body, depth + 1));
			}

			const attributes: Record<string, string> = { name: nameToken.value };
			if (columns.length > 0) attributes.columns = columns.join(", ");
			if (materialized !== undefined) attributes.materialized = materialized;
			steps.push(createStep("cte", body.trim(), { attributes }));

			end = close;
			if (!isSymbol(tokens[close + 1], ",")) break;
			i = close + 2;
		}

		return { steps, end };
	}
}

/**
 * Classify what the CTE bodies are used for.
 */
export function detectCtePatterns(steps: readonly ConstructStep[]): CtePattern[] {
	const patterns = new Set<CtePattern>();

	for (const step of steps) {
		const query = step.rawText.toUpperCase();
		if (!query) continue;

		if (/\bUNION\b/.test(query) && /PARENT|CHILD|LEVEL/.test(query)) {
			patterns.add("recursive-hierarchy");
		}
		if (/\bCONNECT\s+BY\b/.test(query)) {
			patterns.add("tree-traversal");
		}
		if (query.includes("PATH") && (query.includes("CONCAT") || query.includes("||"))) {
			patterns.add("materialized-path");
		}
	}

	return [...patterns];
}
