import { createStep, type ConstructStep, type ParserMetadata } from "./model.js";
import { ConstructParseError } from "./errors.js";
import { requireText, type ConstructParser } from "./constructParser.js";
import { findClosingParen, findOpeningParen, isSymbol, isWord, sliceTokens, tokenize } from "./sqlText.js";

/**
 * Parses filtered aggregates: `fn(args) FILTER (WHERE cond) [AS alias]`.
 */
export class AggregateFilterParser implements ConstructParser {
	readonly construct = "aggregate" as const;

	parse(text: string): ConstructStep[] {
		requireText(this.construct, text);

		const tokens = tokenize(text);
		const steps: ConstructStep[] = [];

		for (let i = 0; i < tokens.length; i++) {
			if (!isWord(tokens[i], "FILTER") || !isSymbol(tokens[i + 1], "(") || !isWord(tokens[i + 2], "WHERE")) {
				continue;
			}

			const close = findClosingParen(tokens, i + 1);
			if (close === -1) {
				throw new ConstructParseError(this.construct, "unbalanced-parentheses", "FILTER clause is not closed");
			}

			const argsClose = i - 1;
			const argsOpen = isSymbol(tokens[argsClose], ")") ? findOpeningParen(tokens, argsClose) : -1;
			const name = argsOpen > 0 ? tokens[argsOpen - 1] : undefined;
			if (!name || (name.type !== "word" && name.type !== "quoted")) {
				throw new ConstructParseError(this.construct, "malformed-clause", "FILTER does not follow an aggregate call");
			}

			const attributes: Record<string, string> = {
				function: name.value.toLowerCase(),
				arguments: sliceTokens(text, tokens.slice(argsOpen + 1, argsClose)),
				condition: sliceTokens(text, tokens.slice(i + 3, close)),
			};

			let end = close;
			if (isWord(tokens[close + 1], "AS") && tokens[close + 2]) {
				attributes.alias = tokens[close + 2].value;
				end = close + 2;
			}

			steps.push(createStep("aggregate-filter", text.slice(name.start, tokens[end].end), { attributes }));
			i = end;
		}

		return steps;
	}

	describe(_text: string, steps: readonly ConstructStep[]): ParserMetadata {
		return {
			filterCount: steps.length,
			functions: [...new Set(steps.map((s) => s.attributes.function ?? ""))],
		};
	}
}
