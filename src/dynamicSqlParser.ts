import { createStep, type ConstructStep, type ParserMetadata } from "./model.js";
import { requireText, type ConstructParser } from "./constructParser.js";
import { isSymbol, isWord, sliceTokens, tokenize, type Token } from "./sqlText.js";

export type DynamicSqlBuilder = "format" | "concatenation" | "literal" | "variable";

/**
 * Parses `EXECUTE <expr> [INTO [STRICT] targets] [USING args]` statements.
 * Trigger clauses (`EXECUTE FUNCTION`, `EXECUTE PROCEDURE`) are not dynamic SQL.
 */
export class DynamicSqlParser implements ConstructParser {
	readonly construct = "dynamic-sql" as const;

	parse(text: string): ConstructStep[] {
		requireText(this.construct, text);

		const tokens = tokenize(text);
		const steps: ConstructStep[] = [];

		for (let i = 0; i < tokens.length; i++) {
			if (!isWord(tokens[i], "EXECUTE")) continue;
			if (isWord(tokens[i + 1], "FUNCTION", "PROCEDURE")) continue;

			const end = statementEnd(tokens, i + 1);
			const statement = tokens.slice(i, end);
			if (statement.length < 2) continue;

			steps.push(this._toStep(text, statement));
			i = end;
		}

		return steps;
	}

	describe(text: string, steps: readonly ConstructStep[]): ParserMetadata {
		return {
			hasFormat: /\bformat\s*\(/i.test(text),
			statementCount: steps.length,
			hasUsing: steps.some((s) => s.attributes.using !== undefined),
			usesConcatenation: steps.some((s) => s.attributes.builder === "concatenation"),
		};
	}

	private _toStep(text: string, statement: readonly Token[]): ConstructStep {
		const body = statement.slice(1);
		const intoIndex = findTopLevel(body, "INTO");
		const usingIndex = findTopLevel(body, "USING");

		const expressionEnd = Math.min(
			intoIndex === -1 ? body.length : intoIndex,
			usingIndex === -1 ? body.length : usingIndex
		);
		const expression = body.slice(0, expressionEnd);

		const attributes: Record<string, string> = {
			builder: classifyBuilder(expression),
			expression: sliceTokens(text, expression),
		};

		if (intoIndex !== -1) {
			const targetEnd = usingIndex > intoIndex ? usingIndex : body.length;
			let targets = body.slice(intoIndex + 1, targetEnd);
			if (isWord(targets[0], "STRICT")) {
				attributes.strict = "true";
				targets = targets.slice(1);
			}
			attributes.into = sliceTokens(text, targets);
		}
		if (usingIndex !== -1) {
			const argsEnd = intoIndex > usingIndex ? intoIndex : body.length;
			attributes.using = sliceTokens(text, body.slice(usingIndex + 1, argsEnd));
		}

		return createStep("dynamic-sql", sliceTokens(text, statement), { attributes });
	}
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

function findTopLevel(tokens: readonly Token[], keyword: string): number {
	let depth = 0;
	for (let i = 0; i < tokens.length; i++) {
		if (isSymbol(tokens[i], "(")) depth++;
		else if (isSymbol(tokens[i], ")")) depth--;
		else if (depth === 0 && isWord(tokens[i], keyword)) return i;
	}
	return -1;
}

function classifyBuilder(expression: readonly Token[]): DynamicSqlBuilder {
	if (isWord(expression[0], "FORMAT") && isSymbol(expression[1], "(")) {
		return "format";
	}
	if (expression.some((t) => isSymbol(t, "||"))) {
		return "concatenation";
	}
	if (expression.length === 1 && expression[0].type === "string") {
		return "literal";
	}
	return "variable";
}
