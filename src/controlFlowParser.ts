import { createStep, type ConstructStep, type ParserMetadata } from "./model.js";
import { ConstructParseError } from "./errors.js";
import { requireText, type ConstructParser } from "./constructParser.js";
import { isSymbol, isWord, sliceTokens, tokenize, type Token } from "./sqlText.js";

/**
 * Builds a step tree from PL/pgSQL control flow.
 *
 * - `IF ... THEN ... [ELSIF ...] [ELSE ...] END IF` becomes a `branch` step;
 *   an ELSIF chain nests as a single `branch` in the parent's elseBranch.
 * - `FOR/FOREACH/WHILE ... LOOP ... END LOOP` and bare `LOOP` become `loop`
 *   steps with the body in thenBranch.
 * - Other statements inside a body become `statement` steps. Statements
 *   outside any construct are not reported.
 */
export class ControlFlowParser implements ConstructParser {
	readonly construct = "control-flow" as const;

	parse(text: string): ConstructStep[] {
		requireText(this.construct, text);
		return new ControlFlowReader(text, tokenize(text)).readTopLevel();
	}

	describe(_text: string, steps: readonly ConstructStep[]): ParserMetadata {
		return {
			branchCount: countSteps(steps, "branch"),
			loopCount: countSteps(steps, "loop"),
			maxDepth: nestingDepth(steps),
		};
	}
}

class ControlFlowReader {
	private _pos = 0;
	private _lastEnd = 0;
	private _label: string | undefined;

	constructor(
		private readonly _text: string,
		private readonly _tokens: readonly Token[]
	) { }

	readTopLevel(): ConstructStep[] {
		const steps: ConstructStep[] = [];
		while (this._pos < this._tokens.length) {
			this._skipPrefixes();
			if (this._pos >= this._tokens.length) break;

			const construct = this._tryConstruct();
			if (construct) {
				steps.push(construct);
			} else {
				this._readStatement(false);
			}
		}
		return steps;
	}

	private get _current(): Token | undefined {
		return this._tokens[this._pos];
	}

	private _peek(offset: number): Token | undefined {
		return this._tokens[this._pos + offset];
	}

	/**
	 * Skip tokens that open a statement without a semicolon: block keywords,
	 * labels, exception handler heads and plain block ENDs.
	 */
	private _skipPrefixes(): void {
		for (; ;) {
			const token = this._current;
			if (!token) return;

			if (isWord(token, "BEGIN", "DECLARE", "EXCEPTION")) {
				this._pos++;
			} else if (isSymbol(token, "<<")) {
				const close = this._tokens.findIndex((t, i) => i > this._pos && isSymbol(t, ">>"));
				if (close === -1) {
					this._pos = this._tokens.length;
					return;
				}
				this._label = sliceTokens(this._text, this._tokens.slice(this._pos + 1, close));
				this._pos = close + 1;
			} else if (isWord(token, "WHEN")) {
				const then = this._findTopLevel(this._pos + 1, "THEN");
				if (then === -1) return;
				this._pos = then + 1;
			} else if (isWord(token, "END") && !isWord(this._peek(1), "IF", "LOOP", "CASE")) {
				// END of a nested BEGIN block, with optional label
				this._pos++;
				if (this._current?.type === "word" && isSymbol(this._peek(1), ";")) this._pos++;
				if (isSymbol(this._current, ";")) this._pos++;
			} else if (isSymbol(token, ";")) {
				this._pos++;
			} else {
				return;
			}
		}
	}

	private _tryConstruct(): ConstructStep | undefined {
		const token = this._current;
		if (isWord(token, "IF")) {
			return this._readIf(false);
		}
		if (isWord(token, "LOOP", "WHILE", "FOREACH")) {
			return this._readLoop();
		}
		if (isWord(token, "FOR") && this._isForLoopHeader()) {
			return this._readLoop();
		}
		this._label = undefined;
		return undefined;
	}

	private _isForLoopHeader(): boolean {
		const target = this._peek(1);
		if (!target || (target.type !== "word" && target.type !== "quoted")) return false;
		// CURSOR FOR SELECT a, b and OPEN c FOR SELECT a, b
		if (isWord(target, "SELECT", "WITH", "VALUES", "EXECUTE")) return false;
		const afterTarget = this._peek(2);
		// FOR a, b IN ... is a loop over a record with several targets
		return isWord(afterTarget, "IN") || isSymbol(afterTarget, ",");
	}

	private _readIf(isElsif: boolean): ConstructStep {
		const start = this._tokens[this._pos];
		const then = this._findTopLevel(this._pos + 1, "THEN");
		if (then === -1) {
			throw new ConstructParseError("control-flow", "malformed-clause", `${start.upper} without THEN`);
		}
		const condition = sliceTokens(this._text, this._tokens.slice(this._pos + 1, then));
		this._pos = then + 1;
		this._label = undefined;

		const thenBranch = this._readBody("IF", ["ELSIF", "ELSEIF", "ELSE"]);
		let elseBranch: ConstructStep[] = [];

		if (isWord(this._current, "ELSIF", "ELSEIF")) {
			elseBranch = [this._readIf(true)];
		} else if (isWord(this._current, "ELSE")) {
			this._pos++;
			elseBranch = this._readBody("IF", []);
			this._expectEnd("IF");
		} else {
			this._expectEnd("IF");
		}

		const attributes: Record<string, string> = { condition };
		if (isElsif) attributes.elsif = "true";

		return createStep("branch", this._text.slice(start.start, this._lastEnd), {
			thenBranch,
			elseBranch,
			attributes,
		});
	}

	private _readLoop(): ConstructStep {
		const start = this._tokens[this._pos];
		const attributes: Record<string, string> = {};
		if (this._label !== undefined) {
			attributes.label = this._label;
			this._label = undefined;
		}

		if (isWord(start, "LOOP")) {
			attributes.variant = "loop";
			this._pos++;
		} else {
			const loopIndex = this._findTopLevel(this._pos + 1, "LOOP");
			if (loopIndex === -1) {
				throw new ConstructParseError("control-flow", "malformed-clause", `${start.upper} without LOOP`);
			}
			Object.assign(attributes, describeHeader(this._text, start, this._tokens.slice(this._pos + 1, loopIndex)));
			this._pos = loopIndex + 1;
		}

		const body = this._readBody("LOOP", []);
		this._expectEnd("LOOP");

		return createStep("loop", this._text.slice(start.start, this._lastEnd), {
			thenBranch: body,
			attributes,
		});
	}

	/**
	 * Read statements up to `END <closer>` or one of the stop words, without
	 * consuming the terminator.
	 */
	private _readBody(closer: "IF" | "LOOP", stopWords: readonly string[]): ConstructStep[] {
		const steps: ConstructStep[] = [];

		for (; ;) {
			this._skipPrefixes();
			const token = this._current;
			if (!token) {
				throw new ConstructParseError("control-flow", "unterminated-block", `${closer} block is missing END ${closer}`);
			}
			if (isWord(token, "END") && isWord(this._peek(1), closer)) {
				return steps;
			}
			if (stopWords.length > 0 && isWord(token, ...stopWords)) {
				return steps;
			}

			const construct = this._tryConstruct();
			if (construct) {
				steps.push(construct);
				continue;
			}

			const statement = this._readStatement(true);
			if (statement.length > 0) {
				steps.push(createStep("statement", sliceTokens(this._text, statement)));
			}
		}
	}

	/**
	 * Consume one statement. Inside a body it also ends before a block keyword
	 * (ELSE, ELSIF, END IF, END LOOP) that follows without a semicolon.
	 */
	private _readStatement(stopAtBlockWords: boolean): Token[] {
		const statement: Token[] = [];
		let parenDepth = 0;
		let caseDepth = 0;

		while (this._pos < this._tokens.length) {
			const token = this._tokens[this._pos];

			if (statement.length > 0 && parenDepth === 0 && caseDepth === 0) {
				if (isSymbol(token, ";")) {
					this._pos++;
					return statement;
				}
				if (stopAtBlockWords && this._isBlockBoundary()) {
					return statement;
				}
			}

			if (isSymbol(token, "(")) parenDepth++;
			else if (isSymbol(token, ")")) parenDepth--;
			else if (isWord(token, "CASE") && !isWord(this._tokens[this._pos - 1], "END")) caseDepth++;
			else if (isWord(token, "END") && caseDepth > 0) caseDepth--;

			if (!isSymbol(token, ";")) statement.push(token);
			this._pos++;
		}

		return statement;
	}

	private _isBlockBoundary(): boolean {
		const token = this._current;
		if (isWord(token, "ELSE", "ELSIF", "ELSEIF")) return true;
		return isWord(token, "END") && isWord(this._peek(1), "IF", "LOOP");
	}

	private _expectEnd(closer: "IF" | "LOOP"): void {
		if (!isWord(this._current, "END") || !isWord(this._peek(1), closer)) {
			throw new ConstructParseError("control-flow", "unterminated-block", `${closer} block is missing END ${closer}`);
		}
		this._lastEnd = this._tokens[this._pos + 1].end;
		this._pos += 2;

		// Optional loop label, then the terminating semicolon
		if (this._current?.type === "word" && isSymbol(this._peek(1), ";")) this._pos++;
		if (isSymbol(this._current, ";")) this._pos++;
	}

	/**
	 * Index of a keyword at parenthesis depth zero before the next semicolon.
	 */
	private _findTopLevel(from: number, keyword: string): number {
		let depth = 0;
		for (let i = from; i < this._tokens.length; i++) {
			const token = this._tokens[i];
			if (isSymbol(token, "(")) depth++;
			else if (isSymbol(token, ")")) depth--;
			else if (depth === 0 && isSymbol(token, ";")) return -1;
			else if (depth === 0 && isWord(token, keyword)) return i;
		}
		return -1;
	}
}

function describeHeader(text: string, start: Token, header: readonly Token[]): Record<string, string> {
	if (start.upper === "WHILE") {
		return { variant: "while", condition: sliceTokens(text, header) };
	}

	const inIndex = header.findIndex((t) => isWord(t, "IN"));
	const targets = inIndex === -1 ? header : header.slice(0, inIndex);
	let source = inIndex === -1 ? [] : header.slice(inIndex + 1);

	const attributes: Record<string, string> = {
		variant: start.upper === "FOREACH" ? "foreach" : "for",
		iterator: sliceTokens(text, targets),
	};

	if (isWord(source[0], "REVERSE")) {
		attributes.reverse = "true";
		source = source.slice(1);
	}
	if (start.upper === "FOREACH" && isWord(source[0], "ARRAY")) {
		source = source.slice(1);
	}

	attributes.source = sliceTokens(text, source);
	if (start.upper === "FOR") {
		if (/\.\s*\./.test(attributes.source)) attributes.iterates = "range";
		else if (isWord(source[0], "SELECT", "EXECUTE", "WITH")) attributes.iterates = "query";
		else attributes.iterates = "cursor";
	}
	return attributes;
}

function countSteps(steps: readonly ConstructStep[], kind: ConstructStep["kind"]): number {
	let count = 0;
	for (const step of steps) {
		if (step.kind === kind) count++;
		count += countSteps(step.thenBranch, kind) + countSteps(step.elseBranch, kind);
	}
	return count;
}

function nestingDepth(steps: readonly ConstructStep[]): number {
	let max = 0;
	for (const step of steps) {
		if (step.kind !== "branch" && step.kind !== "loop") continue;
		const thenDepth = nestingDepth(step.thenBranch);
		const elseDepth = nestingDepth(step.elseBranch);
		// An ELSIF sits in the elseBranch but is not deeper than its IF
		const elseIsChain = step.elseBranch.length === 1 && step.elseBranch[0].attributes.elsif === "true";
		const depth = Math.max(1 + thenDepth, elseIsChain ? elseDepth : 1 + elseDepth);
		max = Math.max(max, depth);
	}
	return max;
}
