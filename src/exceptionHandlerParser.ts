import { createStep, type ConstructStep, type ParserMetadata } from "./model.js";
import { ConstructParseError } from "./errors.js";
import { requireText, type ConstructParser } from "./constructParser.js";

export interface ExceptionHandler {
	readonly condition: string;
	readonly action: string;
}

/** The block is split once, on the first occurrence in any case */
const BLOCK_KEYWORD = /EXCEPTION/i;

/**
 * Summarizes a PL/pgSQL `EXCEPTION WHEN ... THEN ...` block as a single
 * `try-except` step. Handlers are validated but not decomposed into steps.
 */
export class ExceptionHandlerParser implements ConstructParser {
	readonly construct = "exception" as const;

	parse(text: string): ConstructStep[] {
		requireText(this.construct, text);

		const block = this._splitBlock(text);
		if (block === undefined) {
			return [];
		}

		// Validates every handler; the pairs are not part of the step
		this.parseHandlers(block);

		return [createStep("try-except", `EXCEPTION${block}`)];
	}

	describe(text: string): ParserMetadata {
		const block = this._splitBlock(text);
		return {
			handlerCount: block === undefined ? 0 : this.parseHandlers(block).length,
		};
	}

	/**
	 * Split the handler block into (condition, action) pairs.
	 */
	parseHandlers(block: string): ExceptionHandler[] {
		const handlers: ExceptionHandler[] = [];
		const segments = block.split(/\bWHEN\b/i);

		for (const segment of segments.slice(1)) {
			if (!segment.trim()) continue;

			const thenMatch = /\bTHEN\b/i.exec(segment);
			if (!thenMatch) {
				throw new ConstructParseError(
					this.construct,
					"malformed-clause",
					`Exception handler "WHEN${segment.trimEnd()}" has no THEN`
				);
			}
			handlers.push({
				condition: segment.slice(0, thenMatch.index).trim(),
				action: segment.slice(thenMatch.index + thenMatch[0].length).trim(),
			});
		}

		return handlers;
	}

	/**
	 * Text after the first EXCEPTION, untouched.
	 */
	private _splitBlock(text: string): string | undefined {
		const match = BLOCK_KEYWORD.exec(text);
		if (!match) return undefined;
		return text.slice(match.index + match[0].length);
	}
}
