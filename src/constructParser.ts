import type { ConstructKind, ConstructStep, ParserMetadata } from "./model.js";
import { ConstructParseError } from "./errors.js";

/**
 * Shared shape of the specialized construct parsers.
 *
 * `parse` returns the steps found (empty when the construct is absent) and
 * throws ConstructParseError when the construct is present but unreadable.
 * `describe` reports the facts the coordinator tunes confidence with.
 */
export interface ConstructParser {
	readonly construct: ConstructKind;
	parse(text: string): ConstructStep[];
	describe(text: string, steps: readonly ConstructStep[]): ParserMetadata;
}

export function requireText(construct: ConstructKind, text: string): void {
	if (text.trim().length === 0) {
		throw new ConstructParseError(construct, "invalid-input", "Input must be a non-empty string");
	}
}
