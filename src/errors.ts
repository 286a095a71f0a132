import type { ConstructKind } from "./model.js";

/**
 * Reasons a construct parser can give up on a fragment.
 */
export type ParseErrorKind =
	| "invalid-input"
	| "unbalanced-parentheses"
	| "unterminated-block"
	| "malformed-clause"
	| "nesting-too-deep";

/**
 * Thrown by a construct parser when it cannot interpret its construct.
 * The coordinator recovers every instance; it never reaches callers.
 */
export class ConstructParseError extends Error {
	constructor(
		readonly construct: ConstructKind,
		readonly kind: ParseErrorKind,
		message: string
	) {
		super(message);
		this.name = "ConstructParseError";
	}
}

/**
 * Thrown by the DDL and routine parsers for statements they cannot read.
 */
export class DdlParseError extends Error {
	readonly excerpt: string;

	constructor(message: string, statement: string) {
		super(message);
		this.name = "DdlParseError";
		this.excerpt = excerpt(statement);
	}
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export function excerpt(text: string, length = 120): string {
	const flat = text.replace(/\s+/g, " ").trim();
	return flat.length > length ? `${flat.slice(0, length)}...` : flat;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
