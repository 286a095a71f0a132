import type { ConstructKind } from "./model.js";

/**
 * Cheap lexical gates deciding whether a construct parser is worth running.
 * False positives are fine: the parser itself reports an empty result.
 */

export function shouldUseCteParser(text: string): boolean {
	return /\bWITH\b/i.test(text);
}

export function shouldUseExceptionParser(text: string): boolean {
	return /\bEXCEPTION\b/i.test(text);
}

export function shouldUseDynamicSqlParser(text: string): boolean {
	return /\bEXECUTE\b/i.test(text);
}

export function shouldUseControlFlowParser(text: string): boolean {
	return /\b(?:FOR|LOOP|WHILE)\b/i.test(text);
}

export function shouldUseWindowParser(text: string): boolean {
	return /\bOVER\s*\(|\bPARTITION\s+BY\b|\bROW_NUMBER\b/i.test(text);
}

export function shouldUseAggregateParser(text: string): boolean {
	return /\bFILTER\s*\(\s*WHERE\b/i.test(text);
}

export function shouldUseCursorParser(text: string): boolean {
	return /\b(?:CURSOR|FETCH|OPEN|CLOSE)\b/i.test(text);
}

export const SIGNAL_DETECTORS: Readonly<Record<ConstructKind, (text: string) => boolean>> = {
	"cte": shouldUseCteParser,
	"exception": shouldUseExceptionParser,
	"dynamic-sql": shouldUseDynamicSqlParser,
	"control-flow": shouldUseControlFlowParser,
	"window": shouldUseWindowParser,
	"aggregate": shouldUseAggregateParser,
	"cursor": shouldUseCursorParser,
};
