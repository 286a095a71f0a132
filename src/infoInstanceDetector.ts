import type { InfoInstanceDetectionResult, InfoInstancePair, TableShape } from "./model.js";
import { stripPrefix } from "./sqlText.js";

export interface NamingConventions {
	/** Stripped in order before classification, each at most once */
	readonly tablePrefixes: readonly string[];
	readonly vocabularySuffix: string;
}

export const DEFAULT_CONVENTIONS: NamingConventions = {
	tablePrefixes: ["tb_", "tv_"],
	vocabularySuffix: "_info",
};

const NEITHER: InfoInstanceDetectionResult = { isVocabularyTable: false, isInstanceTable: false };

/**
 * Recognizes the vocabulary/instance split of hierarchical reference data:
 * `tb_<entity>_info` says what an item is, `tb_<entity>` places it in a
 * hierarchy and points back through `fk_<entity>_info`.
 */
export class InfoInstanceDetector {
	constructor(private readonly _conventions: NamingConventions = DEFAULT_CONVENTIONS) { }

	classify(tableName: string, columns: readonly string[]): InfoInstanceDetectionResult {
		const normalized = stripPrefix(tableName, this._conventions.tablePrefixes);
		const suffix = this._conventions.vocabularySuffix.toLowerCase();

		if (normalized.endsWith(suffix)) {
			return {
				isVocabularyTable: true,
				isInstanceTable: false,
				baseEntityName: normalized.slice(0, normalized.length - suffix.length),
			};
		}

		const vocabularyFkColumn = findColumn(columns, `fk_${normalized}${suffix}`);
		if (vocabularyFkColumn === undefined) {
			return NEITHER;
		}

		const parentFkColumn = findColumn(columns, `fk_parent_${normalized}`);
		return {
			isVocabularyTable: false,
			isInstanceTable: true,
			baseEntityName: normalized,
			vocabularyFkColumn,
			...(parentFkColumn !== undefined ? { parentFkColumn } : {}),
		};
	}

	/**
	 * Pair vocabulary and instance tables sharing a base name. When several
	 * tables normalize to the same base name, the last one wins.
	 *
	 * @param translationIndex parent name to translation table name
	 */
	detectPairs(
		tables: readonly TableShape[],
		translationIndex?: ReadonlyMap<string, string>
	): InfoInstancePair[] {
		const vocabularyTables = new Map<string, string>();
		const instanceTables = new Map<string, string>();

		for (const table of tables) {
			const result = this.classify(table.name, table.columns);
			if (result.baseEntityName === undefined) continue;

			if (result.isVocabularyTable) {
				vocabularyTables.set(result.baseEntityName, table.name);
			} else if (result.isInstanceTable) {
				instanceTables.set(result.baseEntityName, table.name);
			}
		}

		const pairs: InfoInstancePair[] = [];
		for (const [baseEntityName, vocabularyTable] of vocabularyTables) {
			const instanceTable = instanceTables.get(baseEntityName);
			if (instanceTable === undefined) continue;

			const translationTable =
				translationIndex?.get(`${baseEntityName}${this._conventions.vocabularySuffix.toLowerCase()}`) ??
				translationIndex?.get(baseEntityName);

			pairs.push({
				vocabularyTable,
				instanceTable,
				baseEntityName,
				...(translationTable !== undefined ? { translationTable } : {}),
			});
		}
		return pairs;
	}
}

function findColumn(columns: readonly string[], expected: string): string | undefined {
	return columns.find((column) => column.toLowerCase() === expected);
}
