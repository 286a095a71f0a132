import type { TableShape, TranslationDetectionResult } from "./model.js";
import { stripPrefix } from "./sqlText.js";

const LOCALE_COLUMNS = ["locale", "language", "lang_code", "lang"];

const NOT_A_TRANSLATION: TranslationDetectionResult = { isTranslationTable: false, translatableFields: [] };

/**
 * Name of the table a translation table localizes, from `tl_<parent>` or
 * `<parent>_translation`.
 */
export function translationParentName(tableName: string): string | undefined {
	const lower = tableName.toLowerCase();
	if (lower.startsWith("tl_") && lower.length > 3) {
		return lower.slice(3);
	}
	if (lower.endsWith("_translation") && lower.length > "_translation".length) {
		return lower.slice(0, -"_translation".length);
	}
	return undefined;
}

/**
 * A translation table carries an `fk_*` column to its parent, a locale column
 * and, when the key is known, the primary key (fk, locale).
 */
export function detectTranslationTable(table: TableShape): TranslationDetectionResult {
	const parentTable = translationParentName(table.name);
	if (parentTable === undefined) {
		return NOT_A_TRANSLATION;
	}

	const fkColumn = table.columns.find((c) => c.toLowerCase().startsWith("fk_"));
	const localeColumn = table.columns.find((c) => LOCALE_COLUMNS.includes(c.toLowerCase()));
	if (fkColumn === undefined || localeColumn === undefined) {
		return NOT_A_TRANSLATION;
	}

	if (table.primaryKey !== undefined) {
		const key = table.primaryKey;
		if (key.length !== 2 || !key.includes(fkColumn) || !key.includes(localeColumn)) {
			return NOT_A_TRANSLATION;
		}
	}

	return {
		isTranslationTable: true,
		parentTable,
		fkColumn,
		localeColumn,
		translatableFields: table.columns.filter((c) => c !== fkColumn && c !== localeColumn),
	};
}

/**
 * Map each localized parent (table-kind prefix stripped) to its translation table.
 */
export function buildTranslationIndex(
	tables: readonly TableShape[],
	tablePrefixes: readonly string[] = ["tb_", "tv_"]
): Map<string, string> {
	const index = new Map<string, string>();
	for (const table of tables) {
		const result = detectTranslationTable(table);
		if (result.isTranslationTable && result.parentTable !== undefined) {
			index.set(stripPrefix(result.parentTable, tablePrefixes), table.name);
		}
	}
	return index;
}
