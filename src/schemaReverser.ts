import {
	clampScore,
	roundScore,
	tableShape,
	type CanonicalEntity,
	type EntityAction,
	type EntityField,
	type EntityPairing,
	type InfoInstancePair,
	type ParsedColumn,
	type ParsedRoutine,
	type ParsedTable,
	type ParserMetricsSnapshot,
} from "./model.js";
import { DdlParseError } from "./errors.js";
import { reverseConfigSchema, type ReverseConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { ParserCoordinator } from "./parserCoordinator.js";
import { scoreTable } from "./baselineConfidence.js";
import { InfoInstanceDetector } from "./infoInstanceDetector.js";
import { buildTranslationIndex } from "./translationDetector.js";
import { isCreateTable, parseCommentOnTable, parseCreateTableTokens, DEFAULT_SCHEMA, type TableComment } from "./tableParser.js";
import { isCreateRoutine, parseRoutine } from "./routineParser.js";
import { splitStatements, stripPrefix, tokenize } from "./sqlText.js";
import type { ExtractedSchema } from "./schemaExtractor.js";

export interface SqlSource {
	/** File name or other label used in error reports */
	readonly name: string;
	readonly sql: string;
}

/** A statement left out of the result because it could not be parsed */
export interface SourceError {
	readonly source: string;
	readonly message: string;
	readonly statement: string;
}

export interface ReverseResult {
	/** Entities at or above the confidence threshold */
	readonly entities: readonly CanonicalEntity[];
	readonly rejected: readonly CanonicalEntity[];
	readonly pairs: readonly InfoInstancePair[];
	/** Routines whose name contains no entity name */
	readonly unattachedActions: readonly EntityAction[];
	readonly errors: readonly SourceError[];
	readonly metrics: ParserMetricsSnapshot;
}

export interface SchemaReverserOptions {
	readonly config?: ReverseConfig;
	readonly logger?: Logger;
	readonly coordinator?: ParserCoordinator;
}

/**
 * Turns DDL scripts, or a schema read from a live database, into canonical
 * entities with a confidence score, attached actions and vocabulary/instance
 * pairings.
 */
export class SchemaReverser {
	private readonly _config: ReverseConfig;
	private readonly _logger: Logger;
	private readonly _coordinator: ParserCoordinator;
	private readonly _detector: InfoInstanceDetector;

	constructor(options: SchemaReverserOptions = {}) {
		this._config = options.config ?? reverseConfigSchema.parse({});
		this._logger = options.logger ?? createLogger({ level: this._config.logLevel });
		this._coordinator = options.coordinator ?? new ParserCoordinator({ logger: this._logger });
		this._detector = new InfoInstanceDetector({
			tablePrefixes: this._config.tablePrefixes,
			vocabularySuffix: this._config.vocabularySuffix,
		});
	}

	reverseScript(sql: string, sourceName = "<script>"): ReverseResult {
		return this.reverseSources([{ name: sourceName, sql }]);
	}

	/**
	 * Parse every statement of every source. Statements that fail to parse are
	 * reported in `errors` and do not stop the batch.
	 */
	reverseSources(sources: readonly SqlSource[]): ReverseResult {
		const tables: ParsedTable[] = [];
		const routines: ParsedRoutine[] = [];
		const comments: TableComment[] = [];
		const errors: SourceError[] = [];

		for (const source of sources) {
			for (const statement of splitStatements(source.sql)) {
				try {
					if (isCreateTable(statement.tokens)) {
						tables.push(parseCreateTableTokens(statement.text, tokenize(statement.text)));
					} else if (isCreateRoutine(statement.tokens)) {
						routines.push(parseRoutine(statement.text));
					} else {
						const comment = parseCommentOnTable(statement.text, statement.tokens);
						if (comment) comments.push(comment);
					}
				} catch (error) {
					if (!(error instanceof DdlParseError)) throw error;
					errors.push({ source: source.name, message: error.message, statement: error.excerpt });
					this._logger.warn({ source: source.name, statement: error.excerpt }, `Statement excluded: ${error.message}`);
				}
			}
		}

		return this._build(attachComments(tables, comments), routines, errors);
	}

	reverseExtracted(schema: ExtractedSchema): ReverseResult {
		return this._build(schema.tables, schema.routines, []);
	}

	private _build(
		tables: readonly ParsedTable[],
		routines: readonly ParsedRoutine[],
		errors: readonly SourceError[]
	): ReverseResult {
		this._coordinator.resetMetrics();
		const prefixes = this._config.tablePrefixes;

		const candidates = tables.map((table) => ({
			table,
			entity: stripPrefix(table.name, prefixes),
			baseline: scoreTable(table, prefixes),
		}));

		const actionsByTable = new Map<ParsedTable, EntityAction[]>();
		const unattachedActions: EntityAction[] = [];

		for (const routine of routines) {
			const action = this._toAction(routine);
			const owner = findOwner(routine.name, candidates);
			this._logger.debug(
				{ routine: routine.name, owner: owner?.table.name, constructs: action.constructs.map((c) => c.construct) },
				"Routine analyzed"
			);

			if (owner === undefined) {
				unattachedActions.push(action);
				continue;
			}
			const list = actionsByTable.get(owner.table) ?? [];
			list.push({ ...action, confidence: finalScore(owner.baseline.score + action.confidenceDelta) });
			actionsByTable.set(owner.table, list);
		}

		const entities: CanonicalEntity[] = candidates.map(({ table, entity, baseline }) => {
			const actions = actionsByTable.get(table) ?? [];
			const delta = actions.reduce((sum, a) => sum + a.confidenceDelta, 0);
			const canonical: CanonicalEntity = {
				entity,
				schema: table.schema,
				table: table.name,
				fields: table.columns.map((column) => toField(table, column)),
				signals: baseline.signals,
				baselineConfidence: baseline.score,
				confidence: finalScore(baseline.score + delta),
				actions,
			};
			return table.comment !== undefined ? { ...canonical, comment: table.comment } : canonical;
		});

		const accepted = entities.filter((e) => e.confidence >= this._config.minConfidence);
		const rejected = entities.filter((e) => e.confidence < this._config.minConfidence);

		const acceptedTables = tables.filter((t) => accepted.some((e) => e.table === t.name && e.schema === t.schema));
		const translationIndex = buildTranslationIndex(tables.map(tableShape), prefixes);
		const pairs = this._detector.detectPairs(acceptedTables.map(tableShape), translationIndex);
		const paired = this._attachPairings(accepted, acceptedTables, pairs);

		this._logger.info(
			{
				tables: tables.length,
				accepted: accepted.length,
				rejected: rejected.length,
				routines: routines.length,
				unattached: unattachedActions.length,
				pairs: pairs.length,
				errors: errors.length,
			},
			"Schema reversed"
		);

		return {
			entities: paired,
			rejected,
			pairs,
			unattachedActions,
			errors,
			metrics: this._coordinator.getMetrics(),
		};
	}

	private _toAction(routine: ParsedRoutine): EntityAction {
		const constructs = this._coordinator.parseWithBestParsers(routine.body);
		const action: EntityAction = {
			name: routine.name,
			schema: routine.schema,
			kind: routine.kind,
			parameters: routine.parameters,
			language: routine.language,
			constructs,
			confidenceDelta: this._coordinator.totalDelta(constructs),
		};
		return routine.returns !== undefined ? { ...action, returns: routine.returns } : action;
	}

	private _attachPairings(
		entities: readonly CanonicalEntity[],
		tables: readonly ParsedTable[],
		pairs: readonly InfoInstancePair[]
	): CanonicalEntity[] {
		const pairings = new Map<string, EntityPairing>();

		for (const pair of pairs) {
			const translation = pair.translationTable !== undefined ? { translationTable: pair.translationTable } : {};
			pairings.set(pair.vocabularyTable, {
				role: "vocabulary",
				baseEntityName: pair.baseEntityName,
				counterpart: pair.instanceTable,
				...translation,
			});

			const instance = tables.find((t) => t.name === pair.instanceTable);
			const detection = instance
				? this._detector.classify(instance.name, instance.columns.map((c) => c.name))
				: undefined;
			pairings.set(pair.instanceTable, {
				role: "instance",
				baseEntityName: pair.baseEntityName,
				counterpart: pair.vocabularyTable,
				...translation,
				...(detection?.vocabularyFkColumn !== undefined ? { vocabularyFkColumn: detection.vocabularyFkColumn } : {}),
				...(detection?.parentFkColumn !== undefined ? { parentFkColumn: detection.parentFkColumn } : {}),
			});
		}

		return entities.map((entity) => {
			const pairing = pairings.get(entity.table);
			return pairing ? { ...entity, pairing } : entity;
		});
	}
}

/**
 * The candidate whose entity name is the longest one contained in the routine
 * name (`create_unit_info` belongs to `unit_info`, not `unit`).
 */
function findOwner<T extends { readonly entity: string }>(routineName: string, candidates: readonly T[]): T | undefined {
	const name = routineName.toLowerCase();
	let best: T | undefined;
	for (const candidate of candidates) {
		if (candidate.entity.length === 0 || !name.includes(candidate.entity)) continue;
		if (best === undefined || candidate.entity.length > best.entity.length) {
			best = candidate;
		}
	}
	return best;
}

function finalScore(value: number): number {
	return roundScore(clampScore(value));
}

function toField(table: ParsedTable, column: ParsedColumn): EntityField {
	const reference = table.foreignKeys.find((fk) => fk.columns.includes(column.name));
	const field: EntityField = {
		name: column.name,
		type: column.type,
		isNullable: column.isNullable,
		isPrimaryKey: column.isPrimaryKey,
	};
	return reference ? { ...field, references: reference.referencedTable } : field;
}

function attachComments(tables: readonly ParsedTable[], comments: readonly TableComment[]): ParsedTable[] {
	return tables.map((table) => {
		const match = comments.filter(
			(c) => c.table === table.name && (c.schema ?? DEFAULT_SCHEMA) === table.schema
		);
		const last = match[match.length - 1];
		return last ? { ...table, comment: last.comment } : table;
	});
}

