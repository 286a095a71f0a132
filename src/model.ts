/**
 * Core data model types for schema-reverse.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

// === Construct Types ===

/**
 * Identifiers of the specialized construct parsers, in dispatch order.
 */
export const CONSTRUCT_KINDS = [
  'cte',
  'exception',
  'dynamic-sql',
  'control-flow',
  'window',
  'aggregate',
  'cursor',
] as const;

export type ConstructKind = (typeof CONSTRUCT_KINDS)[number];

export type StepKind =
  | 'cte'
  | 'try-except'
  | 'dynamic-sql'
  | 'branch'
  | 'loop'
  | 'statement'
  | 'window-function'
  | 'aggregate-filter'
  | 'cursor-declare'
  | 'cursor-open'
  | 'cursor-fetch'
  | 'cursor-move'
  | 'cursor-close';

export interface ConstructStep {
  readonly kind: StepKind;
  /** Source fragment the step was read from */
  readonly rawText: string;
  readonly thenBranch: readonly ConstructStep[];
  readonly elseBranch: readonly ConstructStep[];
  readonly attributes: Readonly<Record<string, string>>;
}

export type MetadataValue = string | number | boolean | readonly string[];

export type ParserMetadata = Readonly<Record<string, MetadataValue>>;

export interface ParserResult {
  readonly construct: ConstructKind;
  readonly steps: readonly ConstructStep[];
  /** Signed adjustment; not bounded to [0, 1] */
  readonly confidenceDelta: number;
  readonly metadata: ParserMetadata;
  readonly succeeded: boolean;
}

export interface ParserMetrics {
  readonly attempts: number;
  readonly successes: number;
  readonly failures: number;
}

export type ParserMetricsSnapshot = Readonly<Record<ConstructKind, ParserMetrics>>;

// === Structural Classification Types ===

export interface TableShape {
  readonly name: string;
  readonly columns: readonly string[];
  readonly primaryKey?: readonly string[];
}

export interface InfoInstanceDetectionResult {
  readonly isVocabularyTable: boolean;
  readonly isInstanceTable: boolean;
  readonly baseEntityName?: string;
  readonly vocabularyFkColumn?: string;
  readonly parentFkColumn?: string;
}

export interface InfoInstancePair {
  readonly vocabularyTable: string;
  readonly instanceTable: string;
  readonly baseEntityName: string;
  readonly translationTable?: string;
}

export interface TranslationDetectionResult {
  readonly isTranslationTable: boolean;
  readonly parentTable?: string;
  readonly fkColumn?: string;
  readonly localeColumn?: string;
  readonly translatableFields: readonly string[];
}

// === DDL Types ===

export interface ForeignKeyRef {
  readonly columns: readonly string[];
  readonly referencedSchema?: string;
  readonly referencedTable: string;
  readonly referencedColumns: readonly string[];
}

export interface ParsedColumn {
  readonly name: string;
  readonly type: string;
  readonly isNullable: boolean;
  readonly hasDefault: boolean;
  readonly isPrimaryKey: boolean;
  readonly isUnique: boolean;
}

export interface ParsedTable {
  readonly schema: string;
  readonly name: string;
  readonly columns: readonly ParsedColumn[];
  readonly primaryKey: readonly string[];
  readonly uniqueConstraints: readonly (readonly string[])[];
  readonly foreignKeys: readonly ForeignKeyRef[];
  readonly checkConstraints: readonly string[];
  readonly comment?: string;
}

export type ParameterMode = 'IN' | 'OUT' | 'INOUT' | 'VARIADIC';

export interface RoutineParameter {
  readonly mode: ParameterMode;
  readonly name?: string;
  readonly type: string;
  readonly defaultValue?: string;
}

export interface ParsedRoutine {
  readonly schema: string;
  readonly name: string;
  readonly kind: 'function' | 'procedure';
  readonly parameters: readonly RoutineParameter[];
  readonly returns?: string;
  readonly language: string;
  readonly body: string;
}

// === Canonical Model Types ===

export type ConventionSignal =
  | 'surrogate-key'
  | 'external-id'
  | 'identifier'
  | 'trinity'
  | 'multi-tenant'
  | 'soft-delete'
  | 'audit-trail';

export interface BaselineScore {
  readonly score: number;
  readonly signals: readonly ConventionSignal[];
}

export interface EntityField {
  readonly name: string;
  readonly type: string;
  readonly isNullable: boolean;
  readonly isPrimaryKey: boolean;
  readonly references?: string;
}

export interface EntityAction {
  readonly name: string;
  readonly schema: string;
  readonly kind: 'function' | 'procedure';
  readonly parameters: readonly RoutineParameter[];
  readonly returns?: string;
  readonly language: string;
  readonly constructs: readonly ParserResult[];
  readonly confidenceDelta: number;
  /** Owner baseline plus this action's deltas; absent for unattached actions */
  readonly confidence?: number;
}

export interface EntityPairing {
  readonly role: 'vocabulary' | 'instance';
  readonly baseEntityName: string;
  readonly counterpart: string;
  readonly translationTable?: string;
  readonly vocabularyFkColumn?: string;
  readonly parentFkColumn?: string;
}

export interface CanonicalEntity {
  readonly entity: string;
  readonly schema: string;
  readonly table: string;
  readonly comment?: string;
  readonly fields: readonly EntityField[];
  readonly signals: readonly ConventionSignal[];
  readonly baselineConfidence: number;
  readonly confidence: number;
  readonly actions: readonly EntityAction[];
  readonly pairing?: EntityPairing;
}

// === Helpers ===

export function createStep(
  kind: StepKind,
  rawText: string,
  options: {
    thenBranch?: readonly ConstructStep[];
    elseBranch?: readonly ConstructStep[];
    attributes?: Record<string, string>;
  } = {}
): ConstructStep {
  return {
    kind,
    rawText,
    thenBranch: options.thenBranch ?? [],
    elseBranch: options.elseBranch ?? [],
    attributes: options.attributes ?? {},
  };
}

export function emptyMetrics(): Record<ConstructKind, ParserMetrics> {
  const zero = (): ParserMetrics => ({ attempts: 0, successes: 0, failures: 0 });
  return {
    'cte': zero(),
    'exception': zero(),
    'dynamic-sql': zero(),
    'control-flow': zero(),
    'window': zero(),
    'aggregate': zero(),
    'cursor': zero(),
  };
}

/**
 * Round a score so that sums of fixed deltas compare exactly (0.1 + 0.05 === 0.15).
 */
export function roundScore(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function clampScore(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function tableShape(table: ParsedTable): TableShape {
  return {
    name: table.name,
    columns: table.columns.map(c => c.name),
    primaryKey: table.primaryKey,
  };
}
