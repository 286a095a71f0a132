// Core data model
export type {
  ConstructKind,
  StepKind,
  ConstructStep,
  MetadataValue,
  ParserMetadata,
  ParserResult,
  ParserMetrics,
  ParserMetricsSnapshot,
  TableShape,
  InfoInstanceDetectionResult,
  InfoInstancePair,
  TranslationDetectionResult,
  ForeignKeyRef,
  ParsedColumn,
  ParsedTable,
  ParameterMode,
  RoutineParameter,
  ParsedRoutine,
  ConventionSignal,
  BaselineScore,
  EntityField,
  EntityAction,
  EntityPairing,
  CanonicalEntity,
} from './model.js';

export { CONSTRUCT_KINDS, createStep, emptyMetrics, roundScore, clampScore, tableShape } from './model.js';

// Errors, logging and configuration
export type { ParseErrorKind } from './errors.js';
export { ConstructParseError, DdlParseError, ConfigError } from './errors.js';
export type { Logger, LogSink, LoggerOptions } from './logger.js';
export { createLogger } from './logger.js';
export type { ReverseConfig, ReverseConfigInput, LoadConfigOptions } from './config.js';
export { reverseConfigSchema, loadConfig } from './config.js';

// Signal detection
export {
  SIGNAL_DETECTORS,
  shouldUseCteParser,
  shouldUseExceptionParser,
  shouldUseDynamicSqlParser,
  shouldUseControlFlowParser,
  shouldUseWindowParser,
  shouldUseAggregateParser,
  shouldUseCursorParser,
} from './signalDetector.js';

// Construct parsers
export type { ConstructParser } from './constructParser.js';
export type { CtePattern } from './cteParser.js';
export { CteParser, detectCtePatterns } from './cteParser.js';
export type { ExceptionHandler } from './exceptionHandlerParser.js';
export { ExceptionHandlerParser } from './exceptionHandlerParser.js';
export type { DynamicSqlBuilder } from './dynamicSqlParser.js';
export { DynamicSqlParser } from './dynamicSqlParser.js';
export { ControlFlowParser } from './controlFlowParser.js';
export { WindowFunctionParser } from './windowFunctionParser.js';
export { AggregateFilterParser } from './aggregateFilterParser.js';
export { CursorOperationsParser } from './cursorOperationsParser.js';

// Coordination
export type { ParserCoordinatorOptions, FailureReason } from './parserCoordinator.js';
export { ParserCoordinator, defaultParsers, confidenceDeltaFor } from './parserCoordinator.js';

// Structural classification
export type { NamingConventions } from './infoInstanceDetector.js';
export { InfoInstanceDetector, DEFAULT_CONVENTIONS } from './infoInstanceDetector.js';
export { detectTranslationTable, buildTranslationIndex, translationParentName } from './translationDetector.js';

// DDL parsing and scoring
export type { TableComment } from './tableParser.js';
export { parseCreateTable, parseCommentOnTable } from './tableParser.js';
export { parseRoutine, parseParameters } from './routineParser.js';
export { scoreTable, BASE_SCORE } from './baselineConfidence.js';

// Pipeline
export type { SqlSource, SourceError, ReverseResult, SchemaReverserOptions } from './schemaReverser.js';
export { SchemaReverser } from './schemaReverser.js';

// Live databases
export type { DbClient, ExtractedSchema } from './schemaExtractor.js';
export { extractSchema } from './schemaExtractor.js';
export type { Database } from './database.js';
export { openDatabase } from './database.js';
