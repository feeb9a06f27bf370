/**
 * Selection Export & Aggregation
 *
 * Exports a layer selection to a delimited text file or a permanent
 * dataset, optionally adding Area, Distance and Radius fields and
 * aggregating by group fields, then restores the statistic field names
 * the caller asked for. Site searches run that export for every
 * configured layer around a buffered search feature.
 *
 * @packageDocumentation
 */

// Types
export type * from './core/types/index.js';
export { STATISTIC_FUNCTIONS } from './core/types/index.js';

// Errors
export {
  PipelineError,
  InputMissingError,
  EngineOperationError,
  ReconciliationError,
  CleanupError,
  ConfigError,
  isPipelineError,
  isEngineOperationError,
  errorMessage,
  type ErrorCategory,
  type SchemaMismatch,
  type SchemaMismatchContext,
} from './core/errors.js';

export * from './core/constants.js';

// Logging
export { FileLogSink, MemoryLogSink, type LogSink } from './core/utils/log-sink.js';
export { createLogger, Logger, type LogLevel, type LoggerOptions } from './core/utils/logger.js';

// Engine
export {
  LocalDatasetEngine,
  LocalFeatureStore,
  describeRef,
  isRemoteWorkspace,
  isSingleFileDataset,
  runEngineOperation,
  areaOf,
  distanceBetween,
  statisticFieldName,
} from './engine/index.js';
export { SqliteWorkspace } from './engine/sqlite-workspace.js';
export { GeoJsonFolder, GEOJSON_EXTENSION, isGeoJsonName } from './engine/geojson-folder.js';
export type { DatasetBackend, DatasetSchema, StoredDataset } from './engine/backend.js';

// Session
export { MapSession, layerNameOf, type SessionLayer, type SessionTable } from './session/map-session.js';

// Pipeline
export type { PipelineContext } from './pipeline/context.js';
export { exportSelectionToCsv, type CsvExportRequest } from './pipeline/export-csv.js';
export { exportSelectionToFeatures, type FeatureExportRequest } from './pipeline/export-features.js';
export { project, splitSpec, isLiteralToken, type ColumnToken, type Projection } from './pipeline/field-projector.js';
export {
  planAggregation,
  planMismatches,
  parseStatisticsSpec,
  formatStatistics,
  type AggregationPlan,
} from './pipeline/aggregation.js';
export {
  resolveField,
  filterFields,
  schemaMismatch,
  mismatchMessage,
  type FieldFilterResult,
} from './pipeline/schema-validator.js';
export { planReconciliation, reconcile, statisticFieldIndex, type ReconciliationPlan } from './pipeline/reconciler.js';
export { copyToCsv, formatValue, CSV_INPUT_MISSING, DEFAULT_LINE_ENDING } from './pipeline/csv-writer.js';
export { TemporaryResources, withTemporary, type TemporaryDataset } from './pipeline/lifecycle.js';
export { runPostExportHook, hookArguments, type HookInvocation } from './pipeline/post-export-hook.js';

// Site search
export {
  runSiteSearch,
  type SiteSearchRequest,
  type SiteSearchResult,
  type SiteSearchOptions,
  type LayerResult,
} from './search/site-search.js';
export {
  searchStringsFor,
  replaceSearchStrings,
  stripIllegals,
  stripPathIllegals,
  bufferLayerName,
  type SearchStrings,
} from './search/naming.js';

// Configuration
export {
  SearchConfigSchema,
  LayerDefinitionSchema,
  type SearchConfig,
  type SearchConfigInput,
  type LayerDefinition,
  type TableFormat,
  type OutputType,
  type CombinedSitesMode,
} from './config/search-config.js';
export { loadConfig, parseConfig, type LoadedConfig } from './cli/lib/config.js';
