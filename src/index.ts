// src/index.ts

// Errors
export * from './errors';

// Plugins
export type { Plugin } from './plugins/types';
export { discoverPlugins, loadPlugin, findManifest, MANIFEST_FILES } from './plugins/loader';
export { sortDependencies, sortPlugins } from './utils/sort';

// Merge engine
export * from './composer/document';
export {
   MergeEngine,
   formatHistory,
   COLUMN_LIST_PATTERNS,
   type ComposedDocument,
   type MergeContext,
   type MergeHandler,
   type MergeEngineOptions,
} from './composer/merge-engine';
export { mergeColumnsByName } from './composer/handlers';

// Schema resolution
export { buildSchema, composeSchema, type ComposeOptions } from './schema';
export * from './schema/types';
export { effectiveType, resolveReferences } from './schema/references';
export { buildTables, parseReference } from './schema/tables';
export {
   builtinTypes,
   declareType,
   collectDeclaredTypes,
   resolveType,
   resolveCatalog,
   buildTypeCatalog,
   isComposite,
} from './schema/type-catalog';

// Source generation
export { generateEntities, buildEntityModule, SchemaToEntitiesGenerator } from './generator/entities';
export type * from './generator/entities/types';
export { EntityPrinter } from './printer/entities';

// Configuration & pipeline
export type { ComposeConfig, RawComposeConfig, PluginManifest, StubGroup } from './types/config';
export { loadConfig, resolveConfig, findConfigFile } from './utils/config';
export { runPipeline, renderModule, type PipelineOptions, type PipelineResult } from './cli/generate';
export { shouldRegenerate, latestModification } from './utils/freshness';
export { writeArtifact, type WriteResult } from './diff-writer/writer';
export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/logger';
