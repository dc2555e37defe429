import { ComposedDocument, MergeEngine, MergeHandler } from "../composer/merge-engine";
import type { Plugin } from "../plugins/types";
import { Logger, silentLogger } from "../utils/logger";
import { sortPlugins } from "../utils/sort";
import { resolveReferences } from "./references";
import { buildTables } from "./tables";
import { buildTypeCatalog } from "./type-catalog";
import type { Schema } from "./types";

export interface ComposeOptions {
   logger?: Logger;
   strictOverrides?: boolean;
   /** extra list handlers, pattern → handler */
   handlers?: Record<string, MergeHandler>;
}

/**
 * Resolve an already composed document: types, then tables (pass 1), then
 * references (pass 2). `plugins` must be in dependency order.
 */
export function buildSchema(document: ComposedDocument, plugins: readonly Plugin[]): Schema {
   const types = buildTypeCatalog(plugins);
   const pass1 = buildTables(document, types, plugins);
   const { tables, mixins } = resolveReferences(pass1);

   return { types, tables, mixins, plugins: [...plugins], document };
}

/** Sort, merge and resolve: the whole composition pass. */
export function composeSchema(plugins: readonly Plugin[], opts: ComposeOptions = {}): Schema {
   const logger = opts.logger ?? silentLogger;
   const sorted = sortPlugins(plugins);
   logger.debug(`Plugin order: ${sorted.map(p => p.name).join(", ")}`);

   const engine = new MergeEngine({ logger, strictOverrides: opts.strictOverrides });
   for (const [pattern, handler] of Object.entries(opts.handlers ?? {})) engine.registerMergeHandler(pattern, handler);

   const schema = buildSchema(engine.compose(sorted), sorted);
   logger.debug(`Resolved ${schema.types.size} types and ${schema.tables.size} tables`);
   return schema;
}

export * from "./types";
export { effectiveType } from "./references";
export { resolveType, buildTypeCatalog, isComposite } from "./type-catalog";
