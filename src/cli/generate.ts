import path from "path";
import { MergeEngine, ComposedDocument } from "../composer/merge-engine";
import { writeArtifact, WriteResult } from "../diff-writer/writer";
import { generateEntities } from "../generator/entities";
import { discoverPlugins } from "../plugins/loader";
import type { Plugin } from "../plugins/types";
import { composeSchema } from "../schema";
import type { Schema } from "../schema/types";
import type { ComposeConfig } from "../types/config";
import { latestModification, shouldRegenerate } from "../utils/freshness";
import { createLogger, Logger } from "../utils/logger";
import { sortPlugins } from "../utils/sort";

export interface PipelineOptions {
   /** regenerate even when the artifact is newer than every plugin file */
   force?: boolean;
   dryRun?: boolean;
   logger?: Logger;
}

export interface PipelineResult {
   status: WriteResult | "up-to-date";
   output: string;
   plugins: Plugin[];
   schema?: Schema;
}

export function loggerFor(cfg: ComposeConfig): Logger {
   return createLogger({ level: cfg.log_level, file: cfg.log_file, name: cfg.name });
}

/** Discovered plugins in dependency order. */
export function loadSortedPlugins(cfg: ComposeConfig, logger: Logger): Plugin[] {
   return sortPlugins(discoverPlugins(cfg.plugins, logger));
}

/** Merge only (no resolution): what `history` and `dump` look at. */
export function composeDocument(cfg: ComposeConfig, logger: Logger): ComposedDocument {
   const engine = new MergeEngine({ logger, strictOverrides: cfg.strict_overrides });
   return engine.compose(loadSortedPlugins(cfg, logger));
}

export function renderModule(schema: Schema, cfg: ComposeConfig): string {
   return generateEntities(schema, {
      baseClass: cfg.base_class,
      engine: cfg.engine,
      sourceImports: cfg.source_imports,
      sourceAdd: cfg.source_add,
      stubConfig: { stubDir: cfg.stub_dir, groups: cfg.groups },
   });
}

/**
 * Discover → (freshness check) → compose → resolve → generate → write.
 * Strictly sequential; the first error aborts the pass.
 */
export async function runPipeline(cfg: ComposeConfig, opts: PipelineOptions = {}): Promise<PipelineResult> {
   const logger = opts.logger ?? loggerFor(cfg);
   const plugins = discoverPlugins(cfg.plugins, logger);
   const extra = cfg.configFile ? [cfg.configFile] : [];

   if (!opts.force && !shouldRegenerate(cfg.output, plugins, extra)) {
      logger.info(`🟡 ${path.relative(process.cwd(), cfg.output) || cfg.output} is up to date`);
      return { status: "up-to-date", output: cfg.output, plugins };
   }

   const schema = composeSchema(plugins, { logger, strictOverrides: cfg.strict_overrides });
   const text = renderModule(schema, cfg);
   // an unchanged artifact still has to end up newer than every source
   const touchTo = new Date(Math.max(Date.now(), latestModification(plugins, extra)));
   const status = await writeArtifact(cfg.output, text, { prettier: cfg.prettier, dryRun: opts.dryRun, touchTo, logger });

   return { status, output: cfg.output, plugins: [...schema.plugins], schema };
}
