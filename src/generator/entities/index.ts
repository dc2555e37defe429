// generator/entities/index.ts
import type { Schema } from "../../schema/types";
import { EntityPrinter } from "../../printer/entities";
import type { StubConfig } from "../../utils/stubResolver";
import { EntitiesGeneratorOptions, SchemaToEntitiesGenerator } from "./generator";
import type { EntityModule } from "./types";

export interface GenerateEntitiesOptions extends EntitiesGeneratorOptions {
   stubConfig?: StubConfig;
}

/** Definitions only; useful for tooling and tests. */
export function buildEntityModule(schema: Schema, opts: GenerateEntitiesOptions = {}): EntityModule {
   return new SchemaToEntitiesGenerator(schema, opts).generateAll();
}

/** The generated module as text. Deterministic for a given schema and options. */
export function generateEntities(schema: Schema, opts: GenerateEntitiesOptions = {}): string {
   return new EntityPrinter(opts.stubConfig).print(buildEntityModule(schema, opts));
}

export { SchemaToEntitiesGenerator } from "./generator";
export type { EntitiesGeneratorOptions } from "./generator";
export * from "./types";
