import builtinTable from "./builtin-types.json";
import { child, isPlainObject, PlainObject, PlainValue, toPlain } from "../composer/document";
import { MergeEngine } from "../composer/merge-engine";
import {
   CircularBaseTypeError,
   DocumentParseError,
   DuplicateTypeError,
   InvalidColumnError,
   UnknownBaseTypeError,
} from "../errors";
import type { Plugin } from "../plugins/types";
import { deepMerge, omit } from "../utils/objects";
import { BUILTIN, COMPOSITE, ColumnSpec, DeclaredType, LanguageType, TypeDef } from "./types";

/** Keys that shape a type rather than describe its columns. */
const STRUCTURAL_KEYS = ["base", "inherits", "columns", "ts_type", "ts_import"];

/** Language of a column group: never rendered as one column. */
const COMPOSITE_LANGUAGE: LanguageType = { tsType: "unknown", columnType: "simple-json" };

/** The engine's column types, seeded before any plugin type. */
export function builtinTypes(): Map<string, DeclaredType> {
   const out = new Map<string, DeclaredType>();
   for (const [name, language] of Object.entries(builtinTable)) {
      out.set(name, { name, plugin: BUILTIN, attributes: {}, embeddedColumns: [], languageOverride: { ...language } });
   }
   return out;
}

/**
 * Turn one `types.<name>` entry into a DeclaredType. A bare string is
 * shorthand for `{ base: <string> }`.
 */
export function declareType(name: string, raw: PlainValue, plugin: string): DeclaredType {
   if (typeof raw === "string") return { name, plugin, attributes: {}, baseTypeName: raw, embeddedColumns: [] };
   if (!isPlainObject(raw)) throw new UnknownBaseTypeError(name, plugin);

   const base = raw.base ?? raw.inherits;
   const columns = raw.columns ?? [];
   if (!Array.isArray(columns)) throw new InvalidColumnError(`type "${name}"`, "`columns` must be a list");

   const embeddedColumns: ColumnSpec[] = columns.map(col => {
      if (!isPlainObject(col)) throw new InvalidColumnError(`type "${name}"`, "column entries must be mappings");
      return { plugin, attributes: col };
   });

   const languageOverride: Partial<LanguageType> = {};
   if (typeof raw.ts_type === "string") languageOverride.tsType = raw.ts_type;
   if (typeof raw.ts_import === "string") languageOverride.import = raw.ts_import;

   return {
      name,
      plugin,
      attributes: omit(raw, STRUCTURAL_KEYS),
      baseTypeName: typeof base === "string" ? base : undefined,
      embeddedColumns,
      languageOverride: Object.keys(languageOverride).length ? languageOverride : undefined,
   };
}

/**
 * Collect every plugin type, plugin by plugin in dependency order. A plugin
 * may spread one type over several documents, merged with the same rules as
 * the composed document (columns by name); two owners of one name fail.
 */
export function collectDeclaredTypes(
   plugins: readonly Plugin[],
   seed: Map<string, DeclaredType> = builtinTypes()
): Map<string, DeclaredType> {
   const catalog = new Map(seed);

   for (const plugin of plugins) {
      const engine = new MergeEngine();

      for (const doc of plugin.declarations) {
         if (doc.types === undefined) continue;
         if (!isPlainObject(doc.types)) throw new DocumentParseError("types", "`types` must be a mapping");
         engine.merge({ types: doc.types }, plugin.name);
      }

      const merged = child(engine.document().root, "types");
      const own = merged ? toPlain(merged) : {};
      if (!isPlainObject(own)) continue;

      for (const [name, raw] of Object.entries(own)) {
         const existing = catalog.get(name);
         if (existing) throw new DuplicateTypeError(name, [existing.plugin, plugin.name]);
         catalog.set(name, declareType(name, raw, plugin.name));
      }
   }

   return catalog;
}

/**
 * Walk a type up to its terminal base. Pure: the input is not touched, and
 * resolving the returned TypeDef again yields the same chain and attributes.
 */
export function resolveType(type: DeclaredType, catalog: ReadonlyMap<string, DeclaredType>): TypeDef {
   const chain: string[] = [];
   const lineage: DeclaredType[] = [type];
   let attributes: PlainObject = { ...type.attributes };
   let current = type;

   while (current.baseTypeName !== undefined) {
      const base = catalog.get(current.baseTypeName);
      if (!base) throw new UnknownBaseTypeError(current.name, current.plugin, current.baseTypeName);
      if (base.name === type.name || chain.includes(base.name)) {
         throw new CircularBaseTypeError(type.name, [type.name, ...chain, base.name]);
      }

      chain.push(base.name);
      lineage.push(base);
      attributes = deepMerge(base.attributes, attributes);
      current = base;
   }

   const embeddedColumns = lineage.find(t => t.embeddedColumns.length > 0)?.embeddedColumns ?? [];

   let nativeType: string;
   if (current.plugin === BUILTIN) nativeType = current.name;
   else if (embeddedColumns.length) nativeType = COMPOSITE;
   else throw new UnknownBaseTypeError(current.name, current.plugin);

   return {
      name: type.name,
      plugin: type.plugin,
      attributes,
      baseTypeName: type.baseTypeName,
      embeddedColumns: [...embeddedColumns],
      languageOverride: type.languageOverride,
      chain,
      nativeType,
      language: languageOf(lineage, nativeType),
   };
}

/** Farthest ancestor first, so the nearest override wins. */
function languageOf(lineage: readonly DeclaredType[], nativeType: string): LanguageType {
   let language: LanguageType = nativeType === COMPOSITE ? { ...COMPOSITE_LANGUAGE } : { tsType: "unknown", columnType: "" };
   for (const t of [...lineage].reverse()) {
      if (t.languageOverride) language = { ...language, ...t.languageOverride };
   }
   return language;
}

export function resolveCatalog(declared: ReadonlyMap<string, DeclaredType>): Map<string, TypeDef> {
   const out = new Map<string, TypeDef>();
   for (const [name, type] of declared) out.set(name, resolveType(type, declared));
   return out;
}

/** Built-ins plus every plugin type, fully resolved. */
export function buildTypeCatalog(plugins: readonly Plugin[]): Map<string, TypeDef> {
   return resolveCatalog(collectDeclaredTypes(plugins));
}

export function isComposite(type: TypeDef): boolean {
   return type.embeddedColumns.length > 0;
}
