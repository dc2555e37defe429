import { DocNode, isPlainObject, MapNode, PlainObject, PlainValue, child, toPlain } from "../composer/document";
import type { ComposedDocument } from "../composer/merge-engine";
import {
   CircularBaseTypeError,
   DocumentParseError,
   DuplicateColumnError,
   InvalidColumnError,
   InvalidIndexError,
   InvalidManyToManyError,
   UnknownMixinError,
} from "../errors";
import type { Plugin } from "../plugins/types";
import { stringList } from "../utils/objects";
import { isComposite } from "./type-catalog";
import {
   AttributeBuckets,
   ColumnSpec,
   FIELD_CONSTRAINT_KEYS,
   IndexDef,
   ManyToManyTag,
   ManyToManyTargetStub,
   ReferenceStub,
   TYPE_PARAMETER_KEYS,
   TypeCatalog,
   UnresolvedColumn,
   UnresolvedTable,
} from "./types";

/** Column keys consumed by resolution itself. */
const COLUMN_STRUCTURAL_KEYS = ["name", "type", "prefix", "foreign_key"];

/** Accepted spellings of the relation options. */
const RELATION_ALIASES = new Map<string, "on_update" | "on_delete">([
   ["on_update", "on_update"],
   ["onupdate", "on_update"],
   ["on_delete", "on_delete"],
   ["ondelete", "on_delete"],
]);

const REFERENCE = /^([A-Za-z_][\w]*)\.([A-Za-z_][\w]*)$/;

export interface PassOneResult {
   /** first-declaration order */
   tables: Map<string, UnresolvedTable>;
   /** columns of every composite type, by type name */
   mixins: Map<string, UnresolvedColumn[]>;
}

/** Split `Table.column`; `undefined` for anything else. */
export function parseReference(text: string): { table: string; column: string } | undefined {
   const m = REFERENCE.exec(text.trim());
   return m ? { table: m[1], column: m[2] } : undefined;
}

/** Sort attributes by fixed key membership. */
export function bucketAttributes(attrs: Readonly<PlainObject>): AttributeBuckets {
   const out: AttributeBuckets = { fieldConstraints: {}, typeParameters: {}, relationParameters: {}, otherAttributes: {} };

   for (const [key, value] of Object.entries(attrs)) {
      const relation = RELATION_ALIASES.get(key);
      if ((FIELD_CONSTRAINT_KEYS as readonly string[]).includes(key)) out.fieldConstraints[key] = value;
      else if ((TYPE_PARAMETER_KEYS as readonly string[]).includes(key)) out.typeParameters[key] = value;
      else if (relation) out.relationParameters[relation] = value;
      else if (!COLUMN_STRUCTURAL_KEYS.includes(key)) out.otherAttributes[key] = value;
   }
   return out;
}

interface ColumnContext {
   types: TypeCatalog;
   /** where the column lives, for messages: `table "User"` */
   where: string;
   prefix: string;
   /** composite types being expanded, outermost first */
   stack: string[];
}

function referenceColumn(
   name: string,
   spec: ColumnSpec,
   target: { table: string; column: string },
   relationOptions: PlainObject
): UnresolvedColumn {
   const buckets = bucketAttributes(spec.attributes);
   const relationParameters = { ...buckets.relationParameters, ...relationOptions };
   const reference: ReferenceStub = {
      targetTableName: target.table,
      targetColumnName: target.column,
      options: relationParameters,
   };
   return { kind: "reference", name, plugin: spec.plugin, rawAttributes: spec.attributes, ...buckets, relationParameters, reference };
}

/**
 * Resolve one declared column. A composite type expands into one column per
 * embedded column (prefixed, each resolved on its own); anything that is not
 * a known type must be a `Table.column` reference.
 */
export function resolveColumn(spec: ColumnSpec, ctx: ColumnContext): UnresolvedColumn[] {
   const attrs = spec.attributes;
   const declared = attrs.name;
   if (typeof declared !== "string" || !declared) {
      throw new InvalidColumnError(ctx.where, `column without a name (${JSON.stringify(attrs)})`);
   }
   const name = ctx.prefix + declared;

   // explicit foreign key
   const fk = attrs.foreign_key;
   if (fk !== undefined && fk !== null) {
      const target = typeof fk === "string" ? fk : isPlainObject(fk) ? fk.target : undefined;
      const ref = typeof target === "string" ? parseReference(target) : undefined;
      if (!ref) throw new InvalidColumnError(ctx.where, `foreign key for column "${declared}" has invalid target`);

      const options = isPlainObject(fk) ? bucketAttributes(fk).relationParameters : {};
      return [referenceColumn(name, spec, ref, options)];
   }

   const typeName = attrs.type;
   if (typeof typeName !== "string" || !typeName) {
      throw new InvalidColumnError(ctx.where, `column "${declared}" has no type`);
   }

   const type = ctx.types.get(typeName);
   if (!type) {
      const ref = parseReference(typeName);
      if (!ref) throw new InvalidColumnError(ctx.where, `column "${declared}" has unknown type "${typeName}"`);
      return [referenceColumn(name, spec, ref, {})];
   }

   if (isComposite(type)) {
      if (ctx.stack.includes(type.name)) throw new CircularBaseTypeError(type.name, [...ctx.stack, type.name]);
      const prefix = ctx.prefix + (typeof attrs.prefix === "string" ? attrs.prefix : "");
      return type.embeddedColumns.flatMap(embedded =>
         resolveColumn(embedded, { ...ctx, prefix, stack: [...ctx.stack, type.name] })
      );
   }

   // type attributes the column did not set itself
   const merged: PlainObject = { ...type.attributes, ...attrs };
   return [
      {
         kind: "typed",
         name,
         plugin: spec.plugin,
         rawAttributes: attrs,
         ...bucketAttributes(merged),
         resolvedType: type,
      },
   ];
}

export function resolveColumns(specs: readonly ColumnSpec[], ctx: ColumnContext): UnresolvedColumn[] {
   return specs.flatMap(spec => resolveColumn(spec, ctx));
}

/* ------------------------------------------------------------------
 *  table parts
 * ---------------------------------------------------------------- */

function plainMap(node: MapNode): PlainObject {
   const out: PlainObject = {};
   for (const [k, v] of node.entries) out[k] = toPlain(v);
   return out;
}

function columnSpecs(table: string, node: DocNode | undefined): ColumnSpec[] {
   if (node === undefined) return [];
   if (node.kind !== "list") throw new InvalidColumnError(`table "${table}"`, "`columns` must be a list");
   return node.items.map(item => {
      if (item.kind !== "map") throw new InvalidColumnError(`table "${table}"`, "column entries must be mappings");
      return { plugin: item.plugin, attributes: plainMap(item) };
   });
}

function manyToManyTarget(table: string, tag: ManyToManyTag, value: PlainValue | undefined): ManyToManyTargetStub {
   const text = typeof value === "string" ? value : isPlainObject(value) ? value.table : undefined;
   const ref = typeof text === "string" ? parseReference(text) : undefined;
   if (!ref) throw new InvalidManyToManyError(table, `${tag} must be "Table.column" or { table: "Table.column" }`);

   let join = `${ref.table.toLowerCase()}_${ref.column}`;
   const column = isPlainObject(value) ? value.column : undefined;
   if (column !== undefined) {
      if (typeof column !== "string" || !column) throw new InvalidManyToManyError(table, `${tag}.column must be a column name`);
      join = column;
   }

   return { tag, tableName: ref.table, columnName: ref.column, joinColumn: join };
}

export function parseManyToMany(
   table: string,
   value: PlainValue
): { target1: ManyToManyTargetStub; target2: ManyToManyTargetStub } {
   if (!isPlainObject(value)) throw new InvalidManyToManyError(table, "many_to_many must be a mapping");
   return {
      target1: manyToManyTarget(table, "target1", value.target1),
      target2: manyToManyTarget(table, "target2", value.target2),
   };
}

function joinColumn(target: ManyToManyTargetStub, plugin: string): UnresolvedColumn {
   const rawAttributes: PlainObject = { name: target.joinColumn, primary_key: true };
   return {
      kind: "reference",
      name: target.joinColumn,
      plugin,
      rawAttributes,
      ...bucketAttributes(rawAttributes),
      manyToManyTag: target.tag,
      reference: { targetTableName: target.tableName, targetColumnName: target.columnName, options: {} },
   };
}

/**
 * Indexes: `"col"`, `["a", "b"]` or `{ name?, columns, unique? }`, each
 * naming columns of the table.
 */
export function parseIndexes(table: string, value: PlainValue | undefined, columns: ReadonlySet<string>): IndexDef[] {
   if (value === undefined || value === null) return [];
   if (!Array.isArray(value)) throw new InvalidIndexError(table, "`indexes` must be a list");

   return value.map(entry => {
      let def: IndexDef;
      if (typeof entry === "string" || Array.isArray(entry)) {
         def = { columns: stringList(entry), unique: false };
      } else if (isPlainObject(entry)) {
         def = {
            name: typeof entry.name === "string" ? entry.name : undefined,
            columns: stringList(entry.columns),
            unique: entry.unique === true,
         };
      } else {
         throw new InvalidIndexError(table, `unsupported index entry ${JSON.stringify(entry)}`);
      }

      if (!def.columns.length) throw new InvalidIndexError(table, "an index needs at least one column");
      const unknown = def.columns.find(c => !columns.has(c));
      if (unknown) throw new InvalidIndexError(table, `unknown column "${unknown}"`);
      return def;
   });
}

function firstDuplicate(names: readonly string[]): string | undefined {
   const seen = new Set<string>();
   for (const name of names) {
      if (seen.has(name)) return name;
      seen.add(name);
   }
   return undefined;
}

/** Plugins in contribution order, from the merge history of `tables.<Name>`. */
function owningPlugins(document: ComposedDocument, table: string, plugins: ReadonlyMap<string, Plugin>): Plugin[] {
   const names = [...new Set(document.history.get(`tables.${table}`) ?? [])];
   return names.flatMap(n => {
      const plugin = plugins.get(n);
      return plugin ? [plugin] : [];
   });
}

/* ------------------------------------------------------------------
 *  pass 1
 * ---------------------------------------------------------------- */

/**
 * Build every table (and every composite type's column group) with
 * references left as stubs. Nothing here looks at another table.
 */
export function buildTables(document: ComposedDocument, types: TypeCatalog, plugins: readonly Plugin[]): PassOneResult {
   const byName = new Map(plugins.map(p => [p.name, p]));

   const mixins = new Map<string, UnresolvedColumn[]>();
   for (const type of types.values()) {
      if (!isComposite(type)) continue;
      mixins.set(type.name, resolveColumns(type.embeddedColumns, { types, where: `type "${type.name}"`, prefix: "", stack: [type.name] }));
   }

   const tables = new Map<string, UnresolvedTable>();
   const tablesNode = child(document.root, "tables");
   if (tablesNode === undefined) return { tables, mixins };
   if (tablesNode.kind !== "map") throw new DocumentParseError("tables", "`tables` must be a mapping");

   for (const [name, node] of tablesNode.entries) {
      if (node.kind !== "map") throw new DocumentParseError(`tables.${name}`, "a table must be a mapping");
      const where = `table "${name}"`;

      const attributes = plainMap(node);
      delete attributes.columns;

      const tableMixins = stringList(attributes.mixins);
      for (const mixin of tableMixins) {
         if (!mixins.has(mixin)) throw new UnknownMixinError(name, mixin);
      }

      const m2mNode = child(node, "many_to_many");
      const manyToMany = attributes.many_to_many !== undefined ? parseManyToMany(name, attributes.many_to_many) : undefined;
      const joinColumns = manyToMany
         ? [joinColumn(manyToMany.target1, m2mNode?.plugin ?? node.plugin), joinColumn(manyToMany.target2, m2mNode?.plugin ?? node.plugin)]
         : [];

      const columns = [
         ...joinColumns,
         ...resolveColumns(columnSpecs(name, child(node, "columns")), { types, where, prefix: "", stack: [] }),
      ];

      const own = columns.map(c => c.name);
      const inherited = tableMixins.flatMap(m => (mixins.get(m) ?? []).map(c => c.name));
      const duplicate = firstDuplicate([...own, ...inherited]);
      if (duplicate) throw new DuplicateColumnError(name, duplicate);

      tables.set(name, {
         name,
         physicalName: typeof attributes.name === "string" ? attributes.name : name.toLowerCase(),
         owningPlugins: owningPlugins(document, name, byName),
         attributes,
         columns,
         mixins: tableMixins,
         indexes: parseIndexes(name, attributes.indexes, new Set([...own, ...inherited])),
         manyToMany,
      });
   }

   return { tables, mixins };
}
