import type { ComposedDocument } from "../composer/merge-engine";
import type { PlainObject } from "../composer/document";
import type { Plugin } from "../plugins/types";

/** Owner recorded for the engine's own column types. */
export const BUILTIN = "<builtin>";
/** Native type of a column group that has no base type. */
export const COMPOSITE = "<composite>";

/* ------------------------------------------------------------------
 *  Types
 * ---------------------------------------------------------------- */

/** How a column type surfaces in generated code. */
export interface LanguageType {
   /** TypeScript type of the entity property */
   tsType: string;
   /** `type` option of the column decorator */
   columnType: string;
   /** column type used when `timezone: true` */
   tzColumnType?: string;
   /** raw import line the TS type needs */
   import?: string;
}

/** A column entry as declared, before resolution. */
export interface ColumnSpec {
   plugin: string;
   attributes: PlainObject;
}

/** A type as declared (or seeded), not yet walked up its bases. */
export interface DeclaredType {
   name: string;
   plugin: string;
   /** own attributes, structural keys removed */
   attributes: PlainObject;
   baseTypeName?: string;
   embeddedColumns: ColumnSpec[];
   /** explicit language mapping (built-ins, `ts_type` / `ts_import`) */
   languageOverride?: Partial<LanguageType>;
}

export interface TypeDef extends DeclaredType {
   /** ancestors, nearest first */
   chain: string[];
   /** terminal built-in name, or COMPOSITE */
   nativeType: string;
   language: LanguageType;
}

export type TypeCatalog = ReadonlyMap<string, TypeDef>;

/* ------------------------------------------------------------------
 *  Columns
 * ---------------------------------------------------------------- */

export type ManyToManyTag = "target1" | "target2";

/** Column attributes sorted by what they configure. */
export interface AttributeBuckets {
   fieldConstraints: PlainObject;
   typeParameters: PlainObject;
   relationParameters: PlainObject;
   otherAttributes: PlainObject;
}

/** `Table.column` as written, before the target exists. */
export interface ReferenceStub {
   targetTableName: string;
   targetColumnName: string;
   options: PlainObject;
}

interface ColumnBase extends AttributeBuckets {
   name: string;
   plugin: string;
   rawAttributes: PlainObject;
   manyToManyTag?: ManyToManyTag;
}

/** Pass-1 column: either typed, or a reference waiting for pass 2. */
export type UnresolvedColumn =
   | (ColumnBase & { kind: "typed"; resolvedType: TypeDef })
   | (ColumnBase & { kind: "reference"; reference: ReferenceStub });

export interface ForeignKeyRef {
   targetTableName: string;
   targetColumnName: string;
   targetTable: TableDef;
   /** effective type of the target column */
   targetColumnType: TypeDef;
   options: PlainObject;
}

export type ColumnDef =
   | (ColumnBase & { kind: "typed"; resolvedType: TypeDef })
   | (ColumnBase & { kind: "foreignKey"; foreignKey: ForeignKeyRef });

/* ------------------------------------------------------------------
 *  Tables
 * ---------------------------------------------------------------- */

export interface IndexDef {
   name?: string;
   columns: string[];
   unique: boolean;
}

export interface ManyToManyTargetStub {
   tag: ManyToManyTag;
   tableName: string;
   columnName: string;
   /** name of the join column on the many-to-many table */
   joinColumn: string;
}

export interface ManyToManyTarget extends ManyToManyTargetStub {
   table: TableDef;
   type: TypeDef;
}

export interface ManyToManyDef {
   target1: ManyToManyTarget;
   target2: ManyToManyTarget;
}

interface TableBase {
   name: string;
   physicalName: string;
   owningPlugins: Plugin[];
   /** merged attributes, `columns` stripped */
   attributes: PlainObject;
   mixins: string[];
   indexes: IndexDef[];
}

export interface UnresolvedTable extends TableBase {
   columns: UnresolvedColumn[];
   manyToMany?: { target1: ManyToManyTargetStub; target2: ManyToManyTargetStub };
}

export interface TableDef extends TableBase {
   columns: ColumnDef[];
   manyToMany?: ManyToManyDef;
}

/* ------------------------------------------------------------------
 *  Schema
 * ---------------------------------------------------------------- */

export interface Schema {
   readonly types: TypeCatalog;
   /** first-declaration order */
   readonly tables: ReadonlyMap<string, TableDef>;
   /** resolved columns of every composite type, by type name */
   readonly mixins: ReadonlyMap<string, ColumnDef[]>;
   /** dependency order */
   readonly plugins: readonly Plugin[];
   readonly document: ComposedDocument;
}

/** Keys every column attribute is sorted by. */
export const FIELD_CONSTRAINT_KEYS = ["primary_key", "autoincrement", "unique", "nullable", "index", "default"] as const;
export const TYPE_PARAMETER_KEYS = ["length", "precision", "scale", "timezone"] as const;
export const RELATION_PARAMETER_KEYS = ["on_update", "on_delete"] as const;
