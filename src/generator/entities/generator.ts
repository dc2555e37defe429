// generator/entities/generator.ts
import type { PlainObject, PlainValue } from "../../composer/document";
import { effectiveType } from "../../schema/references";
import type { ColumnDef, Schema, TableDef } from "../../schema/types";
import type { EntityDefinition, EntityMember, EntityModule, MixinDefinition, TsImport } from "./types";

export const TYPEORM = "typeorm";

/** `import { A, B } from "x";` — anything else is kept as a raw line. */
const IMPORT_RE = /^import\s*\{\s*([^}]+)\}\s*from\s*(['"])([^'"]+)\2;?$/;

export interface EntitiesGeneratorOptions {
   /** class every entity ultimately extends (default `BaseEntity` from typeorm) */
   baseClass?: string;
   /** TypeORM driver of the generated data source (default `postgres`) */
   engine?: string;
   /** import lines from the root configuration */
   sourceImports?: readonly string[];
   /** code appended verbatim after the entry point */
   sourceAdd?: string;
}

const q = (s: string) => JSON.stringify(s);

/** Make `s` usable as a property name after a dot. */
export function identifier(s: string): string {
   const cleaned = s.replace(/[^\w$]/g, "_");
   return /^\d/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/** Literal for a column `default`; `sql:` marks a raw database expression. */
export function renderDefault(value: PlainValue): string {
   if (typeof value === "string") {
      return value.startsWith("sql:") ? `() => ${q(value.slice(4).trim())}` : q(value);
   }
   if (value === null) return "null";
   if (typeof value === "number" || typeof value === "boolean") return String(value);
   return `() => ${q(`'${JSON.stringify(value)}'`)}`;
}

/** `'SET NULL'` (quoted the SQL way) → `SET NULL` */
function relationAction(value: PlainValue | undefined): string | undefined {
   if (typeof value !== "string") return undefined;
   return value.trim().replace(/^'(.*)'$/, "$1");
}

function unique(base: string, taken: Set<string>): string {
   let name = base;
   for (let i = 2; taken.has(name); i++) name = `${base}_${i}`;
   taken.add(name);
   return name;
}

/**
 * Turn a resolved schema into entity definitions, collecting the imports
 * the generated module needs along the way.
 */
export class SchemaToEntitiesGenerator {
   private structured = new Map<string, Set<string>>();
   private raw: string[] = [];

   constructor(
      private readonly schema: Schema,
      private readonly opts: EntitiesGeneratorOptions = {}
   ) { }

   generateAll(): EntityModule {
      this.structured = new Map();
      this.raw = [];

      const base = this.opts.baseClass ?? "BaseEntity";
      if (base === "BaseEntity") this.use("BaseEntity");
      this.use("DataSource");

      const tables = [...this.schema.tables.values()];
      const used = new Set(tables.flatMap(t => t.mixins));

      const mixins: MixinDefinition[] = [...this.schema.mixins]
         .filter(([name]) => used.has(name))
         .map(([name, columns]) => ({ name, members: columns.map(c => this.columnMember(c)) }));

      // property names taken per entity, mixin columns included
      const taken = new Map<string, Set<string>>();
      for (const t of tables) {
         const inherited = t.mixins.flatMap(m => (this.schema.mixins.get(m) ?? []).map(c => c.name));
         taken.set(t.name, new Set([...t.columns.map(c => c.name), ...inherited]));
      }

      // foreign keys a mixin brings are related on every entity using it
      const relations = new Map<string, EntityMember[]>(tables.map(t => [t.name, []]));
      for (const t of tables) {
         const columns = [...t.columns, ...t.mixins.flatMap(m => this.schema.mixins.get(m) ?? [])];
         for (const col of columns) {
            if (col.kind === "foreignKey") this.relate(t, col, columns, taken, relations);
         }
      }

      const entities: EntityDefinition[] = tables.map(t => ({
         name: t.name,
         tableName: t.physicalName,
         heritage: t.mixins.reduceRight((acc, m) => `${m}Mixin(${acc})`, base),
         decorators: [`@Entity(${q(t.physicalName)})`, ...this.indexDecorators(t)],
         columns: t.columns.map(c => this.columnMember(c)),
         relations: relations.get(t.name) ?? [],
         plugins: t.owningPlugins.map(p => p.name),
      }));
      if (entities.length) this.use("Entity");

      for (const plugin of this.schema.plugins) plugin.sourceImports.forEach(line => this.addImportLine(line));
      (this.opts.sourceImports ?? []).forEach(line => this.addImportLine(line));

      return {
         header: this.header(),
         imports: this.imports(),
         rawImports: this.rawImports(),
         mixins,
         entities,
         engine: this.opts.engine ?? "postgres",
         sourceAdd: this.opts.sourceAdd ?? "",
      };
   }

   private header(): string[] {
      const plugins = this.schema.plugins.map(p => `${p.name}@${p.version}`);
      return [
         "// This file is generated by schema-compose. Do not edit.",
         `// Plugins: ${plugins.length ? plugins.join(", ") : "(none)"}`,
      ];
   }

   /* ------------------------------------------------------------------
    *  imports
    * ---------------------------------------------------------------- */

   private use(name: string, from = TYPEORM) {
      const set = this.structured.get(from) ?? new Set<string>();
      set.add(name);
      this.structured.set(from, set);
   }

   private addImportLine(line: string) {
      const trimmed = line.trim();
      if (!trimmed) return;

      const m = IMPORT_RE.exec(trimmed);
      if (!m) {
         if (!this.raw.includes(trimmed)) this.raw.push(trimmed);
         return;
      }
      m[1]
         .split(",")
         .map(t => t.trim())
         .filter(Boolean)
         .forEach(t => this.use(t, m[3]));
   }

   /** Side-effect imports lead in the order given; other raw lines are sorted. */
   private rawImports(): string[] {
      const sideEffect = (line: string) => /^import\s*['"]/.test(line);
      return [...this.raw.filter(sideEffect), ...this.raw.filter(l => !sideEffect(l)).sort()];
   }

   private imports(): TsImport[] {
      return [...this.structured.entries()]
         .map(([from, set]) => ({ from, types: [...set].sort() }))
         .sort((a, b) => a.from.localeCompare(b.from));
   }

   /* ------------------------------------------------------------------
    *  columns
    * ---------------------------------------------------------------- */

   private columnMember(col: ColumnDef): EntityMember {
      const type = effectiveType(col);
      const lang = type.language;
      if (lang.import) this.addImportLine(lang.import);

      const fc = col.fieldConstraints;
      const tp = col.typeParameters;
      const primary = fc.primary_key === true || col.manyToManyTag !== undefined;
      const generated = primary && fc.autoincrement === true && col.kind === "typed" && !col.manyToManyTag;
      const columnType = tp.timezone === true && lang.tzColumnType ? lang.tzColumnType : lang.columnType;

      const decorators: string[] = [];
      if (generated) {
         this.use("PrimaryGeneratedColumn");
         decorators.push(
            type.nativeType === "Uuid"
               ? `@PrimaryGeneratedColumn("uuid")`
               : `@PrimaryGeneratedColumn({ type: ${q(columnType)} })`
         );
      } else {
         const decorator = primary ? "PrimaryColumn" : "Column";
         this.use(decorator);
         decorators.push(`@${decorator}(${this.columnOptions(columnType, fc, tp, primary)})`);
      }

      if (fc.index === true && !primary) {
         this.use("Index");
         decorators.push("@Index()");
      }

      return {
         name: col.name,
         decorators,
         type: fc.nullable === true ? `${lang.tsType} | null` : lang.tsType,
      };
   }

   private columnOptions(columnType: string, fc: PlainObject, tp: PlainObject, primary: boolean): string {
      const opts: string[] = [`type: ${q(columnType)}`];

      for (const key of ["length", "precision", "scale"]) {
         const v = tp[key];
         if (typeof v === "number") opts.push(`${key}: ${v}`);
      }
      if (!primary) {
         if (typeof fc.nullable === "boolean") opts.push(`nullable: ${fc.nullable}`);
         if (typeof fc.unique === "boolean") opts.push(`unique: ${fc.unique}`);
      }
      if ("default" in fc) opts.push(`default: ${renderDefault(fc.default)}`);

      return `{ ${opts.join(", ")} }`;
   }

   private indexDecorators(table: TableDef): string[] {
      if (!table.indexes.length) return [];
      this.use("Index");
      return table.indexes.map(ix => {
         const name = ix.name ? `${q(ix.name)}, ` : "";
         const unique = ix.unique ? ", { unique: true }" : "";
         return `@Index(${name}[${ix.columns.map(q).join(", ")}]${unique})`;
      });
   }

   /* ------------------------------------------------------------------
    *  relations
    * ---------------------------------------------------------------- */

   /**
    * Forward `@ManyToOne` on the referencing entity, backward `@OneToMany`
    * on the target. Join-table columns of a many-to-many table go through
    * here too, which links both targets.
    */
   private relate(
      table: TableDef,
      col: Extract<ColumnDef, { kind: "foreignKey" }>,
      columns: readonly ColumnDef[],
      taken: Map<string, Set<string>>,
      relations: Map<string, EntityMember[]>
   ) {
      const fk = col.foreignKey;
      const target = fk.targetTable;
      const ownNames = taken.get(table.name) ?? new Set<string>();
      const targetNames = taken.get(target.name) ?? new Set<string>();
      taken.set(table.name, ownNames);
      taken.set(target.name, targetNames);

      const forwardBase = col.name.endsWith("_id") && col.name.length > 3 ? col.name.slice(0, -3) : `${col.name}_ref`;
      const forward = unique(identifier(forwardBase), ownNames);

      const sameTarget = columns.filter(
         c => c.kind === "foreignKey" && c.foreignKey.targetTableName === fk.targetTableName
      ).length;
      const backBase = sameTarget > 1 ? `${table.physicalName}_${forward}` : table.physicalName;
      const back = unique(identifier(backBase), targetNames);

      const options: string[] = [];
      const onDelete = relationAction(fk.options.on_delete);
      const onUpdate = relationAction(fk.options.on_update);
      if (onDelete) options.push(`onDelete: ${q(onDelete)}`);
      if (onUpdate) options.push(`onUpdate: ${q(onUpdate)}`);
      const optionArg = options.length ? `, { ${options.join(", ")} }` : "";

      this.use("ManyToOne");
      this.use("OneToMany");
      this.use("JoinColumn");

      relations.get(table.name)?.push({
         name: forward,
         decorators: [
            `@ManyToOne(() => ${target.name}, (entity) => entity.${back}${optionArg})`,
            `@JoinColumn({ name: ${q(col.name)}, referencedColumnName: ${q(fk.targetColumnName)} })`,
         ],
         type: col.fieldConstraints.nullable === true ? `${target.name} | null` : target.name,
      });

      relations.get(target.name)?.push({
         name: back,
         decorators: [`@OneToMany(() => ${table.name}, (entity) => entity.${forward})`],
         type: `${table.name}[]`,
      });
   }
}
