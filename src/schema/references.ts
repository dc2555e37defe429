import {
   InvalidForeignReferenceError,
   InvalidManyToManyError,
   UnknownForeignTableError,
} from "../errors";
import type { PassOneResult } from "./tables";
import {
   ColumnDef,
   ManyToManyTarget,
   ManyToManyTargetStub,
   TableDef,
   TypeDef,
   UnresolvedColumn,
   UnresolvedTable,
} from "./types";

type Lookup =
   | { ok: true; type: TypeDef }
   | { ok: false; reason: "table" | "column" | "cycle" };

export interface ResolvedTables {
   tables: Map<string, TableDef>;
   mixins: Map<string, ColumnDef[]>;
}

/** Type a column ends up with, whether declared or borrowed from its target. */
export function effectiveType(column: ColumnDef): TypeDef {
   return column.kind === "typed" ? column.resolvedType : column.foreignKey.targetColumnType;
}

/**
 * Find `table.column` among every pass-1 table (mixin columns included),
 * following references that point at other references.
 */
function lookup(pass1: PassOneResult, tableName: string, columnName: string, seen: string[]): Lookup {
   const table = pass1.tables.get(tableName);
   if (!table) return { ok: false, reason: "table" };

   const candidates = [...table.columns, ...table.mixins.flatMap(m => pass1.mixins.get(m) ?? [])];
   const column = candidates.find(c => c.name === columnName);
   if (!column) return { ok: false, reason: "column" };
   if (column.kind === "typed") return { ok: true, type: column.resolvedType };

   const key = `${tableName}.${columnName}`;
   if (seen.includes(key)) return { ok: false, reason: "cycle" };
   return lookup(pass1, column.reference.targetTableName, column.reference.targetColumnName, [...seen, key]);
}

function shellOf(table: UnresolvedTable): TableDef {
   return {
      name: table.name,
      physicalName: table.physicalName,
      owningPlugins: [...table.owningPlugins],
      attributes: { ...table.attributes },
      mixins: [...table.mixins],
      indexes: table.indexes.map(i => ({ ...i, columns: [...i.columns] })),
      columns: [],
   };
}

/**
 * Pass 2: every table exists now, so every reference can be looked up.
 * Returns new TableDefs; pass-1 values are left as they were.
 */
export function resolveReferences(pass1: PassOneResult): ResolvedTables {
   const shells = new Map<string, TableDef>();
   for (const [name, table] of pass1.tables) shells.set(name, shellOf(table));

   const resolve = (owner: string, where: string, column: UnresolvedColumn): ColumnDef => {
      if (column.kind === "typed") return { ...column };

      const { targetTableName, targetColumnName } = column.reference;
      const target = `${targetTableName}.${targetColumnName}`;
      const found = lookup(pass1, targetTableName, targetColumnName, [`${owner}.${column.name}`]);
      const targetTable = shells.get(targetTableName);

      if (!found.ok || !targetTable) {
         const reason = found.ok ? "table" : found.reason;
         if (column.manyToManyTag) {
            throw new InvalidManyToManyError(owner, `${column.manyToManyTag} "${target}" cannot be resolved (${reason})`);
         }
         if (reason === "table") throw new UnknownForeignTableError(where, column.name, targetTableName);
         throw new InvalidForeignReferenceError(where, column.name, target);
      }

      const { reference, ...rest } = column;
      return {
         ...rest,
         kind: "foreignKey",
         foreignKey: {
            targetTableName,
            targetColumnName,
            targetTable,
            targetColumnType: found.type,
            options: { ...reference.options },
         },
      };
   };

   const mixins = new Map<string, ColumnDef[]>();
   for (const [name, columns] of pass1.mixins) {
      mixins.set(name, columns.map(c => resolve(name, `type "${name}"`, c)));
   }

   for (const [name, table] of pass1.tables) {
      const shell = shells.get(name);
      if (!shell) continue;
      shell.columns = table.columns.map(c => resolve(name, `table "${name}"`, c));

      if (table.manyToMany) {
         const target = (stub: ManyToManyTargetStub): ManyToManyTarget => {
            const join = shell.columns.find(c => c.manyToManyTag === stub.tag);
            const targetTable = shells.get(stub.tableName);
            if (!join || !targetTable) throw new InvalidManyToManyError(name, `${stub.tag} "${stub.tableName}.${stub.columnName}" cannot be resolved`);
            return { ...stub, table: targetTable, type: effectiveType(join) };
         };
         shell.manyToMany = { target1: target(table.manyToMany.target1), target2: target(table.manyToMany.target2) };
      }
   }

   return { tables: shells, mixins };
}
