/**
 * Errors raised while composing plugins into a schema.
 *
 * Every error is fatal to the composition pass; `code` is stable and meant
 * for programmatic checks, `details` carries the names needed to locate the
 * offending declaration.
 */
export class CompositionError extends Error {
   public readonly code: string;
   public readonly details: Record<string, unknown>;

   constructor(message: string, code: string, details: Record<string, unknown> = {}) {
      super(message);
      this.name = new.target.name;
      this.code = code;
      this.details = details;
      Error.captureStackTrace(this, new.target);
   }
}

/* ------------------------------------------------------------------
 *  Configuration & discovery
 * ---------------------------------------------------------------- */

export class ConfigError extends CompositionError {
   constructor(public readonly file: string, public readonly issues: string[]) {
      super(`Invalid configuration in ${file}:\n  - ${issues.join("\n  - ")}`, "CONFIG_INVALID", { file, issues });
   }
}

export class PluginDirectoryError extends CompositionError {
   constructor(public readonly directory: string) {
      super(`The plugins folder: ${directory} does not exist`, "PLUGIN_DIR_MISSING", { directory });
   }
}

export class DocumentParseError extends CompositionError {
   constructor(public readonly file: string, reason: string) {
      super(`Cannot parse ${file}: ${reason}`, "DOCUMENT_PARSE", { file, reason });
   }
}

export class DuplicatePluginError extends CompositionError {
   constructor(public readonly plugin: string, public readonly directories: [string, string]) {
      super(
         `Duplicate plugin name "${plugin}" (${directories[0]} and ${directories[1]})`,
         "PLUGIN_DUPLICATE",
         { plugin, directories }
      );
   }
}

/* ------------------------------------------------------------------
 *  Dependency ordering
 * ---------------------------------------------------------------- */

export class UnknownDependencyError extends CompositionError {
   constructor(public readonly missing: Record<string, string[]>) {
      const lines = Object.entries(missing).map(([plugin, deps]) => `${plugin} → ${deps.join(", ")}`);
      super(`Unknown plugin dependencies: ${lines.join("; ")}`, "DEPENDENCY_UNKNOWN", { missing });
   }
}

export class CircularDependencyError extends CompositionError {
   constructor(public readonly cycle: string[]) {
      super(`Circular dependency found between: ${cycle.join(", ")}`, "DEPENDENCY_CYCLE", { cycle });
   }
}

/* ------------------------------------------------------------------
 *  Merge
 * ---------------------------------------------------------------- */

export class TypeConflictError extends CompositionError {
   constructor(
      public readonly path: string,
      public readonly existing: { plugin: string; shape: string },
      public readonly incoming: { plugin: string; shape: string }
   ) {
      super(
         `Incompatible values for key '${path}': ${existing.shape} from "${existing.plugin}" vs ${incoming.shape} from "${incoming.plugin}"`,
         "MERGE_TYPE_CONFLICT",
         { path, existing, incoming }
      );
   }
}

export class ScalarOverrideError extends CompositionError {
   constructor(public readonly path: string, public readonly plugin: string, previous: unknown, next: unknown) {
      super(
         `[${plugin}] overrides '${path}': ${JSON.stringify(previous)} -> ${JSON.stringify(next)}`,
         "MERGE_SCALAR_OVERRIDE",
         { path, plugin, previous, next }
      );
   }
}

/* ------------------------------------------------------------------
 *  Types
 * ---------------------------------------------------------------- */

export class DuplicateTypeError extends CompositionError {
   constructor(public readonly typeName: string, public readonly owners: [string, string]) {
      super(
         `Type "${typeName}" declared in "${owners[1]}" is already defined by "${owners[0]}"`,
         "TYPE_DUPLICATE",
         { typeName, owners }
      );
   }
}

export class UnknownBaseTypeError extends CompositionError {
   constructor(public readonly typeName: string, public readonly plugin: string, public readonly baseName?: string) {
      super(
         baseName
            ? `Type "${typeName}" declared in "${plugin}" inherits unknown type "${baseName}"`
            : `Type "${typeName}" declared in "${plugin}" has neither a base type nor columns`,
         "TYPE_UNKNOWN_BASE",
         { typeName, plugin, baseName }
      );
   }
}

export class CircularBaseTypeError extends CompositionError {
   constructor(public readonly typeName: string, public readonly chain: string[]) {
      super(`Type "${typeName}" inherits from itself: ${chain.join(" → ")}`, "TYPE_CYCLE", { typeName, chain });
   }
}

/* ------------------------------------------------------------------
 *  Tables & columns
 * ---------------------------------------------------------------- */

export class InvalidColumnError extends CompositionError {
   constructor(public readonly context: string, reason: string) {
      super(`Invalid column in ${context}: ${reason}`, "COLUMN_INVALID", { context, reason });
   }
}

export class DuplicateColumnError extends CompositionError {
   constructor(public readonly table: string, public readonly column: string) {
      super(`Duplicated column "${column}" in table "${table}"`, "COLUMN_DUPLICATE", { table, column });
   }
}

export class UnknownMixinError extends CompositionError {
   constructor(public readonly table: string, public readonly mixin: string) {
      super(`Table "${table}" uses mixin "${mixin}" which is not a composite type`, "MIXIN_UNKNOWN", { table, mixin });
   }
}

export class InvalidIndexError extends CompositionError {
   constructor(public readonly table: string, reason: string) {
      super(`Invalid index on table "${table}": ${reason}`, "INDEX_INVALID", { table, reason });
   }
}

export class UnknownForeignTableError extends CompositionError {
   constructor(public readonly context: string, public readonly column: string, public readonly target: string) {
      super(
         `Foreign key for column "${column}" in ${context} references unknown table "${target}"`,
         "FK_UNKNOWN_TABLE",
         { context, column, target }
      );
   }
}

export class InvalidForeignReferenceError extends CompositionError {
   constructor(public readonly context: string, public readonly column: string, public readonly target: string) {
      super(
         `Column "${column}" in ${context} has invalid foreign reference "${target}"`,
         "FK_INVALID_REFERENCE",
         { context, column, target }
      );
   }
}

export class InvalidManyToManyError extends CompositionError {
   constructor(public readonly table: string, reason: string) {
      super(`Many to many error for table "${table}": ${reason}`, "M2M_INVALID", { table, reason });
   }
}
