import { Minimatch } from "minimatch";
import {
   DocNode,
   ListNode,
   MapNode,
   PlainObject,
   describeShape,
   fromPlain,
   mapNode,
   nodeEquals,
} from "./document";
import { columnName, mergeColumnsByName } from "./handlers";
import { ScalarOverrideError, TypeConflictError } from "../errors";
import { Logger, silentLogger } from "../utils/logger";
import type { Plugin } from "../plugins/types";

/**
 * Context handed to list handlers. `merge` runs the engine's own rule so a
 * handler can deep-merge list items (history and provenance included).
 */
export interface MergeContext {
   readonly path: string;
   readonly plugin: string;
   merge(existing: DocNode, incoming: DocNode, path: string): DocNode;
   /** Record `path`, and every key path below it when `node` is new to the document. */
   record(path: string, node?: DocNode): void;
}

export type MergeHandler = (existing: ListNode, incoming: ListNode, ctx: MergeContext) => ListNode;

export interface ComposedDocument {
   readonly root: MapNode;
   /** dot path → plugins that touched it, in merge order */
   readonly history: ReadonlyMap<string, readonly string[]>;
   /** plugin names in the order they were merged */
   readonly order: readonly string[];
}

export interface MergeEngineOptions {
   logger?: Logger;
   /** Throw ScalarOverrideError instead of warning when a plugin changes a scalar. */
   strictOverrides?: boolean;
   /** Register the by-name column handlers (default true). */
   columnHandlers?: boolean;
}

interface RegisteredHandler {
   pattern: string;
   matcher: Minimatch;
   handler: MergeHandler;
}

/** Patterns whose lists are merged by column `name`. */
export const COLUMN_LIST_PATTERNS = ["tables.*.columns", "types.*.columns"] as const;

/**
 * Folds plugin declarations into one composed document, one plugin at a
 * time, remembering which plugin defined or last overrode every node.
 */
export class MergeEngine {
   #root: MapNode | undefined;
   #history = new Map<string, string[]>();
   #handlers: RegisteredHandler[] = [];
   #order: string[] = [];

   private readonly logger: Logger;
   private readonly strict: boolean;

   constructor(opts: MergeEngineOptions = {}) {
      this.logger = opts.logger ?? silentLogger;
      this.strict = opts.strictOverrides ?? false;

      if (opts.columnHandlers ?? true) {
         for (const pattern of COLUMN_LIST_PATTERNS) this.registerMergeHandler(pattern, mergeColumnsByName);
      }
   }

   /**
    * Register a list handler for a dot path. Patterns are minimatch globs
    * (`tables.*.columns`); an exact path beats any pattern.
    */
   public registerMergeHandler(pattern: string, handler: MergeHandler): void {
      this.#handlers = this.#handlers.filter(h => h.pattern !== pattern);
      this.#handlers.push({ pattern, matcher: new Minimatch(pattern, { dot: true }), handler });
   }

   /** Merge every declaration of every plugin, in the given (sorted) order. */
   public compose(plugins: readonly Plugin[]): ComposedDocument {
      for (const plugin of plugins) {
         this.#order.push(plugin.name);
         for (const doc of plugin.declarations) this.merge(doc, plugin.name);
      }
      return this.document();
   }

   /** Merge one declaration document contributed by `plugin`. */
   public merge(doc: PlainObject, plugin: string): MapNode {
      const incoming = fromPlain(doc, plugin);
      if (incoming.kind !== "map") {
         throw new TypeConflictError("$", { plugin: this.#root?.plugin ?? plugin, shape: "map" }, { plugin, shape: incoming.kind });
      }
      if (!this.#order.includes(plugin)) this.#order.push(plugin);

      this.#root = this.mergeMaps(this.#root ?? mapNode(plugin), incoming, plugin, "");
      return this.#root;
   }

   public document(): ComposedDocument {
      return {
         root: this.#root ?? mapNode(""),
         history: new Map([...this.#history].map(([k, v]) => [k, [...v]])),
         order: [...this.#order],
      };
   }

   public history(): ReadonlyMap<string, readonly string[]> {
      return this.#history;
   }

   /* ------------------------------------------------------------------
    *  merge rules
    * ---------------------------------------------------------------- */

   private mergeMaps(existing: MapNode, incoming: MapNode, plugin: string, path: string): MapNode {
      const entries = new Map(existing.entries);

      for (const [key, value] of incoming.entries) {
         const keyPath = path ? `${path}.${key}` : key;
         this.record(keyPath, plugin);

         const prev = entries.get(key);
         if (!prev) {
            this.logger.debug(`[${plugin}] Adding new key '${keyPath}'`);
            this.recordTree(value, keyPath, plugin);
            entries.set(key, value);
            continue;
         }
         entries.set(key, this.mergeNodes(prev, value, plugin, keyPath));
      }

      return { kind: "map", plugin: existing.plugin, entries };
   }

   private mergeNodes(existing: DocNode, incoming: DocNode, plugin: string, path: string): DocNode {
      if (existing.kind === "map" && incoming.kind === "map") {
         this.logger.debug(`[${plugin}] Merging map at key '${path}'`);
         return this.mergeMaps(existing, incoming, plugin, path);
      }

      if (existing.kind === "list" && incoming.kind === "list") {
         const handler = this.handlerFor(path);
         if (handler) {
            this.logger.debug(`[${plugin}] Merging list at key '${path}' using custom handler`);
            return handler(existing, incoming, this.context(path, plugin));
         }
         this.logger.debug(`[${plugin}] Extending list at key '${path}'`);
         return this.extendList(existing, incoming);
      }

      if (existing.kind === "scalar" && incoming.kind === "scalar") {
         if (existing.value === incoming.value) return existing;
         if (this.strict) throw new ScalarOverrideError(path, plugin, existing.value, incoming.value);
         this.logger.warn(
            `[${plugin}] Overlapping value for key '${path}': ${JSON.stringify(existing.value)} -> ${JSON.stringify(incoming.value)} (was ${existing.plugin})`
         );
         return incoming;
      }

      throw new TypeConflictError(
         path,
         { plugin: existing.plugin, shape: describeShape(existing) },
         { plugin, shape: describeShape(incoming) }
      );
   }

   /** Default list rule: keep existing, append what is not already there. */
   private extendList(existing: ListNode, incoming: ListNode): ListNode {
      const items = [...existing.items];
      for (const item of incoming.items) {
         if (!items.some(e => nodeEquals(e, item))) items.push(item);
      }
      return { kind: "list", plugin: existing.plugin, items };
   }

   private handlerFor(path: string): MergeHandler | undefined {
      const exact = this.#handlers.find(h => h.pattern === path);
      if (exact) return exact.handler;
      return this.#handlers.find(h => h.matcher.match(path))?.handler;
   }

   private context(path: string, plugin: string): MergeContext {
      return {
         path,
         plugin,
         merge: (existing, incoming, itemPath) => this.mergeNodes(existing, incoming, plugin, itemPath),
         record: (itemPath, node) => {
            this.record(itemPath, plugin);
            if (node) this.recordTree(node, itemPath, plugin);
         },
      };
   }

   /** Walk a subtree that is new to the document and record each key path in it. */
   private recordTree(node: DocNode, path: string, plugin: string): void {
      if (node.kind === "map") {
         for (const [key, value] of node.entries) {
            const keyPath = `${path}.${key}`;
            this.record(keyPath, plugin);
            this.recordTree(value, keyPath, plugin);
         }
         return;
      }
      // handled lists are keyed by item name, the same paths a later merge records
      if (node.kind === "list" && this.handlerFor(path)) {
         for (const item of node.items) {
            const name = columnName(item);
            if (name === undefined) continue;
            this.record(`${path}.${name}`, plugin);
            this.recordTree(item, `${path}.${name}`, plugin);
         }
      }
   }

   private record(path: string, plugin: string): void {
      const list = this.#history.get(path);
      if (list) list.push(plugin);
      else this.#history.set(path, [plugin]);
   }
}

/** Render the history log, one `path: defined in [...]` line per key. */
export function formatHistory(history: ReadonlyMap<string, readonly string[]>, filter?: string): string[] {
   const matcher = filter ? new Minimatch(filter, { dot: true }) : undefined;
   return [...history.keys()]
      .filter(path => !matcher || matcher.match(path))
      .sort()
      .map(path => `${path}: defined in [${(history.get(path) ?? []).join(", ")}]`);
}
