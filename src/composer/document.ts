/* ------------------------------------------------------------------
 *  Composed document nodes
 * ------------------------------------------------------------------
 *  Declarations are plain YAML/JSON values. Once they enter the merge
 *  engine they become a tagged tree where every node remembers the
 *  plugin that defined it (or last overrode it).
 * ---------------------------------------------------------------- */

export type Scalar = string | number | boolean | null;

/** Plain declaration value as produced by the YAML/JSON parsers. */
export type PlainValue = Scalar | PlainValue[] | PlainObject;
export interface PlainObject {
   [key: string]: PlainValue;
}

export interface MapNode {
   readonly kind: "map";
   readonly plugin: string;
   readonly entries: ReadonlyMap<string, DocNode>;
}

export interface ListNode {
   readonly kind: "list";
   readonly plugin: string;
   readonly items: readonly DocNode[];
}

export interface ScalarNode {
   readonly kind: "scalar";
   readonly plugin: string;
   readonly value: Scalar;
}

export type DocNode = MapNode | ListNode | ScalarNode;

/** Key under which provenance is written when a tree is turned back into plain values. */
export const PROVENANCE_KEY = "_plugin";

export function isPlainObject(value: unknown): value is PlainObject {
   return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown parser result to a declaration value. Anything the
 * document formats cannot express (dates, functions, undefined) is rejected.
 */
export function asPlainValue(value: unknown, where = "$"): PlainValue {
   if (value === null || typeof value === "string" || typeof value === "boolean") return value;
   if (typeof value === "number") return value;
   if (Array.isArray(value)) return value.map((v, i) => asPlainValue(v, `${where}[${i}]`));
   if (isPlainObject(value)) {
      const out: PlainObject = {};
      for (const [k, v] of Object.entries(value)) out[k] = asPlainValue(v, `${where}.${k}`);
      return out;
   }
   throw new TypeError(`Unsupported value at ${where}: ${typeof value}`);
}

export function mapNode(plugin: string, entries: ReadonlyMap<string, DocNode> = new Map()): MapNode {
   return { kind: "map", plugin, entries };
}

/** Wrap a plain value, tagging every node with `plugin`. Existing `_plugin` keys win. */
export function fromPlain(value: PlainValue, plugin: string): DocNode {
   if (Array.isArray(value)) {
      return { kind: "list", plugin, items: value.map(v => fromPlain(v, plugin)) };
   }
   if (isPlainObject(value)) {
      const tag = value[PROVENANCE_KEY];
      const owner = typeof tag === "string" ? tag : plugin;
      const entries = new Map<string, DocNode>();
      for (const [k, v] of Object.entries(value)) {
         if (k === PROVENANCE_KEY) continue;
         entries.set(k, fromPlain(v, owner));
      }
      return { kind: "map", plugin: owner, entries };
   }
   return { kind: "scalar", plugin, value };
}

/** Unwrap a node; with `provenance` every map gets a `_plugin` key. */
export function toPlain(node: DocNode, provenance = false): PlainValue {
   switch (node.kind) {
      case "scalar":
         return node.value;
      case "list":
         return node.items.map(item => toPlain(item, provenance));
      case "map": {
         const out: PlainObject = {};
         for (const [k, v] of node.entries) out[k] = toPlain(v, provenance);
         if (provenance) out[PROVENANCE_KEY] = node.plugin;
         return out;
      }
   }
}

/** Structural equality that ignores provenance tags. */
export function nodeEquals(a: DocNode, b: DocNode): boolean {
   if (a.kind === "scalar" && b.kind === "scalar") return a.value === b.value;
   if (a.kind === "list" && b.kind === "list") {
      return a.items.length === b.items.length && a.items.every((item, i) => nodeEquals(item, b.items[i]));
   }
   if (a.kind === "map" && b.kind === "map") {
      if (a.entries.size !== b.entries.size) return false;
      for (const [k, v] of a.entries) {
         const other = b.entries.get(k);
         if (!other || !nodeEquals(v, other)) return false;
      }
      return true;
   }
   return false;
}

/** Re-tag a node (not its children). */
export function retag<T extends DocNode>(node: T, plugin: string): T {
   return { ...node, plugin };
}

export function describeShape(node: DocNode): string {
   return node.kind === "scalar" ? `scalar(${node.value === null ? "null" : typeof node.value})` : node.kind;
}

/** Look a key up on a map node; `undefined` for anything else. */
export function child(node: DocNode | undefined, key: string): DocNode | undefined {
   return node?.kind === "map" ? node.entries.get(key) : undefined;
}
