import { DocNode, ListNode, child, retag } from "./document";
import type { MergeContext } from "./merge-engine";

export function columnName(node: DocNode): string | undefined {
   const name = child(node, "name");
   return name?.kind === "scalar" && typeof name.value === "string" ? name.value : undefined;
}

/**
 * List handler for column lists: an incoming column whose `name` matches an
 * existing one is deep-merged into it (and now belongs to the later plugin);
 * everything else is appended, so genuine duplicates still surface later.
 */
export function mergeColumnsByName(existing: ListNode, incoming: ListNode, ctx: MergeContext): ListNode {
   const items = [...existing.items];

   for (const item of incoming.items) {
      const name = columnName(item);
      const at = name === undefined ? -1 : items.findIndex(e => columnName(e) === name);

      if (at < 0) {
         if (name !== undefined) ctx.record(`${ctx.path}.${name}`, item);
         items.push(item);
         continue;
      }

      const itemPath = `${ctx.path}.${name}`;
      ctx.record(itemPath);
      items[at] = retag(ctx.merge(items[at], item, itemPath), ctx.plugin);
   }

   return { kind: "list", plugin: existing.plugin, items };
}
