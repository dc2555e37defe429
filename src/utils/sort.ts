import { CircularDependencyError, UnknownDependencyError } from "../errors";

/**
 * Topologically sort a dependency graph so every node comes after the nodes
 * it depends on.
 *
 * - `graph` maps node → the nodes it depends on; its iteration order is the
 *   discovery order and breaks ties.
 * - Throws UnknownDependencyError when a dependency is not in the graph.
 * - Throws CircularDependencyError naming only the nodes that sit on a cycle.
 */
export function sortDependencies(graph: ReadonlyMap<string, ReadonlySet<string>>): string[] {
   // 1) every dependency must exist
   const missing: Record<string, string[]> = {};
   for (const [node, deps] of graph) {
      const unknown = [...deps].filter(d => !graph.has(d));
      if (unknown.length) missing[node] = unknown;
   }
   if (Object.keys(missing).length) throw new UnknownDependencyError(missing);

   // 2) adjacency (dependency → dependents) & in-degree, in discovery order
   const adj = new Map<string, string[]>();
   const inDegree = new Map<string, number>();
   for (const node of graph.keys()) {
      adj.set(node, []);
      inDegree.set(node, 0);
   }
   for (const [node, deps] of graph) {
      for (const dep of deps) {
         adj.get(dep)?.push(node);
         inDegree.set(node, (inDegree.get(node) ?? 0) + 1);
      }
   }

   // 3) Kahn’s algorithm, FIFO so ties keep discovery order
   const queue = [...inDegree.entries()].filter(([, d]) => d === 0).map(([n]) => n);
   const sorted: string[] = [];

   for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
      sorted.push(node);
      for (const dependent of adj.get(node) ?? []) {
         const nd = (inDegree.get(dependent) ?? 0) - 1;
         inDegree.set(dependent, nd);
         if (nd === 0) queue.push(dependent);
      }
   }

   // 4) leftovers: report the cyclic subset only
   if (sorted.length !== graph.size) {
      const done = new Set(sorted);
      const remaining = [...graph.keys()].filter(n => !done.has(n));
      throw new CircularDependencyError(cyclicNodes(graph, remaining));
   }

   return sorted;
}

/** Sort anything carrying a name and a dependency set. */
export function sortPlugins<T extends { name: string; dependsOn: ReadonlySet<string> }>(plugins: readonly T[]): T[] {
   const byName = new Map(plugins.map(p => [p.name, p]));
   const graph = new Map(plugins.map(p => [p.name, p.dependsOn]));
   return sortDependencies(graph).flatMap(name => {
      const plugin = byName.get(name);
      return plugin ? [plugin] : [];
   });
}

/**
 * Nodes of `subset` that belong to a strongly connected component of size > 1
 * or depend on themselves (Tarjan), in discovery order.
 */
function cyclicNodes(graph: ReadonlyMap<string, ReadonlySet<string>>, subset: string[]): string[] {
   const inSubset = new Set(subset);
   const index = new Map<string, number>();
   const low = new Map<string, number>();
   const onStack = new Set<string>();
   const stack: string[] = [];
   const cyclic = new Set<string>();
   let counter = 0;

   const visit = (node: string) => {
      index.set(node, counter);
      low.set(node, counter);
      counter++;
      stack.push(node);
      onStack.add(node);

      for (const dep of graph.get(node) ?? []) {
         if (!inSubset.has(dep)) continue;
         if (!index.has(dep)) {
            visit(dep);
            low.set(node, Math.min(low.get(node) ?? 0, low.get(dep) ?? 0));
         } else if (onStack.has(dep)) {
            low.set(node, Math.min(low.get(node) ?? 0, index.get(dep) ?? 0));
         }
      }

      if (low.get(node) !== index.get(node)) return;

      const component: string[] = [];
      for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
         onStack.delete(top);
         component.push(top);
         if (top === node) break;
      }
      const selfLoop = graph.get(node)?.has(node) ?? false;
      if (component.length > 1 || selfLoop) component.forEach(n => cyclic.add(n));
   };

   for (const node of subset) {
      if (!index.has(node)) visit(node);
   }

   return subset.filter(n => cyclic.has(n));
}
