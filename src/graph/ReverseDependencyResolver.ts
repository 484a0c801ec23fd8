/**
 * ReverseDependencyResolver
 *
 * Closure and one-hop lookups over a reverse index. Uses the same walk and
 * cycle rules as the forward resolver.
 */

import { walkClosure } from './DependencyResolver.js';
import { StaticGraphSource } from './GraphSource.js';
import type { ClosureGraph, PackageId, ReverseAdjacency } from './types.js';

export class ReverseDependencyResolver {
  /**
   * Closure of every package that depends on `root`, directly or not.
   * Throws CircularDependencyError when a cycle is reachable.
   */
  resolveReverse(reverseIndex: ReverseAdjacency, root: PackageId): ClosureGraph {
    const source = new StaticGraphSource('reverse-index', reverseIndex);
    return walkClosure(source, root, [], new Set());
  }

  /**
   * Packages that depend on `root` directly, without duplicates and never
   * including `root` itself.
   */
  directReverseDependencies(reverseIndex: ReverseAdjacency, root: PackageId): Set<PackageId> {
    const result = new Set<PackageId>();
    const queue: Array<{ pkg: PackageId; depth: number }> = [{ pkg: root, depth: 0 }];
    const visited = new Set<PackageId>([root]);

    while (queue.length > 0) {
      const current = queue.shift();
      if (!current || current.depth >= 1) {
        continue;
      }

      for (const dependent of reverseIndex.get(current.pkg) ?? []) {
        if (visited.has(dependent)) {
          continue;
        }
        visited.add(dependent);
        result.add(dependent);
        queue.push({ pkg: dependent, depth: current.depth + 1 });
      }
    }

    return result;
  }
}

export default ReverseDependencyResolver;
