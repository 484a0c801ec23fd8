/**
 * TransitiveSetCollector
 *
 * Flat set of everything reachable from a package. Cycles are tolerated:
 * a visited node is never enqueued again.
 */

import { toGraphSource } from './GraphSource.js';
import type { GraphInput, PackageId } from './types.js';

export function allTransitiveDependencies(graph: GraphInput, root: PackageId): Set<PackageId> {
  const source = toGraphSource(graph);
  const reached = new Set<PackageId>();

  if (!source.has(root)) {
    return reached;
  }

  const visited = new Set<PackageId>([root]);
  const queue: PackageId[] = [root];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;

    for (const dep of source.edgesOf(current)) {
      if (!visited.has(dep)) {
        visited.add(dep);
        reached.add(dep);
        queue.push(dep);
      }
    }
  }

  return reached;
}
