/**
 * DependencyResolver
 *
 * Depth-first closure of a package over a graph source, with cycle
 * detection on the active ancestor path.
 */

import { CircularDependencyError } from '../core/errors.js';
import { toGraphSource } from './GraphSource.js';
import type { ClosureGraph, GraphInput, GraphSource, PackageId } from './types.js';

/**
 * Walk `source` from `node`.
 *
 * `path` is the ancestor chain above `node` and is never mutated; each child
 * call receives its own copy. `visited` is shared by the whole traversal.
 * A node reached again off-path yields `{node: []}`, and because sub-results
 * are merged by overwriting, that empty list replaces the one recorded on
 * the first visit.
 */
export function walkClosure(
  source: GraphSource,
  node: PackageId,
  path: readonly PackageId[],
  visited: Set<PackageId>
): ClosureGraph {
  if (path.includes(node)) {
    throw new CircularDependencyError(node, path);
  }

  if (visited.has(node)) {
    return new Map([[node, []]]);
  }
  visited.add(node);

  const deps = [...source.edgesOf(node)];
  const closure: ClosureGraph = new Map([[node, deps]]);
  const childPath = [...path, node];

  for (const dep of deps) {
    for (const [pkg, refs] of walkClosure(source, dep, childPath, visited)) {
      closure.set(pkg, refs);
    }
  }

  return closure;
}

/**
 * DependencyResolver - forward closure of a root package
 */
export class DependencyResolver {
  /**
   * Build the closure graph of everything reachable from `root`.
   * Throws CircularDependencyError when a cycle is reachable.
   */
  resolve(graph: GraphInput, root: PackageId): ClosureGraph {
    return walkClosure(toGraphSource(graph), root, [], new Set());
  }
}

export default DependencyResolver;
