/**
 * ReverseIndexBuilder
 *
 * Inverts a forward graph into package -> dependents.
 */

import { toGraphSource } from './GraphSource.js';
import type { GraphInput, ReverseAdjacency } from './types.js';

/**
 * Build the reverse index of `graph`.
 *
 * Packages and their dependency lists are visited in stored order, so each
 * dependents list is in edge-discovery order. Recomputed on every call.
 */
export function buildReverseIndex(graph: GraphInput): ReverseAdjacency {
  const source = toGraphSource(graph);
  const reverse: ReverseAdjacency = new Map();

  for (const pkg of source.packages()) {
    for (const dep of source.edgesOf(pkg)) {
      const dependents = reverse.get(dep);
      if (dependents) {
        dependents.push(pkg);
      } else {
        reverse.set(dep, [pkg]);
      }
    }
  }

  return reverse;
}
