/**
 * Dependency Graph Types
 *
 * Type definitions shared by the resolvers and renderers.
 */

/** Package name; the only identity a node has */
export type PackageId = string;

/**
 * Package -> ordered direct dependencies.
 * Dependencies missing as keys are leaves.
 */
export type DependencyGraph = ReadonlyMap<PackageId, readonly PackageId[]>;

/** Package -> the direct references observed for it during one traversal */
export type ClosureGraph = Map<PackageId, PackageId[]>;

/** Package -> packages that directly depend on it */
export type ReverseAdjacency = Map<PackageId, PackageId[]>;

export type GraphDirection = 'forward' | 'reverse';

/**
 * Read-only view over a dependency graph.
 * Resolvers read it only through these three members.
 */
export interface GraphSource {
  readonly name: string;
  /** Direct dependencies in stored order; empty for unknown packages */
  edgesOf(pkg: PackageId): readonly PackageId[];
  has(pkg: PackageId): boolean;
  /** Every package that has an entry, in stored order */
  packages(): Iterable<PackageId>;
}

/** Anything the graph operations accept as input */
export type GraphInput = GraphSource | DependencyGraph;
