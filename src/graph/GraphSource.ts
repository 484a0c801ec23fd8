/**
 * Graph Sources
 *
 * Static, in-memory graph sources and the sample data the analyzer runs on.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { DependencyGraph, GraphInput, GraphSource, PackageId } from './types.js';

const EMPTY: readonly PackageId[] = Object.freeze([]);

const GraphRecordSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

const SampleGraphsSchema = z.object({
  sample: GraphRecordSchema,
  cyclic: GraphRecordSchema
});

export const DEFAULT_SAMPLE_GRAPHS_PATH = new URL('../../data/sample-graphs.json', import.meta.url);

/**
 * StaticGraphSource - immutable graph held in memory
 */
export class StaticGraphSource implements GraphSource {
  readonly name: string;
  private readonly graph: DependencyGraph;

  constructor(name: string, graph: DependencyGraph) {
    this.name = name;
    // Entries are copied and frozen
    const copy = new Map<PackageId, readonly PackageId[]>();
    for (const [pkg, deps] of graph) {
      copy.set(pkg, Object.freeze([...deps]));
    }
    this.graph = copy;
  }

  static fromRecord(name: string, record: Readonly<Record<PackageId, readonly PackageId[]>>): StaticGraphSource {
    return new StaticGraphSource(name, new Map(Object.entries(record)));
  }

  edgesOf(pkg: PackageId): readonly PackageId[] {
    return this.graph.get(pkg) ?? EMPTY;
  }

  has(pkg: PackageId): boolean {
    return this.graph.has(pkg);
  }

  packages(): Iterable<PackageId> {
    return this.graph.keys();
  }

  get size(): number {
    return this.graph.size;
  }
}

/**
 * Wrap a bare map so every operation can work against GraphSource
 */
export function toGraphSource(input: GraphInput, name = 'inline'): GraphSource {
  if ('edgesOf' in input) {
    return input;
  }
  return new StaticGraphSource(name, input);
}

export interface SampleGraphSources {
  /** Acyclic graph used for every analysis */
  sample: StaticGraphSource;
  /** Graph containing X -> Y -> Z -> X, used to exercise cycle detection */
  cyclic: StaticGraphSource;
}

/**
 * Load the sample graphs shipped with the package
 */
export function loadSampleGraphs(path: string | URL = DEFAULT_SAMPLE_GRAPHS_PATH): SampleGraphSources {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const parsed = SampleGraphsSchema.parse(raw);

  return {
    sample: StaticGraphSource.fromRecord('sample', parsed.sample),
    cyclic: StaticGraphSource.fromRecord('cyclic', parsed.cyclic)
  };
}

/**
 * Pick the source for an analysis.
 *
 * Repository mode and test-repository mode both read the static sample;
 * only the label differs.
 */
export function selectGraphSource(sources: SampleGraphSources, useTestMode: boolean): GraphSource {
  const label = useTestMode ? 'test repository (static sample)' : 'repository (static sample)';
  return new StaticGraphSource(label, new Map(
    Array.from(sources.sample.packages(), (pkg): [PackageId, readonly PackageId[]] => [pkg, sources.sample.edgesOf(pkg)])
  ));
}
