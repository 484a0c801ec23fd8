/**
 * depgraph
 *
 * Dependency closure, reverse-dependency and cycle analysis over a static
 * package graph, with ASCII tree and Graphviz renderers.
 */

export type {
  PackageId,
  DependencyGraph,
  ClosureGraph,
  ReverseAdjacency,
  GraphDirection,
  GraphSource,
  GraphInput
} from './graph/types.js';
export {
  StaticGraphSource,
  toGraphSource,
  loadSampleGraphs,
  selectGraphSource,
  DEFAULT_SAMPLE_GRAPHS_PATH
} from './graph/GraphSource.js';
export type { SampleGraphSources } from './graph/GraphSource.js';
export { DependencyResolver, walkClosure } from './graph/DependencyResolver.js';
export { buildReverseIndex } from './graph/ReverseIndexBuilder.js';
export { ReverseDependencyResolver } from './graph/ReverseDependencyResolver.js';
export { allTransitiveDependencies } from './graph/TransitiveSetCollector.js';

export { renderTree } from './render/TreeRenderer.js';
export { GraphDescriptionExporter, exportFileName, DEFAULT_EXPORT_STYLE } from './render/GraphDescriptionExporter.js';
export type { ExportStyle } from './render/GraphDescriptionExporter.js';

export { DependencyAnalyzer } from './analysis/DependencyAnalyzer.js';
export type { AnalysisReport, CycleCheckResult, DependencyAnalyzerOptions } from './analysis/DependencyAnalyzer.js';

export { ConfigLoader, parseConfig, resolveConfigPath, SAMPLE_CONFIG } from './config/ConfigLoader.js';
export { AnalysisConfigSchema, DEFAULT_CONFIG_PATH, CONFIG_PATH_ENV } from './config/types.js';
export type { AnalysisConfig, AnalysisRequest } from './config/types.js';

export {
  CircularDependencyError,
  GraphExportError,
  ConfigError,
  ConfigFileNotFoundError,
  MissingConfigFieldError,
  InvalidConfigError
} from './core/errors.js';
export { createLogger, silentLogger } from './core/logger.js';
export type { Logger } from './core/logger.js';
