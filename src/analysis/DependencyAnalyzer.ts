/**
 * DependencyAnalyzer
 *
 * Runs one analysis for an AnalysisRequest: resolve the closure in the
 * requested direction, collect the transitive set, then render the tree and
 * the graph description as enabled.
 */

import { join } from 'path';
import { CircularDependencyError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { DependencyResolver } from '../graph/DependencyResolver.js';
import { loadSampleGraphs, selectGraphSource } from '../graph/GraphSource.js';
import type { SampleGraphSources } from '../graph/GraphSource.js';
import { ReverseDependencyResolver } from '../graph/ReverseDependencyResolver.js';
import { buildReverseIndex } from '../graph/ReverseIndexBuilder.js';
import { allTransitiveDependencies } from '../graph/TransitiveSetCollector.js';
import type { ClosureGraph, GraphDirection, PackageId } from '../graph/types.js';
import { GraphDescriptionExporter, exportFileName } from '../render/GraphDescriptionExporter.js';
import { renderTree } from '../render/TreeRenderer.js';
import type { AnalysisRequest } from '../config/types.js';

export interface CycleCheckResult {
  root: PackageId;
  detected: boolean;
  message: string;
  /** Ancestor chain up to the repeated package; empty when no cycle */
  path: PackageId[];
}

export interface AnalysisReport {
  request: AnalysisRequest;
  sourceName: string;
  direction: GraphDirection;
  closure: ClosureGraph;
  /** Transitive dependencies, or transitive dependents in reverse mode */
  transitive: PackageId[];
  /** One-hop dependents; reverse mode only */
  directReverse?: PackageId[];
  tree?: string;
  graphDescription?: string;
  exportPath?: string;
  /** Present in test mode, where cycle detection is exercised on the cyclic sample */
  cycleCheck?: CycleCheckResult;
}

export interface DependencyAnalyzerOptions {
  sources?: SampleGraphSources;
  exporter?: GraphDescriptionExporter;
  logger?: Logger;
  /** Root used for the cycle-detection demonstration */
  cycleDemoRoot?: PackageId;
}

export class DependencyAnalyzer {
  private sources: SampleGraphSources;
  private exporter: GraphDescriptionExporter;
  private logger: Logger;
  private cycleDemoRoot: PackageId;
  private resolver = new DependencyResolver();
  private reverseResolver = new ReverseDependencyResolver();

  constructor(options: DependencyAnalyzerOptions = {}) {
    this.sources = options.sources ?? loadSampleGraphs();
    this.exporter = options.exporter ?? new GraphDescriptionExporter();
    this.logger = options.logger ?? createLogger('Analyzer');
    this.cycleDemoRoot = options.cycleDemoRoot ?? 'X';
  }

  /**
   * Analyze the requested package. A cycle reachable from it propagates as
   * CircularDependencyError.
   */
  analyze(request: AnalysisRequest): AnalysisReport {
    const pkg = request.packageName;
    const source = selectGraphSource(this.sources, request.useTestMode);
    const direction: GraphDirection = request.reverseMode ? 'reverse' : 'forward';

    this.logger.info(`Analyzing ${pkg} (${direction}) from ${source.name}`);
    if (!source.has(pkg)) {
      this.logger.warn(`Package ${pkg} not found in ${source.name}; treating it as a leaf`);
    }

    let closure: ClosureGraph;
    let transitive: Set<PackageId>;
    let directReverse: PackageId[] | undefined;

    if (request.reverseMode) {
      const reverseIndex = buildReverseIndex(source);
      closure = this.reverseResolver.resolveReverse(reverseIndex, pkg);
      transitive = allTransitiveDependencies(reverseIndex, pkg);
      directReverse = [...this.reverseResolver.directReverseDependencies(reverseIndex, pkg)];
    } else {
      closure = this.resolver.resolve(source, pkg);
      transitive = allTransitiveDependencies(source, pkg);
    }

    this.logger.info(`Closure has ${closure.size} package(s), ${transitive.size} transitive`);

    const report: AnalysisReport = {
      request,
      sourceName: source.name,
      direction,
      closure,
      transitive: [...transitive],
      directReverse
    };

    if (request.asciiTreeEnabled) {
      report.tree = renderTree(closure, pkg);
    }

    if (request.graphExportEnabled) {
      report.graphDescription = this.exporter.exportGraph(closure, pkg, direction);
      report.exportPath = join(request.outputDir, exportFileName(pkg, direction));
      this.exporter.save(report.graphDescription, report.exportPath);
      this.logger.info(`Graph description written to ${report.exportPath}`);
    }

    if (request.useTestMode) {
      report.cycleCheck = this.demonstrateCycleDetection();
    }

    return report;
  }

  /**
   * Resolve the cyclic sample and report the cycle instead of failing
   */
  demonstrateCycleDetection(root: PackageId = this.cycleDemoRoot): CycleCheckResult {
    try {
      this.resolver.resolve(this.sources.cyclic, root);
      return { root, detected: false, message: `No cycle reachable from ${root}`, path: [] };
    } catch (error) {
      if (error instanceof CircularDependencyError) {
        this.logger.warn(`Cycle detection check: ${error.message}`);
        return { root, detected: true, message: error.message, path: [...error.path] };
      }
      throw error;
    }
  }
}

export default DependencyAnalyzer;
