/**
 * GraphDescriptionExporter
 *
 * Graphviz DOT output for forward and reverse closures.
 */

import { writeFileSync } from 'fs';
import { GraphExportError } from '../core/errors.js';
import type { ClosureGraph, GraphDirection, PackageId } from '../graph/types.js';

export interface ExportStyle {
  nodeFill: string;
  rootFill: string;
}

export const DEFAULT_EXPORT_STYLE: ExportStyle = {
  nodeFill: '#e8eef7',
  rootFill: '#9fd4a3'
};

function quote(id: string): string {
  return `"${id.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * File name for an exported graph: `<package>_<direction>.dot`.
 * Path separators in the package name become `_`, so `@scope/pkg` stays
 * a single file.
 */
export function exportFileName(pkg: PackageId, direction: GraphDirection): string {
  return `${pkg.replace(/[\\/]/g, '_')}_${direction}.dot`;
}

export class GraphDescriptionExporter {
  private style: ExportStyle;

  constructor(style: Partial<ExportStyle> = {}) {
    this.style = { ...DEFAULT_EXPORT_STYLE, ...style };
  }

  /**
   * Describe `closure` as a directed graph.
   *
   * Forward closures draw package -> dependency. Reverse closures map a
   * package to its dependents and draw dependent -> package, so arrows
   * always point at what is required. Edges are not deduplicated.
   */
  exportGraph(closure: ClosureGraph, root: PackageId, direction: GraphDirection): string {
    const lines: string[] = [
      `digraph ${quote(`${root}_${direction}`)} {`,
      `  rankdir=${direction === 'forward' ? 'TB' : 'BT'};`,
      `  node [shape=box, style="rounded,filled", fillcolor="${this.style.nodeFill}"];`,
      `  ${quote(root)} [fillcolor="${this.style.rootFill}", penwidth=2];`
    ];

    for (const [pkg, refs] of closure) {
      for (const ref of refs) {
        const [from, to] = direction === 'forward' ? [pkg, ref] : [ref, pkg];
        lines.push(`  ${quote(from)} -> ${quote(to)};`);
      }
    }

    lines.push('}');
    return lines.join('\n') + '\n';
  }

  /**
   * Write `text` to `path`, replacing any existing content
   */
  save(text: string, path: string): void {
    try {
      writeFileSync(path, text, 'utf-8');
    } catch (error) {
      throw new GraphExportError(path, error);
    }
  }
}

export default GraphDescriptionExporter;
