/**
 * TreeRenderer
 *
 * Renders a closure graph as an indented ASCII tree.
 */

import type { ClosureGraph, PackageId } from '../graph/types.js';

const BRANCH = '├── ';
const CORNER = '└── ';
const PIPE = '│   ';
const BLANK = '    ';

/**
 * Render `closure` from `root`.
 *
 * The closure is expected to be acyclic already; no recursion guard here.
 */
export function renderTree(closure: ClosureGraph, root: PackageId): string {
  if (!closure.has(root)) {
    return root;
  }

  const lines: string[] = [root];

  const renderChildren = (node: PackageId, indent: string): void => {
    const children = closure.get(node) ?? [];
    children.forEach((child, i) => {
      const isLast = i === children.length - 1;
      lines.push(`${indent}${isLast ? CORNER : BRANCH}${child}`);
      renderChildren(child, indent + (isLast ? BLANK : PIPE));
    });
  };

  renderChildren(root, '');
  return lines.join('\n');
}
