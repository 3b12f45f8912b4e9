/**
 * Structural validation of whole trees.
 *
 * Lookups only inspect the levels on their path; certificates are checked
 * once, up front, so a malformed tree is rejected before anything reads it.
 */

import type { HashTree } from "./hashtree.js";
import { checkLevel, flattenForks } from "./lookup.js";

/**
 * @throws MalformedTreeError if any level has labels out of strictly ascending
 *   order, a leaf next to other children, a pruned digest of the wrong length,
 *   or the tree nests too deep
 */
export function validateHashTree(tree: HashTree): void {
  validateLevel(tree, 0);
}

function validateLevel(tree: HashTree, depth: number): void {
  const children = flattenForks(tree, depth);
  checkLevel(children);

  for (const { node, depth: childDepth } of children) {
    if (node.kind === "labeled") {
      validateLevel(node.subtree, childDepth + 1);
    }
  }
}
