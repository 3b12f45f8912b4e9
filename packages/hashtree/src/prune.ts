/**
 * Pruning: replacing subtrees by their digests
 *
 * None of these operations change the root hash of the tree they are given.
 * They only change how much of the tree is disclosed.
 */

import { assertDepth, fork, labeled, pruned } from "./hashtree.js";
import type { HashTree } from "./hashtree.js";
import { rootHash } from "./hashing.js";
import { labelsEqual } from "./label.js";
import type { Path } from "./label.js";

/**
 * Replaces a whole tree by a pruned node carrying its root hash.
 */
export function prune(tree: HashTree): HashTree {
  if (tree.kind === "pruned") return tree;
  return pruned(rootHash(tree));
}

/**
 * Prunes the subtree addressed by a path. A path that does not resolve leaves
 * the tree unchanged; the empty path prunes the whole tree.
 */
export function forget(tree: HashTree, p: Path): HashTree {
  if (p.length === 0) return prune(tree);
  return forgetAt(tree, p, 0);
}

function forgetAt(tree: HashTree, p: Path, depth: number): HashTree {
  assertDepth(depth);

  switch (tree.kind) {
    case "fork": {
      const left = forgetAt(tree.left, p, depth + 1);
      const right = forgetAt(tree.right, p, depth + 1);
      if (left === tree.left && right === tree.right) return tree;
      return fork(left, right);
    }
    case "labeled": {
      if (!labelsEqual(tree.label, p[0])) return tree;
      const rest = p.slice(1);
      const subtree =
        rest.length === 0 ? prune(tree.subtree) : forgetAt(tree.subtree, rest, depth + 1);
      if (subtree === tree.subtree) return tree;
      return labeled(tree.label, subtree);
    }
    default:
      return tree;
  }
}

/**
 * Keeps only what is needed to reach the given paths and prunes everything
 * else. The subtree at the end of each path is kept whole. A fork whose
 * children are both pruned collapses into a single pruned node.
 *
 * Absence proofs need the neighbouring labels of a missing path, which this
 * does not keep: a path absent from the input is unknown in the output.
 */
export function reveal(tree: HashTree, paths: readonly Path[]): HashTree {
  if (paths.some((p) => p.length === 0)) return tree;
  if (paths.length === 0) return prune(tree);
  return revealAt(tree, paths, 0);
}

function revealAt(tree: HashTree, paths: readonly Path[], depth: number): HashTree {
  assertDepth(depth);

  switch (tree.kind) {
    case "empty":
    case "pruned":
      return tree;
    case "leaf":
      return prune(tree);
    case "fork": {
      const left = revealAt(tree.left, paths, depth + 1);
      const right = revealAt(tree.right, paths, depth + 1);
      if (left.kind === "pruned" && right.kind === "pruned") {
        return prune(tree);
      }
      return fork(left, right);
    }
    case "labeled": {
      const l = tree.label;
      const matching = paths.filter((p) => labelsEqual(p[0], l));
      if (matching.length === 0) return prune(tree);

      const rest = matching.map((p) => p.slice(1));
      if (rest.some((p) => p.length === 0)) return tree;
      return labeled(tree.label, revealAt(tree.subtree, rest, depth + 1));
    }
  }
}
