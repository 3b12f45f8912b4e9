/**
 * Path lookup over hash trees
 *
 * Forks carry no labels of their own: at each level the forks are flattened
 * left to right into a list of children, and the next path label is searched
 * for among the labeled children. Labels at one level must be strictly
 * ascending, which is what lets a lookup prove absence: a label that falls
 * between two adjacent labeled children is absent, unless a pruned child sits
 * in that gap, in which case the tree cannot tell.
 */

import { MalformedTreeError } from "./errors.js";
import { assertDepth, DIGEST_LENGTH, empty, unreachableNode } from "./hashtree.js";
import type { EmptyNode, HashTree, LabeledNode, LeafNode, PrunedNode } from "./hashtree.js";
import { compareLabels, formatLabel } from "./label.js";
import type { Label, Path } from "./label.js";

export type LookupStatus = "found" | "absent" | "unknown" | "error";

/**
 * Outcome of looking up a leaf value.
 *
 * - found: the tree proves the value at the path
 * - absent: the tree proves nothing is at the path
 * - unknown: a pruned subtree hides the answer; neither presence nor absence
 *   is proven
 * - error: the tree is malformed and must not be trusted
 */
export type LookupResult =
  | { readonly status: "found"; readonly value: Uint8Array }
  | { readonly status: "absent" }
  | { readonly status: "unknown" }
  | { readonly status: "error"; readonly reason: string };

/**
 * Outcome of looking up a subtree. An absent path carries an empty tree.
 */
export type SubtreeLookupResult =
  | { readonly status: "found"; readonly tree: HashTree }
  | { readonly status: "absent"; readonly tree: EmptyNode }
  | { readonly status: "unknown" }
  | { readonly status: "error"; readonly reason: string };

/** A leaf reachable through labeled nodes, as returned by listPaths */
export interface LeafEntry {
  path: Label[];
  value: Uint8Array;
}

export type FlatChild = {
  node: LabeledNode | LeafNode | PrunedNode;
  depth: number;
};

type LabelSearch =
  | { status: "found"; subtree: HashTree; depth: number }
  | { status: "absent" }
  | { status: "unknown" };

/**
 * Flattens the forks of one level into its children, left to right. Empty
 * nodes under a fork contribute nothing.
 */
export function flattenForks(tree: HashTree, depth = 0): FlatChild[] {
  const out: FlatChild[] = [];
  const stack: Array<{ node: HashTree; depth: number }> = [{ node: tree, depth }];

  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;
    assertDepth(item.depth);

    const node = item.node;
    switch (node.kind) {
      case "fork":
        // right first so the left child is visited first
        stack.push({ node: node.right, depth: item.depth + 1 });
        stack.push({ node: node.left, depth: item.depth + 1 });
        break;
      case "empty":
        break;
      case "labeled":
      case "leaf":
      case "pruned":
        out.push({ node, depth: item.depth });
        break;
      default:
        unreachableNode(node);
    }
  }

  return out;
}

/**
 * Checks the children of one level: labels strictly ascending, a leaf only as
 * the sole child, and pruned digests of the right length.
 *
 * @throws MalformedTreeError
 */
export function checkLevel(children: readonly FlatChild[]): void {
  let previous: Label | undefined;

  for (const { node } of children) {
    switch (node.kind) {
      case "labeled":
        if (previous !== undefined && compareLabels(previous, node.label) >= 0) {
          throw new MalformedTreeError(
            `label ${formatLabel(node.label)} does not follow ${formatLabel(previous)}`,
          );
        }
        previous = node.label;
        break;
      case "leaf":
        if (children.length > 1) {
          throw new MalformedTreeError("leaf shares a level with other children");
        }
        break;
      case "pruned":
        if (node.digest.length !== DIGEST_LENGTH) {
          throw new MalformedTreeError(
            `pruned digest must be ${DIGEST_LENGTH} bytes, got ${node.digest.length}`,
          );
        }
        break;
      default:
        unreachableNode(node);
    }
  }
}

function findLabel(target: Label, tree: HashTree, depth: number): LabelSearch {
  const children = flattenForks(tree, depth);
  checkLevel(children);

  let prunedInGap = false;

  for (const child of children) {
    const node = child.node;
    switch (node.kind) {
      case "labeled": {
        const c = compareLabels(node.label, target);
        if (c === 0) {
          return { status: "found", subtree: node.subtree, depth: child.depth + 1 };
        }
        if (c > 0) {
          return prunedInGap ? { status: "unknown" } : { status: "absent" };
        }
        prunedInGap = false;
        break;
      }
      case "pruned":
        prunedInGap = true;
        break;
      case "leaf":
        // a leaf is the only child of its level; there is nothing to descend into
        return { status: "absent" };
      default:
        unreachableNode(node);
    }
  }

  return prunedInGap ? { status: "unknown" } : { status: "absent" };
}

function descend(tree: HashTree, p: Path): LabelSearch {
  let current = tree;
  let depth = 0;

  for (const l of p) {
    const result = findLabel(l, current, depth);
    if (result.status !== "found") {
      return result;
    }
    current = result.subtree;
    depth = result.depth;
  }

  return { status: "found", subtree: current, depth };
}

/**
 * Looks up the leaf value at a path.
 */
export function lookupPath(tree: HashTree, p: Path): LookupResult {
  try {
    const result = descend(tree, p);
    if (result.status !== "found") {
      return result;
    }

    const node = result.subtree;
    switch (node.kind) {
      case "leaf":
        return { status: "found", value: node.value };
      case "empty":
        return { status: "absent" };
      case "pruned":
        return { status: "unknown" };
      case "fork":
      case "labeled":
        return { status: "error", reason: `path ends at a ${node.kind} node, not a leaf` };
      default:
        return unreachableNode(node);
    }
  } catch (error) {
    if (error instanceof MalformedTreeError) {
      return { status: "error", reason: error.message };
    }
    throw error;
  }
}

/**
 * Looks up the subtree at a path, for nested lookups or for forwarding a
 * narrower proof. The empty path yields the whole tree.
 */
export function lookupSubtree(tree: HashTree, p: Path): SubtreeLookupResult {
  try {
    const result = descend(tree, p);
    switch (result.status) {
      case "found":
        return { status: "found", tree: result.subtree };
      case "absent":
        return { status: "absent", tree: empty() };
      case "unknown":
        return result;
    }
  } catch (error) {
    if (error instanceof MalformedTreeError) {
      return { status: "error", reason: error.message };
    }
    throw error;
  }
}

/**
 * Lists every leaf reachable through labeled nodes, in tree order. Pruned
 * subtrees contribute nothing.
 *
 * @throws MalformedTreeError if the tree nests too deep
 */
export function listPaths(tree: HashTree): LeafEntry[] {
  const out: LeafEntry[] = [];
  collect(tree, [], 0, out);
  return out;
}

function collect(tree: HashTree, prefix: Label[], depth: number, out: LeafEntry[]): void {
  assertDepth(depth);
  switch (tree.kind) {
    case "empty":
    case "pruned":
      return;
    case "fork":
      collect(tree.left, prefix, depth + 1, out);
      collect(tree.right, prefix, depth + 1, out);
      return;
    case "labeled":
      collect(tree.subtree, [...prefix, tree.label], depth + 1, out);
      return;
    case "leaf":
      out.push({ path: prefix, value: tree.value });
      return;
    default:
      unreachableNode(tree);
  }
}
