/**
 * HashTree node types and constructors
 *
 * A hash tree is a closed union of five node kinds. Nodes are frozen on
 * construction and own their children and bytes outright, so a tree can be
 * shared freely once built.
 */

import { MalformedTreeError } from "./errors.js";
import { compareLabels, label as toLabel, labelsEqual, formatLabel } from "./label.js";
import type { Label } from "./label.js";

/** Length of a SHA-256 digest, and therefore of every pruned node */
export const DIGEST_LENGTH = 32;

/**
 * Upper bound on node nesting accepted anywhere a tree is traversed.
 *
 * Certified state is shallow (well under 64 levels including forks); the cap
 * bounds recursion on adversarial input.
 */
export const MAX_TREE_DEPTH = 128;

export interface EmptyNode {
  readonly kind: "empty";
}

export interface ForkNode {
  readonly kind: "fork";
  readonly left: HashTree;
  readonly right: HashTree;
}

export interface LabeledNode {
  readonly kind: "labeled";
  readonly label: Label;
  readonly subtree: HashTree;
}

export interface LeafNode {
  readonly kind: "leaf";
  readonly value: Uint8Array;
}

export interface PrunedNode {
  readonly kind: "pruned";
  readonly digest: Uint8Array;
}

export type HashTree = EmptyNode | ForkNode | LabeledNode | LeafNode | PrunedNode;

export type HashTreeKind = HashTree["kind"];

const EMPTY: EmptyNode = Object.freeze({ kind: "empty" });

const textEncoder = new TextEncoder();

export function empty(): EmptyNode {
  return EMPTY;
}

export function fork(left: HashTree, right: HashTree): ForkNode {
  return Object.freeze({ kind: "fork", left, right });
}

export function labeled(l: string | Label, subtree: HashTree): LabeledNode {
  return Object.freeze({ kind: "labeled", label: toLabel(l), subtree });
}

export function leaf(value: string | Uint8Array): LeafNode {
  const bytes =
    typeof value === "string" ? textEncoder.encode(value) : Uint8Array.from(value);
  return Object.freeze({ kind: "leaf", value: bytes });
}

export function pruned(digest: Uint8Array): PrunedNode {
  if (digest.length !== DIGEST_LENGTH) {
    throw new MalformedTreeError(
      `pruned digest must be ${DIGEST_LENGTH} bytes, got ${digest.length}`,
    );
  }
  return Object.freeze({ kind: "pruned", digest: Uint8Array.from(digest) });
}

/**
 * Builds a balanced fork tree of labeled subtrees in ascending label order.
 *
 * @throws MalformedTreeError if two entries carry the same label
 */
export function labeledForest(
  entries: Iterable<readonly [string | Label, HashTree]>,
): HashTree {
  const nodes = Array.from(entries, ([l, t]) => labeled(l, t));
  nodes.sort((a, b) => compareLabels(a.label, b.label));

  for (let i = 1; i < nodes.length; i++) {
    if (labelsEqual(nodes[i - 1].label, nodes[i].label)) {
      throw new MalformedTreeError(
        `duplicate label ${formatLabel(nodes[i].label)}`,
      );
    }
  }

  return balance(nodes, 0, nodes.length);
}

function balance(nodes: LabeledNode[], lo: number, hi: number): HashTree {
  const count = hi - lo;
  if (count === 0) return empty();
  if (count === 1) return nodes[lo];
  const mid = lo + Math.ceil(count / 2);
  return fork(balance(nodes, lo, mid), balance(nodes, mid, hi));
}

export function assertDepth(depth: number): void {
  if (depth > MAX_TREE_DEPTH) {
    throw new MalformedTreeError(`tree deeper than ${MAX_TREE_DEPTH} levels`);
  }
}

/**
 * Exhaustiveness guard for switches over HashTree["kind"].
 */
export function unreachableNode(node: never): never {
  throw new MalformedTreeError(`unrecognized node ${JSON.stringify(node)}`);
}
