/**
 * CBOR wire form of hash trees.
 *
 * Each node is a positional array whose first element is the node tag:
 *
 *   [0]                   empty
 *   [1, left, right]      fork
 *   [2, label, subtree]   labeled
 *   [3, value]            leaf
 *   [4, digest]           pruned
 */

import { decode, Encoder } from "cbor-x";
import { MalformedTreeError } from "./errors.js";
import {
  assertDepth,
  DIGEST_LENGTH,
  empty,
  fork,
  labeled,
  leaf,
  pruned,
  unreachableNode,
} from "./hashtree.js";
import type { HashTree } from "./hashtree.js";

export const HASH_TREE_TAGS = {
  EMPTY: 0,
  FORK: 1,
  LABELED: 2,
  LEAF: 3,
  PRUNED: 4,
} as const;

/**
 * Encoder for the wire form: byte strings as plain major type 2 (cbor-x tags
 * Uint8Array with 64 by default) and objects as plain maps, never records.
 */
export const wireEncoder = new Encoder({
  tagUint8Array: false,
  useRecords: false,
});

export type HashTreeCbor =
  | readonly [0]
  | readonly [1, HashTreeCbor, HashTreeCbor]
  | readonly [2, Uint8Array, HashTreeCbor]
  | readonly [3, Uint8Array]
  | readonly [4, Uint8Array];

function expectLength(node: unknown[], length: number, kind: string): void {
  if (node.length !== length) {
    throw new MalformedTreeError(
      `${kind} node must have ${length} elements, got ${node.length}`,
    );
  }
}

function expectBytes(value: unknown, what: string): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw new MalformedTreeError(`${what} must be a byte string`);
  }
  return value;
}

/**
 * Maps a decoded CBOR value onto a HashTree.
 *
 * @throws MalformedTreeError for any value that is not one of the five node
 *   shapes, or that nests too deep
 */
export function hashTreeFromCbor(value: unknown, depth = 0): HashTree {
  assertDepth(depth);

  if (!Array.isArray(value) || value.length === 0) {
    throw new MalformedTreeError("node must be a non-empty array");
  }

  const tag: unknown = value[0];
  switch (tag) {
    case HASH_TREE_TAGS.EMPTY:
      expectLength(value, 1, "empty");
      return empty();
    case HASH_TREE_TAGS.FORK:
      expectLength(value, 3, "fork");
      return fork(
        hashTreeFromCbor(value[1], depth + 1),
        hashTreeFromCbor(value[2], depth + 1),
      );
    case HASH_TREE_TAGS.LABELED:
      expectLength(value, 3, "labeled");
      return labeled(
        expectBytes(value[1], "label"),
        hashTreeFromCbor(value[2], depth + 1),
      );
    case HASH_TREE_TAGS.LEAF:
      expectLength(value, 2, "leaf");
      return leaf(expectBytes(value[1], "leaf value"));
    case HASH_TREE_TAGS.PRUNED: {
      expectLength(value, 2, "pruned");
      const digest = expectBytes(value[1], "pruned digest");
      if (digest.length !== DIGEST_LENGTH) {
        throw new MalformedTreeError(
          `pruned digest must be ${DIGEST_LENGTH} bytes, got ${digest.length}`,
        );
      }
      return pruned(digest);
    }
    default:
      throw new MalformedTreeError(`unknown node tag ${String(tag)}`);
  }
}

export function hashTreeToCbor(tree: HashTree): HashTreeCbor {
  switch (tree.kind) {
    case "empty":
      return [HASH_TREE_TAGS.EMPTY];
    case "fork":
      return [HASH_TREE_TAGS.FORK, hashTreeToCbor(tree.left), hashTreeToCbor(tree.right)];
    case "labeled":
      return [HASH_TREE_TAGS.LABELED, tree.label, hashTreeToCbor(tree.subtree)];
    case "leaf":
      return [HASH_TREE_TAGS.LEAF, tree.value];
    case "pruned":
      return [HASH_TREE_TAGS.PRUNED, tree.digest];
    default:
      return unreachableNode(tree);
  }
}

export function encodeHashTree(tree: HashTree): Uint8Array {
  return wireEncoder.encode(hashTreeToCbor(tree));
}

/**
 * @throws MalformedTreeError if the bytes are not CBOR or not a hash tree
 */
export function decodeHashTree(bytes: Uint8Array): HashTree {
  let value: unknown;
  try {
    value = decode(bytes);
  } catch (error) {
    throw new MalformedTreeError(
      `invalid CBOR: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return hashTreeFromCbor(value);
}
