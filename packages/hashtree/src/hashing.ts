/**
 * Root hash computation
 *
 * Each node kind hashes under its own domain separator so a digest of one kind
 * can never be replayed as a digest of another:
 *
 *   empty    H(sep("ic-hashtree-empty"))
 *   fork     H(sep("ic-hashtree-fork")    | root(left) | root(right))
 *   labeled  H(sep("ic-hashtree-labeled") | label | root(subtree))
 *   leaf     H(sep("ic-hashtree-leaf")    | value)
 *   pruned   the stored digest, verbatim
 *
 * where sep(s) is the length of s as a single byte followed by s.
 */

import { sha256 } from "@noble/hashes/sha256";
import { assertDepth, unreachableNode } from "./hashtree.js";
import type { HashTree } from "./hashtree.js";

/**
 * Hasher interface for cryptographic hashing operations
 */
interface Hasher {
  /** Reset the hasher state */
  reset(): void;
  /** Update the hasher with data */
  update(data: Uint8Array): void;
  /** Finalize and return the hash */
  digest(): Uint8Array;
}

/**
 * SHA-256 hasher backed by @noble/hashes. digest() finalizes the current state
 * and leaves the hasher reset.
 */
function createSha256Hasher(): Hasher {
  let state = sha256.create();
  return {
    reset() {
      state = sha256.create();
    },
    update(data: Uint8Array) {
      state.update(data);
    },
    digest() {
      const out = state.digest();
      state = sha256.create();
      return out;
    },
  };
}

const textEncoder = new TextEncoder();

/**
 * Returns sep(s): one length byte followed by the ASCII bytes of s.
 */
export function domainSeparator(name: string): Uint8Array {
  const bytes = textEncoder.encode(name);
  if (bytes.length > 0xff) {
    throw new RangeError(`domain separator too long: ${name}`);
  }
  const out = new Uint8Array(bytes.length + 1);
  out[0] = bytes.length;
  out.set(bytes, 1);
  return out;
}

const EMPTY_SEP = domainSeparator("ic-hashtree-empty");
const FORK_SEP = domainSeparator("ic-hashtree-fork");
const LABELED_SEP = domainSeparator("ic-hashtree-labeled");
const LEAF_SEP = domainSeparator("ic-hashtree-leaf");

/**
 * Computes the root hash of a tree.
 *
 * @throws MalformedTreeError if the tree nests deeper than MAX_TREE_DEPTH
 */
export function rootHash(tree: HashTree): Uint8Array {
  // copied so a pruned root does not hand out the node's own buffer
  return Uint8Array.from(nodeHash(tree, createSha256Hasher(), 0));
}

function nodeHash(tree: HashTree, hasher: Hasher, depth: number): Uint8Array {
  assertDepth(depth);

  switch (tree.kind) {
    case "empty":
      hasher.reset();
      hasher.update(EMPTY_SEP);
      return hasher.digest();
    case "fork": {
      const left = nodeHash(tree.left, hasher, depth + 1);
      const right = nodeHash(tree.right, hasher, depth + 1);
      hasher.reset();
      hasher.update(FORK_SEP);
      hasher.update(left);
      hasher.update(right);
      return hasher.digest();
    }
    case "labeled": {
      const sub = nodeHash(tree.subtree, hasher, depth + 1);
      hasher.reset();
      hasher.update(LABELED_SEP);
      hasher.update(tree.label);
      hasher.update(sub);
      return hasher.digest();
    }
    case "leaf":
      hasher.reset();
      hasher.update(LEAF_SEP);
      hasher.update(tree.value);
      return hasher.digest();
    case "pruned":
      return tree.digest;
    default:
      return unreachableNode(tree);
  }
}
