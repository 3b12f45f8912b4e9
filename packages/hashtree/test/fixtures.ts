import { empty, fork, labeled, leaf } from "../src/index.js";
import type { HashTree } from "../src/index.js";

/**
 * The five-label example tree:
 *
 *   a/x = "hello", a/y = "world", b = "good", c = (empty), d = "morning"
 */
export function exampleTree(): HashTree {
  return fork(
    fork(
      labeled(
        "a",
        fork(fork(labeled("x", leaf("hello")), empty()), labeled("y", leaf("world"))),
      ),
      labeled("b", leaf("good")),
    ),
    fork(labeled("c", empty()), labeled("d", leaf("morning"))),
  );
}

/** Root hash of exampleTree(), hex encoded */
export const EXAMPLE_ROOT_HASH =
  "eb5c5b2195e62d996b84c9bcc8259d19a83786a2f59e0878cec84c811f669aa0";

/** exampleTree() in its CBOR wire form, hex encoded */
export const EXAMPLE_TREE_CBOR =
  "8301830183024161830183018302417882034568656c6c6f810083024179820345776f726c6483024162820344676f6f648301830241638100830241648203476d6f726e696e67";

export function chain(depth: number): HashTree {
  let tree: HashTree = leaf("v");
  for (let i = 0; i < depth; i++) {
    tree = labeled("x", tree);
  }
  return tree;
}
