/**
 * @statecert/hashtree - labeled Merkle hash trees for certified state
 *
 * Construction, domain-separated root hashing, path lookup with proofs of
 * absence, pruning, and the CBOR wire form.
 *
 * @packageDocumentation
 */

export {
  CertificationError,
  MalformedTreeError,
  LookupInconclusiveError,
} from "./errors.js";
export type { CertificationErrorCode } from "./errors.js";

export {
  label,
  path,
  compareLabels,
  labelsEqual,
  formatLabel,
  formatPath,
} from "./label.js";
export type { Label, Path } from "./label.js";

export {
  DIGEST_LENGTH,
  MAX_TREE_DEPTH,
  empty,
  fork,
  labeled,
  leaf,
  pruned,
  labeledForest,
} from "./hashtree.js";
export type {
  HashTree,
  HashTreeKind,
  EmptyNode,
  ForkNode,
  LabeledNode,
  LeafNode,
  PrunedNode,
} from "./hashtree.js";

export { rootHash, domainSeparator } from "./hashing.js";

export { lookupPath, lookupSubtree, listPaths } from "./lookup.js";
export type {
  LookupResult,
  LookupStatus,
  SubtreeLookupResult,
  LeafEntry,
} from "./lookup.js";

export { prune, forget, reveal } from "./prune.js";
export { validateHashTree } from "./validate.js";
export {
  HASH_TREE_TAGS,
  hashTreeFromCbor,
  hashTreeToCbor,
  encodeHashTree,
  decodeHashTree,
  wireEncoder,
} from "./cbor.js";
export type { HashTreeCbor } from "./cbor.js";
export { formatHashTree } from "./format.js";

export { arraysEqual, compareBytes, concatBytes } from "./utils/arrays.js";
