import {
  formatPath,
  listPaths,
  LookupInconclusiveError,
  lookupPath,
  lookupSubtree,
  MalformedTreeError,
} from "@statecert/hashtree";
import type {
  HashTree,
  LeafEntry,
  LookupResult,
  Path,
  SubtreeLookupResult,
} from "@statecert/hashtree";
import { certificateTime } from "./time.js";

/**
 * A hash tree whose root a trusted key has signed.
 *
 * Only verifyCertificate creates these. Found and absent lookups on a verified
 * tree are proofs; unknown lookups prove nothing.
 */
export class VerifiedTree {
  private readonly root: Uint8Array;

  constructor(
    readonly tree: HashTree,
    rootHash: Uint8Array,
  ) {
    this.root = Uint8Array.from(rootHash);
  }

  /** The signed 32-byte root hash */
  rootHash(): Uint8Array {
    return Uint8Array.from(this.root);
  }

  lookupPath(p: Path): LookupResult {
    return lookupPath(this.tree, p);
  }

  lookupSubtree(p: Path): SubtreeLookupResult {
    return lookupSubtree(this.tree, p);
  }

  listPaths(): LeafEntry[] {
    return listPaths(this.tree);
  }

  /**
   * Returns the value proven at a path, or undefined when the path is proven
   * absent.
   *
   * @throws LookupInconclusiveError when the path runs into a pruned subtree
   * @throws MalformedTreeError when the tree cannot answer the lookup
   */
  lookupValue(p: Path): Uint8Array | undefined {
    const result = this.lookupPath(p);
    switch (result.status) {
      case "found":
        return result.value;
      case "absent":
        return undefined;
      case "unknown":
        throw new LookupInconclusiveError(formatPath(p));
      case "error":
        throw new MalformedTreeError(`${formatPath(p)}: ${result.reason}`);
    }
  }

  /** Certified time, in nanoseconds since the epoch */
  time(): bigint {
    return certificateTime(this.tree);
  }
}
