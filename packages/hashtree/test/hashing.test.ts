import { describe, it, expect } from "vitest";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import {
  concatBytes,
  domainSeparator,
  empty,
  fork,
  labeled,
  leaf,
  MalformedTreeError,
  pruned,
  rootHash,
} from "../src/index.js";
import { chain, EXAMPLE_ROOT_HASH, exampleTree } from "./fixtures.js";

const text = (s: string) => new TextEncoder().encode(s);

describe("hashing", () => {
  describe("domainSeparator", () => {
    it("should prefix the name with its length", () => {
      const sep = domainSeparator("ic-hashtree-leaf");
      expect(sep[0]).toBe(16);
      expect(sep.slice(1)).toEqual(text("ic-hashtree-leaf"));
    });

    it("should reject names longer than 255 bytes", () => {
      expect(() => domainSeparator("x".repeat(256))).toThrow(RangeError);
    });
  });

  describe("rootHash", () => {
    it("should hash the empty tree under its separator", () => {
      const expected = sha256(domainSeparator("ic-hashtree-empty"));
      expect(rootHash(empty())).toEqual(expected);
    });

    it("should hash a leaf as separator followed by its value", () => {
      const expected = sha256(concatBytes(domainSeparator("ic-hashtree-leaf"), text("12345")));
      expect(rootHash(leaf("12345"))).toEqual(expected);
    });

    it("should hash a labeled node over the label and the subtree hash", () => {
      const sub = rootHash(leaf("12345"));
      const expected = sha256(
        concatBytes(domainSeparator("ic-hashtree-labeled"), text("time"), sub),
      );
      expect(rootHash(labeled("time", leaf("12345")))).toEqual(expected);
    });

    it("should hash a fork over both child hashes in order", () => {
      const l = leaf("left");
      const r = leaf("right");
      const expected = sha256(
        concatBytes(domainSeparator("ic-hashtree-fork"), rootHash(l), rootHash(r)),
      );
      expect(rootHash(fork(l, r))).toEqual(expected);
      expect(rootHash(fork(r, l))).not.toEqual(expected);
    });

    it("should return a pruned digest verbatim", () => {
      const digest = new Uint8Array(32).fill(0xab);
      expect(rootHash(pruned(digest))).toEqual(digest);
    });

    it("should match the reference root of the example tree", () => {
      expect(bytesToHex(rootHash(exampleTree()))).toBe(EXAMPLE_ROOT_HASH);
    });

    it("should be deterministic across independently built trees", () => {
      expect(rootHash(exampleTree())).toEqual(rootHash(exampleTree()));
    });

    it("should change when a single leaf byte changes", () => {
      const original = rootHash(labeled("time", leaf("12345")));
      const changed = rootHash(labeled("time", leaf("12346")));
      expect(changed).not.toEqual(original);
    });

    it("should not let one node kind collide with another", () => {
      // same bytes fed to the hash, different kinds
      expect(rootHash(leaf(""))).not.toEqual(rootHash(empty()));
    });

    it("should reject trees nested beyond the depth cap", () => {
      expect(() => rootHash(chain(127))).not.toThrow();
      expect(() => rootHash(chain(200))).toThrow(MalformedTreeError);
    });

    it("should not hand out the pruned node's own buffer", () => {
      const node = pruned(new Uint8Array(32).fill(1));
      const digest = rootHash(node);
      digest[0] = 9;
      expect(rootHash(node)[0]).toBe(1);
    });
  });
});
