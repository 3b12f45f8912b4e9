import { describe, it, expect } from "vitest";
import {
  forget,
  lookupPath,
  path,
  prune,
  reveal,
  rootHash,
} from "../src/index.js";
import { exampleTree } from "./fixtures.js";

const text = (s: string) => new TextEncoder().encode(s);

describe("pruning", () => {
  const tree = exampleTree();
  const root = rootHash(tree);

  describe("prune", () => {
    it("should replace the tree by its root hash", () => {
      const p = prune(tree);
      expect(p.kind).toBe("pruned");
      expect(rootHash(p)).toEqual(root);
    });

    it("should leave a pruned node as it is", () => {
      const p = prune(tree);
      expect(prune(p)).toBe(p);
    });
  });

  describe("forget", () => {
    it("should keep the root hash", () => {
      expect(rootHash(forget(tree, path("a")))).toEqual(root);
      expect(rootHash(forget(tree, path("a", "y")))).toEqual(root);
    });

    it("should turn lookups inside the forgotten subtree into unknown", () => {
      const t = forget(tree, path("a"));
      expect(lookupPath(t, path("a", "x"))).toEqual({ status: "unknown" });
      expect(lookupPath(t, path("a", "nope"))).toEqual({ status: "unknown" });
    });

    it("should not change lookups outside the forgotten subtree", () => {
      const t = forget(tree, path("a", "y"));
      expect(lookupPath(t, path("a", "x"))).toEqual({ status: "found", value: text("hello") });
      expect(lookupPath(t, path("b"))).toEqual({ status: "found", value: text("good") });
      expect(lookupPath(t, path("aa"))).toEqual({ status: "absent" });
      expect(lookupPath(t, path("a", "y"))).toEqual({ status: "unknown" });
    });

    it("should return the same tree when the path does not resolve", () => {
      expect(forget(tree, path("zz"))).toBe(tree);
      expect(forget(tree, path("b", "deeper"))).toBe(tree);
    });

    it("should prune everything for the empty path", () => {
      expect(forget(tree, [])).toEqual(prune(tree));
    });
  });

  describe("reveal", () => {
    it("should keep the root hash", () => {
      expect(rootHash(reveal(tree, [path("a", "x")]))).toEqual(root);
      expect(rootHash(reveal(tree, [path("b"), path("d")]))).toEqual(root);
    });

    it("should keep revealed paths and hide their siblings", () => {
      const t = reveal(tree, [path("a", "x")]);
      expect(lookupPath(t, path("a", "x"))).toEqual({ status: "found", value: text("hello") });
      expect(lookupPath(t, path("a", "y"))).toEqual({ status: "unknown" });
      expect(lookupPath(t, path("b"))).toEqual({ status: "unknown" });
      expect(lookupPath(t, path("d"))).toEqual({ status: "unknown" });
    });

    it("should still prove absence next to a kept label", () => {
      const t = reveal(tree, [path("a", "x")]);
      expect(lookupPath(t, path("a", "w"))).toEqual({ status: "absent" });
    });

    it("should collapse a fork with nothing revealed into one pruned node", () => {
      const t = reveal(tree, [path("a", "x")]);
      expect(t.kind).toBe("fork");
      if (t.kind !== "fork") return;
      expect(t.right.kind).toBe("pruned");
    });

    it("should reveal several paths at once", () => {
      const t = reveal(tree, [path("b"), path("d")]);
      expect(lookupPath(t, path("b"))).toEqual({ status: "found", value: text("good") });
      expect(lookupPath(t, path("d"))).toEqual({ status: "found", value: text("morning") });
      expect(lookupPath(t, path("a", "x"))).toEqual({ status: "unknown" });
    });

    it("should prune the whole tree when nothing is requested", () => {
      expect(reveal(tree, [])).toEqual(prune(tree));
    });

    it("should return the tree unchanged when the empty path is requested", () => {
      expect(reveal(tree, [[]])).toBe(tree);
    });
  });
});
