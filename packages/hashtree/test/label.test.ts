import { describe, it, expect } from "vitest";
import {
  compareLabels,
  formatLabel,
  formatPath,
  label,
  labelsEqual,
  path,
} from "../src/index.js";

describe("label", () => {
  it("should UTF-8 encode string labels", () => {
    expect(label("time")).toEqual(new Uint8Array([0x74, 0x69, 0x6d, 0x65]));
  });

  it("should copy byte labels", () => {
    const source = new Uint8Array([1, 2]);
    const l = label(source);
    source[0] = 7;
    expect(l).toEqual(new Uint8Array([1, 2]));
  });

  it("should order labels byte-lexicographically", () => {
    expect(compareLabels(label("a"), label("b"))).toBeLessThan(0);
    expect(compareLabels(label("b"), label("a"))).toBeGreaterThan(0);
    expect(compareLabels(label("a"), label("a"))).toBe(0);
    // a strict prefix sorts first
    expect(compareLabels(label("a"), label("ab"))).toBeLessThan(0);
    expect(compareLabels(new Uint8Array([0xff]), new Uint8Array([0x00, 0x00]))).toBeGreaterThan(0);
  });

  it("should compare labels for equality", () => {
    expect(labelsEqual(label("x"), label("x"))).toBe(true);
    expect(labelsEqual(label("x"), label("xy"))).toBe(false);
  });

  it("should format printable labels as text and others as hex", () => {
    expect(formatLabel(label("canister_id"))).toBe("canister_id");
    expect(formatLabel(new Uint8Array([0, 0, 0, 0, 0, 0, 0, 1, 1, 1]))).toBe("0x00000000000000010101");
    expect(formatLabel(new Uint8Array(0))).toBe("0x");
  });

  it("should format paths", () => {
    expect(formatPath(path("subnet", new Uint8Array([0xab]), "public_key"))).toBe(
      "/subnet/0xab/public_key",
    );
    expect(formatPath([])).toBe("/");
  });
});
