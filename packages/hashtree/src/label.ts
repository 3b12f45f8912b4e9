/**
 * Labels and paths
 *
 * A label is an opaque byte string. Labels are ordered byte-lexicographically,
 * which is the order fork children must follow in a well-formed tree.
 */

import { bytesToHex } from "@noble/hashes/utils";
import { arraysEqual, compareBytes } from "./utils/arrays.js";

export type Label = Uint8Array;

/** Descent through nested labeled nodes, outermost label first */
export type Path = readonly Label[];

const textEncoder = new TextEncoder();

/**
 * Creates a label. Strings are UTF-8 encoded, byte input is copied so the
 * label cannot change under the tree that holds it.
 */
export function label(value: string | Uint8Array): Label {
  if (typeof value === "string") {
    return textEncoder.encode(value);
  }
  return Uint8Array.from(value);
}

export function path(...segments: Array<string | Uint8Array>): Path {
  return segments.map(label);
}

export function compareLabels(a: Label, b: Label): number {
  return compareBytes(a, b);
}

export function labelsEqual(a: Label, b: Label): boolean {
  return arraysEqual(a, b);
}

export function isPrintableAscii(bytes: Uint8Array): boolean {
  for (const b of bytes) {
    if (b < 0x20 || b > 0x7e) return false;
  }
  return true;
}

/**
 * Renders a label as text when it is printable ASCII and as 0x-prefixed hex
 * otherwise.
 */
export function formatLabel(l: Label): string {
  if (l.length > 0 && isPrintableAscii(l)) {
    return new TextDecoder().decode(l);
  }
  return `0x${bytesToHex(l)}`;
}

/**
 * Renders a path as `/a/b/c`. The empty path renders as `/`.
 */
export function formatPath(p: Path): string {
  if (p.length === 0) return "/";
  return p.map((l) => `/${formatLabel(l)}`).join("");
}
