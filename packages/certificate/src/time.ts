import { path } from "@statecert/hashtree";
import type { HashTree } from "@statecert/hashtree";
import { MalformedCertificateError } from "./errors.js";
import { requireCertifiedLeaf } from "./leaves.js";

export const TIME_PATH = path("time");

/**
 * Decodes an unsigned LEB128 integer that must span the whole input.
 *
 * @throws MalformedCertificateError on truncated input or trailing bytes
 */
export function decodeLeb128(bytes: Uint8Array): bigint {
  let result = 0n;
  let shift = 0n;

  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i];
    result |= BigInt(byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) {
      if (i !== bytes.length - 1) {
        throw new MalformedCertificateError("trailing bytes after LEB128 value");
      }
      return result;
    }
    shift += 7n;
  }

  throw new MalformedCertificateError("unterminated LEB128 value");
}

export function encodeLeb128(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new RangeError("LEB128 value must not be negative");
  }
  const out: number[] = [];
  let rest = value;
  do {
    let byte = Number(rest & 0x7fn);
    rest >>= 7n;
    if (rest !== 0n) byte |= 0x80;
    out.push(byte);
  } while (rest !== 0n);
  return Uint8Array.from(out);
}

/**
 * Reads the certified time, in nanoseconds since the epoch.
 *
 * @throws MalformedCertificateError if the time leaf is not proven or not LEB128
 */
export function certificateTime(tree: HashTree): bigint {
  return decodeLeb128(requireCertifiedLeaf(tree, TIME_PATH, "certificate time"));
}
