/**
 * Delegation metadata
 *
 * A delegation certificate, signed by the root subnet, certifies for each
 * subnet its public key and the canister id ranges it may certify for:
 *
 *   /subnet/<subnet_id>/public_key       DER-wrapped BLS12-381 key
 *   /subnet/<subnet_id>/canister_ranges  CBOR [[low, high], ...]
 *
 * Ranges are inclusive, ordered and disjoint; canister ids compare
 * byte-lexicographically.
 */

import { compareBytes, path } from "@statecert/hashtree";
import type { HashTree, Path } from "@statecert/hashtree";
import { decodeCbor } from "./cbor.js";
import { MalformedCertificateError } from "./errors.js";
import { requireCertifiedLeaf } from "./leaves.js";

export interface CanisterRange {
  readonly low: Uint8Array;
  readonly high: Uint8Array;
}

export function subnetPublicKeyPath(subnetId: Uint8Array): Path {
  return path("subnet", subnetId, "public_key");
}

export function canisterRangesPath(subnetId: Uint8Array): Path {
  return path("subnet", subnetId, "canister_ranges");
}

/**
 * @returns the DER-encoded public key certified for the subnet
 * @throws MalformedCertificateError if the key is not proven present
 */
export function subnetPublicKey(tree: HashTree, subnetId: Uint8Array): Uint8Array {
  return requireCertifiedLeaf(tree, subnetPublicKeyPath(subnetId), "subnet public key");
}

function toRange(entry: unknown, index: number): CanisterRange {
  if (
    !Array.isArray(entry) ||
    entry.length !== 2 ||
    !(entry[0] instanceof Uint8Array) ||
    !(entry[1] instanceof Uint8Array)
  ) {
    throw new MalformedCertificateError(
      `canister range ${index} must be a pair of byte strings`,
    );
  }
  return { low: Uint8Array.from(entry[0]), high: Uint8Array.from(entry[1]) };
}

/**
 * Reads and checks the canister ranges certified for a subnet.
 *
 * @throws MalformedCertificateError if the ranges are missing, unreadable,
 *   inverted, unordered or overlapping
 */
export function canisterRanges(tree: HashTree, subnetId: Uint8Array): CanisterRange[] {
  const raw = requireCertifiedLeaf(tree, canisterRangesPath(subnetId), "canister ranges");
  const decoded = decodeCbor(raw, "canister ranges");
  if (!Array.isArray(decoded)) {
    throw new MalformedCertificateError("canister ranges must be an array");
  }

  const ranges = decoded.map(toRange);
  ranges.forEach((range, i) => {
    if (compareBytes(range.low, range.high) > 0) {
      throw new MalformedCertificateError(`canister range ${i} has low above high`);
    }
    if (i > 0 && compareBytes(ranges[i - 1].high, range.low) >= 0) {
      throw new MalformedCertificateError(
        `canister range ${i} overlaps or precedes range ${i - 1}`,
      );
    }
  });
  return ranges;
}

/**
 * Inclusive range membership by byte-lexicographic order.
 */
export function isCanisterInRanges(
  canisterId: Uint8Array,
  ranges: readonly CanisterRange[],
): boolean {
  return ranges.some(
    (r) => compareBytes(r.low, canisterId) <= 0 && compareBytes(canisterId, r.high) <= 0,
  );
}
