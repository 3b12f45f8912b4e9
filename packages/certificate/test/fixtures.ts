import { bls12_381 } from "@noble/curves/bls12-381";
import { labeled, labeledForest, leaf, rootHash, wireEncoder } from "@statecert/hashtree";
import type { HashTree } from "@statecert/hashtree";
import { encodeLeb128, stateRootMessage, wrapBlsPublicKey } from "../src/index.js";
import type { Certificate, VerifierLogger } from "../src/index.js";
import { vi } from "vitest";

export interface TestKey {
  secret: Uint8Array;
  /** DER-encoded public key */
  publicKey: Uint8Array;
}

function testKey(fill: number): TestKey {
  const secret = new Uint8Array(32).fill(fill);
  return {
    secret,
    publicKey: wrapBlsPublicKey(bls12_381.getPublicKeyForShortSignatures(secret)),
  };
}

export const ROOT_KEY = testKey(0x07);
export const SUBNET_KEY = testKey(0x09);

export const CANISTER_ID = Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 5, 1, 1);
export const SUBNET_ID = Uint8Array.of(0xaa, 0xbb, 0x02);

export const RANGE_COVERING = [
  Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 0, 1, 1),
  Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 9, 1, 1),
] as const;

export const RANGE_EXCLUDING = [
  Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 0, 1, 1),
  Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 3, 1, 1),
] as const;

/** 2023-11-14T22:13:20Z */
export const TEST_TIME_MS = 1_700_000_000_000;
export const TEST_TIME_NS = BigInt(TEST_TIME_MS) * 1_000_000n;

/** Stand-in signature for tests that inject a signature verifier */
export const PLACEHOLDER_SIGNATURE = new Uint8Array(48).fill(0x5a);

export function sign(tree: HashTree, key: TestKey): Uint8Array {
  return bls12_381.signShortSignature(stateRootMessage(rootHash(tree)), key.secret);
}

/** A canister's certified state: certified_data plus the certified time */
export function stateTree(timeNs: bigint = TEST_TIME_NS): HashTree {
  return labeledForest([
    [
      "canister",
      labeled(CANISTER_ID, labeled("certified_data", leaf(new Uint8Array(32).fill(0x11)))),
    ],
    ["time", leaf(encodeLeb128(timeNs))],
  ]);
}

/** A root-issued tree certifying SUBNET_KEY and the given ranges for SUBNET_ID */
export function delegationTree(
  ranges: ReadonlyArray<readonly [Uint8Array, Uint8Array]> = [RANGE_COVERING],
  publicKey: Uint8Array = SUBNET_KEY.publicKey,
): HashTree {
  return labeledForest([
    [
      "subnet",
      labeled(
        SUBNET_ID,
        labeledForest([
          [
            "canister_ranges",
            leaf(wireEncoder.encode(ranges.map(([low, high]) => [low, high]))),
          ],
          ["public_key", leaf(publicKey)],
        ]),
      ),
    ],
    ["time", leaf(encodeLeb128(TEST_TIME_NS))],
  ]);
}

export function rootSignedCertificate(tree: HashTree = stateTree()): Certificate {
  return { tree, signature: sign(tree, ROOT_KEY) };
}

export function delegatedCertificate(
  ranges: ReadonlyArray<readonly [Uint8Array, Uint8Array]> = [RANGE_COVERING],
): Certificate {
  const tree = stateTree();
  const parentTree = delegationTree(ranges);
  return {
    tree,
    signature: sign(tree, SUBNET_KEY),
    delegation: {
      subnetId: SUBNET_ID,
      certificate: { tree: parentTree, signature: sign(parentTree, ROOT_KEY) },
    },
  };
}

/**
 * A chain of `levels` delegations with placeholder signatures. Every tree
 * certifies SUBNET_ID, so each level can vouch for the one below it.
 */
export function delegationChain(levels: number): Certificate {
  const tree = delegationTree();
  let certificate: Certificate = { tree, signature: PLACEHOLDER_SIGNATURE };
  for (let i = 0; i < levels; i++) {
    certificate = {
      tree,
      signature: PLACEHOLDER_SIGNATURE,
      delegation: { subnetId: SUBNET_ID, certificate },
    };
  }
  return certificate;
}

export function silentLogger(): VerifierLogger {
  return { debug: vi.fn(), warn: vi.fn() };
}
