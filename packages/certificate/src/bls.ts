/**
 * Threshold signature verification
 *
 * Subnets sign with BLS12-381 in the "short signature" arrangement:
 * 48-byte signatures in G1, 96-byte public keys in G2, messages hashed to G1
 * under the DST BLS_SIG_BLS12381G1_XMD:SHA-256_SSWU_RO_NUL_. The pairing
 * arithmetic is @noble/curves'.
 */

import { bls12_381 } from "@noble/curves/bls12-381";
import { hexToBytes } from "@noble/hashes/utils";
import { arraysEqual, concatBytes, domainSeparator } from "@statecert/hashtree";
import { SignatureInvalidError } from "./errors.js";

/** DER SubjectPublicKeyInfo header preceding a raw BLS12-381 G2 key */
export const BLS_DER_PREFIX = hexToBytes(
  "308182301d060d2b0601040182dc7c0503010201060c2b0601040182dc7c05030201036100",
);

export const BLS_PUBLIC_KEY_LENGTH = 96;

/**
 * verify(publicKey, message, signature). publicKey is the raw key, already
 * unwrapped from its DER envelope.
 */
export type SignatureVerifier = (
  publicKey: Uint8Array,
  message: Uint8Array,
  signature: Uint8Array,
) => boolean;

const STATE_ROOT_SEPARATOR = domainSeparator("ic-state-root");

/**
 * The message a certificate signature covers: sep("ic-state-root") | root.
 */
export function stateRootMessage(rootHash: Uint8Array): Uint8Array {
  return concatBytes(STATE_ROOT_SEPARATOR, rootHash);
}

/**
 * @throws SignatureInvalidError if the key is not a DER-wrapped BLS12-381 key
 */
export function extractBlsPublicKey(der: Uint8Array): Uint8Array {
  const prefixLength = BLS_DER_PREFIX.length;
  if (
    der.length !== prefixLength + BLS_PUBLIC_KEY_LENGTH ||
    !arraysEqual(der.subarray(0, prefixLength), BLS_DER_PREFIX)
  ) {
    throw new SignatureInvalidError("public key is not a DER-encoded BLS12-381 key");
  }
  return der.slice(prefixLength);
}

export function wrapBlsPublicKey(raw: Uint8Array): Uint8Array {
  if (raw.length !== BLS_PUBLIC_KEY_LENGTH) {
    throw new RangeError(`BLS public key must be ${BLS_PUBLIC_KEY_LENGTH} bytes, got ${raw.length}`);
  }
  return concatBytes(BLS_DER_PREFIX, raw);
}

export const verifyBlsSignature: SignatureVerifier = (publicKey, message, signature) => {
  try {
    return bls12_381.verifyShortSignature(signature, message, publicKey);
  } catch {
    // points that fail to decode or lie off the curve throw; they do not verify
    return false;
  }
};
