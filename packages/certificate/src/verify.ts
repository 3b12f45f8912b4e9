/**
 * Certificate verification
 *
 * 1. recompute the tree's root hash
 * 2. resolve the signing key: the root key, or for a delegated certificate the
 *    subnet key certified by the (recursively verified) delegation, provided
 *    the queried canister lies in the subnet's ranges
 * 3. check the signature over sep("ic-state-root") | root
 * 4. optionally, check the certified time against the verifier's clock
 *
 * Rejections are returned, not thrown. Only a fault in the verifier itself
 * escapes as an exception.
 */

import { bytesToHex } from "@noble/hashes/utils";
import { CertificationError, rootHash } from "@statecert/hashtree";
import { extractBlsPublicKey, stateRootMessage, verifyBlsSignature } from "./bls.js";
import type { SignatureVerifier } from "./bls.js";
import { DEFAULT_MAX_DELEGATION_DEPTH, validateCertificate } from "./certificate.js";
import type { Certificate } from "./certificate.js";
import { canisterRanges, isCanisterInRanges, subnetPublicKey } from "./delegation.js";
import {
  CanisterNotInRangeError,
  CertificateOutdatedError,
  DelegationDepthExceededError,
  SignatureInvalidError,
} from "./errors.js";
import { certificateTime } from "./time.js";
import { VerifiedTree } from "./verifiedtree.js";

export type VerifierLogger = Pick<Console, "debug" | "warn">;

export interface VerifyOptions {
  /** Canister the caller is querying; checked against delegation ranges */
  canisterId: Uint8Array;
  /** DER-encoded root public key */
  rootKey: Uint8Array;
  /** Deepest delegation level accepted (default 32) */
  maxDelegationDepth?: number;
  /** Signature primitive (default: BLS12-381 short signatures) */
  verifySignature?: SignatureVerifier;
  /** When set, reject certificates whose time is further than this from now */
  maxCertificateAgeMs?: number;
  /** Clock used for the age check (default: the current time) */
  now?: Date;
  /** Where verification outcomes are logged (default: console) */
  logger?: VerifierLogger;
}

export type VerificationResult =
  | { readonly ok: true; readonly tree: VerifiedTree }
  | { readonly ok: false; readonly error: CertificationError };

interface VerifyContext {
  canisterId: Uint8Array;
  rootKey: Uint8Array;
  maxDepth: number;
  verifySignature: SignatureVerifier;
}

const NANOS_PER_MILLI = 1_000_000n;

/**
 * Verifies a certificate for a canister. This is the trust boundary: the tree
 * of a successful result may be queried, nothing else may.
 */
export function verifyCertificate(
  certificate: Certificate,
  options: VerifyOptions,
): VerificationResult {
  const logger = options.logger ?? console;
  const maxDepth = options.maxDelegationDepth ?? DEFAULT_MAX_DELEGATION_DEPTH;
  if (!Number.isSafeInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDelegationDepth must be a non-negative integer, got ${maxDepth}`);
  }
  const maxAgeMs = options.maxCertificateAgeMs;
  if (maxAgeMs !== undefined && !(Number.isFinite(maxAgeMs) && maxAgeMs >= 0)) {
    throw new RangeError(
      `maxCertificateAgeMs must be a finite non-negative number, got ${maxAgeMs}`,
    );
  }

  const context: VerifyContext = {
    canisterId: options.canisterId,
    rootKey: options.rootKey,
    maxDepth,
    verifySignature: options.verifySignature ?? verifyBlsSignature,
  };

  try {
    validateCertificate(certificate, maxDepth);
    const root = verifyChain(certificate, context, 0);

    if (maxAgeMs !== undefined) {
      checkFreshness(certificate, maxAgeMs, options.now ?? new Date());
    }

    logger.debug("[certificate] verified", {
      rootHash: bytesToHex(root),
      canisterId: bytesToHex(options.canisterId),
      delegated: certificate.delegation !== undefined,
    });
    return { ok: true, tree: new VerifiedTree(certificate.tree, root) };
  } catch (error) {
    if (error instanceof CertificationError) {
      logger.warn("[certificate] rejected", {
        code: error.code,
        message: error.message,
        canisterId: bytesToHex(options.canisterId),
      });
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Verifies one certificate of the chain and returns its root hash.
 */
function verifyChain(certificate: Certificate, context: VerifyContext, depth: number): Uint8Array {
  if (!Number.isSafeInteger(depth) || depth < 0) {
    throw new Error(`delegation depth counter out of range: ${depth}`);
  }
  if (depth > context.maxDepth) {
    throw new DelegationDepthExceededError(context.maxDepth);
  }

  const root = rootHash(certificate.tree);
  const publicKey = extractBlsPublicKey(resolvePublicKey(certificate, context, depth));

  if (!context.verifySignature(publicKey, stateRootMessage(root), certificate.signature)) {
    throw new SignatureInvalidError();
  }
  return root;
}

/**
 * Returns the DER key that must have signed the certificate.
 */
function resolvePublicKey(
  certificate: Certificate,
  context: VerifyContext,
  depth: number,
): Uint8Array {
  const delegation = certificate.delegation;
  if (delegation === undefined) {
    return context.rootKey;
  }

  verifyChain(delegation.certificate, context, depth + 1);

  const ranges = canisterRanges(delegation.certificate.tree, delegation.subnetId);
  if (!isCanisterInRanges(context.canisterId, ranges)) {
    throw new CanisterNotInRangeError(context.canisterId, delegation.subnetId);
  }

  return subnetPublicKey(delegation.certificate.tree, delegation.subnetId);
}

function checkFreshness(certificate: Certificate, maxAgeMs: number, now: Date): void {
  const certifiedNs = certificateTime(certificate.tree);
  const nowNs = BigInt(now.getTime()) * NANOS_PER_MILLI;
  const windowNs = BigInt(Math.floor(maxAgeMs)) * NANOS_PER_MILLI;

  if (certifiedNs < nowNs - windowNs || certifiedNs > nowNs + windowNs) {
    throw new CertificateOutdatedError(certifiedNs, nowNs, maxAgeMs);
  }
}
