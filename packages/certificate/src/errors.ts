/**
 * Rejection reasons for certificates.
 *
 * Each class carries the data a caller needs to report the rejection; none of
 * them distinguishes one cryptographic failure from another.
 */

import { bytesToHex } from "@noble/hashes/utils";
import { CertificationError } from "@statecert/hashtree";

/**
 * The certificate or one of its delegations is not shaped like a certificate:
 * a missing or empty signature, a delegation without subnet id, or certified
 * delegation data (public key, canister ranges) missing or unreadable.
 */
export class MalformedCertificateError extends CertificationError {
  readonly code = "MalformedCertificate" as const;

  constructor(message: string) {
    super(`Malformed certificate: ${message}`);
    this.name = "MalformedCertificateError";
  }
}

/**
 * The delegation chain nests deeper than the configured cap.
 */
export class DelegationDepthExceededError extends CertificationError {
  readonly code = "DelegationDepthExceeded" as const;

  /** Deepest delegation level accepted */
  readonly maxDepth: number;

  constructor(maxDepth: number) {
    super(`Delegation chain deeper than ${maxDepth} levels`);
    this.name = "DelegationDepthExceededError";
    this.maxDepth = maxDepth;
  }
}

/**
 * The queried canister lies outside every range the delegating subnet is
 * authorized to certify for.
 */
export class CanisterNotInRangeError extends CertificationError {
  readonly code = "CanisterNotInRange" as const;

  /** Hex of the queried canister id */
  readonly canisterId: string;

  /** Hex of the subnet id named by the delegation */
  readonly subnetId: string;

  constructor(canisterId: Uint8Array, subnetId: Uint8Array) {
    const canisterHex = bytesToHex(canisterId);
    const subnetHex = bytesToHex(subnetId);
    super(`Canister 0x${canisterHex} is not in the ranges of subnet 0x${subnetHex}`);
    this.name = "CanisterNotInRangeError";
    this.canisterId = canisterHex;
    this.subnetId = subnetHex;
  }
}

export class SignatureInvalidError extends CertificationError {
  readonly code = "SignatureInvalid" as const;

  constructor(message = "signature does not verify against the public key") {
    super(`Invalid certificate signature: ${message}`);
    this.name = "SignatureInvalidError";
  }
}

/**
 * The certified time is further from the verifier's clock than allowed.
 */
export class CertificateOutdatedError extends CertificationError {
  readonly code = "CertificateOutdated" as const;

  /** Certified time, nanoseconds since the epoch */
  readonly certifiedTimeNs: bigint;

  /** Verifier time, nanoseconds since the epoch */
  readonly nowNs: bigint;

  constructor(certifiedTimeNs: bigint, nowNs: bigint, maxAgeMs: number) {
    super(
      `Certificate time ${certifiedTimeNs}ns is more than ${maxAgeMs}ms away from ${nowNs}ns`,
    );
    this.name = "CertificateOutdatedError";
    this.certifiedTimeNs = certifiedTimeNs;
    this.nowNs = nowNs;
  }
}

/**
 * A configuration value is missing or invalid. Raised while loading
 * configuration, never for certificate content.
 */
export class ConfigurationError extends Error {
  readonly code = "InvalidConfiguration" as const;

  /** Name of the offending setting */
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid configuration ${key}: ${message}`);
    this.name = "ConfigurationError";
    this.key = key;
  }
}
