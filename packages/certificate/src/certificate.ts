/**
 * Certificate model and wire decoding
 *
 * Wire format (CBOR, optionally behind the self-describe tag):
 *
 *   {
 *     "tree": <hash tree>,
 *     "signature": bstr,
 *     "delegation"?: { "subnet_id": bstr, "certificate": bstr }
 *   }
 *
 * The delegation certificate is itself CBOR-encoded inside a byte string and
 * is decoded recursively.
 */

import { hashTreeFromCbor, hashTreeToCbor, validateHashTree } from "@statecert/hashtree";
import type { HashTree } from "@statecert/hashtree";
import { decodeCbor, encodeCbor, isCborMap, readField } from "./cbor.js";
import { DelegationDepthExceededError, MalformedCertificateError } from "./errors.js";

/** Deepest delegation chain accepted unless configured otherwise */
export const DEFAULT_MAX_DELEGATION_DEPTH = 32;

export interface Certificate {
  readonly tree: HashTree;
  /** Raw threshold signature over the tree's root */
  readonly signature: Uint8Array;
  /** Present when a subnet other than the root signed the tree */
  readonly delegation?: Delegation;
}

export interface Delegation {
  readonly subnetId: Uint8Array;
  /** The root-issued certificate vouching for the subnet's key and ranges */
  readonly certificate: Certificate;
}

export interface DecodeOptions {
  /** Deepest delegation level accepted (default 32) */
  maxDelegationDepth?: number;
}

/**
 * Decodes and structurally validates a certificate and its delegation chain.
 *
 * @throws MalformedCertificateError, MalformedTreeError or
 *   DelegationDepthExceededError
 */
export function decodeCertificate(bytes: Uint8Array, options: DecodeOptions = {}): Certificate {
  const maxDepth = options.maxDelegationDepth ?? DEFAULT_MAX_DELEGATION_DEPTH;
  return decodeAt(bytes, 0, maxDepth);
}

function decodeAt(bytes: Uint8Array, depth: number, maxDepth: number): Certificate {
  if (depth > maxDepth) {
    throw new DelegationDepthExceededError(maxDepth);
  }
  return certificateFromCbor(decodeCbor(bytes, "certificate"), depth, maxDepth);
}

function requireBytes(value: unknown, what: string): Uint8Array {
  if (!(value instanceof Uint8Array) || value.length === 0) {
    throw new MalformedCertificateError(`${what} must be a non-empty byte string`);
  }
  return Uint8Array.from(value);
}

function certificateFromCbor(value: unknown, depth: number, maxDepth: number): Certificate {
  if (!isCborMap(value)) {
    throw new MalformedCertificateError("certificate must be a map");
  }

  const treeValue = readField(value, "tree");
  if (treeValue === undefined) {
    throw new MalformedCertificateError("missing tree");
  }
  const tree = hashTreeFromCbor(treeValue);
  validateHashTree(tree);

  const signature = requireBytes(readField(value, "signature"), "signature");

  const delegationValue = readField(value, "delegation");
  if (delegationValue === undefined || delegationValue === null) {
    return { tree, signature };
  }

  if (!isCborMap(delegationValue)) {
    throw new MalformedCertificateError("delegation must be a map");
  }
  const subnetId = requireBytes(readField(delegationValue, "subnet_id"), "delegation subnet_id");
  const certificateBytes = requireBytes(
    readField(delegationValue, "certificate"),
    "delegation certificate",
  );

  return {
    tree,
    signature,
    delegation: {
      subnetId,
      certificate: decodeAt(certificateBytes, depth + 1, maxDepth),
    },
  };
}

/**
 * Checks a certificate built in memory rather than decoded: the same rules
 * decodeCertificate applies, without the CBOR step.
 */
export function validateCertificate(
  certificate: Certificate,
  maxDelegationDepth = DEFAULT_MAX_DELEGATION_DEPTH,
): void {
  let current: Certificate | undefined = certificate;
  for (let depth = 0; current !== undefined; depth++) {
    if (depth > maxDelegationDepth) {
      throw new DelegationDepthExceededError(maxDelegationDepth);
    }
    validateHashTree(current.tree);
    if (current.signature.length === 0) {
      throw new MalformedCertificateError("signature must be a non-empty byte string");
    }
    if (current.delegation !== undefined && current.delegation.subnetId.length === 0) {
      throw new MalformedCertificateError("delegation subnet_id must be a non-empty byte string");
    }
    current = current.delegation?.certificate;
  }
}

function certificateToCbor(certificate: Certificate): Record<string, unknown> {
  const body: Record<string, unknown> = {
    tree: hashTreeToCbor(certificate.tree),
    signature: certificate.signature,
  };
  if (certificate.delegation !== undefined) {
    body.delegation = {
      subnet_id: certificate.delegation.subnetId,
      certificate: encodeCertificate(certificate.delegation.certificate),
    };
  }
  return body;
}

/**
 * Encodes a certificate in its wire form, for forwarding a certificate whose
 * tree has been narrowed with reveal().
 */
export function encodeCertificate(
  certificate: Certificate,
  options: { selfDescribe?: boolean } = {},
): Uint8Array {
  return encodeCbor(certificateToCbor(certificate), options.selfDescribe ?? false);
}
