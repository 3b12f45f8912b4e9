/**
 * Verifier configuration from environment bindings.
 */

import { hexToBytes } from "@noble/hashes/utils";
import { extractBlsPublicKey } from "./bls.js";
import { DEFAULT_MAX_DELEGATION_DEPTH } from "./certificate.js";
import { ConfigurationError, SignatureInvalidError } from "./errors.js";
import type { VerifierLogger, VerifyOptions } from "./verify.js";

/**
 * Environment bindings read by loadVerifierConfig.
 */
export interface VerifierEnv {
  /** Hex of the DER-encoded root public key */
  ROOT_PUBLIC_KEY?: string;
  /** Deepest delegation level accepted */
  MAX_DELEGATION_DEPTH?: string;
  /** Reject certificates whose time is further than this from now */
  MAX_CERTIFICATE_AGE_MS?: string;
}

export interface VerifierConfig {
  rootKey: Uint8Array;
  maxDelegationDepth: number;
  maxCertificateAgeMs?: number;
}

function parseCount(key: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(key, `expected a non-negative integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value)) {
    throw new ConfigurationError(key, `value out of range: ${raw}`);
  }
  return value;
}

function parseRootKey(raw: string | undefined): Uint8Array {
  if (raw === undefined || raw.trim() === "") {
    throw new ConfigurationError("ROOT_PUBLIC_KEY", "missing");
  }

  let der: Uint8Array;
  try {
    der = hexToBytes(raw.trim().replace(/^0x/i, ""));
  } catch (error) {
    throw new ConfigurationError(
      "ROOT_PUBLIC_KEY",
      `not hex: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  try {
    extractBlsPublicKey(der);
  } catch (error) {
    if (error instanceof SignatureInvalidError) {
      throw new ConfigurationError("ROOT_PUBLIC_KEY", "not a DER-encoded BLS12-381 key");
    }
    throw error;
  }
  return der;
}

/**
 * @throws ConfigurationError for a missing root key or an invalid value
 */
export function loadVerifierConfig(env: VerifierEnv = process.env): VerifierConfig {
  const config: VerifierConfig = {
    rootKey: parseRootKey(env.ROOT_PUBLIC_KEY),
    maxDelegationDepth:
      env.MAX_DELEGATION_DEPTH !== undefined
        ? parseCount("MAX_DELEGATION_DEPTH", env.MAX_DELEGATION_DEPTH)
        : DEFAULT_MAX_DELEGATION_DEPTH,
  };
  if (env.MAX_CERTIFICATE_AGE_MS !== undefined) {
    config.maxCertificateAgeMs = parseCount("MAX_CERTIFICATE_AGE_MS", env.MAX_CERTIFICATE_AGE_MS);
  }
  return config;
}

/**
 * Builds verifyCertificate options for one query from loaded configuration.
 */
export function verifierOptions(
  config: VerifierConfig,
  canisterId: Uint8Array,
  logger?: VerifierLogger,
): VerifyOptions {
  return {
    canisterId,
    rootKey: config.rootKey,
    maxDelegationDepth: config.maxDelegationDepth,
    maxCertificateAgeMs: config.maxCertificateAgeMs,
    logger,
  };
}
