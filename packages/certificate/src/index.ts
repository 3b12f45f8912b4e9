/**
 * @statecert/certificate - verification of certified state
 *
 * Decodes certificates, validates delegation chains and canister ranges, and
 * checks BLS12-381 threshold signatures over hash tree roots.
 *
 * @packageDocumentation
 */

export {
  MalformedCertificateError,
  DelegationDepthExceededError,
  CanisterNotInRangeError,
  SignatureInvalidError,
  CertificateOutdatedError,
  ConfigurationError,
} from "./errors.js";

export {
  DEFAULT_MAX_DELEGATION_DEPTH,
  decodeCertificate,
  encodeCertificate,
  validateCertificate,
} from "./certificate.js";
export type { Certificate, Delegation, DecodeOptions } from "./certificate.js";

export {
  canisterRanges,
  canisterRangesPath,
  isCanisterInRanges,
  subnetPublicKey,
  subnetPublicKeyPath,
} from "./delegation.js";
export type { CanisterRange } from "./delegation.js";

export {
  BLS_DER_PREFIX,
  BLS_PUBLIC_KEY_LENGTH,
  extractBlsPublicKey,
  stateRootMessage,
  verifyBlsSignature,
  wrapBlsPublicKey,
} from "./bls.js";
export type { SignatureVerifier } from "./bls.js";

export { TIME_PATH, certificateTime, decodeLeb128, encodeLeb128 } from "./time.js";

export { verifyCertificate } from "./verify.js";
export type { VerificationResult, VerifierLogger, VerifyOptions } from "./verify.js";
// type-only: a VerifiedTree comes from verifyCertificate, never from new
export type { VerifiedTree } from "./verifiedtree.js";

export { loadVerifierConfig, verifierOptions } from "./config.js";
export type { VerifierConfig, VerifierEnv } from "./config.js";

export {
  CertificationError,
  LookupInconclusiveError,
  MalformedTreeError,
} from "@statecert/hashtree";
