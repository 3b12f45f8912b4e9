/**
 * Error types raised while handling certified hash trees.
 *
 * Every rejection caused by untrusted input derives from CertificationError,
 * so callers at the trust boundary can tell attacker-controlled failures apart
 * from bugs in their own code.
 */

export type CertificationErrorCode =
  | "MalformedTree"
  | "MalformedCertificate"
  | "DelegationDepthExceeded"
  | "CanisterNotInRange"
  | "SignatureInvalid"
  | "LookupInconclusive"
  | "CertificateOutdated";

/**
 * Base class for every error caused by the content of a tree or certificate.
 */
export abstract class CertificationError extends Error {
  abstract readonly code: CertificationErrorCode;
}

/**
 * The tree has a node shape, digest length, label order or nesting depth that
 * a well-formed certified tree never has.
 */
export class MalformedTreeError extends CertificationError {
  readonly code = "MalformedTree" as const;

  constructor(message: string) {
    super(`Malformed hash tree: ${message}`);
    this.name = "MalformedTreeError";
  }
}

/**
 * A lookup hit a pruned subtree, so the tree proves neither presence nor
 * absence of the requested path.
 */
export class LookupInconclusiveError extends CertificationError {
  readonly code = "LookupInconclusive" as const;

  /** Rendered path that could not be resolved */
  readonly path: string;

  constructor(path: string) {
    super(`Lookup of ${path} is inconclusive: the subtree was pruned`);
    this.name = "LookupInconclusiveError";
    this.path = path;
  }
}
