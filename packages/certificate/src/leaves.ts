import { formatPath, lookupPath } from "@statecert/hashtree";
import type { HashTree, Path } from "@statecert/hashtree";
import { MalformedCertificateError } from "./errors.js";

/**
 * Reads a leaf the certificate format requires to be present. Anything short
 * of a proven value is a malformed certificate.
 */
export function requireCertifiedLeaf(tree: HashTree, p: Path, what: string): Uint8Array {
  const result = lookupPath(tree, p);
  switch (result.status) {
    case "found":
      return result.value;
    case "absent":
      throw new MalformedCertificateError(`${what} is absent at ${formatPath(p)}`);
    case "unknown":
      throw new MalformedCertificateError(`${what} at ${formatPath(p)} is pruned`);
    case "error":
      throw new MalformedCertificateError(`${what} at ${formatPath(p)}: ${result.reason}`);
  }
}
