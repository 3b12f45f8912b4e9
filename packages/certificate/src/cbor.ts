import { decode } from "cbor-x";
import { wireEncoder } from "@statecert/hashtree";
import { MalformedCertificateError } from "./errors.js";

/** Tag 55799 ("self-described CBOR") as it appears on the wire */
const SELF_DESCRIBE_PREFIX = Uint8Array.of(0xd9, 0xd9, 0xf7);

function hasSelfDescribePrefix(bytes: Uint8Array): boolean {
  return (
    bytes.length >= SELF_DESCRIBE_PREFIX.length &&
    bytes[0] === SELF_DESCRIBE_PREFIX[0] &&
    bytes[1] === SELF_DESCRIBE_PREFIX[1] &&
    bytes[2] === SELF_DESCRIBE_PREFIX[2]
  );
}

/**
 * Decodes one CBOR item, dropping a leading self-describe tag if present.
 *
 * @throws MalformedCertificateError if the bytes are not CBOR
 */
export function decodeCbor(bytes: Uint8Array, what: string): unknown {
  const body = hasSelfDescribePrefix(bytes)
    ? bytes.subarray(SELF_DESCRIBE_PREFIX.length)
    : bytes;
  try {
    return decode(body);
  } catch (error) {
    throw new MalformedCertificateError(
      `${what} is not valid CBOR: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

export function encodeCbor(value: unknown, selfDescribe = false): Uint8Array {
  const body: Uint8Array = wireEncoder.encode(value);
  if (!selfDescribe) return body;
  const out = new Uint8Array(SELF_DESCRIBE_PREFIX.length + body.length);
  out.set(SELF_DESCRIBE_PREFIX, 0);
  out.set(body, SELF_DESCRIBE_PREFIX.length);
  return out;
}

/**
 * Reads a text-keyed field from a decoded CBOR map, whether the decoder
 * produced a Map or a plain object.
 */
export function readField(map: unknown, key: string): unknown {
  if (map instanceof Map) {
    return map.get(key);
  }
  if (typeof map === "object" && map !== null && !Array.isArray(map)) {
    return Object.prototype.hasOwnProperty.call(map, key)
      ? Reflect.get(map, key)
      : undefined;
  }
  return undefined;
}

export function isCborMap(value: unknown): boolean {
  return (
    value instanceof Map ||
    (typeof value === "object" &&
      value !== null &&
      !Array.isArray(value) &&
      !(value instanceof Uint8Array))
  );
}
