import { createHash, timingSafeEqual } from "crypto";

const HEX_DIGEST = /^[0-9a-f]+$/i;

/** Hex SHA-256 of raw bytes or a UTF-8 string */
export function sha256Hex(data: Buffer | Uint8Array | string): string {
  const hash = createHash("sha256");
  if (typeof data === "string") {
    hash.update(data, "utf8");
  } else {
    hash.update(data);
  }
  return hash.digest("hex");
}

/**
 * Constant-time comparison of two hex digests, ignoring case.
 * Digests of different length or with non-hex characters never match.
 */
export function digestsEqual(a: string, b: string): boolean {
  if (a.length !== b.length || a.length % 2 !== 0 || !HEX_DIGEST.test(a) || !HEX_DIGEST.test(b)) {
    return false;
  }
  return timingSafeEqual(Buffer.from(a, "hex"), Buffer.from(b, "hex"));
}
