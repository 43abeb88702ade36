/**
 * @warden/store — Content hashing.
 *
 * Identities and journal hashes are SHA-256 over RFC 8785 (JCS) canonical
 * JSON, so equal content always hashes equal regardless of key order, and
 * distinct structured content never shares an encoding.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Identity } from "@warden/types";

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Hash JSON-compatible content into an identity.
 *
 * @param content - Plain JSON data (no bigint, no undefined)
 */
export function hashIdentity(content: Record<string, unknown>): Identity {
  return `0x${sha256Hex(canonicalize(content))}`;
}
