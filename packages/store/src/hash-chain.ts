/**
 * @warden/store — Hash chain for the tamper-evident journal.
 *
 * Each entry is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous entry's hash, forming a chain:
 *
 *   entry[1].hash = sha256(canonicalize(entry[1]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n]) + entry[n-1].hash)
 *
 * Any modification to any entry breaks the chain from that point forward.
 */

import { canonicalize } from "json-canonicalize";
import { sha256Hex } from "./hashing.js";
import type {
  IntegrityError,
  JournalEntry,
  JournalIntegrityResult,
} from "./types.js";

export const GENESIS_HASH = "genesis";

/** The hashed part of an entry: everything except the chain links. */
export type UnhashedEntry = Omit<JournalEntry, "hash" | "previousHash">;

function canonicalEntryContent(entry: UnhashedEntry): string {
  return canonicalize({
    event: {
      type: entry.event.type,
      metadata: entry.event.metadata,
      payload: entry.event.payload,
    },
    unitId: entry.unitId,
    position: entry.position,
    appendedAt: entry.appendedAt,
  });
}

/**
 * Compute the hash of an entry given its predecessor's hash.
 *
 * @param previousHash - Hash of the preceding entry, or GENESIS_HASH for position 1
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEntryHash(
  entry: UnhashedEntry,
  previousHash: string,
): string {
  return sha256Hex(canonicalEntryContent(entry) + previousHash);
}

/**
 * Verify the hash chain of journal entries in position order.
 */
export function verifyHashChain(
  entries: readonly JournalEntry[],
): JournalIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const entry of entries) {
    if (entry.previousHash !== previousHash) {
      errors.push({
        position: entry.position,
        reason: `previousHash mismatch at position ${entry.position}: expected "${previousHash}", got "${entry.previousHash}"`,
      });
    }

    const expectedHash = computeEntryHash(entry, entry.previousHash);
    if (entry.hash !== expectedHash) {
      errors.push({
        position: entry.position,
        reason: `Hash mismatch at position ${entry.position}: expected "${expectedHash}", got "${entry.hash}"`,
      });
    }

    previousHash = entry.hash;
    if (errors.length === 0) {
      lastVerifiedPosition = entry.position;
    }
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
