/**
 * Runtime Type Guards
 *
 * Narrowing functions for Warden domain types, used at system boundaries
 * (HTTP parameters, deserialized descriptors, journal verification).
 */

import type { Identity } from "./identity.js";
import type {
  CommandArgument,
  CommandDescriptor,
  CommandTarget,
  TypeArgument,
} from "./command.js";
import type { DomainEvent, EventMetadata } from "./event.js";

const IDENTITY_PATTERN = /^0x[0-9a-f]{64}$/;
const UINT64_MAX = 18446744073709551615n;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

// =============================================================================
// Identity guards
// =============================================================================

export function isIdentity(value: unknown): value is Identity {
  return typeof value === "string" && IDENTITY_PATTERN.test(value);
}

/**
 * A decimal string holding an unsigned 64-bit integer.
 */
export function isUint64String(value: unknown): value is string {
  if (typeof value !== "string" || !/^(0|[1-9]\d*)$/.test(value)) return false;
  return BigInt(value) <= UINT64_MAX;
}

// =============================================================================
// Command descriptor guards
// =============================================================================

export function isCommandTarget(value: unknown): value is CommandTarget {
  if (!isRecord(value)) return false;
  if (value.kind === "static") return isIdentity(value.address);
  if (value.kind === "alias") return isNonEmptyString(value.name);
  return false;
}

export function isCommandArgument(value: unknown): value is CommandArgument {
  if (!isRecord(value)) return false;
  switch (value.kind) {
    case "shared":
    case "mutShared":
    case "immutable":
      return isIdentity(value.id);
    case "payment":
      return isNonEmptyString(value.assetType) && isUint64String(value.amount);
    case "placeholder":
      return isNonEmptyString(value.tag);
    default:
      return false;
  }
}

export function isTypeArgument(value: unknown): value is TypeArgument {
  if (!isRecord(value)) return false;
  if (value.kind === "system") return true;
  if (value.kind === "concrete") return isNonEmptyString(value.type);
  return false;
}

export function isCommandDescriptor(value: unknown): value is CommandDescriptor {
  if (!isRecord(value)) return false;
  return (
    isCommandTarget(value.target) &&
    isNonEmptyString(value.moduleName) &&
    isNonEmptyString(value.functionName) &&
    Array.isArray(value.arguments) &&
    value.arguments.every(isCommandArgument) &&
    Array.isArray(value.typeArguments) &&
    value.typeArguments.every(isTypeArgument)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "namespace", "vault", "rule", "transfer", "authority",
]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
