/**
 * @warden/types — Shared domain types for the Warden stack.
 *
 * These types are used across all Warden packages:
 * - Identities, owner keys, asset types, capability ids
 * - Command descriptors (inert off-chain hints)
 * - Domain events
 * - The protocol error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Runtime code limited to guards and the error class
 */

// Identity types
export type {
  Identity,
  OwnerKey,
  AssetType,
  CapabilityId,
  ActionTag,
  EntityKind,
} from "./identity.js";

// Command descriptors
export type {
  CommandTarget,
  CommandArgument,
  TypeArgument,
  CommandDescriptor,
} from "./command.js";

// Event types
export type {
  EventSource,
  EventMetadata,
  DomainEvent,
} from "./event.js";

// Errors
export { ProtocolError } from "./errors.js";
export type { ProtocolErrorCode } from "./errors.js";

// Runtime type guards
export {
  isIdentity,
  isUint64String,
  isCommandTarget,
  isCommandArgument,
  isTypeArgument,
  isCommandDescriptor,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
