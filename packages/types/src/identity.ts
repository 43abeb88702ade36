/**
 * Identity Types
 *
 * Addressing primitives shared by every Warden package.
 *
 * Rules:
 * - Identities are 32-byte SHA-256 digests rendered as `0x` + 64 hex chars
 * - Owner keys and capability ids are identities
 * - Asset types are free-form names, scoped by the rule registered for them
 */

/**
 * A derived or freshly allocated record identity
 * (e.g., "0x3f1c…e09a").
 */
export type Identity = string;

/**
 * The key a vault is owned by: an authenticated sender address
 * or the identity of an object that owns vaults itself.
 */
export type OwnerKey = Identity;

/**
 * Name of a fungible asset (e.g., "USDX", "GOV").
 */
export type AssetType = string;

/**
 * Identifier of a capability issuer, stored on a rule at registration
 * and compared against every capability presented to it.
 */
export type CapabilityId = Identity;

/**
 * Tag for an advisory command hint on a rule (e.g., "transfer", "clawback").
 */
export type ActionTag = string;

/**
 * Kinds of entity whose identity is derived from a namespace.
 * Each kind is a separate derivation domain.
 */
export type EntityKind = "vault" | "rule" | "authority";
