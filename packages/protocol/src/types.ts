/**
 * @warden/protocol — Record types.
 *
 * Every piece of protocol state lives in one of these records, addressed by
 * an Identity in the store. Vault and rule records sit at addresses derived
 * from their namespace; authority records sit at fresh addresses.
 *
 * Amounts inside records are bigint. They are converted to decimal strings
 * only when they leave the protocol (events, API responses).
 */

import type { AtomicUnit } from "@warden/store";
import type {
  AssetType,
  CapabilityId,
  CommandDescriptor,
  Identity,
  OwnerKey,
} from "@warden/types";

// =============================================================================
// Records
// =============================================================================

/**
 * Root record of a namespace. Exactly one per deployment seed.
 */
export interface NamespaceRecord {
  readonly kind: "namespace";
  readonly seed: string;
  readonly createdAt: string;
}

/**
 * Per-owner, multi-asset custody record.
 *
 * An entry in `balances` is created lazily on first deposit and stays once
 * created, even at zero.
 */
export interface VaultRecord {
  readonly kind: "vault";
  readonly namespaceId: Identity;
  readonly owner: OwnerKey;
  readonly balances: Map<AssetType, bigint>;
}

/**
 * Value sent to an owner's vault address before the vault exists.
 * Occupies the vault address; Vault.create adopts and replaces it.
 */
export interface InboxRecord {
  readonly kind: "inbox";
  readonly namespaceId: Identity;
  readonly owner: OwnerKey;
  readonly balances: Map<AssetType, bigint>;
}

/**
 * Supply of an asset whose mint authority was surrendered to its rule.
 */
export interface LockedTreasury {
  totalSupply: bigint;
}

/**
 * Per-asset policy record.
 */
export interface RuleRecord {
  readonly kind: "rule";
  readonly namespaceId: Identity;
  readonly assetType: AssetType;
  readonly clawbackAllowed: boolean;
  readonly authorizationId: CapabilityId;
  readonly lockedTreasury: LockedTreasury | null;
  readonly commandHints: Map<string, CommandDescriptor>;
}

/**
 * Free-standing mint authority for one asset type.
 * `locked` is set once the authority has been handed to a rule.
 */
export interface AuthorityRecord {
  readonly kind: "authority";
  readonly namespaceId: Identity;
  readonly assetType: AssetType;
  totalSupply: bigint;
  locked: boolean;
}

export type ProtocolRecord =
  | NamespaceRecord
  | VaultRecord
  | InboxRecord
  | RuleRecord
  | AuthorityRecord;

/**
 * The unit type every protocol operation runs in.
 */
export type ProtocolUnit = AtomicUnit<ProtocolRecord>;
