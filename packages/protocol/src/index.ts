/**
 * @warden/protocol — Permissioned custody protocol.
 *
 * Value lives in per-owner vaults at addresses derived from a namespace.
 * Every asset type has a rule; every transfer produces a request that the
 * rule must resolve, with a matching capability, before the unit commits.
 *
 * Balances and transfer requests are obligations of their unit, so value
 * can be neither dropped nor left unauthorized.
 */

// Records
export type {
  NamespaceRecord,
  VaultRecord,
  InboxRecord,
  RuleRecord,
  LockedTreasury,
  AuthorityRecord,
  ProtocolRecord,
  ProtocolUnit,
} from "./types.js";

// Amounts
export {
  MAX_AMOUNT,
  assertAmount,
  addAmounts,
  reduceSupply,
  formatAmount,
  parseAmount,
  formatBalances,
} from "./amount.js";

// Namespace and derivation
export {
  Namespace,
  namespaceIdentity,
  deriveIdentity,
  deriveVaultAddress,
  deriveRuleAddress,
} from "./namespace.js";

// Value and authority
export type { Balance } from "./balance.js";
export { Capability } from "./capability.js";
export { OwnershipProof, ObjectUid } from "./ownership.js";
export { MintAuthority } from "./authority.js";

// Vaults, rules, transfers
export { Vault, depositToOwner, pendingBalances } from "./vault.js";
export { Rule } from "./rule.js";
export type { RuleRegistration } from "./rule.js";
export { TransferRequest, transfer, transferToVault, resolve } from "./transfer.js";
export type { TransferRequestStatus, TransferRequestInit } from "./transfer.js";
