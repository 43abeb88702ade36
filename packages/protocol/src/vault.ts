/**
 * @warden/protocol — Vault.
 *
 * Per-owner, multi-asset custody. A vault sits at the address derived from
 * (namespace, owner), so anyone can compute where an owner's funds live and
 * send to it without a lookup.
 *
 * Rules:
 * - At most one vault per owner per namespace
 * - Withdrawals never drive a balance below zero
 * - Deposits carry no authorization. Withdrawal is package-internal and
 *   reachable only through transfer (owner proof) or a rule (capability)
 */

import { ProtocolError } from "@warden/types";
import type { AssetType, Identity, OwnerKey } from "@warden/types";
import { addAmounts, assertAmount, formatAmount, formatBalances } from "./amount.js";
import { consumeBalance, createBalance } from "./balance.js";
import type { Balance } from "./balance.js";
import { assertIdentity } from "./namespace.js";
import type { Namespace } from "./namespace.js";
import { OwnershipProof } from "./ownership.js";
import type { InboxRecord, VaultRecord } from "./types.js";

export class Vault {
  readonly id: Identity;
  readonly namespace: Namespace;
  private readonly _record: VaultRecord;

  private constructor(namespace: Namespace, id: Identity, record: VaultRecord) {
    this.namespace = namespace;
    this.id = id;
    this._record = record;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  /**
   * Create the vault for `owner`. Value already sent to the owner's
   * address is adopted into the new vault.
   *
   * @throws ProtocolError ALREADY_EXISTS if the owner already has a vault
   */
  static create(namespace: Namespace, owner: OwnerKey): Vault {
    assertIdentity(owner, "owner key");
    if (namespace.exists(owner, "vault")) {
      throw new ProtocolError("ALREADY_EXISTS", `Vault for ${owner} already exists`);
    }

    const { unit } = namespace;
    const id = namespace.derive(owner, "vault");
    const inbox = unit.read(id);
    const adopted = inbox?.kind === "inbox" ? inbox.balances : new Map<AssetType, bigint>();

    const record: VaultRecord = {
      kind: "vault",
      namespaceId: namespace.id,
      owner,
      balances: new Map(adopted),
    };
    unit.put(id, record);
    unit.emit("vault.created", "vault", {
      vaultId: id,
      owner,
      adopted: formatBalances(adopted),
    });

    return new Vault(namespace, id, record);
  }

  /**
   * @throws ProtocolError NOT_FOUND if no vault lives at `id`
   */
  static load(namespace: Namespace, id: Identity): Vault {
    assertIdentity(id, "vault id");
    const record = namespace.unit.read(id);
    if (record?.kind !== "vault" || record.namespaceId !== namespace.id) {
      throw new ProtocolError("NOT_FOUND", `No vault at ${id}`);
    }
    return new Vault(namespace, id, record);
  }

  static forOwner(namespace: Namespace, owner: OwnerKey): Vault {
    assertIdentity(owner, "owner key");
    return Vault.load(namespace, namespace.derive(owner, "vault"));
  }

  // ─── Queries ───────────────────────────────────────────────────────

  get owner(): OwnerKey {
    return this._record.owner;
  }

  /** Zero when the vault holds no entry for the asset. */
  balanceOf(assetType: AssetType): bigint {
    return this._record.balances.get(assetType) ?? 0n;
  }

  hasEntry(assetType: AssetType): boolean {
    return this._record.balances.has(assetType);
  }

  balances(): ReadonlyMap<AssetType, bigint> {
    return new Map(this._record.balances);
  }

  // ─── Mutations ─────────────────────────────────────────────────────

  /**
   * Credit a balance to this vault, creating the entry if needed.
   *
   * @throws ProtocolError AMOUNT_OVERFLOW if the entry would exceed the maximum
   */
  deposit(balance: Balance): void {
    const current = this.balanceOf(balance.assetType);
    const next = addAmounts(current, balance.value);
    consumeBalance(this.namespace.unit, balance);
    this._record.balances.set(balance.assetType, next);
    this.namespace.unit.touch(this.id);
  }

  /**
   * @throws ProtocolError NOT_OWNER unless `proof` is a genuine proof for
   *   this vault's owner, produced in the same unit
   */
  assertOwner(proof: OwnershipProof): void {
    if (
      !OwnershipProof.isGenuine(proof) ||
      proof.unitId !== this.namespace.unit.id ||
      proof.key !== this._record.owner
    ) {
      throw new ProtocolError("NOT_OWNER", `Caller does not own vault ${this.id}`);
    }
  }
}

/**
 * Split `amount` off a vault's entry for `assetType`.
 * Not exported from the package: callers go through transfer or a rule.
 *
 * @throws ProtocolError INSUFFICIENT_BALANCE if the entry is missing or too small
 */
export function withdraw(vault: Vault, assetType: AssetType, amount: bigint): Balance {
  assertAmount(amount);
  const { unit } = vault.namespace;
  const record = unit.read(vault.id);
  if (record?.kind !== "vault") {
    throw new ProtocolError("NOT_FOUND", `No vault at ${vault.id}`);
  }

  const current = record.balances.get(assetType);
  if (current === undefined || current < amount) {
    throw new ProtocolError(
      "INSUFFICIENT_BALANCE",
      `Vault ${vault.id} holds ${formatAmount(current ?? 0n)} ${assetType}, needs ${formatAmount(amount)}`,
    );
  }
  record.balances.set(assetType, current - amount);
  unit.touch(vault.id);
  return createBalance(unit, assetType, amount);
}

/**
 * Deliver a balance to whatever sits at an owner's vault address: the vault
 * when it exists, otherwise the owner's pending inbox.
 *
 * @returns the vault address the value went to
 */
export function depositToOwner(
  namespace: Namespace,
  owner: OwnerKey,
  balance: Balance,
): Identity {
  assertIdentity(owner, "owner key");
  const { unit } = namespace;
  const id = namespace.derive(owner, "vault");
  const existing = unit.read(id);

  if (existing?.kind === "vault") {
    Vault.load(namespace, id).deposit(balance);
    return id;
  }

  const inbox: InboxRecord = existing?.kind === "inbox"
    ? existing
    : { kind: "inbox", namespaceId: namespace.id, owner, balances: new Map() };
  const next = addAmounts(inbox.balances.get(balance.assetType) ?? 0n, balance.value);
  consumeBalance(unit, balance);
  inbox.balances.set(balance.assetType, next);
  unit.put(id, inbox);
  return id;
}

/**
 * Value waiting at an owner's address for a vault to be created.
 */
export function pendingBalances(
  namespace: Namespace,
  owner: OwnerKey,
): ReadonlyMap<AssetType, bigint> {
  const record = namespace.unit.read(namespace.derive(owner, "vault"));
  return record?.kind === "inbox" ? new Map(record.balances) : new Map();
}
