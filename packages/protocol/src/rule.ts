/**
 * @warden/protocol — Rule.
 *
 * The per-asset policy object. A rule holds the authorization id that every
 * privileged call must present a matching capability for, the clawback
 * switch, an optional locked treasury (managed assets), and advisory
 * command hints for off-chain clients.
 *
 * Check order for privileged operations is part of the contract:
 * feature switches (clawback, managed treasury) are checked before the
 * capability, so a disabled feature reports itself even to a stranger.
 */

import { isCommandDescriptor, ProtocolError } from "@warden/types";
import type {
  ActionTag,
  AssetType,
  CapabilityId,
  CommandDescriptor,
  Identity,
} from "@warden/types";
import { addAmounts, assertAmount, formatAmount, reduceSupply } from "./amount.js";
import type { Balance } from "./balance.js";
import { consumeBalance, createBalance } from "./balance.js";
import { Capability } from "./capability.js";
import { MintAuthority } from "./authority.js";
import { assertAssetType, assertIdentity } from "./namespace.js";
import type { Namespace } from "./namespace.js";
import type { LockedTreasury, RuleRecord } from "./types.js";
import { withdraw } from "./vault.js";
import type { Vault } from "./vault.js";

export interface RuleRegistration {
  readonly assetType: AssetType;
  readonly clawbackAllowed: boolean;
  readonly authorizationId: CapabilityId;
}

export class Rule {
  readonly id: Identity;
  readonly namespace: Namespace;
  private readonly _record: RuleRecord;

  private constructor(namespace: Namespace, id: Identity, record: RuleRecord) {
    this.namespace = namespace;
    this.id = id;
    this._record = record;
  }

  // ─── Registration ──────────────────────────────────────────────────

  /**
   * Register the rule for an asset type.
   *
   * @throws ProtocolError ALREADY_EXISTS if the asset type already has a rule
   */
  static register(namespace: Namespace, registration: RuleRegistration): Rule {
    return Rule._register(namespace, registration, null);
  }

  /**
   * Register a rule that takes over the asset's mint authority.
   * Only a fresh authority (nothing minted yet) can be handed over.
   *
   * @throws ProtocolError SUPPLY_MUST_BE_ZERO if the authority has minted
   * @throws ProtocolError AUTHORITY_LOCKED if the authority already belongs to a rule
   */
  static registerManaged(
    namespace: Namespace,
    registration: RuleRegistration,
    authority: MintAuthority,
  ): Rule {
    if (!MintAuthority.isGenuine(authority)) {
      throw new ProtocolError("NOT_FOUND", "Unknown mint authority");
    }
    if (authority.assetType !== registration.assetType) {
      throw new ProtocolError(
        "ASSET_MISMATCH",
        `Authority for ${authority.assetType} cannot manage ${registration.assetType}`,
      );
    }
    Rule._assertUnregistered(namespace, registration.assetType);
    if (authority.isLocked(namespace)) {
      throw new ProtocolError(
        "AUTHORITY_LOCKED",
        `Mint authority for ${authority.assetType} is already held by a rule`,
      );
    }

    const supply = authority.totalSupply(namespace);
    if (supply !== 0n) {
      throw new ProtocolError(
        "SUPPLY_MUST_BE_ZERO",
        `Cannot lock ${registration.assetType} treasury with ${formatAmount(supply)} already minted`,
      );
    }

    authority.lock(namespace);
    return Rule._register(namespace, registration, { totalSupply: 0n });
  }

  private static _register(
    namespace: Namespace,
    registration: RuleRegistration,
    lockedTreasury: LockedTreasury | null,
  ): Rule {
    const { assetType, clawbackAllowed, authorizationId } = registration;
    assertIdentity(authorizationId, "authorization id");
    Rule._assertUnregistered(namespace, assetType);

    const id = namespace.derive(assetType, "rule");
    const record: RuleRecord = {
      kind: "rule",
      namespaceId: namespace.id,
      assetType,
      clawbackAllowed,
      authorizationId,
      lockedTreasury,
      commandHints: new Map(),
    };
    namespace.unit.put(id, record);
    namespace.unit.emit("rule.registered", "rule", {
      ruleId: id,
      assetType,
      clawbackAllowed,
      managed: lockedTreasury !== null,
    });

    return new Rule(namespace, id, record);
  }

  private static _assertUnregistered(namespace: Namespace, assetType: AssetType): void {
    assertAssetType(assetType);
    if (namespace.exists(assetType, "rule")) {
      throw new ProtocolError("ALREADY_EXISTS", `Rule for ${assetType} already exists`);
    }
  }

  static load(namespace: Namespace, assetType: AssetType): Rule {
    assertAssetType(assetType);
    return Rule.loadById(namespace, namespace.derive(assetType, "rule"));
  }

  /**
   * @throws ProtocolError NOT_FOUND if no rule lives at `id`
   */
  static loadById(namespace: Namespace, id: Identity): Rule {
    assertIdentity(id, "rule id");
    const record = namespace.unit.read(id);
    if (record?.kind !== "rule" || record.namespaceId !== namespace.id) {
      throw new ProtocolError("NOT_FOUND", `No rule at ${id}`);
    }
    return new Rule(namespace, id, record);
  }

  // ─── Queries ───────────────────────────────────────────────────────

  get assetType(): AssetType {
    return this._record.assetType;
  }

  get clawbackAllowed(): boolean {
    return this._record.clawbackAllowed;
  }

  get authorizationId(): CapabilityId {
    return this._record.authorizationId;
  }

  get isManaged(): boolean {
    return this._record.lockedTreasury !== null;
  }

  /** Supply of a managed asset; undefined when the rule holds no treasury. */
  get totalSupply(): bigint | undefined {
    return this._record.lockedTreasury?.totalSupply;
  }

  commandHint(tag: ActionTag): CommandDescriptor | undefined {
    return this._record.commandHints.get(tag);
  }

  commandHints(): ReadonlyMap<ActionTag, CommandDescriptor> {
    return new Map(this._record.commandHints);
  }

  // ─── Authorization ─────────────────────────────────────────────────

  /**
   * @throws ProtocolError INVALID_AUTHORIZATION unless `capability` is
   *   genuine and matches this rule's authorization id
   */
  authorize(capability: Capability): void {
    if (
      !Capability.isGenuine(capability) ||
      capability.id !== this._record.authorizationId
    ) {
      throw new ProtocolError(
        "INVALID_AUTHORIZATION",
        `Capability does not authorize the ${this.assetType} rule`,
      );
    }
  }

  // ─── Treasury ──────────────────────────────────────────────────────

  /**
   * Mint new supply of a managed asset straight into a vault.
   *
   * @throws ProtocolError NOT_MANAGED_TREASURY if the rule holds no treasury
   */
  mint(vault: Vault, amount: bigint, capability: Capability): void {
    const treasury = this._treasury();
    this.authorize(capability);
    this._assertSameNamespace(vault);
    assertAmount(amount);

    const supply = addAmounts(treasury.totalSupply, amount);
    vault.deposit(createBalance(this.namespace.unit, this.assetType, amount));
    treasury.totalSupply = supply;
    this.namespace.unit.touch(this.id);
    this.namespace.unit.emit("supply.minted", "rule", {
      ruleId: this.id,
      assetType: this.assetType,
      vaultId: vault.id,
      amount: formatAmount(amount),
      totalSupply: formatAmount(supply),
    });
  }

  /**
   * Burn supply of a managed asset out of a vault.
   */
  burn(vault: Vault, amount: bigint, capability: Capability): void {
    const treasury = this._treasury();
    this.authorize(capability);
    this._assertSameNamespace(vault);

    const balance = withdraw(vault, this.assetType, amount);
    consumeBalance(this.namespace.unit, balance);
    treasury.totalSupply = reduceSupply(treasury.totalSupply, amount, this.assetType);
    this.namespace.unit.touch(this.id);
    this.namespace.unit.emit("supply.burned", "rule", {
      ruleId: this.id,
      assetType: this.assetType,
      vaultId: vault.id,
      amount: formatAmount(amount),
      totalSupply: formatAmount(treasury.totalSupply),
    });
  }

  // ─── Clawback ──────────────────────────────────────────────────────

  /**
   * Move value between two vaults without the source owner's consent.
   *
   * @throws ProtocolError CLAWBACK_DISABLED if the rule does not allow clawback
   */
  clawback(from: Vault, to: Vault, amount: bigint, capability: Capability): void {
    this._assertClawbackAllowed();
    this.authorize(capability);
    this._assertSameNamespace(from);
    this._assertSameNamespace(to);

    to.deposit(withdraw(from, this.assetType, amount));
    this.namespace.unit.emit("balance.clawedback", "rule", {
      ruleId: this.id,
      assetType: this.assetType,
      fromVault: from.id,
      toVault: to.id,
      amount: formatAmount(amount),
    });
  }

  /**
   * Take value out of a vault and hand it to the caller as a balance.
   * Refused for managed assets, whose supply must stay inside vaults.
   *
   * @throws ProtocolError CANNOT_CLAWBACK_MANAGED for managed assets
   */
  clawbackUnsafe(from: Vault, amount: bigint, capability: Capability): Balance {
    this._assertClawbackAllowed();
    if (this.isManaged) {
      throw new ProtocolError(
        "CANNOT_CLAWBACK_MANAGED",
        `${this.assetType} is a managed asset; use clawback to another vault`,
      );
    }
    this.authorize(capability);
    this._assertSameNamespace(from);

    const balance = withdraw(from, this.assetType, amount);
    this.namespace.unit.emit("balance.clawedback", "rule", {
      ruleId: this.id,
      assetType: this.assetType,
      fromVault: from.id,
      toVault: null,
      amount: formatAmount(amount),
    });
    return balance;
  }

  // ─── Command hints ─────────────────────────────────────────────────

  /**
   * Attach (or replace) the advisory command descriptor for an action.
   * Hints are stored for clients only; no protocol path reads them.
   *
   * @throws ProtocolError INVALID_DESCRIPTOR for a malformed descriptor
   */
  setCommandHint(tag: ActionTag, descriptor: CommandDescriptor, capability: Capability): void {
    this.authorize(capability);
    if (tag.length === 0 || !isCommandDescriptor(descriptor)) {
      throw new ProtocolError(
        "INVALID_DESCRIPTOR",
        `Command hint "${tag}" is not a valid command descriptor`,
      );
    }

    this._record.commandHints.set(tag, structuredClone(descriptor));
    this.namespace.unit.touch(this.id);
    this.namespace.unit.emit("rule.hint.set", "rule", {
      ruleId: this.id,
      assetType: this.assetType,
      tag,
    });
  }

  /**
   * @returns whether a hint was removed
   */
  removeCommandHint(tag: ActionTag, capability: Capability): boolean {
    this.authorize(capability);
    if (!this._record.commandHints.delete(tag)) {
      return false;
    }

    this.namespace.unit.touch(this.id);
    this.namespace.unit.emit("rule.hint.removed", "rule", {
      ruleId: this.id,
      assetType: this.assetType,
      tag,
    });
    return true;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _treasury(): LockedTreasury {
    const treasury = this._record.lockedTreasury;
    if (treasury === null) {
      throw new ProtocolError(
        "NOT_MANAGED_TREASURY",
        `${this.assetType} has no treasury locked in its rule`,
      );
    }
    return treasury;
  }

  private _assertClawbackAllowed(): void {
    if (!this._record.clawbackAllowed) {
      throw new ProtocolError(
        "CLAWBACK_DISABLED",
        `Clawback is disabled for ${this.assetType}`,
      );
    }
  }

  private _assertSameNamespace(vault: Vault): void {
    if (vault.namespace.unit !== this.namespace.unit || vault.namespace.id !== this.namespace.id) {
      throw new ProtocolError(
        "FOREIGN_OBJECT",
        `Vault ${vault.id} was not opened in this rule's unit`,
      );
    }
  }
}
