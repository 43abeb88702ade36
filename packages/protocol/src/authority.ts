/**
 * @warden/protocol — Mint authority.
 *
 * A MintAuthority handle is the right to mint and burn one asset type.
 * There is at most one per asset type in a namespace, at an address
 * derived from the asset type. Its supply lives in that record so that
 * minting inside an aborted unit leaves no trace. Handing the authority to a rule (Rule.registerManaged)
 * locks it: from then on only the rule can change the supply.
 */

import { ProtocolError } from "@warden/types";
import type { AssetType, Identity } from "@warden/types";
import { addAmounts, assertAmount, formatAmount, reduceSupply } from "./amount.js";
import { consumeBalance, createBalance } from "./balance.js";
import type { Balance } from "./balance.js";
import { assertAssetType } from "./namespace.js";
import type { Namespace } from "./namespace.js";
import type { AuthorityRecord } from "./types.js";

const genuine = new WeakSet<MintAuthority>();

export class MintAuthority {
  readonly id: Identity;
  readonly assetType: AssetType;

  private constructor(id: Identity, assetType: AssetType) {
    this.id = id;
    this.assetType = assetType;
    genuine.add(this);
  }

  /**
   * @throws ProtocolError ALREADY_EXISTS if the asset type already has an
   * authority, locked into a rule or not
   */
  static create(namespace: Namespace, assetType: AssetType): MintAuthority {
    assertAssetType(assetType);
    const { unit } = namespace;
    const id = namespace.derive(assetType, "authority");
    if (unit.has(id)) {
      throw new ProtocolError(
        "ALREADY_EXISTS",
        `Mint authority for ${assetType} already exists`,
      );
    }
    const record: AuthorityRecord = {
      kind: "authority",
      namespaceId: namespace.id,
      assetType,
      totalSupply: 0n,
      locked: false,
    };
    unit.put(id, record);
    unit.emit("authority.created", "authority", { authorityId: id, assetType });
    return new MintAuthority(id, assetType);
  }

  static isGenuine(value: unknown): value is MintAuthority {
    return value instanceof MintAuthority && genuine.has(value);
  }

  totalSupply(namespace: Namespace): bigint {
    return this._record(namespace).totalSupply;
  }

  isLocked(namespace: Namespace): boolean {
    return this._record(namespace).locked;
  }

  /**
   * Mint `amount` new units as a balance the caller must deposit.
   *
   * @throws ProtocolError AUTHORITY_LOCKED once the authority belongs to a rule
   */
  mint(namespace: Namespace, amount: bigint): Balance {
    assertAmount(amount);
    const record = this._unlocked(namespace);
    record.totalSupply = addAmounts(record.totalSupply, amount);
    namespace.unit.touch(this.id);
    namespace.unit.emit("supply.minted", "authority", {
      authorityId: this.id,
      assetType: this.assetType,
      amount: formatAmount(amount),
      totalSupply: formatAmount(record.totalSupply),
    });
    return createBalance(namespace.unit, this.assetType, amount);
  }

  burn(namespace: Namespace, balance: Balance): void {
    const record = this._unlocked(namespace);
    if (balance.assetType !== this.assetType) {
      throw new ProtocolError(
        "ASSET_MISMATCH",
        `Cannot burn ${balance.assetType} with the ${this.assetType} authority`,
      );
    }
    const amount = consumeBalance(namespace.unit, balance);
    record.totalSupply = reduceSupply(record.totalSupply, amount, this.assetType);
    namespace.unit.touch(this.id);
    namespace.unit.emit("supply.burned", "authority", {
      authorityId: this.id,
      assetType: this.assetType,
      amount: formatAmount(amount),
      totalSupply: formatAmount(record.totalSupply),
    });
  }

  /**
   * Surrender the authority. Returns the supply at the moment of locking.
   * @internal
   */
  lock(namespace: Namespace): bigint {
    const record = this._unlocked(namespace);
    record.locked = true;
    namespace.unit.touch(this.id);
    return record.totalSupply;
  }

  private _unlocked(namespace: Namespace): AuthorityRecord {
    const record = this._record(namespace);
    if (record.locked) {
      throw new ProtocolError(
        "AUTHORITY_LOCKED",
        `Mint authority for ${this.assetType} is held by its rule`,
      );
    }
    return record;
  }

  private _record(namespace: Namespace): AuthorityRecord {
    const record = namespace.unit.read(this.id);
    if (record?.kind !== "authority") {
      throw new ProtocolError("NOT_FOUND", `No mint authority at ${this.id}`);
    }
    return record;
  }
}
