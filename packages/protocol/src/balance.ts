/**
 * @warden/protocol — Balances in transit.
 *
 * A Balance is value that has left one store of value and not yet reached
 * another. It is an obligation of the unit that created it: the unit cannot
 * commit until the balance has been deposited or burned, so value is never
 * dropped. Consuming a balance twice fails.
 */

import type { Obligation } from "@warden/store";
import { ProtocolError } from "@warden/types";
import type { AssetType } from "@warden/types";
import { formatAmount } from "./amount.js";
import type { ProtocolUnit } from "./types.js";

const BALANCE_TOKEN = Symbol("warden.balance");

export class Balance implements Obligation {
  readonly assetType: AssetType;
  readonly value: bigint;
  readonly unitId: string;
  private _consumed = false;

  constructor(
    token: typeof BALANCE_TOKEN,
    unitId: string,
    assetType: AssetType,
    value: bigint,
  ) {
    if (token !== BALANCE_TOKEN) {
      throw new TypeError("Balances are created by the protocol only");
    }
    this.unitId = unitId;
    this.assetType = assetType;
    this.value = value;
  }

  get consumed(): boolean {
    return this._consumed;
  }

  get settled(): boolean {
    return this._consumed;
  }

  describe(): string {
    return `balance of ${formatAmount(this.value)} ${this.assetType} not deposited`;
  }

  /** @internal */
  consume(token: typeof BALANCE_TOKEN): bigint {
    if (token !== BALANCE_TOKEN) {
      throw new TypeError("Balances are consumed by the protocol only");
    }
    this._consumed = true;
    return this.value;
  }
}

export function createBalance(
  unit: ProtocolUnit,
  assetType: AssetType,
  value: bigint,
): Balance {
  const balance = new Balance(BALANCE_TOKEN, unit.id, assetType, value);
  unit.track(balance);
  return balance;
}

/**
 * Take the value out of a balance so it can be credited somewhere.
 *
 * @throws ProtocolError FOREIGN_OBJECT if the balance belongs to another unit
 * @throws ProtocolError BALANCE_CONSUMED if it was already deposited or burned
 */
export function consumeBalance(unit: ProtocolUnit, balance: Balance): bigint {
  unit.assertOpen();
  if (balance.unitId !== unit.id) {
    throw new ProtocolError(
      "FOREIGN_OBJECT",
      `Balance was created in unit ${balance.unitId}, not ${unit.id}`,
    );
  }
  if (balance.consumed) {
    throw new ProtocolError(
      "BALANCE_CONSUMED",
      `Balance of ${formatAmount(balance.value)} ${balance.assetType} was already consumed`,
    );
  }
  return balance.consume(BALANCE_TOKEN);
}
