/**
 * @warden/protocol — Transfers and exactly-once resolution.
 *
 * A transfer moves value immediately and hands back a TransferRequest.
 * The request is an obligation of the unit: the unit cannot commit until
 * the asset's rule has resolved it with a matching capability. A request
 * the rule refuses therefore aborts the whole unit, including the move.
 */

import type { Obligation } from "@warden/store";
import { ProtocolError } from "@warden/types";
import type { AssetType, Identity, OwnerKey } from "@warden/types";
import { formatAmount } from "./amount.js";
import type { Capability } from "./capability.js";
import type { OwnershipProof } from "./ownership.js";
import type { Rule } from "./rule.js";
import { depositToOwner, withdraw } from "./vault.js";
import type { Vault } from "./vault.js";

const REQUEST_TOKEN = Symbol("warden.transfer-request");

export type TransferRequestStatus = "pending" | "resolved";

export interface TransferRequestInit {
  readonly unitId: string;
  readonly assetType: AssetType;
  readonly amount: bigint;
  readonly sender: OwnerKey;
  readonly recipient: OwnerKey;
  readonly fromVault: Identity;
  readonly toVault: Identity;
}

export class TransferRequest implements Obligation {
  readonly unitId: string;
  readonly assetType: AssetType;
  readonly amount: bigint;
  readonly sender: OwnerKey;
  readonly recipient: OwnerKey;
  readonly fromVault: Identity;
  readonly toVault: Identity;
  private _status: TransferRequestStatus = "pending";

  constructor(token: typeof REQUEST_TOKEN, init: TransferRequestInit) {
    if (token !== REQUEST_TOKEN) {
      throw new TypeError("Transfer requests are created by the protocol only");
    }
    this.unitId = init.unitId;
    this.assetType = init.assetType;
    this.amount = init.amount;
    this.sender = init.sender;
    this.recipient = init.recipient;
    this.fromVault = init.fromVault;
    this.toVault = init.toVault;
  }

  get status(): TransferRequestStatus {
    return this._status;
  }

  get settled(): boolean {
    return this._status === "resolved";
  }

  describe(): string {
    return `unresolved transfer of ${formatAmount(this.amount)} ${this.assetType} to ${this.recipient}`;
  }

  /** @internal */
  markResolved(token: typeof REQUEST_TOKEN): void {
    if (token !== REQUEST_TOKEN) {
      throw new TypeError("Transfer requests are resolved by the protocol only");
    }
    this._status = "resolved";
  }
}

// =============================================================================
// Transfers
// =============================================================================

/**
 * Transfer to an owner by key. The destination is re-derived from the
 * key, so the value lands in the owner's vault, or in the owner's pending
 * inbox when no vault exists yet.
 *
 * @throws ProtocolError NOT_OWNER if `proof` does not own `from`
 * @throws ProtocolError INSUFFICIENT_BALANCE if `from` holds too little
 */
export function transfer(
  from: Vault,
  proof: OwnershipProof,
  recipient: OwnerKey,
  assetType: AssetType,
  amount: bigint,
): TransferRequest {
  from.assertOwner(proof);
  const balance = withdraw(from, assetType, amount);
  const toVault = depositToOwner(from.namespace, recipient, balance);
  return _request(from, recipient, toVault, assetType, amount);
}

/**
 * Transfer into an already-loaded vault.
 */
export function transferToVault(
  from: Vault,
  proof: OwnershipProof,
  to: Vault,
  assetType: AssetType,
  amount: bigint,
): TransferRequest {
  from.assertOwner(proof);
  if (to.namespace.unit !== from.namespace.unit) {
    throw new ProtocolError(
      "FOREIGN_OBJECT",
      `Vault ${to.id} was not opened in the sender's unit`,
    );
  }
  to.deposit(withdraw(from, assetType, amount));
  return _request(from, to.owner, to.id, assetType, amount);
}

function _request(
  from: Vault,
  recipient: OwnerKey,
  toVault: Identity,
  assetType: AssetType,
  amount: bigint,
): TransferRequest {
  const { unit } = from.namespace;
  const request = new TransferRequest(REQUEST_TOKEN, {
    unitId: unit.id,
    assetType,
    amount,
    sender: from.owner,
    recipient,
    fromVault: from.id,
    toVault,
  });
  unit.track(request);
  unit.emit("transfer.requested", "transfer", {
    assetType,
    amount: formatAmount(amount),
    sender: from.owner,
    recipient,
    fromVault: from.id,
    toVault,
  });
  return request;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve a pending request against its asset's rule.
 *
 * @throws ProtocolError REQUEST_CONSUMED if the request was already resolved
 * @throws ProtocolError INVALID_AUTHORIZATION if the rule governs another
 *   asset or the capability does not match
 */
export function resolve(rule: Rule, request: TransferRequest, capability: Capability): void {
  const { unit } = rule.namespace;
  unit.assertOpen();
  if (request.unitId !== unit.id) {
    throw new ProtocolError(
      "FOREIGN_OBJECT",
      `Transfer request belongs to unit ${request.unitId}`,
    );
  }
  if (request.status === "resolved") {
    throw new ProtocolError("REQUEST_CONSUMED", "Transfer request was already resolved");
  }
  if (request.assetType !== rule.assetType) {
    throw new ProtocolError(
      "INVALID_AUTHORIZATION",
      `Rule for ${rule.assetType} cannot resolve a ${request.assetType} transfer`,
    );
  }
  rule.authorize(capability);

  request.markResolved(REQUEST_TOKEN);
  unit.emit("transfer.resolved", "transfer", {
    ruleId: rule.id,
    assetType: request.assetType,
    amount: formatAmount(request.amount),
    fromVault: request.fromVault,
    toVault: request.toVault,
  });
}
