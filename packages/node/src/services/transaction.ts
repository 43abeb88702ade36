/**
 * TransactionContext — one atomic unit as seen by service callers.
 *
 * Addresses vaults and rules by identity and transfer requests by a
 * request id, so callers never juggle protocol handles. The context lives
 * only as long as its unit; every request it hands out must be resolved
 * through it before the unit can commit.
 */

import {
  Rule,
  Vault,
  OwnershipProof,
  resolve,
  transfer,
  transferToVault,
} from "@warden/protocol";
import type {
  Balance,
  Capability,
  Namespace,
  ObjectUid,
  TransferRequest,
} from "@warden/protocol";
import { ProtocolError } from "@warden/types";
import type {
  ActionTag,
  AssetType,
  CommandDescriptor,
  Identity,
  OwnerKey,
} from "@warden/types";

export class TransactionContext {
  readonly namespace: Namespace;
  private readonly _requests = new Map<Identity, TransferRequest>();

  constructor(namespace: Namespace) {
    this.namespace = namespace;
  }

  get sender(): Identity {
    return this.namespace.unit.sender;
  }

  get unitId(): string {
    return this.namespace.unit.id;
  }

  // ─── Proofs and lookups ────────────────────────────────────────────

  senderProof(): OwnershipProof {
    return OwnershipProof.fromSender(this.namespace.unit);
  }

  /**
   * @throws ProtocolError NOT_OWNER for a uid that was never issued
   */
  objectProof(uid: ObjectUid): OwnershipProof {
    return OwnershipProof.fromObject(this.namespace.unit, uid);
  }

  getVault(vaultId: Identity): Vault {
    return Vault.load(this.namespace, vaultId);
  }

  getRule(ruleId: Identity): Rule {
    return Rule.loadById(this.namespace, ruleId);
  }

  /**
   * @throws ProtocolError NOT_FOUND for an id this context did not issue
   */
  getRequest(requestId: Identity): TransferRequest {
    const request = this._requests.get(requestId);
    if (request === undefined) {
      throw new ProtocolError("NOT_FOUND", `No transfer request ${requestId} in this unit`);
    }
    return request;
  }

  // ─── Vaults ────────────────────────────────────────────────────────

  createVault(owner: OwnerKey): Identity {
    return Vault.create(this.namespace, owner).id;
  }

  deposit(vaultId: Identity, balance: Balance): void {
    this.getVault(vaultId).deposit(balance);
  }

  // ─── Transfers ─────────────────────────────────────────────────────

  /**
   * Send to an owner by key; the destination is re-derived from the key.
   * @returns id of the pending request
   */
  transfer(
    vaultId: Identity,
    proof: OwnershipProof,
    destinationOwner: OwnerKey,
    assetType: AssetType,
    amount: bigint,
  ): Identity {
    const request = transfer(this.getVault(vaultId), proof, destinationOwner, assetType, amount);
    return this._register(request);
  }

  transferToVault(
    vaultId: Identity,
    proof: OwnershipProof,
    destinationVaultId: Identity,
    assetType: AssetType,
    amount: bigint,
  ): Identity {
    const request = transferToVault(
      this.getVault(vaultId),
      proof,
      this.getVault(destinationVaultId),
      assetType,
      amount,
    );
    return this._register(request);
  }

  resolveTransfer(ruleId: Identity, requestId: Identity, capability: Capability): void {
    resolve(this.getRule(ruleId), this.getRequest(requestId), capability);
  }

  // ─── Policy ────────────────────────────────────────────────────────

  mint(ruleId: Identity, vaultId: Identity, amount: bigint, capability: Capability): void {
    this.getRule(ruleId).mint(this.getVault(vaultId), amount, capability);
  }

  burn(ruleId: Identity, vaultId: Identity, amount: bigint, capability: Capability): void {
    this.getRule(ruleId).burn(this.getVault(vaultId), amount, capability);
  }

  clawback(
    ruleId: Identity,
    fromVaultId: Identity,
    toVaultId: Identity,
    amount: bigint,
    capability: Capability,
  ): void {
    this.getRule(ruleId).clawback(
      this.getVault(fromVaultId),
      this.getVault(toVaultId),
      amount,
      capability,
    );
  }

  clawbackUnsafe(
    ruleId: Identity,
    fromVaultId: Identity,
    amount: bigint,
    capability: Capability,
  ): Balance {
    return this.getRule(ruleId).clawbackUnsafe(this.getVault(fromVaultId), amount, capability);
  }

  setCommandHint(
    ruleId: Identity,
    tag: ActionTag,
    descriptor: CommandDescriptor,
    capability: Capability,
  ): void {
    this.getRule(ruleId).setCommandHint(tag, descriptor, capability);
  }

  removeCommandHint(ruleId: Identity, tag: ActionTag, capability: Capability): boolean {
    return this.getRule(ruleId).removeCommandHint(tag, capability);
  }

  private _register(request: TransferRequest): Identity {
    const requestId = this.namespace.unit.freshId();
    this._requests.set(requestId, request);
    return requestId;
  }
}
