/**
 * @warden/protocol — Ownership proofs.
 *
 * A proof names the owner key it stands for and the unit it was produced
 * in. Proofs come from exactly two places: the authenticated sender of a
 * unit, or an object the caller holds a live uid for. Neither can be built
 * from a bare key.
 */

import { ProtocolError } from "@warden/types";
import type { Identity, OwnerKey } from "@warden/types";
import type { ProtocolUnit } from "./types.js";

const genuineProofs = new WeakSet<OwnershipProof>();
const genuineUids = new WeakSet<ObjectUid>();

/**
 * Identity of an object that can own vaults (e.g., a shared pool).
 * Holding the ObjectUid is what entitles a caller to prove ownership
 * on the object's behalf.
 */
export class ObjectUid {
  readonly id: Identity;

  private constructor(id: Identity) {
    this.id = id;
    genuineUids.add(this);
  }

  static fresh(unit: ProtocolUnit): ObjectUid {
    return new ObjectUid(unit.freshId());
  }
}

export class OwnershipProof {
  readonly key: OwnerKey;
  readonly unitId: string;

  private constructor(key: OwnerKey, unitId: string) {
    this.key = key;
    this.unitId = unitId;
    genuineProofs.add(this);
  }

  static fromSender(unit: ProtocolUnit): OwnershipProof {
    unit.assertOpen();
    return new OwnershipProof(unit.sender, unit.id);
  }

  /**
   * Prove ownership for the object `uid` identifies.
   *
   * @throws ProtocolError NOT_OWNER for a uid not issued by ObjectUid.fresh
   */
  static fromObject(unit: ProtocolUnit, uid: ObjectUid): OwnershipProof {
    unit.assertOpen();
    if (!genuineUids.has(uid)) {
      throw new ProtocolError("NOT_OWNER", `Object ${uid.id} cannot prove ownership`);
    }
    return new OwnershipProof(uid.id, unit.id);
  }

  static isGenuine(value: unknown): value is OwnershipProof {
    return value instanceof OwnershipProof && genuineProofs.has(value);
  }
}
