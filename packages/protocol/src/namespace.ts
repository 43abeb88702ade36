/**
 * @warden/protocol — Namespace.
 *
 * The namespace is the single root every vault and rule address is derived
 * from. Derivation is pure: the same (namespace, kind, key) always yields
 * the same identity, and distinct kinds never collide because the kind is
 * part of the hashed content.
 */

import { hashIdentity } from "@warden/store";
import { isIdentity, ProtocolError } from "@warden/types";
import type { AssetType, EntityKind, Identity, OwnerKey } from "@warden/types";
import type { NamespaceRecord, ProtocolUnit } from "./types.js";

// ─── Derivation ──────────────────────────────────────────────────────

export function namespaceIdentity(seed: string): Identity {
  return hashIdentity({ domain: "warden/namespace", seed });
}

export function deriveIdentity(
  namespaceId: Identity,
  kind: EntityKind,
  key: string,
): Identity {
  assertIdentity(namespaceId, "namespace id");
  return hashIdentity({
    domain: "warden/derive",
    namespace: namespaceId,
    kind,
    key,
  });
}

/**
 * Address of the vault `owner` holds (or would hold) in a namespace.
 * Anyone can compute it; the vault need not exist.
 */
export function deriveVaultAddress(namespaceId: Identity, owner: OwnerKey): Identity {
  assertIdentity(owner, "owner key");
  return deriveIdentity(namespaceId, "vault", owner);
}

export function deriveRuleAddress(namespaceId: Identity, assetType: AssetType): Identity {
  assertAssetType(assetType);
  return deriveIdentity(namespaceId, "rule", assetType);
}

export function assertIdentity(value: string, what: string): void {
  if (!isIdentity(value)) {
    throw new ProtocolError("INVALID_IDENTITY", `Malformed ${what}: "${value}"`);
  }
}

export function assertAssetType(assetType: AssetType): void {
  if (assetType.length === 0 || assetType.trim() !== assetType) {
    throw new ProtocolError(
      "INVALID_IDENTITY",
      `Asset type must be a non-empty name without surrounding whitespace`,
    );
  }
}

// ─── Namespace ───────────────────────────────────────────────────────

/**
 * A namespace bound to the unit it was opened in.
 * Vault and Rule handles obtained through it act in that same unit.
 */
export class Namespace {
  readonly id: Identity;
  readonly unit: ProtocolUnit;

  private constructor(unit: ProtocolUnit, id: Identity) {
    this.unit = unit;
    this.id = id;
  }

  /**
   * Create the namespace for a deployment seed.
   *
   * @throws ProtocolError ALREADY_EXISTS if the seed was used before
   */
  static create(unit: ProtocolUnit, seed: string): Namespace {
    const id = namespaceIdentity(seed);
    if (unit.has(id)) {
      throw new ProtocolError("ALREADY_EXISTS", `Namespace for seed "${seed}" already exists`);
    }

    const record: NamespaceRecord = {
      kind: "namespace",
      seed,
      createdAt: new Date().toISOString(),
    };
    unit.put(id, record);
    unit.emit("namespace.created", "namespace", { namespaceId: id, seed });

    return new Namespace(unit, id);
  }

  /**
   * @throws ProtocolError NOT_FOUND if no namespace lives at `id`
   */
  static load(unit: ProtocolUnit, id: Identity): Namespace {
    assertIdentity(id, "namespace id");
    if (unit.read(id)?.kind !== "namespace") {
      throw new ProtocolError("NOT_FOUND", `No namespace at ${id}`);
    }
    return new Namespace(unit, id);
  }

  derive(key: string, kind: EntityKind): Identity {
    return deriveIdentity(this.id, kind, key);
  }

  /**
   * True when a live entity of `kind` sits at the derived address.
   * A pending inbox at a vault address does not count as a vault.
   */
  exists(key: string, kind: EntityKind): boolean {
    return this.unit.read(this.derive(key, kind))?.kind === kind;
  }
}
