/**
 * @warden/protocol — Capabilities.
 *
 * A capability is an unforgeable token whose id a rule compares against the
 * authorization id it was registered with. Only Capability.create mints
 * one, and only genuine instances pass isGenuine, so a look-alike object
 * carrying a copied id is rejected.
 */

import { randomBytes } from "node:crypto";
import { hashIdentity } from "@warden/store";
import type { CapabilityId } from "@warden/types";

const genuine = new WeakSet<Capability>();

export class Capability {
  readonly id: CapabilityId;
  readonly label: string;

  private constructor(id: CapabilityId, label: string) {
    this.id = id;
    this.label = label;
    genuine.add(this);
  }

  /**
   * Mint a new capability. Two calls with the same label yield distinct ids.
   */
  static create(label: string): Capability {
    const id = hashIdentity({
      domain: "warden/capability",
      label,
      nonce: randomBytes(32).toString("hex"),
    });
    return new Capability(id, label);
  }

  static isGenuine(value: unknown): value is Capability {
    return value instanceof Capability && genuine.has(value);
  }
}
