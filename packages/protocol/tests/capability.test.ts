/**
 * Tests for capabilities, ownership proofs and the mint authority handle.
 */

import { describe, it, expect } from "vitest";
import { SYSTEM_SENDER } from "@warden/store";
import { MintAuthority } from "../src/authority.js";
import { Capability } from "../src/capability.js";
import { ObjectUid, OwnershipProof } from "../src/ownership.js";
import { depositToOwner } from "../src/vault.js";
import { ALICE, createFixture, run } from "./helpers.js";

describe("Capability", () => {
  it("mints distinct ids for the same label", () => {
    const a = Capability.create("admin");
    const b = Capability.create("admin");
    expect(a.id).toMatch(/^0x[0-9a-f]{64}$/);
    expect(a.id).not.toBe(b.id);
    expect(a.label).toBe("admin");
  });

  it("recognizes only instances it issued", () => {
    const real = Capability.create("admin");
    const copy: Capability = { id: real.id, label: real.label };

    expect(Capability.isGenuine(real)).toBe(true);
    expect(Capability.isGenuine(copy)).toBe(false);
    expect(Capability.isGenuine(Object.create(Capability.prototype))).toBe(false);
  });
});

describe("OwnershipProof", () => {
  it("carries the unit sender's key", () => {
    const fixture = createFixture();
    run(fixture, ALICE, (ns) => {
      const proof = OwnershipProof.fromSender(ns.unit);
      expect(proof.key).toBe(ALICE);
      expect(proof.unitId).toBe(ns.unit.id);
      expect(OwnershipProof.isGenuine(proof)).toBe(true);
    });
  });

  it("refuses a uid that was not freshly allocated", () => {
    const fixture = createFixture();
    run(fixture, ALICE, (ns) => {
      const real = ObjectUid.fresh(ns.unit);
      const copy: ObjectUid = { id: real.id };
      expect(() => OwnershipProof.fromObject(ns.unit, copy)).toThrow(
        expect.objectContaining({ name: "ProtocolError", code: "NOT_OWNER" }),
      );
    });
  });

  it("cannot be produced in a closed unit", () => {
    const fixture = createFixture();
    const unit = fixture.env.begin(ALICE);
    unit.abort();
    expect(() => OwnershipProof.fromSender(unit)).toThrow(
      expect.objectContaining({ code: "UNIT_CLOSED" }),
    );
  });
});

describe("MintAuthority", () => {
  it("tracks supply across mint and burn", () => {
    const fixture = createFixture();

    run(fixture, SYSTEM_SENDER, (ns) => {
      const authority = MintAuthority.create(ns, "USDX");
      const minted = authority.mint(ns, 50n);
      expect(authority.totalSupply(ns)).toBe(50n);
      authority.burn(ns, minted);
      expect(authority.totalSupply(ns)).toBe(0n);
    });
  });

  it("lives at the address derived from its asset type, once", () => {
    const fixture = createFixture();
    const authority = run(fixture, SYSTEM_SENDER, (ns) => MintAuthority.create(ns, "USDX"));

    run(fixture, SYSTEM_SENDER, (ns) => {
      expect(authority.id).toBe(ns.derive("USDX", "authority"));
      expect(ns.exists("USDX", "authority")).toBe(true);
    });
    expect(() =>
      run(fixture, ALICE, (ns) => MintAuthority.create(ns, "USDX")),
    ).toThrow(expect.objectContaining({ code: "ALREADY_EXISTS" }));
  });

  it("discards supply minted in an aborted unit", () => {
    const fixture = createFixture();
    const authority = run(fixture, SYSTEM_SENDER, (ns) => MintAuthority.create(ns, "USDX"));

    expect(() =>
      run(fixture, SYSTEM_SENDER, (ns) => {
        depositToOwner(ns, ALICE, authority.mint(ns, 50n));
        throw new Error("abandon");
      }),
    ).toThrow("abandon");
    expect(run(fixture, SYSTEM_SENDER, (ns) => authority.totalSupply(ns))).toBe(0n);
  });

  it("refuses to burn another asset's balance", () => {
    const fixture = createFixture();

    expect(() =>
      run(fixture, SYSTEM_SENDER, (ns) => {
        const usdx = MintAuthority.create(ns, "USDX");
        const gov = MintAuthority.create(ns, "GOV");
        usdx.burn(ns, gov.mint(ns, 1n));
      }),
    ).toThrow(expect.objectContaining({ code: "ASSET_MISMATCH" }));
  });
});
