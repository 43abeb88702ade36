/**
 * Tests for Rule — registration, managed treasury, clawback and command hints.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SYSTEM_SENDER } from "@warden/store";
import type { CommandDescriptor } from "@warden/types";
import { MintAuthority } from "../src/authority.js";
import { Capability } from "../src/capability.js";
import { deriveRuleAddress } from "../src/namespace.js";
import { Rule } from "../src/rule.js";
import { Vault, depositToOwner } from "../src/vault.js";
import {
  ALICE,
  BOB,
  CAROL,
  balanceOf,
  createFixture,
  fund,
  run,
  setupAsset,
  view,
} from "./helpers.js";
import type { Fixture } from "./helpers.js";

const HINT: CommandDescriptor = {
  target: { kind: "alias", name: "usdx-policy" },
  moduleName: "policy",
  functionName: "approve",
  arguments: [
    { kind: "mutShared", id: `0x${"0d".repeat(32)}` },
    { kind: "placeholder", tag: "request" },
  ],
  typeArguments: [{ kind: "system" }],
};

/**
 * Register GOV as a managed asset and return its capability.
 */
function setupManaged(fixture: Fixture, clawbackAllowed: boolean): Capability {
  const capability = Capability.create("GOV-admin");
  run(fixture, SYSTEM_SENDER, (ns) => {
    const authority = MintAuthority.create(ns, "GOV");
    Rule.registerManaged(
      ns,
      { assetType: "GOV", clawbackAllowed, authorizationId: capability.id },
      authority,
    );
  });
  return capability;
}

function createVaults(fixture: Fixture, ...owners: string[]): void {
  run(fixture, SYSTEM_SENDER, (ns) => {
    for (const owner of owners) Vault.create(ns, owner);
  });
}

describe("Rule", () => {
  let fixture: Fixture;

  beforeEach(() => {
    fixture = createFixture();
  });

  // ─── Registration ────────────────────────────────────────────────

  describe("register", () => {
    it("stores the rule at the derived address", () => {
      const { capability } = setupAsset(fixture, "USDX", false);

      view(fixture, (ns) => {
        const rule = Rule.load(ns, "USDX");
        expect(rule.id).toBe(deriveRuleAddress(ns.id, "USDX"));
        expect(rule.clawbackAllowed).toBe(false);
        expect(rule.authorizationId).toBe(capability.id);
        expect(rule.isManaged).toBe(false);
        expect(rule.totalSupply).toBeUndefined();
      });
    });

    it("rejects a second rule for the same asset", () => {
      setupAsset(fixture, "USDX", false);
      expect(() => setupAsset(fixture, "USDX", true)).toThrow(
        expect.objectContaining({ code: "ALREADY_EXISTS" }),
      );
    });

    it("rejects a malformed authorization id", () => {
      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.register(ns, { assetType: "USDX", clawbackAllowed: false, authorizationId: "admin" }),
        ),
      ).toThrow(expect.objectContaining({ code: "INVALID_IDENTITY" }));
    });

    it("fails NOT_FOUND for an unregistered asset", () => {
      expect(() => view(fixture, (ns) => Rule.load(ns, "NOPE"))).toThrow(
        expect.objectContaining({ code: "NOT_FOUND" }),
      );
    });
  });

  describe("registerManaged", () => {
    it("locks a fresh authority into the rule", () => {
      setupManaged(fixture, false);

      view(fixture, (ns) => {
        const rule = Rule.load(ns, "GOV");
        expect(rule.isManaged).toBe(true);
        expect(rule.totalSupply).toBe(0n);
      });
    });

    it("fails SUPPLY_MUST_BE_ZERO once the authority has minted", () => {
      const capability = Capability.create("GOV-admin");

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) => {
          const authority = MintAuthority.create(ns, "GOV");
          depositToOwner(ns, ALICE, authority.mint(ns, 1n));
          Rule.registerManaged(
            ns,
            { assetType: "GOV", clawbackAllowed: false, authorizationId: capability.id },
            authority,
          );
        }),
      ).toThrow(expect.objectContaining({ code: "SUPPLY_MUST_BE_ZERO" }));
    });

    it("takes the authority out of the caller's hands", () => {
      const capability = Capability.create("GOV-admin");

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) => {
          const authority = MintAuthority.create(ns, "GOV");
          Rule.registerManaged(
            ns,
            { assetType: "GOV", clawbackAllowed: false, authorizationId: capability.id },
            authority,
          );
          depositToOwner(ns, ALICE, authority.mint(ns, 1n));
        }),
      ).toThrow(expect.objectContaining({ code: "AUTHORITY_LOCKED" }));
    });

    it("leaves no second authority to mint around the rule", () => {
      const capability = setupManaged(fixture, false);
      createVaults(fixture, ALICE);

      expect(() =>
        run(fixture, ALICE, (ns) => {
          const rogue = MintAuthority.create(ns, "GOV");
          Vault.forOwner(ns, ALICE).deposit(rogue.mint(ns, 1000n));
        }),
      ).toThrow(expect.objectContaining({ code: "ALREADY_EXISTS" }));

      run(fixture, SYSTEM_SENDER, (ns) =>
        Rule.load(ns, "GOV").mint(Vault.forOwner(ns, ALICE), 10n, capability),
      );
      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "GOV").burn(Vault.forOwner(ns, ALICE), 11n, capability),
        ),
      ).toThrow(expect.objectContaining({ code: "INSUFFICIENT_BALANCE" }));
      expect(balanceOf(fixture, ALICE, "GOV")).toBe(10n);
      expect(view(fixture, (ns) => Rule.load(ns, "GOV").totalSupply)).toBe(10n);
    });

    it("rejects an authority for a different asset", () => {
      const capability = Capability.create("GOV-admin");

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.registerManaged(
            ns,
            { assetType: "GOV", clawbackAllowed: false, authorizationId: capability.id },
            MintAuthority.create(ns, "USDX"),
          ),
        ),
      ).toThrow(expect.objectContaining({ code: "ASSET_MISMATCH" }));
    });
  });

  // ─── Managed treasury ────────────────────────────────────────────

  describe("mint and burn", () => {
    it("mints into a vault and tracks supply", () => {
      const capability = setupManaged(fixture, false);
      createVaults(fixture, ALICE);

      run(fixture, SYSTEM_SENDER, (ns) =>
        Rule.load(ns, "GOV").mint(Vault.forOwner(ns, ALICE), 1000n, capability),
      );

      expect(balanceOf(fixture, ALICE, "GOV")).toBe(1000n);
      expect(view(fixture, (ns) => Rule.load(ns, "GOV").totalSupply)).toBe(1000n);
    });

    it("burns out of a vault and reduces supply", () => {
      const capability = setupManaged(fixture, false);
      createVaults(fixture, ALICE);

      run(fixture, SYSTEM_SENDER, (ns) => {
        const rule = Rule.load(ns, "GOV");
        const vault = Vault.forOwner(ns, ALICE);
        rule.mint(vault, 1000n, capability);
        rule.burn(vault, 400n, capability);
      });

      expect(balanceOf(fixture, ALICE, "GOV")).toBe(600n);
      expect(view(fixture, (ns) => Rule.load(ns, "GOV").totalSupply)).toBe(600n);
    });

    it("propagates INSUFFICIENT_BALANCE from burn", () => {
      const capability = setupManaged(fixture, false);
      createVaults(fixture, ALICE);

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "GOV").burn(Vault.forOwner(ns, ALICE), 1n, capability),
        ),
      ).toThrow(expect.objectContaining({ code: "INSUFFICIENT_BALANCE" }));
    });

    it("fails NOT_MANAGED_TREASURY on an unmanaged asset, before checking the capability", () => {
      setupAsset(fixture, "USDX", false);
      createVaults(fixture, ALICE);

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "USDX").mint(Vault.forOwner(ns, ALICE), 1n, Capability.create("x")),
        ),
      ).toThrow(expect.objectContaining({ code: "NOT_MANAGED_TREASURY" }));
    });

    it("fails INVALID_AUTHORIZATION with a foreign capability", () => {
      setupManaged(fixture, false);
      createVaults(fixture, ALICE);

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "GOV").mint(Vault.forOwner(ns, ALICE), 1n, Capability.create("GOV-admin")),
        ),
      ).toThrow(expect.objectContaining({ code: "INVALID_AUTHORIZATION" }));
    });
  });

  // ─── Clawback ────────────────────────────────────────────────────

  describe("clawback", () => {
    it("moves value without the owner's proof", () => {
      const capability = setupManaged(fixture, true);
      createVaults(fixture, ALICE, CAROL);

      run(fixture, SYSTEM_SENDER, (ns) =>
        Rule.load(ns, "GOV").mint(Vault.forOwner(ns, ALICE), 1000n, capability),
      );
      run(fixture, BOB, (ns) =>
        Rule.load(ns, "GOV").clawback(
          Vault.forOwner(ns, ALICE),
          Vault.forOwner(ns, CAROL),
          300n,
          capability,
        ),
      );

      expect(balanceOf(fixture, ALICE, "GOV")).toBe(700n);
      expect(balanceOf(fixture, CAROL, "GOV")).toBe(300n);
      expect(view(fixture, (ns) => Rule.load(ns, "GOV").totalSupply)).toBe(1000n);
    });

    it("fails CLAWBACK_DISABLED even with the right capability", () => {
      const usdx = setupAsset(fixture, "USDX", false);
      fund(fixture, usdx.authority, ALICE, 100n);
      createVaults(fixture, CAROL);

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "USDX").clawback(
            Vault.forOwner(ns, ALICE),
            Vault.forOwner(ns, CAROL),
            10n,
            usdx.capability,
          ),
        ),
      ).toThrow(expect.objectContaining({ code: "CLAWBACK_DISABLED" }));
    });

    it("reports CLAWBACK_DISABLED to a caller without a capability", () => {
      setupAsset(fixture, "USDX", false);
      createVaults(fixture, ALICE, CAROL);

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "USDX").clawback(
            Vault.forOwner(ns, ALICE),
            Vault.forOwner(ns, CAROL),
            10n,
            Capability.create("stranger"),
          ),
        ),
      ).toThrow(expect.objectContaining({ code: "CLAWBACK_DISABLED" }));
    });
  });

  describe("clawbackUnsafe", () => {
    it("hands the clawed-back balance to the caller", () => {
      const usdx = setupAsset(fixture, "USDX", true);
      fund(fixture, usdx.authority, ALICE, 100n);

      run(fixture, SYSTEM_SENDER, (ns) => {
        const balance = Rule.load(ns, "USDX").clawbackUnsafe(
          Vault.forOwner(ns, ALICE),
          40n,
          usdx.capability,
        );
        expect(balance.value).toBe(40n);
        depositToOwner(ns, BOB, balance);
      });

      expect(balanceOf(fixture, ALICE, "USDX")).toBe(60n);
    });

    it("fails CANNOT_CLAWBACK_MANAGED for a managed asset", () => {
      const capability = setupManaged(fixture, true);
      createVaults(fixture, ALICE);

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "GOV").clawbackUnsafe(Vault.forOwner(ns, ALICE), 0n, capability),
        ),
      ).toThrow(expect.objectContaining({ code: "CANNOT_CLAWBACK_MANAGED" }));
    });
  });

  // ─── Command hints ───────────────────────────────────────────────

  describe("command hints", () => {
    it("upserts and removes hints under the capability", () => {
      const { capability } = setupAsset(fixture, "USDX", false);
      const replacement: CommandDescriptor = { ...HINT, functionName: "approve_v2" };

      run(fixture, SYSTEM_SENDER, (ns) => {
        const rule = Rule.load(ns, "USDX");
        rule.setCommandHint("transfer", HINT, capability);
        rule.setCommandHint("transfer", replacement, capability);
      });
      expect(view(fixture, (ns) => Rule.load(ns, "USDX").commandHint("transfer"))).toEqual(
        replacement,
      );

      const removed = run(fixture, SYSTEM_SENDER, (ns) =>
        Rule.load(ns, "USDX").removeCommandHint("transfer", capability),
      );
      expect(removed).toBe(true);
      expect(view(fixture, (ns) => Rule.load(ns, "USDX").commandHints().size)).toBe(0);
    });

    it("reports false when removing an absent hint", () => {
      const { capability } = setupAsset(fixture, "USDX", false);
      expect(
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "USDX").removeCommandHint("transfer", capability),
        ),
      ).toBe(false);
    });

    it("fails INVALID_AUTHORIZATION with a foreign capability", () => {
      setupAsset(fixture, "USDX", false);
      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "USDX").setCommandHint("transfer", HINT, Capability.create("x")),
        ),
      ).toThrow(expect.objectContaining({ code: "INVALID_AUTHORIZATION" }));
    });

    it("fails INVALID_DESCRIPTOR for a malformed descriptor", () => {
      const { capability } = setupAsset(fixture, "USDX", false);
      const malformed: CommandDescriptor = { ...HINT, moduleName: "" };

      expect(() =>
        run(fixture, SYSTEM_SENDER, (ns) =>
          Rule.load(ns, "USDX").setCommandHint("transfer", malformed, capability),
        ),
      ).toThrow(expect.objectContaining({ code: "INVALID_DESCRIPTOR" }));
    });
  });
});
