/**
 * Tests for Namespace — creation, loading and deterministic derivation.
 */

import { describe, it, expect } from "vitest";
import { Environment, SYSTEM_SENDER } from "@warden/store";
import {
  Namespace,
  deriveIdentity,
  deriveRuleAddress,
  deriveVaultAddress,
  namespaceIdentity,
} from "../src/namespace.js";
import type { ProtocolRecord } from "../src/types.js";
import { Vault } from "../src/vault.js";
import { ALICE, BOB, SEED, createFixture, run } from "./helpers.js";

const IDENTITY = /^0x[0-9a-f]{64}$/;

describe("Namespace", () => {
  describe("create", () => {
    it("places the namespace at the seed-derived identity", () => {
      const fixture = createFixture();
      expect(fixture.namespaceId).toBe(namespaceIdentity(SEED));
      expect(fixture.namespaceId).toMatch(IDENTITY);
    });

    it("rejects a second namespace for the same seed", () => {
      const fixture = createFixture();
      expect(() =>
        fixture.env.execute(SYSTEM_SENDER, (unit) => Namespace.create(unit, SEED)),
      ).toThrow(expect.objectContaining({ code: "ALREADY_EXISTS" }));
    });

    it("journals namespace.created", () => {
      const fixture = createFixture();
      const [entry] = fixture.env.journal.readAll();
      expect(entry?.event.type).toBe("namespace.created");
      expect(entry?.event.payload).toEqual({
        namespaceId: fixture.namespaceId,
        seed: SEED,
      });
    });
  });

  describe("load", () => {
    it("fails NOT_FOUND for an unknown id", () => {
      const env = new Environment<ProtocolRecord>();
      expect(() =>
        env.view((unit) => Namespace.load(unit, namespaceIdentity("missing"))),
      ).toThrow(expect.objectContaining({ code: "NOT_FOUND" }));
    });

    it("fails INVALID_IDENTITY for a malformed id", () => {
      const env = new Environment<ProtocolRecord>();
      expect(() => env.view((unit) => Namespace.load(unit, "ns-1"))).toThrow(
        expect.objectContaining({ code: "INVALID_IDENTITY" }),
      );
    });
  });

  describe("derive", () => {
    it("matches the free derivation functions", () => {
      const fixture = createFixture();
      run(fixture, ALICE, (ns) => {
        expect(ns.derive(ALICE, "vault")).toBe(deriveVaultAddress(ns.id, ALICE));
        expect(ns.derive("USDX", "rule")).toBe(deriveRuleAddress(ns.id, "USDX"));
      });
    });

    it("separates entity kinds for the same key", () => {
      const ns = namespaceIdentity(SEED);
      expect(deriveIdentity(ns, "vault", "USDX")).not.toBe(deriveIdentity(ns, "rule", "USDX"));
    });

    it("separates namespaces for the same key", () => {
      expect(deriveVaultAddress(namespaceIdentity("a"), ALICE)).not.toBe(
        deriveVaultAddress(namespaceIdentity("b"), ALICE),
      );
    });

    it("rejects a malformed owner key", () => {
      expect(() => deriveVaultAddress(namespaceIdentity(SEED), "alice")).toThrow(
        expect.objectContaining({ code: "INVALID_IDENTITY" }),
      );
    });

    it("rejects an empty asset type", () => {
      expect(() => deriveRuleAddress(namespaceIdentity(SEED), "")).toThrow(
        expect.objectContaining({ code: "INVALID_IDENTITY" }),
      );
    });
  });

  describe("exists", () => {
    it("reports a vault only after it is created", () => {
      const fixture = createFixture();
      run(fixture, ALICE, (ns) => {
        expect(ns.exists(ALICE, "vault")).toBe(false);
        Vault.create(ns, ALICE);
        expect(ns.exists(ALICE, "vault")).toBe(true);
        expect(ns.exists(BOB, "vault")).toBe(false);
        expect(ns.exists(ALICE, "rule")).toBe(false);
      });
    });
  });
});
