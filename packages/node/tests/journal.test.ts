/**
 * Tests for journal routes — paging through committed events and
 * verifying the hash chain.
 */

import { describe, it, expect } from "vitest";
import type { JournalEntry, JournalIntegrityResult } from "@warden/store";
import type { PaginatedResponse } from "../src/types/pagination.js";
import type { ErrorEnvelope } from "../src/types/error.js";
import { ALICE, BOB, createTestApp, seedAsset, seedVault } from "./setup.js";

/**
 * Journal after seeding: namespace.created, rule.registered,
 * authority.created, vault.created (ALICE), supply.minted, vault.created (BOB)
 */
function seededApp(): ReturnType<typeof createTestApp> {
  const instance = createTestApp();
  const usdx = seedAsset(instance.service, "USDX", false);
  seedVault(instance.service, usdx, ALICE, 10n);
  instance.service.createVault(BOB, BOB);
  return instance;
}

describe("GET /api/v1/journal", () => {
  it("lists committed events in position order", async () => {
    const { app } = seededApp();
    const res = await app.request("/api/v1/journal");
    expect(res.status).toBe(200);

    const body = (await res.json()) as PaginatedResponse<JournalEntry>;
    expect(body.data.map((entry) => entry.event.type)).toEqual([
      "namespace.created",
      "rule.registered",
      "authority.created",
      "vault.created",
      "supply.minted",
      "vault.created",
    ]);
    expect(body.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("pages with limit and cursor", async () => {
    const { app } = seededApp();

    const first = (await (await app.request("/api/v1/journal?limit=4")).json()) as PaginatedResponse<JournalEntry>;
    expect(first.data.map((entry) => entry.position)).toEqual([1, 2, 3, 4]);
    expect(first.pagination.hasMore).toBe(true);

    const cursor = first.pagination.cursor ?? "";
    const second = (await (
      await app.request(`/api/v1/journal?limit=4&cursor=${cursor}`)
    ).json()) as PaginatedResponse<JournalEntry>;
    expect(second.data.map((entry) => entry.position)).toEqual([5, 6]);
    expect(second.pagination.hasMore).toBe(false);
  });

  it("starts after a given position", async () => {
    const { app } = seededApp();
    const res = await app.request("/api/v1/journal?afterPosition=4");

    const body = (await res.json()) as PaginatedResponse<JournalEntry>;
    expect(body.data.map((entry) => entry.position)).toEqual([5, 6]);
  });

  it("returns 400 for an invalid limit", async () => {
    const { app } = seededApp();
    const res = await app.request("/api/v1/journal?limit=0");
    expect(res.status).toBe(400);

    const body = (await res.json()) as ErrorEnvelope;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/journal/verify", () => {
  it("reports an intact chain", async () => {
    const { app } = seededApp();
    const res = await app.request("/api/v1/journal/verify");

    const body = (await res.json()) as { data: JournalIntegrityResult };
    expect(body.data).toEqual({ valid: true, lastVerifiedPosition: 6, errors: [] });
  });
});
