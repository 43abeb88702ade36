/**
 * Discovery routes. Read-only; addresses are derived, never looked up.
 *
 * GET /api/v1/namespace                  — Namespace identity
 * GET /api/v1/vaults/address/:owner      — Derived vault address for an owner
 * GET /api/v1/vaults/:id                 — Vault balances
 * GET /api/v1/rules/address/:assetType   — Derived rule address for an asset
 * GET /api/v1/rules/:id                  — Rule policy and command hints
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function createDiscoveryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/namespace", (c) => {
    return c.json({ data: c.get("service").describeNamespace() });
  });

  // ─── Vaults ──────────────────────────────────────────────────────

  routes.get("/vaults/address/:owner", (c) => {
    const owner = c.req.param("owner");
    return c.json({ data: c.get("service").locateVault(owner) });
  });

  routes.get("/vaults/:id", (c) => {
    const id = c.req.param("id");
    const vault = c.get("service").getVault(id);
    if (vault === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Vault ${id} not found`), 404);
    }
    return c.json({ data: vault });
  });

  // ─── Rules ───────────────────────────────────────────────────────

  routes.get("/rules/address/:assetType", (c) => {
    const service = c.get("service");
    const assetType = c.req.param("assetType");
    const address = service.deriveRuleAddress(assetType);
    return c.json({
      data: {
        assetType,
        address,
        exists: service.getRule(address) !== undefined,
      },
    });
  });

  routes.get("/rules/:id", (c) => {
    const id = c.req.param("id");
    const rule = c.get("service").getRule(id);
    if (rule === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Rule ${id} not found`), 404);
    }
    return c.json({ data: rule });
  });

  return routes;
}
