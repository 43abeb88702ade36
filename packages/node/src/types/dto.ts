/**
 * Request/Response DTOs.
 *
 * Query schemas are Zod; response views are plain JSON shapes with
 * amounts as decimal strings.
 */

import { z } from "zod";
import type { CommandDescriptor, Identity } from "@warden/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Journal DTOs
// =============================================================================

export const ListJournalQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListJournalQuery = z.infer<typeof ListJournalQuerySchema>;

// =============================================================================
// Views
// =============================================================================

export interface NamespaceView {
  readonly id: Identity;
  readonly seed: string;
  readonly derivedFromSeed: boolean;
}

export interface VaultView {
  readonly id: Identity;
  readonly owner: Identity;
  readonly balances: Record<string, string>;
}

export interface VaultAddressView {
  readonly owner: Identity;
  readonly address: Identity;
  readonly exists: boolean;
  /** Value parked at the address while no vault exists */
  readonly pending: Record<string, string>;
}

export interface RuleView {
  readonly id: Identity;
  readonly assetType: string;
  readonly clawbackAllowed: boolean;
  readonly authorizationId: Identity;
  readonly managed: boolean;
  /** Null for unmanaged assets */
  readonly totalSupply: string | null;
  readonly commandHints: Record<string, CommandDescriptor>;
}
