/**
 * Command Descriptor Types
 *
 * Declarative hints attached to a rule that tell off-chain tooling how to
 * build the call that resolves a transfer (or performs another action) for
 * an asset. Descriptors are inert data: no protocol operation reads them.
 */

import type { AssetType, Identity } from "./identity.js";

// =============================================================================
// Call Target
// =============================================================================

/**
 * Where the described function lives.
 *
 * - static: a fixed package address
 * - alias: a name resolved by the tooling (e.g., "usdx-policy")
 */
export type CommandTarget =
  | { readonly kind: "static"; readonly address: Identity }
  | { readonly kind: "alias"; readonly name: string };

// =============================================================================
// Arguments
// =============================================================================

/**
 * One positional argument of the described call.
 */
export type CommandArgument =
  | { readonly kind: "shared"; readonly id: Identity }
  | { readonly kind: "mutShared"; readonly id: Identity }
  | { readonly kind: "immutable"; readonly id: Identity }
  | {
      readonly kind: "payment";
      readonly assetType: AssetType;
      /** Decimal string amount (uint64 range) */
      readonly amount: string;
    }
  | { readonly kind: "placeholder"; readonly tag: string };

/**
 * One positional type argument of the described call.
 *
 * `system` is filled in by the tooling with the asset type being moved.
 */
export type TypeArgument =
  | { readonly kind: "system" }
  | { readonly kind: "concrete"; readonly type: string };

// =============================================================================
// Descriptor
// =============================================================================

export interface CommandDescriptor {
  readonly target: CommandTarget;
  readonly moduleName: string;
  readonly functionName: string;
  readonly arguments: readonly CommandArgument[];
  readonly typeArguments: readonly TypeArgument[];
}
