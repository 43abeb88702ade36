/**
 * Shared fixtures for protocol tests.
 */

import { Environment, SYSTEM_SENDER } from "@warden/store";
import type { Identity } from "@warden/types";
import { Capability } from "../src/capability.js";
import { MintAuthority } from "../src/authority.js";
import { Namespace } from "../src/namespace.js";
import { Rule } from "../src/rule.js";
import type { ProtocolRecord } from "../src/types.js";
import { Vault } from "../src/vault.js";

export const ALICE: Identity = `0x${"a1".repeat(32)}`;
export const BOB: Identity = `0x${"b2".repeat(32)}`;
export const CAROL: Identity = `0x${"c3".repeat(32)}`;

export const SEED = "test-namespace";

export interface Fixture {
  readonly env: Environment<ProtocolRecord>;
  readonly namespaceId: Identity;
}

export interface AssetSetup {
  readonly capability: Capability;
  readonly authority: MintAuthority;
}

export function createFixture(): Fixture {
  const env = new Environment<ProtocolRecord>();
  const { result } = env.execute(SYSTEM_SENDER, (unit) => Namespace.create(unit, SEED).id);
  return { env, namespaceId: result };
}

/** Run `fn` in a committed unit sent by `sender`. */
export function run<T>(fixture: Fixture, sender: Identity, fn: (ns: Namespace) => T): T {
  return fixture.env.execute(sender, (unit) =>
    fn(Namespace.load(unit, fixture.namespaceId)),
  ).result;
}

export function view<T>(fixture: Fixture, fn: (ns: Namespace) => T): T {
  return fixture.env.view((unit) => fn(Namespace.load(unit, fixture.namespaceId)));
}

/**
 * Register an unmanaged asset and keep a separate mint authority for
 * funding vaults in tests.
 */
export function setupAsset(
  fixture: Fixture,
  assetType: string,
  clawbackAllowed: boolean,
): AssetSetup {
  const capability = Capability.create(`${assetType}-admin`);
  const authority = run(fixture, SYSTEM_SENDER, (ns) => {
    Rule.register(ns, { assetType, clawbackAllowed, authorizationId: capability.id });
    return MintAuthority.create(ns, assetType);
  });
  return { capability, authority };
}

/** Mint `amount` into the owner's vault, creating the vault if needed. */
export function fund(
  fixture: Fixture,
  authority: MintAuthority,
  owner: Identity,
  amount: bigint,
): void {
  run(fixture, SYSTEM_SENDER, (ns) => {
    const vault = ns.exists(owner, "vault") ? Vault.forOwner(ns, owner) : Vault.create(ns, owner);
    vault.deposit(authority.mint(ns, amount));
  });
}

export function balanceOf(fixture: Fixture, owner: Identity, assetType: string): bigint {
  return view(fixture, (ns) =>
    ns.exists(owner, "vault") ? Vault.forOwner(ns, owner).balanceOf(assetType) : 0n,
  );
}
