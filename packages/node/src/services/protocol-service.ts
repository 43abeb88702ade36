/**
 * ProtocolService — Composition root for the Warden protocol.
 *
 * Owns one environment and one namespace. Route handlers and embedding
 * code go through this service; they never open units themselves.
 * Every mutating call runs in its own atomic unit and is logged on
 * commit or abort.
 */

import type { Logger } from "pino";
import { Environment, SYSTEM_SENDER, StoreError } from "@warden/store";
import type {
  JournalEntry,
  JournalIntegrityResult,
  ReadJournalOptions,
} from "@warden/store";
import {
  MintAuthority,
  Namespace,
  Rule,
  Vault,
  deriveRuleAddress,
  deriveVaultAddress,
  formatAmount,
  formatBalances,
  namespaceIdentity,
  pendingBalances,
} from "@warden/protocol";
import type { ProtocolRecord, ProtocolUnit } from "@warden/protocol";
import { ProtocolError, isIdentity } from "@warden/types";
import type {
  AssetType,
  CapabilityId,
  CommandDescriptor,
  Identity,
  OwnerKey,
} from "@warden/types";
import { TransactionContext } from "./transaction.js";
import type {
  NamespaceView,
  RuleView,
  VaultAddressView,
  VaultView,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ProtocolServiceConfig {
  /** Deployment seed the namespace is derived from */
  readonly namespaceSeed: string;
  /** Append committed events to the journal. Default: true */
  readonly journaling?: boolean | undefined;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class ProtocolService {
  readonly environment: Environment<ProtocolRecord>;
  readonly namespaceId: Identity;
  readonly namespaceSeed: string;

  private readonly _logger: Logger | undefined;
  private _ready = false;

  constructor(config: ProtocolServiceConfig) {
    const logger = config.logger;
    this._logger = logger;
    this.environment = new Environment<ProtocolRecord>({
      journaling: config.journaling,
      onSubscriberError: logger === undefined
        ? undefined
        : (err, entry) => {
            logger.error(
              { err, position: entry.position, type: entry.event.type },
              "Journal subscriber failed",
            );
          },
    });
    this.namespaceSeed = config.namespaceSeed;
    this.namespaceId = this._run(SYSTEM_SENDER, (unit) =>
      Namespace.create(unit, config.namespaceSeed).id,
    );
    this._ready = true;
  }

  isReady(): boolean {
    return this._ready;
  }

  // ─── Units ─────────────────────────────────────────────────────────

  /**
   * Run `fn` in one atomic unit sent by `sender`. Any error aborts the
   * unit and is rethrown; nothing `fn` did becomes visible.
   */
  execute<T>(sender: Identity, fn: (tx: TransactionContext) => T): T {
    return this._run(sender, (unit) =>
      fn(new TransactionContext(Namespace.load(unit, this.namespaceId))),
    );
  }

  private _run<T>(sender: Identity, fn: (unit: ProtocolUnit) => T): T {
    try {
      const { result, commit } = this.environment.execute(sender, fn);
      this._logger?.info(
        {
          unitId: commit.unitId,
          sender,
          written: commit.written,
          events: commit.entries.length,
        },
        "Unit committed",
      );
      return result;
    } catch (err: unknown) {
      this._logger?.warn(
        { sender, code: errorCode(err), err },
        "Unit aborted",
      );
      throw err;
    }
  }

  // ─── Registration ──────────────────────────────────────────────────

  registerAsset(
    sender: Identity,
    assetType: AssetType,
    clawbackAllowed: boolean,
    authorizationId: CapabilityId,
  ): Identity {
    return this.execute(sender, (tx) =>
      Rule.register(tx.namespace, { assetType, clawbackAllowed, authorizationId }).id,
    );
  }

  /**
   * Register an asset whose mint authority is locked into its rule.
   * The authority must not have minted anything yet.
   */
  registerManagedAsset(
    sender: Identity,
    assetType: AssetType,
    clawbackAllowed: boolean,
    authorizationId: CapabilityId,
    authority: MintAuthority,
  ): Identity {
    return this.execute(sender, (tx) =>
      Rule.registerManaged(
        tx.namespace,
        { assetType, clawbackAllowed, authorizationId },
        authority,
      ).id,
    );
  }

  createMintAuthority(sender: Identity, assetType: AssetType): MintAuthority {
    return this.execute(sender, (tx) => MintAuthority.create(tx.namespace, assetType));
  }

  createVault(sender: Identity, owner: OwnerKey): Identity {
    return this.execute(sender, (tx) => tx.createVault(owner));
  }

  // ─── Discovery ─────────────────────────────────────────────────────

  deriveVaultAddress(owner: OwnerKey): Identity {
    return deriveVaultAddress(this.namespaceId, owner);
  }

  deriveRuleAddress(assetType: AssetType): Identity {
    return deriveRuleAddress(this.namespaceId, assetType);
  }

  describeNamespace(): NamespaceView {
    return {
      id: this.namespaceId,
      seed: this.namespaceSeed,
      derivedFromSeed: namespaceIdentity(this.namespaceSeed) === this.namespaceId,
    };
  }

  // ─── Read-only views ───────────────────────────────────────────────

  getVault(vaultId: Identity): VaultView | undefined {
    if (!isIdentity(vaultId)) return undefined;
    return this._view((ns) => {
      if (ns.unit.read(vaultId)?.kind !== "vault") return undefined;
      const vault = Vault.load(ns, vaultId);
      return {
        id: vault.id,
        owner: vault.owner,
        balances: formatBalances(vault.balances()),
      };
    });
  }

  locateVault(owner: OwnerKey): VaultAddressView {
    const address = this.deriveVaultAddress(owner);
    return this._view((ns) => ({
      owner,
      address,
      exists: ns.exists(owner, "vault"),
      pending: formatBalances(pendingBalances(ns, owner)),
    }));
  }

  getRule(ruleId: Identity): RuleView | undefined {
    if (!isIdentity(ruleId)) return undefined;
    return this._view((ns) => {
      if (ns.unit.read(ruleId)?.kind !== "rule") return undefined;
      const rule = Rule.loadById(ns, ruleId);
      const hints: Record<string, CommandDescriptor> = {};
      for (const [tag, descriptor] of rule.commandHints()) {
        hints[tag] = descriptor;
      }
      const supply = rule.totalSupply;
      return {
        id: rule.id,
        assetType: rule.assetType,
        clawbackAllowed: rule.clawbackAllowed,
        authorizationId: rule.authorizationId,
        managed: rule.isManaged,
        totalSupply: supply === undefined ? null : formatAmount(supply),
        commandHints: hints,
      };
    });
  }

  // ─── Journal ───────────────────────────────────────────────────────

  readJournal(options?: ReadJournalOptions): readonly JournalEntry[] {
    return this.environment.journal.readAll(options);
  }

  verifyJournal(): JournalIntegrityResult {
    return this.environment.journal.verify();
  }

  private _view<T>(fn: (ns: Namespace) => T): T {
    return this.environment.view((unit) => fn(Namespace.load(unit, this.namespaceId)));
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof ProtocolError || err instanceof StoreError) {
    return err.code;
  }
  return undefined;
}
