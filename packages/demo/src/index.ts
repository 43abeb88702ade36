#!/usr/bin/env node
/**
 * @warden/demo — Interactive CLI walkthrough.
 *
 * Plays the reference scenarios against one in-process node:
 * register -> transfer -> resolve -> rejected resolve -> managed mint ->
 * clawback -> rejected clawback -> duplicate registration -> journal
 *
 * Uses the protocol service directly (no HTTP server).
 */

import chalk from "chalk";
import { ProtocolService } from "@warden/node";
import { Capability } from "@warden/protocol";
import { SYSTEM_SENDER, StoreError } from "@warden/store";
import { ProtocolError } from "@warden/types";
import type { Identity } from "@warden/types";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

const ALICE: Identity = `0x${"a1".repeat(32)}`;
const BOB: Identity = `0x${"b2".repeat(32)}`;
const CAROL: Identity = `0x${"c3".repeat(32)}`;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                       WARDEN DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("           Permissioned custody and transfer              ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

/**
 * Run `fn`, expecting it to fail with a domain error code.
 * Anything else is a demo failure.
 */
function expectRejection(code: string, fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    if ((err instanceof ProtocolError || err instanceof StoreError) && err.code === code) {
      ok(`Rejected with ${chalk.red.bold(err.code)}: ${chalk.gray(err.message)}`);
      return;
    }
    throw err;
  }
  throw new Error(`Expected ${code}, but the unit committed`);
}

function balances(service: ProtocolService, owner: Identity): string {
  const vault = service.getVault(service.deriveVaultAddress(owner));
  const pending = service.locateVault(owner).pending;
  const held = Object.entries(vault?.balances ?? pending);
  const shown = held.map(([asset, amount]) => `${asset}=${amount}`).join(", ") || "empty";
  return vault === undefined ? `${shown} (inbox)` : shown;
}

const TOTAL_STEPS = 8;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of vaults, rules and exactly-once transfers."));
  console.log(chalk.gray("  Every step runs in a real atomic unit — no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const service = new ProtocolService({ namespaceSeed: "warden-demo" });
  hashLine("namespace", service.namespaceId);
  info("seed", service.namespaceSeed);
  ok("Namespace created");

  const usdxAdmin = Capability.create("USDX-admin");
  const usdxRule = service.registerAsset(SYSTEM_SENDER, "USDX", false, usdxAdmin.id);
  const usdxMinter = service.createMintAuthority(SYSTEM_SENDER, "USDX");
  hashLine("USDX rule", usdxRule);
  ok("USDX registered (clawback disabled)");

  const aliceVault = service.createVault(ALICE, ALICE);
  service.execute(SYSTEM_SENDER, (tx) => {
    tx.deposit(aliceVault, usdxMinter.mint(tx.namespace, 100n));
  });
  hashLine("alice vault", aliceVault);
  info("alice", balances(service, ALICE));

  await sleep(DELAY_MS);

  // ─── Step 2: Transfer and Resolve ───────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Transfer and Resolve");

  service.execute(ALICE, (tx) => {
    const requestId = tx.transfer(aliceVault, tx.senderProof(), BOB, "USDX", 40n);
    info("request", `${requestId.slice(0, 18)}... pending`);
    tx.resolveTransfer(usdxRule, requestId, usdxAdmin);
  });
  ok("Transfer of 40 USDX resolved by the rule");
  info("alice", balances(service, ALICE));
  info("bob", balances(service, BOB));

  await sleep(DELAY_MS);

  // ─── Step 3: Rejected Resolution ────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Resolve With a Foreign Capability");

  const impostor = Capability.create("impostor");
  expectRejection("INVALID_AUTHORIZATION", () => {
    service.execute(ALICE, (tx) => {
      const requestId = tx.transfer(aliceVault, tx.senderProof(), BOB, "USDX", 10n);
      tx.resolveTransfer(usdxRule, requestId, impostor);
    });
  });
  info("alice", balances(service, ALICE));
  info("bob", balances(service, BOB));
  ok("Whole unit rolled back, withdrawal included");

  await sleep(DELAY_MS);

  // ─── Step 4: Managed Treasury ───────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Managed Treasury Mint");

  const govAdmin = Capability.create("GOV-admin");
  const govRule = service.registerManagedAsset(
    SYSTEM_SENDER,
    "GOV",
    true,
    govAdmin.id,
    service.createMintAuthority(SYSTEM_SENDER, "GOV"),
  );
  ok("GOV registered with its mint authority locked in");

  service.execute(SYSTEM_SENDER, (tx) => tx.mint(govRule, aliceVault, 1000n, govAdmin));
  info("alice", balances(service, ALICE));
  info("GOV supply", service.getRule(govRule)?.totalSupply ?? "n/a");

  await sleep(DELAY_MS);

  // ─── Step 5: Clawback ───────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Clawback Without Owner Proof");

  const carolVault = service.createVault(CAROL, CAROL);
  service.execute(SYSTEM_SENDER, (tx) =>
    tx.clawback(govRule, aliceVault, carolVault, 300n, govAdmin),
  );
  ok("300 GOV moved by the rule authority");
  info("alice", balances(service, ALICE));
  info("carol", balances(service, CAROL));

  await sleep(DELAY_MS);

  // ─── Step 6: Clawback Disabled ──────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Clawback on a Non-Clawback Asset");

  expectRejection("CLAWBACK_DISABLED", () => {
    service.execute(SYSTEM_SENDER, (tx) =>
      tx.clawback(usdxRule, aliceVault, carolVault, 1n, usdxAdmin),
    );
  });

  await sleep(DELAY_MS);

  // ─── Step 7: Duplicate Registration ─────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Register USDX Again");

  expectRejection("ALREADY_EXISTS", () => {
    service.registerAsset(SYSTEM_SENDER, "USDX", true, Capability.create("second").id);
  });

  await sleep(DELAY_MS);

  // ─── Step 8: Journal ────────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Journal");

  const entries = service.readJournal();
  for (const entry of entries) {
    const line = JSON.stringify({
      position: entry.position,
      type: entry.event.type,
      hash: `${entry.hash.slice(0, 12)}...`,
    });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }

  const integrity = service.verifyJournal();
  if (integrity.valid) {
    ok(`${chalk.green.bold("CHAIN VALID")} through position ${integrity.lastVerifiedPosition}`);
  } else {
    warn(`Chain broken: ${integrity.errors.map((e) => e.reason).join("; ")}`);
  }

  console.log();
  console.log(chalk.white("    Committed events:    ") + chalk.cyan.bold(String(entries.length)));
  console.log(chalk.white("    Rejected units:      ") + chalk.cyan.bold("3 (nothing written)"));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
