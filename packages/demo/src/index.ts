#!/usr/bin/env node
/**
 * @mintage/demo — Interactive CLI walkthrough.
 *
 * Runs a currency's full lifecycle in your terminal:
 * register -> mint -> split -> preburn -> burn -> cancel-burn ->
 * capability relocation -> journal replay -> chain verification
 *
 * Uses the real packages directly.
 */

import chalk from "chalk";
import { InMemoryEventStore } from "@mintage/event-store";
import {
  CurrencyCore,
  CurrencyError,
  createLoggerFromConfig,
  currencyStreamId,
  formatUnits,
  join,
  loadConfig,
  replaySupply,
  split,
  toCurrencyConfig,
  value,
} from "@mintage/currency";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;

const ALICE = "0xa11ce";
const BOB = "0xb0b";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                      MINTAGE DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Mint, escrow and burn with exact supply         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(50 - title.length, 2)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, text: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(text));
}

function rejected(msg: string): void {
  console.log(chalk.yellow("    ✗ ") + chalk.yellow(msg));
}

const TOTAL_STEPS = 9;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();

  const config = loadConfig();
  const journal = new InMemoryEventStore();
  const core = new CurrencyCore({
    config: toCurrencyConfig(config),
    journal,
    logger: createLoggerFromConfig({ ...config, LOG_LEVEL: "warn" }),
  });
  const root = core.rootAuthority;

  const amount = (n: bigint) => `${formatUnits(n, core.supplyInfo("XUS").scalingFactor)} XUS`;
  const supply = () => {
    info("market cap", amount(core.marketCap("XUS")));
    info("in preburn", amount(core.preburnValue("XUS")));
  };

  // ─── Step 1: Register ───────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Register Currency");

  core.register(root, "XUS");
  ok(`XUS registered by root authority ${root}`);
  try {
    core.register(ALICE, "EUR");
  } catch (err) {
    if (!(err instanceof CurrencyError)) throw err;
    rejected(`${ALICE} tried to register EUR: ${err.code}`);
  }
  const cap = core.removeMintCapability(root, "XUS");
  ok("Mint capability moved out of the root account");

  await sleep(DELAY_MS);

  // ─── Step 2: Mint ───────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Mint");

  const treasury = core.mint(250_000_000n, cap);
  ok(`Minted ${amount(value(treasury))}`);
  try {
    core.mint(core.mintCeiling + 1n, cap);
  } catch (err) {
    if (!(err instanceof CurrencyError)) throw err;
    rejected(`Mint above ceiling: ${err.code}`);
  }
  supply();

  await sleep(DELAY_MS);

  // ─── Step 3: Split ──────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Split");

  const [rest, payout] = split(treasury, 100_000_000n);
  const [, second] = split(rest, 40_000_000n);
  info("payout", amount(value(payout)));
  info("second", amount(value(second)));
  info("remaining", amount(value(rest)));
  ok("Value moved between units, supply unchanged");

  await sleep(DELAY_MS);

  // ─── Step 4: Preburn ────────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Preburn");

  core.createPreburn(ALICE, "XUS");
  core.preburnToSender(ALICE, payout);
  core.preburnToSender(ALICE, second);
  ok(`${ALICE} escrowed two requests`);
  info("queue", core.pendingRequests(ALICE, "XUS").map(amount).join(", "));
  try {
    value(payout);
  } catch (err) {
    if (!(err instanceof CurrencyError)) throw err;
    rejected(`Reusing the escrowed unit: ${err.code}`);
  }
  supply();

  await sleep(DELAY_MS);

  // ─── Step 5: Burn ───────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Burn Oldest Request");

  core.burn(ALICE, cap);
  ok("Oldest request destroyed");
  info("queue", core.pendingRequests(ALICE, "XUS").map(amount).join(", "));
  supply();

  await sleep(DELAY_MS);

  // ─── Step 6: Cancel Burn ────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Cancel Burn");

  const returned = core.cancelBurn(ALICE, cap);
  ok(`Returned ${amount(value(returned))} intact`);
  const merged = join(rest, returned);
  info("merged unit", amount(value(merged)));
  supply();

  await sleep(DELAY_MS);

  // ─── Step 7: Relocate Capability ────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Relocate Capability");

  core.publishMintCapability(BOB, cap);
  ok(`Capability published at ${BOB}`);
  try {
    core.mint(1n, cap);
  } catch (err) {
    if (!(err instanceof CurrencyError)) throw err;
    rejected(`Minting with the moved handle: ${err.code}`);
  }
  const minted = core.mintWithSenderCapability(BOB, "XUS", 5_000_000n);
  ok(`${BOB} minted ${amount(value(minted))} with its published capability`);
  supply();

  await sleep(DELAY_MS);

  // ─── Step 8: Replay Journal ─────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Replay Journal");

  const events = journal.read(currencyStreamId("XUS"));
  for (const stored of events) {
    info(`v${stored.version}`, stored.event.type);
  }
  const replayed = replaySupply(events);
  if (replayed.totalValue === core.marketCap("XUS") && replayed.preburnValue === core.preburnValue("XUS")) {
    ok(`Replay of ${replayed.eventCount} events matches the live counters`);
  } else {
    rejected("Replay diverged from the live counters");
  }

  await sleep(DELAY_MS);

  // ─── Step 9: Verify Chain ───────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Verify Hash Chain");

  const integrity = journal.verifyIntegrity();
  info("verified to", `position ${integrity.lastVerifiedPosition}`);
  if (integrity.valid) {
    ok(chalk.green.bold("CHAIN VALID") + " - every event links to its predecessor");
  } else {
    rejected(`${integrity.errors.length} integrity error(s)`);
  }

  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
