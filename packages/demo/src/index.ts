#!/usr/bin/env node
/**
 * @ledgerwire/demo — Terminal walkthrough.
 *
 * Finalizes two blocks and shows what subscribers see:
 * wrap -> accept -> decrypt -> apply -> IBC + proposal effects ->
 * wire events -> subscription decoding
 *
 * Uses real domain packages directly (no consensus engine, no RPC).
 */

import chalk from "chalk";
import { createRawTx, decryptTx, wrapTx } from "@ledgerwire/tx";
import { createIbcEffect, createProposalEffect } from "@ledgerwire/events";
import {
  InMemoryEventSink,
  createBlockEmitterFactory,
  createLogger,
  loadConfig,
} from "@ledgerwire/node";
import { TxResponse } from "@ledgerwire/sdk";
import type { WireEvent } from "@ledgerwire/types";

// =============================================================================
// Helpers
// =============================================================================

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                   LEDGERWIRE DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Ledger events, from block to subscriber         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function wireLine(event: WireEvent): void {
  const attrs = event.attributes.map((a) => `${a.key}=${a.value}`).join(" ");
  console.log(chalk.gray("    ") + chalk.magenta(event.type.padEnd(14)) + chalk.dim(attrs));
}

const TOTAL_STEPS = 5;

// =============================================================================
// Demo
// =============================================================================

function run(): void {
  banner();

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const config = loadConfig({ ...process.env, NODE_ENV: "test", LOG_LEVEL: "warn" });
  const logger = createLogger(config);
  const sink = new InMemoryEventSink();
  const forBlock = createBlockEmitterFactory(config, sink, logger);
  ok(`Chain ${config.CHAIN_ID}, batch limit ${config.EVENT_BATCH_LIMIT}`);

  // ─── Step 2: Submit + wrap ──────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Submit and wrap");

  const encoder = new TextEncoder();
  const raw = createRawTx({
    chainId: config.CHAIN_ID,
    timestamp: new Date().toISOString(),
    code: encoder.encode("tx_transfer.wasm"),
    data: encoder.encode("transfer 25 tnam1alice tnam1bob"),
  });
  const wrapper = wrapTx(raw, {
    fee: { amount: "100", token: "tnam1nam" },
    pk: "tpknam1alice",
    epoch: 1,
    gasLimit: "50000",
  });
  hashLine("submitted", raw.headerHash().toString());
  hashLine("wrapper", wrapper.headerHash().toString());

  // ─── Step 3: Block 1 — accepted ─────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Block 1: accepted");

  const block1 = forBlock(1);
  block1.emitTx(wrapper);
  block1.flush().forEach(wireLine);

  // ─── Step 4: Block 2 — applied + effects ────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Block 2: applied, IBC, proposal");

  const block2 = forBlock(2);
  const applied = block2.emitTx(decryptTx(wrapper), {
    code: 0,
    gasUsed: 4312,
    info: "Transaction is valid.",
    initializedAccounts: [],
  });
  block2.emitIbc(
    createIbcEffect("send_packet", {
      packet_src_port: "transfer",
      packet_src_channel: "channel-0",
      packet_sequence: "1",
    }),
  );
  block2.emitProposal(
    createProposalEffect({
      proposalId: 0,
      tally: "passed",
      hasProposalCode: false,
      proposalCodeExitStatus: false,
    }),
  );
  block2.flush().forEach(wireLine);
  const appliedHash = applied.getRequired("hash");
  if (appliedHash !== raw.headerHash().toString()) {
    throw new Error(`applied hash ${appliedHash} does not match the submitted hash`);
  }
  ok("Applied hash matches the submitted hash");
  hashLine("applied", appliedHash);

  // ─── Step 5: Subscriber ─────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Subscriber view");

  const response = TxResponse.fromSubscription(
    { events: sink.events() },
    "applied",
    raw.headerHash().toString(),
  );
  if (response === undefined) {
    throw new Error("applied event not found");
  }
  ok(`Transaction applied at height ${response.height} with code ${response.code ?? "?"}`);
  ok(`${sink.events().length} events published across ${sink.all().length} blocks`);
  console.log();
}

try {
  run();
} catch (err: unknown) {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
}
