#!/usr/bin/env node
/**
 * @strongbox/demo — Interactive CLI walkthrough.
 *
 * Runs the vault lifecycle in your terminal:
 * boot -> create -> credit -> debit -> rejected overdraft
 *
 * Uses the real program and the in-process validator (no network).
 */

import chalk from "chalk";
import { pino } from "pino";
import { loadConfig } from "./config.js";
import { formatSol, walkthrough } from "./walkthrough.js";
import type { WalkthroughResult, WalkthroughStep } from "./walkthrough.js";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;
const TOTAL_STEPS = 6;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("              STRONGBOX DEMO              ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("       Single-authority lamport vault     ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${TOTAL_STEPS}`);
  const line = chalk.gray("─".repeat(Math.max(4, 40 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function render(index: number, step: WalkthroughStep): void {
  stepHeader(index, step.title);
  for (const [label, value] of step.facts) {
    info(label, value);
  }
}

function summary(result: WalkthroughResult): void {
  console.log();
  console.log(chalk.white("    Vault:            ") + chalk.yellow(result.vault.toBase58()));
  console.log(chalk.white("    Recorded balance: ") + chalk.cyan.bold(formatSol(result.recordedBalance)));
  console.log(chalk.white("    Vault lamports:   ") + chalk.cyan.bold(formatSol(result.vaultLamports)));
  console.log(chalk.white("    Authority:        ") + chalk.cyan.bold(formatSol(result.authorityLamports)));
  console.log(chalk.white("    Overdraft:        ") + chalk.red.bold(result.rejection));
  console.log();
}

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  banner();

  const steps = walkthrough({ config, logger });
  let index = 0;
  for (;;) {
    const next = steps.next();
    if (next.done === true) {
      stepHeader(TOTAL_STEPS, "Summary");
      summary(next.value);
      return;
    }
    index++;
    render(index, next.value);
    await sleep(DELAY_MS);
  }
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
