/**
 * Stats Module
 * Aggregates per-item outcomes and displays the run report
 */

import chalk from "chalk";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { formatDuration } from "../utils/format-duration";
import type {
  ConversionFailure,
  ConversionOutcome,
  ItemResult,
  RunResult,
  RunSummary,
  WorkItem,
} from "../types";

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Count successes and failures and average the per-item time
 * Order-independent; the mean is 0 when nothing ran
 */
export function summarize(outcomes: readonly ConversionOutcome[]): RunSummary {
  const total = outcomes.length;
  let successCount = 0;
  let elapsed = 0;

  for (const outcome of outcomes) {
    if (outcome.status === "success") {
      successCount++;
    }
    elapsed += outcome.elapsedSeconds;
  }

  return {
    total,
    successCount,
    failureCount: total - successCount,
    meanElapsedSeconds: total > 0 ? elapsed / total : 0,
  };
}

// ============================================================================
// Plain Formatting
// ============================================================================

/**
 * One progress line for a finished item
 *
 * @example
 * "✓ report: 12.4s (3 images)"
 * "✗ broken: Invalid PDF header"
 */
export function formatOutcome(
  item: WorkItem,
  outcome: ConversionOutcome,
): string {
  if (outcome.status === "failure") {
    return `✗ ${item.stem}: ${outcome.errorMessage}`;
  }

  const line = `✓ ${item.stem}: ${outcome.elapsedSeconds.toFixed(1)}s`;
  return outcome.assetCount > 0 ? `${line} (${outcome.assetCount} images)` : line;
}

/**
 * The run report callers script against
 */
export function formatReport(summary: RunSummary, totalSeconds: number): string {
  return [
    "=".repeat(50),
    `Conversion completed in ${totalSeconds.toFixed(1)} seconds`,
    `Successful: ${summary.successCount}, Failed: ${summary.failureCount}`,
    `Average time per file: ${summary.meanElapsedSeconds.toFixed(1)} seconds`,
  ].join("\n");
}

// ============================================================================
// Styled Display
// ============================================================================

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

/**
 * Display the run summary and, when verbose, every failed item
 */
export function displayStats(
  result: Extract<RunResult, { status: "completed" }>,
  verbose?: boolean,
): void {
  const summary = summarize(result.results.map((r) => r.outcome));
  const failures = collectFailures(result.results);

  const statusIcon = summary.failureCount > 0 ? chalk.red("✖") : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(result.totalSeconds))}`,
  );
  console.log(`\n  ${chalk.bold.white("Files")}`);
  console.log(`   ${progressBar(summary.successCount, summary.total)}`);
  console.log(statRow(chalk.green("◉"), "Converted", summary.successCount, chalk.green));

  if (summary.failureCount > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failureCount, chalk.red));
  }

  console.log(
    statRow(chalk.cyan("◉"), "Average per file", formatDuration(summary.meanElapsedSeconds), chalk.cyan),
  );
  console.log(
    statRow(chalk.cyan("◉"), "Workers", `${result.workers} (${result.device})`, chalk.cyan),
  );

  if (verbose && failures.length > 0) {
    console.log(`\n  ${chalk.bold.red("Errors")}`);
    for (const { item, outcome } of failures) {
      console.log(`      ${chalk.dim("·")} ${item.name} ${chalk.dim(`(${outcome.reason})`)}`);
      console.log(`        ${chalk.dim(outcome.errorMessage)}`);
    }
  }

  console.log("");
  console.log(formatReport(summary, result.totalSeconds));
}

// ============================================================================
// Export
// ============================================================================

interface FailedItem {
  item: WorkItem;
  outcome: ConversionFailure;
}

function collectFailures(results: readonly ItemResult[]): FailedItem[] {
  const failures: FailedItem[] = [];
  for (const { item, outcome } of results) {
    if (outcome.status === "failure") {
      failures.push({ item, outcome });
    }
  }
  return failures;
}

/**
 * Write stats.json to the output directory
 */
export async function exportStats(
  outputDir: string,
  result: Extract<RunResult, { status: "completed" }>,
): Promise<string> {
  const summary = summarize(result.results.map((r) => r.outcome));

  const failures: Record<string, Array<{ name: string; error: string }>> = {};
  for (const { item, outcome } of collectFailures(result.results)) {
    (failures[outcome.reason] ??= []).push({
      name: item.name,
      error: outcome.errorMessage,
    });
  }

  const exported = {
    summary: {
      ...summary,
      totalSeconds: result.totalSeconds,
      device: result.device,
      workers: result.workers,
    },
    failures,
    items: result.results.map(({ item, outcome }) => ({
      name: item.name,
      status: outcome.status,
      elapsedSeconds: outcome.elapsedSeconds,
      ...(outcome.status === "success"
        ? { assetCount: outcome.assetCount, pageCount: outcome.pageCount }
        : {}),
    })),
  };

  await mkdir(outputDir, { recursive: true });
  const outputPath = join(outputDir, "stats.json");
  await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  return outputPath;
}
