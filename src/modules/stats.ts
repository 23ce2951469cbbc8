/**
 * Stats Module
 * Displays processing statistics and issues
 */

import chalk from "chalk";
import type { Tracker } from "../utils";
import type { BatchReport, ConversionContext, ProcessingStats } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a modern progress bar with percentage
 */
function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

/**
 * Section header with modern styling
 */
function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display processing statistics to console
 */
export function stats(
  ctx: Pick<ConversionContext, "tracker" | "report">,
  verbose?: boolean,
): void {
  const { tracker, report } = ctx;
  const stats = tracker.getStats();

  const hasWarnings = stats.unresolvedLinks > 0 || stats.brokenAnchors > 0 || stats.missingImages > 0;
  const hasErrors = stats.failedDocuments > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayDocumentsSection(stats, report);
  displayImagesSection(stats);
  displayLinksSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayDocumentsSection(
  stats: ProcessingStats,
  report?: BatchReport,
): void {
  console.log(sectionHeader("Documents"));

  const bar = progressBar(stats.resolvedDocuments, stats.totalDocuments);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Converted", stats.resolvedDocuments, chalk.green),
  );

  const failed = stats.failedDocuments - stats.cancelledDocuments;
  if (failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", failed, chalk.red));
  }

  if (stats.cancelledDocuments > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Cancelled", stats.cancelledDocuments, chalk.yellow),
    );
  }

  if (report && report.total > 0) {
    const average = report.averageQualityScore;
    const color = average >= 0.9 ? chalk.green : average >= 0.6 ? chalk.yellow : chalk.red;
    console.log(statRow(chalk.cyan("◉"), "Average quality", average.toFixed(2), color));
  }
}

function displayImagesSection(stats: ProcessingStats): void {
  const totalImages = stats.relocatedImages + stats.missingImages;
  if (totalImages === 0) {
    return;
  }

  console.log(sectionHeader("Images"));

  const bar = progressBar(stats.relocatedImages, totalImages);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Relocated", stats.relocatedImages, chalk.green),
  );

  if (stats.missingImages > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Missing data", stats.missingImages, chalk.yellow),
    );
  }
}

function displayLinksSection(stats: ProcessingStats): void {
  const totalLinks = stats.resolvedLinks + stats.unresolvedLinks;
  if (totalLinks === 0 && stats.externalLinks === 0) {
    return;
  }

  console.log(sectionHeader("Links"));

  if (totalLinks > 0) {
    const bar = progressBar(stats.resolvedLinks, totalLinks);
    console.log(`   ${bar}`);
  }

  console.log(
    statRow(chalk.green("◉"), "Resolved", stats.resolvedLinks, chalk.green),
  );

  if (stats.externalLinks > 0) {
    console.log(statRow(chalk.cyan("◉"), "External", stats.externalLinks, chalk.cyan));
  }

  if (stats.unresolvedLinks > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Unresolved", stats.unresolvedLinks, chalk.yellow),
    );
  }

  if (stats.brokenAnchors > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Anchors dropped", stats.brokenAnchors, chalk.yellow),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const documentIssues = tracker
    .getIssues("document")
    .filter((issue) => issue.reason !== "cancelled");
  const resourceIssues = tracker.getIssues("resource");

  if (documentIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (documentIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Documents failed", documentIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of documentIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Resources failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
      }
    }
  }
}
