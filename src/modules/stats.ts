/**
 * Stats Module
 * Displays the run summary: phases, unit counts and durations
 */

import chalk from "chalk";
import type { TrainingContext } from "../types";
import type { PhaseProgress } from "../utils/progress-tracker";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
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
 * Progress bar with percentage
 */
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
  return `   ${icon} ${chalk.dim(label.padEnd(28))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

function phaseDuration(phase: PhaseProgress): number {
  const end = phase.endTime ?? new Date();
  return end.getTime() - phase.startTime.getTime();
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display the summary of a finished run
 */
export function stats(ctx: TrainingContext): void {
  const { run, params, progress, manifestFile } = ctx;
  const summary = progress.getStats();

  console.log("");
  console.log(
    `  ${chalk.green("✔")} ${chalk.bold(`Training data for ${run.langCode}`)} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  if (params) {
    console.log(sectionHeader("Language"));
    console.log(statRow(chalk.cyan("◉"), "Fonts", params.fonts.length, chalk.cyan));
    console.log(statRow(chalk.cyan("◉"), "Exposures", params.exposures.join(", "), chalk.cyan));
    console.log(
      statRow(
        chalk.cyan("◉"),
        "Normalization",
        `${params.normMode}${params.langIsRtl ? " (right-to-left)" : ""}`,
        chalk.cyan,
      ),
    );
  }

  if (summary.phases.length > 0) {
    console.log(sectionHeader("Phases"));
    for (const phase of summary.phases) {
      console.log(
        statRow(
          chalk.green("◉"),
          phase.label,
          `${phase.completed}/${phase.total} · ${formatDuration(phaseDuration(phase))}`,
          chalk.green,
        ),
      );
      console.log(`     ${progressBar(phase.completed, phase.total)}`);
    }
  }

  if (manifestFile) {
    console.log(sectionHeader("Output"));
    console.log(statRow(chalk.green("◉"), "Manifest", manifestFile));
  }

  console.log("");
}
