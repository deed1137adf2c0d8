import chalk from "chalk";
import type { CollectSummary, EnrichSummary } from "./types.js";

export type RunStatus = "Success" | "Completed with errors" | "Failed";

function supportsColor(): boolean {
  if (process.env.NO_COLOR) return false;
  return Boolean(process.stderr && process.stderr.isTTY);
}

export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 1) return `${ms.toFixed(0)} ms`;
  return `${seconds.toFixed(1)} s`;
}

export function computeCollectStatus(summary: CollectSummary): RunStatus {
  if (summary.skipped === 0) return "Success";
  if (summary.collected > 0) return "Completed with errors";
  return "Failed";
}

export function computeEnrichStatus(summary: EnrichSummary): RunStatus {
  // Not-found users are a normal report outcome; only lookup errors degrade the run
  if (summary.lookupErrors === 0) return "Success";
  if (summary.lookupErrors < summary.total) return "Completed with errors";
  return "Failed";
}

export function collectSummaryLines(summary: CollectSummary): string[] {
  return [
    `Users listed: ${summary.totalUsers}`,
    `Users reported: ${summary.collected}`,
    `MFA enabled: ${summary.mfaEnabled}`,
    `MFA disabled: ${summary.mfaDisabled}`,
    `Skipped (method lookup failed): ${summary.skipped}`,
    `Duration: ${formatDuration(summary.endedAt - summary.startedAt)}`
  ];
}

export function enrichSummaryLines(summary: EnrichSummary, normalizeMobile: boolean): string[] {
  const lines = [
    `Users: ${summary.total}`,
    `Found in AD: ${summary.found}`,
    `Not found: ${summary.notFound}`,
    `Lookup errors: ${summary.lookupErrors}`
  ];
  if (normalizeMobile) {
    lines.push(`Invalid mobile numbers: ${summary.invalidMobiles}`);
  }
  lines.push(`Duration: ${formatDuration(summary.endedAt - summary.startedAt)}`);
  return lines;
}

export function renderSummaryBox(status: RunStatus, lines: string[]): string {
  const content = ["SUMMARY", `Status: ${status}`, ...lines];

  const maxLen = content.reduce((m, s) => Math.max(m, s.length), 0);
  const horizontal = "─".repeat(maxLen + 2);
  const top = `┌${horizontal}┐`;
  const bottom = `└${horizontal}┘`;
  const body = content.map((line) => `│ ${line.padEnd(maxLen, " ")} │`);
  const box = [top, ...body, bottom].join("\n");

  if (!supportsColor()) return box;
  return status === "Success" ? chalk.green(box) : chalk.red(box);
}
