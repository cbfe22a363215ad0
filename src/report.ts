import chalk, { type ChalkInstance } from "chalk";

import type { ChangeDirection, DrawdownSeverity, PollEntry, PollSummary } from "./types.js";
import { NOT_AVAILABLE } from "./tools/market/metrics.js";

type Style = (text: string) => string;

export type ReportStyles = {
  severity: Record<DrawdownSeverity, Style>;
  direction: Record<ChangeDirection, Style>;
  failure: Style;
};

const plain: Style = (text) => text;

export function createReportStyles(instance: ChalkInstance = chalk): ReportStyles {
  return {
    severity: { SEVERE: instance.magentaBright, NORMAL: plain },
    direction: { DOWN: instance.redBright, UP: instance.blueBright },
    failure: instance.yellow,
  };
}

export const PLAIN_STYLES: ReportStyles = {
  severity: { SEVERE: plain, NORMAL: plain },
  direction: { DOWN: plain, UP: plain },
  failure: plain,
};

const RULE = "=".repeat(60);
export const ENTRY_SEPARATOR = "---";

function formatMoney(value: number | undefined): string {
  return value === undefined ? NOT_AVAILABLE : `$${value.toFixed(2)}`;
}

export function renderSectorHeader(name: string): string {
  return `${RULE}\n${name}\n${RULE}\n`;
}

export function renderEntry(entry: PollEntry, styles: ReportStyles = createReportStyles()): string {
  const { snapshot } = entry;
  const lines = [
    `=== ${snapshot.symbol} (${snapshot.name}) ===`,
    `Price        : ${formatMoney(snapshot.price)}`,
    `52W High     : ${formatMoney(snapshot.yearHigh)}`,
    `Drawdown     : ${styles.severity[snapshot.drawdownSeverity](snapshot.drawdownPct)}`,
    `Daily Change : ${styles.direction[snapshot.changeDirection](snapshot.dailyChangePct)}`,
  ];
  if (entry.failure) {
    lines.push(`Status       : ${styles.failure(`unavailable (${entry.failure})`)}`);
  }
  return lines.join("\n");
}

export function renderRunStart(total: number): string {
  return `Starting portfolio scan (${total} tickers)...`;
}

export function renderRunSummary(summary: PollSummary): string {
  return `Scan complete: ${summary.total} tickers, ${summary.failed} unavailable.`;
}
