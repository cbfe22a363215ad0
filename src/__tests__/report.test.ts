import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";

import {
  PLAIN_STYLES,
  createReportStyles,
  renderEntry,
  renderRunStart,
  renderRunSummary,
  renderSectorHeader,
} from "../report.js";
import type { TickerSnapshot } from "../types.js";

const ansi = createReportStyles(new Chalk({ level: 1 }));

const snapshot: TickerSnapshot = {
  symbol: "NVDA",
  name: "NVIDIA Corporation",
  price: 120.5,
  yearHigh: 150,
  drawdownPct: "-19.67%",
  dailyChangePct: "-2.10%",
  drawdownSeverity: "SEVERE",
  changeDirection: "DOWN",
};

describe("renderEntry", () => {
  it("lays out one ticker block", () => {
    expect(renderEntry({ snapshot }, PLAIN_STYLES)).toBe(
      [
        "=== NVDA (NVIDIA Corporation) ===",
        "Price        : $120.50",
        "52W High     : $150.00",
        "Drawdown     : -19.67%",
        "Daily Change : -2.10%",
      ].join("\n"),
    );
  });

  it("highlights a severe drawdown and a falling day", () => {
    const lines = renderEntry({ snapshot }, ansi).split("\n");

    expect(lines[3]).toBe("Drawdown     : \u001b[95m-19.67%\u001b[39m");
    expect(lines[4]).toBe("Daily Change : \u001b[91m-2.10%\u001b[39m");
  });

  it("leaves a normal drawdown unstyled and colors a rising day blue", () => {
    const calm: TickerSnapshot = {
      ...snapshot,
      drawdownPct: "-3.00%",
      dailyChangePct: "0.40%",
      drawdownSeverity: "NORMAL",
      changeDirection: "UP",
    };
    const lines = renderEntry({ snapshot: calm }, ansi).split("\n");

    expect(lines[3]).toBe("Drawdown     : -3.00%");
    expect(lines[4]).toBe("Daily Change : \u001b[94m0.40%\u001b[39m");
  });

  it("prints N/A for missing prices and appends the failure notice", () => {
    const failed: TickerSnapshot = {
      symbol: "GEV",
      name: "N/A",
      drawdownPct: "N/A",
      dailyChangePct: "N/A",
      drawdownSeverity: "NORMAL",
      changeDirection: "UP",
    };

    expect(renderEntry({ snapshot: failed, failure: "GEV: timeout" }, PLAIN_STYLES)).toBe(
      [
        "=== GEV (N/A) ===",
        "Price        : N/A",
        "52W High     : N/A",
        "Drawdown     : N/A",
        "Daily Change : N/A",
        "Status       : unavailable (GEV: timeout)",
      ].join("\n"),
    );
  });
});

describe("run framing", () => {
  it("frames a sector name between rules", () => {
    const rule = "=".repeat(60);
    expect(renderSectorHeader("ETF")).toBe(`${rule}\nETF\n${rule}\n`);
  });

  it("announces the ticker count and the outcome", () => {
    expect(renderRunStart(29)).toBe("Starting portfolio scan (29 tickers)...");
    expect(renderRunSummary({ total: 29, failed: 2, entries: [] })).toBe("Scan complete: 29 tickers, 2 unavailable.");
  });
});
