import { describe, expect, it } from "vitest";

import { MAX_INTERVAL_SECONDS, buildProgram, parseCliOptions } from "../cli.js";
import { MARKET_REQUEST_GAP_MS, WATCHLIST_PATH } from "../config.js";

function quietProgram() {
  return buildProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
}

describe("parseCliOptions", () => {
  it("falls back to the configured defaults", () => {
    expect(parseCliOptions([], quietProgram())).toEqual({
      symbols: [],
      watchlistPath: WATCHLIST_PATH,
      gapMs: MARKET_REQUEST_GAP_MS,
      intervalMs: undefined,
      color: true,
    });
  });

  it("reads symbols and options", () => {
    const options = parseCliOptions(
      ["aapl", "brk.b", "--gap", "250", "--interval", "60", "--no-color", "-w", "custom.json"],
      quietProgram(),
    );

    expect(options).toEqual({
      symbols: ["AAPL", "BRK.B"],
      watchlistPath: "custom.json",
      gapMs: 250,
      intervalMs: 60_000,
      color: false,
    });
  });

  it("rejects a non-numeric gap", () => {
    expect(() => parseCliOptions(["--gap", "soon"], quietProgram())).toThrow();
  });

  it("rejects a zero interval", () => {
    expect(() => parseCliOptions(["--interval", "0"], quietProgram())).toThrow();
  });

  it("accepts the longest interval a timer can hold", () => {
    expect(MAX_INTERVAL_SECONDS).toBe(2_147_483);
    expect(parseCliOptions(["--interval", "2147483"], quietProgram()).intervalMs).toBe(2_147_483_000);
  });

  it("rejects an interval a timer would overflow", () => {
    expect(() => parseCliOptions(["--interval", "2147484"], quietProgram())).toThrow(
      "Expected at most 2147483 seconds.",
    );
  });
});
