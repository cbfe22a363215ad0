import { Command, InvalidArgumentError } from "commander";

import { MARKET_REQUEST_GAP_MS, WATCHLIST_PATH } from "./config.js";

export type CliOptions = {
  symbols: string[];
  watchlistPath: string;
  gapMs: number;
  intervalMs?: number;
  color: boolean;
};

function parseNonNegative(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError("Expected a non-negative number.");
  }
  return value;
}

// setInterval takes a signed 32-bit millisecond delay.
export const MAX_INTERVAL_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

function parseInterval(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  if (value > MAX_INTERVAL_SECONDS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_INTERVAL_SECONDS} seconds.`);
  }
  return value;
}

export function buildProgram(): Command {
  return new Command()
    .name("drawdown-watch")
    .description("Print price, 52-week high, drawdown and daily change for a list of tickers")
    .argument("[symbols...]", "tickers to poll instead of the watchlist")
    .option("-w, --watchlist <path>", "watchlist JSON file", WATCHLIST_PATH)
    .option("-g, --gap <ms>", "minimum delay between tickers", parseNonNegative, MARKET_REQUEST_GAP_MS)
    .option("-i, --interval <seconds>", "repeat the scan on this interval", parseInterval)
    .option("--no-color", "disable colored output");
}

/** `argv` excludes the node binary and script path. */
export function parseCliOptions(argv: string[], program: Command = buildProgram()): CliOptions {
  program.parse(argv, { from: "user" });
  const opts = program.opts<{ watchlist: string; gap: number; interval?: number; color: boolean }>();
  return {
    symbols: program.args.map((symbol) => symbol.trim().toUpperCase()).filter(Boolean),
    watchlistPath: opts.watchlist,
    gapMs: opts.gap,
    intervalMs: opts.interval === undefined ? undefined : opts.interval * 1000,
    color: opts.color,
  };
}
