import { MARKET_REQUEST_GAP_MS } from "../../config.js";
import type { TickerSnapshot } from "../../types.js";
import { NOT_AVAILABLE, buildSnapshot } from "./metrics.js";
import type { QuoteSource } from "./provider.js";
import { YahooProvider } from "./providers/yahoo.js";
import { resolveTicker } from "./resolver.js";

const provider = new YahooProvider();

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function normalizeMarketSymbol(input: string): string {
  return input.trim().toUpperCase();
}

/**
 * Keeps at least `gapMs` between consecutive provider uses. The first call
 * never waits, so no delay trails the last ticker of a run.
 */
export class RequestPacer {
  private lastRequestAt: number | null = null;

  constructor(
    private gapMs = MARKET_REQUEST_GAP_MS,
    private now: () => number = Date.now,
    private wait: (ms: number) => Promise<void> = sleep,
  ) {}

  async next(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const waitMs = this.gapMs - (this.now() - this.lastRequestAt);
      if (waitMs > 0) {
        await this.wait(waitMs);
      }
    }
    this.lastRequestAt = this.now();
  }
}

export async function getTickerSnapshot(
  rawSymbol: string,
  source: QuoteSource = provider,
): Promise<TickerSnapshot> {
  const symbol = normalizeMarketSymbol(rawSymbol);
  if (!symbol) {
    throw new Error("Ticker symbol is empty");
  }
  return resolveTicker(source, symbol);
}

/** Placeholder for a ticker whose provider could not be reached. */
export function unavailableSnapshot(symbol: string): TickerSnapshot {
  return buildSnapshot(symbol, { name: NOT_AVAILABLE, dailyChangePct: NOT_AVAILABLE });
}
