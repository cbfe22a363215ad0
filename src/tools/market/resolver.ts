import { logger } from "../../logger.js";
import type { ChangeDirection, TickerSnapshot } from "../../types.js";
import { ProviderUnavailableError } from "./errors.js";
import { NOT_AVAILABLE, buildSnapshot, formatPercent } from "./metrics.js";
import type { DailyBar, FastSnapshot, QuoteMetadata, QuoteSource } from "./provider.js";

type Field = "name" | "price" | "yearHigh" | "dailyChangePct";

export type Attempt<T> = {
  label: string;
  run: () => Promise<T | undefined>;
};

function finite(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function text(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * One resolution pass over a source. Fast snapshot and metadata are fetched
 * at most once and shared by every field; nothing outlives the pass.
 */
class QuoteSession {
  private fast: Promise<FastSnapshot> | null = null;
  private bars: Promise<DailyBar[]> | null = null;
  private metadata: Promise<QuoteMetadata> | null = null;
  private answered = false;
  private unreachable: ProviderUnavailableError | null = null;

  constructor(
    private source: QuoteSource,
    readonly symbol: string,
  ) {}

  fastSnapshot(): Promise<FastSnapshot> {
    if (!this.fast) {
      this.fast = this.track(() => this.source.getFastSnapshot(this.symbol));
    }
    return this.fast;
  }

  lastDailyBar(): Promise<DailyBar[]> {
    if (!this.bars) {
      this.bars = this.track(() => this.source.getRecentDailyBars(this.symbol, 1));
    }
    return this.bars;
  }

  quoteMetadata(): Promise<QuoteMetadata> {
    if (!this.metadata) {
      this.metadata = this.track(() => this.source.getMetadata(this.symbol));
    }
    return this.metadata;
  }

  /** Set only when every surface consulted was unreachable. */
  get unavailable(): ProviderUnavailableError | null {
    return this.answered ? null : this.unreachable;
  }

  private track<T>(call: () => Promise<T>): Promise<T> {
    return Promise.resolve()
      .then(call)
      .then(
        (value) => {
          this.answered = true;
          return value;
        },
        (err: unknown) => {
          if (err instanceof ProviderUnavailableError) {
            this.unreachable = err;
          } else {
            this.answered = true;
          }
          throw err;
        },
      );
  }
}

async function firstPresent<T>(
  session: QuoteSession,
  field: Field,
  attempts: Attempt<T>[],
): Promise<T | undefined> {
  for (const attempt of attempts) {
    try {
      const value = await attempt.run();
      if (value !== undefined) return value;
      logger.debug({ symbol: session.symbol, field, attempt: attempt.label }, "Field attempt empty");
    } catch (err) {
      logger.debug({ err, symbol: session.symbol, field, attempt: attempt.label }, "Field attempt failed");
    }
  }
  return undefined;
}

function nameAttempts(s: QuoteSession): Attempt<string>[] {
  return [
    { label: "metadata.shortName", run: async () => text((await s.quoteMetadata()).shortName) },
  ];
}

function priceAttempts(s: QuoteSession): Attempt<number>[] {
  return [
    { label: "fast.lastPrice", run: async () => finite((await s.fastSnapshot()).lastPrice) },
    {
      label: "bars.close",
      run: async () => {
        const bars = await s.lastDailyBar();
        const last = bars[bars.length - 1];
        return last ? finite(last.closePrice) : undefined;
      },
    },
    { label: "metadata.currentPrice", run: async () => finite((await s.quoteMetadata()).currentPrice) },
    {
      label: "metadata.regularMarketPrice",
      run: async () => finite((await s.quoteMetadata()).regularMarketPrice),
    },
  ];
}

function yearHighAttempts(s: QuoteSession): Attempt<number>[] {
  return [
    { label: "fast.yearHigh", run: async () => finite((await s.fastSnapshot()).yearHigh) },
    {
      label: "metadata.fiftyTwoWeekHigh",
      run: async () => finite((await s.quoteMetadata()).fiftyTwoWeekHigh),
    },
  ];
}

function dailyChangeAttempts(s: QuoteSession): Attempt<string>[] {
  return [
    {
      label: "metadata.regularMarketChangePercent",
      run: async () => {
        const value = finite((await s.quoteMetadata()).regularMarketChangePercent);
        return value === undefined ? undefined : formatPercent(value);
      },
    },
  ];
}

/**
 * Resolves every field of a ticker through its fallback chain. Field-level
 * failures fall through to the next attempt or the sentinel; only a source
 * that could not be reached at all surfaces, as ProviderUnavailableError.
 */
export async function resolveTicker(
  source: QuoteSource,
  symbol: string,
  opts?: { unresolvedDirection?: ChangeDirection },
): Promise<TickerSnapshot> {
  const session = new QuoteSession(source, symbol);

  const name = await firstPresent(session, "name", nameAttempts(session));
  const price = await firstPresent(session, "price", priceAttempts(session));
  const yearHigh = await firstPresent(session, "yearHigh", yearHighAttempts(session));
  const dailyChangePct = await firstPresent(session, "dailyChangePct", dailyChangeAttempts(session));

  const unavailable = session.unavailable;
  if (unavailable) {
    throw new ProviderUnavailableError(`${symbol}: ${unavailable.message}`, {
      cause: unavailable,
      symbol,
    });
  }

  return buildSnapshot(
    symbol,
    {
      name: name ?? NOT_AVAILABLE,
      price,
      yearHigh,
      dailyChangePct: dailyChangePct ?? NOT_AVAILABLE,
    },
    opts?.unresolvedDirection,
  );
}
