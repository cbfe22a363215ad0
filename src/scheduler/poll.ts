import { logger } from "../logger.js";
import { ENTRY_SEPARATOR, type ReportStyles, createReportStyles, renderEntry, renderSectorHeader } from "../report.js";
import { ProviderUnavailableError } from "../tools/market/errors.js";
import type { QuoteSource } from "../tools/market/provider.js";
import { RequestPacer, getTickerSnapshot, unavailableSnapshot } from "../tools/market/service.js";
import type { PollEntry, PollSummary, Sector } from "../types.js";

export type PollOptions = {
  write: (text: string) => void;
  source?: QuoteSource;
  pacer?: RequestPacer;
  styles?: ReportStyles;
};

export type PollScheduler = {
  stop: () => void;
};

export async function pollTicker(symbol: string, source?: QuoteSource): Promise<PollEntry> {
  try {
    return { snapshot: await getTickerSnapshot(symbol, source) };
  } catch (err) {
    if (err instanceof ProviderUnavailableError) {
      logger.warn({ err, symbol }, "Quote provider unavailable");
    } else {
      logger.error({ err, symbol }, "Ticker resolution failed");
    }
    const reason = err instanceof Error ? err.message : String(err);
    return { snapshot: unavailableSnapshot(symbol), failure: reason };
  }
}

/** Polls every ticker in order, one at a time, writing each block as it resolves. */
export async function runPoll(sectors: Sector[], opts: PollOptions): Promise<PollSummary> {
  const pacer = opts.pacer ?? new RequestPacer();
  const styles = opts.styles ?? createReportStyles();
  const entries: PollEntry[] = [];

  for (const sector of sectors) {
    opts.write(renderSectorHeader(sector.name));

    for (const [index, symbol] of sector.symbols.entries()) {
      await pacer.next();
      const entry = await pollTicker(symbol, opts.source);
      entries.push(entry);
      opts.write(renderEntry(entry, styles));
      if (index < sector.symbols.length - 1) {
        opts.write(`\n${ENTRY_SEPARATOR}`);
      }
    }

    opts.write("\n");
  }

  return {
    total: entries.length,
    failed: entries.filter((entry) => entry.failure !== undefined).length,
    entries,
  };
}

/** Reruns `run` every `intervalMs`, starting now; a tick is skipped while a run is in flight. */
export function startPollScheduler(run: () => Promise<unknown>, intervalMs: number): PollScheduler {
  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      logger.warn({ intervalMs }, "Previous poll still running; skipping tick");
      return;
    }
    running = true;
    try {
      await run();
    } catch (err) {
      logger.error({ err }, "Scheduled poll failed");
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => void tick(), intervalMs);
  void tick();

  return {
    stop: () => {
      clearInterval(timer);
    },
  };
}
