#!/usr/bin/env node
import { Chalk } from "chalk";

import { parseCliOptions } from "./cli.js";
import { logger } from "./logger.js";
import { createReportStyles, renderRunStart, renderRunSummary } from "./report.js";
import { runPoll, startPollScheduler } from "./scheduler/poll.js";
import { RequestPacer } from "./tools/market/service.js";
import type { Sector } from "./types.js";
import { countTickers, loadWatchlist } from "./watchlist.js";

function write(text: string): void {
  process.stdout.write(`${text}\n`);
}

async function main(): Promise<void> {
  const options = parseCliOptions(process.argv.slice(2));
  const sectors: Sector[] = options.symbols.length > 0
    ? [{ name: "Watchlist", symbols: options.symbols }]
    : loadWatchlist(options.watchlistPath);
  const styles = options.color ? createReportStyles() : createReportStyles(new Chalk({ level: 0 }));
  const pacer = new RequestPacer(options.gapMs);

  const scan = async (): Promise<void> => {
    write(renderRunStart(countTickers(sectors)));
    const summary = await runPoll(sectors, { write, pacer, styles });
    write(renderRunSummary(summary));
  };

  if (options.intervalMs === undefined) {
    await scan();
    return;
  }

  logger.info({ intervalMs: options.intervalMs, tickers: countTickers(sectors) }, "Polling on interval");
  const scheduler = startPollScheduler(scan, options.intervalMs);
  process.once("SIGINT", () => {
    scheduler.stop();
    logger.info("Polling stopped");
  });
}

main().catch((err) => {
  logger.error({ err }, "Fatal error");
  process.exit(1);
});
