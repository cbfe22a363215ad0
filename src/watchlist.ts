import fs from "fs";
import { z } from "zod";

import { WATCHLIST_PATH } from "./config.js";
import type { Sector } from "./types.js";

const watchlistSchema = z.object({
  sectors: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        symbols: z.array(z.string().trim().min(1)).min(1),
      }),
    )
    .min(1),
});

export function parseWatchlist(raw: string, source = "watchlist"): Sector[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${source} is not valid JSON`, { cause: err });
  }
  const parsed = watchlistSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new Error(`${source} is invalid${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown"}`);
  }
  return parsed.data.sectors.map((sector) => ({
    name: sector.name,
    symbols: sector.symbols.map((symbol) => symbol.toUpperCase()),
  }));
}

export function loadWatchlist(filePath = WATCHLIST_PATH): Sector[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Watchlist not found: ${filePath}`);
  }
  return parseWatchlist(fs.readFileSync(filePath, "utf-8"), filePath);
}

export function countTickers(sectors: Sector[]): number {
  return sectors.reduce((total, sector) => total + sector.symbols.length, 0);
}
