import "./env.js";
import path from "path";

import type { ChangeDirection } from "./types.js";

export const PROJECT_ROOT = process.cwd();
export const DATA_DIR = path.join(PROJECT_ROOT, "data");

export const LOG_LEVEL = process.env.LOG_LEVEL || "info";

export const MARKET_YAHOO_API_BASE = (process.env.MARKET_YAHOO_API_BASE || "https://query1.finance.yahoo.com")
  .replace(/\/$/, "");
export const MARKET_YAHOO_COOKIE_URL = process.env.MARKET_YAHOO_COOKIE_URL || "https://fc.yahoo.com";
export const MARKET_USER_AGENT = process.env.MARKET_USER_AGENT
  || "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36";
export const MARKET_REQUEST_GAP_MS = Number(process.env.MARKET_REQUEST_GAP_MS || 500);
export const MARKET_HTTP_TIMEOUT_MS = Number(process.env.MARKET_HTTP_TIMEOUT_MS || 10000);
export const MARKET_UNRESOLVED_DIRECTION = parseDirection(process.env.MARKET_UNRESOLVED_DIRECTION);

export const WATCHLIST_PATH = path.resolve(
  PROJECT_ROOT,
  process.env.WATCHLIST_PATH || path.join(DATA_DIR, "watchlist.json"),
);

function parseDirection(raw: string | undefined): ChangeDirection {
  return (raw || "").trim().toUpperCase() === "DOWN" ? "DOWN" : "UP";
}
