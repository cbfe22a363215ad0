import { MARKET_UNRESOLVED_DIRECTION } from "../../config.js";
import type { ChangeDirection, DrawdownSeverity, TickerSnapshot } from "../../types.js";

export const NOT_AVAILABLE = "N/A";
export const SEVERE_DRAWDOWN_PCT = 10;

export type ResolvedFields = {
  name: string;
  price?: number;
  yearHigh?: number;
  dailyChangePct: string;
};

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

/** Two-decimal percentage string; "N/A" for anything that is not a finite number. */
export function formatPercent(value: number | undefined): string {
  if (value === undefined || !Number.isFinite(value)) return NOT_AVAILABLE;
  return `${roundTo(value, 2).toFixed(2)}%`;
}

/** Reads back a string produced by formatPercent. */
export function parsePercent(text: string): number | undefined {
  if (!text.endsWith("%")) return undefined;
  const body = text.slice(0, -1).trim();
  if (!body) return undefined;
  const value = Number(body);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Signed decline from the 52-week high: below the high is negative,
 * above a stale high is positive.
 */
export function computeDrawdownPct(price: number | undefined, yearHigh: number | undefined): string {
  if (price === undefined || yearHigh === undefined) return NOT_AVAILABLE;
  if (Number.isNaN(price) || Number.isNaN(yearHigh) || yearHigh === 0) return NOT_AVAILABLE;
  // Magnitude is rounded before the sign is applied.
  const magnitude = roundTo(((yearHigh - price) / yearHigh) * 100, 2);
  return formatPercent(magnitude === 0 ? 0 : -magnitude);
}

export function classifyDrawdown(drawdownPct: string): DrawdownSeverity {
  const value = parsePercent(drawdownPct);
  if (value === undefined) return "NORMAL";
  return Math.abs(value) >= SEVERE_DRAWDOWN_PCT ? "SEVERE" : "NORMAL";
}

export function classifyChange(
  dailyChangePct: string,
  unresolved: ChangeDirection = MARKET_UNRESOLVED_DIRECTION,
): ChangeDirection {
  const value = parsePercent(dailyChangePct);
  if (value === undefined) return unresolved;
  return value < 0 ? "DOWN" : "UP";
}

export function buildSnapshot(
  symbol: string,
  fields: ResolvedFields,
  unresolved: ChangeDirection = MARKET_UNRESOLVED_DIRECTION,
): TickerSnapshot {
  const drawdownPct = computeDrawdownPct(fields.price, fields.yearHigh);
  return {
    symbol,
    name: fields.name,
    price: fields.price,
    yearHigh: fields.yearHigh,
    drawdownPct,
    dailyChangePct: fields.dailyChangePct,
    drawdownSeverity: classifyDrawdown(drawdownPct),
    changeDirection: classifyChange(fields.dailyChangePct, unresolved),
  };
}
