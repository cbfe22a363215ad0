import path from "path";
import { describe, expect, it } from "vitest";

import { countTickers, loadWatchlist, parseWatchlist } from "../watchlist.js";

describe("parseWatchlist", () => {
  it("reads sectors in order and upper-cases symbols", () => {
    const sectors = parseWatchlist(
      JSON.stringify({ sectors: [{ name: "Financial", symbols: ["v", "brk-b"] }, { name: "ETF", symbols: ["QQQM"] }] }),
    );

    expect(sectors).toEqual([
      { name: "Financial", symbols: ["V", "BRK-B"] },
      { name: "ETF", symbols: ["QQQM"] },
    ]);
    expect(countTickers(sectors)).toBe(3);
  });

  it("rejects malformed JSON", () => {
    expect(() => parseWatchlist("{sectors:", "list.json")).toThrow("list.json is not valid JSON");
  });

  it("points at the offending entry", () => {
    expect(() => parseWatchlist(JSON.stringify({ sectors: [{ name: "Tech", symbols: [""] }] }))).toThrow(
      /^watchlist is invalid at sectors\.0\.symbols\.0:/,
    );
  });

  it("requires at least one sector", () => {
    expect(() => parseWatchlist(JSON.stringify({ sectors: [] }))).toThrow(/invalid at sectors:/);
  });
});

describe("loadWatchlist", () => {
  it("loads the bundled watchlist", () => {
    const sectors = loadWatchlist(path.resolve("data/watchlist.json"));

    expect(sectors).toHaveLength(7);
    expect(sectors[0]?.name).toBe("Technology");
    expect(sectors[2]).toEqual({ name: "Financial", symbols: ["V", "BRK-B"] });
    expect(countTickers(sectors)).toBe(29);
  });

  it("fails when the file is missing", () => {
    const missing = path.resolve("data/does-not-exist.json");
    expect(() => loadWatchlist(missing)).toThrow(`Watchlist not found: ${missing}`);
  });
});
