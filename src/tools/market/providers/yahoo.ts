import { z } from "zod";

import {
  MARKET_HTTP_TIMEOUT_MS,
  MARKET_USER_AGENT,
  MARKET_YAHOO_API_BASE,
  MARKET_YAHOO_COOKIE_URL,
} from "../../../config.js";
import { ProviderError, ProviderUnavailableError } from "../errors.js";
import type { DailyBar, FastSnapshot, QuoteMetadata, QuoteSource } from "../provider.js";

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            regularMarketPrice: z.number().nullish(),
            fiftyTwoWeekHigh: z.number().nullish(),
          }),
          timestamp: z.array(z.number()).nullish(),
          indicators: z
            .object({
              quote: z.array(z.object({ close: z.array(z.number().nullable()).nullish() })),
            })
            .nullish(),
        }),
      )
      .nullish(),
    error: z.object({ code: z.string(), description: z.string().nullish() }).nullish(),
  }),
});

const quoteResponseSchema = z.object({
  quoteResponse: z.object({
    result: z.array(z.record(z.string(), z.unknown())).nullish(),
  }),
});

type ChartResult = NonNullable<z.infer<typeof chartResponseSchema>["chart"]["result"]>[number];

export type YahooProviderOptions = {
  baseUrl?: string;
  cookieUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
};

/** The quote endpoint only answers with a session cookie and its matching crumb. */
type YahooSession = {
  cookie: string;
  crumb: string;
};

/** Yahoo spells share classes with a dash: BRK.B -> BRK-B. */
export function toYahooSymbol(symbol: string): string {
  const upper = symbol.trim().toUpperCase();
  if (/^[A-Z]{1,5}\.[AB]$/.test(upper)) {
    return upper.replace(".", "-");
  }
  return upper;
}

export class YahooProvider implements QuoteSource {
  private baseUrl: string;
  private cookieUrl: string;
  private userAgent: string;
  private timeoutMs: number;
  private session: Promise<YahooSession> | null = null;

  constructor(opts: YahooProviderOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? MARKET_YAHOO_API_BASE).replace(/\/$/, "");
    this.cookieUrl = opts.cookieUrl ?? MARKET_YAHOO_COOKIE_URL;
    this.userAgent = opts.userAgent ?? MARKET_USER_AGENT;
    this.timeoutMs = opts.timeoutMs ?? MARKET_HTTP_TIMEOUT_MS;
  }

  async getFastSnapshot(symbol: string): Promise<FastSnapshot> {
    const chart = await this.fetchChart(symbol, "1d");
    return {
      lastPrice: chart.meta.regularMarketPrice ?? undefined,
      yearHigh: chart.meta.fiftyTwoWeekHigh ?? undefined,
    };
  }

  async getRecentDailyBars(symbol: string, lookback = 1): Promise<DailyBar[]> {
    const chart = await this.fetchChart(symbol, "5d");
    const timestamps = chart.timestamp ?? [];
    const closes = chart.indicators?.quote[0]?.close ?? [];

    const bars: DailyBar[] = [];
    timestamps.forEach((ts, i) => {
      const close = closes[i];
      if (close === null || close === undefined || !Number.isFinite(close)) return;
      bars.push({ date: new Date(ts * 1000).toISOString().slice(0, 10), closePrice: close });
    });
    return lookback > 0 ? bars.slice(-lookback) : [];
  }

  async getMetadata(symbol: string): Promise<QuoteMetadata> {
    const parsed = quoteResponseSchema.safeParse(await this.fetchQuote(symbol));
    if (!parsed.success) {
      throw new ProviderError(`Unexpected quote payload for ${symbol}`, { cause: parsed.error });
    }
    const first = parsed.data.quoteResponse.result?.[0];
    if (!first) {
      throw new ProviderError(`No quote metadata for ${symbol}`);
    }
    return first;
  }

  // A rejected crumb gets one retry with a fresh session.
  private async fetchQuote(symbol: string, retry = true): Promise<unknown> {
    const session = await this.getSession();
    const url = `${this.baseUrl}/v7/finance/quote?symbols=${encodeURIComponent(toYahooSymbol(symbol))}`
      + `&crumb=${encodeURIComponent(session.crumb)}`;
    const res = await this.request(url, { Cookie: session.cookie });
    if (res.status === 401 && retry) {
      this.session = null;
      return this.fetchQuote(symbol, false);
    }
    return readJson(res);
  }

  private getSession(): Promise<YahooSession> {
    if (!this.session) {
      this.session = this.openSession().catch((err: unknown) => {
        this.session = null;
        throw err;
      });
    }
    return this.session;
  }

  private async openSession(): Promise<YahooSession> {
    // The cookie endpoint answers 404 but still sets the session cookie.
    const seed = await this.request(this.cookieUrl, {}, "manual");
    const cookie = seed.headers
      .getSetCookie()
      .map((header) => header.split(";")[0]?.trim() ?? "")
      .filter(Boolean)
      .join("; ");
    if (!cookie) {
      throw new ProviderError("Quote provider issued no session cookie");
    }

    const res = await this.request(`${this.baseUrl}/v1/test/getcrumb`, { Cookie: cookie });
    if (!res.ok) {
      throw new ProviderError(`Crumb request failed: ${res.status}`);
    }
    const crumb = (await res.text()).trim();
    if (!crumb || crumb.startsWith("<") || crumb.startsWith("{")) {
      throw new ProviderError("Quote provider returned no crumb");
    }
    return { cookie, crumb };
  }

  private async fetchChart(symbol: string, range: string): Promise<ChartResult> {
    const url = `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(toYahooSymbol(symbol))}`
      + `?range=${range}&interval=1d`;
    const parsed = chartResponseSchema.safeParse(await this.fetchJson(url));
    if (!parsed.success) {
      throw new ProviderError(`Unexpected chart payload for ${symbol}`, { cause: parsed.error });
    }
    const { result, error } = parsed.data.chart;
    if (error) {
      throw new ProviderError(`Chart error for ${symbol}: ${error.description || error.code}`);
    }
    const first = result?.[0];
    if (!first) {
      throw new ProviderError(`No chart data for ${symbol}`);
    }
    return first;
  }

  private async fetchJson(url: string): Promise<unknown> {
    return readJson(await this.request(url));
  }

  private async request(
    url: string,
    headers: Record<string, string> = {},
    redirect: "follow" | "manual" = "follow",
  ): Promise<Response> {
    try {
      return await fetch(url, {
        headers: { "User-Agent": this.userAgent, Accept: "application/json", ...headers },
        redirect,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ProviderUnavailableError(`Quote provider unreachable: ${errorMessage(err)}`, { cause: err });
    }
  }
}

async function readJson(res: Response): Promise<unknown> {
  if (res.status === 429) {
    throw new ProviderError("Rate limited by quote provider");
  }
  if (!res.ok) {
    throw new ProviderError(`Request failed: ${res.status}`);
  }

  try {
    return await res.json();
  } catch (err) {
    throw new ProviderError("Invalid JSON from quote provider", { cause: err });
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
