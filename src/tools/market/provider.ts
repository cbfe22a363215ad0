export type FastSnapshot = {
  lastPrice?: number;
  yearHigh?: number;
};

export type DailyBar = {
  date: string;
  closePrice: number;
};

export type QuoteMetadata = Record<string, unknown>;

/**
 * The three query surfaces of a quote provider. Each one is independent:
 * it may be partially populated, empty, or reject with a ProviderError
 * (answered but unusable) or a ProviderUnavailableError (not reachable).
 */
export interface QuoteSource {
  getFastSnapshot(symbol: string): Promise<FastSnapshot>;
  /** Oldest first; may be empty. */
  getRecentDailyBars(symbol: string, lookback?: number): Promise<DailyBar[]>;
  getMetadata(symbol: string): Promise<QuoteMetadata>;
}
