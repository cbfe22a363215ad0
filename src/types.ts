export type DrawdownSeverity = "NORMAL" | "SEVERE";

export type ChangeDirection = "UP" | "DOWN";

export type TickerSnapshot = {
  symbol: string;
  name: string;
  price?: number;
  yearHigh?: number;
  drawdownPct: string;
  dailyChangePct: string;
  drawdownSeverity: DrawdownSeverity;
  changeDirection: ChangeDirection;
};

export type Sector = {
  name: string;
  symbols: string[];
};

export type PollEntry = {
  snapshot: TickerSnapshot;
  failure?: string;
};

export type PollSummary = {
  total: number;
  failed: number;
  entries: PollEntry[];
};
