import pino from "pino";

import { LOG_LEVEL } from "./config.js";

// stdout is reserved for the report.
export const logger = pino(
  { level: LOG_LEVEL, base: { name: "drawdown-watch" } },
  pino.destination({ dest: 2, sync: true }),
);
