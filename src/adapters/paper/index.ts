export { createPaperClient, type PaperClient, type PaperClientOptions } from "./client";
export { type Ledger, createLedger } from "./ledger";
export { CANDLE_INTERVAL_MS, buildCandles, synthesizeBook } from "./matching";
