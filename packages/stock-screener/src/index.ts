// Main exports for @divscan/stock-screener

// Types
export type {
  DividendEvent,
  PriceBar,
  PriceMetrics,
  EnrichedRecord,
  ScreenedDividendStock,
  ScanWindow,
  ScreenerConfig,
  ScreeningResult,
  NasdaqDividendRow,
} from './types.js';

// Config
export {
  DEFAULT_SCREENER_CONFIG,
  DEFAULT_CALENDAR_HEADERS,
  NASDAQ_DIVIDEND_CALENDAR_URL,
  loadScreenerConfig,
} from './config.js';

// Calendar
export { addBusinessDays, isBusinessDay, computeScanWindow } from './calendar/business-days.js';
export { fetchDividendRange } from './calendar/dividend-range.js';

// API Clients
export {
  fetchDividendDay,
  classifyCompanyName,
  parseExDividendDate,
  toDividendEvent,
} from './api/nasdaq-client.js';
export { fetchPriceHistory, toYahooSymbol } from './api/yahoo-client.js';

// Dividend Metrics / Screener
export {
  calculateSMA,
  calculateDividendYield,
  calculateDollarVolume,
  calculatePriceMetrics,
  MIN_HISTORY_BARS,
  SMA_PERIOD,
} from './dividend/metrics.js';
export {
  enrichDividendEvents,
  filterScreenedStocks,
  sortByExDividendDate,
  enrichAndFilter,
} from './dividend/screener.js';

// Report
export { exportScreener, formatScreenerTable, formatScreenerCsv } from './report/exporter.js';

// Pipeline
export { runDividendScreener } from './pipeline.js';
