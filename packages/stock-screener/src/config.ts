import { env, envNumber } from '@divscan/shared-utils';
import type { ScreenerConfig } from './types.js';

export const NASDAQ_DIVIDEND_CALENDAR_URL = 'https://api.nasdaq.com/api/calendar/dividends';

/**
 * Nasdaq API는 브라우저 시그니처가 없는 요청을 거부한다.
 */
export const DEFAULT_CALENDAR_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'application/json',
  Origin: 'https://www.nasdaq.com',
  Referer: 'https://www.nasdaq.com',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
    '(KHTML, like Gecko) Chrome/58.0.3029.110 Safari/537.3',
};

export const DEFAULT_SCREENER_CONFIG: Readonly<ScreenerConfig> = {
  calendarUrl: NASDAQ_DIVIDEND_CALENDAR_URL,
  calendarHeaders: { ...DEFAULT_CALENDAR_HEADERS },
  minDollarVolume: 1_000_000,
  minYieldPct: 3.0,
  windowLookbackDays: 1,
  windowLookaheadBusinessDays: 10,
  historyRange: '1mo',
  outputPath: './screener.csv',
};

function requireNonNegativeInt(key: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got: ${value}`);
  }
  return value;
}

/**
 * 기본값 < 환경변수 < overrides 순으로 병합
 */
export function loadScreenerConfig(overrides: Partial<ScreenerConfig> = {}): ScreenerConfig {
  const defaults = DEFAULT_SCREENER_CONFIG;

  const config: ScreenerConfig = {
    calendarUrl: env('DIVIDEND_CALENDAR_URL') ?? defaults.calendarUrl,
    calendarHeaders: { ...defaults.calendarHeaders },
    minDollarVolume: envNumber('DIVIDEND_MIN_DOLLAR_VOLUME', defaults.minDollarVolume),
    minYieldPct: envNumber('DIVIDEND_MIN_YIELD_PCT', defaults.minYieldPct),
    windowLookbackDays: envNumber('DIVIDEND_LOOKBACK_DAYS', defaults.windowLookbackDays),
    windowLookaheadBusinessDays: envNumber(
      'DIVIDEND_LOOKAHEAD_BUSINESS_DAYS',
      defaults.windowLookaheadBusinessDays,
    ),
    historyRange: env('YF_HISTORY_RANGE') ?? defaults.historyRange,
    outputPath: env('DIVIDEND_SCREENER_OUTPUT') ?? defaults.outputPath,
    ...overrides,
  };

  requireNonNegativeInt('windowLookbackDays', config.windowLookbackDays);
  requireNonNegativeInt('windowLookaheadBusinessDays', config.windowLookaheadBusinessDays);

  return config;
}
