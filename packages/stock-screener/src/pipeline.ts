import { DateTime } from 'luxon';
import { createLogger } from '@divscan/shared-utils';
import { computeScanWindow } from './calendar/business-days.js';
import { fetchDividendRange } from './calendar/dividend-range.js';
import { enrichAndFilter } from './dividend/screener.js';
import { exportScreener } from './report/exporter.js';
import type { ScreenerConfig, ScreeningResult } from './types.js';

const logger = createLogger('dividend-pipeline');

/**
 * 배당 스크리너 1회 실행
 *
 * 스캔 구간 계산 → 배당락 일정 수집 → 시세 보강/필터 → 리포트 출력
 */
export async function runDividendScreener(params: {
  config: ScreenerConfig;
  today?: DateTime;
}): Promise<ScreeningResult> {
  const { config } = params;
  const today = params.today ?? DateTime.now();
  const startTime = Date.now();

  const window = computeScanWindow(today, config);
  logger.info('배당 스크리닝 시작', {
    window,
    minDollarVolume: config.minDollarVolume,
    minYieldPct: config.minYieldPct,
  });

  const events = await fetchDividendRange(
    DateTime.fromISO(window.start),
    DateTime.fromISO(window.end),
    config,
  );

  const stocks = await enrichAndFilter(events, config);

  exportScreener(stocks, config);

  const executionTimeMs = Date.now() - startTime;

  logger.info('배당 스크리닝 완료', {
    totalCandidates: events.length,
    passedCount: stocks.length,
    executionTimeMs,
  });

  return {
    window,
    stocks,
    totalCandidates: events.length,
    passedCount: stocks.length,
    executionTimeMs,
  };
}
