import { createLogger, errorMessage } from '@divscan/shared-utils';
import { fetchPriceHistory, toYahooSymbol } from '../api/yahoo-client.js';
import { calculatePriceMetrics, hasRisenOverLookback, isAboveSma50 } from './metrics.js';
import type {
  DividendEvent,
  EnrichedRecord,
  PriceMetrics,
  ScreenedDividendStock,
  ScreenerConfig,
} from '../types.js';

const logger = createLogger('dividend-screener');

/**
 * 배당락 이벤트마다 시세를 붙인다.
 *
 * 종목 하나의 조회 실패는 배치를 멈추지 않고 metrics = null로 남긴다.
 * 요청은 순차 실행.
 */
export async function enrichDividendEvents(
  events: DividendEvent[],
  config: Pick<ScreenerConfig, 'historyRange'>,
): Promise<EnrichedRecord[]> {
  const records: EnrichedRecord[] = [];

  for (const event of events) {
    const yahooSymbol = toYahooSymbol(event.symbol);
    let metrics: PriceMetrics | null = null;

    try {
      const bars = await fetchPriceHistory(yahooSymbol, { range: config.historyRange });
      metrics = calculatePriceMetrics(bars, event.dividendRate);

      if (metrics === null) {
        logger.debug('지표 계산 불가 (스킵)', {
          symbol: event.symbol,
          bars: bars.length,
          dividendRate: event.dividendRate,
        });
      }
    } catch (error) {
      logger.warn('시세 조회 실패 (스킵)', {
        symbol: event.symbol,
        yahooSymbol,
        error: errorMessage(error),
      });
    }

    records.push({
      ...event,
      metrics,
      roseLastFivePeriods: hasRisenOverLookback(metrics),
      aboveSma50: isAboveSma50(metrics),
    });
  }

  return records;
}

/**
 * 거래대금 / 배당 수익률 필터 (둘 다 초과 조건)
 */
export function filterScreenedStocks(
  records: EnrichedRecord[],
  criteria: Pick<ScreenerConfig, 'minDollarVolume' | 'minYieldPct'>,
): ScreenedDividendStock[] {
  return records.filter(
    (record): record is ScreenedDividendStock =>
      record.metrics !== null &&
      record.metrics.dollarVolume > criteria.minDollarVolume &&
      record.metrics.dividendYieldPct > criteria.minYieldPct,
  );
}

/**
 * 배당락일 오름차순, 날짜 없는 종목은 뒤로
 */
export function sortByExDividendDate<T extends Pick<DividendEvent, 'exDividendDate'>>(
  records: T[],
): T[] {
  return [...records].sort((a, b) => {
    if (a.exDividendDate === b.exDividendDate) return 0;
    if (a.exDividendDate === null) return 1;
    if (b.exDividendDate === null) return -1;
    return a.exDividendDate.localeCompare(b.exDividendDate);
  });
}

/**
 * 시세 보강 → 필터 → 배당락일 정렬
 */
export async function enrichAndFilter(
  events: DividendEvent[],
  config: Pick<ScreenerConfig, 'historyRange' | 'minDollarVolume' | 'minYieldPct'>,
): Promise<ScreenedDividendStock[]> {
  const records = await enrichDividendEvents(events, config);
  const resolvedCount = records.filter((record) => record.metrics !== null).length;
  const passed = sortByExDividendDate(filterScreenedStocks(records, config));

  logger.info('배당주 필터링 완료', {
    total: records.length,
    resolved: resolvedCount,
    passed: passed.length,
    minDollarVolume: config.minDollarVolume,
    minYieldPct: config.minYieldPct,
  });

  return passed;
}
