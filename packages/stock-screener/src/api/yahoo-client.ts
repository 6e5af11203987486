/**
 * Yahoo Chart API 호출
 * - 일봉 데이터
 * - 비공식 API → 최소 검증만 수행
 */

import { DateTime } from 'luxon';
import { createLogger } from '@divscan/shared-utils';
import { YahooChartResponseSchema, type PriceBar } from '../types.js';

const logger = createLogger('yahoo-chart-client');
const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

/**
 * 캘린더 심볼 → Yahoo 심볼 (클래스주 구분자 '.' → '-', 예: BRK.B → BRK-B)
 */
export function toYahooSymbol(symbol: string): string {
  return symbol.replaceAll('.', '-');
}

/**
 * 최근 일봉 조회
 *
 * 비 2xx 응답은 throw, 스키마 불일치나 빈 결과는 빈 배열.
 * close 또는 volume이 비어 있는 봉은 제외한다.
 */
export async function fetchPriceHistory(
  symbol: string,
  params: { range: string },
): Promise<PriceBar[]> {
  const url = new URL(`${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}`);
  url.searchParams.set('interval', '1d');
  url.searchParams.set('range', params.range);

  const res = await fetch(url);
  if (!res.ok) {
    throw new Error(`Yahoo API failed: ${res.status} (${symbol})`);
  }

  const json: unknown = await res.json();
  const parsed = YahooChartResponseSchema.safeParse(json);

  if (!parsed.success) {
    logger.warn('Yahoo 응답 스키마 불일치', { symbol });
    return [];
  }

  const r = parsed.data.chart.result?.[0];
  const q = r?.indicators.quote[0];
  if (!r || !q) return [];

  const timestamps = r.timestamp ?? [];
  const closes = q.close ?? [];
  const volumes = q.volume ?? [];

  const bars: PriceBar[] = [];
  timestamps.forEach((ts, i) => {
    const close = closes[i];
    const volume = volumes[i];
    if (close === null || close === undefined || volume === null || volume === undefined) return;

    const date = DateTime.fromSeconds(ts, { zone: 'utc' }).toISODate();
    if (!date) return;

    bars.push({ date, close, volume });
  });

  return bars;
}
