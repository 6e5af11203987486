import Big from 'big.js';
import type { PriceBar, PriceMetrics } from '../types.js';

// 5봉 전 종가 + 최근 종가 비교에 필요한 최소 봉 수
export const MIN_HISTORY_BARS = 6;
export const SMA_PERIOD = 50;
// 최근 봉 기준 len - 5 위치의 종가와 비교
export const PRICE_CHANGE_OFFSET = 5;

/**
 * 마지막 period개 값의 단순이동평균
 *
 * @returns 값이 period개 미만이면 null
 */
export function calculateSMA(values: number[], period: number): Big | null {
  if (period <= 0 || values.length < period) {
    return null;
  }

  const slice = values.slice(-period);
  const sum = slice.reduce((acc, val) => acc.plus(val), new Big(0));
  return sum.div(period);
}

/**
 * 배당 수익률 (%) = dividendRate / close * 100, 소수 2자리 (half-even)
 *
 * @returns 종가가 0 이하면 null
 */
export function calculateDividendYield(dividendRate: number, close: number): Big | null {
  if (close <= 0) {
    return null;
  }

  return Big(dividendRate).div(close).times(100).round(2, Big.roundHalfEven);
}

/**
 * 거래대금 = close * volume, 정수 (half-even)
 */
export function calculateDollarVolume(close: number, volume: number): Big {
  return Big(close).times(volume).round(0, Big.roundHalfEven);
}

/**
 * 일봉 기반 지표 계산
 *
 * 봉이 부족하거나, 최근 종가가 0이거나, 배당금이 없으면 null을 돌려준다.
 */
export function calculatePriceMetrics(
  bars: PriceBar[],
  dividendRate: number | null,
): PriceMetrics | null {
  if (bars.length < MIN_HISTORY_BARS || dividendRate === null) {
    return null;
  }

  const latest = bars[bars.length - 1];
  const dividendYield = calculateDividendYield(dividendRate, latest.close);
  if (dividendYield === null) {
    return null;
  }

  const closes = bars.map((bar) => bar.close);
  const sma50 = calculateSMA(closes, SMA_PERIOD);

  return {
    close: latest.close,
    volume: latest.volume,
    sma50: sma50 === null ? null : sma50.toNumber(),
    closeFivePeriodsAgo: closes[closes.length - PRICE_CHANGE_OFFSET],
    dividendYieldPct: dividendYield.toNumber(),
    dollarVolume: calculateDollarVolume(latest.close, latest.volume).toNumber(),
  };
}

export function hasRisenOverLookback(metrics: PriceMetrics | null): boolean {
  return metrics !== null && metrics.close > metrics.closeFivePeriodsAgo;
}

export function isAboveSma50(metrics: PriceMetrics | null): boolean {
  return metrics !== null && metrics.sma50 !== null && metrics.close > metrics.sma50;
}
