import { DateTime } from 'luxon';
import { toIsoDate } from '@divscan/shared-utils';
import type { ScanWindow, ScreenerConfig } from '../types.js';

/**
 * 월~금 여부 (휴장일 캘린더는 반영하지 않음)
 */
export function isBusinessDay(date: DateTime): boolean {
  // 6=Saturday, 7=Sunday
  return date.weekday <= 5;
}

/**
 * N 영업일 뒤 날짜
 *
 * 하루씩 전진하며 평일만 센다. 주말은 세지 않고 건너뛴다.
 * n <= 0이면 start를 그대로 돌려준다.
 *
 * @example
 * ```typescript
 * // 2026-10-16(금) + 1영업일 = 2026-10-19(월)
 * addBusinessDays(DateTime.fromISO('2026-10-16'), 1);
 * ```
 */
export function addBusinessDays(start: DateTime, n: number): DateTime {
  let current = start;
  let daysAdded = 0;

  while (daysAdded < n) {
    current = current.plus({ days: 1 });
    if (isBusinessDay(current)) {
      daysAdded++;
    }
  }

  return current;
}

/**
 * 스캔 구간 = [today - lookback일, today + lookahead 영업일]
 */
export function computeScanWindow(
  today: DateTime,
  config: Pick<ScreenerConfig, 'windowLookbackDays' | 'windowLookaheadBusinessDays'>,
): ScanWindow {
  const base = today.startOf('day');

  return {
    start: toIsoDate(base.minus({ days: config.windowLookbackDays })),
    end: toIsoDate(addBusinessDays(base, config.windowLookaheadBusinessDays)),
  };
}
