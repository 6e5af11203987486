import { DateTime } from 'luxon';
import { createLogger, toIsoDate } from '@divscan/shared-utils';
import { fetchDividendDay, type CalendarRequestConfig } from '../api/nasdaq-client.js';
import { isBusinessDay } from './business-days.js';
import type { DividendEvent } from '../types.js';

const logger = createLogger('dividend-range');

/**
 * [start, end] 구간 배당락 일정 수집
 *
 * - 평일만 조회하고 주말은 요청 없이 건너뛴다.
 * - 날짜 순 → 날짜 내 API 순서로 이어 붙이며 중복 제거는 하지 않는다.
 * - 평일이 하나도 없거나 start > end면 빈 배열
 */
export async function fetchDividendRange(
  start: DateTime,
  end: DateTime,
  config?: CalendarRequestConfig,
): Promise<DividendEvent[]> {
  const last = end.startOf('day');
  const events: DividendEvent[] = [];
  let fetchedDays = 0;

  for (let day = start.startOf('day'); day.toMillis() <= last.toMillis(); day = day.plus({ days: 1 })) {
    if (!isBusinessDay(day)) continue;

    const dayEvents = await fetchDividendDay(day, config);
    events.push(...dayEvents);
    fetchedDays++;
  }

  logger.info('배당락 일정 수집 완료', {
    start: toIsoDate(start),
    end: toIsoDate(end),
    fetchedDays,
    count: events.length,
  });

  return events;
}
