import { DateTime } from 'luxon';
import { createLogger, errorMessage, parseDateLoose, toIsoDate } from '@divscan/shared-utils';
import { DEFAULT_SCREENER_CONFIG } from '../config.js';
import {
  NasdaqDividendCalendarResponseSchema,
  NasdaqDividendRowSchema,
  type DividendEvent,
  type NasdaqDividendRow,
  type ScreenerConfig,
} from '../types.js';

const logger = createLogger('nasdaq-dividend-calendar');

// Nasdaq은 10/20/2026 형식, 혹시 모를 ISO도 허용
const CALENDAR_DATE_FORMATS = ['M/d/yyyy', 'yyyy-MM-dd'];

export type CalendarRequestConfig = Pick<ScreenerConfig, 'calendarUrl' | 'calendarHeaders'>;

/**
 * 회사명 기반 분류 플래그 (대소문자 구분 부분 문자열 매칭)
 */
export function classifyCompanyName(companyName: string): {
  isAdr: boolean;
  isEtf: boolean;
  isBond: boolean;
} {
  return {
    isAdr: companyName.includes('ADR'),
    isEtf: companyName.includes('ETF'),
    isBond: companyName.includes('Bond'),
  };
}

export function parseExDividendDate(raw: string | null | undefined): string | null {
  return parseDateLoose(raw, CALENDAR_DATE_FORMATS);
}

function parseAmount(raw: number | string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;

  const cleaned = raw.replace(/[$,\s]/g, '');
  if (cleaned === '') return null;
  const num = Number(cleaned);
  return Number.isFinite(num) ? num : null;
}

export function toDividendEvent(row: NasdaqDividendRow): DividendEvent {
  return {
    symbol: row.symbol,
    companyName: row.companyName,
    exDividendDate: parseExDividendDate(row.dividend_Ex_Date),
    dividendRate: parseAmount(row.dividend_Rate),
    ...classifyCompanyName(row.companyName),
    paymentDate: parseDateLoose(row.payment_Date, CALENDAR_DATE_FORMATS),
    recordDate: parseDateLoose(row.record_Date, CALENDAR_DATE_FORMATS),
    announcementDate: parseDateLoose(row.announcement_Date, CALENDAR_DATE_FORMATS),
    annualDividend: parseAmount(row.indicated_Annual_Dividend),
  };
}

/**
 * 하루치 배당락 일정 조회
 *
 * 응답 실패(비 2xx, 네트워크 오류, JSON/스키마 불일치)는 모두 "해당 날짜 데이터 없음"으로 처리한다.
 * 재시도하지 않는다.
 */
export async function fetchDividendDay(
  date: DateTime = DateTime.now(),
  config: CalendarRequestConfig = DEFAULT_SCREENER_CONFIG,
): Promise<DividendEvent[]> {
  const isoDate = toIsoDate(date);
  const url = new URL(config.calendarUrl);
  url.searchParams.set('date', isoDate);

  let rawData: unknown;
  try {
    const response = await fetch(url, { headers: config.calendarHeaders });

    if (!response.ok) {
      logger.warn('배당 캘린더 응답 실패', { date: isoDate, status: response.status });
      return [];
    }

    rawData = await response.json();
  } catch (error) {
    logger.warn('배당 캘린더 요청 실패', { date: isoDate, error: errorMessage(error) });
    return [];
  }

  const parsed = NasdaqDividendCalendarResponseSchema.safeParse(rawData);
  if (!parsed.success) {
    logger.warn('배당 캘린더 응답 스키마 불일치', { date: isoDate });
    return [];
  }

  const rows = parsed.data.data?.calendar?.rows ?? [];
  if (rows.length === 0) {
    logger.debug('배당 캘린더 비어 있음', { date: isoDate });
    return [];
  }

  const events: DividendEvent[] = [];
  for (const row of rows) {
    const rowParsed = NasdaqDividendRowSchema.safeParse(row);
    if (!rowParsed.success) {
      logger.warn('배당 캘린더 row 형식 오류 (스킵)', { date: isoDate, row });
      continue;
    }
    events.push(toDividendEvent(rowParsed.data));
  }

  logger.info('배당 캘린더 조회 완료', { date: isoDate, count: events.length });

  return events;
}
