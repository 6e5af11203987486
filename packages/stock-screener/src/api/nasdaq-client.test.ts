import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DateTime } from 'luxon';
import {
  fetchDividendDay,
  classifyCompanyName,
  parseExDividendDate,
  toDividendEvent,
} from './nasdaq-client.js';
import { DEFAULT_SCREENER_CONFIG } from '../config.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function calendarBody(rows: unknown[] | null) {
  return { data: { calendar: { rows } }, message: null };
}

describe('Nasdaq Dividend Calendar Client', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('classifyCompanyName', () => {
    it('ADR / ETF / Bond 문자열로 플래그 설정', () => {
      expect(classifyCompanyName('Example Holdings ADR')).toEqual({
        isAdr: true,
        isEtf: false,
        isBond: false,
      });
      expect(classifyCompanyName('Sample Total Bond ETF')).toEqual({
        isAdr: false,
        isEtf: true,
        isBond: true,
      });
    });

    it('대소문자를 구분한다', () => {
      expect(classifyCompanyName('Adriatic Bonded Etf Corp')).toEqual({
        isAdr: false,
        isEtf: false,
        isBond: true, // "Bonded"에 "Bond" 포함
      });
    });
  });

  describe('parseExDividendDate', () => {
    it('M/d/yyyy 형식을 YYYY-MM-DD로 변환', () => {
      expect(parseExDividendDate('10/20/2026')).toBe('2026-10-20');
      expect(parseExDividendDate('1/5/2027')).toBe('2027-01-05');
    });

    it('ISO 날짜도 허용', () => {
      expect(parseExDividendDate('2026-10-21')).toBe('2026-10-21');
    });

    it('해석할 수 없는 값은 null', () => {
      expect(parseExDividendDate('N/A')).toBeNull();
      expect(parseExDividendDate('')).toBeNull();
      expect(parseExDividendDate(null)).toBeNull();
      expect(parseExDividendDate(undefined)).toBeNull();
    });
  });

  describe('toDividendEvent', () => {
    it('문자열 금액과 날짜 필드를 정규화', () => {
      const event = toDividendEvent({
        symbol: 'SAMP',
        companyName: 'Sample Corp ADR',
        dividend_Ex_Date: '10/22/2026',
        dividend_Rate: '$0.45',
        payment_Date: '11/05/2026',
        record_Date: '10/22/2026',
        announcement_Date: '--',
        indicated_Annual_Dividend: 1.8,
      });

      expect(event).toEqual({
        symbol: 'SAMP',
        companyName: 'Sample Corp ADR',
        exDividendDate: '2026-10-22',
        dividendRate: 0.45,
        isAdr: true,
        isEtf: false,
        isBond: false,
        paymentDate: '2026-11-05',
        recordDate: '2026-10-22',
        announcementDate: null,
        annualDividend: 1.8,
      });
    });

    it('숫자가 아닌 배당금은 null', () => {
      const event = toDividendEvent({
        symbol: 'SAMP',
        companyName: 'Sample Corp',
        dividend_Rate: 'N/A',
      });

      expect(event.dividendRate).toBeNull();
      expect(event.exDividendDate).toBeNull();
    });
  });

  describe('fetchDividendDay', () => {
    it('date 파라미터와 브라우저 헤더로 요청', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(calendarBody([])));

      await fetchDividendDay(DateTime.fromISO('2026-10-20T13:00:00'));

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [input, init] = fetchMock.mock.calls[0];
      expect(String(input)).toBe('https://api.nasdaq.com/api/calendar/dividends?date=2026-10-20');
      expect(init?.headers).toEqual(DEFAULT_SCREENER_CONFIG.calendarHeaders);
    });

    it('rows를 DividendEvent로 변환', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(
          calendarBody([
            {
              symbol: 'AAA',
              companyName: 'Alpha Income Corp',
              dividend_Ex_Date: '10/20/2026',
              dividend_Rate: 0.75,
            },
            {
              symbol: 'BBB.B',
              companyName: 'Beta Global Bond ETF',
              dividend_Ex_Date: 'bad-date',
              dividend_Rate: 0.1,
            },
          ]),
        ),
      );

      const events = await fetchDividendDay(DateTime.fromISO('2026-10-20'));

      expect(events).toHaveLength(2);
      expect(events[0]).toMatchObject({
        symbol: 'AAA',
        exDividendDate: '2026-10-20',
        dividendRate: 0.75,
        isAdr: false,
        isEtf: false,
        isBond: false,
      });
      expect(events[1]).toMatchObject({
        symbol: 'BBB.B',
        exDividendDate: null,
        isEtf: true,
        isBond: true,
      });
    });

    it('비 2xx 응답이면 빈 배열', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'Forbidden' }, 403));

      const events = await fetchDividendDay(DateTime.fromISO('2026-10-20'));

      expect(events).toEqual([]);
    });

    it('네트워크 오류면 빈 배열', async () => {
      fetchMock.mockRejectedValueOnce(new Error('socket hang up'));

      const events = await fetchDividendDay(DateTime.fromISO('2026-10-20'));

      expect(events).toEqual([]);
    });

    it('JSON이 아닌 응답이면 빈 배열', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>blocked</html>', { status: 200 }));

      const events = await fetchDividendDay(DateTime.fromISO('2026-10-20'));

      expect(events).toEqual([]);
    });

    it('data / calendar / rows 중 하나라도 없으면 빈 배열', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ data: null }))
        .mockResolvedValueOnce(jsonResponse({ data: { calendar: null } }))
        .mockResolvedValueOnce(jsonResponse(calendarBody(null)))
        .mockResolvedValueOnce(jsonResponse({}));

      for (let i = 0; i < 4; i++) {
        expect(await fetchDividendDay(DateTime.fromISO('2026-10-20'))).toEqual([]);
      }
    });

    it('형식이 잘못된 row만 건너뛴다', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(
          calendarBody([
            { companyName: 'No Symbol Inc' },
            { symbol: 'CCC', companyName: 'Gamma Corp', dividend_Ex_Date: '10/21/2026' },
          ]),
        ),
      );

      const events = await fetchDividendDay(DateTime.fromISO('2026-10-21'));

      expect(events.map((e) => e.symbol)).toEqual(['CCC']);
    });

    it('설정된 URL과 헤더를 사용', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(calendarBody([])));

      await fetchDividendDay(DateTime.fromISO('2026-10-22'), {
        calendarUrl: 'https://calendar.test/dividends',
        calendarHeaders: { Accept: 'application/json' },
      });

      const [input, init] = fetchMock.mock.calls[0];
      expect(String(input)).toBe('https://calendar.test/dividends?date=2026-10-22');
      expect(init?.headers).toEqual({ Accept: 'application/json' });
    });
  });
});
