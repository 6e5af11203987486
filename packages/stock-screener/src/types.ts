import { z } from 'zod';

// ============================================================
// Nasdaq Dividend Calendar API
// ============================================================

/**
 * 배당 캘린더 row
 * - symbol / companyName 외에는 빠져도 row 자체는 유지한다.
 * - 금액 필드는 숫자 또는 문자열("0.25")로 내려온다.
 */
export const NasdaqDividendRowSchema = z.object({
  symbol: z.string(),
  companyName: z.string(),
  dividend_Ex_Date: z.string().nullish(),
  dividend_Rate: z.union([z.number(), z.string()]).nullish(),
  payment_Date: z.string().nullish(),
  record_Date: z.string().nullish(),
  announcement_Date: z.string().nullish(),
  indicated_Annual_Dividend: z.union([z.number(), z.string()]).nullish(),
});

export type NasdaqDividendRow = z.infer<typeof NasdaqDividendRowSchema>;

/**
 * data.calendar.rows 까지 어느 단계가 비어도 빈 결과로 취급
 */
export const NasdaqDividendCalendarResponseSchema = z.object({
  data: z
    .object({
      calendar: z
        .object({
          rows: z.array(z.unknown()).nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

// ============================================================
// Yahoo Chart API
// ============================================================

const YahooQuoteSchema = z.object({
  close: z.array(z.number().nullable()).optional(),
  volume: z.array(z.number().nullable()).optional(),
});

const YahooChartResultSchema = z.object({
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(YahooQuoteSchema),
  }),
});

export const YahooChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(YahooChartResultSchema).nullable(),
  }),
});

// ============================================================
// Dividend Screening
// ============================================================

/**
 * 배당락 이벤트 (캘린더 row 1개)
 *
 * isAdr / isEtf / isBond는 회사명 부분 문자열 매칭 결과라 근사치다.
 */
export interface DividendEvent {
  symbol: string;
  companyName: string;
  exDividendDate: string | null; // YYYY-MM-DD, 파싱 실패 시 null
  dividendRate: number | null; // 주당 배당금
  isAdr: boolean;
  isEtf: boolean;
  isBond: boolean;
  paymentDate: string | null;
  recordDate: string | null;
  announcementDate: string | null;
  annualDividend: number | null;
}

/**
 * 일봉 1개 (close / volume 둘 다 있는 봉만)
 */
export interface PriceBar {
  date: string; // YYYY-MM-DD
  close: number;
  volume: number;
}

export interface PriceMetrics {
  close: number; // 최근 종가
  volume: number; // 최근 거래량
  sma50: number | null; // 50봉 단순이동평균, 50봉 미만이면 null
  closeFivePeriodsAgo: number;
  dividendYieldPct: number; // 소수 2자리
  dollarVolume: number; // 종가 x 거래량, 정수
}

/**
 * metrics가 null이면 시세 부족/조회 실패로 계산하지 못한 종목
 */
export interface EnrichedRecord extends DividendEvent {
  metrics: PriceMetrics | null;
  roseLastFivePeriods: boolean;
  aboveSma50: boolean;
}

export interface ScreenedDividendStock extends EnrichedRecord {
  metrics: PriceMetrics;
}

export interface ScanWindow {
  start: string; // YYYY-MM-DD
  end: string; // YYYY-MM-DD
}

export interface ScreenerConfig {
  calendarUrl: string;
  calendarHeaders: Record<string, string>;
  minDollarVolume: number;
  minYieldPct: number;
  windowLookbackDays: number;
  windowLookaheadBusinessDays: number;
  historyRange: string; // Yahoo range (예: 1mo, 3mo)
  outputPath: string;
}

export interface ScreeningResult {
  window: ScanWindow;
  stocks: ScreenedDividendStock[];
  totalCandidates: number;
  passedCount: number;
  executionTimeMs: number;
}
