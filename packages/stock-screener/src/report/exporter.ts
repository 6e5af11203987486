import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from '@divscan/shared-utils';
import type { ScreenedDividendStock, ScreenerConfig } from '../types.js';

const logger = createLogger('screener-exporter');

// ============================================================
// 컬럼 정의
// ============================================================

type ColumnAlign = 'left' | 'right';

interface ReportColumn {
  label: string;
  align: ColumnAlign;
  value: (stock: ScreenedDividendStock) => string;
}

const formatValue = (value: number | boolean | string | null): string =>
  value === null ? '' : String(value);

/**
 * 행 키 (배당락일)
 */
const DATE_COLUMN: ReportColumn = {
  label: 'Date',
  align: 'left',
  value: (s) => formatValue(s.exDividendDate),
};

const COLUMNS = {
  ticker: { label: 'Ticker', align: 'left', value: (s) => s.symbol },
  companyName: { label: 'companyName', align: 'left', value: (s) => s.companyName },
  yieldPct: { label: 'Divid %', align: 'right', value: (s) => formatValue(s.metrics.dividendYieldPct) },
  volume: { label: 'Volume', align: 'right', value: (s) => formatValue(s.metrics.volume) },
  close: { label: 'Close', align: 'right', value: (s) => formatValue(s.metrics.close) },
  dividendRate: { label: 'Divid Rate', align: 'right', value: (s) => formatValue(s.dividendRate) },
  rose5: { label: '5_Days_pos', align: 'right', value: (s) => formatValue(s.roseLastFivePeriods) },
  ma50: { label: 'MA50', align: 'right', value: (s) => formatValue(s.aboveSma50) },
  etf: { label: 'etf', align: 'right', value: (s) => formatValue(s.isEtf) },
  adr: { label: 'adr', align: 'right', value: (s) => formatValue(s.isAdr) },
  bond: { label: 'bond', align: 'right', value: (s) => formatValue(s.isBond) },
} satisfies Record<string, ReportColumn>;

// 콘솔: 회사명 제외
const TABLE_COLUMNS: ReportColumn[] = [
  DATE_COLUMN,
  COLUMNS.ticker,
  COLUMNS.yieldPct,
  COLUMNS.volume,
  COLUMNS.close,
  COLUMNS.dividendRate,
  COLUMNS.rose5,
  COLUMNS.ma50,
  COLUMNS.etf,
  COLUMNS.adr,
  COLUMNS.bond,
];

const CSV_COLUMNS: ReportColumn[] = [
  DATE_COLUMN,
  COLUMNS.ticker,
  COLUMNS.companyName,
  COLUMNS.yieldPct,
  COLUMNS.volume,
  COLUMNS.close,
  COLUMNS.dividendRate,
  COLUMNS.rose5,
  COLUMNS.ma50,
  COLUMNS.etf,
  COLUMNS.adr,
  COLUMNS.bond,
];

// ============================================================
// 포맷터
// ============================================================

/**
 * 고정 폭 텍스트 표 (컬럼 간 공백 2칸)
 */
export function formatScreenerTable(stocks: ScreenedDividendStock[]): string {
  const cells = stocks.map((stock) => TABLE_COLUMNS.map((column) => column.value(stock)));
  const widths = TABLE_COLUMNS.map((column, i) =>
    Math.max(column.label.length, ...cells.map((row) => row[i].length)),
  );

  const renderRow = (values: string[]) =>
    values
      .map((value, i) =>
        TABLE_COLUMNS[i].align === 'left' ? value.padEnd(widths[i]) : value.padStart(widths[i]),
      )
      .join('  ')
      .trimEnd();

  const lines = [renderRow(TABLE_COLUMNS.map((column) => column.label)), ...cells.map(renderRow)];
  return lines.join('\n');
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * CSV 본문 (헤더 포함, 마지막 줄 개행)
 */
export function formatScreenerCsv(stocks: ScreenedDividendStock[]): string {
  const lines = [
    CSV_COLUMNS.map((column) => escapeCsvField(column.label)).join(','),
    ...stocks.map((stock) =>
      CSV_COLUMNS.map((column) => escapeCsvField(column.value(stock))).join(','),
    ),
  ];
  return `${lines.join('\n')}\n`;
}

// ============================================================
// 출력
// ============================================================

/**
 * 콘솔 표 출력 + CSV 저장
 *
 * 파일 쓰기 실패는 그대로 throw 한다.
 */
export function exportScreener(
  stocks: ScreenedDividendStock[],
  options: Pick<ScreenerConfig, 'outputPath'>,
): string {
  console.log(formatScreenerTable(stocks));

  const reportPath = path.resolve(options.outputPath);
  fs.writeFileSync(reportPath, formatScreenerCsv(stocks), 'utf-8');

  if (stocks.length === 0) {
    logger.info('조건을 통과한 종목 없음 (빈 리포트 저장)', { reportPath });
  } else {
    logger.info('스크리너 리포트 저장', { reportPath, count: stocks.length });
  }

  return reportPath;
}
