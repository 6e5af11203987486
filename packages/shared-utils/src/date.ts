import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}

/**
 * YYYY-MM-DD (로컬 타임존 기준 날짜)
 */
export function toIsoDate(value: DateTime): string {
  const iso = value.toISODate();
  if (!iso) throw new Error(`유효하지 않은 날짜: ${value.invalidExplanation ?? 'unknown'}`);
  return iso;
}

/**
 * 여러 포맷을 순서대로 시도해 YYYY-MM-DD로 정규화
 * - 어떤 포맷으로도 읽히지 않으면 null
 */
export function parseDateLoose(raw: string | null | undefined, formats: string[]): string | null {
  const trimmed = raw?.trim();
  if (!trimmed) return null;

  for (const format of formats) {
    const dt = DateTime.fromFormat(trimmed, format);
    if (dt.isValid) return dt.toISODate();
  }

  return null;
}
