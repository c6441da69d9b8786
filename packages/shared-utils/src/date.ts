import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}

export function toIsoString(value: string | DateTime): string {
  const dt = typeof value === 'string' ? DateTime.fromISO(value, { setZone: true }) : value;

  if (!dt.isValid) throw new Error('ISO 변환 실패');

  const iso = dt.toUTC().toISO();
  if (!iso) throw new Error('ISO 변환 실패');
  return iso;
}

/** yyyyLLdd (예: 20250314). 분석/아티팩트 ID 날짜 구간 */
export function compactDate(dt: DateTime): string {
  return dt.toUTC().toFormat('yyyyLLdd');
}

/** yyyy/LL/dd. 감사 로그 경로의 일자 구간 */
export function datePath(dt: DateTime): string {
  return dt.toUTC().toFormat('yyyy/LL/dd');
}
