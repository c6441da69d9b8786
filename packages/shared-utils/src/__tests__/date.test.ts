import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { compactDate, datePath, toIsoString } from '../date.js';

describe('date helpers', () => {
  const dt = DateTime.fromISO('2025-03-04T23:30:00+09:00', { setZone: true });

  it('compactDate는 UTC 기준 yyyyLLdd', () => {
    expect(compactDate(dt)).toBe('20250304');
  });

  it('datePath는 UTC 기준 yyyy/LL/dd', () => {
    expect(datePath(DateTime.fromISO('2025-03-05T01:00:00+09:00', { setZone: true }))).toBe(
      '2025/03/04',
    );
  });

  it('toIsoString은 UTC ISO로 정규화', () => {
    expect(toIsoString('2025-03-04T23:30:00+09:00')).toBe('2025-03-04T14:30:00.000Z');
  });

  it('잘못된 문자열은 에러', () => {
    expect(() => toIsoString('not-a-date')).toThrow('ISO 변환 실패');
  });
});
