import { describe, it, expect } from 'vitest';
import {
  formatCalendarDay,
  formatRecordDate,
  parseCalendarDay,
  resolveRecordDate,
  weekdayOf,
} from '../src';
import { fromEpochDay, toEpochDay } from '../src/state/calendar';
import { day } from './helpers/factories';

describe('parseCalendarDay', () => {
  it('ISO YYYY-MM-DD', () => {
    expect(parseCalendarDay('2025-01-15')).toEqual(day(2025, 1, 15));
  });

  it('ISO 带时间时只取字面日期，不做时区换算', () => {
    expect(parseCalendarDay('2025-01-15T23:30:00Z')).toEqual(day(2025, 1, 15));
    expect(parseCalendarDay('2025-01-15T00:30:00+05:00')).toEqual(day(2025, 1, 15));
  });

  it('DD/MM/YYYY', () => {
    expect(parseCalendarDay('04/01/2025')).toEqual(day(2025, 1, 4));
    expect(parseCalendarDay('15/01/2025')).toEqual(day(2025, 1, 15));
  });

  it('Date 实例默认按 UTC 日历日', () => {
    expect(parseCalendarDay(new Date('2025-01-04T00:00:00Z'))).toEqual(day(2025, 1, 4));
    expect(parseCalendarDay(new Date('2025-01-04T23:59:00Z'))).toEqual(day(2025, 1, 4));
    expect(parseCalendarDay(new Date('nope'))).toBeNull();
  });

  it('Date 实例可以指定时区', () => {
    expect(parseCalendarDay(new Date('2025-01-31T20:00:00Z'), 'Asia/Tokyo')).toEqual(day(2025, 2, 1));
    expect(parseCalendarDay(new Date('2025-02-01T03:00:00Z'), 'America/New_York')).toEqual(day(2025, 1, 31));
  });

  it('不存在的日期 / 其他格式返回 null', () => {
    expect(parseCalendarDay('2025-02-30')).toBeNull();
    expect(parseCalendarDay('2025-13-01')).toBeNull();
    expect(parseCalendarDay('not-a-date')).toBeNull();
    expect(parseCalendarDay('2025/01/15')).toBeNull();
    expect(parseCalendarDay('')).toBeNull();
    expect(parseCalendarDay(undefined)).toBeNull();
  });
});

// vitest.config.ts 把 TZ 设成 America/New_York
describe('宿主 TZ 不影响结果', () => {
  it('UTC 零点的 Date 仍是当天', () => {
    const at = new Date('2025-02-01');
    expect(process.env.TZ).toBe('America/New_York');
    expect(at.getDate()).toBe(31);
    expect(parseCalendarDay(at)).toEqual(day(2025, 2, 1));
  });

  it('字符串日期不受影响', () => {
    expect(parseCalendarDay('2025-02-01')).toEqual(day(2025, 2, 1));
    expect(parseCalendarDay('01/02/2025')).toEqual(day(2025, 2, 1));
    expect(formatCalendarDay(day(2025, 2, 1))).toBe('2025-02-01');
  });
});

describe('resolveRecordDate / formatRecordDate', () => {
  it('解析失败保留原始字符串当 label', () => {
    expect(resolveRecordDate('garbage')).toEqual({ kind: 'unresolved', label: 'garbage' });
    expect(resolveRecordDate(null)).toEqual({ kind: 'unresolved', label: '' });
    expect(formatRecordDate(resolveRecordDate('garbage'))).toBe('garbage');
  });

  it('解析成功统一输出 YYYY-MM-DD', () => {
    expect(formatRecordDate(resolveRecordDate('04/01/2025'))).toBe('2025-01-04');
    expect(formatCalendarDay(day(2025, 12, 31))).toBe('2025-12-31');
  });
});

describe('weekdayOf（0 = 周一）', () => {
  it('2025-01 的几天', () => {
    expect(weekdayOf(day(2025, 1, 3))).toBe(4); // Fri
    expect(weekdayOf(day(2025, 1, 4))).toBe(5); // Sat
    expect(weekdayOf(day(2025, 1, 5))).toBe(6); // Sun
    expect(weekdayOf(day(2025, 1, 6))).toBe(0); // Mon
    expect(weekdayOf(day(2025, 1, 15))).toBe(2); // Wed
  });

  it('1970-01-01 是周四', () => {
    expect(weekdayOf(day(1970, 1, 1))).toBe(3);
  });
});

describe('epoch day', () => {
  it('跨月 / 跨年往返', () => {
    expect(toEpochDay(day(1970, 1, 2))).toBe(1);
    expect(fromEpochDay(toEpochDay(day(2024, 2, 28)) + 1)).toEqual(day(2024, 2, 29));
    expect(fromEpochDay(toEpochDay(day(2024, 12, 31)) + 1)).toEqual(day(2025, 1, 1));
  });
});
