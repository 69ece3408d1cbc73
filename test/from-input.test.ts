import { describe, it, expect } from 'vitest';
import { normalizeEntries, normalizeEntry } from '../src';
import type { AttendanceRecord, RawAttendanceEntry } from '../src';
import { day } from './helpers/factories';

describe('normalizeEntry', () => {
  it('periods 支持 tuple 与 { start, end } 两种写法，缺失端点记空串', () => {
    const r = normalizeEntry({
      date: '2025-01-15',
      periods: [['09:00', '12:00'], { start: '13:00', end: null }, [undefined, '18:00']],
    });
    expect(r).toEqual<AttendanceRecord>({
      date: { kind: 'resolved', day: day(2025, 1, 15) },
      periods: [
        ['09:00', '12:00'],
        ['13:00', ''],
        ['', '18:00'],
      ],
    });
  });

  it('clock_in / clock_out（含 camelCase）作为兜底 period', () => {
    expect(normalizeEntry({ date: '15/01/2025', clock_in: '09:00', clock_out: '17:00' })).toEqual({
      date: { kind: 'resolved', day: day(2025, 1, 15) },
      periods: [],
      fallbackPeriod: ['09:00', '17:00'],
    });
    expect(normalizeEntry({ date: '2025-01-15', clockIn: '08:00', clockOut: '16:00' }).fallbackPeriod).toEqual([
      '08:00',
      '16:00',
    ]);
  });

  it('只有一端时不生成兜底 period', () => {
    expect(normalizeEntry({ date: '2025-01-15', clock_in: '09:00' })).toEqual({
      date: { kind: 'resolved', day: day(2025, 1, 15) },
      periods: [],
    });
  });

  it('缺日期 / 坏日期保留为 unresolved', () => {
    expect(normalizeEntry({ periods: [] }).date).toEqual({ kind: 'unresolved', label: '' });
    expect(normalizeEntry({ date: '32/13/2025' }).date).toEqual({ kind: 'unresolved', label: '32/13/2025' });
  });

  it('Date 实例按传入的时区取日历日', () => {
    const at = new Date('2025-01-31T20:00:00Z');
    expect(normalizeEntry({ date: at }).date).toEqual({ kind: 'resolved', day: day(2025, 1, 31) });
    expect(normalizeEntry({ date: at }, 'Asia/Tokyo').date).toEqual({ kind: 'resolved', day: day(2025, 2, 1) });
  });

  it('抓取数据形状不对时不抛错：null / 标量 period 记成空串', () => {
    const entry: RawAttendanceEntry = JSON.parse(
      '{"date":"2025-01-16","periods":[null,["09:00","10:00"],"09:00-17:00",[900,1700]]}',
    );
    expect(normalizeEntry(entry).periods).toEqual([
      ['', ''],
      ['09:00', '10:00'],
      ['', ''],
      ['', ''],
    ]);
  });

  it('periods 不是数组时按空处理，clock 对仍可兜底', () => {
    const entry: RawAttendanceEntry = JSON.parse(
      '{"date":"2025-01-16","periods":"09:00-17:00","clock_in":"09:00","clock_out":"17:00"}',
    );
    expect(normalizeEntry(entry)).toEqual<AttendanceRecord>({
      date: { kind: 'resolved', day: day(2025, 1, 16) },
      periods: [],
      fallbackPeriod: ['09:00', '17:00'],
    });
  });

  it('非字符串的 clock_in / clock_out 不生成兜底 period', () => {
    const entry: RawAttendanceEntry = JSON.parse('{"date":"2025-01-16","clock_in":900,"clock_out":1700}');
    expect(normalizeEntry(entry).fallbackPeriod).toBeUndefined();
  });

  it('null 记录得到一条未解析日期的空记录', () => {
    expect(normalizeEntry(null)).toEqual<AttendanceRecord>({
      date: { kind: 'unresolved', label: '' },
      periods: [],
    });
  });

  it('normalizeEntries 保持顺序', () => {
    const rs = normalizeEntries([{ date: '2025-01-02' }, { date: '2025-01-01' }]);
    expect(rs.map((r) => r.date)).toEqual([
      { kind: 'resolved', day: day(2025, 1, 2) },
      { kind: 'resolved', day: day(2025, 1, 1) },
    ]);
  });
});
