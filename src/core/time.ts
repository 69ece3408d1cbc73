import { Period, RawPeriod, TimeOfDay } from './types';
import { round4 } from './math';
import { createLogger } from '../logger';

const logger = createLogger('core.time');

const MINUTES_PER_DAY = 24 * 60;

// "H:MM" / "HH:MM"，抓取数据偶尔带秒，秒直接忽略
const TIME_RE = /^(\d{1,2}):(\d{1,2})(?::\d{1,2})?$/;

/**
 * 解析 "HH:MM"。失败返回 null，不做取模修正（25:00 是错误，不是 01:00）。
 */
export function parseTime(s: unknown): TimeOfDay | null {
  if (typeof s !== 'string') return null;
  const trimmed = s.trim();
  if (!trimmed) return null;

  const m = TIME_RE.exec(trimmed);
  if (!m) {
    logger.warn('Failed to parse time string', { kind: 'UnparseableTime', timeString: s });
    return null;
  }

  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) {
    logger.warn('Invalid time values', { kind: 'UnparseableTime', timeString: s, hour, minute });
    return null;
  }

  return Object.freeze({ hour, minute });
}

/** 两端都能解析才算有效 period */
export function parsePeriod([startStr, endStr]: RawPeriod): Period | null {
  const start = parseTime(startStr);
  const end = parseTime(endStr);
  return start && end ? { start, end } : null;
}

export const toMinutes = (t: TimeOfDay) => t.hour * 60 + t.minute;

/**
 * end <= start 时按跨午夜处理（end + 24h）。引擎不会遇到超过 24h 的班次。
 */
export function durationMinutes(start: TimeOfDay, end: TimeOfDay): number {
  const s = toMinutes(start);
  let e = toMinutes(end);
  if (e <= s) e += MINUTES_PER_DAY;
  return e - s;
}

export function durationHours(start: TimeOfDay, end: TimeOfDay): number {
  return round4(durationMinutes(start, end) / 60);
}

export function formatTime(t: TimeOfDay): string {
  return `${String(t.hour).padStart(2, '0')}:${String(t.minute).padStart(2, '0')}`;
}
