import { format, isValid, parse, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { CalendarDay, RecordDate, Weekday } from '../core/types';
import { mod } from '../core/math';

const MS_PER_DAY = 86_400_000;

const ISO_PREFIX_RE = /^\d{4}-\d{2}-\d{2}(?:[T ].*)?$/;
const DMY_RE = /^\d{1,2}\/\d{1,2}\/\d{4}$/;

export function fromDate(d: Date): CalendarDay {
  return { year: d.getFullYear(), month: d.getMonth() + 1, day: d.getDate() };
}

/**
 * 支持 ISO（YYYY-MM-DD，可带时间部分）和 DD/MM/YYYY。
 * 不合法（含 2025-02-30 这类）返回 null。
 */
export function parseCalendarDay(
  input: string | Date | null | undefined,
  timezone = 'UTC',
): CalendarDay | null {
  if (input == null) return null;
  // Date 是一个时刻，按指定时区取日历日，结果与宿主 TZ 无关
  if (input instanceof Date) return isValid(input) ? calendarDayInZone(input, timezone) : null;

  const s = input.trim();
  if (ISO_PREFIX_RE.test(s)) {
    // 带时间/时区的字符串只取字面上的日期部分，不做时区换算
    if (!isValid(parseISO(s))) return null;
    const d = parseISO(s.slice(0, 10));
    return isValid(d) ? fromDate(d) : null;
  }
  if (DMY_RE.test(s)) {
    const d = parse(s, 'dd/MM/yyyy', new Date(2000, 0, 1));
    return isValid(d) ? fromDate(d) : null;
  }
  return null;
}

export function resolveRecordDate(
  input: string | Date | null | undefined,
  timezone = 'UTC',
): RecordDate {
  const day = parseCalendarDay(input, timezone);
  if (day) return { kind: 'resolved', day };
  return { kind: 'unresolved', label: input instanceof Date ? 'Invalid Date' : (input ?? '') };
}

/** 1970-01-01 起的天数（UTC 日历，无 DST 影响） */
export const toEpochDay = (d: CalendarDay) => Date.UTC(d.year, d.month - 1, d.day) / MS_PER_DAY;

export function fromEpochDay(n: number): CalendarDay {
  const d = new Date(n * MS_PER_DAY);
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

// 1970-01-01 是周四（= 3）
export const weekdayOf = (d: CalendarDay): Weekday => WEEKDAYS[mod(toEpochDay(d) + 3, 7)];

export function formatCalendarDay(d: CalendarDay): string {
  return format(new Date(d.year, d.month - 1, d.day), 'yyyy-MM-dd');
}

export function formatRecordDate(d: RecordDate): string {
  return d.kind === 'resolved' ? formatCalendarDay(d.day) : d.label;
}

/** “今天”在指定时区下的日历日 */
export function calendarDayInZone(now: Date, timezone: string): CalendarDay {
  const [y, m, d] = formatInTimeZone(now, timezone, 'yyyy-MM-dd').split('-').map(Number);
  return { year: y, month: m, day: d };
}
