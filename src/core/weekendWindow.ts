import { CalendarDay, TimeOfDay, WeekdayTime, WeekendWindowConfig } from './types';
import { mod } from './math';
import { toMinutes } from './time';
import { fromEpochDay, toEpochDay, weekdayOf } from '../state/calendar';

/** 墙上时间：日历日 + 时分，不涉及时区 */
export interface WallClock {
  day: CalendarDay;
  hour: number;
  minute: number;
}

export interface WeekendInterval {
  start: WallClock;
  end: WallClock;
}

const MINUTES_PER_DAY = 24 * 60;

const at = (epochDay: number, t: Pick<WeekdayTime, 'hour' | 'minute'>): WallClock => ({
  day: fromEpochDay(epochDay),
  hour: t.hour,
  minute: t.minute,
});

export const toAbsoluteMinutes = (w: WallClock) =>
  toEpochDay(w.day) * MINUTES_PER_DAY + w.hour * 60 + w.minute;

/**
 * 给定日期所属那一周的溢价窗口。
 * - anchor = 最近一个（含当天）窗口起始星期几
 * - end = anchor + (endWeekday - startWeekday) mod 7 天
 * 同一周内任何一天查出来的都是同一个窗口。
 */
export function findWeekendWindow(d: CalendarDay, window: WeekendWindowConfig): WeekendInterval {
  const day = toEpochDay(d);
  const anchor = day - mod(weekdayOf(d) - window.start.weekday, 7);
  const endDay = anchor + mod(window.end.weekday - window.start.weekday, 7);
  return { start: at(anchor, window.start), end: at(endDay, window.end) };
}

/**
 * 半开区间相交：period_start < window_end && period_end > window_start。
 * 恰好碰边（零重叠）不算。
 */
export function periodOverlapsWeekend(
  d: CalendarDay,
  start: TimeOfDay,
  end: TimeOfDay,
  window: WeekendWindowConfig,
): boolean {
  const { start: winStart, end: winEnd } = findWeekendWindow(d, window);

  const base = toEpochDay(d) * MINUTES_PER_DAY;
  const periodStart = base + toMinutes(start);
  let periodEnd = base + toMinutes(end);
  if (periodEnd <= periodStart) periodEnd += MINUTES_PER_DAY; // 跨午夜

  return periodStart < toAbsoluteMinutes(winEnd) && periodEnd > toAbsoluteMinutes(winStart);
}
