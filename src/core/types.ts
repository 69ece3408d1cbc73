export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6; // 0 = 周一 … 6 = 周日

export interface TimeOfDay {
  readonly hour: number; // 0..23
  readonly minute: number; // 0..59
}

/** 一段打卡：end <= start 视为跨午夜 */
export interface Period {
  readonly start: TimeOfDay;
  readonly end: TimeOfDay;
}

export type RawPeriod = readonly [start: string, end: string];

/** 解析后的日历日（与时区无关，只是年月日） */
export interface CalendarDay {
  readonly year: number;
  readonly month: number; // 1..12
  readonly day: number; // 1..31
}

/** 日期解析失败时保留原始字符串当作 label */
export type RecordDate =
  | { readonly kind: 'resolved'; readonly day: CalendarDay }
  | { readonly kind: 'unresolved'; readonly label: string };

export interface AttendanceRecord {
  date: RecordDate;
  periods: RawPeriod[]; // 录入顺序 = 展示顺序
  fallbackPeriod?: RawPeriod; // 单独的 clock_in/clock_out，periods 全部无效时兜底
}

export interface WeekdayTime {
  weekday: Weekday;
  hour: number;
  minute: number;
}

export interface WeekendWindowConfig {
  start: WeekdayTime;
  end: WeekdayTime;
}

export interface PayrollConfig {
  rateRegular: number; // 每小时
  rate125: number;
  rate150: number;
  regularLimit: number; // 小时
  limit125: number; // 小时
  weekend: WeekendWindowConfig;
  timezone: string; // 仅用于“当前日期”兜底
}

export interface HourAllocation {
  regularHours: number;
  overtime125Hours: number;
  overtime150Hours: number;
}

export interface DaySalaryBreakdown extends HourAllocation {
  date: RecordDate;
  dayTotal: number; // 2 位小数
  weekendPremiumApplied: boolean;
  rawPeriods: RawPeriod[]; // 仅有效的 period，审计用
}

export interface SalaryReport {
  year: number;
  month: number; // 1..12
  days: DaySalaryBreakdown[];
  total: number; // sum(dayTotal)，2 位小数
}
