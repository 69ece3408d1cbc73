import { DaySalaryBreakdown, SalaryReport } from '../core/types';
import { formatRecordDate } from './calendar';

/** 对外（HTTP 层 / 落盘）的 snake_case 结构 */
export type DaySalaryJson = {
  date: string; // YYYY-MM-DD；日期解析失败时为原始字符串
  regular_hours: number;
  overtime_125_hours: number;
  overtime_150_hours: number;
  day_total: number;
  weekend_premium_applied: boolean;
  raw_periods: Array<[string, string]>;
};

export type SalaryReportJson = {
  year: number;
  month: number;
  total: number;
  days: DaySalaryJson[];
};

export function toDayJson(d: DaySalaryBreakdown): DaySalaryJson {
  return {
    date: formatRecordDate(d.date),
    regular_hours: d.regularHours,
    overtime_125_hours: d.overtime125Hours,
    overtime_150_hours: d.overtime150Hours,
    day_total: d.dayTotal,
    weekend_premium_applied: d.weekendPremiumApplied,
    raw_periods: d.rawPeriods.map(([start, end]) => [start, end]),
  };
}

export function toReportJson(report: SalaryReport): SalaryReportJson {
  return {
    year: report.year,
    month: report.month,
    total: report.total,
    days: report.days.map(toDayJson),
  };
}
