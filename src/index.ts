export * from './core/types';
export { parseTime, parsePeriod, durationHours, durationMinutes, formatTime } from './core/time';
export { findWeekendWindow, periodOverlapsWeekend } from './core/weekendWindow';
export type { WallClock, WeekendInterval } from './core/weekendWindow';
export { allocateHours, calculateDay, payFor } from './core/allocateHours';
export type { DayCalcInput, TierLimits, TierRates } from './core/allocateHours';
export { computeSalaryReport, computeDay } from './core/calcReport';
export type { ComputeOptions } from './core/calcReport';
export * from './core/errors';

export { normalizeEntry, normalizeEntries } from './state/from-input';
export type { RawAttendanceEntry, RawPeriodInput } from './state/from-input';
export { toReportJson, toDayJson } from './state/to-json';
export type { SalaryReportJson, DaySalaryJson } from './state/to-json';
export {
  parseCalendarDay,
  resolveRecordDate,
  formatCalendarDay,
  formatRecordDate,
  weekdayOf,
} from './state/calendar';

export { summarizeReport } from './summarize/summarizeReport';
export type { ReportSummary } from './summarize/summarizeReport';

export {
  DEFAULT_PAYROLL_CONFIG,
  DEFAULT_WEEKEND_WINDOW,
  resolvePayrollConfig,
  loadPayrollConfigFromEnv,
  parseWeekdayTime,
} from './config';
export type { PayrollConfigInput, Env } from './config';

export { createLogger, configureLogger, setLogLevel, getLogLevel, resetLogger, LogLevel } from './logger';
export type { Logger, LoggerConfig, LogFields } from './logger';
