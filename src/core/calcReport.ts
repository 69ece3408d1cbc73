import { freeze } from 'immer';
import {
  AttendanceRecord,
  CalendarDay,
  DaySalaryBreakdown,
  PayrollConfig,
  RawPeriod,
  SalaryReport,
} from './types';
import { round2, round4 } from './math';
import { durationHours, parsePeriod } from './time';
import { periodOverlapsWeekend } from './weekendWindow';
import { calculateDay } from './allocateHours';
import { NoRecordsProvidedError } from './errors';
import { RawAttendanceEntry, normalizeEntry } from '../state/from-input';
import { calendarDayInZone, formatRecordDate } from '../state/calendar';
import { DEFAULT_PAYROLL_CONFIG } from '../config';
import { createLogger } from '../logger';

const logger = createLogger('core.report');

export type ComputeOptions = {
  /** 报表年月兜底用的时钟，默认 new Date() */
  now?: () => Date;
};

type PeriodTotals = {
  totalHours: number;
  weekendApplied: boolean;
  validPeriods: RawPeriod[];
};

function sumPeriods(
  record: AttendanceRecord,
  periods: RawPeriod[],
  config: PayrollConfig,
): PeriodTotals {
  const day = record.date.kind === 'resolved' ? record.date.day : undefined;
  const validPeriods: RawPeriod[] = [];
  let totalHours = 0;
  let weekendApplied = false;

  for (const raw of periods) {
    const period = parsePeriod(raw);
    if (!period) {
      logger.debug('Skipping invalid period', { start: raw[0], end: raw[1] });
      continue;
    }
    validPeriods.push([raw[0], raw[1]]);
    totalHours += durationHours(period.start, period.end);
    // 日期解析失败时跳过周末判断
    if (day && periodOverlapsWeekend(day, period.start, period.end, config.weekend)) {
      weekendApplied = true;
    }
  }

  return { totalHours: round4(totalHours), weekendApplied, validPeriods };
}

/**
 * 单日计算。periods 全部无效时再试 clock_in/clock_out 那一对。
 * 没有任何有效 period 的日子仍然返回（全 0）。
 */
export function computeDay(record: AttendanceRecord, config: PayrollConfig): DaySalaryBreakdown {
  let totals = sumPeriods(record, record.periods, config);
  if (totals.validPeriods.length === 0 && record.fallbackPeriod) {
    totals = sumPeriods(record, [record.fallbackPeriod], config);
  }

  return calculateDay(
    {
      date: record.date,
      totalHours: totals.totalHours,
      weekendPremiumApplied: totals.weekendApplied,
      rawPeriods: totals.validPeriods,
    },
    config,
  );
}

const zeroDay = (record: AttendanceRecord): DaySalaryBreakdown => ({
  date: record.date,
  regularHours: 0,
  overtime125Hours: 0,
  overtime150Hours: 0,
  dayTotal: 0,
  weekendPremiumApplied: false,
  rawPeriods: [],
});

// 归一化本身也算在单条兜底里：出错的记录仍占一天（日期未解析、全 0）
function safeNormalize(
  entry: RawAttendanceEntry | null | undefined,
  config: PayrollConfig,
): AttendanceRecord | undefined {
  try {
    return normalizeEntry(entry, config.timezone);
  } catch (e) {
    logger.error('Error normalizing record', { error: e instanceof Error ? e.message : String(e) });
    return undefined;
  }
}

const UNREADABLE: AttendanceRecord = { date: { kind: 'unresolved', label: '' }, periods: [] };

/**
 * 报表年月取第一条记录的日期。
 * 第一条日期解析失败时退回“当前日期”（config.timezone 下）：这只是方便使用，
 * 不保证正确，调用方需要自己保证第一条日期可解析。
 */
function resolveTargetMonth(
  records: AttendanceRecord[],
  config: PayrollConfig,
  now: () => Date,
): CalendarDay {
  const first = records[0].date;
  if (first.kind === 'resolved') return first.day;

  const today = calendarDayInZone(now(), config.timezone);
  logger.warn('Could not determine date from records, using current month', {
    kind: 'UnparseableDate',
    date: first.label,
    timezone: config.timezone,
  });
  return today;
}

/**
 * 入口：原始打卡记录 → 月报。
 * - 每条记录一天，按输入顺序，不去重不排序
 * - 只有空输入会抛错（NoRecordsProvidedError）；坏数据（null 记录、非数组 periods、
 *   非字符串时间）都在本地兜底
 * - 返回值是深冻结的新对象
 */
export function computeSalaryReport(
  entries: ReadonlyArray<RawAttendanceEntry | null | undefined>,
  config: PayrollConfig = DEFAULT_PAYROLL_CONFIG,
  options: ComputeOptions = {},
): SalaryReport {
  if (entries.length === 0) {
    logger.warn('No records provided for calculation');
    throw new NoRecordsProvidedError();
  }

  const records = entries.map((e) => safeNormalize(e, config) ?? UNREADABLE);
  const target = resolveTargetMonth(records, config, options.now ?? (() => new Date()));

  logger.info('Starting salary calculation', {
    month: target.month,
    year: target.year,
    recordsCount: records.length,
  });

  const days = records.map((record) => {
    if (record.date.kind === 'unresolved') {
      logger.warn('Could not parse date', { kind: 'UnparseableDate', date: record.date.label });
    }
    try {
      return computeDay(record, config);
    } catch (e) {
      // 单条失败不影响整月
      logger.error('Error processing record', {
        date: formatRecordDate(record.date),
        error: e instanceof Error ? e.message : String(e),
      });
      return zeroDay(record);
    }
  });

  const total = round2(days.reduce((acc, d) => acc + d.dayTotal, 0));

  logger.info('Salary calculation completed', {
    month: target.month,
    year: target.year,
    daysProcessed: days.length,
    totalSalary: total,
  });

  return freeze<SalaryReport>({ year: target.year, month: target.month, days, total }, true);
}
