import { DaySalaryBreakdown, HourAllocation, PayrollConfig, RawPeriod, RecordDate } from './types';
import { max0, round2, round4 } from './math';
import { createLogger } from '../logger';

const logger = createLogger('core.allocate');

export type TierLimits = Pick<PayrollConfig, 'regularLimit' | 'limit125'>;
export type TierRates = Pick<PayrollConfig, 'rateRegular' | 'rate125' | 'rate150'>;

/**
 * 按日阈值切分：
 * - 前 regularLimit 小时 → regular
 * - regularLimit..limit125 → 125%
 * - 超出 limit125 → 150%
 * 负数按 0 处理（记 warn，不会产生负工资）。
 */
export function allocateHours(totalHours: number, limits: TierLimits): HourAllocation {
  let total = Number.isFinite(totalHours) ? totalHours : 0;
  if (total < 0) {
    logger.warn('Negative hours detected', { kind: 'NegativeDuration', totalHours });
    total = 0;
  }

  const regular = Math.min(total, limits.regularLimit);
  const remaining = max0(total - regular);
  const overtime125 = Math.min(remaining, max0(limits.limit125 - limits.regularLimit));
  const overtime150 = max0(total - regular - overtime125);

  return {
    regularHours: round4(regular),
    overtime125Hours: round4(overtime125),
    overtime150Hours: round4(overtime150),
  };
}

export function payFor(hours: HourAllocation, rates: TierRates): number {
  return round2(
    hours.regularHours * rates.rateRegular +
      hours.overtime125Hours * rates.rate125 +
      hours.overtime150Hours * rates.rate150,
  );
}

export interface DayCalcInput {
  date: RecordDate;
  totalHours: number;
  weekendPremiumApplied: boolean;
  rawPeriods: RawPeriod[];
}

/** 周末溢价：整天全部记 150%，不走阶梯 */
export function calculateDay(
  input: DayCalcInput,
  config: TierLimits & TierRates,
): DaySalaryBreakdown {
  const { date, totalHours, weekendPremiumApplied, rawPeriods } = input;

  const hours: HourAllocation = weekendPremiumApplied
    ? { regularHours: 0, overtime125Hours: 0, overtime150Hours: round4(max0(totalHours)) }
    : allocateHours(totalHours, config);

  return {
    date,
    ...hours,
    dayTotal: payFor(hours, config),
    weekendPremiumApplied,
    rawPeriods,
  };
}
