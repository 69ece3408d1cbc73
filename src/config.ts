import { PayrollConfig, Weekday, WeekdayTime, WeekendWindowConfig } from './core/types';
import { InvalidConfigError } from './core/errors';

export const DEFAULT_RATE_REGULAR = 75;
export const RATE_125_MULTIPLIER = 1.25;
export const RATE_150_MULTIPLIER = 1.5;

// 周五 17:00 → 周日 05:00（0 = 周一）
export const DEFAULT_WEEKEND_WINDOW: WeekendWindowConfig = {
  start: { weekday: 4, hour: 17, minute: 0 },
  end: { weekday: 6, hour: 5, minute: 0 },
};

export type PayrollConfigInput = Partial<Omit<PayrollConfig, 'weekend'>> & {
  weekend?: Partial<WeekendWindowConfig>;
};

export const isWeekday = (n: number): n is Weekday => Number.isInteger(n) && n >= 0 && n <= 6;

function assertAmount(field: string, v: number) {
  if (!Number.isFinite(v) || v < 0) {
    throw new InvalidConfigError(field, `expected a non-negative number, got ${v}`);
  }
}

function assertWeekdayTime(field: string, t: WeekdayTime) {
  if (!isWeekday(t.weekday)) throw new InvalidConfigError(field, `weekday out of range: ${t.weekday}`);
  if (!Number.isInteger(t.hour) || t.hour < 0 || t.hour > 23) {
    throw new InvalidConfigError(field, `hour out of range: ${t.hour}`);
  }
  if (!Number.isInteger(t.minute) || t.minute < 0 || t.minute > 59) {
    throw new InvalidConfigError(field, `minute out of range: ${t.minute}`);
  }
}

function assertTimezone(tz: string) {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
  } catch (e) {
    throw new InvalidConfigError('timezone', `unknown time zone "${tz}" (${String(e)})`);
  }
}

/**
 * 补默认值 + 校验。rate125 / rate150 没给时按 rateRegular 的 1.25 / 1.5 倍推导。
 */
export function resolvePayrollConfig(input: PayrollConfigInput = {}): PayrollConfig {
  const rateRegular = input.rateRegular ?? DEFAULT_RATE_REGULAR;
  const config: PayrollConfig = {
    rateRegular,
    rate125: input.rate125 ?? rateRegular * RATE_125_MULTIPLIER,
    rate150: input.rate150 ?? rateRegular * RATE_150_MULTIPLIER,
    regularLimit: input.regularLimit ?? 8,
    limit125: input.limit125 ?? 10,
    weekend: {
      start: { ...(input.weekend?.start ?? DEFAULT_WEEKEND_WINDOW.start) },
      end: { ...(input.weekend?.end ?? DEFAULT_WEEKEND_WINDOW.end) },
    },
    timezone: input.timezone ?? 'UTC',
  };

  assertAmount('rateRegular', config.rateRegular);
  assertAmount('rate125', config.rate125);
  assertAmount('rate150', config.rate150);
  assertAmount('regularLimit', config.regularLimit);
  assertAmount('limit125', config.limit125);
  if (config.limit125 < config.regularLimit) {
    throw new InvalidConfigError(
      'limit125',
      `must be >= regularLimit (${config.limit125} < ${config.regularLimit})`,
    );
  }
  assertWeekdayTime('weekend.start', config.weekend.start);
  assertWeekdayTime('weekend.end', config.weekend.end);
  assertTimezone(config.timezone);

  return Object.freeze(config);
}

export const DEFAULT_PAYROLL_CONFIG: PayrollConfig = resolvePayrollConfig();

// ---------- 环境变量 ----------

export type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new InvalidConfigError(key, `not a number: "${raw}"`);
  return n;
}

const WEEKDAY_TIME_RE = /^(\d):(\d{1,2}):(\d{2})$/;

/** "weekday:HH:MM"，例如 "4:17:00" = 周五 17:00 */
export function parseWeekdayTime(key: string, raw: string): WeekdayTime {
  const m = WEEKDAY_TIME_RE.exec(raw.trim());
  if (!m) throw new InvalidConfigError(key, `expected "weekday:HH:MM", got "${raw}"`);
  const weekday = Number(m[1]);
  if (!isWeekday(weekday)) throw new InvalidConfigError(key, `weekday out of range: ${weekday}`);
  return { weekday, hour: Number(m[2]), minute: Number(m[3]) };
}

function envWeekdayTime(env: Env, key: string): WeekdayTime | undefined {
  const raw = env[key]?.trim();
  return raw ? parseWeekdayTime(key, raw) : undefined;
}

/**
 * 从环境变量读取（调用方传 process.env），引擎本身不读全局状态。
 * RATE_REGULAR / RATE_125 / RATE_150 / REGULAR_LIMIT / LIMIT_125 /
 * WEEKEND_PREMIUM_START / WEEKEND_PREMIUM_END / PAYROLL_TIMEZONE
 */
export function loadPayrollConfigFromEnv(env: Env): PayrollConfig {
  const start = envWeekdayTime(env, 'WEEKEND_PREMIUM_START');
  const end = envWeekdayTime(env, 'WEEKEND_PREMIUM_END');
  const timezone = env.PAYROLL_TIMEZONE?.trim();

  return resolvePayrollConfig({
    rateRegular: envNumber(env, 'RATE_REGULAR'),
    rate125: envNumber(env, 'RATE_125'),
    rate150: envNumber(env, 'RATE_150'),
    regularLimit: envNumber(env, 'REGULAR_LIMIT'),
    limit125: envNumber(env, 'LIMIT_125'),
    weekend: { ...(start ? { start } : {}), ...(end ? { end } : {}) },
    ...(timezone ? { timezone } : {}),
  });
}
