import { AttendanceRecord, RawPeriod } from '../core/types';
import { resolveRecordDate } from './calendar';

type MaybeString = string | null | undefined;

export type RawPeriodInput =
  | readonly [MaybeString, MaybeString]
  | { start?: MaybeString; end?: MaybeString };

/**
 * 上游（HTTP / 抓取）给过来的原始记录，字段可能缺失：
 * - periods: [[start, end], ...] 或 [{ start, end }, ...]
 * - 或者单独一对 clock_in / clock_out（也接受 camelCase）
 * 实际拿到的是 JSON，形状不保证，所以下面都按 unknown 处理。
 */
export interface RawAttendanceEntry {
  date?: string | Date | null;
  periods?: ReadonlyArray<RawPeriodInput> | null;
  clock_in?: MaybeString;
  clock_out?: MaybeString;
  clockIn?: MaybeString;
  clockOut?: MaybeString;
}

const isObject = (v: unknown): v is { [key: string]: unknown } => typeof v === 'object' && v !== null;

// 非字符串（数字、null、对象）一律当空串，后面 parseTime 会把这一段丢掉
const str = (v: unknown) => (typeof v === 'string' ? v : '');

function toRawPeriod(p: unknown): RawPeriod {
  if (Array.isArray(p)) return [str(p[0]), str(p[1])];
  if (isObject(p)) return [str(p.start), str(p.end)];
  return ['', ''];
}

function clockPair(entry: { [key: string]: unknown }): RawPeriod | undefined {
  const clockIn = entry.clock_in ?? entry.clockIn;
  const clockOut = entry.clock_out ?? entry.clockOut;
  if (typeof clockIn !== 'string' || typeof clockOut !== 'string') return undefined;
  return [clockIn, clockOut];
}

function dateInput(v: unknown): string | Date | undefined {
  if (typeof v === 'string' || v instanceof Date) return v;
  if (typeof v === 'number') return String(v);
  return undefined;
}

/**
 * 入口处一次性归一化，引擎内部只见 AttendanceRecord。
 * 对任意输入都不抛错：null 记录 / 非数组 periods 得到一条空记录。
 * Date 实例按 timezone 取日历日。
 */
export function normalizeEntry(
  entry: RawAttendanceEntry | null | undefined,
  timezone = 'UTC',
): AttendanceRecord {
  const raw: unknown = entry;
  if (!isObject(raw)) return { date: resolveRecordDate(undefined), periods: [] };

  const periods = Array.isArray(raw.periods) ? raw.periods.map(toRawPeriod) : [];
  const fallbackPeriod = clockPair(raw);
  return {
    date: resolveRecordDate(dateInput(raw.date), timezone),
    periods,
    ...(fallbackPeriod ? { fallbackPeriod } : {}),
  };
}

export const normalizeEntries = (
  entries: ReadonlyArray<RawAttendanceEntry | null | undefined>,
  timezone = 'UTC',
): AttendanceRecord[] => entries.map((e) => normalizeEntry(e, timezone));
