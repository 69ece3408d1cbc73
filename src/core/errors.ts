/**
 * 只有 EmptyInput / InvalidConfig 会抛出；
 * 其余（时间、日期解析失败，负工时）都在本地兜底，只写日志。
 */
export type PayrollErrorKind = 'EmptyInput' | 'InvalidConfig';

export type RecoveredIssueKind = 'UnparseableTime' | 'UnparseableDate' | 'NegativeDuration';

export class PayrollError extends Error {
  readonly kind: PayrollErrorKind;

  constructor(kind: PayrollErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class NoRecordsProvidedError extends PayrollError {
  constructor() {
    super('EmptyInput', 'No attendance records provided');
  }
}

export class InvalidConfigError extends PayrollError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('InvalidConfig', `[config] ${field}: ${message}`);
    this.field = field;
  }
}

export const isPayrollError = (e: unknown): e is PayrollError => e instanceof PayrollError;
