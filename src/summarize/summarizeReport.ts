import { SalaryReport } from '../core/types';
import { round2, round4 } from '../core/math';

export type ReportSummary = {
  totalHours: number;
  regularHours: number;
  overtime125Hours: number;
  overtime150Hours: number;
  totalSalary: number;
  workedDays: number; // 有工时的天数
  weekendDays: number; // 触发周末溢价的天数
};

export function summarizeReport(report: SalaryReport): ReportSummary {
  const acc = report.days.reduce(
    (a, d) => {
      const hours = d.regularHours + d.overtime125Hours + d.overtime150Hours;
      a.regularHours += d.regularHours;
      a.overtime125Hours += d.overtime125Hours;
      a.overtime150Hours += d.overtime150Hours;
      a.totalSalary += d.dayTotal;
      if (hours > 0) a.workedDays += 1;
      if (d.weekendPremiumApplied) a.weekendDays += 1;
      return a;
    },
    {
      regularHours: 0,
      overtime125Hours: 0,
      overtime150Hours: 0,
      totalSalary: 0,
      workedDays: 0,
      weekendDays: 0,
    },
  );

  return {
    totalHours: round4(acc.regularHours + acc.overtime125Hours + acc.overtime150Hours),
    regularHours: round4(acc.regularHours),
    overtime125Hours: round4(acc.overtime125Hours),
    overtime150Hours: round4(acc.overtime150Hours),
    totalSalary: round2(acc.totalSalary),
    workedDays: acc.workedDays,
    weekendDays: acc.weekendDays,
  };
}
