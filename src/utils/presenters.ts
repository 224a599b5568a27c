import type { AttendanceRecord, Holiday } from '../types/attendanceType';
import type { CollectorPrompt, SessionSnapshot, StepResult } from '../types/collectorType';
import type { DailyReport, EmployeeReport, PeriodReport } from '../types/reportType';
import type { MultidayAbsenceResult } from '../services/attendance.service';
import { formatDisplayDate } from './dates';

// Day keys leave the service as DD-MM-YYYY.

export const presentRecord = (record: AttendanceRecord) => ({
  ...record,
  date: formatDisplayDate(record.date),
});

export const presentHoliday = (holiday: Holiday) => ({
  ...holiday,
  date: formatDisplayDate(holiday.date),
});

export const presentPrompt = (prompt: CollectorPrompt) => ({
  ...prompt,
  date: formatDisplayDate(prompt.date),
});

export const presentStep = (step: StepResult) => {
  switch (step.state) {
    case 'complete':
      return {
        state: step.state,
        summary: {
          ...step.summary,
          date: formatDisplayDate(step.summary.date),
          saved: step.summary.saved.map(presentRecord),
          failed: step.summary.failed.map(({ record, error }) => ({ record: presentRecord(record), error })),
        },
      };
    case 'cancelled':
      return step;
    default:
      return { state: step.state, prompt: presentPrompt(step.prompt) };
  }
};

export const presentSnapshot = (snapshot: SessionSnapshot) => ({
  ...snapshot,
  date: formatDisplayDate(snapshot.date),
});

export const presentMultidayAbsence = (result: MultidayAbsenceResult) => ({
  employeeId: result.employeeId,
  startDate: formatDisplayDate(result.range.start),
  endDate: formatDisplayDate(result.range.end),
  reason: result.reason,
  recorded: result.recorded.map(formatDisplayDate),
  skippedHolidays: result.skippedHolidays.map(formatDisplayDate),
});

export const presentDailyReport = (report: DailyReport) => ({
  ...report,
  date: formatDisplayDate(report.date),
});

export const presentPeriodReport = (report: PeriodReport) => ({
  ...report,
  startDate: formatDisplayDate(report.startDate),
  endDate: formatDisplayDate(report.endDate),
  holidays: report.holidays.map(presentHoliday),
});

export const presentEmployeeReport = (report: EmployeeReport) => ({
  ...report,
  startDate: formatDisplayDate(report.startDate),
  endDate: formatDisplayDate(report.endDate),
  trend: report.trend.map((day) => ({ ...day, date: formatDisplayDate(day.date) })),
  recentAbsences: report.recentAbsences.map((absence) => ({
    ...absence,
    date: formatDisplayDate(absence.date),
  })),
});
