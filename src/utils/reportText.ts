import type { DayStatus } from '../types/attendanceType';
import type { DailyReport, EmployeeReport, PeriodReport, RankedEmployee, TrendDay } from '../types/reportType';
import { formatDisplayDate, formatLongDate, formatShortDate } from './dates';

const STATUS_ICON: Record<DayStatus | TrendDay['status'], string> = {
  present: '✅',
  absent: '❌',
  unmarked: '⬜',
  holiday: '🎉',
};

const percent = (part: number, whole: number) => (whole > 0 ? Math.round((part / whole) * 100) : 0);

const ranking = (rows: RankedEmployee[]) =>
  rows.length ? rows.map((row, i) => `${i + 1}. ${row.name}: ${row.attendanceRate}%`).join('\n') : 'No active employees';

export const dailyReportText = (report: DailyReport, title = 'Daily Report', icon = '📊'): string => {
  const lines = [
    `${icon} *${title} - ${formatLongDate(report.date)}*`,
    `✅ Present: ${report.presentCount} | ❌ Absent: ${report.absentCount} | ⬜ Unmarked: ${report.unmarkedCount}`,
  ];
  if (report.isHoliday) {
    lines.push(`🎉 Holiday: ${report.holiday ?? ''}`);
  }
  lines.push('');

  if (!report.perEmployee.length) {
    lines.push('No attendance recorded');
    return lines.join('\n');
  }

  lines.push('🧑‍💼 *Employee Details:*');
  for (const row of report.perEmployee) {
    lines.push(`- ${row.name}: ${STATUS_ICON[row.status]}${row.reason ? ` (${row.reason})` : ''}`);
  }
  return lines.join('\n');
};

export const periodReportText = (report: PeriodReport, title: string): string => {
  const lines = [
    `📈 *${title} (${report.calendarDays} Days)*`,
    `📅 Period: ${formatShortDate(report.startDate)} to ${formatShortDate(report.endDate)}`,
    `📊 Working Days: ${report.workingDayCount} | Holidays: ${report.holidays.length}`,
    `✅ Total Present: ${report.totalPresent} | ❌ Total Absent: ${report.totalAbsent}`,
    '',
    '🏆 *Top Performers*',
    ranking(report.topPerformers),
    '',
    '⚠️ *Needs Improvement*',
    ranking(report.needsImprovement),
    '',
    '👥 *Employee Performance:*',
  ];

  for (const row of report.perEmployee) {
    const absences = row.absentDays > 0 ? ` | ❌ Absences: ${row.absentDays}` : '';
    lines.push(`- ${row.name}: ${row.presentDays}/${report.workingDayCount} (${row.attendanceRate}%)${absences}`);
  }

  const marked = report.totalPresent + report.totalAbsent;
  if (marked > 0) {
    lines.push(
      '',
      '📊 *Attendance Distribution*',
      `✅ Present: ${report.totalPresent} (${percent(report.totalPresent, marked)}%)`,
      `❌ Absent: ${report.totalAbsent} (${percent(report.totalAbsent, marked)}%)`,
    );
  }

  if (report.topAbsenceReasons.length) {
    lines.push('', '📝 *Top Absence Reasons*');
    report.topAbsenceReasons.forEach(({ reason, count }, i) => lines.push(`${i + 1}. ${reason}: ${count}`));
  }

  return lines.join('\n');
};

export const employeeReportText = (report: EmployeeReport): string => {
  const lines = [
    `👤 *Employee Report: ${report.employee.name}*`,
    `🆔 Employee ID: #${report.employee.id}${report.employee.active ? '' : ' (inactive)'}`,
    '',
    `📅 Period: ${formatShortDate(report.startDate)} to ${formatShortDate(report.endDate)}`,
    `✅ Present: ${report.presentDays} days`,
    `❌ Absent: ${report.absentDays} days`,
    `⬜ Unmarked: ${report.unmarkedDays} days`,
    `📊 Attendance Rate: ${report.attendanceRate}%`,
    '',
    '📈 *Weekly Trend:*',
    report.trend.map((day) => STATUS_ICON[day.status]).join(''),
    '',
    '📝 *Recent Absences:*',
  ];

  if (!report.recentAbsences.length) {
    lines.push('No absences recorded');
  }
  report.recentAbsences.forEach((absence, i) => {
    lines.push(`${i + 1}. ${formatDisplayDate(absence.date)}: ${absence.reason || 'No reason provided'}`);
  });

  return lines.join('\n');
};
