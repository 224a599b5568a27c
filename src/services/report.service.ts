import type {
  AttendanceRepository,
  EmployeeRepository,
  HolidayRepository,
} from '../repositories/types';
import type { AttendanceRecord, DayStatus, Employee } from '../types/attendanceType';
import type {
  AbsenceReasonCount,
  DailyReport,
  DailyReportRow,
  EmployeeReport,
  EmployeeTally,
  PeriodReport,
  RankedEmployee,
  TrendDay,
} from '../types/reportType';
import {
  addDaysToKey,
  assertOrderedRange,
  DayKey,
  DayRange,
  eachDay,
  lastDays,
  today,
} from '../utils/dates';
import { NotFoundError } from '../utils/ErrorResponse';

const RANKING_SIZE = 3;
const TREND_DAYS = 7;
const RECENT_ABSENCES = 3;
const DEFAULT_EMPLOYEE_REPORT_DAYS = 30;

const recordKey = (employeeId: number, date: DayKey) => `${employeeId}|${date}`;

export const attendanceRate = (presentDays: number, workingDayCount: number): number =>
  workingDayCount > 0 ? Math.round((presentDays / workingDayCount) * 100) : 0;

const rank = (rows: EmployeeTally[], direction: 'best' | 'worst'): RankedEmployee[] =>
  [...rows]
    .sort((a, b) =>
      a.attendanceRate === b.attendanceRate
        ? a.employeeId - b.employeeId
        : direction === 'best'
          ? b.attendanceRate - a.attendanceRate
          : a.attendanceRate - b.attendanceRate,
    )
    .slice(0, RANKING_SIZE)
    .map(({ employeeId, name, attendanceRate }) => ({ employeeId, name, attendanceRate }));

const topReasons = (absences: AttendanceRecord[]): AbsenceReasonCount[] => {
  const counts = new Map<string, number>();
  for (const record of absences) {
    const reason = record.reason?.trim();
    if (reason) counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }
  return Array.from(counts, ([reason, count]) => ({ reason, count }))
    .sort((a, b) => b.count - a.count || a.reason.localeCompare(b.reason))
    .slice(0, RANKING_SIZE);
};

/** Read-only aggregation over employees, attendance records and the holiday calendar. */
export class ReportService {
  constructor(
    private readonly employees: EmployeeRepository,
    private readonly attendance: AttendanceRepository,
    private readonly holidays: HolidayRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async dailyReport(date: DayKey): Promise<DailyReport> {
    const [employees, records, holiday] = await Promise.all([
      this.employees.list(false),
      this.attendance.find({ from: date, to: date }),
      this.holidays.findByDate(date),
    ]);

    const byEmployee = new Map(records.map((record) => [record.employeeId, record]));
    const rows: DailyReportRow[] = [];

    for (const employee of employees) {
      const record = byEmployee.get(employee.id);
      if (record) {
        rows.push({
          employeeId: employee.id,
          name: employee.name,
          status: record.status,
          ...(record.reason ? { reason: record.reason } : {}),
        });
      } else if (employee.active) {
        rows.push({ employeeId: employee.id, name: employee.name, status: 'unmarked' });
      }
    }

    return {
      date,
      isHoliday: holiday !== null,
      holiday: holiday?.description,
      perEmployee: rows,
      presentCount: rows.filter((row) => row.status === 'present').length,
      absentCount: rows.filter((row) => row.status === 'absent').length,
      unmarkedCount: rows.filter((row) => row.status === 'unmarked').length,
    };
  }

  async periodReport(range: DayRange): Promise<PeriodReport> {
    const { start, end } = assertOrderedRange(range);

    const [employees, records, holidays] = await Promise.all([
      this.employees.list(true),
      this.attendance.find({ from: start, to: end }),
      this.holidays.list({ from: start, to: end }),
    ]);

    const calendarDays = eachDay(range);
    const holidayDates = new Set(holidays.map((holiday) => holiday.date));
    const workingDays = calendarDays.filter((date) => !holidayDates.has(date));

    const perEmployee = this.tally(employees, workingDays, records);

    const activeIds = new Set(employees.map((employee) => employee.id));
    const workingSet = new Set(workingDays);
    const absences = records.filter(
      (record) =>
        record.status === 'absent' && activeIds.has(record.employeeId) && workingSet.has(record.date),
    );

    return {
      startDate: start,
      endDate: end,
      calendarDays: calendarDays.length,
      workingDayCount: workingDays.length,
      holidays,
      perEmployee,
      totalPresent: perEmployee.reduce((sum, row) => sum + row.presentDays, 0),
      totalAbsent: perEmployee.reduce((sum, row) => sum + row.absentDays, 0),
      topPerformers: rank(perEmployee, 'best'),
      needsImprovement: rank(perEmployee, 'worst'),
      topAbsenceReasons: topReasons(absences),
    };
  }

  /**
   * Tallies one employee, active or not. Defaults to the 30 days ending today.
   */
  async employeeReport(employeeId: number, range?: DayRange): Promise<EmployeeReport> {
    const employee = await this.employees.findById(employeeId);
    if (!employee) {
      throw new NotFoundError(`Employee #${employeeId} not found`);
    }

    const { start, end } = assertOrderedRange(
      range ?? lastDays(DEFAULT_EMPLOYEE_REPORT_DAYS, today(this.now())),
    );

    const [records, holidays, absences] = await Promise.all([
      this.attendance.find({ employeeId, from: start, to: end }),
      this.holidays.list({ from: start, to: end }),
      this.attendance.find({ employeeId, to: end, status: 'absent' }),
    ]);

    const holidayDates = new Set(holidays.map((holiday) => holiday.date));
    const workingDays = eachDay({ start, end }).filter((date) => !holidayDates.has(date));
    const [tally] = this.tally([employee], workingDays, records);

    const byDate = new Map(records.map((record) => [record.date, record]));
    const trendStart = addDaysToKey(end, -(TREND_DAYS - 1));
    const trend: TrendDay[] = eachDay({ start: trendStart > start ? trendStart : start, end }).map(
      (date) => ({
        date,
        status: holidayDates.has(date) ? 'holiday' : byDate.get(date)?.status ?? 'unmarked',
      }),
    );

    const recentAbsences = absences
      .slice(-RECENT_ABSENCES)
      .reverse()
      .map((record) => ({ date: record.date, reason: record.reason ?? '' }));

    return {
      employee,
      startDate: start,
      endDate: end,
      workingDayCount: workingDays.length,
      presentDays: tally.presentDays,
      absentDays: tally.absentDays,
      unmarkedDays: tally.unmarkedDays,
      attendanceRate: tally.attendanceRate,
      trend,
      recentAbsences,
    };
  }

  // Every working day lands in exactly one bucket, so the three counts always sum to workingDays.length.
  private tally(employees: Employee[], workingDays: DayKey[], records: AttendanceRecord[]): EmployeeTally[] {
    const byKey = new Map(records.map((record) => [recordKey(record.employeeId, record.date), record]));

    return employees.map((employee) => {
      const counts: Record<DayStatus, number> = { present: 0, absent: 0, unmarked: 0 };
      for (const date of workingDays) {
        counts[byKey.get(recordKey(employee.id, date))?.status ?? 'unmarked']++;
      }
      return {
        employeeId: employee.id,
        name: employee.name,
        presentDays: counts.present,
        absentDays: counts.absent,
        unmarkedDays: counts.unmarked,
        attendanceRate: attendanceRate(counts.present, workingDays.length),
      };
    });
  }
}
