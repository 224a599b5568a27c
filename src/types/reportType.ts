import type { DayKey } from '../utils/dates';
import type { DayStatus, Employee, Holiday } from './attendanceType';

export interface DailyReportRow {
  employeeId: number;
  name: string;
  status: DayStatus;
  reason?: string;
}

export interface DailyReport {
  date: DayKey;
  isHoliday: boolean;
  holiday?: string;
  perEmployee: DailyReportRow[];
  presentCount: number;
  absentCount: number;
  unmarkedCount: number;
}

export interface EmployeeTally {
  employeeId: number;
  name: string;
  presentDays: number;
  absentDays: number;
  unmarkedDays: number;
  attendanceRate: number;
}

export interface RankedEmployee {
  employeeId: number;
  name: string;
  attendanceRate: number;
}

export interface AbsenceReasonCount {
  reason: string;
  count: number;
}

export interface PeriodReport {
  startDate: DayKey;
  endDate: DayKey;
  calendarDays: number;
  workingDayCount: number;
  holidays: Holiday[];
  perEmployee: EmployeeTally[];
  totalPresent: number;
  totalAbsent: number;
  topPerformers: RankedEmployee[];
  needsImprovement: RankedEmployee[];
  topAbsenceReasons: AbsenceReasonCount[];
}

export interface TrendDay {
  date: DayKey;
  status: DayStatus | 'holiday';
}

export interface EmployeeReport {
  employee: Employee;
  startDate: DayKey;
  endDate: DayKey;
  workingDayCount: number;
  presentDays: number;
  absentDays: number;
  unmarkedDays: number;
  attendanceRate: number;
  trend: TrendDay[];
  recentAbsences: { date: DayKey; reason: string }[];
}

// Query strings as they arrive (a repeated key is an array), dates in DD-MM-YYYY

export interface PeriodReportQuery {
  startDate?: unknown;
  endDate?: unknown;
  format?: unknown;
}

export interface MonthlyReportQuery {
  month?: unknown;
  format?: unknown;
}

export interface ReportFormatQuery {
  format?: unknown;
}
