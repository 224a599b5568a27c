import type { AttendanceRepository, EmployeeRepository } from '../repositories/types';
import type {
  AttendanceFilter,
  AttendanceRecord,
  AttendanceStatus,
} from '../types/attendanceType';
import { assertOrderedRange, DayKey, DayRange, eachDay } from '../utils/dates';
import { NotFoundError, ValidationError } from '../utils/ErrorResponse';
import type { HolidayService } from './holiday.service';

export interface AttendanceInput {
  employeeId: number;
  date: DayKey;
  status: AttendanceStatus;
  reason?: string;
}

export interface MultidayAbsenceInput {
  employeeId: number;
  range: DayRange;
  reason: string;
}

export interface MultidayAbsenceResult {
  employeeId: number;
  range: DayRange;
  reason: string;
  recorded: DayKey[];
  skippedHolidays: DayKey[];
}

export interface AttendanceServiceOptions {
  multidaySkipHolidays: boolean;
}

export const isAttendanceStatus = (value: string): value is AttendanceStatus =>
  value === 'present' || value === 'absent';

// Absences need a reason; a reason on a present record is dropped.
export const normalizeRecord = (input: AttendanceInput): AttendanceRecord => {
  if (input.status === 'present') {
    return { employeeId: input.employeeId, date: input.date, status: 'present' };
  }

  const reason = input.reason?.trim();
  if (!reason) {
    throw new ValidationError('A reason is required when marking an absence');
  }
  return { employeeId: input.employeeId, date: input.date, status: 'absent', reason };
};

export class AttendanceService {
  constructor(
    private readonly attendance: AttendanceRepository,
    private readonly employees: EmployeeRepository,
    private readonly holidays: HolidayService,
    private readonly options: AttendanceServiceOptions,
  ) {}

  async record(input: AttendanceInput): Promise<AttendanceRecord> {
    const record = normalizeRecord(input);

    const employee = await this.employees.findById(record.employeeId);
    if (!employee) {
      throw new NotFoundError(`Employee #${record.employeeId} not found`);
    }
    return this.attendance.upsert(record);
  }

  async query(filter: AttendanceFilter): Promise<AttendanceRecord[]> {
    if (filter.from && filter.to) {
      assertOrderedRange({ start: filter.from, end: filter.to });
    }
    return this.attendance.find(filter);
  }

  async multidayAbsence({ employeeId, range, reason }: MultidayAbsenceInput): Promise<MultidayAbsenceResult> {
    const employee = await this.employees.findById(employeeId);
    if (!employee || !employee.active) {
      throw new NotFoundError(`Employee #${employeeId} not found`);
    }

    assertOrderedRange(range);

    const trimmed = reason.trim();
    if (!trimmed) {
      throw new ValidationError('A reason is required when marking an absence');
    }

    const holidayDates = this.options.multidaySkipHolidays
      ? new Set((await this.holidays.listBetween(range)).map((holiday) => holiday.date))
      : new Set<DayKey>();

    const recorded: DayKey[] = [];
    const skippedHolidays: DayKey[] = [];

    for (const date of eachDay(range)) {
      if (holidayDates.has(date)) {
        skippedHolidays.push(date);
        continue;
      }
      await this.attendance.upsert({ employeeId, date, status: 'absent', reason: trimmed });
      recorded.push(date);
    }

    return { employeeId, range, reason: trimmed, recorded, skippedHolidays };
  }
}
