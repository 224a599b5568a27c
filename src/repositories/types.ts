import type { AttendanceFilter, AttendanceRecord, Employee, Holiday } from '../types/attendanceType';
import type { DayKey } from '../utils/dates';

export interface EmployeeRepository {
  create(name: string): Promise<Employee>;
  findById(id: number): Promise<Employee | null>;
  /** Ordered by id, ascending. */
  list(activeOnly: boolean): Promise<Employee[]>;
  setActive(id: number, active: boolean): Promise<Employee | null>;
}

export interface AttendanceRepository {
  /** Inserts or overwrites the record for (employeeId, date). */
  upsert(record: AttendanceRecord): Promise<AttendanceRecord>;
  /** Ordered by date, then employee id. */
  find(filter?: AttendanceFilter): Promise<AttendanceRecord[]>;
}

export interface HolidayRepository {
  /** Throws ConflictError when the date is already a holiday. */
  create(holiday: Holiday): Promise<Holiday>;
  /** Returns false when there was nothing to remove. */
  remove(date: DayKey): Promise<boolean>;
  findByDate(date: DayKey): Promise<Holiday | null>;
  /** Ordered by date, optionally bounded (inclusive). */
  list(range?: { from?: DayKey; to?: DayKey }): Promise<Holiday[]>;
}

export interface Repositories {
  employees: EmployeeRepository;
  attendance: AttendanceRepository;
  holidays: HolidayRepository;
}
