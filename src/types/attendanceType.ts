import type { DayKey } from '../utils/dates';

export type AttendanceStatus = 'present' | 'absent';

// `unmarked` only exists in reports: a working day with no stored record.
export type DayStatus = AttendanceStatus | 'unmarked';

export interface Employee {
  id: number;
  name: string;
  active: boolean;
}

export interface AttendanceRecord {
  employeeId: number;
  date: DayKey;
  status: AttendanceStatus;
  reason?: string;
}

export interface Holiday {
  date: DayKey;
  description: string;
}

export interface AttendanceFilter {
  employeeId?: number;
  from?: DayKey;
  to?: DayKey;
  status?: AttendanceStatus;
}

// DTOs as they arrive over HTTP: untrusted JSON, dates as DD-MM-YYYY text

export interface AddEmployeeDto {
  name?: unknown;
}

export interface UpsertAttendanceDto {
  employeeId?: unknown;
  date?: unknown;
  status?: unknown;
  reason?: unknown;
}

export interface MultidayAbsenceDto {
  employeeId?: unknown;
  startDate?: unknown;
  endDate?: unknown;
  reason?: unknown;
}

export interface AttendanceRecordsQuery {
  employeeId?: unknown;
  startDate?: unknown;
  endDate?: unknown;
  status?: unknown;
}

export interface StartCollectionDto {
  date?: unknown;
}

export interface CollectionInputDto {
  choice?: unknown;
  text?: unknown;
}

export interface MarkHolidayDto {
  date?: unknown;
  description?: unknown;
}
