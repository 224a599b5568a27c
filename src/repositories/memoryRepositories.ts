import type {
  AttendanceFilter,
  AttendanceRecord,
  Employee,
  Holiday,
} from '../types/attendanceType';
import { DayKey, formatDisplayDate } from '../utils/dates';
import { ConflictError } from '../utils/ErrorResponse';
import type {
  AttendanceRepository,
  EmployeeRepository,
  HolidayRepository,
  Repositories,
} from './types';

// In-process stores, used when no MONGO_URI is configured and by the tests.

export class MemoryEmployeeRepository implements EmployeeRepository {
  private store = new Map<number, Employee>();
  private sequence = 0;

  async create(name: string): Promise<Employee> {
    this.sequence += 1;
    const employee: Employee = { id: this.sequence, name, active: true };
    this.store.set(employee.id, employee);
    return { ...employee };
  }

  async findById(id: number): Promise<Employee | null> {
    const employee = this.store.get(id);
    return employee ? { ...employee } : null;
  }

  async list(activeOnly: boolean): Promise<Employee[]> {
    return Array.from(this.store.values())
      .filter((employee) => !activeOnly || employee.active)
      .sort((a, b) => a.id - b.id)
      .map((employee) => ({ ...employee }));
  }

  async setActive(id: number, active: boolean): Promise<Employee | null> {
    const employee = this.store.get(id);
    if (!employee) return null;

    employee.active = active;
    return { ...employee };
  }
}

const recordKey = (employeeId: number, date: DayKey) => `${employeeId}|${date}`;

export class MemoryAttendanceRepository implements AttendanceRepository {
  private store = new Map<string, AttendanceRecord>();

  async upsert(record: AttendanceRecord): Promise<AttendanceRecord> {
    const stored: AttendanceRecord =
      record.status === 'absent'
        ? { employeeId: record.employeeId, date: record.date, status: 'absent', reason: record.reason }
        : { employeeId: record.employeeId, date: record.date, status: 'present' };

    this.store.set(recordKey(record.employeeId, record.date), stored);
    return { ...stored };
  }

  async find(filter: AttendanceFilter = {}): Promise<AttendanceRecord[]> {
    return Array.from(this.store.values())
      .filter(
        (record) =>
          (filter.employeeId === undefined || record.employeeId === filter.employeeId) &&
          (!filter.status || record.status === filter.status) &&
          (!filter.from || record.date >= filter.from) &&
          (!filter.to || record.date <= filter.to),
      )
      .sort((a, b) => (a.date === b.date ? a.employeeId - b.employeeId : a.date < b.date ? -1 : 1))
      .map((record) => ({ ...record }));
  }

  get size(): number {
    return this.store.size;
  }
}

export class MemoryHolidayRepository implements HolidayRepository {
  private store = new Map<DayKey, Holiday>();

  async create(holiday: Holiday): Promise<Holiday> {
    if (this.store.has(holiday.date)) {
      throw new ConflictError(`${formatDisplayDate(holiday.date)} is already marked as a holiday`);
    }
    this.store.set(holiday.date, { ...holiday });
    return { ...holiday };
  }

  async remove(date: DayKey): Promise<boolean> {
    return this.store.delete(date);
  }

  async findByDate(date: DayKey): Promise<Holiday | null> {
    const holiday = this.store.get(date);
    return holiday ? { ...holiday } : null;
  }

  async list(range: { from?: DayKey; to?: DayKey } = {}): Promise<Holiday[]> {
    return Array.from(this.store.values())
      .filter(
        (holiday) =>
          (!range.from || holiday.date >= range.from) && (!range.to || holiday.date <= range.to),
      )
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
      .map((holiday) => ({ ...holiday }));
  }
}

export const createMemoryRepositories = (): Repositories => ({
  employees: new MemoryEmployeeRepository(),
  attendance: new MemoryAttendanceRepository(),
  holidays: new MemoryHolidayRepository(),
});
