import mongoose, { FilterQuery, UpdateQuery } from 'mongoose';
import Attendance, { IAttendance } from '../models/Attendance';
import Employee, { IEmployee } from '../models/Employee';
import Holiday, { IHoliday } from '../models/Holiday';
import { nextSequence } from '../models/Counter';
import type {
  AttendanceFilter,
  AttendanceRecord,
  Employee as EmployeeEntity,
  Holiday as HolidayEntity,
} from '../types/attendanceType';
import { DayKey, formatDisplayDate } from '../utils/dates';
import { ConflictError } from '../utils/ErrorResponse';
import type {
  AttendanceRepository,
  EmployeeRepository,
  HolidayRepository,
  Repositories,
} from './types';

export const isDuplicateKeyError = (err: unknown): boolean =>
  err instanceof mongoose.mongo.MongoServerError && err.code === 11000;

const toEmployee = (doc: Pick<IEmployee, 'employeeId' | 'name' | 'active'>): EmployeeEntity => ({
  id: doc.employeeId,
  name: doc.name,
  active: doc.active,
});

const toRecord = (
  doc: Pick<IAttendance, 'employeeId' | 'date' | 'status' | 'reason'>,
): AttendanceRecord =>
  doc.status === 'absent'
    ? { employeeId: doc.employeeId, date: doc.date, status: 'absent', reason: doc.reason ?? '' }
    : { employeeId: doc.employeeId, date: doc.date, status: 'present' };

const toHoliday = (doc: Pick<IHoliday, 'date' | 'description'>): HolidayEntity => ({
  date: doc.date,
  description: doc.description,
});

const dateBounds = (from?: DayKey, to?: DayKey): { $gte?: string; $lte?: string } | undefined => {
  if (!from && !to) return undefined;
  return {
    ...(from ? { $gte: from } : {}),
    ...(to ? { $lte: to } : {}),
  };
};

export class MongoEmployeeRepository implements EmployeeRepository {
  async create(name: string): Promise<EmployeeEntity> {
    const employeeId = await nextSequence('employee');
    const doc = await Employee.create({ employeeId, name, active: true });
    return toEmployee(doc);
  }

  async findById(id: number): Promise<EmployeeEntity | null> {
    const doc = await Employee.findOne({ employeeId: id });
    return doc ? toEmployee(doc) : null;
  }

  async list(activeOnly: boolean): Promise<EmployeeEntity[]> {
    const docs = await Employee.find(activeOnly ? { active: true } : {}).sort({ employeeId: 1 });
    return docs.map(toEmployee);
  }

  async setActive(id: number, active: boolean): Promise<EmployeeEntity | null> {
    const doc = await Employee.findOneAndUpdate(
      { employeeId: id },
      { $set: { active } },
      { new: true, runValidators: true },
    );
    return doc ? toEmployee(doc) : null;
  }
}

export class MongoAttendanceRepository implements AttendanceRepository {
  async upsert(record: AttendanceRecord): Promise<AttendanceRecord> {
    const update: UpdateQuery<IAttendance> =
      record.status === 'absent'
        ? { $set: { status: 'absent', reason: record.reason } }
        : { $set: { status: 'present' }, $unset: { reason: 1 } };

    const doc = await Attendance.findOneAndUpdate(
      { employeeId: record.employeeId, date: record.date },
      update,
      { new: true, upsert: true, runValidators: true },
    );
    if (!doc) {
      throw new Error(`Attendance for employee ${record.employeeId} on ${record.date} was not saved`);
    }
    return toRecord(doc);
  }

  async find(filter: AttendanceFilter = {}): Promise<AttendanceRecord[]> {
    const query: FilterQuery<IAttendance> = {};
    if (filter.employeeId !== undefined) query.employeeId = filter.employeeId;
    if (filter.status) query.status = filter.status;

    const date = dateBounds(filter.from, filter.to);
    if (date) query.date = date;

    const docs = await Attendance.find(query).sort({ date: 1, employeeId: 1 });
    return docs.map(toRecord);
  }
}

export class MongoHolidayRepository implements HolidayRepository {
  async create(holiday: HolidayEntity): Promise<HolidayEntity> {
    try {
      const doc = await Holiday.create(holiday);
      return toHoliday(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new ConflictError(`${formatDisplayDate(holiday.date)} is already marked as a holiday`);
      }
      throw err;
    }
  }

  async remove(date: DayKey): Promise<boolean> {
    const result = await Holiday.deleteOne({ date });
    return result.deletedCount > 0;
  }

  async findByDate(date: DayKey): Promise<HolidayEntity | null> {
    const doc = await Holiday.findOne({ date });
    return doc ? toHoliday(doc) : null;
  }

  async list(range: { from?: DayKey; to?: DayKey } = {}): Promise<HolidayEntity[]> {
    const date = dateBounds(range.from, range.to);
    const docs = await Holiday.find(date ? { date } : {}).sort({ date: 1 });
    return docs.map(toHoliday);
  }
}

export const createMongoRepositories = (): Repositories => ({
  employees: new MongoEmployeeRepository(),
  attendance: new MongoAttendanceRepository(),
  holidays: new MongoHolidayRepository(),
});
