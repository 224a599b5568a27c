import { asyncHandler } from '../middleware/asyncHandler';
import { requireAdmin } from '../middleware/auth.middleware';
import type { Services } from '../services';
import { isAttendanceStatus } from '../services/attendance.service';
import { parseCollectorInput } from '../services/collector.service';
import type {
  AttendanceFilter,
  AttendanceRecordsQuery,
  CollectionInputDto,
  MultidayAbsenceDto,
  StartCollectionDto,
  UpsertAttendanceDto,
} from '../types/attendanceType';
import { TypedRequest } from '../types/typedRequest';
import { TypedResponse } from '../types/typedResponse';
import type { AppConfig } from '../utils/config';
import {
  DayKey,
  formatLongDate,
  formatWeekday,
  parseDisplayDate,
  today,
  weekdayOf,
} from '../utils/dates';
import { ValidationError } from '../utils/ErrorResponse';
import { parseEmployeeId } from '../utils/parseId';
import { optionalText } from '../utils/parseText';
import {
  presentMultidayAbsence,
  presentRecord,
  presentSnapshot,
  presentStep,
} from '../utils/presenters';

type CollectionPolicy = Pick<AppConfig, 'collectionBlockHolidays' | 'collectionBlockedWeekdays'>;

type StepView = ReturnType<typeof presentStep>;
type RecordView = ReturnType<typeof presentRecord>;

export const DEFAULT_MULTIDAY_REASON = 'Not specified';

const parseStatus = (value: unknown) => {
  const status = typeof value === 'string' ? value.trim().toLowerCase() : undefined;
  if (!status || !isAttendanceStatus(status)) {
    throw new ValidationError('Status must be present or absent');
  }
  return status;
};

const requireDate = (value: unknown, label: string): DayKey => {
  if (value === undefined || value === null || value === '') {
    throw new ValidationError(`${label} is required (DD-MM-YYYY)`);
  }
  return parseDisplayDate(value, label);
};

export const createAttendanceController = (
  { attendance, collector, holidays }: Pick<Services, 'attendance' | 'collector' | 'holidays'>,
  policy: CollectionPolicy,
  now: () => Date = () => new Date(),
) => {
  // Refuses collection on holidays and configured days off.
  const assertCollectable = async (date: DayKey) => {
    if (policy.collectionBlockHolidays && (await holidays.isHoliday(date))) {
      throw new ValidationError(`${formatLongDate(date)} is a holiday, attendance is not collected`);
    }
    if (policy.collectionBlockedWeekdays.includes(weekdayOf(date))) {
      throw new ValidationError(`Attendance is not collected on ${formatWeekday(date)}`);
    }
  };

  return {
    startSession: asyncHandler(
      async (req: TypedRequest<{}, {}, StartCollectionDto>, res: TypedResponse<StepView>) => {
        const adminId = requireAdmin(req);
        const date = req.body.date ? parseDisplayDate(req.body.date) : today(now());

        await assertCollectable(date);
        const step = await collector.start(adminId, date);

        res.status(201).json({
          success: true,
          message: `Attendance collection started for ${formatLongDate(date)}`,
          data: presentStep(step),
        });
      },
    ),

    getSession: asyncHandler(
      async (req: TypedRequest, res: TypedResponse<ReturnType<typeof presentSnapshot> | null>) => {
        const snapshot = collector.snapshot(requireAdmin(req));

        res.status(200).json({
          success: true,
          message: snapshot ? undefined : 'No attendance collection in progress',
          data: snapshot ? presentSnapshot(snapshot) : null,
        });
      },
    ),

    sessionInput: asyncHandler(
      async (req: TypedRequest<{}, {}, CollectionInputDto>, res: TypedResponse<StepView>) => {
        const step = await collector.handleInput(requireAdmin(req), parseCollectorInput(req.body));

        res.status(200).json({ success: true, data: presentStep(step) });
      },
    ),

    cancelSession: asyncHandler(async (req: TypedRequest, res: TypedResponse<StepView>) => {
      const step = collector.cancel(requireAdmin(req));

      res.status(200).json({
        success: true,
        message: 'Attendance collection cancelled',
        data: presentStep(step),
      });
    }),

    upsertRecord: asyncHandler(
      async (req: TypedRequest<{}, {}, UpsertAttendanceDto>, res: TypedResponse<RecordView>) => {
        const { employeeId, date, status, reason } = req.body;

        const record = await attendance.record({
          employeeId: parseEmployeeId(employeeId),
          date: date ? parseDisplayDate(date) : today(now()),
          status: parseStatus(status),
          reason: optionalText(reason, 'Reason'),
        });

        res.status(200).json({ success: true, data: presentRecord(record) });
      },
    ),

    getRecords: asyncHandler(
      async (req: TypedRequest<{}, AttendanceRecordsQuery>, res: TypedResponse<RecordView[]>) => {
        const { employeeId, startDate, endDate, status } = req.query;

        const filter: AttendanceFilter = {};
        if (employeeId) filter.employeeId = parseEmployeeId(employeeId);
        if (startDate) filter.from = parseDisplayDate(startDate, 'start date');
        if (endDate) filter.to = parseDisplayDate(endDate, 'end date');
        if (status) filter.status = parseStatus(status);

        const records = await attendance.query(filter);

        res.status(200).json({ success: true, data: records.map(presentRecord) });
      },
    ),

    markMultidayAbsence: asyncHandler(
      async (
        req: TypedRequest<{}, {}, MultidayAbsenceDto>,
        res: TypedResponse<ReturnType<typeof presentMultidayAbsence>>,
      ) => {
        const { employeeId, startDate, endDate } = req.body;
        const reason = optionalText(req.body.reason, 'Reason');

        const result = await attendance.multidayAbsence({
          employeeId: parseEmployeeId(employeeId),
          range: { start: requireDate(startDate, 'start date'), end: requireDate(endDate, 'end date') },
          reason: reason?.trim() ? reason : DEFAULT_MULTIDAY_REASON,
        });

        res.status(200).json({
          success: true,
          message: `Marked absent for ${result.recorded.length} day(s): ${result.reason}`,
          data: presentMultidayAbsence(result),
        });
      },
    ),
  };
};
