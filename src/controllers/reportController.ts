import { Response } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import type { Services } from '../services';
import type {
  MonthlyReportQuery,
  PeriodReportQuery,
  ReportFormatQuery,
} from '../types/reportType';
import { ExportService } from '../services/export.service';
import { TypedRequest } from '../types/typedRequest';
import {
  calendarMonth,
  DayKey,
  DayRange,
  formatMonthLabel,
  lastDays,
  parseDisplayDate,
  today,
} from '../utils/dates';
import { ValidationError } from '../utils/ErrorResponse';
import { parseMonthParam } from '../utils/months';
import { parseEmployeeId } from '../utils/parseId';
import {
  presentDailyReport,
  presentEmployeeReport,
  presentPeriodReport,
} from '../utils/presenters';
import { dailyReportText, employeeReportText, periodReportText } from '../utils/reportText';

const wantsText = (query: ReportFormatQuery) => query.format === 'text';

const sendText = (res: Response, text: string) => {
  res.status(200).type('text/plain').send(text);
};

const parseRange = ({ startDate, endDate }: PeriodReportQuery): DayRange => {
  if (!startDate || !endDate) {
    throw new ValidationError('startDate and endDate are required (DD-MM-YYYY)');
  }
  return {
    start: parseDisplayDate(startDate, 'start date'),
    end: parseDisplayDate(endDate, 'end date'),
  };
};

export const createReportController = (
  { reports }: Pick<Services, 'reports'>,
  now: () => Date = () => new Date(),
) => {
  const sendDaily = async (res: Response, query: ReportFormatQuery, date: DayKey, title: string, icon: string) => {
    const report = await reports.dailyReport(date);
    if (wantsText(query)) return sendText(res, dailyReportText(report, title, icon));

    res.status(200).json({ success: true, data: presentDailyReport(report) });
  };

  const sendPeriod = async (res: Response, query: ReportFormatQuery, range: DayRange, title: string) => {
    const report = await reports.periodReport(range);
    if (wantsText(query)) return sendText(res, periodReportText(report, title));

    res.status(200).json({ success: true, data: presentPeriodReport(report) });
  };

  return {
    dailyReport: asyncHandler(async (req: TypedRequest<{}, ReportFormatQuery>, res: Response) => {
      await sendDaily(res, req.query, today(now()), 'Daily Report', '📊');
    }),

    dateReport: asyncHandler(
      async (req: TypedRequest<{ date: string }, ReportFormatQuery>, res: Response) => {
        await sendDaily(res, req.query, parseDisplayDate(req.params.date), 'Date Report', '📅');
      },
    ),

    last7Days: asyncHandler(async (req: TypedRequest<{}, ReportFormatQuery>, res: Response) => {
      await sendPeriod(res, req.query, lastDays(7, today(now())), 'Last 7 Days Report');
    }),

    last30Days: asyncHandler(async (req: TypedRequest<{}, ReportFormatQuery>, res: Response) => {
      await sendPeriod(res, req.query, lastDays(30, today(now())), 'Last 30 Days Report');
    }),

    // ?month=MM-YYYY, defaults to the current month
    monthlyReport: asyncHandler(async (req: TypedRequest<{}, MonthlyReportQuery>, res: Response) => {
      const current = now();
      const { year, month } = req.query.month
        ? parseMonthParam(req.query.month)
        : { year: current.getFullYear(), month: current.getMonth() + 1 };
      const range = calendarMonth(year, month);

      await sendPeriod(res, req.query, range, `Monthly Report - ${formatMonthLabel(range.start)}`);
    }),

    periodReport: asyncHandler(async (req: TypedRequest<{}, PeriodReportQuery>, res: Response) => {
      await sendPeriod(res, req.query, parseRange(req.query), 'Custom Period Report');
    }),

    employeeReport: asyncHandler(
      async (req: TypedRequest<{ id: string }, PeriodReportQuery>, res: Response) => {
        const { startDate, endDate } = req.query;
        const range = startDate || endDate ? parseRange(req.query) : undefined;

        const report = await reports.employeeReport(parseEmployeeId(req.params.id), range);
        if (wantsText(req.query)) return sendText(res, employeeReportText(report));

        res.status(200).json({ success: true, data: presentEmployeeReport(report) });
      },
    ),

    exportReport: asyncHandler(async (req: TypedRequest<{}, PeriodReportQuery>, res: Response) => {
      const range = req.query.startDate || req.query.endDate ? parseRange(req.query) : lastDays(30, today(now()));
      const report = await reports.periodReport(range);

      await ExportService.exportPeriodExcel(report, res);
    }),
  };
};
