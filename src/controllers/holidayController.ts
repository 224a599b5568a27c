import { asyncHandler } from '../middleware/asyncHandler';
import type { Services } from '../services';
import type { MarkHolidayDto } from '../types/attendanceType';
import { TypedRequest } from '../types/typedRequest';
import { TypedResponse } from '../types/typedResponse';
import { formatLongDate, parseDisplayDate, today } from '../utils/dates';
import { optionalText } from '../utils/parseText';
import { presentHoliday } from '../utils/presenters';

type HolidayView = ReturnType<typeof presentHoliday>;

export const createHolidayController = (
  { holidays }: Pick<Services, 'holidays'>,
  now: () => Date = () => new Date(),
) => ({
  // date defaults to today
  markHoliday: asyncHandler(
    async (req: TypedRequest<{}, {}, MarkHolidayDto>, res: TypedResponse<HolidayView>) => {
      const { date, description } = req.body;
      const day = date ? parseDisplayDate(date) : today(now());

      const holiday = await holidays.add(day, optionalText(description, 'Description') ?? '');

      res.status(201).json({
        success: true,
        message: `Marked ${formatLongDate(holiday.date)} as holiday: ${holiday.description}`,
        data: presentHoliday(holiday),
      });
    },
  ),

  listHolidays: asyncHandler(async (_req: TypedRequest, res: TypedResponse<HolidayView[]>) => {
    const data = (await holidays.list()).map(presentHoliday);

    res.status(200).json({ success: true, data });
  }),

  removeHoliday: asyncHandler(
    async (req: TypedRequest<{ date: string }>, res: TypedResponse<null>) => {
      const day = parseDisplayDate(req.params.date);
      await holidays.remove(day);

      res.status(200).json({
        success: true,
        message: `Removed holiday on ${formatLongDate(day)}`,
        data: null,
      });
    },
  ),
});
