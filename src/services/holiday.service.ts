import type { HolidayRepository } from '../repositories/types';
import type { Holiday } from '../types/attendanceType';
import { DayKey, DayRange, formatDisplayDate } from '../utils/dates';
import { NotFoundError, ValidationError } from '../utils/ErrorResponse';

export class HolidayService {
  constructor(private readonly holidays: HolidayRepository) {}

  async add(date: DayKey, description: string): Promise<Holiday> {
    const trimmed = description.trim();
    if (!trimmed) {
      throw new ValidationError('Holiday description is required');
    }
    return this.holidays.create({ date, description: trimmed });
  }

  async remove(date: DayKey): Promise<void> {
    const removed = await this.holidays.remove(date);
    if (!removed) {
      throw new NotFoundError(`No holiday found on ${formatDisplayDate(date)}`);
    }
  }

  async isHoliday(date: DayKey): Promise<boolean> {
    return (await this.holidays.findByDate(date)) !== null;
  }

  async list(): Promise<Holiday[]> {
    return this.holidays.list();
  }

  async listBetween({ start, end }: DayRange): Promise<Holiday[]> {
    return this.holidays.list({ from: start, to: end });
  }
}
