import type { Repositories } from '../repositories/types';
import type { InteractionChannel } from '../types/collectorType';
import type { AppConfig } from '../utils/config';
import { AttendanceService } from './attendance.service';
import { AttendanceCollector } from './collector.service';
import { EmployeeService } from './employee.service';
import { HolidayService } from './holiday.service';
import { ReportService } from './report.service';

export interface Services {
  employees: EmployeeService;
  holidays: HolidayService;
  attendance: AttendanceService;
  collector: AttendanceCollector;
  reports: ReportService;
}

export const createServices = (
  repos: Repositories,
  channel: InteractionChannel,
  config: Pick<AppConfig, 'sessionTimeoutMinutes' | 'multidaySkipHolidays'>,
  now: () => Date = () => new Date(),
): Services => {
  const holidays = new HolidayService(repos.holidays);

  return {
    employees: new EmployeeService(repos.employees),
    holidays,
    attendance: new AttendanceService(repos.attendance, repos.employees, holidays, {
      multidaySkipHolidays: config.multidaySkipHolidays,
    }),
    collector: new AttendanceCollector(repos.employees, repos.attendance, channel, {
      timeoutMinutes: config.sessionTimeoutMinutes,
      now,
    }),
    reports: new ReportService(repos.employees, repos.attendance, repos.holidays, now),
  };
};
