import { Response } from 'express';
import ExcelJS from 'exceljs';
import type { PeriodReport } from '../types/reportType';
import { formatDisplayDate } from '../utils/dates';

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export class ExportService {
  static buildPeriodWorkbook(report: PeriodReport): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();

    const worksheet = workbook.addWorksheet('Attendance Report');
    worksheet.columns = [
      { header: 'Employee ID', key: 'employeeId', width: 14 },
      { header: 'Name', key: 'name', width: 25 },
      { header: 'Present Days', key: 'presentDays', width: 15 },
      { header: 'Absent Days', key: 'absentDays', width: 15 },
      { header: 'Unmarked Days', key: 'unmarkedDays', width: 15 },
      { header: 'Working Days', key: 'workingDays', width: 15 },
      { header: 'Attendance Rate (%)', key: 'attendanceRate', width: 20 },
    ];
    worksheet.getRow(1).font = { bold: true };

    report.perEmployee.forEach((row) => {
      worksheet.addRow({ ...row, workingDays: report.workingDayCount });
    });

    const holidaySheet = workbook.addWorksheet('Holidays');
    holidaySheet.columns = [
      { header: 'Date', key: 'date', width: 15 },
      { header: 'Description', key: 'description', width: 40 },
    ];
    holidaySheet.getRow(1).font = { bold: true };

    report.holidays.forEach((holiday) => {
      holidaySheet.addRow({ date: formatDisplayDate(holiday.date), description: holiday.description });
    });

    return workbook;
  }

  static exportFilename(report: PeriodReport): string {
    return `attendance_${formatDisplayDate(report.startDate)}_${formatDisplayDate(report.endDate)}.xlsx`;
  }

  static async exportPeriodExcel(report: PeriodReport, res: Response): Promise<void> {
    const workbook = ExportService.buildPeriodWorkbook(report);

    res.setHeader('Content-Type', XLSX_MIME);
    res.setHeader('Content-Disposition', `attachment; filename=${ExportService.exportFilename(report)}`);

    await workbook.xlsx.write(res);
    res.end();
  }
}
