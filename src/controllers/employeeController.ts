import { asyncHandler } from '../middleware/asyncHandler';
import type { Services } from '../services';
import type { AddEmployeeDto, Employee } from '../types/attendanceType';
import { TypedRequest } from '../types/typedRequest';
import { TypedResponse } from '../types/typedResponse';
import { parseEmployeeId } from '../utils/parseId';
import { optionalText } from '../utils/parseText';

export const createEmployeeController = ({ employees }: Pick<Services, 'employees'>) => ({
  addEmployee: asyncHandler(
    async (req: TypedRequest<{}, {}, AddEmployeeDto>, res: TypedResponse<Employee>) => {
      const employee = await employees.add(optionalText(req.body.name, 'Name') ?? '');

      res.status(201).json({
        success: true,
        message: `Added new employee: ${employee.name}`,
        data: employee,
      });
    },
  ),

  // ?active=false lists everyone, including removed employees
  listEmployees: asyncHandler(
    async (req: TypedRequest<{}, { active?: string }>, res: TypedResponse<Employee[]>) => {
      const activeOnly = req.query.active !== 'false';
      const data = await employees.list(activeOnly);

      res.status(200).json({ success: true, data });
    },
  ),

  removeEmployee: asyncHandler(
    async (req: TypedRequest<{ id: string }>, res: TypedResponse<Employee>) => {
      const employee = await employees.remove(parseEmployeeId(req.params.id));

      res.status(200).json({
        success: true,
        message: `Removed employee: ${employee.name}`,
        data: employee,
      });
    },
  ),
});
