import type { EmployeeRepository } from '../repositories/types';
import type { Employee } from '../types/attendanceType';
import { NotFoundError, ValidationError } from '../utils/ErrorResponse';

export class EmployeeService {
  constructor(private readonly employees: EmployeeRepository) {}

  async add(name: string): Promise<Employee> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError('Employee name is required');
    }
    return this.employees.create(trimmed);
  }

  async list(activeOnly = true): Promise<Employee[]> {
    return this.employees.list(activeOnly);
  }

  async get(id: number): Promise<Employee> {
    const employee = await this.employees.findById(id);
    if (!employee) {
      throw new NotFoundError(`Employee #${id} not found`);
    }
    return employee;
  }

  /** Soft delete: the employee stays reportable, only leaves active listings. */
  async remove(id: number): Promise<Employee> {
    const employee = await this.employees.setActive(id, false);
    if (!employee) {
      throw new NotFoundError(`Employee #${id} not found`);
    }
    return employee;
  }
}
