import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryEmployeeRepository } from '../repositories/memoryRepositories';
import { NotFoundError, ValidationError } from '../utils/ErrorResponse';
import { EmployeeService } from './employee.service';

describe('EmployeeService', () => {
  let service: EmployeeService;

  beforeEach(() => {
    service = new EmployeeService(new MemoryEmployeeRepository());
  });

  it('adds trimmed names', async () => {
    expect(await service.add('  Alice  ')).toEqual({ id: 1, name: 'Alice', active: true });
  });

  it('rejects blank names', async () => {
    await expect(service.add('   ')).rejects.toThrow(new ValidationError('Employee name is required'));
  });

  it('soft deletes and keeps the employee reachable', async () => {
    await service.add('Alice');
    await service.add('Bob');

    expect(await service.remove(1)).toEqual({ id: 1, name: 'Alice', active: false });
    expect((await service.list()).map((e) => e.name)).toEqual(['Bob']);
    expect((await service.list(false)).map((e) => e.name)).toEqual(['Alice', 'Bob']);
    expect(await service.get(1)).toEqual({ id: 1, name: 'Alice', active: false });
  });

  it('removing twice is harmless', async () => {
    await service.add('Alice');
    await service.remove(1);

    expect(await service.remove(1)).toEqual({ id: 1, name: 'Alice', active: false });
  });

  it('reports unknown ids', async () => {
    await expect(service.remove(42)).rejects.toThrow(new NotFoundError('Employee #42 not found'));
    await expect(service.get(42)).rejects.toBeInstanceOf(NotFoundError);
  });
});
