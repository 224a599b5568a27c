import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createMemoryRepositories } from './repositories/memoryRepositories';
import { AttendanceCollector } from './services/collector.service';
import { handleSocketInput } from './socket';

describe('handleSocketInput', () => {
  let collector: AttendanceCollector;

  beforeEach(async () => {
    const repos = createMemoryRepositories();
    await repos.employees.create('Alice');
    collector = new AttendanceCollector(repos.employees, repos.attendance, { prompt: vi.fn(), notify: vi.fn() }, {
      timeoutMinutes: 15,
    });
  });

  it('acknowledges a step with display dates', async () => {
    await collector.start('admin', '2025-07-15');

    expect(await handleSocketInput(collector, 'admin', { choice: 'absent' })).toMatchObject({
      success: true,
      data: {
        state: 'awaitingReason',
        prompt: { kind: 'reason', message: '📝 Reason for absence of Alice:', date: '15-07-2025' },
      },
    });
  });

  it('acknowledges failures with the error message', async () => {
    expect(await handleSocketInput(collector, 'admin', { choice: 'present' })).toEqual({
      success: false,
      message: 'No attendance collection in progress',
    });
    expect(await handleSocketInput(collector, 'admin', {})).toEqual({
      success: false,
      message: 'Send either a choice or a text reply',
    });
  });
});
