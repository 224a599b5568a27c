import fc from 'fast-check';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createMemoryRepositories } from '../repositories/memoryRepositories';
import type { AttendanceRepository, Repositories } from '../repositories/types';
import type { CollectorPrompt, InteractionChannel } from '../types/collectorType';
import { ConflictError, NotFoundError, ValidationError } from '../utils/ErrorResponse';
import { AttendanceCollector, parseCollectorInput } from './collector.service';

const DATE = '2025-07-15';
const START = new Date(2025, 6, 15, 9, 0);

const createChannel = () => ({
  prompt: vi.fn<(adminId: string, prompt: CollectorPrompt) => void>(),
  notify: vi.fn<(adminId: string, message: string) => void>(),
});

describe('parseCollectorInput', () => {
  it('reads choices and free text', () => {
    expect(parseCollectorInput({ choice: ' Absent ' })).toEqual({ type: 'decision', decision: 'absent' });
    expect(parseCollectorInput({ text: 'Sick' })).toEqual({ type: 'reason', text: 'Sick' });
  });

  it('rejects anything else', () => {
    expect(() => parseCollectorInput({ choice: 'late' })).toThrow('Choice must be present or absent');
    expect(() => parseCollectorInput({})).toThrow('Send either a choice or a text reply');
  });
});

describe('AttendanceCollector', () => {
  let repos: Repositories;
  let channel: ReturnType<typeof createChannel>;
  let clock: Date;

  const build = (attendance: AttendanceRepository = repos.attendance, target: InteractionChannel = channel) =>
    new AttendanceCollector(repos.employees, attendance, target, { timeoutMinutes: 15, now: () => clock });

  beforeEach(async () => {
    repos = createMemoryRepositories();
    channel = createChannel();
    clock = START;
    await repos.employees.create('Alice');
    await repos.employees.create('Bob');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prompts for the first active employee', async () => {
    const step = await build().start('admin', DATE);

    expect(step).toEqual({
      state: 'awaitingDecision',
      prompt: {
        kind: 'decision',
        message: '🧑‍💼 Employee #1: Alice\n📅 Date: 15-Jul-2025',
        choices: [
          { value: 'present', label: '✅ Present' },
          { value: 'absent', label: '❌ Absent' },
        ],
        employee: { id: 1, name: 'Alice' },
        position: 1,
        total: 2,
        date: DATE,
      },
    });
    expect(channel.prompt).toHaveBeenCalledTimes(1);
    expect(channel.prompt.mock.calls[0][0]).toBe('admin');
  });

  it('defaults the session date to today', async () => {
    const collector = build();
    await collector.start('admin');

    expect(collector.snapshot('admin')?.date).toBe('2025-07-15');
  });

  it('walks every employee, asks for absence reasons, then saves the batch', async () => {
    const collector = build();
    await collector.start('admin', DATE);

    await collector.handleInput('admin', { type: 'decision', decision: 'present' });
    expect(await repos.attendance.find()).toEqual([]);

    const reasonStep = await collector.handleInput('admin', { type: 'decision', decision: 'absent' });
    expect(reasonStep.state).toBe('awaitingReason');
    expect(channel.prompt.mock.calls[2][1].message).toBe('📝 Reason for absence of Bob:');

    const done = await collector.handleInput('admin', { type: 'reason', text: '  Sick ' });

    expect(done).toEqual({
      state: 'complete',
      summary: {
        date: DATE,
        saved: [
          { employeeId: 1, date: DATE, status: 'present' },
          { employeeId: 2, date: DATE, status: 'absent', reason: 'Sick' },
        ],
        failed: [],
        presentCount: 1,
        absentCount: 1,
      },
    });
    expect(await repos.attendance.find()).toEqual([
      { employeeId: 1, date: DATE, status: 'present' },
      { employeeId: 2, date: DATE, status: 'absent', reason: 'Sick' },
    ]);
    expect(channel.notify).toHaveBeenLastCalledWith(
      'admin',
      '🎉 Attendance for 15-Jul-2025 recorded successfully! ✅ 1 | ❌ 1.',
    );
    expect(collector.activeSessions).toBe(0);
  });

  it('ignores employees added after the session started', async () => {
    const collector = build();
    await collector.start('admin', DATE);
    await repos.employees.create('Carol');

    expect(collector.snapshot('admin')?.total).toBe(2);
  });

  it('refuses a second session and leaves the first untouched', async () => {
    const collector = build();
    await collector.start('admin', DATE);
    await collector.handleInput('admin', { type: 'decision', decision: 'present' });
    const before = collector.snapshot('admin');

    await expect(collector.start('admin', '2025-07-16')).rejects.toThrow(
      new ConflictError('Attendance collection already in progress'),
    );
    expect(collector.snapshot('admin')).toEqual(before);
  });

  it('needs at least one active employee', async () => {
    await repos.employees.setActive(1, false);
    await repos.employees.setActive(2, false);

    await expect(build().start('admin', DATE)).rejects.toThrow(new ValidationError('No active employees'));
  });

  it('rejects input that does not fit the current step', async () => {
    const collector = build();
    await expect(collector.handleInput('admin', { type: 'decision', decision: 'present' })).rejects.toThrow(
      new NotFoundError('No attendance collection in progress'),
    );

    await collector.start('admin', DATE);
    await expect(collector.handleInput('admin', { type: 'reason', text: 'Sick' })).rejects.toThrow(
      'Choose present or absent for Alice',
    );

    await collector.handleInput('admin', { type: 'decision', decision: 'absent' });
    await expect(collector.handleInput('admin', { type: 'decision', decision: 'present' })).rejects.toThrow(
      "Send the reason for Alice's absence",
    );
    await expect(collector.handleInput('admin', { type: 'reason', text: '   ' })).rejects.toThrow(
      'A reason is required when marking an absence',
    );
    expect(collector.snapshot('admin')?.phase).toBe('awaitingReason');
  });

  it('discards the batch on cancel', async () => {
    const collector = build();
    await collector.start('admin', DATE);
    await collector.handleInput('admin', { type: 'decision', decision: 'present' });

    expect(collector.cancel('admin')).toEqual({ state: 'cancelled', reason: 'cancelled', discarded: 1 });
    expect(channel.notify).toHaveBeenLastCalledWith(
      'admin',
      '🚫 Attendance collection cancelled. Nothing was saved.',
    );
    expect(await repos.attendance.find()).toEqual([]);
    expect(() => collector.cancel('admin')).toThrow(NotFoundError);
  });

  it('expires idle sessions only', async () => {
    const collector = build();
    await collector.start('admin', DATE);

    clock = new Date(START.getTime() + 10 * 60 * 1000);
    await collector.start('backup', DATE);
    await collector.handleInput('backup', { type: 'decision', decision: 'present' });

    const expired = collector.expireIdle(new Date(START.getTime() + 15 * 60 * 1000));

    expect(expired).toEqual([{ adminId: 'admin', date: DATE, discarded: 0 }]);
    expect(collector.snapshot('admin')).toBeNull();
    expect(collector.snapshot('backup')?.pending).toBe(1);
    expect(channel.notify).toHaveBeenLastCalledWith(
      'admin',
      '⌛ Attendance collection for 15-Jul-2025 timed out after 15 minutes of inactivity. Nothing was saved.',
    );
    expect(await repos.attendance.find()).toEqual([]);
  });

  it('expires a stale session on the next input instead of saving it', async () => {
    const collector = build();
    await collector.start('admin', DATE);

    clock = new Date(START.getTime() + 2 * 60 * 60 * 1000);
    await expect(collector.handleInput('admin', { type: 'decision', decision: 'present' })).rejects.toThrow(
      new NotFoundError('No attendance collection in progress'),
    );

    expect(collector.activeSessions).toBe(0);
    expect(await repos.attendance.find()).toEqual([]);
    expect(channel.notify).toHaveBeenLastCalledWith(
      'admin',
      '⌛ Attendance collection for 15-Jul-2025 timed out after 15 minutes of inactivity. Nothing was saved.',
    );
  });

  it('reports no session once the open one has gone stale', async () => {
    const collector = build();
    await collector.start('admin', DATE);

    clock = new Date(START.getTime() + 20 * 60 * 1000);

    expect(collector.snapshot('admin')).toBeNull();
    expect(collector.activeSessions).toBe(0);
  });

  it('lets a new session replace a stale one', async () => {
    const collector = build();
    await collector.start('admin', DATE);
    await collector.handleInput('admin', { type: 'decision', decision: 'present' });

    clock = new Date(START.getTime() + 15 * 60 * 1000);
    const step = await collector.start('admin', '2025-07-16');

    expect(step.state).toBe('awaitingDecision');
    expect(collector.snapshot('admin')).toMatchObject({ date: '2025-07-16', position: 1, pending: 0 });
    expect(channel.notify).toHaveBeenCalledWith(
      'admin',
      '⌛ Attendance collection for 15-Jul-2025 timed out after 15 minutes of inactivity. Nothing was saved.',
    );
  });

  it('keeps the records that saved when one write fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const flaky: AttendanceRepository = {
      upsert: async (record) => {
        if (record.employeeId === 2) throw new Error('write failed');
        return repos.attendance.upsert(record);
      },
      find: (filter) => repos.attendance.find(filter),
    };
    const collector = build(flaky);
    await collector.start('admin', DATE);
    await collector.handleInput('admin', { type: 'decision', decision: 'present' });

    const done = await collector.handleInput('admin', { type: 'decision', decision: 'present' });

    expect(done.state).toBe('complete');
    if (done.state !== 'complete') return;
    expect(done.summary.saved).toEqual([{ employeeId: 1, date: DATE, status: 'present' }]);
    expect(done.summary.failed).toEqual([
      { record: { employeeId: 2, date: DATE, status: 'present' }, error: 'write failed' },
    ]);
    expect(channel.notify).toHaveBeenLastCalledWith(
      'admin',
      '🎉 Attendance for 15-Jul-2025 recorded successfully! ✅ 1 | ❌ 0. ⚠️ 1 record(s) failed to save, please retry.',
    );
  });

  it('completes after one decision per employee plus one reason per absence', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.boolean(), { minLength: 1, maxLength: 8 }), async (presence) => {
        repos = createMemoryRepositories();
        for (let i = 0; i < presence.length; i++) {
          await repos.employees.create(`Employee ${i + 1}`);
        }
        const collector = build(repos.attendance, createChannel());
        await collector.start('admin', DATE);

        let steps = 0;
        for (const present of presence) {
          if (present) {
            await collector.handleInput('admin', { type: 'decision', decision: 'present' });
            steps += 1;
          } else {
            await collector.handleInput('admin', { type: 'decision', decision: 'absent' });
            await collector.handleInput('admin', { type: 'reason', text: 'Sick' });
            steps += 2;
          }
        }

        const records = await repos.attendance.find();
        expect(steps).toBe(presence.length + presence.filter((p) => !p).length);
        expect(records).toHaveLength(presence.length);
        expect(records.every((record) => record.date === DATE)).toBe(true);
        expect(records.filter((record) => record.status === 'absent')).toHaveLength(
          presence.filter((p) => !p).length,
        );
        expect(collector.activeSessions).toBe(0);
      }),
      { numRuns: 25 },
    );
  });
});
