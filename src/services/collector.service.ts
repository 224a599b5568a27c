import type { AttendanceRepository, EmployeeRepository } from '../repositories/types';
import type { AttendanceRecord, Employee } from '../types/attendanceType';
import type {
  CollectionSummary,
  CollectorInput,
  CollectorPrompt,
  ExpiredSession,
  InteractionChannel,
  SessionPhase,
  SessionSnapshot,
  StepResult,
} from '../types/collectorType';
import { DayKey, formatLongDate, today } from '../utils/dates';
import {
  ConflictError,
  NotFoundError,
  TimeoutError,
  ValidationError,
} from '../utils/ErrorResponse';
import { isAttendanceStatus } from './attendance.service';

interface CollectionSession {
  adminId: string;
  date: DayKey;
  /** Frozen at start; registry changes do not reach a running session. */
  employees: Employee[];
  index: number;
  phase: SessionPhase;
  pending: AttendanceRecord[];
  startedAt: Date;
  lastActivityAt: Date;
}

export interface CollectorOptions {
  timeoutMinutes: number;
  now?: () => Date;
}

// Accepts {choice: 'present' | 'absent'} or {text: '...'} from HTTP bodies and socket payloads.
export const parseCollectorInput = (payload: { choice?: unknown; text?: unknown }): CollectorInput => {
  if (typeof payload.choice === 'string') {
    const choice = payload.choice.trim().toLowerCase();
    if (!isAttendanceStatus(choice)) {
      throw new ValidationError('Choice must be present or absent');
    }
    return { type: 'decision', decision: choice };
  }
  if (typeof payload.text === 'string') {
    return { type: 'reason', text: payload.text };
  }
  throw new ValidationError('Send either a choice or a text reply');
};

const decisionPrompt = (session: CollectionSession): CollectorPrompt => {
  const employee = session.employees[session.index];
  const position = session.index + 1;
  return {
    kind: 'decision',
    message: `🧑‍💼 Employee #${position}: ${employee.name}\n📅 Date: ${formatLongDate(session.date)}`,
    choices: [
      { value: 'present', label: '✅ Present' },
      { value: 'absent', label: '❌ Absent' },
    ],
    employee: { id: employee.id, name: employee.name },
    position,
    total: session.employees.length,
    date: session.date,
  };
};

const reasonPrompt = (session: CollectionSession): CollectorPrompt => {
  const employee = session.employees[session.index];
  return {
    kind: 'reason',
    message: `📝 Reason for absence of ${employee.name}:`,
    choices: [],
    employee: { id: employee.id, name: employee.name },
    position: session.index + 1,
    total: session.employees.length,
    date: session.date,
  };
};

export class AttendanceCollector {
  private readonly sessions = new Map<string, CollectionSession>();
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly employees: EmployeeRepository,
    private readonly attendance: AttendanceRepository,
    private readonly channel: InteractionChannel,
    options: CollectorOptions,
  ) {
    this.timeoutMs = options.timeoutMinutes * 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  async start(adminId: string, date?: DayKey): Promise<StepResult> {
    this.assertIdle(adminId);

    const employees = await this.employees.list(true);

    // another start may have won while the roster was loading
    this.assertIdle(adminId);

    if (employees.length === 0) {
      throw new ValidationError('No active employees');
    }

    const now = this.now();
    const session: CollectionSession = {
      adminId,
      date: date ?? today(now),
      employees,
      index: 0,
      phase: 'awaitingDecision',
      pending: [],
      startedAt: now,
      lastActivityAt: now,
    };
    this.sessions.set(adminId, session);

    return this.ask(session);
  }

  async handleInput(adminId: string, input: CollectorInput): Promise<StepResult> {
    const session = this.require(adminId);
    const employee = session.employees[session.index];
    session.lastActivityAt = this.now();

    if (session.phase === 'awaitingDecision') {
      if (input.type !== 'decision') {
        throw new ValidationError(`Choose present or absent for ${employee.name}`);
      }
      if (input.decision === 'absent') {
        session.phase = 'awaitingReason';
        return this.ask(session);
      }
      session.pending.push({ employeeId: employee.id, date: session.date, status: 'present' });
      return this.advance(session);
    }

    if (input.type !== 'reason') {
      throw new ValidationError(`Send the reason for ${employee.name}'s absence`);
    }
    const reason = input.text.trim();
    if (!reason) {
      throw new ValidationError('A reason is required when marking an absence');
    }
    session.pending.push({ employeeId: employee.id, date: session.date, status: 'absent', reason });
    return this.advance(session);
  }

  cancel(adminId: string): StepResult {
    const session = this.require(adminId);
    this.sessions.delete(adminId);
    this.channel.notify(adminId, '🚫 Attendance collection cancelled. Nothing was saved.');
    return { state: 'cancelled', reason: 'cancelled', discarded: session.pending.length };
  }

  /** Re-sends the open prompt, e.g. after the admin reconnects. */
  current(adminId: string): StepResult {
    return this.ask(this.require(adminId));
  }

  snapshot(adminId: string): SessionSnapshot | null {
    const session = this.live(adminId);
    if (!session) return null;

    return {
      adminId,
      date: session.date,
      phase: session.phase,
      position: session.index + 1,
      total: session.employees.length,
      pending: session.pending.length,
      startedAt: session.startedAt,
      lastActivityAt: session.lastActivityAt,
    };
  }

  expireIdle(now: Date = this.now()): ExpiredSession[] {
    return Array.from(this.sessions.values())
      .filter((session) => this.isStale(session, now))
      .map((session) => this.expire(session));
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  // A session idle past the timeout is expired on first touch, whether or not the sweep has run.
  private live(adminId: string): CollectionSession | undefined {
    const session = this.sessions.get(adminId);
    if (session && this.isStale(session, this.now())) {
      this.expire(session);
      return undefined;
    }
    return session;
  }

  private assertIdle(adminId: string): void {
    if (this.live(adminId)) {
      throw new ConflictError('Attendance collection already in progress');
    }
  }

  private require(adminId: string): CollectionSession {
    const session = this.live(adminId);
    if (!session) {
      throw new NotFoundError('No attendance collection in progress');
    }
    return session;
  }

  private isStale(session: CollectionSession, now: Date): boolean {
    return now.getTime() - session.lastActivityAt.getTime() >= this.timeoutMs;
  }

  private expire(session: CollectionSession): ExpiredSession {
    this.sessions.delete(session.adminId);
    const timeout = new TimeoutError(
      `Attendance collection for ${formatLongDate(session.date)} timed out after ${
        this.timeoutMs / 60000
      } minutes of inactivity. Nothing was saved.`,
    );
    this.channel.notify(session.adminId, `⌛ ${timeout.message}`);
    return { adminId: session.adminId, date: session.date, discarded: session.pending.length };
  }

  private ask(session: CollectionSession): StepResult {
    const prompt = session.phase === 'awaitingDecision' ? decisionPrompt(session) : reasonPrompt(session);
    this.channel.prompt(session.adminId, prompt);
    return { state: session.phase, prompt };
  }

  private async advance(session: CollectionSession): Promise<StepResult> {
    session.index += 1;
    session.phase = 'awaitingDecision';

    if (session.index < session.employees.length) {
      return this.ask(session);
    }

    this.sessions.delete(session.adminId);
    const summary = await this.persist(session.date, session.pending);

    const failures = summary.failed.length ? ` ⚠️ ${summary.failed.length} record(s) failed to save, please retry.` : '';
    this.channel.notify(
      session.adminId,
      `🎉 Attendance for ${formatLongDate(session.date)} recorded successfully! ✅ ${summary.presentCount} | ❌ ${summary.absentCount}.${failures}`,
    );
    return { state: 'complete', summary };
  }

  // Each record is written on its own; one failing write does not stop the others.
  private async persist(date: DayKey, batch: AttendanceRecord[]): Promise<CollectionSummary> {
    const results = await Promise.allSettled(batch.map((record) => this.attendance.upsert(record)));

    const summary: CollectionSummary = { date, saved: [], failed: [], presentCount: 0, absentCount: 0 };
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        summary.saved.push(result.value);
        if (result.value.status === 'present') summary.presentCount++;
        else summary.absentCount++;
        return;
      }
      const error = result.reason instanceof Error ? result.reason.message : String(result.reason);
      console.error(`Error saving attendance for employee #${batch[i].employeeId} on ${date}:`, error);
      summary.failed.push({ record: batch[i], error });
    });

    return summary;
  }
}
