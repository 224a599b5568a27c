import type { DayKey } from '../utils/dates';
import type { AttendanceRecord, AttendanceStatus, Employee } from './attendanceType';

export type CollectorInput =
  | { type: 'decision'; decision: AttendanceStatus }
  | { type: 'reason'; text: string };

export type SessionPhase = 'awaitingDecision' | 'awaitingReason';

export interface PromptChoice {
  value: AttendanceStatus;
  label: string;
}

export interface CollectorPrompt {
  kind: 'decision' | 'reason';
  message: string;
  /** Empty when the admin is expected to answer with free text. */
  choices: PromptChoice[];
  employee: Pick<Employee, 'id' | 'name'>;
  position: number;
  total: number;
  date: DayKey;
}

export interface CollectionSummary {
  date: DayKey;
  saved: AttendanceRecord[];
  failed: { record: AttendanceRecord; error: string }[];
  presentCount: number;
  absentCount: number;
}

export type StepResult =
  | { state: SessionPhase; prompt: CollectorPrompt }
  | { state: 'complete'; summary: CollectionSummary }
  | { state: 'cancelled'; reason: 'cancelled' | 'timeout'; discarded: number };

export interface SessionSnapshot {
  adminId: string;
  date: DayKey;
  phase: SessionPhase;
  position: number;
  total: number;
  pending: number;
  startedAt: Date;
  lastActivityAt: Date;
}

export interface ExpiredSession {
  adminId: string;
  date: DayKey;
  discarded: number;
}

/** Delivers prompts and notices to the admin; exactly one open prompt per session. */
export interface InteractionChannel {
  prompt(adminId: string, prompt: CollectorPrompt): void;
  notify(adminId: string, message: string): void;
}
