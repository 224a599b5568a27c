import cron from 'node-cron';
import type { AttendanceCollector } from '../services/collector.service';
import type { ExpiredSession } from '../types/collectorType';

export const expireIdleSessions = (collector: AttendanceCollector, now = new Date()): ExpiredSession[] => {
  const expired = collector.expireIdle(now);

  for (const session of expired) {
    console.log(
      `Attendance collection for ${session.date} by ${session.adminId} expired, ${session.discarded} pending record(s) discarded`,
    );
  }
  return expired;
};

export const scheduleSessionSweep = (collector: AttendanceCollector, expression: string) =>
  cron.schedule(expression, () => {
    try {
      expireIdleSessions(collector);
    } catch (err) {
      console.error('Idle session sweep failed:', err);
    }
  });
