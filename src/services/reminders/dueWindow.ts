// MARK: - Due Window Evaluator
// Decides whether a reminder fires on the current scheduler tick

export const MINUTE_MS = 60_000;

export type ReminderEvaluation = 'pending' | 'due' | 'missed' | 'invalid';

export interface ReminderWindowInput {
  now: Date;
  dueAt: Date;
  offsetMinutes: number;
  pollIntervalMs: number;
}

export function computeFireAt(dueAt: Date, offsetMinutes: number): Date {
  return new Date(dueAt.getTime() - offsetMinutes * MINUTE_MS);
}

/**
 * A reminder is due when `fireAt <= now < fireAt + pollInterval`.
 * Once `now` has moved past the window the reminder is missed and never fires late.
 */
export function evaluateReminder(input: ReminderWindowInput): ReminderEvaluation {
  const { now, dueAt, offsetMinutes, pollIntervalMs } = input;

  if (!Number.isInteger(offsetMinutes) || offsetMinutes <= 0) {
    return 'invalid';
  }

  if (Number.isNaN(dueAt.getTime()) || Number.isNaN(now.getTime())) {
    return 'invalid';
  }

  const fireAt = computeFireAt(dueAt, offsetMinutes).getTime();
  const current = now.getTime();

  if (current < fireAt) {
    return 'pending';
  }

  if (current < fireAt + pollIntervalMs) {
    return 'due';
  }

  return 'missed';
}

export function isReminderDue(input: ReminderWindowInput): boolean {
  return evaluateReminder(input) === 'due';
}

/**
 * Truncates a tick instant to the minute the cron job fired for.
 */
export function alignToTick(now: Date): Date {
  return new Date(Math.floor(now.getTime() / MINUTE_MS) * MINUTE_MS);
}
