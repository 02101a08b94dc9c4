import { describe, expect, it } from 'vitest';
import { alignToTick, computeFireAt, evaluateReminder, isReminderDue } from '../../src/services/reminders/dueWindow';

const DUE = new Date('2025-01-10T14:00:00Z');
const MINUTE = 60_000;
const at = (iso: string) => new Date(iso);

describe('due window evaluator', () => {
  it('computes the fire instant from the offset', () => {
    expect(computeFireAt(DUE, 30).toISOString()).toBe('2025-01-10T13:30:00.000Z');
    expect(computeFireAt(DUE, 60).toISOString()).toBe('2025-01-10T13:00:00.000Z');
  });

  it('fires only on the tick inside the half-open window', () => {
    const evaluate = (iso: string) =>
      evaluateReminder({ now: at(iso), dueAt: DUE, offsetMinutes: 30, pollIntervalMs: MINUTE });

    expect(evaluate('2025-01-10T13:29:00Z')).toBe('pending');
    expect(evaluate('2025-01-10T13:29:59.999Z')).toBe('pending');
    expect(evaluate('2025-01-10T13:30:00Z')).toBe('due');
    expect(evaluate('2025-01-10T13:30:59.999Z')).toBe('due');
    expect(evaluate('2025-01-10T13:31:00Z')).toBe('missed');
  });

  it('treats a window that elapsed while offline as missed', () => {
    expect(
      evaluateReminder({ now: at('2025-01-10T13:40:00Z'), dueAt: DUE, offsetMinutes: 30, pollIntervalMs: MINUTE }),
    ).toBe('missed');
  });

  it('never fires a reminder whose due instant is already long past', () => {
    expect(
      evaluateReminder({ now: at('2025-01-11T09:00:00Z'), dueAt: DUE, offsetMinutes: 120, pollIntervalMs: MINUTE }),
    ).toBe('missed');
  });

  it('widens the window with the poll interval', () => {
    const input = { dueAt: DUE, offsetMinutes: 30, pollIntervalMs: 5 * MINUTE };

    expect(isReminderDue({ ...input, now: at('2025-01-10T13:34:00Z') })).toBe(true);
    expect(isReminderDue({ ...input, now: at('2025-01-10T13:35:00Z') })).toBe(false);
  });

  it('flags non-positive or fractional offsets and invalid dates', () => {
    const now = at('2025-01-10T13:30:00Z');

    expect(evaluateReminder({ now, dueAt: DUE, offsetMinutes: 0, pollIntervalMs: MINUTE })).toBe('invalid');
    expect(evaluateReminder({ now, dueAt: DUE, offsetMinutes: -30, pollIntervalMs: MINUTE })).toBe('invalid');
    expect(evaluateReminder({ now, dueAt: DUE, offsetMinutes: 1.5, pollIntervalMs: MINUTE })).toBe('invalid');
    expect(evaluateReminder({ now, dueAt: new Date('nope'), offsetMinutes: 30, pollIntervalMs: MINUTE })).toBe('invalid');
  });

  it('aligns tick instants to the start of the minute', () => {
    expect(alignToTick(at('2025-01-10T13:30:00.450Z')).toISOString()).toBe('2025-01-10T13:30:00.000Z');
    expect(alignToTick(at('2025-01-10T13:30:59.999Z')).toISOString()).toBe('2025-01-10T13:30:00.000Z');
  });
});
