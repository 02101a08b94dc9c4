// MARK: - Reminder Offsets
// Validation and normalization of minutes-before-due reminder offsets

import { InvalidReminderOffsetError } from '../../utils/errors';

export const DEFAULT_REMINDER_OFFSETS: readonly number[] = [30];

const DISABLED_KEYWORDS = new Set(['off', 'none', 'no', 'disable', 'disabled']);

export function isValidReminderOffset(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Resolves the reminder set for a new or edited task.
 * `undefined` falls back to the defaults, an empty list means no reminders.
 * Duplicates are collapsed and the result is ordered earliest reminder first.
 */
export function normalizeReminderOffsets(
  offsets: readonly number[] | undefined,
  defaults: readonly number[] = DEFAULT_REMINDER_OFFSETS,
): number[] {
  const source = offsets ?? defaults;

  for (const offset of source) {
    if (!isValidReminderOffset(offset)) {
      throw new InvalidReminderOffsetError(offset);
    }
  }

  return Array.from(new Set(source)).sort((a, b) => b - a);
}

/**
 * Parses user or environment input such as `60,30,15`, `120` or `off`.
 */
export function parseReminderOffsetList(raw: string): number[] {
  const trimmed = raw.trim().toLowerCase();

  if (!trimmed || DISABLED_KEYWORDS.has(trimmed)) {
    return [];
  }

  const offsets = trimmed
    .split(/[\s,]+/)
    .filter(token => token.length > 0)
    .map(token => {
      if (!/^[-+]?\d+$/.test(token)) {
        throw new InvalidReminderOffsetError(token);
      }
      return Number(token);
    });

  return normalizeReminderOffsets(offsets);
}
