// MARK: - Error Types
// Named errors surfaced by configuration, validation, and the reminder core

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class InvalidReminderOffsetError extends Error {
  readonly offset: unknown;

  constructor(offset: unknown) {
    super(`Reminder offsets must be positive whole minutes (received ${String(offset)})`);
    this.name = 'InvalidReminderOffsetError';
    this.offset = offset;
  }
}

export class TaskValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskValidationError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
