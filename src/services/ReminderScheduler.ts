// MARK: - Reminder Scheduler
// Periodically scans pending task reminders, delivers the due ones, and records them as sent

import cron, { ScheduledTask } from 'node-cron';
import { isValidCron } from 'cron-validator';
import parser from 'cron-parser';
import { alignToTick, evaluateReminder, MINUTE_MS } from './reminders/dueWindow';
import { buildTaskReminderMessage, selectRecipients } from './reminders/composer';
import type { Notifier, PendingReminder, TaskStore } from './reminders/types';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const DEFAULT_POLL_INTERVAL_MINUTES = 1;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;

export type SchedulerState = 'stopped' | 'running';

export interface ReminderSchedulerOptions {
  store: TaskStore;
  notifier: Notifier;
  pollIntervalMinutes?: number;
  shutdownTimeoutMs?: number;
  clock?: () => Date;
}

export interface ReminderTickSummary {
  tickAt: Date;
  scanned: number;
  fired: number;
  delivered: number;
  failed: number;
  skippedNoRecipients: number;
  missed: number;
  invalid: number;
  aborted: boolean;
  interrupted: boolean;
  error?: string;
}

type DispatchOutcome = 'delivered' | 'failed' | 'no-recipients';

interface TickControl {
  halted: boolean;
}

interface ActiveTick {
  promise: Promise<ReminderTickSummary>;
  control: TickControl;
}

export function buildTickExpression(pollIntervalMinutes: number): string {
  return pollIntervalMinutes === 1 ? '* * * * *' : `*/${pollIntervalMinutes} * * * *`;
}

function emptySummary(tickAt: Date): ReminderTickSummary {
  return {
    tickAt,
    scanned: 0,
    fired: 0,
    delivered: 0,
    failed: 0,
    skippedNoRecipients: 0,
    missed: 0,
    invalid: 0,
    aborted: false,
    interrupted: false,
  };
}

export class ReminderScheduler {
  private readonly store: TaskStore;
  private readonly notifier: Notifier;
  private readonly pollIntervalMinutes: number;
  private readonly shutdownTimeoutMs: number;
  private readonly clock: () => Date;

  private job: ScheduledTask | null = null;
  private state: SchedulerState = 'stopped';
  private activeTick: ActiveTick | null = null;
  private lastTick: ReminderTickSummary | null = null;

  constructor(options: ReminderSchedulerOptions) {
    const pollIntervalMinutes = options.pollIntervalMinutes ?? DEFAULT_POLL_INTERVAL_MINUTES;

    if (!Number.isInteger(pollIntervalMinutes) || pollIntervalMinutes < 1 || pollIntervalMinutes > 59) {
      throw new Error(`Poll interval must be a whole number of minutes between 1 and 59 (received ${pollIntervalMinutes})`);
    }

    this.store = options.store;
    this.notifier = options.notifier;
    this.pollIntervalMinutes = pollIntervalMinutes;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  get pollIntervalMs(): number {
    return this.pollIntervalMinutes * MINUTE_MS;
  }

  getState(): SchedulerState {
    return this.state;
  }

  getLastTick(): ReminderTickSummary | null {
    return this.lastTick;
  }

  isTickInFlight(): boolean {
    return this.activeTick !== null;
  }

  getNextTickAt(): Date | null {
    if (this.state !== 'running') {
      return null;
    }

    return parser
      .parseExpression(buildTickExpression(this.pollIntervalMinutes), {
        currentDate: this.clock(),
        tz: 'UTC',
      })
      .next()
      .toDate();
  }

  /**
   * Registers the recurring tick. Calling start while running replaces the job.
   */
  start(): void {
    const expression = buildTickExpression(this.pollIntervalMinutes);

    if (!isValidCron(expression)) {
      throw new Error(`Invalid reminder tick expression: ${expression}`);
    }

    if (this.job) {
      this.job.stop();
      this.job = null;
      logger.info('Reminder scheduler job replaced', { cron: expression });
    }

    try {
      this.job = cron.schedule(
        expression,
        () => {
          this.runTick(alignToTick(this.clock())).catch(error => {
            logger.error('Reminder tick failed', { error: errorMessage(error) });
          });
        },
        {
          scheduled: true,
          timezone: 'UTC',
        },
      );
    } catch (error) {
      logger.error('Failed to schedule reminder scan', {
        cron: expression,
        error: errorMessage(error),
      });
      throw error;
    }

    this.state = 'running';
    logger.info('Reminder scheduler started', {
      cron: expression,
      pollIntervalMinutes: this.pollIntervalMinutes,
    });
  }

  /**
   * Stops the recurring tick and waits for the in-flight tick to finish its
   * current reminder. Safe to call when already stopped.
   */
  async shutdown(): Promise<void> {
    const active = this.activeTick;

    if (this.state === 'stopped' && !active) {
      return;
    }

    if (this.job) {
      this.job.stop();
      this.job = null;
    }
    this.state = 'stopped';

    if (active) {
      active.control.halted = true;
      await this.waitForTick(active);
    }

    logger.info('Reminder scheduler stopped');
  }

  /**
   * Runs one scan. Returns null when another tick is still in flight.
   */
  async runTick(now: Date = this.clock()): Promise<ReminderTickSummary | null> {
    if (this.activeTick) {
      logger.warn('Reminder tick skipped while previous tick is still running', {
        tickAt: now.toISOString(),
      });
      return null;
    }

    const control: TickControl = { halted: false };
    const active: ActiveTick = {
      control,
      promise: this.processTick(now, control),
    };
    this.activeTick = active;

    try {
      const summary = await active.promise;
      this.lastTick = summary;
      return summary;
    } finally {
      this.activeTick = null;
    }
  }

  private async processTick(now: Date, control: TickControl): Promise<ReminderTickSummary> {
    const summary = emptySummary(now);

    let reminders: PendingReminder[];
    try {
      reminders = await this.store.listPendingReminders();
    } catch (error) {
      summary.aborted = true;
      summary.error = errorMessage(error);
      logger.error('Reminder scan failed', { tickAt: now.toISOString(), error: summary.error });
      return summary;
    }

    summary.scanned = reminders.length;

    for (const reminder of reminders) {
      if (control.halted) {
        summary.interrupted = true;
        break;
      }

      const evaluation = evaluateReminder({
        now,
        dueAt: reminder.task.dueAt,
        offsetMinutes: reminder.offsetMinutes,
        pollIntervalMs: this.pollIntervalMs,
      });

      if (evaluation === 'invalid') {
        summary.invalid += 1;
        logger.warn('Skipping malformed reminder', {
          reminderId: reminder.reminderId,
          taskId: reminder.task.id,
          offsetMinutes: reminder.offsetMinutes,
        });
        continue;
      }

      if (evaluation === 'missed') {
        summary.missed += 1;
        logger.debug('Reminder window already passed', {
          reminderId: reminder.reminderId,
          taskCode: reminder.task.code,
        });
        continue;
      }

      if (evaluation === 'pending') {
        continue;
      }

      summary.fired += 1;
      const outcome = await this.dispatch(reminder);
      if (outcome === 'delivered') {
        summary.delivered += 1;
      } else if (outcome === 'failed') {
        summary.failed += 1;
      } else {
        summary.skippedNoRecipients += 1;
      }

      try {
        const marked = await this.store.markReminderSent(reminder.reminderId);
        if (!marked) {
          logger.warn('Reminder no longer exists when marking sent', {
            reminderId: reminder.reminderId,
          });
        }
      } catch (error) {
        summary.aborted = true;
        summary.error = errorMessage(error);
        logger.error('Failed to mark reminder as sent', {
          reminderId: reminder.reminderId,
          error: summary.error,
        });
        break;
      }
    }

    if (summary.fired > 0 || summary.aborted) {
      logger.info('Reminder tick completed', {
        tickAt: now.toISOString(),
        scanned: summary.scanned,
        fired: summary.fired,
        delivered: summary.delivered,
        failed: summary.failed,
        skippedNoRecipients: summary.skippedNoRecipients,
        aborted: summary.aborted,
      });
    }

    return summary;
  }

  private async dispatch(reminder: PendingReminder): Promise<DispatchOutcome> {
    const { task } = reminder;
    const recipients = selectRecipients(task.assignees);

    if (recipients.length === 0) {
      logger.info('No opted-in assignees for reminder', {
        reminderId: reminder.reminderId,
        taskCode: task.code,
      });
      return 'no-recipients';
    }

    const text = buildTaskReminderMessage(task, recipients, reminder.offsetMinutes);

    try {
      const accepted = await this.notifier.send(
        task.chatId,
        text,
        recipients.map(recipient => recipient.id),
      );
      if (!accepted) {
        logger.warn('Reminder delivery was not accepted', {
          reminderId: reminder.reminderId,
          taskCode: task.code,
          chatId: task.chatId,
        });
        return 'failed';
      }
    } catch (error) {
      logger.error('Reminder delivery failed', {
        reminderId: reminder.reminderId,
        taskCode: task.code,
        chatId: task.chatId,
        error: errorMessage(error),
      });
      return 'failed';
    }

    logger.info('Reminder sent', {
      reminderId: reminder.reminderId,
      taskCode: task.code,
      chatId: task.chatId,
      offsetMinutes: reminder.offsetMinutes,
      recipients: recipients.length,
    });
    return 'delivered';
  }

  private async waitForTick(active: ActiveTick): Promise<void> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.shutdownTimeoutMs);
      timer.unref();
    });

    try {
      const result = await Promise.race([active.promise.then(() => 'done' as const), timeout]);
      if (result === 'timeout') {
        logger.warn('Reminder tick still running after shutdown timeout', {
          timeoutMs: this.shutdownTimeoutMs,
        });
      }
    } finally {
      clearTimeout(timer);
    }
  }
}
