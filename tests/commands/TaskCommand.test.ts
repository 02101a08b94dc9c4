import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ChatInputCommandInteraction, MessageFlags } from 'discord.js';
import {
  buildRemindersUpdatedMessage,
  buildTaskCreatedMessage,
  execute,
  isTaskStatus,
  parseDueDate,
} from '../../src/commands/task';
import { buildOptInMessage, execute as executeReminders } from '../../src/commands/reminders';
import { buildCommandHandlers, getCommandNames } from '../../src/commands';
import { TaskManager } from '../../src/services/TaskManager';
import type { TaskRecord } from '../../src/services/TaskStore';
import { InMemoryTaskStore } from '../support/InMemoryTaskStore';

interface FakeUser {
  id: string;
  username: string;
  globalName: string | null;
}

interface InteractionSetup {
  sub: string;
  strings?: Record<string, string>;
  users?: Record<string, FakeUser>;
  canManage?: boolean;
  commandName?: string;
}

function createInteraction(setup: InteractionSetup) {
  const reply = vi.fn().mockResolvedValue(undefined);
  const editReply = vi.fn().mockResolvedValue(undefined);

  const interaction = {
    commandName: setup.commandName ?? 'task',
    guildId: 'guild-1',
    channelId: 'channel-1',
    user: { id: 'u9', username: 'owner', globalName: null },
    deferred: false,
    replied: false,
    memberPermissions: { has: vi.fn().mockReturnValue(setup.canManage ?? true) },
    options: {
      getSubcommand: () => setup.sub,
      getString: (name: string) => setup.strings?.[name] ?? null,
      getUser: (name: string) => setup.users?.[name] ?? null,
    },
    reply,
    editReply,
    deleteReply: vi.fn().mockResolvedValue(undefined),
  } as unknown as ChatInputCommandInteraction;

  return { interaction, reply };
}

const TASK: TaskRecord = {
  id: 'task-1',
  code: 'TK0001',
  sequence: 1,
  name: 'Prepare release notes',
  guildId: 'guild-1',
  channelId: 'channel-1',
  dueAt: new Date('2025-01-10T14:00:00Z'),
  status: 'NEW',
  assigneeIds: ['u1', 'u2'],
  createdBy: 'u9',
  createdAt: new Date('2025-01-09T12:00:00Z'),
};

describe('task command helpers', () => {
  it('parses UTC due dates', () => {
    expect(parseDueDate('2025-01-10 14:00')?.toISOString()).toBe('2025-01-10T14:00:00.000Z');
    expect(parseDueDate(' 2025-01-10T9:05 UTC ')?.toISOString()).toBe('2025-01-10T09:05:00.000Z');
    expect(parseDueDate('2025-01-10 14:00Z')?.toISOString()).toBe('2025-01-10T14:00:00.000Z');
  });

  it('rejects malformed or impossible due dates', () => {
    expect(parseDueDate('tomorrow at noon')).toBeNull();
    expect(parseDueDate('2025-02-30 10:00')).toBeNull();
    expect(parseDueDate('2025-01-10 24:00')).toBeNull();
    expect(parseDueDate('2025-01-10')).toBeNull();
  });

  it('recognizes task statuses', () => {
    expect(isTaskStatus('IN_PROGRESS')).toBe(true);
    expect(isTaskStatus('in_progress')).toBe(false);
    expect(isTaskStatus(null)).toBe(false);
  });

  it('confirms a created task', () => {
    expect(buildTaskCreatedMessage(TASK, [60, 15])).toBe([
      '✅ **Task Created!**',
      '',
      '📋 **Task:** Prepare release notes',
      '🔢 **Task Code:** TK0001',
      '👥 **Assigned to:** <@u1>, <@u2>',
      '⏰ **Due:** 2025-01-10 14:00 UTC',
      '🔔 **Reminders:** 1 hour, 15 minutes before',
    ].join('\n'));
    expect(buildTaskCreatedMessage({ ...TASK, assigneeIds: [] }, []).split('\n').slice(4)).toEqual([
      '👥 **Assigned to:** (unassigned)',
      '⏰ **Due:** 2025-01-10 14:00 UTC',
      '🔕 **Reminders:** off',
    ]);
  });

  it('confirms reminder edits', () => {
    expect(buildRemindersUpdatedMessage(TASK, [30])).toBe(
      '🔔 Reminders for **Prepare release notes** (`TK0001`) set to 30 minutes before the deadline.',
    );
    expect(buildRemindersUpdatedMessage(TASK, [])).toBe(
      '🔕 Reminders turned off for **Prepare release notes** (`TK0001`).',
    );
  });

  it('describes opt-in changes', () => {
    expect(buildOptInMessage(true)).toBe('✅ You will be included in reminders for tasks assigned to you.');
    expect(buildOptInMessage(false)).toBe(
      '🔕 You will no longer be included in task reminders. Use `/reminders on` to opt back in.',
    );
  });

  it('registers the task and reminders commands', () => {
    expect(getCommandNames()).toEqual(['task', 'reminders']);
  });
});

describe('task command execution', () => {
  let store: InMemoryTaskStore;
  let taskManager: TaskManager;

  beforeEach(() => {
    store = new InMemoryTaskStore();
    taskManager = new TaskManager(store);
  });

  it('creates a task and mentions its assignees', async () => {
    const { interaction, reply } = createInteraction({
      sub: 'add',
      strings: { name: 'Prepare release notes', due: '2999-01-10 14:00', reminders: '60,15' },
      users: { assignee: { id: 'u1', username: 'alice', globalName: 'Alice' } },
    });

    await execute(interaction, { taskManager });

    expect(reply).toHaveBeenCalledWith({
      content: [
        '✅ **Task Created!**',
        '',
        '📋 **Task:** Prepare release notes',
        '🔢 **Task Code:** TK0001',
        '👥 **Assigned to:** <@u1>',
        '⏰ **Due:** 2999-01-10 14:00 UTC',
        '🔔 **Reminders:** 1 hour, 15 minutes before',
      ].join('\n'),
      allowedMentions: { users: ['u1'] },
    });
    expect(store.participants.get('u1')).toMatchObject({
      userId: 'u1',
      handle: 'alice',
      displayName: 'Alice',
      receiveReminders: true,
    });
  });

  it('refuses task creation without the manage messages permission', async () => {
    const { interaction, reply } = createInteraction({
      sub: 'add',
      strings: { name: 'Prepare release notes', due: '2999-01-10 14:00' },
      users: { assignee: { id: 'u1', username: 'alice', globalName: null } },
      canManage: false,
    });

    await execute(interaction, { taskManager });

    expect(reply).toHaveBeenCalledWith({
      content: '⚠️ Only members who can manage messages may create tasks.',
      flags: MessageFlags.Ephemeral,
    });
    expect(store.tasks.size).toBe(0);
  });

  it('reports validation problems back to the member', async () => {
    const { interaction, reply } = createInteraction({
      sub: 'add',
      strings: { name: 'Prepare release notes', due: '2999-01-10 14:00', reminders: '60,soon' },
      users: { assignee: { id: 'u1', username: 'alice', globalName: null } },
    });

    await execute(interaction, { taskManager });

    expect(reply).toHaveBeenCalledWith({
      content: '⚠️ Reminder offsets must be positive whole minutes (received soon)',
      flags: MessageFlags.Ephemeral,
    });
  });

  it('replaces reminder times by task code', async () => {
    await taskManager.addTask({
      guildId: 'guild-1',
      channelId: 'channel-1',
      name: 'Prepare release notes',
      dueAt: new Date('2999-01-10T14:00:00Z'),
      assigneeIds: ['u1'],
      createdBy: 'u9',
    });
    const { interaction, reply } = createInteraction({
      sub: 'reminders',
      strings: { code: 'tk0001', times: 'off' },
    });

    await execute(interaction, { taskManager });

    expect(reply).toHaveBeenCalledWith({
      content: '🔕 Reminders turned off for **Prepare release notes** (`TK0001`).',
      flags: MessageFlags.Ephemeral,
    });
    expect(store.reminders.size).toBe(0);
  });

  it('routes the reminders command through the handler map', async () => {
    const handlers = buildCommandHandlers({ taskManager });
    const { interaction, reply } = createInteraction({ sub: 'off', commandName: 'reminders' });

    await handlers.get('reminders')?.(interaction);

    expect(store.participants.get('u9')).toMatchObject({ userId: 'u9', handle: 'owner', receiveReminders: false });
    expect(reply).toHaveBeenCalledWith({
      content: buildOptInMessage(false),
      flags: MessageFlags.Ephemeral,
    });
  });

  it('turns reminders back on', async () => {
    const { interaction } = createInteraction({ sub: 'on', commandName: 'reminders' });

    await executeReminders(interaction, { taskManager });

    expect(store.participants.get('u9')?.receiveReminders).toBe(true);
  });
});
