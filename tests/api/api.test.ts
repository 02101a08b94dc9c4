import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Request, Response } from 'express';
import { createApiHandlers } from '../../src/api';
import type { ApiHandler, ApiHandlers } from '../../src/api';
import { TaskManager } from '../../src/services/TaskManager';
import { InMemoryTaskStore } from '../support/InMemoryTaskStore';

const FUTURE_DUE = '2099-03-01T09:00:00.000Z';

interface FakeRequest {
  body?: unknown;
  params?: Record<string, string>;
  query?: Record<string, string>;
}

async function call(handler: ApiHandler, request: FakeRequest = {}) {
  const captured: { status: number; body: unknown } = { status: 200, body: undefined };
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockImplementation((code: number) => {
    captured.status = code;
    return res;
  });
  res.json.mockImplementation((body: unknown) => {
    captured.body = body;
    return res;
  });

  const req = { body: request.body ?? {}, params: request.params ?? {}, query: request.query ?? {} };
  await handler(req as unknown as Request, res as unknown as Response);
  return captured;
}

describe('REST API', () => {
  let store: InMemoryTaskStore;
  let handlers: ApiHandlers;

  beforeEach(() => {
    store = new InMemoryTaskStore();
    handlers = createApiHandlers({ taskManager: new TaskManager(store) });
  });

  const createTask = async (body: Record<string, unknown> = {}) =>
    call(handlers.createTask, {
      body: {
        guildId: 'guild-1',
        channelId: 'channel-1',
        name: 'Ship the docs',
        dueAt: FUTURE_DUE,
        reminderOffsets: [30],
        ...body,
      },
    });

  describe('users', () => {
    it('creates a user and rejects a duplicate', async () => {
      const created = await call(handlers.createUser, { body: { userId: 'u1', handle: 'alice' } });

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ userId: 'u1', handle: 'alice', receiveReminders: true });

      const duplicate = await call(handlers.createUser, { body: { userId: 'u1' } });
      expect(duplicate).toEqual({ status: 400, body: { error: 'User already exists' } });
    });

    it('stores the reminder preference given at creation', async () => {
      await call(handlers.createUser, { body: { userId: 'u2', receiveReminders: false } });

      expect(store.participants.get('u2')?.receiveReminders).toBe(false);
    });

    it('rejects a body without a user id', async () => {
      const result = await call(handlers.createUser, { body: { handle: 'alice' } });

      expect(result.status).toBe(400);
      expect(result.body).toMatchObject({ error: 'Invalid request' });
      expect(store.participants.size).toBe(0);
    });

    it('looks up a single user', async () => {
      await call(handlers.createUser, { body: { userId: 'u1', displayName: 'Alice' } });

      expect((await call(handlers.getUser, { params: { userId: 'u1' } })).body)
        .toMatchObject({ userId: 'u1', displayName: 'Alice' });
      expect(await call(handlers.getUser, { params: { userId: 'missing' } }))
        .toEqual({ status: 404, body: { error: 'User not found' } });
    });

    it('pages through users with query-string numbers', async () => {
      for (const userId of ['u1', 'u2', 'u3']) {
        await call(handlers.createUser, { body: { userId } });
      }

      const page = await call(handlers.listUsers, { query: { skip: '1', limit: '1' } });

      expect(page.status).toBe(200);
      expect(page.body).toEqual([expect.objectContaining({ userId: 'u2' })]);
    });

    it('rejects a page size above the maximum', async () => {
      const result = await call(handlers.listUsers, { query: { limit: '500' } });

      expect(result.status).toBe(400);
    });
  });

  describe('tasks', () => {
    it('creates a task with its reminder set', async () => {
      const result = await createTask();

      expect(result.status).toBe(201);
      expect(result.body).toMatchObject({
        id: 'task-1',
        code: 'TK0001',
        name: 'Ship the docs',
        status: 'NEW',
        assigneeIds: [],
        createdBy: 'api',
        dueAt: new Date(FUTURE_DUE),
        reminders: [expect.objectContaining({ offsetMinutes: 30, sent: false })],
      });
    });

    it('maps task validation failures to 400', async () => {
      expect(await createTask({ name: '   ' }))
        .toEqual({ status: 400, body: { error: 'Please tell me what the task is.' } });
      expect(await createTask({ reminderOffsets: [-5] })).toEqual({
        status: 400,
        body: { error: 'Reminder offsets must be positive whole minutes (received -5)' },
      });
      expect((await createTask({ dueAt: 'not-a-date' })).status).toBe(400);
      expect(store.tasks.size).toBe(0);
    });

    it('lists tasks filtered by status', async () => {
      await createTask({ name: 'First' });
      await createTask({ name: 'Second' });
      await store.updateTask('task-3', { status: 'DONE' });

      const done = await call(handlers.listTasks, { query: { status: 'DONE' } });
      const all = await call(handlers.listTasks);

      expect(done.body).toEqual([expect.objectContaining({ code: 'TK0002', name: 'Second' })]);
      expect(all.body).toEqual([
        expect.objectContaining({ code: 'TK0001' }),
        expect.objectContaining({ code: 'TK0002' }),
      ]);
      expect((await call(handlers.listTasks, { query: { status: 'LATE' } })).status).toBe(400);
    });

    it('returns one task with its reminders', async () => {
      await createTask();

      const found = await call(handlers.getTask, { params: { taskId: 'task-1' } });

      expect(found.status).toBe(200);
      expect(found.body).toMatchObject({
        code: 'TK0001',
        reminders: [expect.objectContaining({ id: 'reminder-2', offsetMinutes: 30 })],
      });
      expect(await call(handlers.getTask, { params: { taskId: 'task-9' } }))
        .toEqual({ status: 404, body: { error: 'Task not found' } });
    });

    it('applies a partial update', async () => {
      await createTask();

      const result = await call(handlers.updateTask, {
        params: { taskId: 'task-1' },
        body: { name: '  Renamed  ', status: 'IN_PROGRESS' },
      });

      expect(result.status).toBe(200);
      expect(result.body).toMatchObject({ name: 'Renamed', status: 'IN_PROGRESS', dueAt: new Date(FUTURE_DUE) });
    });

    it('rejects updates with an unknown status or a bad date', async () => {
      await createTask();

      expect((await call(handlers.updateTask, { params: { taskId: 'task-1' }, body: { status: 'LATE' } })).status)
        .toBe(400);
      expect((await call(handlers.updateTask, { params: { taskId: 'task-1' }, body: { dueAt: 'soon' } })).status)
        .toBe(400);
      expect(store.tasks.get('task-1')?.status).toBe('NEW');
    });

    it('answers 404 when updating a missing task', async () => {
      expect(await call(handlers.updateTask, { params: { taskId: 'task-9' }, body: { status: 'DONE' } }))
        .toEqual({ status: 404, body: { error: 'Task not found' } });
    });

    it('deletes a task along with its reminders', async () => {
      await createTask();

      expect(await call(handlers.deleteTask, { params: { taskId: 'task-1' } }))
        .toEqual({ status: 200, body: { message: 'Task deleted successfully' } });
      expect(store.remindersFor('task-1')).toEqual([]);
      expect(await call(handlers.deleteTask, { params: { taskId: 'task-1' } }))
        .toEqual({ status: 404, body: { error: 'Task not found' } });
    });
  });

  describe('assignment', () => {
    it('assigns a known user once', async () => {
      await createTask();
      await call(handlers.createUser, { body: { userId: 'u1' } });

      const assigned = await call(handlers.assignTask, { params: { taskId: 'task-1', userId: 'u1' } });

      expect(assigned.status).toBe(200);
      expect(assigned.body).toMatchObject({
        message: 'Task assigned successfully',
        task: { assigneeIds: ['u1'] },
      });
      expect(await call(handlers.assignTask, { params: { taskId: 'task-1', userId: 'u1' } }))
        .toEqual({ status: 400, body: { error: 'Task already assigned to user' } });
    });

    it('reports a missing task before a missing user', async () => {
      expect(await call(handlers.assignTask, { params: { taskId: 'task-9', userId: 'u9' } }))
        .toEqual({ status: 404, body: { error: 'Task not found' } });

      await createTask();
      expect(await call(handlers.assignTask, { params: { taskId: 'task-1', userId: 'u9' } }))
        .toEqual({ status: 404, body: { error: 'User not found' } });
    });
  });

  it('answers 500 when the store fails', async () => {
    vi.spyOn(store, 'findTaskById').mockRejectedValue(new Error('connection reset'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await call(handlers.getTask, { params: { taskId: 'task-1' } }))
      .toEqual({ status: 500, body: { error: 'Internal server error' } });
  });
});
