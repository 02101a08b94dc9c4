// MARK: - REST API
// JSON endpoints for users and tasks, mounted beside the health routes

import express, { NextFunction, Request, Response, Router } from 'express';
import { z, ZodError } from 'zod';
import type { TaskManager } from './services/TaskManager';
import { errorMessage, InvalidReminderOffsetError, TaskValidationError } from './utils/errors';
import { logger } from './utils/logger';

const USER_NOT_FOUND = 'User not found';
const TASK_NOT_FOUND = 'Task not found';

export interface ApiDependencies {
  taskManager: TaskManager;
}

export type ApiHandler = (req: Request, res: Response) => Promise<void>;

export interface ApiHandlers {
  createUser: ApiHandler;
  getUser: ApiHandler;
  listUsers: ApiHandler;
  createTask: ApiHandler;
  listTasks: ApiHandler;
  getTask: ApiHandler;
  updateTask: ApiHandler;
  deleteTask: ApiHandler;
  assignTask: ApiHandler;
}

// MARK: - Schemas

const taskStatusSchema = z.enum(['NEW', 'IN_PROGRESS', 'DONE']);

export const paginationSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(100),
});

const userCreateSchema = z.object({
  userId: z.string().min(1),
  handle: z.string().min(1).optional(),
  displayName: z.string().min(1).optional(),
  receiveReminders: z.boolean().default(true),
});

const taskCreateSchema = z.object({
  guildId: z.string().min(1),
  channelId: z.string().min(1),
  name: z.string(),
  dueAt: z.coerce.date(),
  assigneeIds: z.array(z.string().min(1)).default([]),
  createdBy: z.string().min(1).default('api'),
  reminderOffsets: z.array(z.number()).optional(),
});

const taskUpdateSchema = z.object({
  name: z.string().optional(),
  dueAt: z.coerce.date().optional(),
  status: taskStatusSchema.optional(),
});

const taskListSchema = paginationSchema.extend({
  guildId: z.string().min(1).optional(),
  status: taskStatusSchema.optional(),
});

// MARK: - Error Mapping

function respondWithError(res: Response, error: unknown): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request', issues: error.issues });
    return;
  }

  if (error instanceof TaskValidationError || error instanceof InvalidReminderOffsetError) {
    res.status(400).json({ error: error.message });
    return;
  }

  logger.error('API request failed', { error: errorMessage(error) });
  res.status(500).json({ error: 'Internal server error' });
}

function withErrors(handler: ApiHandler): ApiHandler {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (error) {
      respondWithError(res, error);
    }
  };
}

// MARK: - Handlers

export function createApiHandlers({ taskManager }: ApiDependencies): ApiHandlers {
  return {
    createUser: withErrors(async (req, res) => {
      const { receiveReminders, ...profile } = userCreateSchema.parse(req.body);
      const participant = await taskManager.createParticipant(profile, receiveReminders);
      if (!participant) {
        res.status(400).json({ error: 'User already exists' });
        return;
      }
      res.status(201).json(participant);
    }),

    getUser: withErrors(async (req, res) => {
      const participant = await taskManager.getParticipant(req.params.userId);
      if (!participant) {
        res.status(404).json({ error: USER_NOT_FOUND });
        return;
      }
      res.json(participant);
    }),

    listUsers: withErrors(async (req, res) => {
      const { skip, limit } = paginationSchema.parse(req.query);
      res.json(await taskManager.listParticipants(skip, limit));
    }),

    createTask: withErrors(async (req, res) => {
      const input = taskCreateSchema.parse(req.body);
      const { task, reminders } = await taskManager.addTask(input);
      res.status(201).json({ ...task, reminders });
    }),

    listTasks: withErrors(async (req, res) => {
      const query = taskListSchema.parse(req.query);
      res.json(await taskManager.listTasks(query));
    }),

    getTask: withErrors(async (req, res) => {
      const found = await taskManager.getTask(req.params.taskId);
      if (!found) {
        res.status(404).json({ error: TASK_NOT_FOUND });
        return;
      }
      res.json({ ...found.task, reminders: found.reminders });
    }),

    updateTask: withErrors(async (req, res) => {
      const changes = taskUpdateSchema.parse(req.body);
      const updated = await taskManager.updateTask(req.params.taskId, changes);
      if (!updated) {
        res.status(404).json({ error: TASK_NOT_FOUND });
        return;
      }
      res.json(updated);
    }),

    deleteTask: withErrors(async (req, res) => {
      const deleted = await taskManager.deleteTaskById(req.params.taskId);
      if (!deleted) {
        res.status(404).json({ error: TASK_NOT_FOUND });
        return;
      }
      res.json({ message: 'Task deleted successfully' });
    }),

    assignTask: withErrors(async (req, res) => {
      const result = await taskManager.assignTask(req.params.taskId, req.params.userId);
      switch (result.outcome) {
        case 'task-not-found':
          res.status(404).json({ error: TASK_NOT_FOUND });
          return;
        case 'user-not-found':
          res.status(404).json({ error: USER_NOT_FOUND });
          return;
        case 'already-assigned':
          res.status(400).json({ error: 'Task already assigned to user' });
          return;
        case 'assigned':
          res.json({ message: 'Task assigned successfully', task: result.task });
      }
    }),
  };
}

export function createApiRouter(deps: ApiDependencies): Router {
  const handlers = createApiHandlers(deps);
  const router = express.Router();
  const route = (handler: ApiHandler) => (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

  router.use(express.json());

  router.post('/users', route(handlers.createUser));
  router.get('/users', route(handlers.listUsers));
  router.get('/users/:userId', route(handlers.getUser));

  router.post('/tasks', route(handlers.createTask));
  router.get('/tasks', route(handlers.listTasks));
  router.get('/tasks/:taskId', route(handlers.getTask));
  router.put('/tasks/:taskId', route(handlers.updateTask));
  router.delete('/tasks/:taskId', route(handlers.deleteTask));
  router.post('/tasks/:taskId/assign/:userId', route(handlers.assignTask));

  return router;
}
