// MARK: - Health Check Server
// Express server exposing liveness and reminder scheduler metrics

import express, { Request, Response, Router } from 'express';
import mongoose from 'mongoose';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { Client } from 'discord.js';
import { Reminder } from './models/Reminder';
import { Task } from './models/Task';
import type { ReminderScheduler } from './services/ReminderScheduler';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

export interface HealthDependencies {
  client: Client | null;
  scheduler: ReminderScheduler | null;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  checks: {
    mongodb: 'connected' | 'disconnected';
    discord: 'ready' | 'not ready';
    scheduler: 'running' | 'stopped';
  };
}

const app = express();

let dependencies: HealthDependencies = { client: null, scheduler: null };
let server: Server | null = null;
let activePort: number | null = null;

export function initializeHealthServer(deps: HealthDependencies): void {
  dependencies = deps;
}

export function mountRouter(path: string, router: Router): void {
  app.use(path, router);
}

export function buildHealthReport(
  deps: HealthDependencies,
  mongoReadyState: number,
  now: Date = new Date(),
): HealthReport {
  const checks: HealthReport['checks'] = {
    mongodb: mongoReadyState === 1 ? 'connected' : 'disconnected',
    discord: deps.client?.isReady() ? 'ready' : 'not ready',
    scheduler: deps.scheduler?.getState() === 'running' ? 'running' : 'stopped',
  };

  const healthy = checks.mongodb === 'connected'
    && checks.discord === 'ready'
    && checks.scheduler === 'running';

  return {
    status: healthy ? 'healthy' : 'degraded',
    timestamp: now.toISOString(),
    uptime: process.uptime(),
    checks,
  };
}

app.get('/health', (_req: Request, res: Response) => {
  const report = buildHealthReport(dependencies, mongoose.connection.readyState);
  res.status(report.status === 'healthy' ? 200 : 503).json(report);
});

app.get('/metrics', async (_req: Request, res: Response) => {
  try {
    const [pendingReminders, openTasks] = await Promise.all([
      Reminder.countDocuments({ sent: false }),
      Task.countDocuments({ status: { $ne: 'DONE' } }),
    ]);

    const scheduler = dependencies.scheduler;

    res.json({
      memory: process.memoryUsage(),
      uptime: process.uptime(),
      pendingReminders,
      openTasks,
      scheduler: {
        state: scheduler?.getState() ?? 'stopped',
        tickInFlight: scheduler?.isTickInFlight() ?? false,
        nextTickAt: scheduler?.getNextTickAt()?.toISOString() ?? null,
        lastTick: scheduler?.getLastTick() ?? null,
      },
    });
  } catch (error) {
    logger.error('Failed to fetch metrics', { error: errorMessage(error) });
    res.status(500).json({ error: 'Failed to fetch metrics' });
  }
});

app.get('/', (_req: Request, res: Response) => {
  res.json({
    name: 'Task Reminder Bot',
    version: '1.0.0',
    status: 'running',
  });
});

/**
 * Listens on the preferred port; falls back to an ephemeral port only when
 * no port was configured explicitly.
 */
export async function startHealthServer(preferredPort: number, allowFallback: boolean): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const attemptListen = (port: number, canFallback: boolean): void => {
      const instance = app.listen(port, () => {
        server = instance;
        const address = instance.address();
        activePort = isAddressInfo(address) ? address.port : port;
        logger.info('Health server started', { port: activePort });
        resolve();
      });

      instance.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error('Health server port already in use', { port });

          if (canFallback) {
            logger.warn('Attempting to start health server on an ephemeral port');
            instance.close(() => attemptListen(0, false));
            return;
          }

          reject(new Error(`Port ${port} is already in use for health server`));
          return;
        }

        reject(error);
      });
    };

    attemptListen(preferredPort, allowFallback);
  });
}

export async function stopHealthServer(): Promise<void> {
  const instance = server;
  if (!instance) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    instance.close(error => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });

  logger.info('Health server stopped', { port: activePort });
  server = null;
  activePort = null;
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
