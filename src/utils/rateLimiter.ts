// MARK: - Rate Limiter Utility
// Serializes outbound operations with a minimum spacing between them

import { errorMessage } from './errors';
import { logger } from './logger';

/**
 * FIFO queue that runs one task at a time and waits at least `delayMs`
 * between task starts, keeping bursts of channel sends under Discord limits.
 */
export class RateLimiter {
  private queue: Array<() => Promise<void>> = [];
  private processing = false;
  private lastExecutionTime = 0;
  private readonly delayMs: number;

  constructor(delayMs = 1000) {
    this.delayMs = delayMs;
  }

  schedule<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await task());
        } catch (error) {
          reject(error);
        }
      });

      if (!this.processing) {
        this.processQueue().catch(error => {
          logger.error('Rate limiter queue stalled', { error: errorMessage(error) });
        });
      }
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing) {
      return;
    }

    this.processing = true;
    try {
      let next = this.queue.shift();
      while (next) {
        const elapsed = Date.now() - this.lastExecutionTime;
        if (elapsed < this.delayMs) {
          await sleep(this.delayMs - elapsed);
        }

        this.lastExecutionTime = Date.now();
        await next();
        next = this.queue.shift();
      }
    } finally {
      this.processing = false;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
