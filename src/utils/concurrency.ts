import pLimit from 'p-limit';
import { sleep } from './sleep.js';

export interface RunAllOptions {
  maxAtOnce: number;
  maxPerSecond: number;
}

/**
 * Hands out request start slots spaced `1000 / maxPerSecond` ms apart.
 * Slots are reserved in call order, so concurrent callers queue behind each other.
 */
export class RequestThrottle {
  private readonly intervalMs: number;
  private nextSlot = 0;

  constructor(maxPerSecond: number) {
    if (!(maxPerSecond > 0)) {
      throw new RangeError('maxPerSecond must be greater than 0');
    }
    this.intervalMs = 1000 / maxPerSecond;
  }

  async acquire(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    if (slot > now) {
      await sleep(slot - now);
    }
  }
}

export async function runAll<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  options: RunAllOptions,
): Promise<T[]> {
  if (!(options.maxAtOnce >= 1)) {
    throw new RangeError('maxAtOnce must be at least 1');
  }

  const limit = pLimit(options.maxAtOnce);
  const throttle = new RequestThrottle(options.maxPerSecond);
  let failed = false;

  // After the first failure nothing else starts: queued tasks are dropped and
  // tasks already waiting for a start slot give up.
  return Promise.all(
    tasks.map((task) =>
      limit(async () => {
        await throttle.acquire();
        if (failed) {
          throw new Error('Task skipped after an earlier task failed');
        }
        try {
          return await task();
        } catch (error) {
          failed = true;
          limit.clearQueue();
          throw error;
        }
      }),
    ),
  );
}
