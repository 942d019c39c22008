import type { IStorage } from '../storage/interfaces/index.js';
import type { GCResult } from '../types/storage.js';
import { isEmptyGCResult } from '../types/storage.js';
import { noopLogger, type Logger } from '../utils/logger.js';

export interface GarbageCollectionOptions {
  intervalMs: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Run one sweep and log what it removed
 */
export async function runGarbageCollection(
  storage: IStorage,
  now: Date,
  logger: Logger = noopLogger
): Promise<GCResult> {
  const result = await storage.garbageCollect(now);

  if (!isEmptyGCResult(result)) {
    logger.info('garbage collection run, delete count', { ...result });
  }

  return result;
}

/**
 * Sweep expired rows on a timer until the returned function is called.
 * A sweep still running when the timer fires again is not overlapped.
 */
export function startGarbageCollection(
  storage: IStorage,
  options: GarbageCollectionOptions
): () => void {
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? noopLogger;
  let running = false;

  const timer = setInterval(() => {
    if (running) {
      return;
    }
    running = true;

    runGarbageCollection(storage, now(), logger)
      .catch((err: unknown) => {
        logger.error('garbage collection failed', { error: err });
      })
      .finally(() => {
        running = false;
      });
  }, options.intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
