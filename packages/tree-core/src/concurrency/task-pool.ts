// ---------------------------------------------------------------------------
// Task pool
// ---------------------------------------------------------------------------
// Runs independent synchronous tasks on a fixed number of workers. Each
// worker yields to the event loop before running its next task, so long
// training runs interleave with I/O and timers instead of blocking them.
// Tasks must not share mutable state; each writes only its own result slot.
// ---------------------------------------------------------------------------

import { setImmediate as nextTick } from 'node:timers/promises';

/**
 * Split `[0, dataLength)` into at most `numChunks` contiguous ranges. The
 * first `dataLength % numChunks` chunks carry one extra element.
 */
export function distributeChunks(
  dataLength: number,
  numChunks: number,
): Array<{ offset: number; length: number }> {
  if (numChunks < 1) {
    throw new RangeError('numChunks must be at least 1');
  }
  if (dataLength <= 0) return [];

  const chunks: Array<{ offset: number; length: number }> = [];
  const baseSize = Math.floor(dataLength / numChunks);
  const remainder = dataLength % numChunks;
  let offset = 0;
  for (let i = 0; i < numChunks; i++) {
    const length = baseSize + (i < remainder ? 1 : 0);
    if (length === 0) break;
    chunks.push({ offset, length });
    offset += length;
  }
  return chunks;
}

/**
 * Run every task with at most `size` in flight and resolve with results in
 * task order. Each of the `size` workers pulls the next unstarted task. The
 * first thrown error rejects the returned promise, and workers stop taking
 * new tasks once that happens.
 */
export async function runPooled<T>(
  tasks: ReadonlyArray<() => T>,
  size: number,
): Promise<T[]> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError('Pool size must be a positive integer');
  }
  const results = new Array<T>(tasks.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    try {
      while (!failed && next < tasks.length) {
        const index = next++;
        const task = tasks[index]!;
        await nextTick();
        if (failed) return;
        results[index] = task();
      }
    } catch (err) {
      failed = true;
      throw err;
    }
  };

  const workerCount = Math.min(size, tasks.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
