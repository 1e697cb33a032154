/**
 * Job Queue
 *
 * Ordered list of jobs; insertion order is execution order.
 *
 * Mutating: add, merge, remove, clear
 * Read-only: list, export, start
 */

import { createLogger } from '@encodeq/utils';
import type { Job } from '@encodeq/core';
import type { ExecutionSummary } from '@encodeq/processing';
import { readQueueFile, writeQueueFile } from './queueFile.js';

const log = createLogger({ component: 'queue' });

/**
 * Anything that can run a list of jobs, normally a JobExecutor
 */
export interface QueueExecutor {
  execute(jobs: readonly Job[]): Promise<ExecutionSummary>;
}

export class JobQueue {
  private jobs: Job[];

  constructor(jobs: readonly Job[] = []) {
    this.jobs = [...jobs];
  }

  get size(): number {
    return this.jobs.length;
  }

  get isEmpty(): boolean {
    return this.jobs.length === 0;
  }

  /**
   * Snapshot of the queued jobs
   */
  list(): readonly Job[] {
    return [...this.jobs];
  }

  add(...jobs: Job[]): void {
    this.jobs.push(...jobs);
    log.debug({ added: jobs.length, size: this.jobs.length }, 'Jobs queued');
  }

  /**
   * Append every job from a saved queue file. The whole file is parsed
   * first, so a malformed file leaves the queue as it was. Jobs already
   * queued are not detected; the same job can appear twice.
   *
   * @returns number of jobs appended
   * @throws QueueFormatError
   */
  async merge(filePath: string): Promise<number> {
    const imported = await readQueueFile(filePath);
    this.jobs.push(...imported);
    log.info({ filePath, imported: imported.length, size: this.jobs.length }, 'Queue merged');
    return imported.length;
  }

  /**
   * Remove the job at a 1-based position
   */
  remove(position: number): Job | undefined {
    if (!Number.isInteger(position) || position < 1 || position > this.jobs.length) {
      return undefined;
    }
    const [removed] = this.jobs.splice(position - 1, 1);
    return removed;
  }

  /**
   * @returns number of jobs dropped
   */
  clear(): number {
    const dropped = this.jobs.length;
    this.jobs = [];
    return dropped;
  }

  async export(filePath: string, exportedAt?: Date): Promise<void> {
    await writeQueueFile(filePath, this.jobs, exportedAt);
    log.info({ filePath, jobs: this.jobs.length }, 'Queue exported');
  }

  /**
   * Run every queued job in order. Resolves once all have been attempted;
   * the queue itself is left as it was.
   */
  async start(executor: QueueExecutor): Promise<ExecutionSummary> {
    log.info({ jobs: this.jobs.length }, 'Queue started');
    return executor.execute(this.list());
  }
}
