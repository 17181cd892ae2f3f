/**
 * Single-consumer background queue
 *
 * Webhook handlers enqueue and return at once; one worker loop takes
 * tasks in FIFO order and runs each to completion before the next.
 */

import { ulid } from 'ulid';
import { toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';

export interface QueuedTask<T> {
  id: string;
  payload: T;
  enqueuedAt: string;
}

export type TaskHandler<T> = (task: QueuedTask<T>) => Promise<unknown>;

export interface QueueStatus {
  pending: number;
  processed: number;
  failed: number;
  running: boolean;
}

export class TaskQueue<T> {
  private readonly tasks: QueuedTask<T>[] = [];
  private readonly logger: Logger;
  private running = false;
  private active = false;
  private processed = 0;
  private failed = 0;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly handler: TaskHandler<T>,
    logger?: Logger
  ) {
    this.logger = (logger ?? defaultLogger).child({ component: 'task-queue' });
  }

  /**
   * Start the worker loop; a no-op when already running
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.run();
    this.logger.info('Task worker started');
  }

  /**
   * Queue a payload and return its task id
   */
  enqueue(payload: T): string {
    const task: QueuedTask<T> = { id: ulid(), payload, enqueuedAt: new Date().toISOString() };
    this.tasks.push(task);
    this.logger.info('Task enqueued', { taskId: task.id, depth: this.tasks.length });
    this.signal();
    return task.id;
  }

  status(): QueueStatus {
    return {
      pending: this.tasks.length,
      processed: this.processed,
      failed: this.failed,
      running: this.running,
    };
  }

  /**
   * Resolve once the queue is empty and no task is in flight.
   * Waits for a later start() when tasks are pending on a stopped queue.
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop after the task in flight; pending tasks stay queued
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.signal();
    await this.loop;
    this.loop = null;
    this.logger.info('Task worker stopped', { pending: this.tasks.length });
  }

  private isIdle(): boolean {
    return this.tasks.length === 0 && !this.active;
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async run(): Promise<void> {
    while (this.running) {
      const task = this.tasks.shift();
      if (!task) {
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }

      this.active = true;
      try {
        await this.handler(task);
        this.processed++;
      } catch (error) {
        this.failed++;
        this.logger.error('Background task failed', toError(error), { taskId: task.id });
      } finally {
        this.active = false;
      }

      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    }
  }
}
