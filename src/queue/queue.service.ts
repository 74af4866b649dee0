import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { randomUUID } from 'crypto';
import pLimit from 'p-limit';
import { APP_CONFIG, type AppConfig } from '../config/configuration';
import { DatabaseService, type JobRow } from '../database/database.service';
import { JOB_STATUSES, type Job, type JobHandler, type JobStatus } from './job.entity';

export interface QueueStats {
  jobs: Record<JobStatus, number>;
  active: number;
  queued: number;
  workerRunning: boolean;
}

/**
 * Durable delayed-job queue on top of the `jobs` table.
 * Any process may enqueue; only a process that called startWorker() runs jobs.
 */
@Injectable()
export class QueueService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(QueueService.name);
  private readonly handlers = new Map<string, JobHandler>();

  // Initialized in onModuleInit, using definite assignment assertion
  private limit!: ReturnType<typeof pLimit>;

  private timer: NodeJS.Timeout | null = null;
  private currentCycle: Promise<number> | null = null;

  constructor(
    private readonly databaseService: DatabaseService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  onModuleInit() {
    this.limit = pLimit(this.config.queue.maxConcurrency);
    this.logger.log(`Queue service initialized with concurrency ${this.config.queue.maxConcurrency}`);
  }

  async onModuleDestroy() {
    await this.stopWorker();
  }

  registerHandler(name: string, handler: JobHandler) {
    if (this.handlers.has(name)) {
      throw new Error(`A handler is already registered for job "${name}"`);
    }
    this.handlers.set(name, handler);
    this.logger.debug(`Registered handler for job "${name}"`);
  }

  enqueue(name: string, payload: unknown, runAt: Date): Job {
    const row = this.databaseService.insertJob({
      id: `job_${randomUUID()}`,
      name,
      payload: JSON.stringify(payload),
      runAt,
    });
    this.logger.log(`Enqueued job "${name}" (${row.id}) to run at ${row.run_at}`);
    return toJob(row);
  }

  /**
   * Cancels a job that has not started yet. Returns false when it already ran or was cancelled.
   */
  cancel(jobId: string): boolean {
    const cancelled = this.databaseService.cancelJob(jobId);
    if (cancelled) {
      this.logger.log(`Cancelled job ${jobId}`);
    } else {
      this.logger.debug(`Job ${jobId} was not pending; nothing to cancel`);
    }
    return cancelled;
  }

  markDelivered(jobId: string, deliveredAt: Date = new Date()) {
    this.databaseService.markJobDelivered(jobId, deliveredAt);
  }

  findJob(jobId: string): Job | null {
    const row = this.databaseService.findJobById(jobId);
    return row ? toJob(row) : null;
  }

  getStats(): QueueStats {
    const counts = this.databaseService.countJobsByStatus();
    const jobs: Record<JobStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    for (const status of JOB_STATUSES) {
      jobs[status] = counts[status] ?? 0;
    }

    return {
      jobs,
      active: this.limit.activeCount,
      queued: this.limit.pendingCount,
      workerRunning: this.timer !== null,
    };
  }

  get isWorkerRunning(): boolean {
    return this.timer !== null;
  }

  startWorker() {
    if (this.timer) return;

    // Jobs a crashed worker left running get another go
    const requeued = this.databaseService.requeueRunningJobs();
    if (requeued > 0) {
      this.logger.warn(`Requeued ${requeued} job(s) interrupted by a previous worker`);
    }

    this.timer = setInterval(() => this.poll(), this.config.queue.pollIntervalMs);
    this.logger.log(`Worker started, polling every ${this.config.queue.pollIntervalMs}ms`);
    this.poll();
  }

  async stopWorker() {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    if (this.currentCycle) {
      await this.currentCycle;
    }
    this.logger.log('Worker stopped');
  }

  /**
   * Runs every job due at `now` and resolves with how many were claimed once they settle.
   */
  async runDueJobs(now: Date = new Date()): Promise<number> {
    const due = this.databaseService.findDuePendingJobs(now, this.config.queue.maxConcurrency * 10);
    const claimed = due.filter((row) => this.databaseService.claimJob(row.id));

    await Promise.all(claimed.map((row) => this.limit(() => this.execute(row))));
    return claimed.length;
  }

  private poll() {
    if (this.currentCycle) return;

    this.currentCycle = this.runDueJobs()
      .catch((error: unknown) => {
        this.logger.error('Queue poll failed', error instanceof Error ? error.stack : String(error));
        return 0;
      })
      .finally(() => {
        this.currentCycle = null;
      });
  }

  private async execute(row: JobRow): Promise<void> {
    const handler = this.handlers.get(row.name);
    if (!handler) {
      this.databaseService.failJob(row.id, `No handler registered for job "${row.name}"`);
      this.logger.error(`No handler registered for job "${row.name}" (${row.id})`);
      return;
    }

    const startTime = Date.now();
    try {
      const job = toJob(row);
      const result = await handler(job.payload, job);
      this.databaseService.completeJob(row.id, result);
      this.logger.log(`Job "${row.name}" (${row.id}) completed in ${Date.now() - startTime}ms: ${result}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.databaseService.failJob(row.id, message);
      this.logger.error(
        `Job "${row.name}" (${row.id}) failed after ${Date.now() - startTime}ms`,
        error instanceof Error ? error.stack : message,
      );
    }
  }
}

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

function toJob(row: JobRow): Job {
  const payload: unknown = JSON.parse(row.payload);
  return {
    id: row.id,
    name: row.name,
    payload,
    runAt: new Date(row.run_at),
    status: isJobStatus(row.status) ? row.status : 'failed',
    attempts: row.attempts,
    result: row.result,
    lastError: row.last_error,
    deliveredAt: row.delivered_at ? new Date(row.delivered_at) : null,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
