import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { DatabaseService } from '../database/database.service';
import { createTestConfig } from '../testing/test-config';
import { createTestDatabase } from '../testing/fixtures';
import { QueueService } from './queue.service';

describe('QueueService', () => {
  const config = createTestConfig();
  const now = new Date('2030-01-01T12:00:00.000Z');
  let databaseService: DatabaseService;
  let queue: QueueService;

  beforeEach(() => {
    databaseService = createTestDatabase(config);
    queue = new QueueService(databaseService, config);
    queue.onModuleInit();
  });

  afterEach(async () => {
    await queue.onModuleDestroy();
    databaseService.onModuleDestroy();
  });

  it('runs only jobs that are due', async () => {
    const handler = jest.fn(async (payload: unknown) => `handled ${JSON.stringify(payload)}`);
    queue.registerHandler('greet', handler);

    const due = queue.enqueue('greet', { name: 'due' }, new Date(now.getTime() - 1000));
    const later = queue.enqueue('greet', { name: 'later' }, new Date(now.getTime() + 60_000));

    await expect(queue.runDueJobs(now)).resolves.toBe(1);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toEqual({ name: 'due' });
    expect(queue.findJob(due.id)).toMatchObject({
      status: 'completed',
      attempts: 1,
      result: 'handled {"name":"due"}',
    });
    expect(queue.findJob(later.id)?.status).toBe('pending');
  });

  it('records handler failures on the job', async () => {
    queue.registerHandler('explode', async () => {
      throw new Error('boom');
    });
    const job = queue.enqueue('explode', {}, now);

    await queue.runDueJobs(now);

    expect(queue.findJob(job.id)).toMatchObject({ status: 'failed', lastError: 'boom' });
  });

  it('fails jobs nobody handles', async () => {
    const job = queue.enqueue('mystery', {}, now);

    await queue.runDueJobs(now);

    expect(queue.findJob(job.id)).toMatchObject({
      status: 'failed',
      lastError: 'No handler registered for job "mystery"',
    });
  });

  it('never runs a cancelled job', async () => {
    const handler = jest.fn(async () => 'ran');
    queue.registerHandler('reminder', handler);
    const job = queue.enqueue('reminder', {}, now);

    expect(queue.cancel(job.id)).toBe(true);
    expect(queue.cancel(job.id)).toBe(false);
    await queue.runDueJobs(new Date(now.getTime() + 60_000));

    expect(handler).not.toHaveBeenCalled();
    expect(queue.findJob(job.id)?.status).toBe('cancelled');
  });

  it('claims each job once across overlapping cycles', async () => {
    const handler = jest.fn(async () => 'ran');
    queue.registerHandler('once', handler);
    queue.enqueue('once', {}, now);

    const counts = await Promise.all([queue.runDueJobs(now), queue.runDueJobs(now)]);

    expect(counts).toEqual([1, 0]);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('refuses a second handler for the same job name', () => {
    queue.registerHandler('dup', async () => 'a');
    expect(() => queue.registerHandler('dup', async () => 'b')).toThrow(
      'A handler is already registered for job "dup"',
    );
  });

  it('reports counts per status', async () => {
    queue.registerHandler('ok', async () => 'done');
    queue.enqueue('ok', {}, now);
    queue.enqueue('ok', {}, new Date(now.getTime() + 60_000));
    const cancelled = queue.enqueue('ok', {}, new Date(now.getTime() + 60_000));
    queue.cancel(cancelled.id);

    await queue.runDueJobs(now);

    const stats = queue.getStats();
    expect(stats.jobs).toEqual({ pending: 1, running: 0, completed: 1, failed: 0, cancelled: 1 });
    expect(stats.workerRunning).toBe(false);
  });
});

describe('QueueService durability', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'queue-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('finishes jobs left behind by a worker that stopped mid-run', async () => {
    const config = createTestConfig({
      DATABASE_PATH: path.join(dir, 'jobs.db'),
      QUEUE_POLL_INTERVAL_MS: '10',
    });

    // First process: enqueue two jobs, start one of them, then go away
    const firstDb = createTestDatabase(config);
    const firstQueue = new QueueService(firstDb, config);
    firstQueue.onModuleInit();
    const interrupted = firstQueue.enqueue('reminder', { n: 1 }, new Date(Date.now() - 1000));
    const waiting = firstQueue.enqueue('reminder', { n: 2 }, new Date(Date.now() - 1000));
    expect(firstDb.claimJob(interrupted.id)).toBe(true);
    firstDb.onModuleDestroy();

    // Second process picks up both
    const secondDb = createTestDatabase(config);
    const secondQueue = new QueueService(secondDb, config);
    secondQueue.onModuleInit();
    const handler = jest.fn(async (payload: unknown) => `sent ${JSON.stringify(payload)}`);
    secondQueue.registerHandler('reminder', handler);

    secondQueue.startWorker();
    expect(secondQueue.isWorkerRunning).toBe(true);
    await secondQueue.stopWorker();

    expect(handler).toHaveBeenCalledTimes(2);
    expect(secondQueue.findJob(interrupted.id)).toMatchObject({ status: 'completed', attempts: 2 });
    expect(secondQueue.findJob(waiting.id)).toMatchObject({ status: 'completed', attempts: 1 });
    secondDb.onModuleDestroy();
  });
});
