export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export interface Job {
  id: string;
  name: string;
  payload: unknown;
  runAt: Date;
  status: JobStatus;
  attempts: number;
  result: string | null;
  lastError: string | null;
  /** Set once the handler's side effect went out; survives a requeue. */
  deliveredAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Resolves to the one-line result stored on the job row. */
export type JobHandler = (payload: unknown, job: Job) => Promise<string>;
