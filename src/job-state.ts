import { ConversionJob, JobStatus, JobStateError, TERMINAL_STATUSES } from './conversion-types.js';

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  created: ['validating'],
  validating: ['invalid', 'running'],
  running: ['completed', 'failed', 'cancelled'],
  invalid: [],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Move a job to its next status, stamping start/finish times.
 * Throws JobStateError on a transition the state machine does not allow.
 */
export function transitionJob(job: ConversionJob, to: JobStatus): ConversionJob {
  if (!canTransition(job.status, to)) {
    throw new JobStateError(job.id, job.status, to);
  }

  job.status = to;
  const now = new Date().toISOString();
  if (to === 'running') {
    job.startedAt = now;
  } else if (isTerminalStatus(to)) {
    job.finishedAt = now;
  }
  return job;
}
