import { describe, it, expect } from 'vitest';
import { canTransition, isTerminalStatus, transitionJob } from '../src/job-state.js';
import { JobStateError } from '../src/conversion-types.js';
import type { ConversionJob, JobStatus } from '../src/conversion-types.js';

function makeJob(): ConversionJob {
  return {
    id: 'job-1',
    files: [{ path: '/books/a.mp3', position: 0 }],
    metadata: { title: 'My Book', author: 'Jane Doe' },
    outputPath: '/out/book.m4b',
    status: 'created',
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('job state machine', () => {
  it('walks the happy path and stamps times', () => {
    const job = makeJob();
    transitionJob(job, 'validating');
    expect(job.startedAt).toBeUndefined();

    transitionJob(job, 'running');
    expect(job.startedAt).toBeDefined();
    expect(job.finishedAt).toBeUndefined();

    transitionJob(job, 'completed');
    expect(job.status).toBe('completed');
    expect(job.finishedAt).toBeDefined();
  });

  it('rejects leaving a terminal state', () => {
    const job = makeJob();
    transitionJob(job, 'validating');
    transitionJob(job, 'invalid');

    expect(() => transitionJob(job, 'running')).toThrow(JobStateError);
    expect(() => transitionJob(job, 'running')).toThrow('Job job-1: illegal transition invalid -> running');
  });

  it('rejects skipping validation', () => {
    expect(canTransition('created', 'running')).toBe(false);
    expect(canTransition('validating', 'cancelled')).toBe(false);
    expect(canTransition('validating', 'failed')).toBe(false);
    expect(canTransition('running', 'cancelled')).toBe(true);
  });

  it('knows which states are terminal', () => {
    const terminal: JobStatus[] = ['invalid', 'completed', 'failed', 'cancelled'];
    const live: JobStatus[] = ['created', 'validating', 'running'];

    expect(terminal.every(isTerminalStatus)).toBe(true);
    expect(live.some(isTerminalStatus)).toBe(false);
  });
});
