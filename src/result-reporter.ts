/**
 * Result Reporter
 *
 * Keeps the tail of engine output and turns the way the engine ended into
 * exactly one terminal event.
 */

import {
  CancelledEvent,
  FailedEvent,
  LaunchError,
  TerminalEvent,
} from './conversion-types.js';
import type { ExitStatus } from './process-runner.js';

export const DEFAULT_TAIL_SIZE = 20;

export class ResultReporter {
  private readonly jobId: string;
  private readonly outputPath: string;
  private readonly tailSize: number;
  private tail: string[] = [];
  private reported: TerminalEvent | null = null;

  constructor(jobId: string, outputPath: string, tailSize: number = DEFAULT_TAIL_SIZE) {
    this.jobId = jobId;
    this.outputPath = outputPath;
    this.tailSize = Math.max(0, tailSize);
  }

  observe(lines: readonly string[]): void {
    if (this.reported || this.tailSize === 0) return;
    for (const line of lines) {
      this.tail.push(line);
    }
    if (this.tail.length > this.tailSize) {
      this.tail = this.tail.slice(-this.tailSize);
    }
  }

  getTail(): string[] {
    return [...this.tail];
  }

  get result(): TerminalEvent | null {
    return this.reported;
  }

  /**
   * Map an exit status, a launch failure, or an unexpected error to the
   * terminal event. Throws if called twice: a job has exactly one outcome.
   */
  report(outcome: ExitStatus | Error): TerminalEvent {
    if (this.reported) {
      throw new Error(`Job ${this.jobId} already reported ${this.reported.type}`);
    }

    const event = this.toEvent(outcome);
    this.reported = event;
    return event;
  }

  private toEvent(outcome: ExitStatus | Error): TerminalEvent {
    if (outcome instanceof Error) {
      // Launch failures never produced output; internal errors keep what was seen
      const launch = outcome instanceof LaunchError;
      const failed: FailedEvent = {
        type: 'completed',
        jobId: this.jobId,
        success: false,
        exitCode: null,
        signal: null,
        reason: outcome instanceof LaunchError ? outcome.kind : 'internal-error',
        message: outcome.message,
        tail: launch ? [] : this.getTail(),
      };
      return failed;
    }

    if (outcome.cancelled) {
      const cancelled: CancelledEvent = { type: 'cancelled', jobId: this.jobId };
      return cancelled;
    }

    if (outcome.code === 0) {
      return {
        type: 'completed',
        jobId: this.jobId,
        success: true,
        exitCode: 0,
        outputPath: this.outputPath,
      };
    }

    const message = outcome.code !== null
      ? `ffmpeg exited with code ${outcome.code}`
      : `ffmpeg was killed by ${outcome.signal ?? 'an unknown signal'}`;

    return {
      type: 'completed',
      jobId: this.jobId,
      success: false,
      exitCode: outcome.code,
      signal: outcome.signal,
      reason: 'exit',
      message,
      tail: this.getTail(),
    };
  }
}
