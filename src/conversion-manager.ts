/**
 * Conversion Manager
 *
 * Runs one MP3 → M4B conversion at a time:
 * 1. Validate the request and build the job
 * 2. Resolve ffmpeg and build the argument vector
 * 3. Spawn, pump merged output into the relay (lines + progress)
 * 4. Report exactly one terminal event and settle the job
 *
 * A second request while a job is running is rejected with `busy`.
 */

import type { Observable } from 'rxjs';
import {
  BusyError,
  ConversionEvent,
  ConversionJob,
  ConversionRequest,
  JobSnapshot,
  LaunchError,
  TerminalEvent,
  ValidationError,
} from './conversion-types.js';
import { validateConversionRequest, ValidatorOptions } from './input-validator.js';
import { buildFfmpegArgs, formatCommandForLog, DEFAULT_AUDIO_BITRATE } from './ffmpeg-command.js';
import { ExitStatus, ProcessProvider, ProcessRunner, RunningProcess, nodeProcessProvider } from './process-runner.js';
import { ProgressRelay, ConversionEventListener } from './progress-relay.js';
import { ResultReporter, DEFAULT_TAIL_SIZE } from './result-reporter.js';
import { FfmpegProgressParser, isProgressLine } from './ffmpeg-progress.js';
import { DurationProbe, createDurationProbe } from './duration-probe.js';
import { ResolvedEngine, resolveFfmpeg } from './tool-paths.js';
import { transitionJob } from './job-state.js';
import { getLogger, Logger } from './rolling-logger.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ConversionManagerOptions {
  provider?: ProcessProvider;
  resolveEngine?: () => ResolvedEngine | null;
  probeDuration?: DurationProbe | null;  // null skips probing (no percentages)
  logger?: Logger;
  audioBitrate?: string;
  killGraceMs?: number;
  tailSize?: number;
  validator?: ValidatorOptions;
}

export type StartResult =
  | {
      success: true;
      job: JobSnapshot;
      events: Observable<ConversionEvent>;
      batches: (windowMs: number) => Observable<ConversionEvent[]>;
      done: Promise<JobSnapshot>;
    }
  | {
      success: false;
      error: ValidationError | BusyError;
      job?: JobSnapshot;
    };

interface ActiveConversion {
  job: ConversionJob;
  relay: ProgressRelay;
  process: RunningProcess | null;
  cancelRequested: boolean;
  done: Promise<JobSnapshot>;
}

/**
 * Callers only ever see frozen copies; the live job stays with the manager.
 */
function snapshotJob(job: ConversionJob): JobSnapshot {
  return Object.freeze({ ...job });
}

// ─────────────────────────────────────────────────────────────────────────────
// Manager
// ─────────────────────────────────────────────────────────────────────────────

export class ConversionManager {
  private readonly runner: ProcessRunner;
  private readonly resolveEngine: () => ResolvedEngine | null;
  private readonly probeDuration: DurationProbe | null;
  private readonly logger: Logger;
  private readonly options: ConversionManagerOptions;

  private active: ActiveConversion | null = null;
  private readonly history: ConversionJob[] = [];

  constructor(options: ConversionManagerOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? getLogger();
    this.runner = new ProcessRunner(options.provider ?? nodeProcessProvider, {
      killGraceMs: options.killGraceMs,
      logger: this.logger,
    });
    this.resolveEngine = options.resolveEngine ?? resolveFfmpeg;
    this.probeDuration = options.probeDuration === undefined
      ? createDurationProbe(this.logger)
      : options.probeDuration;
  }

  /**
   * Validate and start a conversion. `onEvent` (optional) is subscribed before
   * anything runs; `events` replays the full stream to any later observer.
   */
  startConversion(request: ConversionRequest, onEvent?: ConversionEventListener): StartResult {
    if (this.active) {
      const activeJobId = this.active.job.id;
      this.logger.warn('[CONVERT] Rejected request while a job is running', { activeJobId });
      return {
        success: false,
        error: { kind: 'busy', activeJobId, message: 'A conversion is already running' },
      };
    }

    const validation = validateConversionRequest(request, this.options.validator);
    if (!validation.success) {
      this.history.push(validation.job);
      this.logger.info('[CONVERT] Request invalid', { jobId: validation.job.id, error: validation.error });
      return { success: false, error: validation.error, job: snapshotJob(validation.job) };
    }

    const job = validation.job;
    const relay = new ProgressRelay(job.id);
    if (onEvent) {
      relay.subscribe(onEvent);
    }

    const active: ActiveConversion = {
      job,
      relay,
      process: null,
      cancelRequested: false,
      done: Promise.resolve(snapshotJob(job)),
    };
    this.active = active;
    this.history.push(job);

    active.done = this.run(active).then(snapshotJob).finally(() => {
      if (this.active === active) {
        this.active = null;
      }
    });

    return {
      success: true,
      job: snapshotJob(job),
      events: relay.observe(),
      batches: (windowMs) => relay.batches(windowMs),
      done: active.done,
    };
  }

  /**
   * Cancel the running job (optionally only if it is `jobId`).
   * A no-op returning false when nothing is running.
   */
  cancelConversion(jobId?: string): boolean {
    const active = this.active;
    if (!active || (jobId !== undefined && active.job.id !== jobId)) {
      return false;
    }
    if (active.job.status !== 'running' || active.cancelRequested) {
      return false;
    }

    // Once the engine has exited the outcome is fixed; there is nothing left to cancel
    if (active.process && !active.process.cancel()) {
      return false;
    }

    active.cancelRequested = true;
    this.logger.info('[CONVERT] Cancel requested', { jobId: active.job.id });
    return true;
  }

  getActiveJob(): JobSnapshot | null {
    return this.active ? snapshotJob(this.active.job) : null;
  }

  getHistory(): readonly JobSnapshot[] {
    return this.history.map(snapshotJob);
  }

  /**
   * Cancel whatever is running and wait for it to settle.
   */
  async shutdown(): Promise<void> {
    const active = this.active;
    if (!active) return;
    this.cancelConversion(active.job.id);
    await active.done;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Pipeline
  // ───────────────────────────────────────────────────────────────────────────

  private async run(active: ActiveConversion): Promise<ConversionJob> {
    const { job, relay } = active;
    const reporter = new ResultReporter(job.id, job.outputPath, this.options.tailSize ?? DEFAULT_TAIL_SIZE);

    transitionJob(job, 'running');

    const engine = this.resolveEngine();
    if (!engine) {
      const terminal = reporter.report(new LaunchError('engine-not-found', 'ffmpeg was not found on this system'));
      this.logger.error('[CONVERT] ffmpeg not found', { jobId: job.id });
      return this.settle(active, terminal);
    }

    this.logger.info('[CONVERT] Job started', {
      jobId: job.id,
      files: job.files.length,
      outputPath: job.outputPath,
      engine: engine.path,
    });

    try {
      const totalDuration = this.probeDuration
        ? await this.probeDuration(job.files.map(f => f.path))
        : null;

      if (active.cancelRequested) {
        return this.settle(active, reporter.report({ code: null, signal: null, cancelled: true }));
      }

      const args = buildFfmpegArgs(job.files, job.metadata, job.outputPath, {
        audioBitrate: this.options.audioBitrate ?? DEFAULT_AUDIO_BITRATE,
      });
      this.logger.debug('[CONVERT] ffmpeg command', { command: formatCommandForLog(engine.path, args) });

      let proc: RunningProcess;
      try {
        proc = this.runner.start(engine.path, args);
      } catch (err) {
        if (err instanceof LaunchError) {
          this.logger.error('[CONVERT] Launch failed', { jobId: job.id, kind: err.kind, error: err.message });
          return this.settle(active, reporter.report(err));
        }
        throw err;
      }
      active.process = proc;

      const parser = new FfmpegProgressParser(totalDuration);
      const consume = (lines: string[]) => {
        // The failure tail is for ffmpeg's own messages, not -progress blocks
        reporter.observe(lines.filter(line => !isProgressLine(line)));
        for (const line of lines) {
          const progress = parser.feed(line);
          if (progress) {
            relay.emitProgress(progress);
          }
        }
      };

      let chunk: Buffer | null;
      while ((chunk = await proc.readNextChunk()) !== null) {
        consume(relay.push(chunk));
      }
      consume(relay.flush());

      let outcome: ExitStatus;
      try {
        outcome = await proc.wait();
      } catch (err) {
        if (err instanceof LaunchError) {
          this.logger.error('[CONVERT] Launch failed', { jobId: job.id, kind: err.kind, error: err.message });
          return this.settle(active, reporter.report(err));
        }
        throw err;
      }

      return this.settle(active, reporter.report(outcome));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error('[CONVERT] Conversion pipeline error', { jobId: job.id, error });
      active.process?.cancel();
      return this.settle(active, reporter.report(error));
    }
  }

  private settle(active: ActiveConversion, terminal: TerminalEvent): ConversionJob {
    const { job, relay } = active;

    if (terminal.type === 'cancelled') {
      transitionJob(job, 'cancelled');
    } else if (terminal.success) {
      job.exitCode = 0;
      transitionJob(job, 'completed');
    } else {
      job.exitCode = terminal.exitCode;
      transitionJob(job, 'failed');
    }

    relay.finish(terminal);

    if (terminal.type === 'completed' && !terminal.success) {
      this.logger.error('[CONVERT] Job failed', {
        jobId: job.id,
        reason: terminal.reason,
        exitCode: terminal.exitCode,
        tail: terminal.tail.slice(-5),
      });
    } else {
      this.logger.info(`[CONVERT] Job ${job.status}`, { jobId: job.id, outputPath: job.outputPath });
    }
    return job;
  }
}
