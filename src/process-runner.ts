/**
 * Process Runner - engine subprocess management
 *
 * Spawns the engine without a shell, merges stdout and stderr into one
 * incremental chunk stream, and owns the child until it is reaped.
 *
 * Spawning goes through a ProcessProvider so tests can script a fake child.
 */

import { spawn } from 'child_process';
import type { Readable } from 'stream';
import * as fs from 'fs';
import * as path from 'path';
import { LaunchError } from './conversion-types.js';
import { getLogger, Logger } from './rolling-logger.js';

export const DEFAULT_KILL_GRACE_MS = 5000;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The slice of ChildProcess the runner uses. A real ChildProcess satisfies it.
 */
export interface ChildHandle {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface ProcessProvider {
  spawn(command: string, args: readonly string[]): ChildHandle;
}

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  cancelled: boolean;  // cancel() was requested before the child exited
}

export interface RunnerOptions {
  killGraceMs?: number;
  logger?: Logger;
}

export const nodeProcessProvider: ProcessProvider = {
  spawn(command, args) {
    return spawn(command, [...args], {
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Live child tracking
// ─────────────────────────────────────────────────────────────────────────────

const liveChildren = new Set<ChildHandle>();
let exitHookInstalled = false;

/**
 * Last-ditch cleanup: whatever is still alive when this process exits is
 * killed so no engine keeps writing to a half-finished file.
 */
function installExitHook(): void {
  if (exitHookInstalled) return;
  exitHookInstalled = true;

  process.on('exit', () => {
    for (const child of liveChildren) {
      try {
        child.kill('SIGKILL');
      } catch {
        // Already gone
      }
    }
    liveChildren.clear();
  });
}

export function getLiveChildCount(): number {
  return liveChildren.size;
}

function toLaunchError(err: Error): LaunchError {
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  if (code === 'ENOENT') {
    return new LaunchError('engine-not-found', `Engine not found: ${err.message}`, code);
  }
  return new LaunchError('spawn-failed', `Failed to launch engine: ${err.message}`, code);
}

// ─────────────────────────────────────────────────────────────────────────────
// Running process
// ─────────────────────────────────────────────────────────────────────────────

export class RunningProcess {
  private readonly child: ChildHandle;
  private readonly killGraceMs: number;
  private readonly logger: Logger;

  private chunks: Buffer[] = [];
  private readers: Array<(chunk: Buffer | null) => void> = [];
  private openStreams = 0;
  private streamEnded = false;

  private outcome: { status: ExitStatus } | { error: LaunchError } | null = null;
  private waiters: Array<{ resolve: (status: ExitStatus) => void; reject: (err: LaunchError) => void }> = [];
  private cancelRequested = false;
  private killTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(child: ChildHandle, options: RunnerOptions = {}) {
    this.child = child;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.logger = options.logger ?? getLogger();

    liveChildren.add(child);
    installExitHook();

    for (const stream of [child.stdout, child.stderr]) {
      if (!stream) continue;
      this.openStreams++;
      let closed = false;
      const onDone = () => {
        if (closed) return;
        closed = true;
        this.closeStream();
      };
      stream.on('data', (data: Buffer | string) => this.pushChunk(Buffer.isBuffer(data) ? data : Buffer.from(data)));
      stream.once('end', onDone);
      stream.once('close', onDone);
      stream.once('error', (err: Error) => {
        this.logger.warn('[RUNNER] Output stream error', { pid: child.pid, error: err.message });
        onDone();
      });
    }
    if (this.openStreams === 0) {
      this.endStream();
    }

    child.on('error', (err) => this.settle({ error: toLaunchError(err) }));
    child.on('close', (code, signal) => this.settle({ status: { code, signal, cancelled: this.cancelRequested } }));
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this.outcome !== null;
  }

  /**
   * Next chunk of merged stdout/stderr in arrival order, or null at end of stream.
   */
  readNextChunk(): Promise<Buffer | null> {
    const chunk = this.chunks.shift();
    if (chunk) {
      return Promise.resolve(chunk);
    }
    if (this.streamEnded) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => this.readers.push(resolve));
  }

  /**
   * Ask the child to stop: SIGTERM now, SIGKILL after the grace period.
   * Returns false if the child already exited or cancel was already requested.
   */
  cancel(): boolean {
    if (this.outcome || this.cancelRequested) {
      return false;
    }
    this.cancelRequested = true;
    this.logger.info('[RUNNER] Cancelling engine', { pid: this.child.pid });

    this.child.kill('SIGTERM');

    this.killTimer = setTimeout(() => {
      if (!this.outcome) {
        this.logger.warn('[RUNNER] Engine ignored SIGTERM, sending SIGKILL', { pid: this.child.pid });
        this.child.kill('SIGKILL');
      }
    }, this.killGraceMs);
    this.killTimer.unref?.();
    return true;
  }

  /**
   * Resolves once the child has exited and been reaped.
   * Rejects with LaunchError if it never started.
   */
  wait(): Promise<ExitStatus> {
    const outcome = this.outcome;
    if (outcome) {
      return 'status' in outcome ? Promise.resolve(outcome.status) : Promise.reject(outcome.error);
    }
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  private pushChunk(chunk: Buffer): void {
    if (this.streamEnded || chunk.length === 0) return;
    const reader = this.readers.shift();
    if (reader) {
      reader(chunk);
    } else {
      this.chunks.push(chunk);
    }
  }

  private closeStream(): void {
    this.openStreams--;
    if (this.openStreams <= 0) {
      this.endStream();
    }
  }

  private endStream(): void {
    if (this.streamEnded) return;
    this.streamEnded = true;
    for (const reader of this.readers.splice(0)) {
      reader(null);
    }
  }

  private settle(outcome: { status: ExitStatus } | { error: LaunchError }): void {
    if (this.outcome) return;
    this.outcome = outcome;

    liveChildren.delete(this.child);
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }

    // Streams are closed by the time 'close' fires; after a spawn error they may never end
    this.endStream();

    for (const waiter of this.waiters.splice(0)) {
      if ('status' in outcome) {
        waiter.resolve(outcome.status);
      } else {
        waiter.reject(outcome.error);
      }
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Runner
// ─────────────────────────────────────────────────────────────────────────────

export class ProcessRunner {
  private readonly provider: ProcessProvider;
  private readonly options: RunnerOptions;

  constructor(provider: ProcessProvider = nodeProcessProvider, options: RunnerOptions = {}) {
    this.provider = provider;
    this.options = options;
  }

  /**
   * Spawn the engine. Throws LaunchError synchronously when the command is an
   * explicit path that does not exist, or when spawn itself throws.
   */
  start(command: string, args: readonly string[]): RunningProcess {
    const logger = this.options.logger ?? getLogger();

    if (path.isAbsolute(command) && !fs.existsSync(command)) {
      throw new LaunchError('engine-not-found', `Engine not found: ${command}`, 'ENOENT');
    }

    let child: ChildHandle;
    try {
      child = this.provider.spawn(command, args);
    } catch (err) {
      throw toLaunchError(err instanceof Error ? err : new Error(String(err)));
    }

    logger.info('[RUNNER] Engine started', { pid: child.pid, command });
    return new RunningProcess(child, { ...this.options, logger });
  }
}
