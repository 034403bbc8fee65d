/**
 * Conversion Types
 *
 * Shared types for the MP3 → M4B conversion pipeline: the job model, the
 * events streamed to the presentation side, and the error taxonomy.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Inputs
// ─────────────────────────────────────────────────────────────────────────────

export interface SourceFile {
  readonly path: string;      // Absolute path to the MP3
  readonly position: number;  // 0-based playback order
}

export interface AudiobookMetadata {
  readonly title: string;
  readonly author: string;
}

/**
 * What the picker / save-dialog collaborators hand to the core.
 * Files are in the order the user arranged them.
 */
export interface ConversionRequest {
  files: string[];
  title: string;
  author: string;
  outputPath: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Job
// ─────────────────────────────────────────────────────────────────────────────

export type JobStatus =
  | 'created'
  | 'validating'
  | 'invalid'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'invalid',
  'completed',
  'failed',
  'cancelled',
]);

/**
 * Identity, inputs and destination are fixed when the job is built;
 * only the manager moves status and timestamps.
 */
export interface ConversionJob {
  readonly id: string;
  readonly files: readonly SourceFile[];
  readonly metadata: AudiobookMetadata;
  readonly outputPath: string;
  readonly createdAt: string;
  status: JobStatus;
  startedAt?: string;
  finishedAt?: string;
  exitCode?: number | null;
}

/**
 * Frozen copy of a job as handed to callers. Taken at the time of the call;
 * later transitions show up in the next snapshot.
 */
export type JobSnapshot = Readonly<ConversionJob>;

// ─────────────────────────────────────────────────────────────────────────────
// Progress
// ─────────────────────────────────────────────────────────────────────────────

export interface FfmpegProgress {
  outTimeSeconds: number;
  totalSizeBytes: number | null;
  speed: number | null;        // e.g. 42.1 for "42.1x"
  bitrate: string | null;      // as reported, e.g. "128.0kbits/s"
  percent: number | null;      // null when the total duration is unknown
  done: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

export type FailureReason = 'exit' | 'engine-not-found' | 'spawn-failed' | 'internal-error';

export interface OutputLineEvent {
  type: 'output';
  jobId: string;
  line: string;
}

export interface ProgressEvent {
  type: 'progress';
  jobId: string;
  progress: FfmpegProgress;
}

export interface SucceededEvent {
  type: 'completed';
  jobId: string;
  success: true;
  exitCode: 0;
  outputPath: string;
}

export interface FailedEvent {
  type: 'completed';
  jobId: string;
  success: false;
  exitCode: number | null;
  signal: string | null;
  reason: FailureReason;
  message: string;
  tail: string[];  // Last lines of engine output, oldest first
}

export interface CancelledEvent {
  type: 'cancelled';
  jobId: string;
}

export type CompletedEvent = SucceededEvent | FailedEvent;
export type TerminalEvent = CompletedEvent | CancelledEvent;
export type ConversionEvent = OutputLineEvent | ProgressEvent | TerminalEvent;

export function isTerminalEvent(event: ConversionEvent): event is TerminalEvent {
  return event.type === 'completed' || event.type === 'cancelled';
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type ValidationError =
  | { kind: 'empty-selection'; message: string }
  | { kind: 'file-not-found'; path: string; message: string }
  | { kind: 'unsupported-format'; path: string; message: string }
  | { kind: 'missing-title'; message: string }
  | { kind: 'missing-author'; message: string }
  | { kind: 'missing-destination'; message: string };

export type ValidationErrorKind = ValidationError['kind'];

export interface BusyError {
  kind: 'busy';
  activeJobId: string;
  message: string;
}

export type LaunchErrorKind = 'engine-not-found' | 'spawn-failed';

/**
 * The engine could not be started. Never carries partial output.
 */
export class LaunchError extends Error {
  readonly kind: LaunchErrorKind;
  readonly code?: string;

  constructor(kind: LaunchErrorKind, message: string, code?: string) {
    super(message);
    this.name = 'LaunchError';
    this.kind = kind;
    this.code = code;
  }
}

/**
 * An illegal job state transition. Indicates a bug, not bad input.
 */
export class JobStateError extends Error {
  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super(`Job ${jobId}: illegal transition ${from} -> ${to}`);
    this.name = 'JobStateError';
  }
}
