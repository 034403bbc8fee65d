/**
 * m4b-maker CLI
 *
 * Terminal front end for the conversion pipeline: takes the ordered file list
 * and destination, renders engine output and progress, and maps the outcome
 * to an exit code. Ctrl+C cancels the running conversion.
 */

import * as fs from 'fs';
import { parseArgs } from 'util';
import { ConversionManager, ConversionManagerOptions } from './conversion-manager.js';
import { ConversionEvent, FfmpegProgress, TerminalEvent } from './conversion-types.js';
import { isProgressLine } from './ffmpeg-progress.js';
import { configureLogger, closeLogger } from './rolling-logger.js';
import { getConfig, setConfigPath } from './tool-paths.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

const RENDER_WINDOW_MS = 100;
// Without a terminal, progress is printed as plain lines at most this often
const PROGRESS_LINE_INTERVAL_MS = 5000;

export interface TextSink {
  write(text: string): unknown;
  isTTY?: boolean;
}

export interface CliIO {
  stdout: TextSink;
  stderr: TextSink;
  createManager?: (options: ConversionManagerOptions) => ConversionManager;
  onInterrupt?: (handler: () => void) => () => void;
}

interface CliOptions {
  title: string;
  author: string;
  output: string;
  bitrate?: string;
  config?: string;
  quiet: boolean;
  verbose: boolean;
  files: string[];
}

const USAGE = `Usage: m4b-maker --title <title> --author <author> --output <book.m4b> [options] <file.mp3>...

Joins the MP3 files, in the order given, into one tagged M4B audiobook.

Options:
  -t, --title <text>     Book title (required)
  -a, --author <text>    Book author (required)
  -o, --output <path>    Destination .m4b file (required)
  -b, --bitrate <rate>   AAC bitrate, e.g. 96k (default: 128k)
  -c, --config <path>    Config file (default: $M4B_MAKER_CONFIG or the user config dir)
  -q, --quiet            Hide ffmpeg output
  -v, --verbose          Show raw progress lines and debug logs
  -h, --help             Show this help
      --version          Show version
`;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Fall through to unknown
  }
  return 'unknown';
}

export function formatClock(totalSeconds: number): string {
  const secs = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(secs / 3600);
  const m = Math.floor((secs % 3600) / 60);
  const s = secs % 60;
  return [h, m, s].map(n => String(n).padStart(2, '0')).join(':');
}

export function formatProgress(progress: FfmpegProgress): string {
  const parts = [progress.percent !== null ? `${progress.percent.toFixed(1)}%` : formatClock(progress.outTimeSeconds)];
  if (progress.percent !== null) parts.push(formatClock(progress.outTimeSeconds));
  if (progress.speed !== null) parts.push(`${progress.speed}x`);
  return `Progress: ${parts.join(' | ')}`;
}

export function formatTerminal(event: TerminalEvent): string {
  if (event.type === 'cancelled') {
    return 'Conversion cancelled.';
  }
  if (event.success) {
    return `Audiobook written to ${event.outputPath}`;
  }
  const lines = [`Conversion failed: ${event.message}`];
  if (event.tail.length > 0) {
    lines.push('Last ffmpeg output:', ...event.tail.map(line => `  ${line}`));
  }
  return lines.join('\n');
}

function exitCodeFor(event: TerminalEvent): number {
  if (event.type === 'cancelled') return EXIT_CANCELLED;
  return event.success ? EXIT_SUCCESS : EXIT_FAILURE;
}

type ParseResult =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

function parseRawArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      title: { type: 'string', short: 't' },
      author: { type: 'string', short: 'a' },
      output: { type: 'string', short: 'o' },
      bitrate: { type: 'string', short: 'b' },
      config: { type: 'string', short: 'c' },
      quiet: { type: 'boolean', short: 'q', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', default: false },
    },
  });
}

export function parseCliArgs(argv: string[]): ParseResult {
  let parsed: ReturnType<typeof parseRawArgs>;
  try {
    parsed = parseRawArgs(argv);
  } catch (err) {
    return { kind: 'error', message: err instanceof Error ? err.message : String(err) };
  }

  const { values, positionals } = parsed;
  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  if (values.bitrate !== undefined && !/^\d+k$/.test(values.bitrate)) {
    return { kind: 'error', message: `Invalid bitrate "${values.bitrate}" (expected e.g. 128k)` };
  }

  return {
    kind: 'run',
    options: {
      title: values.title ?? '',
      author: values.author ?? '',
      output: values.output ?? '',
      bitrate: values.bitrate,
      config: values.config,
      quiet: values.quiet ?? false,
      verbose: values.verbose ?? false,
      files: positionals,
    },
  };
}

function defaultOnInterrupt(handler: () => void): () => void {
  process.on('SIGINT', handler);
  return () => {
    process.off('SIGINT', handler);
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

export async function main(argv: string[], io: CliIO): Promise<number> {
  const parsed = parseCliArgs(argv);

  if (parsed.kind === 'help') {
    io.stdout.write(USAGE);
    return EXIT_SUCCESS;
  }
  if (parsed.kind === 'version') {
    io.stdout.write(`${readVersion()}\n`);
    return EXIT_SUCCESS;
  }
  if (parsed.kind === 'error') {
    io.stderr.write(`${parsed.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  const options = parsed.options;
  if (options.config) {
    setConfigPath(options.config);
  }
  const config = getConfig();
  const logger = configureLogger({
    logDir: process.env.M4B_MAKER_LOG_DIR || config.logDir || null,
    consoleOutput: options.verbose,
  });

  const managerOptions: ConversionManagerOptions = {
    logger,
    audioBitrate: options.bitrate ?? config.audioBitrate,
    killGraceMs: config.killGraceMs,
  };
  const manager = io.createManager ? io.createManager(managerOptions) : new ConversionManager(managerOptions);

  const start = manager.startConversion({
    files: options.files,
    title: options.title,
    author: options.author,
    outputPath: options.output,
  });

  if (!start.success) {
    io.stderr.write(`${start.error.message}\n`);
    await closeLogger();
    return EXIT_USAGE;
  }

  const stopListening = (io.onInterrupt ?? defaultOnInterrupt)(() => {
    if (manager.cancelConversion(start.job.id)) {
      io.stderr.write('\nCancelling...\n');
    }
  });

  const progressInPlace = io.stderr.isTTY === true;
  let progressShown = false;
  let lastProgressLineAt = Number.NEGATIVE_INFINITY;

  const render = (event: ConversionEvent): TerminalEvent | null => {
    switch (event.type) {
      case 'output':
        if (!options.quiet && (options.verbose || !isProgressLine(event.line))) {
          io.stdout.write(`${event.line}\n`);
        }
        return null;
      case 'progress':
        if (progressInPlace) {
          io.stderr.write(`\r${formatProgress(event.progress)}`);
          progressShown = true;
        } else {
          const now = Date.now();
          if (now - lastProgressLineAt >= PROGRESS_LINE_INTERVAL_MS) {
            lastProgressLineAt = now;
            io.stderr.write(`${formatProgress(event.progress)}\n`);
          }
        }
        return null;
      default:
        return event;
    }
  };

  try {
    const terminal = await new Promise<TerminalEvent>((resolve, reject) => {
      let last: TerminalEvent | null = null;
      start.batches(RENDER_WINDOW_MS).subscribe({
        next: (batch) => {
          for (const event of batch) {
            last = render(event) ?? last;
          }
        },
        error: reject,
        complete: () => {
          if (last) {
            resolve(last);
          } else {
            reject(new Error('Event stream ended without a result'));
          }
        },
      });
    });

    if (progressShown) io.stderr.write('\n');
    io.stderr.write(`${formatTerminal(terminal)}\n`);
    return exitCodeFor(terminal);
  } finally {
    stopListening();
    await closeLogger();
  }
}
