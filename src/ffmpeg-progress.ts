/**
 * FFmpeg Progress Parsing
 *
 * With `-progress pipe:1` ffmpeg writes blocks of key=value lines, each block
 * closed by `progress=continue` or `progress=end`:
 *
 *   total_size=262192
 *   out_time_us=16404898
 *   out_time=00:00:16.404898
 *   bitrate= 127.9kbits/s
 *   speed=32.8x
 *   progress=continue
 */

import { FfmpegProgress } from './conversion-types.js';

const KEY_VALUE = /^([a-z][a-z0-9_]*)=\s*(.*?)\s*$/;

const PROGRESS_KEYS = new Set([
  'bitrate', 'total_size', 'out_time_us', 'out_time_ms', 'out_time', 'dup_frames',
  'drop_frames', 'speed', 'progress', 'frame', 'fps', 'stream_0_0_q',
]);

/**
 * True for the key=value lines of a -progress block (for display filtering).
 */
export function isProgressLine(line: string): boolean {
  const match = line.match(KEY_VALUE);
  return match !== null && PROGRESS_KEYS.has(match[1]);
}

/**
 * "HH:MM:SS.micro" -> seconds. Returns null for N/A or malformed values.
 */
export function parseClockTime(value: string): number | null {
  const match = value.match(/^(-?\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/);
  if (!match) return null;
  const [, h, m, s] = match;
  return parseInt(h, 10) * 3600 + parseInt(m, 10) * 60 + parseFloat(s);
}

function parseNumber(value: string | undefined): number | null {
  if (value === undefined || value === '' || value === 'N/A') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export class FfmpegProgressParser {
  private fields = new Map<string, string>();
  private readonly totalDurationSeconds: number | null;

  constructor(totalDurationSeconds: number | null = null) {
    this.totalDurationSeconds = totalDurationSeconds && totalDurationSeconds > 0 ? totalDurationSeconds : null;
  }

  /**
   * Feed one output line. Returns a snapshot when the line closes a block.
   */
  feed(line: string): FfmpegProgress | null {
    const match = line.match(KEY_VALUE);
    if (!match) return null;

    const [, key, value] = match;
    if (key !== 'progress') {
      this.fields.set(key, value);
      return null;
    }

    const snapshot = this.snapshot(value === 'end');
    this.fields.clear();
    return snapshot;
  }

  private snapshot(done: boolean): FfmpegProgress {
    const micros = parseNumber(this.fields.get('out_time_us'));
    const clock = this.fields.get('out_time');
    const outTimeSeconds = Math.max(
      0,
      micros !== null ? micros / 1_000_000 : (clock ? parseClockTime(clock) : null) ?? 0
    );

    const speedRaw = this.fields.get('speed');
    const speed = speedRaw ? parseNumber(speedRaw.replace(/x$/, '')) : null;

    const bitrateRaw = this.fields.get('bitrate');
    const bitrate = bitrateRaw && bitrateRaw !== 'N/A' ? bitrateRaw : null;

    let percent: number | null = null;
    if (this.totalDurationSeconds !== null) {
      percent = done
        ? 100
        : Math.min(100, Math.round((outTimeSeconds / this.totalDurationSeconds) * 1000) / 10);
    }

    return {
      outTimeSeconds,
      totalSizeBytes: parseNumber(this.fields.get('total_size')),
      speed,
      bitrate,
      percent,
      done,
    };
  }
}
