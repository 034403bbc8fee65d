/**
 * FFmpeg Command Builder
 *
 * Maps an ordered file list, the book's metadata and a destination to the
 * argument vector for one ffmpeg run. Pure: no filesystem, no clock, no shell.
 *
 * ffmpeg -y -hide_banner -nostats -progress pipe:1
 *        -i a.mp3 -i b.mp3
 *        -filter_complex "[0:a][1:a]concat=n=2:v=0:a=1[audio]" -map "[audio]"
 *        -map_metadata -1 -metadata title=… -metadata artist=… …
 *        -c:a aac -b:a 128k -movflags +faststart -f ipod out.m4b
 */

import { AudiobookMetadata, SourceFile } from './conversion-types.js';
import { hasDensePositions } from './input-validator.js';

export const DEFAULT_AUDIO_BITRATE = '128k';
export const AUDIOBOOK_GENRE = 'Audiobook';

export interface CommandOptions {
  audioBitrate?: string;
}

/**
 * Sort by playback position. Throws if positions are not 0..n-1.
 */
export function orderSourceFiles(files: readonly SourceFile[]): SourceFile[] {
  if (!hasDensePositions(files)) {
    throw new Error('Source file positions must be a dense 0-based sequence');
  }
  return [...files].sort((a, b) => a.position - b.position);
}

/**
 * "[0:a][1:a][2:a]concat=n=3:v=0:a=1[audio]"
 */
export function buildConcatFilter(inputCount: number): string {
  let labels = '';
  for (let i = 0; i < inputCount; i++) {
    labels += `[${i}:a]`;
  }
  return `${labels}concat=n=${inputCount}:v=0:a=1[audio]`;
}

/**
 * Container-level tags. Players read album/album_artist for audiobooks,
 * so both pairs are written.
 */
export function buildMetadataArgs(metadata: AudiobookMetadata): string[] {
  const tags: Array<[string, string]> = [
    ['title', metadata.title],
    ['artist', metadata.author],
    ['album', metadata.title],
    ['album_artist', metadata.author],
    ['genre', AUDIOBOOK_GENRE],
  ];

  const args: string[] = [];
  for (const [key, value] of tags) {
    args.push('-metadata', `${key}=${value}`);
  }
  return args;
}

export function buildFfmpegArgs(
  files: readonly SourceFile[],
  metadata: AudiobookMetadata,
  outputPath: string,
  options: CommandOptions = {}
): string[] {
  const ordered = orderSourceFiles(files);
  if (ordered.length === 0) {
    throw new Error('At least one source file is required');
  }

  const inputArgs: string[] = [];
  for (const file of ordered) {
    inputArgs.push('-i', file.path);
  }

  return [
    '-y',
    '-hide_banner',
    '-nostats',
    '-progress', 'pipe:1',
    ...inputArgs,
    '-filter_complex', buildConcatFilter(ordered.length),
    '-map', '[audio]',
    '-map_metadata', '-1',
    ...buildMetadataArgs(metadata),
    '-c:a', 'aac',
    '-b:a', options.audioBitrate ?? DEFAULT_AUDIO_BITRATE,
    '-movflags', '+faststart',
    '-f', 'ipod',
    outputPath,
  ];
}

/**
 * Human-readable rendering for logs only. Never handed to a shell.
 */
export function formatCommandForLog(command: string, args: readonly string[]): string {
  const quote = (arg: string) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`);
  return [command, ...args].map(quote).join(' ');
}
