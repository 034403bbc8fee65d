import { describe, it, expect } from 'vitest';
import {
  buildFfmpegArgs,
  buildConcatFilter,
  buildMetadataArgs,
  orderSourceFiles,
  formatCommandForLog,
} from '../src/ffmpeg-command.js';
import type { SourceFile } from '../src/conversion-types.js';

const metadata = { title: 'My Book', author: 'Jane Doe' };

const files: SourceFile[] = [
  { path: '/books/a.mp3', position: 0 },
  { path: '/books/b.mp3', position: 1 },
];

describe('buildFfmpegArgs', () => {
  it('builds the full argument vector for two files', () => {
    expect(buildFfmpegArgs(files, metadata, '/out/book.m4b')).toEqual([
      '-y',
      '-hide_banner',
      '-nostats',
      '-progress', 'pipe:1',
      '-i', '/books/a.mp3',
      '-i', '/books/b.mp3',
      '-filter_complex', '[0:a][1:a]concat=n=2:v=0:a=1[audio]',
      '-map', '[audio]',
      '-map_metadata', '-1',
      '-metadata', 'title=My Book',
      '-metadata', 'artist=Jane Doe',
      '-metadata', 'album=My Book',
      '-metadata', 'album_artist=Jane Doe',
      '-metadata', 'genre=Audiobook',
      '-c:a', 'aac',
      '-b:a', '128k',
      '-movflags', '+faststart',
      '-f', 'ipod',
      '/out/book.m4b',
    ]);
  });

  it('places inputs in position order regardless of array order', () => {
    const shuffled: SourceFile[] = [
      { path: '/books/c.mp3', position: 2 },
      { path: '/books/a.mp3', position: 0 },
      { path: '/books/b.mp3', position: 1 },
    ];
    const args = buildFfmpegArgs(shuffled, metadata, '/out/book.m4b');
    const inputs = args.filter((_, i) => args[i - 1] === '-i');

    expect(inputs).toEqual(['/books/a.mp3', '/books/b.mp3', '/books/c.mp3']);
  });

  it('ends with the destination path', () => {
    const args = buildFfmpegArgs(files, metadata, '/out/my book.m4b');
    expect(args[args.length - 1]).toBe('/out/my book.m4b');
  });

  it('returns the same vector for the same inputs', () => {
    expect(buildFfmpegArgs(files, metadata, '/out/book.m4b')).toEqual(
      buildFfmpegArgs(files, metadata, '/out/book.m4b')
    );
  });

  it('keeps shell metacharacters as literal single arguments', () => {
    const tricky: SourceFile[] = [{ path: '/books/$(rm -rf ~); "x" `y`.mp3', position: 0 }];
    const args = buildFfmpegArgs(tricky, { title: 'A & B; C', author: "O'Brien | D" }, '/out/a*b.m4b');

    expect(args).toContain('/books/$(rm -rf ~); "x" `y`.mp3');
    expect(args).toContain('title=A & B; C');
    expect(args).toContain("artist=O'Brien | D");
    expect(args[args.length - 1]).toBe('/out/a*b.m4b');
  });

  it('uses the configured bitrate', () => {
    const args = buildFfmpegArgs(files, metadata, '/out/book.m4b', { audioBitrate: '64k' });
    expect(args[args.indexOf('-b:a') + 1]).toBe('64k');
  });

  it('throws on an empty file list', () => {
    expect(() => buildFfmpegArgs([], metadata, '/out/book.m4b')).toThrow('At least one source file is required');
  });

  it('throws when positions have gaps', () => {
    const gappy: SourceFile[] = [
      { path: '/books/a.mp3', position: 0 },
      { path: '/books/b.mp3', position: 2 },
    ];
    expect(() => buildFfmpegArgs(gappy, metadata, '/out/book.m4b')).toThrow(
      'Source file positions must be a dense 0-based sequence'
    );
  });
});

describe('buildConcatFilter', () => {
  it('labels every input', () => {
    expect(buildConcatFilter(1)).toBe('[0:a]concat=n=1:v=0:a=1[audio]');
    expect(buildConcatFilter(3)).toBe('[0:a][1:a][2:a]concat=n=3:v=0:a=1[audio]');
  });
});

describe('buildMetadataArgs', () => {
  it('writes title, artist, album, album artist and genre', () => {
    expect(buildMetadataArgs(metadata)).toEqual([
      '-metadata', 'title=My Book',
      '-metadata', 'artist=Jane Doe',
      '-metadata', 'album=My Book',
      '-metadata', 'album_artist=Jane Doe',
      '-metadata', 'genre=Audiobook',
    ]);
  });
});

describe('orderSourceFiles', () => {
  it('does not mutate its input', () => {
    const input: SourceFile[] = [
      { path: 'b', position: 1 },
      { path: 'a', position: 0 },
    ];
    const ordered = orderSourceFiles(input);

    expect(ordered.map(f => f.path)).toEqual(['a', 'b']);
    expect(input.map(f => f.path)).toEqual(['b', 'a']);
  });
});

describe('formatCommandForLog', () => {
  it('quotes arguments that need it', () => {
    expect(formatCommandForLog('ffmpeg', ['-i', '/books/my book.mp3', "it's"])).toBe(
      `ffmpeg -i '/books/my book.mp3' 'it'\\''s'`
    );
  });
});
