import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createDurationProbe, probeFileDuration } from '../src/duration-probe.js';
import { silentLogger } from '../src/rolling-logger.js';

let dir: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'm4b-probe-'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

// MPEG-1 Layer III, 128 kbps, 44.1 kHz, mono: 417 bytes and 1152 samples per frame
const FRAME_HEADER = [0xff, 0xfb, 0x90, 0xc0];
const FRAME_BYTES = 417;

function writeMp3(name: string, frames: number): string {
  const frame = Buffer.alloc(FRAME_BYTES);
  Buffer.from(FRAME_HEADER).copy(frame);
  const file = path.join(dir, name);
  fs.writeFileSync(file, Buffer.concat(Array.from({ length: frames }, () => frame)));
  return file;
}

describe('createDurationProbe', () => {
  it('sums the durations of every file', async () => {
    const first = writeMp3('first.mp3', 100);
    const second = writeMp3('second.mp3', 100);

    expect(await probeFileDuration(first)).toBeCloseTo(115200 / 44100, 6);

    const probe = createDurationProbe(silentLogger);
    expect(await probe([first, second])).toBeCloseTo(230400 / 44100, 6);
  });

  it('returns null when a file cannot be read', async () => {
    const probe = createDurationProbe(silentLogger);
    expect(await probe([path.join(dir, 'missing.mp3')])).toBeNull();
  });

  it('returns null when a file has no audio duration', async () => {
    const notAudio = path.join(dir, 'not-audio.mp3');
    fs.writeFileSync(notAudio, '');

    const probe = createDurationProbe(silentLogger);
    expect(await probe([notAudio])).toBeNull();
  });
});
