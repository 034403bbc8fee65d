import { describe, it, expect } from 'vitest';
import { lastValueFrom } from 'rxjs';
import { toArray } from 'rxjs/operators';
import { ProgressRelay } from '../src/progress-relay.js';
import type { ConversionEvent, TerminalEvent } from '../src/conversion-types.js';
import { tick } from './helpers/fake-process.js';

const done: TerminalEvent = { type: 'cancelled', jobId: 'job-1' };

function lines(events: ConversionEvent[]): string[] {
  return events.flatMap(e => (e.type === 'output' ? [e.line] : []));
}

describe('ProgressRelay', () => {
  it('splits chunks into lines and carries partial lines forward', async () => {
    const relay = new ProgressRelay('job-1');
    const collected = lastValueFrom(relay.observe().pipe(toArray()));

    expect(relay.push('first li')).toEqual([]);
    expect(relay.push('ne\nsecond\nthi')).toEqual(['first line', 'second']);
    expect(relay.push('rd\n')).toEqual(['third']);
    relay.finish(done);

    expect(lines(await collected)).toEqual(['first line', 'second', 'third']);
  });

  it('reproduces the byte stream when lines are joined with newlines', async () => {
    const relay = new ProgressRelay('job-1');
    const collected = lastValueFrom(relay.observe().pipe(toArray()));
    const input = '  leading spaces\r\n\nempty above\ttab\ntrailing  \n';

    for (const ch of input) {
      relay.push(Buffer.from(ch));
    }
    relay.finish(done);

    expect(lines(await collected).map(l => `${l}\n`).join('')).toBe(input);
  });

  it('decodes multi-byte characters split across chunks', async () => {
    const relay = new ProgressRelay('job-1');
    const collected = lastValueFrom(relay.observe().pipe(toArray()));
    const bytes = Buffer.from('Hörbuch – Teil 1\n');

    relay.push(bytes.subarray(0, 2));
    relay.push(bytes.subarray(2, 11));
    relay.push(bytes.subarray(11));
    relay.finish(done);

    expect(lines(await collected)).toEqual(['Hörbuch – Teil 1']);
  });

  it('emits an unterminated last line on flush', () => {
    const relay = new ProgressRelay('job-1');
    relay.push('complete\npartial');

    expect(relay.flush()).toEqual(['partial']);
    expect(relay.flush()).toEqual([]);
    expect(relay.linesEmitted).toBe(2);
  });

  it('delivers events asynchronously', async () => {
    const relay = new ProgressRelay('job-1');
    const received: ConversionEvent[] = [];
    relay.subscribe(event => received.push(event));

    relay.push('hello\n');
    expect(received).toEqual([]);

    await tick();
    expect(received).toEqual([{ type: 'output', jobId: 'job-1', line: 'hello' }]);
  });

  it('flushes the partial line before the terminal event and then discards input', async () => {
    const relay = new ProgressRelay('job-1');
    const collected = lastValueFrom(relay.observe().pipe(toArray()));

    relay.push('tail without newline');
    expect(relay.finish(done)).toBe(true);
    expect(relay.finish(done)).toBe(false);
    expect(relay.push('late\n')).toEqual([]);
    relay.emitProgress({ outTimeSeconds: 1, totalSizeBytes: null, speed: null, bitrate: null, percent: null, done: false });

    expect(relay.isFinished).toBe(true);
    expect(await collected).toEqual([
      { type: 'output', jobId: 'job-1', line: 'tail without newline' },
      done,
    ]);
  });

  it('allows a single subscriber', () => {
    const relay = new ProgressRelay('job-1');
    relay.subscribe(() => undefined);
    expect(() => relay.subscribe(() => undefined)).toThrow('Relay for job job-1 already has a subscriber');
  });

  it('stops delivering after unsubscribe', async () => {
    const relay = new ProgressRelay('job-1');
    const received: ConversionEvent[] = [];
    const unsubscribe = relay.subscribe(event => received.push(event));

    relay.push('one\n');
    await tick();
    unsubscribe();
    relay.push('two\n');
    await tick();

    expect(lines(received)).toEqual(['one']);
  });

  it('replays events to a late observer', async () => {
    const relay = new ProgressRelay('job-1');
    relay.push('early\n');
    relay.finish(done);

    const events = await lastValueFrom(relay.observe().pipe(toArray()));
    expect(events).toEqual([{ type: 'output', jobId: 'job-1', line: 'early' }, done]);
  });

  it('groups events into non-empty batches', async () => {
    const relay = new ProgressRelay('job-1');
    const collected = lastValueFrom(relay.batches(20).pipe(toArray()));

    relay.push('a\nb\n');
    relay.finish(done);

    const batches = await collected;
    expect(batches.flat()).toEqual([
      { type: 'output', jobId: 'job-1', line: 'a' },
      { type: 'output', jobId: 'job-1', line: 'b' },
      done,
    ]);
    expect(batches.every(batch => batch.length > 0)).toBe(true);
  });
});
