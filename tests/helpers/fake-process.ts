/**
 * In-process stand-in for an ffmpeg child: scripted output on two pipes,
 * scripted exit, and a record of every signal it was sent.
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import type { ChildHandle, ProcessProvider } from '../../src/process-runner.js';

export type Pipe = 'stdout' | 'stderr';

export const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

export class FakeChild extends EventEmitter implements ChildHandle {
  readonly pid: number;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];
  ignoreSigterm = false;
  exited = false;

  constructor(pid: number) {
    super();
    this.pid = pid;
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (this.exited) return false;
    if (signal === 'SIGTERM' && this.ignoreSigterm) return true;
    this.exit(null, signal);
    return true;
  }

  write(pipe: Pipe, text: string | Buffer): void {
    if (this.exited) return;
    this[pipe].write(text);
  }

  /**
   * Write each chunk on its own event-loop turn, then exit (unless
   * exitCode is undefined, which leaves the child running).
   */
  async play(chunks: Array<[Pipe, string | Buffer]>, exitCode?: number): Promise<void> {
    for (const [pipe, text] of chunks) {
      this.write(pipe, text);
      await tick();
    }
    if (exitCode !== undefined) {
      this.exit(exitCode);
    }
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, signal));
  }

  failToSpawn(code: string): void {
    this.exited = true;
    const err = Object.assign(new Error(`spawn ffmpeg ${code}`), { code });
    setImmediate(() => {
      this.emit('error', err);
      this.stdout.destroy();
      this.stderr.destroy();
    });
  }
}

export type ChildScript = (child: FakeChild) => Promise<void> | void;

export interface SpawnRecord {
  command: string;
  args: readonly string[];
  child: FakeChild;
  script: Promise<void>;
}

export class FakeProcessProvider implements ProcessProvider {
  readonly spawned: SpawnRecord[] = [];
  private readonly script: ChildScript;

  constructor(script: ChildScript = () => undefined) {
    this.script = script;
  }

  spawn(command: string, args: readonly string[]): FakeChild {
    const child = new FakeChild(4000 + this.spawned.length);
    const script = tick().then(() => this.script(child));
    this.spawned.push({ command, args, child, script });
    return child;
  }

  get lastChild(): FakeChild | undefined {
    return this.spawned[this.spawned.length - 1]?.child;
  }
}

/**
 * `count` numbered lines, each ending in \n.
 */
export function numberedLines(count: number, prefix = 'line'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}\n`);
}

export function onPipe(pipe: Pipe, texts: readonly string[]): Array<[Pipe, string]> {
  return texts.map((text): [Pipe, string] => [pipe, text]);
}
