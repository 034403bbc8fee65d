/**
 * Progress Relay
 *
 * Turns raw engine output chunks into line events for one subscriber.
 *
 * - A partial line at the end of a chunk is carried into the next one
 * - Lines are split on \n only and never trimmed
 * - Delivery is scheduled on the asap scheduler, so the subscriber never runs
 *   inside the read loop and a slow subscriber only grows the queue
 * - Events are replayed to late subscribers, so none is lost to subscription timing
 * - After finish() nothing else is emitted; late chunks are discarded
 */

import { Observable, ReplaySubject, Subscription, asapScheduler } from 'rxjs';
import { bufferTime, filter, observeOn } from 'rxjs/operators';
import { StringDecoder } from 'string_decoder';
import { ConversionEvent, FfmpegProgress, TerminalEvent } from './conversion-types.js';

export type ConversionEventListener = (event: ConversionEvent) => void;

export class ProgressRelay {
  readonly jobId: string;

  private readonly subject = new ReplaySubject<ConversionEvent>();
  private readonly events$: Observable<ConversionEvent>;
  private readonly decoder = new StringDecoder('utf8');
  private partial = '';
  private subscription: Subscription | null = null;
  private finished = false;
  private lineCount = 0;

  constructor(jobId: string) {
    this.jobId = jobId;
    this.events$ = this.subject.asObservable().pipe(observeOn(asapScheduler));
  }

  get isFinished(): boolean {
    return this.finished;
  }

  get linesEmitted(): number {
    return this.lineCount;
  }

  /**
   * Register the single listener for this job. Returns an unsubscribe function.
   */
  subscribe(onEvent: ConversionEventListener): () => void {
    if (this.subscription) {
      throw new Error(`Relay for job ${this.jobId} already has a subscriber`);
    }
    const subscription = this.events$.subscribe({ next: onEvent });
    this.subscription = subscription;
    return () => subscription.unsubscribe();
  }

  /**
   * The event stream for observers that want RxJS directly.
   */
  observe(): Observable<ConversionEvent> {
    return this.events$;
  }

  /**
   * Events collected per window, for consumers that render on a schedule
   * (one frame, one terminal refresh). Empty windows are skipped.
   */
  batches(windowMs: number): Observable<ConversionEvent[]> {
    return this.events$.pipe(
      bufferTime(windowMs),
      filter(batch => batch.length > 0)
    );
  }

  /**
   * Split a chunk into complete lines and emit them. Returns the lines so the
   * caller can feed them to other observers (reporter, progress parser).
   */
  push(chunk: Buffer | string): string[] {
    if (this.finished) return [];

    const text = this.partial + (typeof chunk === 'string' ? chunk : this.decoder.write(chunk));
    const parts = text.split('\n');
    this.partial = parts.pop() ?? '';

    for (const line of parts) {
      this.emitLine(line);
    }
    return parts;
  }

  /**
   * Emit whatever is left of an unterminated final line.
   */
  flush(): string[] {
    if (this.finished) return [];

    const rest = this.partial + this.decoder.end();
    this.partial = '';
    if (rest.length === 0) return [];

    this.emitLine(rest);
    return [rest];
  }

  emitProgress(progress: FfmpegProgress): void {
    if (this.finished) return;
    this.subject.next({ type: 'progress', jobId: this.jobId, progress });
  }

  /**
   * Flush, emit the terminal event, and close the stream.
   * Only the first call has any effect.
   */
  finish(terminal: TerminalEvent): boolean {
    if (this.finished) return false;
    this.flush();
    this.finished = true;
    this.subject.next(terminal);
    this.subject.complete();
    return true;
  }

  private emitLine(line: string): void {
    this.lineCount++;
    this.subject.next({ type: 'output', jobId: this.jobId, line });
  }
}
