/**
 * Progress Channel
 *
 * Carries step and run notifications from the background run to any number
 * of readers (the status API, the console). Events are numbered and
 * delivered in publish order; a bounded backlog lets late readers replay.
 */

import { EventEmitter } from 'node:events';
import type { ProgressSink, RunStatus, RunSummary, StepName } from './types.js';

export type ProgressEvent =
  | {
      type: 'step';
      seq: number;
      at: string;
      step: StepName;
      percent: number;
      message: string;
    }
  | {
      type: 'run';
      seq: number;
      at: string;
      status: Exclude<RunStatus, 'running'>;
      summary: RunSummary;
    };

type ProgressEventInput =
  | Omit<Extract<ProgressEvent, { type: 'step' }>, 'seq' | 'at'>
  | Omit<Extract<ProgressEvent, { type: 'run' }>, 'seq' | 'at'>;

export type ProgressListener = (event: ProgressEvent) => void;

const EVENT = 'progress';

export class ProgressChannel implements ProgressSink {
  private readonly emitter = new EventEmitter();
  private readonly backlog: ProgressEvent[] = [];
  private seq = 0;

  constructor(private readonly backlogSize: number = 200) {
    this.emitter.setMaxListeners(0);
  }

  onStepUpdate(step: StepName, percent: number, message: string): void {
    this.publish({ type: 'step', step, percent, message });
  }

  onRunCompleted(status: Exclude<RunStatus, 'running'>, summary: RunSummary): void {
    this.publish({ type: 'run', status, summary });
  }

  /**
   * Subscribe to new events. Returns an unsubscribe function.
   */
  subscribe(listener: ProgressListener): () => void {
    const guarded: ProgressListener = (event) => {
      try {
        listener(event);
      } catch (error) {
        console.error('[Progress] Listener failed:', error);
      }
    };
    this.emitter.on(EVENT, guarded);
    return () => {
      this.emitter.off(EVENT, guarded);
    };
  }

  /**
   * Buffered events with a sequence number greater than `afterSeq`
   */
  replay(afterSeq: number = 0): ProgressEvent[] {
    return this.backlog.filter((event) => event.seq > afterSeq);
  }

  get lastSeq(): number {
    return this.seq;
  }

  private publish(input: ProgressEventInput): void {
    this.seq += 1;
    const event: ProgressEvent = { ...input, seq: this.seq, at: new Date().toISOString() };

    this.backlog.push(event);
    if (this.backlog.length > this.backlogSize) {
      this.backlog.splice(0, this.backlog.length - this.backlogSize);
    }

    this.emitter.emit(EVENT, event);
  }
}

