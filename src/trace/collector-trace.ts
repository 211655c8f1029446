import type { ItemKind } from '../types/items';
import type {
  ApiCallInput,
  ApiCallRecord,
  AttemptRecord,
  AttemptStatus,
  CollectorStatus
} from './types';

export type Clock = () => Date;

export interface CollectorOutcome {
  readonly name: string;
  readonly type: ItemKind;
  readonly status: CollectorStatus;
  readonly startedAt?: string;
  readonly endedAt?: string;
  readonly durationMs: number;
  readonly itemsCollected: number;
  readonly itemsAfterFilter: number;
  readonly attempts: readonly AttemptRecord[];
  readonly apiCalls: readonly ApiCallRecord[];
  readonly error?: string;
  readonly skippedReason?: string;
}

/**
 * Trace of one collector's task. Written only by that task (and the
 * coordinator on its behalf); sealed once the task completes, after which
 * late writes from abandoned work are dropped.
 */
export class CollectorTrace {
  private readonly attempts: AttemptRecord[] = [];
  private readonly apiCalls: ApiCallRecord[] = [];
  private currentAttempt = 0;
  private attemptStartedAt?: Date;
  private startedAt?: Date;
  private endedAt?: Date;
  private status: CollectorStatus | 'pending' = 'pending';
  private itemsCollected = 0;
  private itemsAfterFilter = 0;
  private error?: string;
  private skippedReason?: string;
  private sealed = false;

  constructor(
    readonly name: string,
    readonly type: ItemKind,
    private readonly clock: Clock = () => new Date()
  ) {}

  isSealed(): boolean {
    return this.sealed;
  }

  beginAttempt(attempt: number): void {
    if (this.sealed) return;
    const now = this.clock();
    this.startedAt ??= now;
    this.currentAttempt = attempt;
    this.attemptStartedAt = now;
  }

  endAttempt(status: AttemptStatus, itemsCollected: number, error?: string): void {
    if (this.sealed || !this.attemptStartedAt) return;
    const endedAt = this.clock();
    this.attempts.push({
      attempt: this.currentAttempt,
      startedAt: this.attemptStartedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: endedAt.getTime() - this.attemptStartedAt.getTime(),
      status,
      itemsCollected,
      ...(error !== undefined ? { error } : {})
    });
    this.attemptStartedAt = undefined;
  }

  /**
   * Recorder handed to the collector for the current attempt
   */
  recorderFor(attempt: number): (call: ApiCallInput) => void {
    return (call) => {
      if (this.sealed) return;
      this.apiCalls.push({ ...call, attempt, timestamp: this.clock().toISOString() });
    };
  }

  /**
   * Close the task. Only the final attempt's result is reflected here.
   */
  complete(status: AttemptStatus, itemsCollected: number, error?: string): void {
    if (this.sealed) return;
    if (this.attemptStartedAt) {
      this.endAttempt(status, status === 'timeout' ? 0 : itemsCollected, error);
    }
    this.status = status;
    this.itemsCollected = itemsCollected;
    this.error = error;
    this.endedAt = this.clock();
    this.startedAt ??= this.endedAt;
    this.sealed = true;
  }

  skip(reason: string): void {
    if (this.sealed) return;
    this.status = 'skipped';
    this.skippedReason = reason;
    this.sealed = true;
  }

  /**
   * Set by the pipeline after filtering; the only write allowed after sealing
   */
  setItemsAfterFilter(count: number): void {
    this.itemsAfterFilter = count;
  }

  get outcome(): CollectorOutcome {
    const durationMs =
      this.startedAt && this.endedAt ? this.endedAt.getTime() - this.startedAt.getTime() : 0;
    return {
      name: this.name,
      type: this.type,
      status: this.status === 'pending' ? 'timeout' : this.status,
      startedAt: this.startedAt?.toISOString(),
      endedAt: this.endedAt?.toISOString(),
      durationMs,
      itemsCollected: this.itemsCollected,
      itemsAfterFilter: this.itemsAfterFilter,
      attempts: [...this.attempts],
      apiCalls: [...this.apiCalls],
      error: this.error,
      skippedReason: this.skippedReason
    };
  }
}
