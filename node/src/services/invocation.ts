/**
 * One tool invocation as a state machine: pending → success | failed | timed_out.
 * Terminal states never change; a result arriving after settle() or abandon() is dropped.
 */
import type { InvocationSnapshot, InvocationState, OutcomeError } from '@/types/orchestration';

export type InvocationResult<T> =
  | { state: 'success'; value: T }
  | { state: 'failed'; error: OutcomeError }
  | { state: 'timed_out'; error: OutcomeError };

export class Invocation<T> {
  private result: InvocationResult<T> | undefined;
  private settledAt: number | undefined;
  private abandoned = false;

  constructor(
    readonly id: string,
    readonly startedAt: number,
  ) {}

  get state(): InvocationState {
    return this.result?.state ?? 'pending';
  }

  get isAbandoned(): boolean {
    return this.abandoned;
  }

  /** The terminal result, or undefined while pending. */
  get outcome(): InvocationResult<T> | undefined {
    return this.result;
  }

  /** Returns false when the invocation already left `pending` or was abandoned. */
  settle(result: InvocationResult<T>, at: number): boolean {
    if (this.result || this.abandoned) return false;
    this.result = result;
    this.settledAt = at;
    return true;
  }

  /** Stop waiting on a pending invocation; its eventual result will be discarded. */
  abandon(): boolean {
    if (this.result) return false;
    this.abandoned = true;
    return true;
  }

  snapshot(): InvocationSnapshot {
    return {
      id: this.id,
      state: this.state,
      startedAt: this.startedAt,
      ...(this.settledAt !== undefined && { settledAt: this.settledAt }),
    };
  }
}
