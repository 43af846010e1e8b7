import type { CompletedItem, HarvestJob, ItemReference, RunState } from './types.js';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  'init': ['discovering'],
  'discovering': ['fanned-out', 'timed-out', 'assembled'],
  'fanned-out': ['completed', 'timed-out'],
  'completed': ['assembled'],
  'timed-out': ['assembled'],
  'assembled': [],
};

/**
 * Per-query bookkeeping: job states, the append-only accumulator of finished
 * items, and the truncation flag.
 */
export class PipelineRun {
  readonly jobs = new Map<ItemReference, HarvestJob>();
  // Discovery may repeat a reference; every job is still tracked here
  private readonly jobList: HarvestJob[] = [];
  private readonly completed: CompletedItem[] = [];
  private currentState: RunState = 'init';
  private truncatedFlag: boolean | undefined;

  constructor(
    readonly query: string,
    readonly deadlineMs: number,
    readonly startedAt: number,
  ) {}

  get state(): RunState {
    return this.currentState;
  }

  transition(next: RunState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new Error(`Illegal run transition ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
  }

  addJob(itemRef: ItemReference, index: number): HarvestJob {
    const job: HarvestJob = { itemRef, index, state: 'pending' };
    this.jobs.set(itemRef, job);
    this.jobList.push(job);
    return job;
  }

  append(item: CompletedItem): void {
    this.completed.push(item);
  }

  /** Completed items in completion order. */
  get accumulator(): readonly CompletedItem[] {
    return this.completed;
  }

  get truncated(): boolean {
    return this.truncatedFlag ?? false;
  }

  set truncated(value: boolean) {
    if (this.truncatedFlag !== undefined) {
      throw new Error('Run truncation has already been decided');
    }
    this.truncatedFlag = value;
  }

  pendingJobs(): HarvestJob[] {
    return this.jobList.filter(job => job.state === 'pending');
  }
}
