export type DecodePriority = 'final' | 'partial';

export type TryRunResult<T> =
  | { status: 'ran'; value: T }
  | { status: 'skipped' };

interface Waiter {
  priority: DecodePriority;
  grant: () => void;
}

/**
 * Single-slot lock around the STT engine.
 *
 * Finals queue up and are served in arrival order, always ahead of any
 * waiting partial. Partials normally use `tryRun`, which gives up instead of
 * waiting when the engine is busy or a final is queued.
 */
export class DecodeScheduler {
  private busy = false;
  private waiters: Waiter[] = [];
  private _completed = 0;
  private _skipped = 0;

  get isBusy(): boolean {
    return this.busy;
  }

  get pendingFinals(): number {
    return this.waiters.filter((w) => w.priority === 'final').length;
  }

  get completed(): number {
    return this._completed;
  }

  /** Partial attempts that were abandoned because the slot was taken. */
  get skipped(): number {
    return this._skipped;
  }

  /** Wait for the slot, run `task`, release. The task's rejection propagates. */
  async run<T>(priority: DecodePriority, task: () => Promise<T>): Promise<T> {
    if (this.busy) {
      await new Promise<void>((grant) => {
        this.waiters.push({ priority, grant });
      });
    } else {
      this.busy = true;
    }
    return this.execute(task);
  }

  /** Run `task` only if the slot is free right now and no final is waiting. */
  async tryRun<T>(task: () => Promise<T>): Promise<TryRunResult<T>> {
    if (this.busy || this.pendingFinals > 0) {
      this._skipped++;
      return { status: 'skipped' };
    }

    this.busy = true;
    const value = await this.execute(task);
    return { status: 'ran', value };
  }

  private async execute<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } finally {
      this._completed++;
      this.release();
    }
  }

  private release(): void {
    const index = this.waiters.findIndex((w) => w.priority === 'final');
    const next = index >= 0 ? this.waiters.splice(index, 1)[0] : this.waiters.shift();

    if (next) {
      // The slot passes straight to the next waiter; `busy` stays set.
      next.grant();
    } else {
      this.busy = false;
    }
  }
}
