type Entry<S> = {
  tail: Promise<void>;
  pending: number;
  // last state committed through this lane
  state?: S;
};

/**
 * One sequential lane per task id. Work for different tasks runs in
 * parallel; work for the same task runs strictly one after another.
 */
export class TaskQueue<S> {
  private readonly lanes = new Map<string, Entry<S>>();

  run<T>(taskId: string, work: () => Promise<T>): Promise<T> {
    let entry = this.lanes.get(taskId);
    if (!entry) {
      entry = { tail: Promise.resolve(), pending: 0 };
      this.lanes.set(taskId, entry);
    }
    const lane = entry;
    lane.pending++;
    const result = lane.tail.then(work);
    lane.tail = result.then(
      () => { lane.pending--; },
      () => { lane.pending--; },
    );
    return result;
  }

  busy(taskId: string) {
    return (this.lanes.get(taskId)?.pending ?? 0) > 0;
  }

  committed(taskId: string): S | undefined {
    return this.lanes.get(taskId)?.state;
  }

  commit(taskId: string, state: S) {
    const lane = this.lanes.get(taskId);
    if (lane) lane.state = state;
  }

  /** Forget a task once nothing is queued for it. */
  release(taskId: string) {
    const lane = this.lanes.get(taskId);
    if (lane && lane.pending === 0) this.lanes.delete(taskId);
  }

  get size() {
    return this.lanes.size;
  }
}
