export type LaneTask = () => Promise<void>;

export interface LaneQueueOptions {
  /** Called when a task rejects; the lane moves on to its next task. */
  onError?: (laneKey: string, err: unknown) => void;
}

/**
 * Serializes tasks per lane key. Tasks on one lane run strictly in
 * enqueue order; different lanes drain independently.
 */
export class LaneQueue {
  private readonly lanes = new Map<string, LaneTask[]>();
  private readonly active = new Set<string>();
  private idleWaiters: Array<() => void> = [];
  private readonly onError: (laneKey: string, err: unknown) => void;

  constructor(options: LaneQueueOptions = {}) {
    this.onError = options.onError ?? (() => {});
  }

  /** Queue a task. Resolves when the lane this call started has drained. */
  async enqueue(laneKey: string, task: LaneTask): Promise<void> {
    let queue = this.lanes.get(laneKey);
    if (!queue) {
      queue = [];
      this.lanes.set(laneKey, queue);
    }
    queue.push(task);

    if (!this.active.has(laneKey)) {
      await this.drain(laneKey, queue);
    }
  }

  /** Resolves once every lane is empty. */
  onIdle(): Promise<void> {
    if (this.active.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  isActive(laneKey: string): boolean {
    return this.active.has(laneKey);
  }

  pendingCount(laneKey: string): number {
    return this.lanes.get(laneKey)?.length ?? 0;
  }

  private async drain(laneKey: string, queue: LaneTask[]): Promise<void> {
    this.active.add(laneKey);

    // Let the enqueuing caller continue before the first task runs.
    await new Promise<void>((resolve) => setImmediate(resolve));

    let task = queue.shift();
    while (task) {
      try {
        await task();
      } catch (err) {
        this.onError(laneKey, err);
      }
      task = queue.shift();
    }

    this.active.delete(laneKey);
    this.lanes.delete(laneKey);

    if (this.active.size === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
