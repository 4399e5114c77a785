/**
 * @fileoverview READY-task queue and dispatch strategy
 *
 * The queue decides which task runs next; the dispatcher decides how it is
 * handed off. Keeping the two apart lets a worker pool replace the
 * sequential dispatcher without touching priority or dependency logic.
 */

export interface QueueEntry {
  readonly id: string;
  readonly effectivePriority: number;
  readonly createdSeq: number;
}

/**
 * Highest effective priority first, ties by creation order. Priorities may
 * change while a task waits, so ordering is evaluated at pop time.
 */
export class ReadyQueue<T extends QueueEntry> {
  private readonly entries = new Map<string, T>();

  get size(): number {
    return this.entries.size;
  }

  push(entry: T): void {
    this.entries.set(entry.id, entry);
  }

  peek(filter: (entry: T) => boolean = () => true): T | undefined {
    let best: T | undefined;
    for (const entry of this.entries.values()) {
      if (!filter(entry)) continue;
      if (!best || compareEntries(entry, best) < 0) best = entry;
    }
    return best;
  }

  pop(filter?: (entry: T) => boolean): T | undefined {
    const best = this.peek(filter);
    if (best) this.entries.delete(best.id);
    return best;
  }

  /** Entries in dispatch order */
  toArray(): T[] {
    return Array.from(this.entries.values()).sort(compareEntries);
  }

  clear(): void {
    this.entries.clear();
  }
}

function compareEntries(a: QueueEntry, b: QueueEntry): number {
  return b.effectivePriority - a.effectivePriority || a.createdSeq - b.createdSeq;
}

// ============================================================================
// DISPATCH
// ============================================================================

export interface TaskDispatcher {
  readonly name: string;
  dispatch<T>(run: () => Promise<T>): Promise<T>;
}

/** Runs each task to completion before the next dispatch decision. */
export class SequentialDispatcher implements TaskDispatcher {
  readonly name = 'sequential';

  async dispatch<T>(run: () => Promise<T>): Promise<T> {
    return await run();
  }
}
