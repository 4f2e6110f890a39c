import type { NodeId } from '../model/types.js';

/**
 * A scheduled action, kept as data rather than a closure so the queue can
 * be inspected.
 */
export type SimulationCommand = {
  kind: 'generate';
  /** Generator node whose tick this is */
  targetNodeId: NodeId;
  payload: {
    /** Ordinal of the tick for this generator, starting at 0 */
    tick: number;
  };
};

/**
 * Event in the simulation queue.
 */
export interface ScheduledEvent {
  /** Simulation time when the event should occur */
  readonly time: number;
  /** Insertion counter, used only to break ties between equal times */
  readonly sequence: number;
  /** What to do when the event is consumed */
  readonly command: Readonly<SimulationCommand>;
}

/**
 * Binary heap-based priority queue of scheduled commands.
 * Events are ordered by time, with ties broken by insertion order. The
 * `(time, sequence)` pair is a strict total order, so two runs that enqueue
 * the same events in the same order consume them in the same order.
 * Provides O(log n) insertion and removal operations.
 *
 * @example
 * ```typescript
 * const queue = new EventQueue();
 * queue.push(5, { kind: 'generate', targetNodeId: 'arrivals', payload: { tick: 1 } });
 * const next = queue.peek(); // View next event without removing
 * const event = queue.pop(); // Remove and return next event
 * ```
 */
export class EventQueue {
  private heap: ScheduledEvent[] = [];
  private sequenceCounter = 0;

  /**
   * Add a command to the queue at the given time.
   *
   * @returns The event as stored, including its assigned sequence number
   */
  push(time: number, command: SimulationCommand): ScheduledEvent {
    const event: ScheduledEvent = Object.freeze({
      time,
      sequence: this.sequenceCounter++,
      command: Object.freeze({ ...command, payload: Object.freeze({ ...command.payload }) }),
    });

    this.heap.push(event);
    this.bubbleUp(this.heap.length - 1);

    return event;
  }

  /**
   * Remove and return the event with the smallest `(time, sequence)`.
   *
   * @returns The next event, or undefined if the queue is empty
   */
  pop(): ScheduledEvent | undefined {
    const root = this.heap[0];
    const last = this.heap.pop();
    if (root === undefined || last === undefined) {
      return undefined;
    }

    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }

    return root;
  }

  /**
   * View the next event without removing it.
   */
  peek(): ScheduledEvent | undefined {
    return this.heap[0];
  }

  /**
   * Remove all events and restart sequence numbering.
   */
  clear(): void {
    this.heap = [];
    this.sequenceCounter = 0;
  }

  /**
   * Pending events in consumption order. The queue itself is not modified.
   */
  toArray(): ScheduledEvent[] {
    return [...this.heap].sort((a, b) => this.compare(a, b));
  }

  get length(): number {
    return this.heap.length;
  }

  get isEmpty(): boolean {
    return this.heap.length === 0;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.swapIfLess(index, parentIndex)) {
        break;
      }
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (this.isLess(leftChild, smallest)) {
        smallest = leftChild;
      }
      if (this.isLess(rightChild, smallest)) {
        smallest = rightChild;
      }

      if (smallest === index) {
        break;
      }

      this.swapIfLess(smallest, index);
      index = smallest;
    }
  }

  private isLess(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a !== undefined && b !== undefined && this.compare(a, b) < 0;
  }

  /**
   * Swap heap slots i and j when the event at i orders before the one at j.
   */
  private swapIfLess(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined || this.compare(a, b) >= 0) {
      return false;
    }
    this.heap[i] = b;
    this.heap[j] = a;
    return true;
  }

  /**
   * Order by time, then by sequence.
   *
   * @returns Negative if a < b, positive if a > b
   */
  private compare(a: ScheduledEvent, b: ScheduledEvent): number {
    if (a.time !== b.time) {
      return a.time - b.time;
    }
    return a.sequence - b.sequence;
  }
}
