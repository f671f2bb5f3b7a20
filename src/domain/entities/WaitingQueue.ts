import type { PlayerId } from "../typedefs.js";

const DEFAULT_MIN_CAPACITY = 8;

/**
 * Growable ring buffer holding the players waiting for a spot at the table.
 *
 * The queue does not know about games: keeping identifiers unique across a
 * game is the caller's job. `head` points at the oldest entry and `tail` at
 * the next free cell, both modulo the current capacity.
 */
export class WaitingQueue {
  #data: (PlayerId | undefined)[];
  #head = 0;
  #tail = 0;
  #size = 0;

  constructor(capacity = 1) {
    this.#data = new Array<PlayerId | undefined>(Math.max(1, Math.floor(capacity))).fill(
      undefined,
    );
  }

  static from(ids: readonly PlayerId[], minCapacity = DEFAULT_MIN_CAPACITY): WaitingQueue {
    const queue = new WaitingQueue(Math.max(minCapacity, ids.length));
    for (const id of ids) {
      queue.enqueue(id);
    }
    return queue;
  }

  get size(): number {
    return this.#size;
  }

  get capacity(): number {
    return this.#data.length;
  }

  enqueue(id: PlayerId): void {
    if (this.#size === this.#data.length) {
      this.#grow();
    }
    this.#data[this.#tail] = id;
    this.#tail = (this.#tail + 1) % this.#data.length;
    this.#size += 1;
  }

  dequeue(): PlayerId | undefined {
    if (this.#size === 0) {
      return undefined;
    }
    const id = this.#data[this.#head];
    this.#data[this.#head] = undefined;
    this.#head = (this.#head + 1) % this.#data.length;
    this.#size -= 1;
    return id;
  }

  includes(id: PlayerId): boolean {
    return this.#indexOf(id) !== -1;
  }

  /**
   * Removes the first occurrence of `id` and closes the gap by shifting the
   * entries behind it one cell towards the head.
   */
  removeValue(id: PlayerId): boolean {
    const offset = this.#indexOf(id);
    if (offset === -1) {
      return false;
    }

    const capacity = this.#data.length;
    for (let i = offset; i < this.#size - 1; i += 1) {
      this.#data[(this.#head + i) % capacity] = this.#data[(this.#head + i + 1) % capacity];
    }

    this.#tail = (this.#tail - 1 + capacity) % capacity;
    this.#data[this.#tail] = undefined;
    this.#size -= 1;
    return true;
  }

  snapshot(): PlayerId[] {
    const out: PlayerId[] = [];
    for (let i = 0; i < this.#size; i += 1) {
      const id = this.#data[(this.#head + i) % this.#data.length];
      if (id !== undefined) {
        out.push(id);
      }
    }
    return out;
  }

  #indexOf(id: PlayerId): number {
    for (let i = 0; i < this.#size; i += 1) {
      if (this.#data[(this.#head + i) % this.#data.length] === id) {
        return i;
      }
    }
    return -1;
  }

  #grow(): void {
    const next = new Array<PlayerId | undefined>(this.#data.length * 2).fill(undefined);
    // copy in FIFO order
    for (let i = 0; i < this.#size; i += 1) {
      next[i] = this.#data[(this.#head + i) % this.#data.length];
    }
    this.#data = next;
    this.#head = 0;
    this.#tail = this.#size;
  }
}
