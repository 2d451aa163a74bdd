/**
 * Allocation tracker - owns every heap buffer made during a session
 *
 * Values never free their own storage. Owned text and list slots live in
 * buffers registered here, and the whole registry is drained when the
 * session is finalized.
 */

import { RuntimeFault } from './errors.js';
import { TextValue, type Value } from './value.js';

export type BufferKind = 'bytes' | 'slots';

/** Accounting size of one list slot, in bytes */
export const SLOT_SIZE = 16;

/**
 * A registered allocation. Reading `data` after release is a fault.
 */
export class TrackedBuffer<T> {
  private released = false;

  constructor(
    public readonly id: number,
    public readonly kind: BufferKind,
    public readonly size: number,
    private readonly payload: T
  ) {}

  get data(): T {
    if (this.released) {
      throw new RuntimeFault('UseAfterRelease', `buffer #${this.id} has been released`);
    }
    return this.payload;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Only the tracker that registered the buffer calls this. */
  markReleased(): void {
    this.released = true;
  }
}

export type ByteBuffer = TrackedBuffer<Uint8Array>;
export type SlotBuffer = TrackedBuffer<Array<Value | undefined>>;

export class AllocationTracker {
  /** Insertion-ordered registry of live buffers */
  private readonly live = new Set<TrackedBuffer<unknown>>();
  private nextId = 1;
  private liveBytes = 0;

  /**
   * @param allocationLimit Maximum number of live buffers; unlimited by default
   */
  constructor(private readonly allocationLimit: number = Number.POSITIVE_INFINITY) {}

  get count(): number {
    return this.live.size;
  }

  get totalBytes(): number {
    return this.liveBytes;
  }

  allocateBytes(size: number): ByteBuffer {
    this.checkSize(size);
    const buffer = new TrackedBuffer(this.nextId, 'bytes', size, this.acquire(() => new Uint8Array(size), size));
    this.register(buffer);
    return buffer;
  }

  allocateSlots(capacity: number): SlotBuffer {
    this.checkSize(capacity);
    const size = capacity * SLOT_SIZE;
    const slots = this.acquire(() => new Array<Value | undefined>(capacity).fill(undefined), size);
    const buffer = new TrackedBuffer(this.nextId, 'slots', size, slots);
    this.register(buffer);
    return buffer;
  }

  /**
   * Copy `bytes` plus a terminator into a fresh buffer and wrap it as owned text
   */
  duplicateText(bytes: Uint8Array): TextValue {
    const buffer = this.allocateBytes(bytes.length + 1);
    buffer.data.set(bytes);
    return TextValue.owned(buffer, bytes.length);
  }

  holds(buffer: TrackedBuffer<unknown>): boolean {
    return this.live.has(buffer);
  }

  /**
   * Release one buffer ahead of session end.
   *
   * @returns false when the buffer is not registered here
   */
  release(buffer: TrackedBuffer<unknown>): boolean {
    if (!this.live.delete(buffer)) {
      return false;
    }
    buffer.markReleased();
    this.liveBytes -= buffer.size;
    return true;
  }

  /**
   * Release every registered buffer exactly once and empty the registry.
   *
   * @returns Number of buffers released
   */
  releaseAll(): number {
    let released = 0;
    for (const buffer of this.live) {
      buffer.markReleased();
      released++;
    }
    this.live.clear();
    this.liveBytes = 0;
    return released;
  }

  private checkSize(size: number): void {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new RuntimeFault('InvalidOperand', `invalid allocation size ${size}`);
    }
    if (this.live.size >= this.allocationLimit) {
      throw new RuntimeFault('OutOfMemory', `allocation limit of ${this.allocationLimit} buffers reached`);
    }
  }

  private acquire<T>(create: () => T, size: number): T {
    try {
      return create();
    } catch (error) {
      if (error instanceof RangeError) {
        throw new RuntimeFault('OutOfMemory', `cannot allocate ${size} bytes`);
      }
      throw error;
    }
  }

  private register(buffer: TrackedBuffer<unknown>): void {
    this.nextId++;
    this.live.add(buffer);
    this.liveBytes += buffer.size;
  }
}
