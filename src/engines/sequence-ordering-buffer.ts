import type { TelemetryEvent } from '../interfaces/telemetry-event.interface';

export interface ReleasedEvent {
  event: TelemetryEvent;
  /** Released past a sequence gap that was declared missing. */
  orderingGap: boolean;
}

export interface GapDeclaration {
  missingSequences: number[];
  releasedSequences: number[];
}

export interface BufferRelease {
  released: ReleasedEvent[];
  gaps: GapDeclaration[];
}

export interface SequenceOrderingBufferOptions {
  firstSequence: number;
  gapTimeoutMs: number;
}

interface HeldEvent {
  event: TelemetryEvent;
  heldSince: number;
}

/**
 * Per-run reorder buffer. Events leave in sequence order; an event beyond the
 * next expected sequence waits until the gap fills or the gap timeout elapses.
 */
export class SequenceOrderingBuffer {
  private nextExpected: number;
  private readonly held = new Map<number, HeldEvent>();
  private readonly declaredMissing = new Set<number>();

  constructor(private readonly options: SequenceOrderingBufferOptions) {
    this.nextExpected = options.firstSequence;
  }

  get pendingCount(): number {
    return this.held.size;
  }

  get nextExpectedSequence(): number {
    return this.nextExpected;
  }

  get missingSequences(): number[] {
    return [...this.declaredMissing].sort((a, b) => a - b);
  }

  /** Whether an event already holds this sequence in the buffer. */
  isHolding(sequence: number): boolean {
    return this.held.has(sequence);
  }

  offer(event: TelemetryEvent, now: number): BufferRelease {
    const { sequence } = event;

    if (sequence < this.nextExpected) {
      // Late arrival for a gap already given up on, or a pre-first sequence.
      this.declaredMissing.delete(sequence);
      return { released: [{ event, orderingGap: true }], gaps: [] };
    }

    if (sequence === this.nextExpected) {
      this.nextExpected += 1;
      const released: ReleasedEvent[] = [{ event, orderingGap: false }];
      released.push(...this.drainContiguous(false));
      return { released, gaps: [] };
    }

    this.held.set(sequence, { event, heldSince: now });
    return { released: [], gaps: [] };
  }

  /**
   * Release held events once the longest-waiting one has been held for the
   * gap timeout. Everything up to and including that event leaves, and the
   * sequences missing before it are declared permanently missing.
   */
  releaseExpired(now: number): BufferRelease {
    const released: ReleasedEvent[] = [];
    const gaps: GapDeclaration[] = [];

    let expired = this.longestWaiting();
    while (expired && now - expired.heldSince >= this.options.gapTimeoutMs) {
      const through = expired.event.sequence;
      while (this.nextExpected <= through) {
        const lowest = this.lowestHeld();
        if (lowest === null) break;

        const missingSequences: number[] = [];
        for (let seq = this.nextExpected; seq < lowest; seq++) {
          missingSequences.push(seq);
          this.declaredMissing.add(seq);
        }
        this.nextExpected = lowest;

        const batch = this.drainContiguous(true);
        released.push(...batch);
        gaps.push({
          missingSequences,
          releasedSequences: batch.map((item) => item.event.sequence),
        });
      }
      expired = this.longestWaiting();
    }

    return { released, gaps };
  }

  private lowestHeld(): number | null {
    let lowest: number | null = null;
    for (const sequence of this.held.keys()) {
      if (lowest === null || sequence < lowest) lowest = sequence;
    }
    return lowest;
  }

  /** Earliest held; ties go to the lower sequence. */
  private longestWaiting(): HeldEvent | null {
    let oldest: HeldEvent | null = null;
    for (const entry of this.held.values()) {
      if (
        oldest === null ||
        entry.heldSince < oldest.heldSince ||
        (entry.heldSince === oldest.heldSince &&
          entry.event.sequence < oldest.event.sequence)
      ) {
        oldest = entry;
      }
    }
    return oldest;
  }

  private drainContiguous(orderingGap: boolean): ReleasedEvent[] {
    const released: ReleasedEvent[] = [];
    let entry = this.held.get(this.nextExpected);
    while (entry) {
      this.held.delete(this.nextExpected);
      released.push({ event: entry.event, orderingGap });
      this.nextExpected += 1;
      entry = this.held.get(this.nextExpected);
    }
    return released;
  }
}
