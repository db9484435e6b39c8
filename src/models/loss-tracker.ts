/**
 * Sequence-number continuity tracking for SK8 data streams.
 */

import { SEQUENCE_MODULUS } from '../protocol/constants';

/** Returns the current time in seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

/** Trailing period covered by the rolling loss window (seconds) */
export const SAMPLING_PERIOD = 3;

/**
 * Number of packets missing between `lastSeq` and `seq`.
 *
 * Sequence numbers wrap at 256. A repeated sequence number counts as a full
 * wrap (255 lost).
 */
export function droppedBetween(lastSeq: number, seq: number): number {
  const expected = (lastSeq + 1) % SEQUENCE_MODULUS;
  if (expected === seq) {
    return 0;
  }
  return (((seq - expected) % SEQUENCE_MODULUS) + SEQUENCE_MODULUS) % SEQUENCE_MODULUS;
}

/**
 * Cumulative loss counter driven by the last seen sequence number.
 */
export class SequenceTracker {
  private _lastSeq: number | null = null;
  private _lifetimeLoss = 0;

  /**
   * Last sequence number seen, or null if none since the last reset.
   */
  get lastSeq(): number | null {
    return this._lastSeq;
  }

  /**
   * Total packets lost since the last reset.
   */
  lifetimeLoss(): number {
    return this._lifetimeLoss;
  }

  /**
   * Record a packet and return how many were dropped before it.
   */
  track(seq: number, _arrival: number): number {
    const dropped = this._lastSeq === null ? 0 : droppedBetween(this._lastSeq, seq);
    this._lifetimeLoss += dropped;
    this._lastSeq = seq;
    return dropped;
  }

  reset(): void {
    this._lastSeq = null;
    this._lifetimeLoss = 0;
  }
}

interface WindowEntry {
  arrival: number;
  dropped: number;
}

/**
 * Sequence tracker with a rolling window of recent arrivals.
 *
 * Sample rate and recent loss are only reported once the tracker has been
 * running for a full {@link SAMPLING_PERIOD}.
 */
export class PacketLossTracker extends SequenceTracker {
  // Newest entry first
  private window: WindowEntry[] = [];
  private startedAt: number;

  constructor(private readonly clock: Clock = systemClock) {
    super();
    this.startedAt = clock();
  }

  override track(seq: number, arrival: number): number {
    const dropped = super.track(seq, arrival);
    this.window.unshift({ arrival, dropped });
    this.prune(this.clock());
    return dropped;
  }

  /**
   * Packets per second over the trailing period, or null while warming up.
   */
  sampleRate(): number | null {
    const now = this.clock();
    if (!this.isWarm(now)) {
      return null;
    }
    this.prune(now);
    return this.window.length / SAMPLING_PERIOD;
  }

  /**
   * Packets lost over the trailing period, or null while warming up.
   */
  recentLoss(): number | null {
    const now = this.clock();
    if (!this.isWarm(now)) {
      return null;
    }
    this.prune(now);
    return this.window.reduce((sum, entry) => sum + entry.dropped, 0);
  }

  /**
   * Number of arrivals currently inside the window.
   */
  get windowSize(): number {
    return this.window.length;
  }

  override reset(): void {
    super.reset();
    this.window = [];
    this.startedAt = this.clock();
  }

  private isWarm(now: number): boolean {
    return now - this.startedAt >= SAMPLING_PERIOD;
  }

  private prune(now: number): void {
    while (
      this.window.length > 0 &&
      now - this.window[this.window.length - 1].arrival > SAMPLING_PERIOD
    ) {
      this.window.pop();
    }
  }
}
