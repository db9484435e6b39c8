/**
 * SK8-ExtAna board state.
 */

import { SequenceTracker } from './loss-tracker';

/**
 * Latest readings from an SK8-ExtAna board.
 *
 * Only a running total of lost packets is kept; there is no rolling
 * window as there is for IMUs.
 */
export class ExtAnaData {
  /** Analogue channel 1 */
  ch1 = 0;
  /** Analogue channel 2 */
  ch2 = 0;
  /** Temperature in degrees C */
  temperature = 0;
  timestamp: number | null = null;

  private readonly tracker = new SequenceTracker();

  get lastSeq(): number | null {
    return this.tracker.lastSeq;
  }

  getTotalPacketsLost(): number {
    return this.tracker.lifetimeLoss();
  }

  /**
   * Apply a decoded packet.
   *
   * @param rawTemperature - Temperature in units of 0.01 degrees C
   * @returns Number of packets dropped before this one
   */
  update(ch1: number, ch2: number, rawTemperature: number, seq: number, timestamp: number): number {
    this.ch1 = ch1;
    this.ch2 = ch2;
    this.temperature = rawTemperature / 100;
    this.timestamp = timestamp;
    return this.tracker.track(seq, timestamp);
  }

  reset(): void {
    this.ch1 = 0;
    this.ch2 = 0;
    this.temperature = 0;
    this.timestamp = null;
    this.tracker.reset();
  }

  toString(): string {
    return (
      `ch1=${this.ch1}, ch2=${this.ch2}, temp=${this.temperature.toFixed(1)}, ` +
      `seq=${this.lastSeq ?? '-'}`
    );
  }
}
