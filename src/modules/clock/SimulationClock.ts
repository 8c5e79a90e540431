import { FRAME_RATE, SPREAD_DELAY, type Difficulty } from "../../core/config";

/**
 * Turns wall-clock deltas into frame units (1/60 s) and decides when the
 * next spread step is due, so spread speed depends on difficulty only and
 * not on how often the host calls in.
 */
export class SimulationClock {
  readonly spreadDelay: number;

  private accumulator = 0;
  private elapsed = 0;
  private steps = 0;

  constructor(difficulty: Difficulty) {
    this.spreadDelay = SPREAD_DELAY[difficulty];
  }

  /** Only finite, positive deltas move time forward. */
  static isValidDelta(dt: number): boolean {
    return Number.isFinite(dt) && dt > 0;
  }

  /** Frame units covered by `dt` seconds. */
  static frames(dt: number): number {
    return dt * FRAME_RATE;
  }

  /** Feeds `dt` seconds in and returns how many spread steps fell due. */
  advance(dt: number): number {
    if (!SimulationClock.isValidDelta(dt)) return 0;
    const frames = SimulationClock.frames(dt);
    this.elapsed += frames;
    this.accumulator += frames;

    let due = 0;
    while (this.accumulator >= this.spreadDelay) {
      this.accumulator -= this.spreadDelay;
      due++;
    }
    this.steps += due;
    return due;
  }

  /** Total frame units fed in. */
  elapsedFrames(): number {
    return this.elapsed;
  }

  spreadSteps(): number {
    return this.steps;
  }

  pending(): number {
    return this.accumulator;
  }
}
