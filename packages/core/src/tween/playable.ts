/**
 * The playback contract shared by tweens and sequences.
 *
 * Anything that manages units in bulk (a `Sequence`, a `TweenManager`,
 * host code) depends only on this interface, never on the concrete class.
 */

/** Lifecycle state of a playable unit. */
export type PlaybackState = "delayed" | "running" | "paused" | "stopped";

/**
 * What `stop()` does with the current value.
 *
 * - `asIs`: freeze where it is, no notification.
 * - `forceComplete`: jump to the end and fire the completion notification.
 */
export type StopBehavior = "asIs" | "forceComplete";

/**
 * How a tween repeats when it reaches the end.
 *
 * - `none`: stop and complete.
 * - `restart`: replay from the start value.
 * - `pingPong`: swap start and end, then play again.
 * - `yoyo`: keep the endpoints and play the progress mirrored (1 → 0).
 */
export type LoopType = "none" | "restart" | "pingPong" | "yoyo";

/** Number of repeats meaning "forever". */
export const INFINITE_LOOPS = -1;

/**
 * A unit of time-driven playback, advanced by the host once per frame.
 */
export interface Playable {
  /** Current lifecycle state. */
  readonly state: PlaybackState;

  /** True once the unit stopped after reaching its end (not stopped early). */
  readonly isComplete: boolean;

  /**
   * Normalized progress in [0, 1]. Assigning seeks directly, independent
   * of the current state.
   */
  progress: number;

  /** Multiplier applied to every `deltaTime` passed to `update()`. 0 freezes. */
  timeScale: number;

  /**
   * Advance the unit by `deltaTime` seconds.
   *
   * @returns The part of `deltaTime` left unconsumed because the unit
   *   finished inside this call (0 while it is still playing or looping).
   */
  update(deltaTime: number): number;

  /** Stop playback. Defaults to `"asIs"`. */
  stop(behavior?: StopBehavior): void;

  pause(): void;

  resume(): void;

  /** Replay from the beginning with the current configuration. */
  restart(): void;

  /** Swap direction in place. */
  reverse(): void;
}
