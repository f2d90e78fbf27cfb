/**
 * Physics Constants and Tuning Parameters
 *
 * All simulation tuning lives here. Units are pixels and seconds; the
 * simulation advances by a fixed DT, never by measured frame time.
 * DEFAULT_GAME_CONFIG (config.ts) is assembled from these objects.
 */

/** Simulation ticks per second. */
export const FPS = 30;

/** Fixed timestep in seconds. */
export const DT = 1 / FPS;

/** Playfield size. (0, 0) is the top-left corner; y grows downward. */
export const SCREEN = {
  width: 1280,
  height: 720,
} as const;

/** Bird (agent) geometry and spawn parameters. */
export const BIRD = {
  /** Horizontal position as a fraction of screen width (left edge of the box) */
  xRatio: 0.2,
  /** Bounding box width */
  width: 34,
  /** Bounding box height */
  height: 24,
  /** Vertical velocity on the first tick (the bird starts mid-flap) */
  initialVelocityY: -270,
} as const;

/** Vertical motion and scrolling, in px/s and px/s². */
export const PHYSICS = {
  /** Downward acceleration */
  gravity: 900,
  /** Vertical velocity set by a flap (negative = up) */
  flapVelocity: -270,
  /** Max descend speed */
  maxFallSpeed: 300,
  /** Max ascend speed (magnitude) */
  maxRiseSpeed: 300,
  /** Horizontal obstacle speed */
  scrollSpeed: 150,
} as const;

/** Pipe pair geometry and spawning. */
export const PIPE = {
  width: 52,
  /** Vertical opening between the upper and lower pipe */
  gapHeight: 120,
  /** New pipes enter this far past the right edge */
  spawnOffset: 10,
  /** Free space, in pipe widths, between the right edge and the last pipe before a spawn */
  spawnSpacing: 2.5,
  /** The first pipe starts this many pipe widths past the right edge */
  firstOffset: 3,
} as const;

/** Gap centre constraints. Consecutive gaps never differ by more than maxTransition. */
export const GAP = {
  minY: 100,
  maxY: 500,
  maxTransition: 150,
} as const;
