/**
 * Game Configuration: types, defaults, overrides and validation.
 *
 * The core treats a GameConfig as read-only input. Sessions validate it on
 * construction so a misconfigured run fails before the first tick.
 */

import * as fs from 'node:fs';
import { BIRD, DT, FPS, GAP, PHYSICS, PIPE, SCREEN } from './constants';

export interface ScreenConfig {
  width: number;
  height: number;
}

export interface BirdConfig {
  xRatio: number;
  width: number;
  height: number;
  initialVelocityY: number;
}

export interface PhysicsConfig {
  gravity: number;
  flapVelocity: number;
  maxFallSpeed: number;
  maxRiseSpeed: number;
  scrollSpeed: number;
}

export interface PipeConfig {
  width: number;
  gapHeight: number;
  spawnOffset: number;
  spawnSpacing: number;
  firstOffset: number;
}

export interface GapBounds {
  minY: number;
  maxY: number;
  maxTransition: number;
}

export interface GameConfig {
  fps: number;
  /** Fixed timestep in seconds, always 1 / fps */
  dt: number;
  screen: ScreenConfig;
  bird: BirdConfig;
  physics: PhysicsConfig;
  pipe: PipeConfig;
  gap: GapBounds;
}

/** Per-section partial overrides, as read from a JSON file. */
export interface GameConfigOverrides {
  fps?: number;
  screen?: Partial<ScreenConfig>;
  bird?: Partial<BirdConfig>;
  physics?: Partial<PhysicsConfig>;
  pipe?: Partial<PipeConfig>;
  gap?: Partial<GapBounds>;
}

export const DEFAULT_GAME_CONFIG = {
  fps: FPS,
  dt: DT,
  screen: SCREEN,
  bird: BIRD,
  physics: PHYSICS,
  pipe: PIPE,
  gap: GAP,
} as const satisfies GameConfig;

const SECTIONS = ['screen', 'bird', 'physics', 'pipe', 'gap'] as const;

/**
 * Throw if the config cannot produce a valid session.
 * Called at session construction; never recovered from.
 */
export function validateGameConfig(config: GameConfig): void {
  if (!Number.isFinite(config.fps) || config.fps <= 0) {
    throw new Error(`Invalid config: fps must be a positive number (got ${config.fps})`);
  }
  if (config.dt !== 1 / config.fps) {
    throw new Error(`Invalid config: dt must be 1 / fps (got ${config.dt} for fps ${config.fps})`);
  }
  for (const section of SECTIONS) {
    for (const [key, value] of Object.entries(config[section])) {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new Error(`Invalid config: ${section}.${key} must be a finite number`);
      }
    }
  }

  const { screen, bird, pipe, gap } = config;
  if (screen.width <= 0 || screen.height <= 0) {
    throw new Error('Invalid config: screen dimensions must be positive');
  }
  if (bird.width <= 0 || bird.height <= 0 || pipe.width <= 0 || pipe.gapHeight <= 0) {
    throw new Error('Invalid config: bird and pipe sizes must be positive');
  }
  if (gap.minY > gap.maxY) {
    throw new Error(`Invalid config: gap.minY (${gap.minY}) > gap.maxY (${gap.maxY})`);
  }
  if (gap.maxTransition < 0) {
    throw new Error(`Invalid config: gap.maxTransition must be >= 0 (got ${gap.maxTransition})`);
  }
  if (gap.minY < 0 || gap.maxY > screen.height) {
    throw new Error('Invalid config: gap bounds must lie within the screen');
  }
}

/** Merge section overrides onto the defaults. dt always follows fps. */
export function resolveGameConfig(
  overrides: GameConfigOverrides = {},
  base: GameConfig = DEFAULT_GAME_CONFIG,
): GameConfig {
  const fps = overrides.fps ?? base.fps;
  return {
    fps,
    dt: 1 / fps,
    screen: { ...base.screen, ...overrides.screen },
    bird: { ...base.bird, ...overrides.bird },
    physics: { ...base.physics, ...overrides.physics },
    pipe: { ...base.pipe, ...overrides.pipe },
    gap: { ...base.gap, ...overrides.gap },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const SCREEN_KEYS = ['width', 'height'] as const;
const BIRD_KEYS = ['xRatio', 'width', 'height', 'initialVelocityY'] as const;
const PHYSICS_KEYS = ['gravity', 'flapVelocity', 'maxFallSpeed', 'maxRiseSpeed', 'scrollSpeed'] as const;
const PIPE_KEYS = ['width', 'gapHeight', 'spawnOffset', 'spawnSpacing', 'firstOffset'] as const;
const GAP_KEYS = ['minY', 'maxY', 'maxTransition'] as const;

function pickNumbers<K extends string>(
  raw: unknown,
  section: string,
  keys: readonly K[],
): Partial<Record<K, number>> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new Error(`Config section "${section}" must be an object`);
  }
  const result: Partial<Record<K, number>> = {};
  for (const [key, value] of Object.entries(raw)) {
    const known = keys.find((k) => k === key);
    if (known === undefined) {
      throw new Error(`Unknown config key "${section}.${key}"`);
    }
    if (typeof value !== 'number') {
      throw new Error(`Config value ${section}.${key} must be a number`);
    }
    result[known] = value;
  }
  return result;
}

/** Parse an overrides object from untrusted JSON. */
export function parseGameConfigOverrides(raw: unknown): GameConfigOverrides {
  if (!isRecord(raw)) {
    throw new Error('Config file must contain a JSON object');
  }
  const overrides: GameConfigOverrides = {
    screen: pickNumbers(raw.screen, 'screen', SCREEN_KEYS),
    bird: pickNumbers(raw.bird, 'bird', BIRD_KEYS),
    physics: pickNumbers(raw.physics, 'physics', PHYSICS_KEYS),
    pipe: pickNumbers(raw.pipe, 'pipe', PIPE_KEYS),
    gap: pickNumbers(raw.gap, 'gap', GAP_KEYS),
  };
  if (raw.fps !== undefined) {
    if (typeof raw.fps !== 'number') {
      throw new Error('Config value fps must be a number');
    }
    overrides.fps = raw.fps;
  }
  return overrides;
}

/** Read a JSON override file and return the validated, merged config. */
export function loadGameConfig(filePath: string): GameConfig {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const config = resolveGameConfig(parseGameConfigOverrides(raw));
  validateGameConfig(config);
  return config;
}
