/**
 * Bot Configuration: variants, lookahead depths and run defaults.
 *
 * Engine-side only (no network). Everything a batch or replay run needs
 * besides the GameConfig lives here.
 */

export const BOT_VARIANTS = ['single', 'two_pipe'] as const;

/** Decision engine variant. */
export type BotVariant = (typeof BOT_VARIANTS)[number];

/** A session is played by a bot variant, or by an external action source ('none'). */
export type ControlMode = BotVariant | 'none';

/** Number of upcoming obstacles each variant plans against. */
export const LOOKAHEAD_PIPES = {
  single: 1,
  two_pipe: 2,
} as const satisfies Record<BotVariant, 1 | 2>;

/** Share of the second gap's follow-up distance in the two-pipe score. */
export const SECOND_GAP_WEIGHT = 0.25;

/** Human-readable names, used in logs and reports. */
export const BOT_LABELS: Record<ControlMode, string> = {
  single: 'single-pipe bot',
  two_pipe: 'two-pipe bot',
  none: 'external input',
};

export interface RunConfig {
  /** Ticks after which a session is cut off and recorded as aborted (15 min at 30 FPS) */
  maxTicks: number;
  /** Sessions interleaved at once by the batch runner */
  concurrency: number;
  /** Ticks a session runs before yielding to the event loop */
  yieldEvery: number;
}

export const DEFAULT_RUN_CONFIG = {
  maxTicks: 27_000,
  concurrency: 4,
  yieldEvery: 500,
} as const satisfies RunConfig;

export function isBotVariant(value: unknown): value is BotVariant {
  return BOT_VARIANTS.some((v) => v === value);
}

export function parseBotVariant(raw: unknown): BotVariant {
  if (!isBotVariant(raw)) {
    throw new Error(`Unknown bot variant "${String(raw)}". Available: ${BOT_VARIANTS.join(', ')}`);
  }
  return raw;
}

export function parseControlMode(raw: unknown): ControlMode {
  return raw === 'none' ? 'none' : parseBotVariant(raw);
}
