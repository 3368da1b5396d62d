import { z } from 'zod';

// ─── Session configuration ─────────────────────────────────────────────────

export interface GameConfig {
  /** Simulation tick period */
  readonly tickIntervalMs: number;
  /** Minimum gap between two clicks that pay out; 0 makes every press count */
  readonly clickCooldownMs: number;
}

export const DEFAULT_CONFIG: GameConfig = {
  tickIntervalMs: 100,
  clickCooldownMs: 500,
};

const gameConfigSchema = z
  .object({
    tickIntervalMs: z.number().int().min(10).max(1000),
    clickCooldownMs: z.number().int().nonnegative(),
  })
  .strict()
  .partial();

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid game config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Validate partial overrides and merge them onto the defaults. */
export function resolveConfig(overrides: unknown = {}): GameConfig {
  const result = gameConfigSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return {
    tickIntervalMs: result.data.tickIntervalMs ?? DEFAULT_CONFIG.tickIntervalMs,
    clickCooldownMs: result.data.clickCooldownMs ?? DEFAULT_CONFIG.clickCooldownMs,
  };
}
