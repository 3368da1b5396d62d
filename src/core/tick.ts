import type { GameState } from './types.js';
import { productionByKind } from './ledger.js';
import { evaluateAchievements } from './achievements.js';

// ─── Time-based tick ───────────────────────────────────────────────────────

/** Click strength before any click upgrades. */
export const BASE_CLICK_POWER = 1;

/**
 * Pure deterministic tick function.
 * Returns a brand-new GameState; never mutates the input.
 *
 * Derived rates (`goldPerSecond`, `clickPower`) are written here and nowhere
 * else. Accrual uses the rate recomputed in this same tick.
 *
 * @param state  Current game state
 * @param nowMs  Wall-clock time of this tick; a clock that runs backwards accrues nothing
 */
export function processTick(state: GameState, nowMs: number): GameState {
  const deltaSeconds = Math.max(0, nowMs - state.lastUpdateMs) / 1000;

  // ── 1. Recompute derived rates ────────────────────────────────────────
  const goldPerSecond = productionByKind(state.upgrades, 'passive');
  const clickPower = BASE_CLICK_POWER + productionByKind(state.upgrades, 'click');

  // ── 2. Accrue gold ────────────────────────────────────────────────────
  const earned = goldPerSecond * deltaSeconds;
  const gold = state.gold + earned;
  const totalGoldEarned = state.totalGoldEarned + earned;

  // ── 3. Achievements against the fresh aggregates ─────────────────────
  const achievements = evaluateAchievements(state.achievements, {
    totalGoldEarned,
    goldPerSecond,
    totalClicks: state.totalClicks,
    clickPower,
    totalUpgradesPurchased: state.totalUpgradesPurchased,
  });

  return {
    ...state,
    gold,
    goldPerSecond,
    clickPower,
    totalGoldEarned,
    achievements,
    lastUpdateMs: nowMs,
    tickCount: state.tickCount + 1,
  };
}
