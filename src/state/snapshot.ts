import type { AchievementGoalKind, GameState, UpgradeKind, View } from '../core/types.js';
import { canAfford, upgradeCost, upgradeProduction } from '../core/ledger.js';
import { achievementProgress, countCompleted, type ProgressMetrics } from '../core/achievements.js';
import { visibleUpgrades } from './actions.js';

// ─── Read-only view model handed to the renderer ───────────────────────────

export interface UpgradeRow {
  id: string;
  name: string;
  description: string;
  kind: UpgradeKind;
  owned: number;
  cost: number;
  affordable: boolean;
  /** Effect of one more unit */
  productionPerUnit: number;
  /** Current contribution of all owned units */
  production: number;
}

export interface AchievementRow {
  id: string;
  name: string;
  description: string;
  goalKind: AchievementGoalKind;
  completed: boolean;
  current: number;
  target: number;
  ratio: number;
}

export interface GameSnapshot {
  readonly gold: number;
  readonly goldPerSecond: number;
  readonly clickPower: number;
  readonly totalGoldEarned: number;
  readonly totalClicks: number;
  readonly totalUpgradesPurchased: number;
  readonly currentView: View;
  readonly selectedIndex: number;
  readonly showHelp: boolean;
  readonly clickCooldownMs: number;
  /** Fill of the 0–100 gold gauge, 0–1 */
  readonly goldProgress: number;
  readonly upgrades: readonly UpgradeRow[];
  readonly achievements: readonly AchievementRow[];
  readonly completedCount: number;
  readonly achievementCount: number;
}

export function progressMetrics(state: GameState): ProgressMetrics {
  return {
    totalGoldEarned: state.totalGoldEarned,
    goldPerSecond: state.goldPerSecond,
    totalClicks: state.totalClicks,
    clickPower: state.clickPower,
    totalUpgradesPurchased: state.totalUpgradesPurchased,
  };
}

export function buildSnapshot(state: GameState): GameSnapshot {
  const metrics = progressMetrics(state);

  const upgrades = visibleUpgrades(state).map((u) => ({
    id: u.id,
    name: u.name,
    description: u.description,
    kind: u.kind,
    owned: u.owned,
    cost: upgradeCost(u),
    affordable: canAfford(u, state.gold),
    productionPerUnit: u.baseProduction,
    production: upgradeProduction(u),
  }));

  const achievements = state.achievements.map((a) => ({
    id: a.id,
    name: a.name,
    description: a.description,
    goalKind: a.goal.kind,
    completed: a.completed,
    ...achievementProgress(a, metrics),
  }));

  return {
    ...metrics,
    gold: state.gold,
    currentView: state.currentView,
    selectedIndex: state.selectedIndex,
    showHelp: state.showHelp,
    clickCooldownMs: state.clickCooldownMs,
    goldProgress: (state.gold % 100) / 100,
    upgrades,
    achievements,
    completedCount: countCompleted(state.achievements),
    achievementCount: state.achievements.length,
  };
}
