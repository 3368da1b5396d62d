import type { AchievementGoal, AchievementState } from './types.js';

// ─── Achievement evaluation ────────────────────────────────────────────────

/** Live aggregates an achievement goal can track. */
export interface ProgressMetrics {
  totalGoldEarned: number;
  goldPerSecond: number;
  totalClicks: number;
  clickPower: number;
  totalUpgradesPurchased: number;
}

export interface AchievementProgress {
  current: number;
  target: number;
  /** 0–1, pinned to 1 once completed */
  ratio: number;
}

export function metricFor(goal: AchievementGoal, metrics: ProgressMetrics): number {
  switch (goal.kind) {
    case 'totalGold':
      return metrics.totalGoldEarned;
    case 'goldPerSecond':
      return metrics.goldPerSecond;
    case 'totalClicks':
      return metrics.totalClicks;
    case 'clickPower':
      return metrics.clickPower;
    case 'upgradesPurchased':
      return metrics.totalUpgradesPurchased;
  }
}

/**
 * Latch every achievement whose metric has reached its target.
 * Completed entries are never revisited. Returns the input array untouched
 * when nothing new completed.
 */
export function evaluateAchievements(
  achievements: AchievementState[],
  metrics: ProgressMetrics,
): AchievementState[] {
  let changed = false;
  const next = achievements.map((a) => {
    if (a.completed || metricFor(a.goal, metrics) < a.goal.target) return a;
    changed = true;
    return { ...a, completed: true };
  });
  return changed ? next : achievements;
}

export function achievementProgress(
  achievement: AchievementState,
  metrics: ProgressMetrics,
): AchievementProgress {
  const current = metricFor(achievement.goal, metrics);
  const target = achievement.goal.target;
  const ratio = achievement.completed ? 1 : Math.min(1, Math.max(0, current / target));
  return { current, target, ratio };
}

export function countCompleted(achievements: readonly AchievementState[]): number {
  return achievements.filter((a) => a.completed).length;
}
