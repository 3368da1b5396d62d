import { describe, it, expect } from 'vitest';
import {
  evaluateAchievements,
  achievementProgress,
  metricFor,
  countCompleted,
  type ProgressMetrics,
} from '../src/core/achievements.js';
import { createAchievement } from '../src/state/gameState.js';
import { RATE_GOAL, GOLD_GOAL } from './fixtures.js';

const ZERO: ProgressMetrics = {
  totalGoldEarned: 0,
  goldPerSecond: 0,
  totalClicks: 0,
  clickPower: 1,
  totalUpgradesPurchased: 0,
};

describe('achievement tracker', () => {
  it('selects the metric matching each goal kind', () => {
    const m: ProgressMetrics = {
      totalGoldEarned: 1,
      goldPerSecond: 2,
      totalClicks: 3,
      clickPower: 4,
      totalUpgradesPurchased: 5,
    };
    expect(metricFor({ kind: 'totalGold', target: 1 }, m)).toBe(1);
    expect(metricFor({ kind: 'goldPerSecond', target: 1 }, m)).toBe(2);
    expect(metricFor({ kind: 'totalClicks', target: 1 }, m)).toBe(3);
    expect(metricFor({ kind: 'clickPower', target: 1 }, m)).toBe(4);
    expect(metricFor({ kind: 'upgradesPurchased', target: 1 }, m)).toBe(5);
  });

  it('completes an achievement once its metric reaches the target', () => {
    const list = [createAchievement(GOLD_GOAL)];
    const next = evaluateAchievements(list, { ...ZERO, totalGoldEarned: 10 });
    expect(next[0].completed).toBe(true);
    expect(list[0].completed).toBe(false);
  });

  it('returns the same array when nothing new completes', () => {
    const list = [createAchievement(GOLD_GOAL), createAchievement(RATE_GOAL)];
    expect(evaluateAchievements(list, { ...ZERO, totalGoldEarned: 9.99 })).toBe(list);
  });

  it('never un-completes when the metric falls back below target', () => {
    const list = evaluateAchievements([createAchievement(RATE_GOAL)], { ...ZERO, goldPerSecond: 0.5 });
    const later = evaluateAchievements(list, { ...ZERO, goldPerSecond: 0 });
    expect(later[0].completed).toBe(true);
  });

  it('reports progress clamped to 0–1 and pinned once done', () => {
    const a = createAchievement(GOLD_GOAL);
    expect(achievementProgress(a, { ...ZERO, totalGoldEarned: 2.5 })).toEqual({
      current: 2.5,
      target: 10,
      ratio: 0.25,
    });
    expect(achievementProgress(a, { ...ZERO, totalGoldEarned: 50 }).ratio).toBe(1);
    expect(achievementProgress({ ...a, completed: true }, ZERO).ratio).toBe(1);
  });

  it('counts completed entries', () => {
    const list = [createAchievement(GOLD_GOAL), { ...createAchievement(RATE_GOAL), completed: true }];
    expect(countCompleted(list)).toBe(1);
  });
});
