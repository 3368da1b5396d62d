import type {
  AchievementDefinition,
  AchievementState,
  GameState,
  UpgradeDefinition,
  UpgradeState,
} from '../core/types.js';
import { UPGRADE_DEFINITIONS } from '../content/upgrades.js';
import { ACHIEVEMENT_DEFINITIONS } from '../content/achievements.js';
import { DEFAULT_CONFIG } from '../config.js';

// ─── Initial state ──────────────────────────────────────────────────────────

export interface InitialStateOptions {
  nowMs?: number;
  clickCooldownMs?: number;
  upgrades?: readonly UpgradeDefinition[];
  achievements?: readonly AchievementDefinition[];
}

export function createInitialState(options: InitialStateOptions = {}): GameState {
  const nowMs = options.nowMs ?? Date.now();
  const clickCooldownMs = options.clickCooldownMs ?? DEFAULT_CONFIG.clickCooldownMs;
  return {
    gold: 0,
    goldPerSecond: 0,
    clickPower: 1,
    totalGoldEarned: 0,
    totalClicks: 0,
    totalUpgradesPurchased: 0,
    upgrades: (options.upgrades ?? UPGRADE_DEFINITIONS).map(createUpgrade),
    achievements: (options.achievements ?? ACHIEVEMENT_DEFINITIONS).map(createAchievement),
    selectedIndex: 0,
    currentView: 'passive',
    showHelp: false,
    lastUpdateMs: nowMs,
    // Backdated so the very first click is never on cooldown
    lastClickMs: nowMs - Math.max(1000, clickCooldownMs),
    clickCooldownMs,
    tickCount: 0,
  };
}

export function createUpgrade(def: UpgradeDefinition): UpgradeState {
  return { ...def, owned: 0 };
}

export function createAchievement(def: AchievementDefinition): AchievementState {
  return { ...def, goal: { ...def.goal }, completed: false };
}
