// ─── Shared type definitions ───────────────────────────────────────────────

export type UpgradeKind = 'passive' | 'click';
export type View = 'passive' | 'click' | 'achievements';

export const VIEWS: readonly View[] = ['passive', 'click', 'achievements'];

export interface UpgradeDefinition {
  id: string;
  name: string;
  description: string;
  kind: UpgradeKind;
  baseCost: number;
  /** Exponential cost growth factor per owned unit */
  costMultiplier: number;
  /** Gold/sec (passive) or gold/click (click) per owned unit */
  baseProduction: number;
}

export interface UpgradeState extends UpgradeDefinition {
  owned: number;
}

/** What an achievement tracks, carrying its own target. */
export type AchievementGoal =
  | { kind: 'totalGold'; target: number }
  | { kind: 'goldPerSecond'; target: number }
  | { kind: 'totalClicks'; target: number }
  | { kind: 'clickPower'; target: number }
  | { kind: 'upgradesPurchased'; target: number };

export type AchievementGoalKind = AchievementGoal['kind'];

export interface AchievementDefinition {
  id: string;
  name: string;
  description: string;
  goal: AchievementGoal;
}

export interface AchievementState extends AchievementDefinition {
  /** Latches true once reached; never reverts */
  completed: boolean;
}

export interface GameState {
  /** Spendable balance; never negative */
  gold: number;
  /** Derived each tick from passive upgrades */
  goldPerSecond: number;
  /** Derived each tick: 1 + click upgrade production */
  clickPower: number;
  /** Never debited */
  totalGoldEarned: number;
  totalClicks: number;
  totalUpgradesPurchased: number;
  upgrades: UpgradeState[];
  achievements: AchievementState[];
  selectedIndex: number;
  currentView: View;
  showHelp: boolean;
  /** Unix-ms timestamp of the last processed tick */
  lastUpdateMs: number;
  /** Unix-ms timestamp of the last click that paid out */
  lastClickMs: number;
  clickCooldownMs: number;
  tickCount: number;
}
