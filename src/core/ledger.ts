import type { UpgradeKind, UpgradeState } from './types.js';

// ─── Per-upgrade economics ─────────────────────────────────────────────────

export function upgradeCost(upgrade: UpgradeState): number {
  return upgrade.baseCost * Math.pow(upgrade.costMultiplier, upgrade.owned);
}

export function upgradeProduction(upgrade: UpgradeState): number {
  return upgrade.baseProduction * upgrade.owned;
}

export function canAfford(upgrade: UpgradeState, balance: number): boolean {
  return balance >= upgradeCost(upgrade);
}

/**
 * Take one more unit of an upgrade.
 * Returns the bumped copy and the cost that applied before the bump.
 * Performs no affordability check; callers gate on `canAfford` first.
 */
export function purchaseUpgrade(upgrade: UpgradeState): { upgrade: UpgradeState; cost: number } {
  const cost = upgradeCost(upgrade);
  return { upgrade: { ...upgrade, owned: upgrade.owned + 1 }, cost };
}

/** Cumulative gold spent on the first `count` units (geometric series). */
export function totalSpend(baseCost: number, costMultiplier: number, count: number): number {
  return (baseCost * (Math.pow(costMultiplier, count) - 1)) / (costMultiplier - 1);
}

export function productionByKind(upgrades: readonly UpgradeState[], kind: UpgradeKind): number {
  return upgrades
    .filter((u) => u.kind === kind)
    .reduce((sum, u) => sum + upgradeProduction(u), 0);
}
