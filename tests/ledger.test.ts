import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  upgradeCost,
  upgradeProduction,
  canAfford,
  purchaseUpgrade,
  totalSpend,
  productionByKind,
} from '../src/core/ledger.js';
import { createUpgrade } from '../src/state/gameState.js';
import { PICK, GLOVES, CART } from './fixtures.js';

describe('upgrade ledger', () => {
  it('costs base cost at zero owned', () => {
    expect(upgradeCost(createUpgrade(PICK))).toBe(10);
  });

  it('grows cost geometrically with owned', () => {
    const u = { ...createUpgrade(PICK), owned: 2 };
    expect(upgradeCost(u)).toBeCloseTo(13.225, 10);
  });

  it('cost is strictly increasing in owned', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0.01, max: 1e6, noNaN: true }),
        fc.double({ min: 1.01, max: 3, noNaN: true }),
        fc.integer({ min: 0, max: 60 }),
        (baseCost, costMultiplier, owned) => {
          const u = { ...createUpgrade(PICK), baseCost, costMultiplier, owned };
          expect(upgradeCost({ ...u, owned: owned + 1 })).toBeGreaterThan(upgradeCost(u));
        },
      ),
      { numRuns: 200, seed: 4242 },
    );
  });

  it('production is linear in owned', () => {
    expect(upgradeProduction(createUpgrade(CART))).toBe(0);
    expect(upgradeProduction({ ...createUpgrade(CART), owned: 7 })).toBe(7);
  });

  it('canAfford compares balance against current cost inclusively', () => {
    const u = createUpgrade(PICK);
    expect(canAfford(u, 10)).toBe(true);
    expect(canAfford(u, 9.99)).toBe(false);
  });

  it('purchase returns the pre-increment cost and does not touch the input', () => {
    const u = { ...createUpgrade(GLOVES), owned: 1 };
    const { upgrade, cost } = purchaseUpgrade(u);
    expect(cost).toBeCloseTo(30, 10);
    expect(upgrade.owned).toBe(2);
    expect(u.owned).toBe(1);
  });

  it('n purchases from zero spend the geometric series total', () => {
    let u = createUpgrade(PICK);
    let spent = 0;
    for (let i = 0; i < 12; i++) {
      const result = purchaseUpgrade(u);
      u = result.upgrade;
      spent += result.cost;
    }
    expect(u.owned).toBe(12);
    expect(spent).toBeCloseTo(totalSpend(10, 1.15, 12), 8);
    expect(totalSpend(10, 2, 3)).toBe(70);
  });

  it('sums production per kind', () => {
    const upgrades = [
      { ...createUpgrade(PICK), owned: 5 },
      { ...createUpgrade(CART), owned: 2 },
      { ...createUpgrade(GLOVES), owned: 3 },
    ];
    expect(productionByKind(upgrades, 'passive')).toBeCloseTo(2.5, 10);
    expect(productionByKind(upgrades, 'click')).toBe(3);
    expect(productionByKind([], 'click')).toBe(0);
  });
});
