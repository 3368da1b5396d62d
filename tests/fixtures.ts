import type { AchievementDefinition, GameState, UpgradeDefinition } from '../src/core/types.js';
import { createInitialState } from '../src/state/gameState.js';

export const PICK: UpgradeDefinition = {
  id: 'pick',
  name: 'Pick',
  description: 'Test passive',
  kind: 'passive',
  baseCost: 10,
  costMultiplier: 1.15,
  baseProduction: 0.1,
};

export const CART: UpgradeDefinition = {
  id: 'cart',
  name: 'Cart',
  description: 'Second test passive',
  kind: 'passive',
  baseCost: 40,
  costMultiplier: 1.5,
  baseProduction: 1,
};

export const GLOVES: UpgradeDefinition = {
  id: 'gloves',
  name: 'Gloves',
  description: 'Test click',
  kind: 'click',
  baseCost: 25,
  costMultiplier: 1.2,
  baseProduction: 1,
};

export const RATE_GOAL: AchievementDefinition = {
  id: 'rate_half',
  name: 'Half Rate',
  description: 'Reach 0.5 gold per second',
  goal: { kind: 'goldPerSecond', target: 0.5 },
};

export const GOLD_GOAL: AchievementDefinition = {
  id: 'gold_ten',
  name: 'Ten Gold',
  description: 'Earn 10 total gold',
  goal: { kind: 'totalGold', target: 10 },
};

/** A small game: passives [Pick, Cart], clicks [Gloves], started at t = 0. */
export function testState(overrides: Partial<GameState> = {}): GameState {
  return {
    ...createInitialState({
      nowMs: 0,
      upgrades: [PICK, GLOVES, CART],
      achievements: [RATE_GOAL, GOLD_GOAL],
    }),
    ...overrides,
  };
}

export function withOwned(state: GameState, id: string, owned: number): GameState {
  return {
    ...state,
    upgrades: state.upgrades.map((u) => (u.id === id ? { ...u, owned } : u)),
  };
}
