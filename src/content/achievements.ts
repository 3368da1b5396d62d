import type { AchievementDefinition } from '../core/types.js';
import { parseAchievementCatalog } from './schema.js';

export const ACHIEVEMENT_DEFINITIONS: readonly AchievementDefinition[] = parseAchievementCatalog([
  {
    id: 'first_steps',
    name: 'First Steps',
    description: 'Earn 100 total gold',
    goal: { kind: 'totalGold', target: 100 },
  },
  {
    id: 'getting_rich',
    name: 'Getting Rich',
    description: 'Earn 10,000 total gold',
    goal: { kind: 'totalGold', target: 10_000 },
  },
  {
    id: 'millionaire',
    name: 'Millionaire',
    description: 'Earn 1,000,000 total gold',
    goal: { kind: 'totalGold', target: 1_000_000 },
  },
  {
    id: 'passive_income',
    name: 'Passive Income',
    description: 'Reach 10 gold per second',
    goal: { kind: 'goldPerSecond', target: 10 },
  },
  {
    id: 'gold_rush',
    name: 'Gold Rush',
    description: 'Reach 100 gold per second',
    goal: { kind: 'goldPerSecond', target: 100 },
  },
  {
    id: 'click_master',
    name: 'Click Master',
    description: 'Click 1,000 times',
    goal: { kind: 'totalClicks', target: 1000 },
  },
  {
    id: 'power_clicker',
    name: 'Power Clicker',
    description: 'Reach 50 gold per click',
    goal: { kind: 'clickPower', target: 50 },
  },
  {
    id: 'upgrade_collector',
    name: 'Upgrade Collector',
    description: 'Purchase 50 upgrades',
    goal: { kind: 'upgradesPurchased', target: 50 },
  },
]);
