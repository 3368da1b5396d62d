import type { UpgradeDefinition } from '../core/types.js';
import { parseUpgradeCatalog } from './schema.js';

export const UPGRADE_DEFINITIONS: readonly UpgradeDefinition[] = parseUpgradeCatalog([
  // ── Passive upgrades ───────────────────────────────────────────────────
  {
    id: 'pickaxe',
    name: 'Pickaxe',
    description: 'Basic mining tool (+0.1 gold/sec)',
    kind: 'passive',
    baseCost: 10,
    costMultiplier: 1.15,
    baseProduction: 0.1,
  },
  {
    id: 'shovel',
    name: 'Shovel',
    description: 'Dig faster (+0.5 gold/sec)',
    kind: 'passive',
    baseCost: 50,
    costMultiplier: 1.15,
    baseProduction: 0.5,
  },
  {
    id: 'drill',
    name: 'Drill',
    description: 'Mechanical mining (+2.0 gold/sec)',
    kind: 'passive',
    baseCost: 250,
    costMultiplier: 1.15,
    baseProduction: 2,
  },
  {
    id: 'excavator',
    name: 'Excavator',
    description: 'Heavy machinery (+8.0 gold/sec)',
    kind: 'passive',
    baseCost: 1000,
    costMultiplier: 1.15,
    baseProduction: 8,
  },
  {
    id: 'mine_shaft',
    name: 'Mine Shaft',
    description: 'Deep mining operation (+30.0 gold/sec)',
    kind: 'passive',
    baseCost: 5000,
    costMultiplier: 1.15,
    baseProduction: 30,
  },
  {
    id: 'gold_factory',
    name: 'Gold Factory',
    description: 'Automated gold production (+100.0 gold/sec)',
    kind: 'passive',
    baseCost: 25000,
    costMultiplier: 1.15,
    baseProduction: 100,
  },

  // ── Click upgrades ─────────────────────────────────────────────────────
  {
    id: 'strong_arms',
    name: 'Strong Arms',
    description: 'Better swinging (+1 gold per click)',
    kind: 'click',
    baseCost: 25,
    costMultiplier: 1.2,
    baseProduction: 1,
  },
  {
    id: 'steel_tools',
    name: 'Steel Tools',
    description: 'Sharper equipment (+2 gold per click)',
    kind: 'click',
    baseCost: 100,
    costMultiplier: 1.2,
    baseProduction: 2,
  },
  {
    id: 'power_gloves',
    name: 'Power Gloves',
    description: 'Enhanced grip (+5 gold per click)',
    kind: 'click',
    baseCost: 500,
    costMultiplier: 1.2,
    baseProduction: 5,
  },
  {
    id: 'hydraulic_hammer',
    name: 'Hydraulic Hammer',
    description: 'Mechanized clicking (+10 gold per click)',
    kind: 'click',
    baseCost: 2500,
    costMultiplier: 1.2,
    baseProduction: 10,
  },
  {
    id: 'diamond_drill_bit',
    name: 'Diamond Drill Bit',
    description: 'Ultimate mining power (+25 gold per click)',
    kind: 'click',
    baseCost: 10000,
    costMultiplier: 1.2,
    baseProduction: 25,
  },
]);
