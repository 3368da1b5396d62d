import type { GameState, UpgradeState, View } from '../core/types.js';
import { canAfford, purchaseUpgrade } from '../core/ledger.js';

// Every action is total: when its precondition fails it hands back the very
// same state object, so `next === state` means nothing happened.

// ─── Manual mining ─────────────────────────────────────────────────────────

/** Pay out `clickPower` unless the cooldown is still running. */
export function clickForGold(state: GameState, nowMs: number): GameState {
  if (nowMs - state.lastClickMs < state.clickCooldownMs) return state;

  return {
    ...state,
    gold: state.gold + state.clickPower,
    totalGoldEarned: state.totalGoldEarned + state.clickPower,
    totalClicks: state.totalClicks + 1,
    lastClickMs: nowMs,
  };
}

// ─── Lists per view ────────────────────────────────────────────────────────

/** Upgrades shown in the current view, in catalog order. */
export function visibleUpgrades(state: GameState): UpgradeState[] {
  switch (state.currentView) {
    case 'passive':
    case 'click':
      return state.upgrades.filter((u) => u.kind === state.currentView);
    case 'achievements':
      return [];
  }
}

export function activeListLength(state: GameState): number {
  return state.currentView === 'achievements'
    ? state.achievements.length
    : visibleUpgrades(state).length;
}

// ─── Purchasing ────────────────────────────────────────────────────────────

/**
 * Buy the upgrade under the cursor.
 * The cursor indexes the filtered view; the bought entry is located in the
 * master list by id.
 */
export function purchaseSelected(state: GameState): GameState {
  if (state.currentView === 'achievements') return state;

  const selected = visibleUpgrades(state)[state.selectedIndex];
  if (!selected || !canAfford(selected, state.gold)) return state;

  const masterIndex = state.upgrades.findIndex((u) => u.id === selected.id);
  if (masterIndex === -1) return state;

  const { upgrade, cost } = purchaseUpgrade(state.upgrades[masterIndex]);
  return {
    ...state,
    gold: state.gold - cost,
    upgrades: state.upgrades.map((u, i) => (i === masterIndex ? upgrade : u)),
    totalUpgradesPurchased: state.totalUpgradesPurchased + 1,
  };
}

// ─── Selection & navigation ───────────────────────────────────────────────

export function selectNext(state: GameState): GameState {
  const lastIndex = Math.max(0, activeListLength(state) - 1);
  if (state.selectedIndex >= lastIndex) return state;
  return { ...state, selectedIndex: state.selectedIndex + 1 };
}

export function selectPrevious(state: GameState): GameState {
  if (state.selectedIndex <= 0) return state;
  return { ...state, selectedIndex: state.selectedIndex - 1 };
}

/** Switching to another view resets the cursor; re-selecting the current one does nothing. */
export function switchView(state: GameState, view: View): GameState {
  if (state.currentView === view) return state;
  return { ...state, currentView: view, selectedIndex: 0 };
}

export function toggleHelp(state: GameState): GameState {
  return { ...state, showHelp: !state.showHelp };
}
