#!/usr/bin/env tsx
/**
 * Terminal Gold Mine — Smoke Test
 *
 * Plays a headless session on a simulated clock:
 * - 100 ms ticks
 * - a click on every tick the cooldown allows
 * - auto-buying the cheapest affordable upgrade in either shop
 *
 * Run with: npm run smoke
 */
import type { GameState, UpgradeKind } from '../src/core/types.js';
import { createInitialState } from '../src/state/gameState.js';
import { applyEvent, type UserAction } from '../src/session/events.js';
import { visibleUpgrades } from '../src/state/actions.js';
import { canAfford, upgradeCost } from '../src/core/ledger.js';
import { formatNumber } from '../src/ui/format.js';
import { DEFAULT_CONFIG } from '../src/config.js';

const SIMULATED_SECONDS = 30 * 60;
const TICK_MS = DEFAULT_CONFIG.tickIntervalMs;

function milestone(elapsedMs: number, msg: string): void {
  const secs = String(Math.floor(elapsedMs / 1000)).padStart(5);
  console.log(`[${secs}s] ★ ${msg}`);
}

function act(state: GameState, action: UserAction, nowMs: number): GameState {
  return applyEvent(state, { type: 'action', action, nowMs }).state;
}

// ─── Auto-buy logic ────────────────────────────────────────────────────────

/** Walk the cursor to the cheapest affordable upgrade of one kind and buy it. */
function autoBuy(state: GameState, kind: UpgradeKind, nowMs: number): { state: GameState; bought: string | null } {
  let s = act(state, { type: 'switchView', view: kind }, nowMs);
  const list = visibleUpgrades(s);

  let best = -1;
  list.forEach((u, i) => {
    if (!canAfford(u, s.gold)) return;
    if (best === -1 || upgradeCost(u) < upgradeCost(list[best])) best = i;
  });
  if (best === -1) return { state: s, bought: null };

  while (s.selectedIndex > best) s = act(s, { type: 'moveUp' }, nowMs);
  while (s.selectedIndex < best) s = act(s, { type: 'moveDown' }, nowMs);

  const name = list[best].name;
  const cost = upgradeCost(list[best]);
  const next = act(s, { type: 'buy' }, nowMs);
  return next === s ? { state: s, bought: null } : { state: next, bought: `${name} for ${formatNumber(cost)}` };
}

// ─── Main smoke run ────────────────────────────────────────────────────────

function runSmoke(): void {
  console.log('╔══════════════════════════════════════════════════════╗');
  console.log('║   TERMINAL GOLD MINE — SMOKE TEST                    ║');
  console.log('╚══════════════════════════════════════════════════════╝\n');

  const startMs = 0;
  let state = createInitialState({ nowMs: startMs });
  let boughtCount = 0;

  for (let nowMs = startMs + TICK_MS; nowMs <= startMs + SIMULATED_SECONDS * 1000; nowMs += TICK_MS) {
    const before = state;
    state = applyEvent(state, { type: 'tick', nowMs }).state;
    state = act(state, { type: 'click' }, nowMs);

    for (const kind of ['passive', 'click'] as const) {
      const { state: afterBuy, bought } = autoBuy(state, kind, nowMs);
      state = afterBuy;
      if (bought) {
        boughtCount++;
        if (boughtCount <= 10 || boughtCount % 25 === 0) {
          milestone(nowMs - startMs, `Bought #${boughtCount} → ${bought}`);
        }
      }
    }

    state.achievements.forEach((a, i) => {
      if (a.completed && !before.achievements[i].completed) {
        milestone(nowMs - startMs, `ACHIEVEMENT: ${a.name} (${a.description})`);
      }
    });

    if (state.gold < 0 || state.totalGoldEarned < before.totalGoldEarned) {
      console.error(`\n  ✗ SMOKE FAIL: invariant broken at ${nowMs} ms`);
      process.exit(1);
    }
  }

  const completed = state.achievements.filter((a) => a.completed).length;

  console.log('\n' + '═'.repeat(56));
  console.log('  SMOKE TEST COMPLETE');
  console.log('═'.repeat(56));
  console.log(`  Ticks simulated   : ${state.tickCount}`);
  console.log(`  Gold              : ${formatNumber(state.gold)}`);
  console.log(`  Total gold earned : ${formatNumber(state.totalGoldEarned)}`);
  console.log(`  Gold per second   : ${formatNumber(state.goldPerSecond)}`);
  console.log(`  Click power       : ${formatNumber(state.clickPower)}`);
  console.log(`  Clicks            : ${state.totalClicks}`);
  console.log(`  Upgrades bought   : ${state.totalUpgradesPurchased}`);
  console.log(`  Achievements      : ${completed}/${state.achievements.length}`);

  if (completed === 0) {
    console.error('\n  ✗ SMOKE FAIL: No achievement was reached!');
    process.exit(1);
  }
  console.log('\n  ✓ All checks held. Smoke test PASSED.');
}

runSmoke();
