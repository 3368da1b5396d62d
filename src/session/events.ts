import type { GameState, View } from '../core/types.js';
import { processTick } from '../core/tick.js';
import {
  clickForGold,
  purchaseSelected,
  selectNext,
  selectPrevious,
  switchView,
  toggleHelp,
} from '../state/actions.js';

// ─── Session events ────────────────────────────────────────────────────────

/** Discrete, already-decoded player intents. */
export type UserAction =
  | { type: 'moveUp' }
  | { type: 'moveDown' }
  | { type: 'buy' }
  | { type: 'click' }
  | { type: 'switchView'; view: View }
  | { type: 'toggleHelp' }
  | { type: 'quit' };

export type SessionEvent =
  | { type: 'tick'; nowMs: number }
  | { type: 'action'; action: UserAction; nowMs: number };

export interface EventResult {
  state: GameState;
  quit: boolean;
}

/** Route one event to exactly one engine operation. */
export function applyEvent(state: GameState, event: SessionEvent): EventResult {
  if (event.type === 'tick') {
    return { state: processTick(state, event.nowMs), quit: false };
  }

  const { action, nowMs } = event;
  switch (action.type) {
    case 'moveUp':
      return { state: selectPrevious(state), quit: false };
    case 'moveDown':
      return { state: selectNext(state), quit: false };
    case 'buy':
      return { state: purchaseSelected(state), quit: false };
    case 'click':
      return { state: clickForGold(state, nowMs), quit: false };
    case 'switchView':
      return { state: switchView(state, action.view), quit: false };
    case 'toggleHelp':
      return { state: toggleHelp(state), quit: false };
    case 'quit':
      return { state, quit: true };
  }
}
