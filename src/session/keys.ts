import type { UserAction } from './events.js';

// ─── Key table ─────────────────────────────────────────────────────────────

/** Shape of the `key` argument of readline's `keypress` event. */
export interface KeypressInfo {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

const KEY_ACTIONS = new Map<string, UserAction>([
  ['q', { type: 'quit' }],
  ['space', { type: 'click' }],
  ['return', { type: 'buy' }],
  ['enter', { type: 'buy' }],
  ['up', { type: 'moveUp' }],
  ['k', { type: 'moveUp' }],
  ['down', { type: 'moveDown' }],
  ['j', { type: 'moveDown' }],
  ['h', { type: 'toggleHelp' }],
  ['1', { type: 'switchView', view: 'passive' }],
  ['2', { type: 'switchView', view: 'click' }],
  ['3', { type: 'switchView', view: 'achievements' }],
]);

/**
 * Map one keypress to a player action.
 * Returns null for unbound keys and for ctrl/meta chords other than ctrl+c.
 */
export function decodeKeypress(
  sequence: string | undefined,
  key: KeypressInfo | undefined,
): UserAction | null {
  if (key?.ctrl && key.name === 'c') return { type: 'quit' };
  if (key?.ctrl || key?.meta) return null;

  const name = key?.name ?? (sequence === ' ' ? 'space' : sequence?.toLowerCase());
  if (name === undefined) return null;
  return KEY_ACTIONS.get(name) ?? null;
}
