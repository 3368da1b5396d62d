import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import * as readline from 'node:readline';
import { decodeKeypress } from '../src/session/keys.js';
import type { UserAction } from '../src/session/events.js';

/** Push raw terminal bytes through readline's keypress decoder, as the CLI does. */
async function decodeBytes(bytes: string): Promise<(UserAction | null)[]> {
  const stream = new PassThrough();
  readline.emitKeypressEvents(stream);
  const actions: (UserAction | null)[] = [];
  stream.on('keypress', (str: string | undefined, key: readline.Key | undefined) => {
    actions.push(decodeKeypress(str, key));
  });
  stream.write(bytes);
  await new Promise((resolve) => setImmediate(resolve));
  return actions;
}

describe('decodeKeypress', () => {
  it('maps the key table', () => {
    expect(decodeKeypress(' ', { sequence: ' ', name: 'space' })).toEqual({ type: 'click' });
    expect(decodeKeypress('\r', { sequence: '\r', name: 'return' })).toEqual({ type: 'buy' });
    expect(decodeKeypress(undefined, { sequence: '\x1b[A', name: 'up' })).toEqual({ type: 'moveUp' });
    expect(decodeKeypress(undefined, { sequence: '\x1b[B', name: 'down' })).toEqual({ type: 'moveDown' });
    expect(decodeKeypress('h', { sequence: 'h', name: 'h' })).toEqual({ type: 'toggleHelp' });
    expect(decodeKeypress('q', { sequence: 'q', name: 'q' })).toEqual({ type: 'quit' });
    expect(decodeKeypress('3', { sequence: '3', name: '3' })).toEqual({
      type: 'switchView',
      view: 'achievements',
    });
  });

  it('treats shifted letters like plain ones', () => {
    expect(decodeKeypress('Q', { sequence: 'Q', name: 'q', shift: true })).toEqual({ type: 'quit' });
  });

  it('quits on ctrl+c and ignores other chords', () => {
    expect(decodeKeypress('\x03', { sequence: '\x03', name: 'c', ctrl: true })).toEqual({ type: 'quit' });
    expect(decodeKeypress('\x08', { sequence: '\x08', name: 'h', ctrl: true })).toBeNull();
  });

  it('returns null for unbound keys', () => {
    expect(decodeKeypress('x', { sequence: 'x', name: 'x' })).toBeNull();
    expect(decodeKeypress(undefined, undefined)).toBeNull();
  });

  it('falls back to the raw character when readline gives no key', () => {
    expect(decodeKeypress(' ', undefined)).toEqual({ type: 'click' });
    expect(decodeKeypress('2', undefined)).toEqual({ type: 'switchView', view: 'click' });
  });
});

describe('decodeKeypress through readline', () => {
  it('dispatches one action per key in a burst of input', async () => {
    expect(await decodeBytes('3 \r\x1b[A\x1b[Bqx')).toEqual([
      { type: 'switchView', view: 'achievements' },
      { type: 'click' },
      { type: 'buy' },
      { type: 'moveUp' },
      { type: 'moveDown' },
      { type: 'quit' },
      null,
    ]);
  });

  it('quits on a raw ctrl+c byte', async () => {
    expect(await decodeBytes('\x03')).toEqual([{ type: 'quit' }]);
  });
});
