#!/usr/bin/env node
/**
 * Terminal Gold Mine — interactive terminal client
 * Run with: npm start  (or  tsx src/ui/cli.ts)
 */
import * as readline from 'node:readline';
import { stdin as input, stdout as output } from 'node:process';
import { resolveConfig } from '../config.js';
import { GameSession } from '../session/session.js';
import { decodeKeypress } from '../session/keys.js';
import type { GameSnapshot } from '../state/snapshot.js';
import { renderFrame } from './render.js';
import { formatNumber } from './format.js';

// ─── Terminal control ──────────────────────────────────────────────────────

const ENTER_ALT_SCREEN = '\x1b[?1049h';
const LEAVE_ALT_SCREEN = '\x1b[?1049l';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CURSOR_HOME = '\x1b[H';
const CLEAR_LINE_END = '\x1b[K';
const CLEAR_BELOW = '\x1b[J';

function draw(snapshot: GameSnapshot): void {
  const frame = renderFrame(snapshot, { color: true, rows: output.rows });
  output.write(CURSOR_HOME + frame.map((line) => line + CLEAR_LINE_END).join('\r\n') + CLEAR_BELOW);
}

function enterTerminal(): void {
  readline.emitKeypressEvents(input);
  input.setRawMode(true);
  output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
}

function restoreTerminal(): void {
  if (input.isTTY) input.setRawMode(false);
  output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
  input.pause();
}

// ─── Main loop ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  if (!input.isTTY || !output.isTTY) {
    console.error('[GoldMine] An interactive terminal is required (stdin/stdout must be a TTY).');
    process.exitCode = 1;
    return;
  }

  const session = new GameSession({ config: resolveConfig(), render: draw });

  const onKeypress = (str: string | undefined, key: readline.Key | undefined): void => {
    const action = decodeKeypress(str, key);
    if (action) session.pushAction(action);
  };
  const onSignal = (): void => session.pushAction({ type: 'quit' });
  const onResize = (): void => draw(session.snapshot());

  enterTerminal();
  input.on('keypress', onKeypress);
  output.on('resize', onResize);
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const final = await session.run();
    restoreTerminal();
    console.log(
      `[GoldMine] Mined ${formatNumber(final.totalGoldEarned)} gold over ${final.totalClicks} clicks ` +
        `and ${final.totalUpgradesPurchased} upgrades. Goodbye, miner.`,
    );
  } finally {
    session.stop();
    input.off('keypress', onKeypress);
    output.off('resize', onResize);
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    if (input.isRaw) restoreTerminal();
  }
}

main().catch((err: unknown) => {
  console.error('[GoldMine] Fatal terminal error:', err);
  process.exitCode = 1;
});
