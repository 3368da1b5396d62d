import type { GameState } from '../core/types.js';
import { DEFAULT_CONFIG, type GameConfig } from '../config.js';
import { createInitialState } from '../state/gameState.js';
import { buildSnapshot, type GameSnapshot } from '../state/snapshot.js';
import { applyEvent, type SessionEvent, type UserAction } from './events.js';

// ─── Session driver ────────────────────────────────────────────────────────

export interface GameSessionOptions {
  config?: GameConfig;
  /** Starting state; a fresh game by default */
  state?: GameState;
  /** Wall clock in ms */
  now?: () => number;
  /** Called with a fresh snapshot on start and after every handled event */
  render?: (snapshot: GameSnapshot) => void;
}

/**
 * Owns the running game. A fixed-period timer and the input source both feed
 * one FIFO queue; a single drain loop applies events in arrival order, one at
 * a time, and redraws after each. `setInterval` drops fires it missed while
 * the loop was busy, and each tick accrues for the real time elapsed since the
 * last one, so a slow frame never causes a burst of catch-up ticks.
 */
export class GameSession {
  private state: GameState;
  private readonly config: GameConfig;
  private readonly now: () => number;
  private readonly render: (snapshot: GameSnapshot) => void;

  private readonly queue: SessionEvent[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;
  private draining = false;
  private finished = false;
  private settle: { resolve: (state: GameState) => void; reject: (err: unknown) => void } | null =
    null;

  constructor(options: GameSessionOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.now = options.now ?? Date.now;
    this.render = options.render ?? (() => undefined);
    this.state =
      options.state ??
      createInitialState({ nowMs: this.now(), clickCooldownMs: this.config.clickCooldownMs });
  }

  get current(): GameState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  snapshot(): GameSnapshot {
    return buildSnapshot(this.state);
  }

  /**
   * Start ticking and resolve with the final state once a quit action has
   * been handled or `stop()` is called. Rejects if rendering throws.
   */
  run(): Promise<GameState> {
    if (this.settle) return Promise.reject(new Error('Session is already running'));
    if (this.finished) return Promise.reject(new Error('Session has already finished'));

    return new Promise<GameState>((resolve, reject) => {
      this.settle = { resolve, reject };
      try {
        this.render(this.snapshot());
      } catch (err) {
        this.fail(err);
        return;
      }
      this.timer = setInterval(() => this.onTimer(), this.config.tickIntervalMs);
    });
  }

  /** Feed one decoded player action into the queue. */
  pushAction(action: UserAction): void {
    this.enqueue({ type: 'action', action, nowMs: this.now() });
  }

  /** End the session; a pending `run()` resolves with the current state. */
  stop(): void {
    if (!this.finished) this.finish();
  }

  private onTimer(): void {
    this.enqueue({ type: 'tick', nowMs: this.now() });
  }

  private enqueue(event: SessionEvent): void {
    if (this.finished) return;
    this.queue.push(event);
    this.drain();
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      let event = this.queue.shift();
      while (event && !this.finished) {
        const result = applyEvent(this.state, event);
        this.state = result.state;
        if (result.quit) {
          this.finish();
          break;
        }
        this.render(this.snapshot());
        event = this.queue.shift();
      }
    } catch (err) {
      this.fail(err);
    } finally {
      this.draining = false;
    }
  }

  private finish(): void {
    this.halt();
    this.settle?.resolve(this.state);
    this.settle = null;
  }

  private fail(err: unknown): void {
    this.halt();
    this.settle?.reject(err);
    this.settle = null;
  }

  private halt(): void {
    this.finished = true;
    this.queue.length = 0;
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
