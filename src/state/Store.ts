/**
 * Mini Store implementation (Redux-like pattern with effects)
 *
 * Every dispatch is queued: one reduce + commit + notify cycle completes
 * before the next one starts. Effects run outside the queue and their
 * follow-up dispatches are queued like any other.
 *
 * @example
 * const store = new Store({ reducer, initialState, runEffect });
 * const unsubscribe = store.subscribe((previous, next) => render(next));
 * await store.dispatch(loadTasks());
 * await store.settled();
 */

import pLimit from 'p-limit';
import winston from 'winston';

import { StoreDisposedError, errorMessage } from '../lib/errors';

export interface Action {
  type: string;
  payload?: unknown;
}

export type Listener<S> = (previous: S, next: S) => void;
export type Dispatch = (action: Action) => Promise<void>;
export type Reducer<S, E> = (state: S, action: Action) => [S, E | null];
export type EffectRunner<E> = (effect: E, dispatch: Dispatch) => Promise<void>;

export interface Subscribable<S> {
  getState(): S;
  subscribe(listener: Listener<S>): () => void;
}

export interface StoreOptions<S, E> {
  reducer: Reducer<S, E>;
  initialState: S;
  runEffect?: EffectRunner<E>;
  /**
   * Maps a failed effect to an action to dispatch (or null to only log it)
   */
  onEffectError?: (error: unknown, effect: E) => Action | null;
  logger?: winston.Logger;
}

export class Store<S, E = never> implements Subscribable<S> {
  private current: S;
  private reducer: Reducer<S, E>;
  private runEffect?: EffectRunner<E>;
  private onEffectError?: (error: unknown, effect: E) => Action | null;
  private logger: winston.Logger;
  private listeners: Set<Listener<S>> = new Set();
  private queue = pLimit(1);
  private inFlight: Set<Promise<void>> = new Set();
  private disposed = false;

  constructor(options: StoreOptions<S, E>) {
    this.reducer = options.reducer;
    this.current = options.initialState;
    this.runEffect = options.runEffect;
    this.onEffectError = options.onEffectError;
    this.logger = options.logger ?? winston.createLogger({ silent: true });
  }

  get state(): S {
    return this.current;
  }

  getState(): S {
    return this.current;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  dispatch(action: Action): Promise<void> {
    if (this.disposed) {
      return Promise.reject(
        new StoreDisposedError(`Cannot dispatch ${action.type}: store disposed`)
      );
    }
    return this.enqueue(action);
  }

  subscribe(listener: Listener<S>): () => void {
    this.listeners.add(listener);
    // Return unsubscribe function
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once no dispatch is queued and no effect is running,
   * including effects started by follow-up dispatches
   */
  async settled(): Promise<void> {
    do {
      // Wait for every cycle queued so far, then for the effects they started
      await this.queue(() => undefined);
      await Promise.all([...this.inFlight]);
    } while (
      this.inFlight.size > 0 ||
      this.queue.activeCount > 0 ||
      this.queue.pendingCount > 0
    );
  }

  /**
   * Stop accepting dispatches, drop listeners and wait for running effects
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.listeners.clear();
    await this.settled();
  }

  // Used by effects: follow-ups arriving after dispose are dropped
  private followUp = (action: Action): Promise<void> => {
    if (this.disposed) {
      this.logger.debug(`Dropping ${action.type} dispatched after dispose`);
      return Promise.resolve();
    }
    return this.enqueue(action);
  };

  private enqueue(action: Action): Promise<void> {
    return this.queue(() => this.commit(action));
  }

  private commit(action: Action): void {
    const previous = this.current;
    const [next, effect] = this.reducer(previous, action);
    this.current = next;
    this.logger.debug(
      `Dispatched ${action.type}${effect !== null ? ' (with effect)' : ''}`
    );

    for (const listener of [...this.listeners]) {
      try {
        listener(previous, next);
      } catch (err) {
        this.logger.error(
          `Listener failed after ${action.type}: ${errorMessage(err)}`
        );
      }
    }

    if (effect !== null) this.schedule(effect);
  }

  private schedule(effect: E): void {
    const runner = this.runEffect;
    if (!runner) {
      this.logger.warn('Effect produced but no effect runner configured');
      return;
    }
    const run: Promise<void> = Promise.resolve()
      .then(() => runner(effect, this.followUp))
      .catch((err: unknown) => this.recover(err, effect))
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  private async recover(err: unknown, effect: E): Promise<void> {
    this.logger.error(`Effect failed: ${errorMessage(err)}`);
    if (!this.onEffectError) return;
    try {
      const action = this.onEffectError(err, effect);
      if (action) await this.followUp(action);
    } catch (e) {
      this.logger.error(`Effect error handler failed: ${errorMessage(e)}`);
    }
  }
}
