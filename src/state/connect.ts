/**
 * View binding: keeps a consumer in sync with a slice of the store state
 *
 * The consumer passes a selector and an apply callback; the binding owns the
 * subscription. The selected value is applied on mount and then only when it
 * is not structurally equal to the last applied value.
 *
 * @example
 * const binding = connect(store, state => state.tasks, tasks => list.render(tasks));
 * binding.mount();
 * // ...
 * binding.unmount();
 */

import { isEqual } from 'lodash-es';

import type { Subscribable } from './Store';

export type Selector<S, T> = (state: S) => T;
export type Apply<T> = (value: T, previous: T | undefined) => void;

export class Connection<S, T> {
  private unsubscribe: (() => void) | null = null;
  private hasValue = false;
  private last: T | undefined = undefined;

  constructor(
    private store: Subscribable<S>,
    private selector: Selector<S, T>,
    private apply: Apply<T>
  ) {}

  get mounted(): boolean {
    return this.unsubscribe !== null;
  }

  /**
   * Last value handed to the consumer
   */
  get value(): T | undefined {
    return this.last;
  }

  mount(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.store.subscribe((_previous, next) =>
      this.update(next)
    );
    this.update(this.store.getState());
  }

  unmount(): void {
    if (!this.unsubscribe) return;
    this.unsubscribe();
    this.unsubscribe = null;
  }

  private update(state: S): void {
    const selected = this.selector(state);
    if (this.hasValue && isEqual(selected, this.last)) return;
    const previous = this.last;
    this.last = selected;
    this.hasValue = true;
    this.apply(selected, previous);
  }
}

export const connect = <S, T>(
  store: Subscribable<S>,
  selector: Selector<S, T>,
  apply: Apply<T>
): Connection<S, T> => new Connection(store, selector, apply);
