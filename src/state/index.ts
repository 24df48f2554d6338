export * from './types';
export * from './actions';
export { appReducer, createInitialState, initialState } from './reducers';
export type { Reduction } from './reducers';
export * from './selectors';
export { Store } from './Store';
export type {
  Action,
  Dispatch,
  EffectRunner,
  Listener,
  Reducer,
  StoreOptions,
  Subscribable,
} from './Store';
export { createTaskEffects, failureToError } from './effects';
export { connect, Connection } from './connect';
export type { Apply, Selector } from './connect';
export { createAppStore } from './createAppStore';
export type { AppStore, AppStoreOptions } from './createAppStore';
