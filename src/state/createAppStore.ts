import type winston from 'winston';

import { errorMessage } from '../lib/errors';
import type { TaskPersistence } from '../persistence/types';

import { Store } from './Store';
import { setError } from './actions';
import { createTaskEffects } from './effects';
import { appReducer, createInitialState } from './reducers';
import type { AppState, Effect } from './types';

export type AppStore = Store<AppState, Effect>;

export interface AppStoreOptions {
  persistence: TaskPersistence;
  logger: winston.Logger;
  initialState?: Partial<AppState>;
}

// Effect failures surface through AppState.error
export const createAppStore = ({
  persistence,
  logger,
  initialState,
}: AppStoreOptions): AppStore =>
  new Store<AppState, Effect>({
    reducer: appReducer,
    initialState: createInitialState(initialState),
    runEffect: createTaskEffects(persistence, logger),
    onEffectError: err => setError(errorMessage(err)),
    logger,
  });
