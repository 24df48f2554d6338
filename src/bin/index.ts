/**
 * Application context
 * Builds configuration, logger, persistence collaborator and store once, and
 * hands the store to consumers explicitly
 *
 * @example
 * const core = new TodoCore();
 *
 * await core.ready;
 * core.connect(state => state.tasks, tasks => view.render(tasks));
 * // ...
 * await core.dispose();
 */
import type winston from 'winston';

import { loadConfig, type Config } from '../config/args';
import { buildLogger } from '../logger/winston';
import { MemoryTaskStore } from '../persistence/MemoryTaskStore';
import type { TaskPersistence } from '../persistence/types';
import { loadTasks } from '../state/actions';
import {
  connect,
  type Apply,
  type Connection,
  type Selector,
} from '../state/connect';
import { createAppStore, type AppStore } from '../state/createAppStore';
import type { AppState } from '../state/types';

export type { Config };

export interface TodoCoreOptions {
  argv?: string[];
  persistence?: TaskPersistence;
}

/**
 * @class TodoCore
 */
export class TodoCore {
  config: Config;
  logger: winston.Logger;
  persistence: TaskPersistence;
  store: AppStore;
  ready: Promise<void>;
  private connections: Set<{ unmount(): void }> = new Set();

  constructor(options: TodoCoreOptions = {}) {
    this.config = loadConfig(options.argv);
    this.logger = buildLogger(this.config);
    this.persistence =
      options.persistence ??
      new MemoryTaskStore({
        defaultProject: this.config.default_project,
        projects: this.config.project,
        limits: {
          maxTitleLength: this.config.max_title_length,
          maxDescriptionLength: this.config.max_description_length,
        },
      });
    this.store = createAppStore({
      persistence: this.persistence,
      logger: this.logger,
      initialState: { theme: this.config.theme },
    });
    this.ready = this.config.autoload
      ? this.store.dispatch(loadTasks()).then(() => this.store.settled())
      : Promise.resolve();
    this.logger.notice(
      `Todo core started (theme ${this.config.theme}, autoload ${String(this.config.autoload)})`
    );
  }

  /**
   * Bind a consumer to a slice of the state. The binding is mounted now and
   * unmounted on dispose
   */
  connect<T>(
    selector: Selector<AppState, T>,
    apply: Apply<T>
  ): Connection<AppState, T> {
    const connection = connect(this.store, selector, apply);
    connection.mount();
    this.connections.add(connection);
    return connection;
  }

  async dispose(): Promise<void> {
    for (const connection of this.connections) connection.unmount();
    this.connections.clear();
    await this.store.dispose();
    this.logger.notice('Todo core stopped');
  }
}
