import type winston from 'winston';

import { buildLogger } from '../../src/logger/winston';
import type {
  SearchFilters,
  TaskPersistence,
  TaskResult,
} from '../../src/persistence/types';
import type {
  Task,
  TaskDraft,
  TaskId,
  TaskPatch,
} from '../../src/state/types';

export const silentLogger = (): winston.Logger =>
  buildLogger({ log_level: 'debug', logger: 'silent', log_file: '' });

export const makeTask = (id: TaskId, overrides: Partial<Task> = {}): Task => ({
  id,
  title: `Task ${id}`,
  description: '',
  completed: false,
  priority: 'medium',
  createdAt: '2024-01-01T00:00:00.000Z',
  modifiedAt: '2024-01-01T00:00:00.000Z',
  dueDate: null,
  projectId: 1,
  projectName: 'Inbox',
  ...overrides,
});

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

const unsupported = (): Promise<TaskResult> =>
  Promise.resolve({ error: 'Not supported by stub', code: 'persistence' });

/**
 * Persistence double whose answers are set per test
 */
export class StubPersistence implements TaskPersistence {
  calls: string[] = [];
  onLoad: () => Promise<Task[]> = () => Promise.resolve([]);
  onAdd: (draft: TaskDraft) => Promise<TaskResult> = unsupported;
  onUpdate: (taskId: TaskId, fields: TaskPatch) => Promise<TaskResult> =
    unsupported;
  onDelete: (taskId: TaskId) => Promise<boolean> = () => Promise.resolve(true);
  onToggle: (taskId: TaskId) => Promise<TaskResult> = unsupported;

  load(): Promise<Task[]> {
    this.calls.push('load');
    return this.onLoad();
  }

  addTask(draft: TaskDraft): Promise<TaskResult> {
    this.calls.push(`addTask ${draft.title}`);
    return this.onAdd(draft);
  }

  updateTask(taskId: TaskId, fields: TaskPatch): Promise<TaskResult> {
    this.calls.push(`updateTask ${taskId}`);
    return this.onUpdate(taskId, fields);
  }

  deleteTask(taskId: TaskId): Promise<boolean> {
    this.calls.push(`deleteTask ${taskId}`);
    return this.onDelete(taskId);
  }

  toggleCompletion(taskId: TaskId): Promise<TaskResult> {
    this.calls.push(`toggleCompletion ${taskId}`);
    return this.onToggle(taskId);
  }

  searchTasks(filters: SearchFilters = {}): Promise<Task[]> {
    this.calls.push(`searchTasks ${filters.query ?? ''}`);
    return Promise.resolve([]);
  }
}
