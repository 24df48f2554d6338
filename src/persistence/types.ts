/**
 * Contract of the persistence collaborator used by the effect runner
 */

import type { ErrorCode } from '../lib/errors';
import type {
  Priority,
  Task,
  TaskDraft,
  TaskId,
  TaskPatch,
} from '../state/types';

export interface TaskFailure {
  error: string;
  code: Exclude<ErrorCode, 'disposed'>;
}

export type TaskResult = Task | TaskFailure;

export interface SearchFilters {
  query?: string;
  priority?: Priority | string;
  completed?: boolean;
}

export interface TaskPersistence {
  /**
   * All tasks; empty when nothing is stored
   */
  load(): Promise<Task[]>;
  addTask(draft: TaskDraft): Promise<TaskResult>;
  updateTask(taskId: TaskId, fields: TaskPatch): Promise<TaskResult>;
  deleteTask(taskId: TaskId): Promise<boolean>;
  toggleCompletion(taskId: TaskId): Promise<TaskResult>;
  searchTasks(filters?: SearchFilters): Promise<Task[]>;
}

export const isTaskFailure = (result: TaskResult): result is TaskFailure =>
  'error' in result;
