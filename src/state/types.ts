/**
 * TypeScript interfaces and types for the todo state engine
 */

export type TaskId = number;
export type ProjectId = number;
export type Priority = 'low' | 'medium' | 'high';

export const PRIORITIES: readonly Priority[] = ['low', 'medium', 'high'];
export const DEFAULT_PROJECT = 'Inbox';

/**
 * Task record as stored by the persistence collaborator
 */
export interface Task {
  id: TaskId;
  title: string;
  description: string;
  completed: boolean;
  priority: Priority;
  createdAt: string;
  modifiedAt: string;
  dueDate: string | null;
  projectId: ProjectId;
  projectName: string;
}

/**
 * Task added through the store but not yet given an id by the collaborator.
 * It is replaced by the persisted record on the next load.
 */
export interface PendingTask
  extends Omit<Task, 'id' | 'createdAt' | 'modifiedAt' | 'projectId'> {
  id: null;
  createdAt: null;
  modifiedAt: null;
  projectId: null;
}

export type TaskEntry = Task | PendingTask;

/**
 * Fields accepted when creating a task
 */
export interface TaskDraft {
  title: string;
  description?: string;
  priority?: Priority;
  dueDate?: string | null;
  project?: string;
}

/**
 * Fields merged into an existing task
 */
export type TaskPatch = Partial<
  Pick<
    Task,
    'title' | 'description' | 'completed' | 'priority' | 'dueDate' | 'projectName'
  >
>;

export interface AppState {
  readonly tasks: readonly TaskEntry[];
  readonly currentTaskId: TaskId | null;
  readonly theme: string;
  readonly loading: boolean;
  readonly error: string | null;
}

export const Effects = {
  LOAD_TASKS: 'LOAD_TASKS',
  SAVE_TASKS: 'SAVE_TASKS',
  TOGGLE_COMPLETION: 'TOGGLE_COMPLETION',
} as const;

export type SaveOperation =
  | { operation: 'add'; draft: TaskDraft }
  | { operation: 'update'; taskId: TaskId; fields: TaskPatch }
  | { operation: 'delete'; taskId: TaskId };

/**
 * Data-only instruction for the effect runner, produced by the reducer
 */
export type Effect =
  | { kind: typeof Effects.LOAD_TASKS }
  | { kind: typeof Effects.SAVE_TASKS; params: SaveOperation }
  | { kind: typeof Effects.TOGGLE_COMPLETION; params: { taskId: TaskId } };

export type TaskFilter = 'all' | 'active' | 'completed';
