/**
 * Action types and action creators
 *
 * Creators check the shape of their payload only. Business rules such as
 * title length are enforced by the persistence collaborator.
 */

import { ValidationError } from '../lib/errors';

import type { Action } from './Store';
import {
  PRIORITIES,
  type Priority,
  type Task,
  type TaskDraft,
  type TaskId,
  type TaskPatch,
} from './types';

export const Actions = {
  ADD_TASK: 'ADD_TASK',
  UPDATE_TASK: 'UPDATE_TASK',
  DELETE_TASK: 'DELETE_TASK',
  TOGGLE_COMPLETION: 'TOGGLE_COMPLETION',
  SELECT_TASK: 'SELECT_TASK',
  LOAD_TASKS: 'LOAD_TASKS',
  TASKS_LOADED: 'TASKS_LOADED',
  SET_THEME: 'SET_THEME',
  SET_ERROR: 'SET_ERROR',
  TASK_SAVED: 'TASK_SAVED',
  TASK_DISCARDED: 'TASK_DISCARDED',
} as const;

export type ActionType = (typeof Actions)[keyof typeof Actions];

export type AppAction =
  | { readonly type: typeof Actions.ADD_TASK; readonly payload: TaskDraft }
  | {
      readonly type: typeof Actions.UPDATE_TASK;
      readonly payload: { taskId: TaskId; fields: TaskPatch };
    }
  | { readonly type: typeof Actions.DELETE_TASK; readonly payload: TaskId }
  | { readonly type: typeof Actions.TOGGLE_COMPLETION; readonly payload: TaskId }
  | { readonly type: typeof Actions.SELECT_TASK; readonly payload: TaskId | null }
  | { readonly type: typeof Actions.LOAD_TASKS; readonly payload?: undefined }
  | {
      readonly type: typeof Actions.TASKS_LOADED;
      readonly payload: readonly Task[];
    }
  | { readonly type: typeof Actions.SET_THEME; readonly payload: string }
  | { readonly type: typeof Actions.SET_ERROR; readonly payload: string | null }
  | { readonly type: typeof Actions.TASK_SAVED; readonly payload: Task }
  | { readonly type: typeof Actions.TASK_DISCARDED; readonly payload: TaskDraft };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isTaskId = (value: unknown): value is TaskId =>
  typeof value === 'number' && Number.isInteger(value) && value > 0;

const isDraft = (payload: unknown): boolean =>
  isRecord(payload) && typeof payload.title === 'string';

const isStored = (payload: unknown): boolean =>
  isRecord(payload) && isTaskId(payload.id);

// Minimal payload shape the reducer relies on, per action type
const payloadChecks: Record<ActionType, (payload: unknown) => boolean> = {
  [Actions.ADD_TASK]: isDraft,
  [Actions.UPDATE_TASK]: payload =>
    isRecord(payload) && isTaskId(payload.taskId) && isRecord(payload.fields),
  [Actions.DELETE_TASK]: isTaskId,
  [Actions.TOGGLE_COMPLETION]: isTaskId,
  [Actions.SELECT_TASK]: payload => payload === null || isTaskId(payload),
  [Actions.LOAD_TASKS]: () => true,
  [Actions.TASKS_LOADED]: payload =>
    Array.isArray(payload) && payload.every(isStored),
  [Actions.SET_THEME]: payload => typeof payload === 'string',
  [Actions.SET_ERROR]: payload =>
    payload === null || typeof payload === 'string',
  [Actions.TASK_SAVED]: isStored,
  [Actions.TASK_DISCARDED]: isDraft,
};

const isActionType = (type: string): type is ActionType =>
  Object.hasOwn(payloadChecks, type);

/**
 * Recognizes actions of this vocabulary whose payload has the expected
 * shape. Anything else is left alone by the reducer.
 */
export const isAppAction = (action: Action): action is AppAction =>
  isActionType(action.type) && payloadChecks[action.type](action.payload);

const checkTaskId = (value: unknown, what = 'Task id'): TaskId => {
  if (!isTaskId(value)) {
    throw new ValidationError(`${what} must be a positive integer`);
  }
  return value;
};

const isPriority = (value: unknown): value is Priority =>
  PRIORITIES.some(p => p === value);

const checkOptionalString = (
  key: string,
  value: unknown,
  nullable = false
): void => {
  if (value === undefined || (nullable && value === null)) return;
  if (typeof value !== 'string') {
    throw new ValidationError(`Field ${key} must be a string`);
  }
};

const checkFields = (fields: TaskDraft | TaskPatch): void => {
  if (typeof fields !== 'object' || fields === null) {
    throw new ValidationError('Task fields must be an object');
  }
  if ('title' in fields) checkOptionalString('title', fields.title);
  if ('description' in fields)
    checkOptionalString('description', fields.description);
  if ('dueDate' in fields)
    checkOptionalString('dueDate', fields.dueDate, true);
  if ('priority' in fields && fields.priority !== undefined) {
    if (!isPriority(fields.priority)) {
      throw new ValidationError(
        `Priority must be one of ${PRIORITIES.join(', ')}`
      );
    }
  }
};

const checkDraft = (draft: TaskDraft): void => {
  checkFields(draft);
  if (typeof draft.title !== 'string') {
    throw new ValidationError('Task title is required');
  }
  if (draft.project !== undefined && typeof draft.project !== 'string') {
    throw new ValidationError('Field project must be a string');
  }
};

export const addTask = (draft: TaskDraft): AppAction => {
  checkDraft(draft);
  return Object.freeze({ type: Actions.ADD_TASK, payload: { ...draft } });
};

export const updateTask = (taskId: TaskId, fields: TaskPatch): AppAction => {
  checkTaskId(taskId);
  checkFields(fields);
  if (fields.completed !== undefined && typeof fields.completed !== 'boolean') {
    throw new ValidationError('Field completed must be a boolean');
  }
  return Object.freeze({
    type: Actions.UPDATE_TASK,
    payload: { taskId, fields: { ...fields } },
  });
};

export const deleteTask = (taskId: TaskId): AppAction =>
  Object.freeze({ type: Actions.DELETE_TASK, payload: checkTaskId(taskId) });

export const toggleCompletion = (taskId: TaskId): AppAction =>
  Object.freeze({
    type: Actions.TOGGLE_COMPLETION,
    payload: checkTaskId(taskId),
  });

export const selectTask = (taskId: TaskId | null): AppAction =>
  Object.freeze({
    type: Actions.SELECT_TASK,
    payload: taskId === null ? null : checkTaskId(taskId),
  });

export const loadTasks = (): AppAction =>
  Object.freeze({ type: Actions.LOAD_TASKS });

export const tasksLoaded = (tasks: readonly Task[]): AppAction => {
  const list: unknown = tasks;
  if (!Array.isArray(list)) {
    throw new ValidationError('Loaded tasks must be an array');
  }
  for (const task of tasks) checkTaskId(task.id, 'Loaded task id');
  return Object.freeze({ type: Actions.TASKS_LOADED, payload: [...tasks] });
};

export const setTheme = (theme: string): AppAction => {
  if (typeof theme !== 'string' || theme.trim().length === 0) {
    throw new ValidationError('Theme must be a non-empty string');
  }
  return Object.freeze({ type: Actions.SET_THEME, payload: theme });
};

export const setError = (error: string | null): AppAction =>
  Object.freeze({ type: Actions.SET_ERROR, payload: error });

export const taskSaved = (task: Task): AppAction => {
  checkTaskId(task.id);
  return Object.freeze({ type: Actions.TASK_SAVED, payload: task });
};

// Withdraws the pending entry of a draft the collaborator refused
export const taskDiscarded = (draft: TaskDraft): AppAction => {
  checkDraft(draft);
  return Object.freeze({ type: Actions.TASK_DISCARDED, payload: { ...draft } });
};
