/**
 * Reducer for application state management
 *
 * Pure: returns the next state and an optional effect for the store to run.
 * The state passed in is never modified.
 */

import { isEqual } from 'lodash-es';

import type { Action } from './Store';
import { Actions, isAppAction } from './actions';
import {
  DEFAULT_PROJECT,
  Effects,
  type AppState,
  type Effect,
  type PendingTask,
  type Task,
  type TaskDraft,
  type TaskEntry,
  type TaskId,
} from './types';

export type Reduction = [AppState, Effect | null];

export const initialState: AppState = {
  tasks: [],
  currentTaskId: null,
  theme: 'dark',
  loading: false,
  error: null,
};

export const createInitialState = (
  overrides: Partial<AppState> = {}
): AppState => ({ ...initialState, ...overrides });

const pendingTask = (draft: TaskDraft): PendingTask => ({
  id: null,
  title: draft.title,
  description: draft.description ?? '',
  completed: false,
  priority: draft.priority ?? 'medium',
  createdAt: null,
  modifiedAt: null,
  dueDate: draft.dueDate ?? null,
  projectId: null,
  projectName: draft.project ?? DEFAULT_PROJECT,
});

const mapTask = (
  tasks: readonly TaskEntry[],
  taskId: TaskId,
  update: (task: TaskEntry) => TaskEntry
): TaskEntry[] => tasks.map(task => (task.id === taskId ? update(task) : task));

// Previous selection if still present, else the first task, else nothing
const resolveSelection = (
  previous: TaskId | null,
  tasks: readonly Task[]
): TaskId | null => {
  if (previous !== null && tasks.some(task => task.id === previous)) {
    return previous;
  }
  return tasks.length > 0 ? tasks[0].id : null;
};

export function appReducer(state: AppState, action: Action): Reduction {
  if (!isAppAction(action)) return [state, null];

  switch (action.type) {
    case Actions.ADD_TASK: {
      const draft = action.payload;
      return [
        { ...state, tasks: [...state.tasks, pendingTask(draft)] },
        {
          kind: Effects.SAVE_TASKS,
          params: { operation: 'add', draft },
        },
      ];
    }

    case Actions.UPDATE_TASK: {
      const { taskId, fields } = action.payload;
      return [
        {
          ...state,
          tasks: mapTask(state.tasks, taskId, task => ({ ...task, ...fields })),
        },
        {
          kind: Effects.SAVE_TASKS,
          params: { operation: 'update', taskId, fields },
        },
      ];
    }

    case Actions.DELETE_TASK: {
      const taskId = action.payload;
      return [
        {
          ...state,
          tasks: state.tasks.filter(task => task.id !== taskId),
          currentTaskId:
            state.currentTaskId === taskId ? null : state.currentTaskId,
        },
        {
          kind: Effects.SAVE_TASKS,
          params: { operation: 'delete', taskId },
        },
      ];
    }

    case Actions.TOGGLE_COMPLETION: {
      const taskId = action.payload;
      // modifiedAt is set by the collaborator and arrives through TASK_SAVED
      return [
        {
          ...state,
          tasks: mapTask(state.tasks, taskId, task => ({
            ...task,
            completed: !task.completed,
          })),
        },
        { kind: Effects.TOGGLE_COMPLETION, params: { taskId } },
      ];
    }

    case Actions.SELECT_TASK:
      return [{ ...state, currentTaskId: action.payload }, null];

    case Actions.LOAD_TASKS:
      return [
        { ...state, loading: true, error: null },
        { kind: Effects.LOAD_TASKS },
      ];

    case Actions.TASKS_LOADED: {
      const tasks = action.payload;
      return [
        {
          ...state,
          tasks: [...tasks],
          currentTaskId: resolveSelection(state.currentTaskId, tasks),
          loading: false,
          error: null,
        },
        null,
      ];
    }

    case Actions.SET_THEME:
      return [{ ...state, theme: action.payload }, null];

    case Actions.SET_ERROR:
      return [{ ...state, error: action.payload, loading: false }, null];

    case Actions.TASK_SAVED: {
      const saved = action.payload;
      if (!state.tasks.some(task => task.id === saved.id)) {
        return [state, null];
      }
      return [
        { ...state, tasks: mapTask(state.tasks, saved.id, () => saved) },
        null,
      ];
    }

    case Actions.TASK_DISCARDED: {
      const withdrawn = pendingTask(action.payload);
      const index = state.tasks.findIndex(
        task => task.id === null && isEqual(task, withdrawn)
      );
      if (index === -1) return [state, null];
      return [
        { ...state, tasks: state.tasks.filter((_task, i) => i !== index) },
        null,
      ];
    }

    default:
      return [state, null];
  }
}
