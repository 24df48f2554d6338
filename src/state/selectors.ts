/**
 * Derived reads over AppState
 */

import type { AppState, TaskEntry, TaskFilter } from './types';

export const selectCurrentTask = (state: AppState): TaskEntry | null => {
  if (state.currentTaskId === null) return null;
  return state.tasks.find(task => task.id === state.currentTaskId) ?? null;
};

export const selectTasks = (
  state: AppState,
  filter: TaskFilter = 'all'
): readonly TaskEntry[] => {
  switch (filter) {
    case 'active':
      return state.tasks.filter(task => !task.completed);
    case 'completed':
      return state.tasks.filter(task => task.completed);
    default:
      return state.tasks;
  }
};
