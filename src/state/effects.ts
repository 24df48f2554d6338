/**
 * Effect runner: carries reducer effects out against the persistence
 * collaborator and reports results back as actions
 */

import type winston from 'winston';

import {
  NotFoundError,
  PersistenceError,
  TodoError,
  ValidationError,
  errorMessage,
} from '../lib/errors';
import {
  isTaskFailure,
  type TaskFailure,
  type TaskPersistence,
  type TaskResult,
} from '../persistence/types';

import type { Dispatch, EffectRunner } from './Store';
import { loadTasks, taskDiscarded, taskSaved, tasksLoaded } from './actions';
import { Effects, type Effect, type SaveOperation, type Task } from './types';

export const failureToError = (result: TaskFailure): TodoError => {
  switch (result.code) {
    case 'validation':
      return new ValidationError(result.error);
    case 'not_found':
      return new NotFoundError(result.error);
    default:
      return new PersistenceError(result.error);
  }
};

const unwrap = (result: TaskResult): Task => {
  if (isTaskFailure(result)) throw failureToError(result);
  return result;
};

export const createTaskEffects = (
  persistence: TaskPersistence,
  logger: winston.Logger
): EffectRunner<Effect> => {
  const save = async (
    params: SaveOperation,
    dispatch: Dispatch
  ): Promise<void> => {
    switch (params.operation) {
      case 'add': {
        let task: Task;
        try {
          task = unwrap(await persistence.addTask(params.draft));
        } catch (err) {
          await dispatch(taskDiscarded(params.draft));
          throw err;
        }
        logger.debug(`Task ${task.id} created`);
        // Reload so the stored record replaces the pending entry
        await dispatch(loadTasks());
        return;
      }
      case 'update': {
        const task = unwrap(
          await persistence.updateTask(params.taskId, params.fields)
        );
        await dispatch(taskSaved(task));
        return;
      }
      case 'delete': {
        if (!(await persistence.deleteTask(params.taskId))) {
          throw new NotFoundError(`Task with ID ${params.taskId} not found`);
        }
        logger.debug(`Task ${params.taskId} deleted`);
        return;
      }
    }
  };

  return async (effect, dispatch) => {
    logger.debug(`Running effect ${effect.kind}`);
    try {
      switch (effect.kind) {
        case Effects.LOAD_TASKS: {
          const tasks = await persistence.load();
          await dispatch(tasksLoaded(tasks));
          return;
        }
        case Effects.SAVE_TASKS:
          await save(effect.params, dispatch);
          return;
        case Effects.TOGGLE_COMPLETION: {
          const task = unwrap(
            await persistence.toggleCompletion(effect.params.taskId)
          );
          await dispatch(taskSaved(task));
          return;
        }
      }
    } catch (err) {
      logger.warn(`Effect ${effect.kind} failed: ${errorMessage(err)}`);
      throw err instanceof TodoError
        ? err
        : new PersistenceError(errorMessage(err));
    }
  };
};
