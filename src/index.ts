/**
 * @packageDocumentation todo-state-engine
 *
 * Unidirectional state management for a todo list: actions, a pure reducer,
 * a serializing store with effects, and view bindings
 */
export * from './state';
export { TodoCore } from './bin';
export type { TodoCoreOptions } from './bin';
export { default as configArgs, loadConfig, toConfig } from './config/args';
export type { Config, LogLevel, LoggerKind } from './config/args';
export { ConfigParser, parseConfig } from './lib/parseConfig';
export type { ConfigEntry, ConfigTemplate, RawConfig } from './lib/parseConfig';
export { buildLogger } from './logger/winston';
export * from './lib/errors';
export { MemoryTaskStore } from './persistence/MemoryTaskStore';
export type {
  MemoryTaskStoreOptions,
  Project,
} from './persistence/MemoryTaskStore';
export { isTaskFailure } from './persistence/types';
export type {
  SearchFilters,
  TaskFailure,
  TaskPersistence,
  TaskResult,
} from './persistence/types';
export {
  defaultLimits,
  isValidDueDate,
  parsePriority,
  validateTask,
} from './persistence/validation';
export type { ValidationLimits } from './persistence/validation';
