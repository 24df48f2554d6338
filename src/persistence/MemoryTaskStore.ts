/**
 * In-process task storage with projects
 *
 * Reference implementation of TaskPersistence. Records are copied on the way
 * in and out so callers never share objects with the storage.
 */

import { ValidationError } from '../lib/errors';
import {
  DEFAULT_PROJECT,
  type Priority,
  type ProjectId,
  type Task,
  type TaskDraft,
  type TaskId,
  type TaskPatch,
} from '../state/types';

import {
  isTaskFailure,
  type SearchFilters,
  type TaskFailure,
  type TaskPersistence,
  type TaskResult,
} from './types';
import {
  defaultLimits,
  parsePriority,
  validateTask,
  type ValidationLimits,
} from './validation';

export interface Project {
  id: ProjectId;
  name: string;
}

export interface MemoryTaskStoreOptions {
  defaultProject?: string;
  projects?: string[];
  limits?: ValidationLimits;
  now?: () => Date;
}

const failure = (
  error: string,
  code: TaskFailure['code'] = 'validation'
): TaskFailure => ({ error, code });

const compareNullable = (a: string | null, b: string | null): number => {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
};

// Open tasks first, then by due date (undated first), creation time and id
const taskOrder = (a: Task, b: Task): number =>
  Number(a.completed) - Number(b.completed) ||
  compareNullable(a.dueDate, b.dueDate) ||
  compareNullable(a.createdAt, b.createdAt) ||
  a.id - b.id;

const normalizeDueDate = (value: string | null | undefined): string | null =>
  value && value.trim() ? value.trim() : null;

export class MemoryTaskStore implements TaskPersistence {
  private tasks: Map<TaskId, Task> = new Map();
  private projects: Map<string, Project> = new Map();
  private nextTaskId = 1;
  private nextProjectId = 1;
  private limits: ValidationLimits;
  private now: () => Date;
  readonly defaultProject: string;

  constructor(options: MemoryTaskStoreOptions = {}) {
    this.limits = options.limits ?? defaultLimits;
    this.now = options.now ?? (() => new Date());
    this.defaultProject = options.defaultProject ?? DEFAULT_PROJECT;
    this.addProject(this.defaultProject);
    for (const name of options.projects ?? []) this.addProject(name);
  }

  addProject(name: string): Project {
    const trimmed = name.trim();
    if (!trimmed) throw new ValidationError('Project name cannot be empty');
    const existing = this.projects.get(trimmed);
    if (existing) return { ...existing };
    const project = { id: this.nextProjectId++, name: trimmed };
    this.projects.set(trimmed, project);
    return { ...project };
  }

  listProjects(): Project[] {
    return [...this.projects.values()]
      .map(project => ({ ...project }))
      .sort((a, b) => a.id - b.id);
  }

  load(): Promise<Task[]> {
    return Promise.resolve(this.sorted([...this.tasks.values()]));
  }

  addTask(draft: TaskDraft): Promise<TaskResult> {
    const priority = parsePriority(draft.priority ?? 'medium');
    if (!priority) {
      return Promise.resolve(failure(`Invalid priority value: ${draft.priority}`));
    }
    const description = draft.description ?? '';
    const invalid = validateTask(
      draft.title,
      description,
      draft.dueDate ?? null,
      this.limits
    );
    if (invalid) return Promise.resolve(failure(invalid));

    const project = this.projects.get(draft.project ?? this.defaultProject);
    if (!project) {
      return Promise.resolve(
        failure(`Project '${draft.project}' not found`, 'not_found')
      );
    }

    const now = this.now().toISOString();
    const task: Task = {
      id: this.nextTaskId++,
      title: draft.title.trim(),
      description: description.trim(),
      completed: false,
      priority,
      createdAt: now,
      modifiedAt: now,
      dueDate: normalizeDueDate(draft.dueDate),
      projectId: project.id,
      projectName: project.name,
    };
    this.tasks.set(task.id, task);
    return Promise.resolve({ ...task });
  }

  getTask(taskId: TaskId): Promise<TaskResult> {
    const task = this.find(taskId);
    return Promise.resolve(isTaskFailure(task) ? task : { ...task });
  }

  updateTask(taskId: TaskId, fields: TaskPatch): Promise<TaskResult> {
    const task = this.find(taskId);
    if (isTaskFailure(task)) return Promise.resolve(task);

    const title = fields.title ?? task.title;
    const description = fields.description ?? task.description;
    const dueDate =
      fields.dueDate === undefined ? task.dueDate : fields.dueDate;
    const invalid = validateTask(title, description, dueDate, this.limits);
    if (invalid) return Promise.resolve(failure(invalid));

    let priority = task.priority;
    if (fields.priority !== undefined) {
      const parsed = parsePriority(fields.priority);
      if (!parsed) {
        return Promise.resolve(
          failure(`Invalid priority value: ${fields.priority}`)
        );
      }
      priority = parsed;
    }

    let project: Project = { id: task.projectId, name: task.projectName };
    if (
      fields.projectName !== undefined &&
      fields.projectName !== task.projectName
    ) {
      const found = this.projects.get(fields.projectName);
      if (!found) {
        return Promise.resolve(
          failure(`Project '${fields.projectName}' not found`, 'not_found')
        );
      }
      project = found;
    }

    const updated: Task = {
      ...task,
      title: title.trim(),
      description: description.trim(),
      completed: fields.completed ?? task.completed,
      priority,
      dueDate: normalizeDueDate(dueDate),
      modifiedAt: this.now().toISOString(),
      projectId: project.id,
      projectName: project.name,
    };
    this.tasks.set(taskId, updated);
    return Promise.resolve({ ...updated });
  }

  deleteTask(taskId: TaskId): Promise<boolean> {
    return Promise.resolve(this.tasks.delete(taskId));
  }

  toggleCompletion(taskId: TaskId): Promise<TaskResult> {
    const task = this.find(taskId);
    if (isTaskFailure(task)) return Promise.resolve(task);
    const updated: Task = {
      ...task,
      completed: !task.completed,
      modifiedAt: this.now().toISOString(),
    };
    this.tasks.set(taskId, updated);
    return Promise.resolve({ ...updated });
  }

  searchTasks(filters: SearchFilters = {}): Promise<Task[]> {
    let priority: Priority | null = null;
    if (filters.priority !== undefined) {
      priority = parsePriority(filters.priority);
      if (!priority) {
        return Promise.reject(
          new ValidationError(`Invalid priority value: ${filters.priority}`)
        );
      }
    }
    const query = filters.query?.toLowerCase() ?? '';
    const matches = [...this.tasks.values()].filter(
      task =>
        (!query ||
          task.title.toLowerCase().includes(query) ||
          task.description.toLowerCase().includes(query)) &&
        (priority === null || task.priority === priority) &&
        (filters.completed === undefined ||
          task.completed === filters.completed)
    );
    return Promise.resolve(this.sorted(matches));
  }

  private sorted(tasks: Task[]): Task[] {
    return tasks.sort(taskOrder).map(task => ({ ...task }));
  }

  private find(taskId: TaskId): TaskResult {
    return (
      this.tasks.get(taskId) ??
      failure(`Task with ID ${taskId} not found`, 'not_found')
    );
  }
}
