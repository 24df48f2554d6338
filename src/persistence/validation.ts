/**
 * Task field validation
 */

import { PRIORITIES, type Priority } from '../state/types';

export interface ValidationLimits {
  maxTitleLength: number;
  maxDescriptionLength: number;
}

export const defaultLimits: ValidationLimits = {
  maxTitleLength: 100,
  maxDescriptionLength: 500,
};

const DUE_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isValidDueDate = (value: string): boolean => {
  const match = DUE_DATE.exec(value);
  if (!match) return false;
  const [year, month, day] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
};

// Returns an error message, or null when the fields are acceptable
export const validateTask = (
  title: string,
  description = '',
  dueDate: string | null = null,
  limits: ValidationLimits = defaultLimits
): string | null => {
  if (!title.trim()) return 'Title cannot be empty';
  if (title.length > limits.maxTitleLength)
    return `Title cannot exceed ${limits.maxTitleLength} characters`;
  if (description.length > limits.maxDescriptionLength)
    return `Description cannot exceed ${limits.maxDescriptionLength} characters`;
  if (dueDate && dueDate.trim() && !isValidDueDate(dueDate.trim()))
    return 'Due date must be in YYYY-MM-DD format';
  return null;
};

export const parsePriority = (value: string): Priority | null => {
  const lower = value.toLowerCase();
  return PRIORITIES.find(p => p === lower) ?? null;
};
