import { v4 as uuid } from 'uuid';
import type { CustomCategory, Task, TaskCategory } from './types';

/** Raw label of each category; also what gets written to storage. */
export const categoryLabels = {
  urgent: 'Urgent',
  nonUrgent: 'Non-Urgent',
  custom: 'Custom',
} as const satisfies Record<TaskCategory, string>;

export function createTask(
  partial: Omit<Task, 'id' | 'isCompleted'> & { isCompleted?: boolean }
): Task {
  return { isCompleted: false, ...partial, id: uuid() };
}

export function createCategory(name: string, id: string = uuid()): CustomCategory {
  return { id, name };
}

export function categoryName(task: Task): string {
  return task.category === 'custom'
    ? task.customCategory?.name ?? ''
    : categoryLabels[task.category];
}

// Tasks are the same task when their ids match, whatever their content.
export function sameTask(a: Task, b: Task) {
  return a.id === b.id;
}

// Categories are keyed by name; the id is carried along but never compared.
export function categoryKey(category: CustomCategory) {
  return category.name;
}
