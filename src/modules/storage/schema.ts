import { z } from 'zod';
import type { CustomCategory, Task, TaskCategory } from '../types';
import { categoryLabels } from '../task';

export const categorySchema = z.object({
  id: z.string().uuid(),
  name: z.string(),
});

const labelSchema = z.enum([
  categoryLabels.urgent,
  categoryLabels.nonUrgent,
  categoryLabels.custom,
]);

type CategoryLabel = z.infer<typeof labelSchema>;

const categoryByLabel: Record<CategoryLabel, TaskCategory> = {
  [categoryLabels.urgent]: 'urgent',
  [categoryLabels.nonUrgent]: 'nonUrgent',
  [categoryLabels.custom]: 'custom',
};

export const taskSchema = z.object({
  id: z.string().uuid(),
  title: z.string(),
  description: z.string(),
  isCompleted: z.boolean(),
  category: labelSchema,
  customCategory: categorySchema.nullish(),
});

export const taskListSchema = z.array(taskSchema);

export type TaskRecord = z.infer<typeof taskSchema>;
export type CategoryRecord = z.infer<typeof categorySchema>;

export function toCategoryRecord({ id, name }: CustomCategory): CategoryRecord {
  return { id, name };
}

export function toTaskRecord(task: Task): TaskRecord {
  const record: TaskRecord = {
    id: task.id,
    title: task.title,
    description: task.description,
    isCompleted: task.isCompleted,
    category: categoryLabels[task.category],
  };
  if (task.customCategory) record.customCategory = toCategoryRecord(task.customCategory);
  return record;
}

export function fromTaskRecord(record: TaskRecord): Task {
  const task: Task = {
    id: record.id,
    title: record.title,
    description: record.description,
    isCompleted: record.isCompleted,
    category: categoryByLabel[record.category],
  };
  if (record.customCategory) task.customCategory = toCategoryRecord(record.customCategory);
  return task;
}
