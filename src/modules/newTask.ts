import type { BuiltinCategory, CustomCategory, Task } from './types';
import { categoryKey, createCategory, createTask } from './task';

export type CategoryChoice =
  | { kind: 'builtin'; category: BuiltinCategory }
  | { kind: 'custom'; category: CustomCategory }
  | { kind: 'new'; name: string };

export interface TaskDraft {
  title: string;
  description: string;
  choice: CategoryChoice;
}

export type BuildTaskResult =
  | { ok: true; task: Task; createdCategory?: CustomCategory }
  | { ok: false; reason: 'empty-category' }
  | { ok: false; reason: 'duplicate-category'; name: string };

export function buildTask(
  { title, description, choice }: TaskDraft,
  existing: readonly CustomCategory[]
): BuildTaskResult {
  switch (choice.kind) {
    case 'builtin':
      return { ok: true, task: createTask({ title, description, category: choice.category }) };
    case 'custom':
      return {
        ok: true,
        task: createTask({ title, description, category: 'custom', customCategory: choice.category }),
      };
    case 'new': {
      const name = choice.name.trim();
      if (name === '') return { ok: false, reason: 'empty-category' };
      if (existing.some((c) => categoryKey(c) === name)) {
        return { ok: false, reason: 'duplicate-category', name };
      }
      const createdCategory = createCategory(name);
      return {
        ok: true,
        task: createTask({ title, description, category: 'custom', customCategory: createdCategory }),
        createdCategory,
      };
    }
  }
}
