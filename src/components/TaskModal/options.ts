import type { CustomCategory } from '@modules/types';
import type { CategoryChoice } from '@modules/newTask';
import { categoryLabels } from '@modules/task';

export const NEW_CATEGORY = 'new';

export interface CategoryOption {
  value: string;
  label: string;
}

/** Built-in categories first, then saved custom ones, then the "add new" entry. */
export function categoryOptions(categories: readonly CustomCategory[]): CategoryOption[] {
  return [
    { value: 'nonUrgent', label: categoryLabels.nonUrgent },
    { value: 'urgent', label: categoryLabels.urgent },
    ...categories.map((c) => ({ value: `custom:${c.name}`, label: c.name })),
    { value: NEW_CATEGORY, label: 'Add new Task Category' },
  ];
}

export function choiceFor(
  value: string,
  newName: string,
  categories: readonly CustomCategory[]
): CategoryChoice {
  if (value === 'urgent' || value === 'nonUrgent') {
    return { kind: 'builtin', category: value };
  }
  if (value === NEW_CATEGORY) {
    return { kind: 'new', name: newName };
  }
  const existing = categories.find((c) => `custom:${c.name}` === value);
  return existing
    ? { kind: 'custom', category: existing }
    : { kind: 'builtin', category: 'nonUrgent' };
}
