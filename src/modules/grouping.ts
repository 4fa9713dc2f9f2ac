import type { Task } from './types';
import { categoryLabels, categoryName } from './task';

export interface TaskGroup {
  name: string;
  tasks: Task[];
}

function compare(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Groups active tasks into display sections. Within a section tasks are
 * ordered by raw category label, so custom tasks come before built-in ones
 * that happen to share the section name. Sections are sorted by name.
 */
export function groupTasks(tasks: readonly Task[]): TaskGroup[] {
  const sorted = [...tasks].sort((a, b) =>
    compare(categoryLabels[a.category], categoryLabels[b.category])
  );
  const groups = new Map<string, Task[]>();
  for (const task of sorted) {
    const name = categoryName(task);
    const group = groups.get(name);
    if (group) {
      group.push(task);
    } else {
      groups.set(name, [task]);
    }
  }
  return [...groups.keys()]
    .sort(compare)
    .map((name) => ({ name, tasks: groups.get(name) ?? [] }));
}
