import type { Task } from '../types';
import type { KeyValueStore } from './keyValueStore';
import { fromTaskRecord, taskListSchema, toTaskRecord } from './schema';

export const TASKS_KEY = 'tasks';
export const ARCHIVE_TASKS_KEY = 'archiveTasks';

export interface TaskLists {
  tasks: Task[];
  archived: Task[];
}

/**
 * Active and archived tasks, each persisted as its own JSON snapshot.
 *
 * The two lists are written independently, so a crash between the writes can
 * leave a just-archived task in both snapshots or in neither.
 */
export class TaskStore {
  constructor(private readonly kv: KeyValueStore) {}

  loadActive(): Promise<Task[]> {
    return this.load(TASKS_KEY);
  }

  loadArchived(): Promise<Task[]> {
    return this.load(ARCHIVE_TASKS_KEY);
  }

  saveActive(tasks: Task[]): Promise<void> {
    return this.save(TASKS_KEY, tasks);
  }

  saveArchived(tasks: Task[]): Promise<void> {
    return this.save(ARCHIVE_TASKS_KEY, tasks);
  }

  async saveAll({ tasks, archived }: TaskLists): Promise<void> {
    await this.saveActive(tasks);
    await this.saveArchived(archived);
  }

  private async load(key: string): Promise<Task[]> {
    let raw: unknown;
    try {
      raw = await this.kv.get(key);
    } catch (err) {
      console.error(err);
      return [];
    }
    if (typeof raw !== 'string') return [];
    return decodeTasks(raw, key);
  }

  private async save(key: string, tasks: Task[]): Promise<void> {
    try {
      await this.kv.set(key, encodeTasks(tasks));
    } catch (err) {
      console.error(err);
    }
  }
}

export function encodeTasks(tasks: Task[]): string {
  return JSON.stringify(tasks.map(toTaskRecord));
}

export function decodeTasks(blob: string, key = 'tasks'): Task[] {
  let json: unknown;
  try {
    json = JSON.parse(blob);
  } catch {
    console.warn(`Discarding unreadable "${key}" snapshot`);
    return [];
  }
  const parsed = taskListSchema.safeParse(json);
  if (!parsed.success) {
    console.warn(`Discarding invalid "${key}" snapshot`, parsed.error.issues);
    return [];
  }
  return parsed.data.map(fromTaskRecord);
}

/**
 * Moves the task at `index` from the active list to the end of the archive.
 * An index outside the active list returns both inputs untouched.
 */
export function archiveTask(active: Task[], archived: Task[], index: number): TaskLists {
  if (!Number.isInteger(index) || index < 0 || index >= active.length) {
    return { tasks: active, archived };
  }
  const moved = active[index];
  return {
    tasks: [...active.slice(0, index), ...active.slice(index + 1)],
    archived: [...archived, moved],
  };
}
