export type TaskCategory = 'urgent' | 'nonUrgent' | 'custom';

export type BuiltinCategory = Exclude<TaskCategory, 'custom'>;

export interface CustomCategory {
  id: string;
  name: string;
}

export interface Task {
  id: string;
  title: string;
  description: string;
  isCompleted: boolean;
  category: TaskCategory;
  customCategory?: CustomCategory;
}
