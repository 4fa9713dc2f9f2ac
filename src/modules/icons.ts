import {
  AcademicCapIcon,
  ArrowPathIcon,
  BriefcaseIcon,
  ClockIcon,
  HomeIcon,
  UserGroupIcon,
  UsersIcon,
} from '@heroicons/react/24/outline';
import { ClockIcon as SolidClockIcon } from '@heroicons/react/24/solid';
import type { Task } from './types';

type Icon = typeof ClockIcon;

const customIcons: Record<string, Icon> = {
  Home: HomeIcon,
  Friend: UsersIcon,
  Family: UserGroupIcon,
  School: AcademicCapIcon,
  Work: BriefcaseIcon,
};

export function iconFor(task: Task): Icon {
  switch (task.category) {
    case 'urgent':
      return ClockIcon;
    case 'nonUrgent':
      return SolidClockIcon;
    case 'custom':
      return customIcons[task.customCategory?.name ?? ''] ?? ArrowPathIcon;
  }
}
