import type { Task } from '@modules/types';
import { palette } from '@modules/palette';
import { iconFor } from '@modules/icons';
import { aria } from './aria';

interface Props {
  task: Task;
  selected?: boolean;
  onToggle?: () => void;
  onArchiveRequest?: () => void;
}

export default function TaskRow({ task, selected, onToggle, onArchiveRequest }: Props) {
  const Icon = iconFor(task);

  return (
    <div {...aria.root(task.title)} className="flex flex-col py-1">
      <div className="flex items-center gap-2">
        <button
          type="button"
          {...aria.archive(task.title)}
          onClick={onArchiveRequest}
          className="rounded-md p-1 hover:bg-white/40 focus:outline-none focus:ring-2 focus:ring-blue-500"
        >
          <Icon aria-hidden="true" className="h-6 w-6" style={{ color: palette[task.category] }} />
        </button>
        <button
          type="button"
          onClick={onToggle}
          aria-expanded={Boolean(selected)}
          className="min-w-0 flex-1 break-words pl-2 text-left text-lg font-bold text-white"
        >
          {task.title}
        </button>
      </div>
      {selected && (
        <div className="ml-10 mt-1 rounded-md bg-white/70 p-3 text-sm text-gray-800">
          <div className="mb-1 text-xs font-semibold uppercase text-gray-500">Description</div>
          <p className="whitespace-pre-line break-words">{task.description}</p>
        </div>
      )}
    </div>
  );
}
