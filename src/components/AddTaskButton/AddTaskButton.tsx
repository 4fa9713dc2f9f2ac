import { memo } from 'react';
import { PlusIcon } from '@heroicons/react/24/outline';
import { aria } from './aria';

interface AddTaskButtonProps {
  onAdd: () => void;
  disabled?: boolean;
}

function AddTaskButton({ onAdd, disabled = false }: AddTaskButtonProps) {
  return (
    <div className="flex items-center justify-center">
      <button
        type="button"
        onClick={onAdd}
        disabled={disabled}
        {...aria.button}
        className="flex items-center gap-2 rounded-lg border-2 border-current px-3 py-2 text-gray-900 hover:bg-white/40 disabled:cursor-not-allowed disabled:opacity-50 focus:outline-none focus:ring-2 focus:ring-blue-500"
      >
        <PlusIcon aria-hidden="true" className="h-5 w-5" />
        <span>Add new Task</span>
      </button>
    </div>
  );
}

export default memo(AddTaskButton);
