import TaskRow from '@components/TaskRow';
import type { Task } from '@modules/types';
import { groupTasks } from '@modules/grouping';
import { sameTask } from '@modules/task';
import { aria } from './aria';

interface Props {
  tasks: Task[];
  selectedIndex: number | null;
  onToggle: (index: number) => void;
  onArchiveRequest: (index: number) => void;
}

export default function TaskList({ tasks, selectedIndex, onToggle, onArchiveRequest }: Props) {
  const groups = groupTasks(tasks);

  if (groups.length === 0) {
    return <p className="py-6 text-center text-sm text-gray-700">Nothing to do yet.</p>;
  }

  return (
    <div className="flex w-full flex-col gap-4">
      {groups.map(({ name, tasks: members }) => (
        <section key={name} {...aria.section(name)} className="rounded-lg bg-white/20 p-2 sm:p-4">
          <h2 className="mb-1 text-xs font-semibold uppercase tracking-wide text-gray-700">{name}</h2>
          <div role="list">
            {members.map((task) => {
              // rows are addressed by their position in the unsorted active list
              const index = tasks.findIndex((t) => sameTask(t, task));
              return (
                <TaskRow
                  key={task.id}
                  task={task}
                  selected={index === selectedIndex}
                  onToggle={() => onToggle(index)}
                  onArchiveRequest={() => onArchiveRequest(index)}
                />
              );
            })}
          </div>
        </section>
      ))}
    </div>
  );
}
