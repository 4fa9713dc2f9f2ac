import type { Task } from '@modules/types';
import { aria } from './aria';

interface Props {
  tasks: Task[];
}

export default function ArchiveList({ tasks }: Props) {
  return (
    <section {...aria.root} className="flex w-full flex-col">
      <h2 className="pt-5 text-center text-2xl font-semibold">Archived Tasks</h2>
      <ul className="flex flex-col gap-2 overflow-y-auto p-4">
        {tasks.map((task) => (
          <li key={task.id} className="rounded-lg bg-white/20 p-3">
            <div className="font-medium text-white">{task.title}</div>
            <div className="mt-1 text-sm text-gray-600">{task.description}</div>
          </li>
        ))}
      </ul>
    </section>
  );
}
