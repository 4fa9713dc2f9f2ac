import { useCallback, useState } from 'react';
import { Tab } from '@headlessui/react';
import { ArchiveBoxIcon, HomeIcon } from '@heroicons/react/24/solid';
import { PaperAirplaneIcon } from '@heroicons/react/24/outline';
import TaskList from './components/TaskList';
import TaskModal from './components/TaskModal';
import ArchiveList from './components/ArchiveList';
import ArchiveConfirm from './components/ArchiveConfirm';
import AddTaskButton from './components/AddTaskButton';
import { useTasks, useCategories } from './hooks';
import { aria } from './aria';

function tabClassName({ selected }: { selected: boolean }) {
  return `flex flex-1 flex-col items-center gap-1 py-2 text-xs focus:outline-none ${
    selected ? 'text-blue-700' : 'text-gray-600'
  }`;
}

export default function App() {
  const {
    tasks,
    archived,
    selectedIndex,
    loaded: tasksLoaded,
    addTask,
    selectTask,
    toggleTask,
    clearSelection,
    archiveSelected,
  } = useTasks();
  const { categories, loaded: categoriesLoaded, addCategory } = useCategories();
  const [isModalOpen, setIsModalOpen] = useState(false);
  const [isConfirmOpen, setIsConfirmOpen] = useState(false);

  const handleOpenModal = useCallback(() => setIsModalOpen(true), []);

  const handleArchiveRequest = useCallback(
    (index: number) => {
      selectTask(index);
      setIsConfirmOpen(true);
    },
    [selectTask]
  );

  const handleConfirm = useCallback(() => {
    archiveSelected();
    setIsConfirmOpen(false);
  }, [archiveSelected]);

  const handleCancel = useCallback(() => {
    clearSelection();
    setIsConfirmOpen(false);
  }, [clearSelection]);

  return (
    <div className="flex min-h-screen flex-col bg-gradient-to-b from-blue-500 to-white p-4">
      <Tab.Group>
        <Tab.Panels className="flex flex-1 flex-col">
          <Tab.Panel className="flex flex-1 flex-col gap-6 focus:outline-none">
            <header {...aria.header} className="flex items-start justify-center gap-4 pt-6">
              <PaperAirplaneIcon aria-hidden="true" className="h-9 w-9 text-blue-700" />
              <h1 className="text-4xl">Task Mark</h1>
            </header>
            <AddTaskButton onAdd={handleOpenModal} disabled={!tasksLoaded || !categoriesLoaded} />
            <main {...aria.main} className="flex w-full flex-1">
              <TaskList
                tasks={tasks}
                selectedIndex={selectedIndex}
                onToggle={toggleTask}
                onArchiveRequest={handleArchiveRequest}
              />
            </main>
          </Tab.Panel>
          <Tab.Panel className="flex flex-1 focus:outline-none">
            <ArchiveList tasks={archived} />
          </Tab.Panel>
        </Tab.Panels>
        <Tab.List className="mt-4 flex rounded-xl bg-white/80 shadow">
          <Tab className={tabClassName}>
            <HomeIcon aria-hidden="true" className="h-6 w-6" />
            Main Menu
          </Tab>
          <Tab className={tabClassName}>
            <ArchiveBoxIcon aria-hidden="true" className="h-6 w-6" />
            Archive
          </Tab>
        </Tab.List>
      </Tab.Group>

      <TaskModal
        isOpen={isModalOpen}
        onClose={() => setIsModalOpen(false)}
        categories={categories}
        addTask={addTask}
        addCategory={(category) => void addCategory(category)}
      />
      <ArchiveConfirm isOpen={isConfirmOpen} onConfirm={handleConfirm} onCancel={handleCancel} />
    </div>
  );
}
