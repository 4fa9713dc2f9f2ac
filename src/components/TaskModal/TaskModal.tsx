import { Fragment, useEffect, useState } from 'react';
import { Dialog, Transition, RadioGroup } from '@headlessui/react';
import { CheckIcon } from '@heroicons/react/20/solid';
import type { CustomCategory, Task } from '@modules/types';
import { buildTask } from '@modules/newTask';
import { categoryOptions, choiceFor, NEW_CATEGORY } from './options';

interface Props {
  isOpen: boolean;
  onClose: () => void;
  categories: CustomCategory[];
  addTask: (task: Task) => void;
  addCategory: (category: CustomCategory) => void;
}

function classNames(...classes: Array<string | false | null | undefined>) {
  return classes.filter(Boolean).join(' ');
}

export default function TaskModal({ isOpen, onClose, categories, addTask, addCategory }: Props) {
  const [title, setTitle]             = useState('');
  const [description, setDescription] = useState('');
  const [selected, setSelected]       = useState('nonUrgent');
  const [newName, setNewName]         = useState('');
  const [warning, setWarning]         = useState<string | null>(null);
  const options                       = categoryOptions(categories);
  const isNewCategory                 = selected === NEW_CATEGORY;
  const isSaveDisabled                = isNewCategory && newName.trim() === '';

  useEffect(() => {
    if (isOpen) setWarning(null);
  }, [isOpen]);

  function reset() {
    setTitle('');
    setDescription('');
    setSelected('nonUrgent');
    setNewName('');
    setWarning(null);
  }

  function handleSave() {
    const result = buildTask(
      { title, description, choice: choiceFor(selected, newName, categories) },
      categories
    );
    if (!result.ok) {
      setWarning(
        result.reason === 'duplicate-category'
          ? `A category named "${result.name}" already exists.`
          : 'Give the new category a name.'
      );
      return;
    }
    if (result.createdCategory) addCategory(result.createdCategory);
    addTask(result.task);
    reset();
    onClose();
  }

  function handleCancel() {
    reset();
    onClose();
  }

  return (
    <Transition appear show={isOpen} as={Fragment}>
      <Dialog as="div" className="relative z-50" onClose={handleCancel}>
        <Transition.Child
          as={Fragment}
          enter="ease-out duration-200" enterFrom="opacity-0" enterTo="opacity-100"
          leave="ease-in duration-150" leaveFrom="opacity-100" leaveTo="opacity-0"
        >
          <div className="fixed inset-0 bg-black/30" />
        </Transition.Child>

        <div className="fixed inset-0 flex items-center justify-center p-4">
          <Transition.Child
            as={Fragment}
            enter="ease-out duration-200" enterFrom="scale-95 opacity-0" enterTo="scale-100 opacity-100"
            leave="ease-in duration-150" leaveFrom="scale-100 opacity-100" leaveTo="scale-95 opacity-0"
          >
            <Dialog.Panel className="w-full max-w-md rounded-xl bg-white p-6 shadow-xl">
              <Dialog.Title className="mb-4 text-lg font-bold">Add New Task</Dialog.Title>

              <label className="block text-sm font-medium text-gray-700">
                Title
                <input
                  type="text"
                  className="mt-1 w-full rounded-md border-gray-300 p-2.5 text-base focus:border-blue-500 focus:ring-blue-500"
                  value={title}
                  onChange={e => setTitle(e.target.value)}
                  placeholder="Name a fun Task"
                  autoFocus
                />
              </label>

              <label className="mt-4 block text-sm font-medium text-gray-700">
                Description
                <textarea
                  rows={3}
                  className="mt-1 w-full rounded-md border-gray-300 p-2.5 text-base focus:border-blue-500 focus:ring-blue-500"
                  value={description}
                  onChange={e => setDescription(e.target.value)}
                  placeholder="Enter Task Description"
                />
              </label>

              <RadioGroup value={selected} onChange={setSelected} className="mt-4">
                <RadioGroup.Label className="mb-1 block text-sm font-medium text-gray-700">
                  Select Category
                </RadioGroup.Label>
                <div className="grid max-h-48 grid-cols-1 gap-2 overflow-y-auto sm:grid-cols-2">
                  {options.map(({ value, label }) => (
                    <RadioGroup.Option
                      key={value}
                      value={value}
                      className={({ active, checked }) =>
                        classNames(
                          'flex cursor-pointer items-center justify-between rounded-lg border px-4 py-3 text-sm font-medium shadow-sm transition focus:outline-none',
                          checked ? 'border-blue-500 bg-blue-50 text-blue-900' : 'border-gray-200 bg-white text-gray-700',
                          active ? 'ring-2 ring-blue-200 ring-offset-1' : ''
                        )
                      }
                    >
                      {({ checked }) => (
                        <>
                          <RadioGroup.Label as="span">{label}</RadioGroup.Label>
                          {checked ? (
                            <CheckIcon aria-hidden="true" className="h-5 w-5 text-blue-500" />
                          ) : (
                            <span aria-hidden="true" className="h-5 w-5" />
                          )}
                        </>
                      )}
                    </RadioGroup.Option>
                  ))}
                </div>
              </RadioGroup>

              {isNewCategory && (
                <label className="mt-4 block text-sm font-medium text-gray-700">
                  Category name
                  <input
                    type="text"
                    className="mt-1 w-full rounded-md border-gray-300 p-2.5 text-base focus:border-blue-500 focus:ring-blue-500"
                    value={newName}
                    onChange={e => {
                      setNewName(e.target.value);
                      setWarning(null);
                    }}
                    placeholder="Add new Task Category"
                  />
                </label>
              )}

              {warning && (
                <p role="alert" className="mt-3 text-sm text-red-600">
                  {warning}
                </p>
              )}

              <div className="mt-6 flex justify-end gap-3">
                <button
                  type="button"
                  onClick={handleCancel}
                  className="rounded-md bg-gray-100 px-4 py-2 text-sm font-medium text-gray-700 hover:bg-gray-200"
                >
                  Cancel
                </button>
                <button
                  type="button"
                  disabled={isSaveDisabled}
                  onClick={handleSave}
                  className={`rounded-md px-4 py-2 text-sm font-medium text-white
                    ${isSaveDisabled ? 'bg-gray-400 cursor-not-allowed' : 'bg-blue-600 hover:bg-blue-700'}`}
                >
                  Save
                </button>
              </div>
            </Dialog.Panel>
          </Transition.Child>
        </div>
      </Dialog>
    </Transition>
  );
}
