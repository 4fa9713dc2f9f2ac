import { render, screen, fireEvent } from '@testing-library/react';
import { describe, it, expect, vi } from 'vitest';
import TaskModal from '.';
import type { CustomCategory } from '@modules/types';

const home: CustomCategory = { id: '6f1c2f4e-3b8a-4d2e-9c7a-1e5b8f0a2d41', name: 'Home' };

function renderModal(categories: CustomCategory[] = []) {
  const addTask = vi.fn();
  const addCategory = vi.fn();
  const onClose = vi.fn();
  render(
    <TaskModal
      isOpen
      onClose={onClose}
      categories={categories}
      addTask={addTask}
      addCategory={addCategory}
    />
  );
  return { addTask, addCategory, onClose };
}

describe('TaskModal', () => {
  it('renders when open', () => {
    renderModal();
    expect(screen.getByText('Add New Task')).toBeTruthy();
  });

  it('lists built-in, saved and new category choices', () => {
    renderModal([home]);
    expect(screen.getAllByRole('radio').map((r) => r.textContent)).toEqual([
      'Non-Urgent',
      'Urgent',
      'Home',
      'Add new Task Category',
    ]);
  });

  it('adds a task in the chosen built-in category', () => {
    const { addTask, addCategory, onClose } = renderModal();
    fireEvent.change(screen.getByPlaceholderText('Name a fun Task'), { target: { value: 'Buy milk' } });
    fireEvent.change(screen.getByPlaceholderText('Enter Task Description'), { target: { value: '2 litres' } });
    fireEvent.click(screen.getByRole('radio', { name: 'Urgent' }));
    fireEvent.click(screen.getByRole('button', { name: 'Save' }));

    expect(addTask).toHaveBeenCalledTimes(1);
    expect(addTask.mock.calls[0][0]).toMatchObject({
      title: 'Buy milk',
      description: '2 litres',
      category: 'urgent',
      isCompleted: false,
    });
    expect(addCategory).not.toHaveBeenCalled();
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('files a task under a saved category', () => {
    const { addTask } = renderModal([home]);
    fireEvent.click(screen.getByRole('radio', { name: 'Home' }));
    fireEvent.click(screen.getByRole('button', { name: 'Save' }));
    expect(addTask.mock.calls[0][0]).toMatchObject({ category: 'custom', customCategory: home });
  });

  it('creates a new category with the task', () => {
    const { addTask, addCategory } = renderModal([home]);
    fireEvent.click(screen.getByRole('radio', { name: 'Add new Task Category' }));
    const save = screen.getByRole('button', { name: 'Save' });
    expect(save.hasAttribute('disabled')).toBe(true);

    fireEvent.change(screen.getByPlaceholderText('Add new Task Category'), { target: { value: ' Gym ' } });
    fireEvent.click(save);

    expect(addCategory).toHaveBeenCalledTimes(1);
    const created = addCategory.mock.calls[0][0];
    expect(created.name).toBe('Gym');
    expect(addTask.mock.calls[0][0]).toMatchObject({ category: 'custom', customCategory: created });
  });

  it('warns about a duplicate category and saves nothing', () => {
    const { addTask, addCategory, onClose } = renderModal([home]);
    fireEvent.click(screen.getByRole('radio', { name: 'Add new Task Category' }));
    fireEvent.change(screen.getByPlaceholderText('Add new Task Category'), { target: { value: 'Home' } });
    fireEvent.click(screen.getByRole('button', { name: 'Save' }));

    expect(screen.getByRole('alert').textContent).toBe('A category named "Home" already exists.');
    expect(addTask).not.toHaveBeenCalled();
    expect(addCategory).not.toHaveBeenCalled();
    expect(onClose).not.toHaveBeenCalled();
  });
});
