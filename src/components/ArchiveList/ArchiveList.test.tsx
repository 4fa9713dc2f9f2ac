import { render, screen, within } from '@testing-library/react';
import { describe, it, expect } from 'vitest';
import ArchiveList, { aria } from '.';
import type { Task } from '@modules/types';

describe('ArchiveList', () => {
  it('lists archived titles and descriptions in order', () => {
    const tasks: Task[] = [
      { id: '1', title: 'Buy milk', description: '2 litres', isCompleted: false, category: 'urgent' },
      { id: '2', title: 'Water plants', description: 'balcony', isCompleted: false, category: 'nonUrgent' },
    ];
    render(<ArchiveList tasks={tasks} />);
    const region = screen.getByRole('region', { name: aria.root['aria-label'] });
    const items = within(region).getAllByRole('listitem');
    expect(items.map((item) => item.textContent)).toEqual(['Buy milk2 litres', 'Water plantsbalcony']);
  });
});
