export { useTasks } from './tasks/useTasks';
export { useCategories } from './categories/useCategories';
export { useBackgroundFlush } from './useBackgroundFlush';
