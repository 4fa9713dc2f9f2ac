import { useCallback, useEffect, useReducer, useState } from "react";
import type { Task } from '@modules/types';
import { archiveTask } from '@modules/storage';
import { tasksReducer, initialState } from '@reducers';
import { useStores } from '../../context/StoreContext';
import { useBackgroundFlush } from '../useBackgroundFlush';

export function useTasks() {
  const [state, dispatch] = useReducer(tasksReducer, initialState);
  const { tasks, archived, selectedIndex } = state;
  const { taskStore } = useStores();
  const [loaded, setLoaded] = useState(false);

  useEffect(() => {
    let cancelled = false;
    async function load() {
      const [active, archive] = await Promise.all([
        taskStore.loadActive(),
        taskStore.loadArchived(),
      ]);
      if (cancelled) return;
      dispatch({ type: "load-tasks", tasks: active, archived: archive });
      setLoaded(true);
    }
    void load();
    return () => {
      cancelled = true;
    };
  }, [taskStore]);

  useBackgroundFlush(() => {
    if (loaded) void taskStore.saveAll({ tasks, archived });
  });

  // Writes before the first load would overwrite the stored snapshots.
  const addTask = useCallback(
    (task: Task) => {
      if (!loaded) return;
      dispatch({ type: "add-task", task });
      void taskStore.saveActive([...tasks, task]);
    },
    [taskStore, tasks, loaded]
  );

  const archiveSelected = useCallback(() => {
    if (!loaded) return;
    dispatch({ type: "archive-selected" });
    if (selectedIndex === null) return;
    const next = archiveTask(tasks, archived, selectedIndex);
    if (next.tasks === tasks) return;
    void taskStore.saveAll(next);
  }, [taskStore, tasks, archived, selectedIndex, loaded]);

  const selectTask = useCallback((index: number) => {
    dispatch({ type: "select-task", index });
  }, []);

  const toggleTask = useCallback((index: number) => {
    dispatch({ type: "toggle-task", index });
  }, []);

  const clearSelection = useCallback(() => {
    dispatch({ type: "clear-selection" });
  }, []);

  return {
    tasks,
    archived,
    selectedIndex,
    loaded,
    addTask,
    selectTask,
    toggleTask,
    clearSelection,
    archiveSelected,
  };
}
