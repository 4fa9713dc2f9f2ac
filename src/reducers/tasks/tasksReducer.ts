import type { Task } from "@modules/types";
import { archiveTask } from "@modules/storage";

type State = {
  tasks: Task[];
  archived: Task[];
  selectedIndex: number | null;
};

const initialState: State = {
  tasks: [],
  archived: [],
  selectedIndex: null,
};

type LoadTasksAction = { type: "load-tasks"; tasks: Task[]; archived: Task[] };

type AddTaskAction = { type: "add-task"; task: Task };

type SelectTaskAction = { type: "select-task"; index: number };

type ToggleTaskAction = { type: "toggle-task"; index: number };

type ClearSelectionAction = { type: "clear-selection" };

type ArchiveTaskAction = { type: "archive-task"; index: number };

type ArchiveSelectedAction = { type: "archive-selected" };

type Action =
  | LoadTasksAction
  | AddTaskAction
  | SelectTaskAction
  | ToggleTaskAction
  | ClearSelectionAction
  | ArchiveTaskAction
  | ArchiveSelectedAction;

function archiveAt(state: State, index: number | null): State {
  if (index === null) return { ...state, selectedIndex: null };
  const { tasks, archived } = archiveTask(state.tasks, state.archived, index);
  return { tasks, archived, selectedIndex: null };
}

export function tasksReducer(state: State = initialState, action: Action): State {
  switch (action.type) {
    case "load-tasks":
      return { tasks: action.tasks, archived: action.archived, selectedIndex: null };
    case "add-task":
      return { ...state, tasks: [...state.tasks, action.task] };
    case "select-task":
      return { ...state, selectedIndex: action.index };
    case "toggle-task":
      return {
        ...state,
        selectedIndex: state.selectedIndex === action.index ? null : action.index,
      };
    case "clear-selection":
      return { ...state, selectedIndex: null };
    case "archive-task":
      return archiveAt(state, action.index);
    case "archive-selected":
      return archiveAt(state, state.selectedIndex);
    default:
      return state;
  }
}

export { initialState };
export type { State, Action };
